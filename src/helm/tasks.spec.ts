import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    FakeExecutor,
    makeContext,
    makeTempDir,
} from '../../test/helpers';
import {
    newBuilder,
} from '../builder';
import {
    TaskExecutionError,
} from '../errors';
import {
    Secret,
} from '../secret';
import {
    SettingsStore,
} from '../settings';
import {
    helmPackage,
    helmPush,
    helmRemote,
} from './tasks';
import assert = require('assert');
import fs = require('fs-extra');
import path = require('path');

@suite('Helm tasks')
export class HelmTasksTest {
    private dir = '';

    async before(): Promise<void> {
        this.dir = await makeTempDir();
    }

    async after(): Promise<void> {
        await fs.remove(this.dir);
    }

    @test
    async 'helmPackage()'(): Promise<void> {
        const archive = path.join(this.dir, 'build', 'helm', 'app-1.0.0.tgz');
        const executor = new FakeExecutor(() => ({ stdout: `Successfully packaged chart and saved it to: ${archive}\n` }));
        const settings = new SettingsStore();
        const builder = await newBuilder({ cwd: this.dir, executor, settings });
        const task = helmPackage(builder, 'charts/app', { appVersion: '2.0', version: '1.0.0' });

        assert.strictEqual(task.key, 'helmPackage/app');
        assert.strictEqual(await task.fn(makeContext(settings)), archive);
        assert.deepStrictEqual(executor.commands, [[
            'helm', 'package', path.join(this.dir, 'charts', 'app'),
            '--destination', path.join(this.dir, 'build', 'helm'),
            '--app-version', '2.0',
            '--version', '1.0.0',
        ]]);
        assert.strictEqual(await fs.pathExists(path.join(this.dir, 'build', 'helm')), true);
    }

    @test
    async 'helmPackage() files are relative to the project directory'(): Promise<void> {
        const builder = await newBuilder({ cwd: this.dir, executor: new FakeExecutor() });
        const task = helmPackage(builder, 'app', { cwd: 'charts', inputs: ['app/Chart.yaml'], outputs: ['app.tgz'] });
        assert.deepStrictEqual(task.inputs, [path.join(this.dir, 'charts', 'app', 'Chart.yaml')]);
        assert.deepStrictEqual(task.outputs, [path.join(this.dir, 'charts', 'app.tgz')]);
    }

    @test
    async 'helmPackage() with unexpected output'(): Promise<void> {
        const executor = new FakeExecutor(() => ({ stdout: 'nothing to see\n' }));
        const settings = new SettingsStore();
        const builder = await newBuilder({ cwd: this.dir, executor, settings });
        const task = helmPackage(builder, 'charts/app');
        await assert.rejects(async () => {
            await task.fn(makeContext(settings));
        }, TaskExecutionError);
    }

    @test
    async 'helmPush() pushes the packaged chart with injected credentials'(): Promise<void> {
        const registryConfig = path.join(this.dir, 'helm', 'registry', 'config.json');
        const archive = path.join(this.dir, 'build', 'helm', 'app-1.0.0.tgz');
        let seen = '';
        const executor = new FakeExecutor(async call => {
            if (call.command[1] === 'package')
                return { stdout: `Successfully packaged chart and saved it to: ${archive}\n` };
            seen = await fs.readFile(registryConfig, 'utf-8');
            return {};
        });
        const settings = new SettingsStore();
        settings.addRegistry('charts', 'oci://example.jfrog.io/helm', {
            ecosystem: 'helm',
            readCredentials: { principal: 'ci', secret: Secret.of('test-secret') },
        });
        const builder = await newBuilder({ cwd: this.dir, executor, settings });
        const pkg = helmPackage(builder, 'charts/app');
        const push = helmPush(builder, pkg, 'charts', { registryConfig });

        assert.strictEqual(push.key, 'helmPush/charts');
        assert.deepStrictEqual(push.deps, ['helmPackage/app']);
        const report = await builder.run({ maxWorkers: 1, progress: false });

        assert.strictEqual(report.exitCode, 0);
        assert.deepStrictEqual(executor.commands[1], [
            'helm', 'push', archive, 'oci://example.jfrog.io/helm', '--registry-config', registryConfig,
        ]);
        // base64 of "ci:test-secret"
        assert.deepStrictEqual(JSON.parse(seen), { auths: { 'example.jfrog.io': { auth: 'Y2k6dGVzdC1zZWNyZXQ=' } } });
        assert.strictEqual(await fs.pathExists(path.join(this.dir, 'helm')), false);
    }

    @test
    async 'helmPush() without credentials'(): Promise<void> {
        const registryConfig = path.join(this.dir, 'config.json');
        const executor = new FakeExecutor();
        const settings = new SettingsStore();
        const registry = settings.addRegistry('public', 'https://charts.example.com', { ecosystem: 'helm' });
        const builder = await newBuilder({ cwd: this.dir, executor, settings });
        const push = helmPush(builder, 'helmPackage/app', registry, { registryConfig });
        const ctx = {
            ...makeContext(settings),
            dependencyResult: (key: string): unknown => key === 'helmPackage/app' ? '/charts/app-1.0.0.tgz' : undefined,
        };

        await push.fn(ctx);
        assert.deepStrictEqual(executor.commands, [[
            'helm', 'push', '/charts/app-1.0.0.tgz', 'oci://charts.example.com', '--registry-config', registryConfig,
        ]]);
        assert.strictEqual(await fs.pathExists(registryConfig), false);
    }

    @test
    'helmRemote()'(): void {
        const settings = new SettingsStore();
        assert.strictEqual(helmRemote(settings.addRegistry('a', 'oci://example.jfrog.io/helm', { ecosystem: 'helm' })),
                           'oci://example.jfrog.io/helm');
        assert.strictEqual(helmRemote(settings.addRegistry('b', 'https://example.jfrog.io/helm', { ecosystem: 'helm' })),
                           'oci://example.jfrog.io/helm');
    }
}

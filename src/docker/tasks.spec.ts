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
    ConfigurationError,
} from '../errors';
import {
    Secret,
} from '../secret';
import {
    SettingsStore,
} from '../settings';
import type {
    ImageBuildResult,
} from './image-builder';
import {
    dockerBuild,
} from './tasks';
import assert = require('assert');
import fs = require('fs-extra');
import path = require('path');

const DOCKERFILE = 'FROM alpine\nRUN make\n';

@suite('dockerBuild()')
export class DockerBuildTaskTest {
    private dir = '';

    async before(): Promise<void> {
        this.dir = await makeTempDir();
        await fs.writeFile(path.join(this.dir, 'Dockerfile'), DOCKERFILE);
    }

    async after(): Promise<void> {
        await fs.remove(this.dir);
    }

    @test
    async 'mounts the build secrets while the image builds'(): Promise<void> {
        const dockerfile = path.join(this.dir, 'Dockerfile');
        let seen = '';
        const executor = new FakeExecutor(async call => {
            if (call.command[1] === 'build')
                seen = await fs.readFile(dockerfile, 'utf-8');
            return {};
        });
        const settings = new SettingsStore();
        const builder = await newBuilder({ cwd: this.dir, executor, settings });
        const task = dockerBuild(builder, {
            dockerConfigFile: 'docker/config.json',
            mountSecrets: true,
            push: true,
            secrets: { TOKEN: Secret.of('test-token') },
            tags: ['ghcr.io/acme/app:1'],
        });

        assert.strictEqual(task.key, 'dockerBuild');
        assert.strictEqual(task.description, 'Build ghcr.io/acme/app:1 (native)');
        assert.deepStrictEqual(task.resources, [path.join(this.dir, 'docker', 'config.json'), dockerfile]);

        const result = await task.fn(makeContext(settings));
        const expected: ImageBuildResult = { imageRef: 'ghcr.io/acme/app:1', logs: '' };
        assert.deepStrictEqual(result, expected);
        assert.strictEqual(seen, 'FROM alpine\nRUN --mount=type=secret,id=TOKEN make\n');
        assert.strictEqual(await fs.readFile(dockerfile, 'utf-8'), DOCKERFILE);
        assert.deepStrictEqual(executor.commands[1], ['docker', 'push', 'ghcr.io/acme/app:1']);
    }

    @test
    async 'kaniko does not hold the docker config'(): Promise<void> {
        const builder = await newBuilder({ cwd: this.dir, executor: new FakeExecutor() });
        const task = dockerBuild(builder, { backend: 'kaniko', name: 'image', push: true, tags: ['ghcr.io/acme/app:1'] });
        assert.strictEqual(task.key, 'image');
        assert.deepStrictEqual(task.resources, []);
    }

    @test
    async 'rejects a request the backend cannot build'(): Promise<void> {
        const builder = await newBuilder({ cwd: this.dir, executor: new FakeExecutor() });
        assert.throws(() => dockerBuild(builder, { platforms: ['linux/amd64', 'linux/arm64'], tags: ['app'] }),
                      ConfigurationError);
        assert.throws(() => dockerBuild(builder, { backend: 'podman' }), ConfigurationError);
    }

    @test
    async 'mountSecrets needs a Dockerfile'(): Promise<void> {
        const settings = new SettingsStore();
        const builder = await newBuilder({ cwd: this.dir, executor: new FakeExecutor(), settings });
        const task = dockerBuild(builder, {
            dockerfile: 'missing/Dockerfile',
            mountSecrets: true,
            secrets: { TOKEN: Secret.of('test-token') },
            tags: ['app'],
        });
        await assert.rejects(async () => {
            await task.fn(makeContext(settings));
        }, /does not exist/);
        assert.strictEqual(await fs.pathExists(path.join(this.dir, 'missing')), false);
    }
}

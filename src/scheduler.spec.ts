import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    delay,
    seededRandom,
} from '../test/helpers';
import {
    CancelledError,
    CredentialRestoreError,
    CycleError,
} from './errors';
import {
    TaskGraph,
} from './graph';
import {
    Scheduler,
} from './scheduler';
import {
    SettingsStore,
} from './settings';
import {
    TaskStatus,
} from './task';
import type {
    Task,
    TaskFunction,
} from './task';
import assert = require('assert');

function task(key: string, fn: TaskFunction = () => undefined, extra: Partial<Task> = {}): Task {
    return { fn, inputs: [], key, outputs: [], ...extra };
}

function graphOf(...tasks: Task[]): TaskGraph {
    const graph = new TaskGraph();
    for (const t of tasks)
        graph.addTask(t);
    return graph;
}

function statuses(scheduler: Scheduler): Record<string, TaskStatus> {
    const result: Record<string, TaskStatus> = {};
    for (const t of scheduler.report?.tasks ?? [])
        result[t.key] = t.status;
    return result;
}

/**
 * Tests for running task graphs
 */
@suite('Scheduler')
export class SchedulerTest {
    @test
    async 'passes results to dependents'(): Promise<void> {
        let seen: unknown;
        const graph = graphOf(
            task('a', () => 41),
            task('b', ctx => {
                seen = ctx.dependencyResult('a');
            }, { deps: ['a'] }),
        );
        const report = await new Scheduler(graph, new SettingsStore(), { maxWorkers: 2 }).run();
        assert.strictEqual(seen, 41);
        assert.strictEqual(report.exitCode, 0);
    }

    @test
    async 'dependencyResult() of a task that is not a dependency'(): Promise<void> {
        const graph = graphOf(
            task('a', () => 1),
            task('b', ctx => ctx.dependencyResult('a'), { deps: ['a'] }),
            task('c', ctx => ctx.dependencyResult('a'), { deps: ['b'] }),
        );
        const scheduler = new Scheduler(graph, new SettingsStore(), { maxWorkers: 1 });
        await scheduler.run();
        assert.deepStrictEqual(statuses(scheduler), {
            a: TaskStatus.Succeeded,
            b: TaskStatus.Succeeded,
            c: TaskStatus.Failed,
        });
    }

    @test
    async 'skips dependents of a failed task'(): Promise<void> {
        const ran: string[] = [];
        const graph = graphOf(
            task('build', () => {
                throw new Error('boom');
            }),
            task('publish', () => ran.push('publish'), { deps: ['build'] }),
            task('deploy', () => ran.push('deploy'), { deps: ['publish'] }),
            task('lint', () => ran.push('lint')),
        );
        const scheduler = new Scheduler(graph, new SettingsStore(), { maxWorkers: 1 });
        const report = await scheduler.run();

        assert.deepStrictEqual(ran, ['lint']);
        assert.deepStrictEqual(statuses(scheduler), {
            build: TaskStatus.Failed,
            deploy: TaskStatus.Skipped,
            lint: TaskStatus.Succeeded,
            publish: TaskStatus.Skipped,
        });
        assert.strictEqual(report.get('build')?.error, 'task build failed: boom');
        assert.strictEqual(report.get('publish')?.skippedBecause, 'build');
        assert.strictEqual(report.get('deploy')?.skippedBecause, 'publish');
        assert.strictEqual(report.exitCode, 1);
    }

    @test
    async 'runs at most maxWorkers tasks at a time'(): Promise<void> {
        let running = 0;
        let peak = 0;
        const fn: TaskFunction = async () => {
            running++;
            peak = Math.max(peak, running);
            await delay(5);
            running--;
        };
        const graph = graphOf(...['a', 'b', 'c', 'd', 'e'].map(x => task(x, fn)));
        await new Scheduler(graph, new SettingsStore(), { maxWorkers: 2 }).run();
        assert.strictEqual(peak, 2);
    }

    @test
    async 'serializes tasks that share a resource'(): Promise<void> {
        const events: string[] = [];
        const patching = (key: string): TaskFunction => async () => {
            events.push(`${key}:start`);
            await delay(5);
            events.push(`${key}:end`);
        };
        const graph = graphOf(
            task('publish-a', patching('publish-a'), { resources: ['.cargo/credentials.toml'] }),
            task('publish-b', patching('publish-b'), { resources: ['.cargo/credentials.toml'] }),
        );
        await new Scheduler(graph, new SettingsStore(), { maxWorkers: 4 }).run();
        assert.deepStrictEqual(events, ['publish-a:start', 'publish-a:end', 'publish-b:start', 'publish-b:end']);
    }

    @test
    async 'does not run up-to-date tasks'(): Promise<void> {
        const ran: string[] = [];
        const graph = graphOf(
            task('a', () => ran.push('a'), { isUpToDate: () => true }),
            task('b', () => ran.push('b'), { deps: ['a'] }),
        );
        const report = await new Scheduler(graph, new SettingsStore()).run();
        assert.deepStrictEqual(ran, ['b']);
        assert.strictEqual(report.get('a')?.status, TaskStatus.Succeeded);
        assert.strictEqual(report.get('a')?.upToDate, true);
    }

    @test
    async 'runs only the selected targets'(): Promise<void> {
        const ran: string[] = [];
        const graph = graphOf(
            task('a', () => ran.push('a')),
            task('b', () => ran.push('b'), { deps: ['a'] }),
            task('c', () => ran.push('c')),
        );
        const report = await new Scheduler(graph, new SettingsStore(), { maxWorkers: 1 }).run(['b']);
        assert.deepStrictEqual(ran, ['a', 'b']);
        assert.deepStrictEqual(report.tasks.map(x => x.key), ['a', 'b']);
    }

    @test
    async 'runs nothing for an invalid graph'(): Promise<void> {
        const ran: string[] = [];
        const graph = graphOf(
            task('a', () => ran.push('a'), { deps: ['b'] }),
            task('b', () => ran.push('b'), { deps: ['a'] }),
            task('c', () => ran.push('c')),
        );
        await assert.rejects(new Scheduler(graph, new SettingsStore()).run(), CycleError);
        assert.deepStrictEqual(ran, []);
    }

    @test
    async 'freezes the settings'(): Promise<void> {
        const settings = new SettingsStore();
        await new Scheduler(graphOf(task('a')), settings).run();
        assert.strictEqual(settings.frozen, true);
    }

    @test
    async 'stops starting tasks when cancelled'(): Promise<void> {
        const controller = new AbortController();
        const ran: string[] = [];
        const graph = graphOf(
            task('a', () => {
                ran.push('a');
                controller.abort();
            }),
            task('b', () => ran.push('b'), { deps: ['a'] }),
        );
        const scheduler = new Scheduler(graph, new SettingsStore(), { maxWorkers: 1, signal: controller.signal });
        const report = await scheduler.run();

        assert.deepStrictEqual(ran, ['a']);
        assert.deepStrictEqual(statuses(scheduler), { a: TaskStatus.Succeeded, b: TaskStatus.Cancelled });
        assert.strictEqual(report.cancelled, true);
        assert.strictEqual(report.exitCode, 1);
    }

    @test
    async 'running tasks see the cancellation'(): Promise<void> {
        const controller = new AbortController();
        const graph = graphOf(
            task('wait', ctx => new Promise((_resolve, reject) => {
                ctx.signal.addEventListener('abort', () => reject(new CancelledError()), { once: true });
            })),
            task('cancel', async () => {
                await delay(5);
                controller.abort();
            }),
        );
        const scheduler = new Scheduler(graph, new SettingsStore(), { maxWorkers: 2, signal: controller.signal });
        await scheduler.run();
        assert.deepStrictEqual(statuses(scheduler), { cancel: TaskStatus.Succeeded, wait: TaskStatus.Cancelled });
    }

    @test
    async 'aborts the run when credentials cannot be restored'(): Promise<void> {
        const ran: string[] = [];
        const graph = graphOf(
            task('publish', () => {
                throw new CredentialRestoreError('poetry.toml', new Error('read-only file system'));
            }),
            task('lint', () => ran.push('lint')),
        );
        const scheduler = new Scheduler(graph, new SettingsStore(), { maxWorkers: 1 });
        await assert.rejects(scheduler.run(), CredentialRestoreError);

        assert.deepStrictEqual(ran, []);
        assert.deepStrictEqual(statuses(scheduler), { lint: TaskStatus.Cancelled, publish: TaskStatus.Failed });
        assert.strictEqual(scheduler.report?.cancelled, false);
        assert.ok(scheduler.report?.aborted instanceof CredentialRestoreError);
    }

    @test
    async 'can only run once'(): Promise<void> {
        const scheduler = new Scheduler(graphOf(task('a')), new SettingsStore());
        await scheduler.run();
        await assert.rejects(scheduler.run(), /can only run once/);
    }

    @test
    async 'random graphs run each task once after its dependencies'(): Promise<void> {
        const random = seededRandom(7);
        for (let round = 0; round < 10; round++) {
            const finished = new Set<string>();
            const started: string[] = [];
            const tasks: Task[] = [];
            const size = 4 + Math.floor(random() * 12);
            for (let i = 0; i < size; i++) {
                const key = `t${i}`;
                const deps = tasks.filter(() => random() < 0.25).map(x => x.key);
                const wait = Math.floor(random() * 3);
                tasks.push(task(key, async () => {
                    for (const dep of deps)
                        assert.ok(finished.has(dep), `${key} started before ${dep} finished`);
                    started.push(key);
                    await delay(wait);
                    finished.add(key);
                }, { deps }));
            }
            const shuffled = [...tasks].sort(() => random() - 0.5);
            const report = await new Scheduler(graphOf(...shuffled), new SettingsStore(), { maxWorkers: 3 }).run();

            assert.strictEqual(report.exitCode, 0);
            assert.strictEqual(started.length, size);
            assert.strictEqual(new Set(started).size, size);
        }
    }
}

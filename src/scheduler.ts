/**
 * @module
 * Runs the tasks of a graph in dependency order.
 */
import {
    CancelledError,
    CredentialRestoreError,
    TaskExecutionError,
    describeError,
} from './errors';
import {
    Database,
} from './db';
import {
    TaskGraph,
} from './graph';
import {
    childLogger,
} from './logger';
import type {
    Logger,
} from './logger';
import type {
    Progress,
} from './progress';
import {
    RunReport,
    TaskReport,
} from './report';
import {
    SettingsStore,
} from './settings';
import {
    TaskStatus,
} from './task';
import type {
    Task,
    TaskContext,
} from './task';
import os = require('os');
import path = require('path');

/**
 * Options for {@link Scheduler}.
 */
export interface SchedulerOptions {
    /**
     * Maximum number of tasks that can be run concurrently at any time.
     * Default: number of CPU cores in the system.
     */
    maxWorkers?: number;
    /** Used to skip tasks whose files did not change since their last successful run. */
    database?: Database;
    /** Stops starting tasks when aborted; running tasks see the abort through {@link TaskContext#signal}. */
    signal?: AbortSignal;
    progress?: Progress;
    logger?: Logger;
}

interface TaskState {
    task: Task;
    status: TaskStatus;
    /** Resolved paths of the task's resources. */
    resources: string[];
    output: Buffer[];
    durationMs: number;
    upToDate: boolean;
    result?: unknown;
    error?: unknown;
    skippedBecause?: string;
}

interface SuccessWorkerResult {
    status: 'success';
    state: TaskState;
    result: unknown;
    upToDate: boolean;
}

interface FailureWorkerResult {
    status: 'failure';
    state: TaskState;
    error: unknown;
}

type WorkerResult = SuccessWorkerResult | FailureWorkerResult;

/** Dependency statuses that cause a pending task to be skipped. */
const BLOCKING_STATUSES = new Set([TaskStatus.Failed, TaskStatus.Skipped]);

/**
 * Runs each selected task of a graph exactly once.
 *
 * A task starts once all its dependencies succeeded and no running task holds one of its resources. Among the
 * tasks that can start, graph insertion order decides. A failing task causes its dependents to be skipped,
 * other tasks are unaffected. A {@link CredentialRestoreError} aborts the run.
 */
export class Scheduler {
    private readonly graph: TaskGraph;
    private readonly settings: SettingsStore;
    private readonly maxWorkers: number;
    private readonly database?: Database;
    private readonly progress?: Progress;
    private readonly log: Logger;
    private readonly externalSignal?: AbortSignal;
    private readonly controller: AbortController;
    private readonly states: Map<string, TaskState>;
    private readonly workers: Map<TaskState, Promise<WorkerResult>>;
    /** Resource path -> key of the running task holding it. */
    private readonly heldResources: Map<string, string>;
    private fatal?: CredentialRestoreError;
    private numFinished: number;
    private lastReport?: RunReport;

    constructor(graph: TaskGraph, settings: SettingsStore, options: SchedulerOptions = {}) {
        this.graph = graph;
        this.settings = settings;
        this.maxWorkers = Math.max(1, options.maxWorkers || os.cpus().length);
        this.database = options.database;
        this.progress = options.progress;
        this.log = options.logger ?? childLogger('scheduler');
        this.externalSignal = options.signal;
        this.controller = new AbortController();
        this.states = new Map();
        this.workers = new Map();
        this.heldResources = new Map();
        this.numFinished = 0;
    }

    /**
     * Report of the last run, also available when the run threw.
     */
    get report(): RunReport | undefined {
        return this.lastReport;
    }

    /**
     * Runs the given targets and their dependencies, or the whole graph.
     *
     * @throws CycleError, UnresolvedDependencyError if the graph is invalid; nothing runs in that case.
     * @throws CredentialRestoreError if a credential patch could not be reverted.
     */
    async run(targets?: string[]): Promise<RunReport> {
        if (this.states.size)
            throw new Error('a scheduler can only run once');
        this.graph.validate();
        for (const task of this.graph.select(targets)) {
            this.states.set(task.key, {
                durationMs: 0,
                output: [],
                resources: (task.resources ?? []).map(x => path.resolve(x)),
                status: TaskStatus.Pending,
                task,
                upToDate: false,
            });
        }
        this.settings.freeze();

        const onAbort = () => this.controller.abort(this.externalSignal?.reason);
        if (this.externalSignal?.aborted)
            onAbort();
        else
            this.externalSignal?.addEventListener('abort', onAbort, { once: true });

        try {
            while (true) {
                this.skipBlockedTasks();
                if (!this.stopping)
                    this.fillUpWorkers();
                if (!this.workers.size)
                    break;
                const result = await Promise.race(this.workers.values());
                this.workers.delete(result.state);
                this.finishTask(result);
            }
        } finally {
            this.externalSignal?.removeEventListener('abort', onAbort);
        }

        for (const state of this.states.values()) {
            if (state.status === TaskStatus.Pending)
                state.status = TaskStatus.Cancelled;
        }
        if (this.database)
            await this.database.commit();

        this.lastReport = this.buildReport();
        if (this.fatal)
            throw this.fatal;
        return this.lastReport;
    }

    private get stopping(): boolean {
        return this.fatal !== undefined || this.controller.signal.aborted;
    }

    /**
     * Marks pending tasks with a failed or skipped dependency as skipped, transitively.
     */
    private skipBlockedTasks(): void {
        let changed = true;
        while (changed) {
            changed = false;
            for (const state of this.states.values()) {
                if (state.status !== TaskStatus.Pending)
                    continue;
                const blocker = this.graph.dependencies(state.task.key)
                    .find(x => BLOCKING_STATUSES.has(this.getState(x).status));
                if (blocker === undefined)
                    continue;
                state.status = TaskStatus.Skipped;
                state.skippedBecause = blocker;
                this.numFinished++;
                changed = true;
                this.log.info({ task: state.task.key, dependency: blocker }, 'skipping task');
            }
        }
    }

    /**
     * Add as many workers as we can.
     */
    private fillUpWorkers(): void {
        for (const state of this.states.values()) {
            if (this.workers.size >= this.maxWorkers)
                break;
            if (!this.isRunnable(state))
                continue;
            state.status = TaskStatus.Running;
            for (const resource of state.resources)
                this.heldResources.set(resource, state.task.key);
            this.workers.set(state, this.runTask(state));
        }
    }

    private isRunnable(state: TaskState): boolean {
        if (state.status !== TaskStatus.Pending)
            return false;
        for (const dep of this.graph.dependencies(state.task.key)) {
            if (this.getState(dep).status !== TaskStatus.Succeeded)
                return false;
        }
        return state.resources.every(x => !this.heldResources.has(x));
    }

    private getState(key: string): TaskState {
        const state = this.states.get(key);
        if (!state)
            throw new Error(`task ${key} is not part of this run, this should not happen`);
        return state;
    }

    private async runTask(state: TaskState): Promise<WorkerResult> {
        const task = state.task;
        const started = Date.now();
        try {
            const upToDate = task.isUpToDate ?
                await task.isUpToDate({ key: task.key, settings: this.settings }) :
                (this.database ? await this.database.isUpToDate(task) : false);
            if (upToDate)
                return { result: this.database?.recordedResult(task.key), state, status: 'success', upToDate: true };

            this.log.info({ task: task.key }, 'running task');
            const ctx: TaskContext = {
                dependencyResult: key => this.dependencyResult(task, key),
                key: task.key,
                logger: this.log.child({ task: task.key }),
                output: state.output,
                settings: this.settings,
                signal: this.controller.signal,
            };
            const result = await task.fn(ctx);
            if (this.database && (task.outputs.length || task.isUpToDate))
                await this.database.recordSuccess(task, result);
            return { result, state, status: 'success', upToDate: false };
        } catch (error) {
            return { error, state, status: 'failure' };
        } finally {
            state.durationMs = Date.now() - started;
        }
    }

    private dependencyResult(task: Task, key: string): unknown {
        if (!this.graph.dependencies(task.key).includes(key))
            throw new Error(`${key} is not a dependency of ${task.key}`);
        const state = this.getState(key);
        if (state.status !== TaskStatus.Succeeded)
            throw new Error(`dependency ${key} of ${task.key} did not succeed`);
        return state.result;
    }

    private finishTask(result: WorkerResult): void {
        const state = result.state;
        for (const resource of state.resources)
            this.heldResources.delete(resource);
        this.numFinished++;

        if (result.status === 'success') {
            state.status = TaskStatus.Succeeded;
            state.result = result.result;
            state.upToDate = result.upToDate;
        } else if (result.error instanceof CredentialRestoreError) {
            state.status = TaskStatus.Failed;
            state.error = result.error;
            if (!this.fatal) {
                this.fatal = result.error;
                this.log.fatal({ task: state.task.key, file: result.error.path }, 'aborting run: %s', result.error.message);
                this.controller.abort(result.error);
            }
        } else if (this.controller.signal.aborted && isAbort(result.error)) {
            state.status = TaskStatus.Cancelled;
            state.error = result.error;
        } else {
            state.status = TaskStatus.Failed;
            state.error = result.error instanceof TaskExecutionError ? result.error :
                new TaskExecutionError(`task ${state.task.key} failed: ${describeError(result.error)}`, {
                    cause: result.error,
                });
            this.log.error({ task: state.task.key }, describeError(state.error));
        }
        if (state.status !== TaskStatus.Succeeded && this.database)
            this.database.invalidate(state.task.key);

        this.printResult(state);
    }

    private printResult(state: TaskState): void {
        if (!this.progress)
            return;
        for (const output of state.output)
            this.progress.write(output);
        if (state.status === TaskStatus.Failed)
            this.progress.write(`${describeError(state.error)}\n`);
        const description = state.task.description || state.task.key;
        this.progress.status = `[${this.numFinished}/${this.states.size}] ${description}`;
        this.progress.render();
    }

    private buildReport(): RunReport {
        const tasks: TaskReport[] = [];
        for (const state of this.states.values()) {
            tasks.push({
                description: state.task.description || state.task.key,
                durationMs: state.durationMs,
                error: state.status === TaskStatus.Failed ? describeError(state.error) : undefined,
                key: state.task.key,
                output: Buffer.concat(state.output).toString(),
                skippedBecause: state.skippedBecause,
                status: state.status,
                upToDate: state.upToDate,
            });
        }
        return new RunReport(tasks, this.controller.signal.aborted && !this.fatal, this.fatal);
    }
}

function isAbort(error: unknown): boolean {
    return error instanceof CancelledError || (error instanceof Error && error.name === 'AbortError');
}

import type {
    Logger,
} from './logger';
import type {
    SettingsStore,
} from './settings';

/**
 * Context that will be passed to the task function during execution.
 */
export interface TaskContext {
    /** Key of the running task. */
    readonly key: string;
    /** Task output */
    readonly output: Buffer[];
    /** Aborted when the run is cancelled. */
    readonly signal: AbortSignal;
    /** Settings of the build session. Frozen while the task runs. */
    readonly settings: SettingsStore;
    readonly logger: Logger;
    /**
     * Returns the value returned by the function of a dependency.
     * Throws if `key` is not a succeeded dependency of this task.
     */
    dependencyResult(key: string): unknown;
}

/**
 * Function that runs a task. The value it returns is made available to dependent tasks.
 */
export type TaskFunction = (ctx: TaskContext) => (Promise<unknown> | unknown);

/**
 * Context passed to {@link Task#isUpToDate}.
 */
export interface UpToDateContext {
    readonly key: string;
    readonly settings: SettingsStore;
}

/**
 * Represents a task.
 */
export interface Task {
    /** Task key. Unique within a graph. */
    key: string;
    /** Keys of tasks (or declared external artifacts) that must succeed before this task runs. */
    deps?: string[];
    /** Task inputs. */
    inputs: string[];
    /** Task function. */
    fn: TaskFunction;
    /** Task outputs. */
    outputs: string[];
    /**
     * Configuration files the task patches while it runs. Tasks sharing a resource never run at the same time.
     */
    resources?: string[];
    /** Task description. Default: the task key. */
    description?: string;
    /**
     * Returns true if the task's outputs are current and it need not run. When absent, the build database
     * decides from the recorded input and output files.
     */
    isUpToDate?: (ctx: UpToDateContext) => (Promise<boolean> | boolean);
}

/**
 * Execution status of a task.
 */
export enum TaskStatus {
    Pending = 'pending',
    Running = 'running',
    Succeeded = 'succeeded',
    Failed = 'failed',
    Skipped = 'skipped',
    Cancelled = 'cancelled',
}

/**
 * Returns true if a task in `status` will not change status again.
 */
export function isTerminal(status: TaskStatus): boolean {
    return status !== TaskStatus.Pending && status !== TaskStatus.Running;
}

/**
 * @module
 * Outcome of a build run.
 */
import {
    TaskStatus,
} from './task';

/**
 * Final state of one task.
 */
export interface TaskReport {
    key: string;
    description: string;
    status: TaskStatus;
    /** Time spent running, 0 for tasks that never started. */
    durationMs: number;
    /** Captured output of the task. */
    output: string;
    /** Printable error, for failed tasks. */
    error?: string;
    /** True if the task succeeded without running because its outputs were current. */
    upToDate: boolean;
    /** Key of the dependency that caused the task to be skipped. */
    skippedBecause?: string;
}

/**
 * Report of a build run: one entry per selected task, in graph order.
 */
export class RunReport {
    readonly tasks: readonly TaskReport[];
    /** True if the run was cancelled before all tasks finished. */
    readonly cancelled: boolean;
    /** Set if the run was aborted by a fatal error. */
    readonly aborted?: Error;

    constructor(tasks: TaskReport[], cancelled = false, aborted?: Error) {
        this.tasks = tasks;
        this.cancelled = cancelled;
        this.aborted = aborted;
    }

    get(key: string): TaskReport | undefined {
        return this.tasks.find(x => x.key === key);
    }

    /** Tasks that ended {@link TaskStatus.Failed}. */
    get failures(): TaskReport[] {
        return this.tasks.filter(x => x.status === TaskStatus.Failed);
    }

    get succeeded(): boolean {
        return !this.failures.length && !this.cancelled && !this.aborted;
    }

    /** Process exit code for the run. */
    get exitCode(): number {
        return this.succeeded ? 0 : 1;
    }

    /**
     * One line per task.
     */
    summaryLines(): string[] {
        return this.tasks.map(x => {
            let line = `${x.status.padEnd(9)} ${x.key}`;
            if (x.upToDate)
                line += ' (up to date)';
            else if (x.skippedBecause)
                line += ` (dependency ${x.skippedBecause} did not succeed)`;
            else if (x.status !== TaskStatus.Skipped && x.status !== TaskStatus.Cancelled)
                line += ` [${formatDuration(x.durationMs)}]`;
            return line;
        });
    }

    /**
     * One line per failed task, followed by the fatal error if the run was aborted.
     */
    failureLines(): string[] {
        const lines = this.failures.map(x => `${x.key}: ${x.error ?? 'failed'}`);
        if (this.aborted)
            lines.push(`aborted: ${this.aborted.message}`);
        return lines;
    }
}

export function formatDuration(ms: number): string {
    if (ms < 1000)
        return `${ms}ms`;
    return `${(ms / 1000).toFixed(1)}s`;
}

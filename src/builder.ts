/**
 * @module
 * Build session: settings, task graph and the collaborators tasks run with.
 */
import {
    CommandTask,
    commandTaskToTask,
    isCommandTask,
} from './cmdtask';
import {
    Database,
    readDatabase,
} from './db';
import {
    BackendExecutor,
    ProcessExecutor,
} from './executor';
import {
    TaskGraph,
} from './graph';
import {
    CredentialInjector,
} from './inject/injector';
import {
    childLogger,
} from './logger';
import type {
    Logger,
} from './logger';
import {
    Progress,
    createProgress,
    printReport,
} from './progress';
import {
    RunReport,
} from './report';
import {
    Scheduler,
} from './scheduler';
import {
    SettingsStore,
} from './settings';
import {
    Task,
} from './task';
import fs = require('fs-extra');
import path = require('path');

/**
 * Options for {@link newBuilder}.
 */
export interface BuilderOptions {
    /** Build database file. Default: `.hoistbuild.json` in `cwd`. */
    dbFilename?: string;
    /** Settings to use. Default: an empty store. */
    settings?: SettingsStore;
    /** Runs the commands of command tasks and ecosystem tasks. Default: {@link ProcessExecutor}. */
    executor?: BackendExecutor;
    /** Project directory. Default: the current directory. */
    cwd?: string;
    /**
     * Maximum number of file descriptors that can be consumed concurrently at any time during filesystem scanning.
     * Default: `100`.
     */
    maxFds?: number;
    logger?: Logger;
}

/**
 * Options for {@link Builder#run}
 */
export interface RunOptions {
    /**
     * Maximum number of tasks that can be run concurrently at any time.
     * Default: number of CPU cores in the system.
     */
    maxWorkers?: number;

    /**
     * If provided, only these tasks (and their dependencies) will be run.
     */
    targets?: string[];

    /** Cancels the run when aborted. */
    signal?: AbortSignal;

    /** Where progress and the summary are printed. `false` disables printing. Default: stdout. */
    progress?: Progress | false;
}

/**
 * Represents a build to be done.
 */
export interface Builder {
    readonly settings: SettingsStore;
    readonly graph: TaskGraph;
    readonly injector: CredentialInjector;
    readonly executor: BackendExecutor;
    readonly cwd: string;
    readonly logger: Logger;
    /** Add a task to the build. Relative inputs, outputs and resources are resolved against `cwd`. */
    addTask(task: Task | CommandTask): Task;
    /** Declare a file or artifact that is not produced by a task. */
    addArtifact(id: string): void;
    /**
     * Run the build.
     *
     * @throws CycleError, UnresolvedDependencyError if the task graph is invalid.
     * @throws CredentialRestoreError if a configuration file could not be restored; the summary is printed first.
     */
    run(options?: RunOptions): Promise<RunReport>;
}

class BuilderImpl implements Builder {
    readonly settings: SettingsStore;
    readonly graph: TaskGraph;
    readonly injector: CredentialInjector;
    readonly executor: BackendExecutor;
    readonly cwd: string;
    readonly logger: Logger;
    private readonly db: Database;

    constructor(db: Database, options: BuilderOptions) {
        this.db = db;
        this.settings = options.settings ?? new SettingsStore();
        this.graph = new TaskGraph();
        this.logger = options.logger ?? childLogger('builder');
        this.injector = new CredentialInjector(this.settings, this.logger.child({ component: 'inject' }));
        this.executor = options.executor ?? new ProcessExecutor();
        this.cwd = path.resolve(options.cwd ?? process.cwd());
    }

    addTask(task: Task | CommandTask): Task {
        const converted = isCommandTask(task) ?
            commandTaskToTask({ ...task, cwd: task.cwd ?? this.cwd }, this.executor) :
            task;
        // Relative file paths are relative to the build directory, not the process.
        const added: Task = {
            ...converted,
            inputs: converted.inputs.map(x => path.resolve(this.cwd, x)),
            outputs: converted.outputs.map(x => path.resolve(this.cwd, x)),
            resources: converted.resources?.map(x => path.resolve(this.cwd, x)),
        };
        this.graph.addTask(added);
        return added;
    }

    addArtifact(id: string): void {
        this.graph.addArtifact(id);
    }

    async run(options: RunOptions = {}): Promise<RunReport> {
        const progress = options.progress === undefined ? createProgress() : (options.progress || undefined);
        const scheduler = new Scheduler(this.graph, this.settings, {
            database: this.db,
            logger: this.logger.child({ component: 'scheduler' }),
            maxWorkers: options.maxWorkers,
            progress,
            signal: options.signal,
        });
        try {
            return await scheduler.run(options.targets);
        } finally {
            if (progress) {
                progress.unrender();
                if (scheduler.report)
                    printReport(progress, scheduler.report);
            }
        }
    }
}

/**
 * Construct a new build context.
 */
export async function newBuilder(options: BuilderOptions = {}): Promise<Builder> {
    const dbFilename = path.resolve(options.cwd ?? process.cwd(), options.dbFilename ?? '.hoistbuild.json');
    const db = (await fs.pathExists(dbFilename)) ?
        (await readDatabase(dbFilename, options.maxFds)) :
        new Database(undefined, dbFilename, options.maxFds);
    return new BuilderImpl(db, options);
}

/**
 * @module
 * Shared options of the ecosystem task factories.
 */
import type {
    Builder,
} from './builder';
import {
    runCommand,
} from './cmdtask';
import type {
    ExecResult,
} from './executor';
import type {
    Secret,
} from './secret';
import type {
    TaskContext,
} from './task';
import path = require('path');

/**
 * Options accepted by every ecosystem task factory.
 */
export interface EcosystemTaskOptions {
    /** Task key. Each factory has its own default. */
    name?: string;
    /** Additional dependencies. */
    deps?: string[];
    /** Input files, relative to the project directory. */
    inputs?: string[];
    /** Output files, relative to the project directory. */
    outputs?: string[];
    /** Project directory, relative to the builder's directory. */
    cwd?: string;
    /** Environment variables for the tool. */
    env?: Record<string, string>;
    description?: string;
}

/**
 * Absolute project directory of a task.
 */
export function projectDir(builder: Builder, options: EcosystemTaskOptions): string {
    return path.resolve(builder.cwd, options.cwd ?? '.');
}

/**
 * Absolute paths of `files`, resolved against the project directory of a task.
 */
export function projectFiles(builder: Builder, options: EcosystemTaskOptions, files: string[] = []): string[] {
    const dir = projectDir(builder, options);
    return files.map(x => path.resolve(dir, x));
}

/**
 * Runs a tool in the project directory of a task.
 */
export function runTool(
    builder: Builder,
    ctx: TaskContext,
    command: string[],
    options: EcosystemTaskOptions,
    extra: { env?: Record<string, string>; secrets?: Secret[] } = {},
): Promise<ExecResult> {
    return runCommand(builder.executor, command, { ...options.env, ...extra.env }, projectDir(builder, options), ctx,
                      extra.secrets);
}

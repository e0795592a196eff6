/**
 * @module
 * Implements Tasks that runs commands.
 */
import {
    TaskExecutionError,
} from './errors';
import {
    BackendExecutor,
    ExecResult,
    ProcessExecutor,
    maskCommand,
} from './executor';
import {
    Secret,
    maskSecrets,
} from './secret';
import type {
    Task,
    TaskContext,
} from './task';
import crypto = require('crypto');

/**
 * Represents a task that runs a command.
 */
export interface CommandTask {
    /** Task key. Default: a hash of the command. */
    key?: string;
    deps?: string[];
    inputs: string[];
    command: string[];
    outputs: string[];
    /** Environment variables set for the command. */
    env?: Record<string, string>;
    /** Working directory. Default: the current directory. */
    cwd?: string;
    /** Values masked in the description and in error messages. */
    secrets?: Secret[];
    description?: string;
}

/**
 * Converts a command task into a task.
 */
export function commandTaskToTask(commandTask: CommandTask, executor: BackendExecutor = new ProcessExecutor()): Task {
    const command = commandTask.command;
    const hash = crypto.createHash('md5');
    hash.update(JSON.stringify(command));

    return {
        deps: commandTask.deps,
        description: commandTask.description || maskCommand(command, commandTask.secrets),
        fn: async ctx => {
            const result = await runCommand(executor, command, commandTask.env ?? {}, commandTask.cwd ?? process.cwd(),
                                            ctx, commandTask.secrets);
            return result.stdout;
        },
        inputs: commandTask.inputs,
        key: commandTask.key ?? hash.digest('hex'),
        outputs: commandTask.outputs,
    };
}

/**
 * Runs `command` for a task, appending its output to the task output.
 * Throws {@link TaskExecutionError} carrying the captured stderr if the command exits with a nonzero code.
 */
export async function runCommand(
    executor: BackendExecutor,
    command: string[],
    env: Record<string, string>,
    cwd: string,
    ctx: TaskContext,
    secrets: Iterable<Secret> = [],
    input?: string,
): Promise<ExecResult> {
    const safeSecrets = [...secrets];
    ctx.logger.info({ cwd }, `$ ${maskCommand(command, safeSecrets)}`);
    const result = await executor.execute(command, env, cwd, {
        input,
        signal: ctx.signal,
    });
    const stdout = maskSecrets(result.stdout, safeSecrets);
    const stderr = maskSecrets(result.stderr, safeSecrets);
    if (stdout)
        ctx.output.push(Buffer.from(stdout));
    if (stderr)
        ctx.output.push(Buffer.from(stderr));
    if (result.exitCode !== 0) {
        throw new TaskExecutionError(`${maskCommand(command, safeSecrets)} exited with code ${result.exitCode}`, {
            exitCode: result.exitCode,
            stderr,
        });
    }
    return { exitCode: result.exitCode, stderr, stdout };
}

export function isCommandTask(x: Task | CommandTask): x is CommandTask {
    return 'command' in x && Array.isArray(x.command);
}

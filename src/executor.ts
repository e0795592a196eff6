/**
 * @module
 * Runs external programs on behalf of tasks.
 */
import {
    Secret,
    maskSecrets,
} from './secret';
import childProcess = require('child_process');

/**
 * Outcome of an executed command.
 */
export interface ExecResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

/**
 * Options for {@link BackendExecutor#execute}.
 */
export interface ExecOptions {
    /** Kills the process when aborted. */
    signal?: AbortSignal;
    /** Written to the process' stdin, which is closed afterwards. */
    input?: string;
}

/**
 * Runs a resolved command. Implementations never throw for a nonzero exit code; they return it.
 */
export interface BackendExecutor {
    execute(command: string[], env: Record<string, string>, workingDir: string, options?: ExecOptions): Promise<ExecResult>;
}

/**
 * Executes commands as child processes. `env` is merged over the current process environment.
 */
export class ProcessExecutor implements BackendExecutor {
    execute(
        command: string[],
        env: Record<string, string>,
        workingDir: string,
        options: ExecOptions = {},
    ): Promise<ExecResult> {
        return new Promise<ExecResult>((resolve, reject) => {
            if (!command.length)
                return reject(new Error('empty command'));
            const stdout: Buffer[] = [];
            const stderr: Buffer[] = [];
            const cp = childProcess.spawn(command[0], command.slice(1), {
                cwd: workingDir,
                env: { ...process.env, ...env },
                signal: options.signal,
                stdio: [options.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
            });
            cp.on('error', e => {
                reject(e);
            });
            cp.on('close', (code, signal) => {
                resolve({
                    exitCode: code ?? (signal ? 128 : 1),
                    stderr: Buffer.concat(stderr).toString(),
                    stdout: Buffer.concat(stdout).toString(),
                });
            });
            const collect = (into: Buffer[]) => (chunk: string | Buffer) => {
                into.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
            };
            cp.stdout?.on('data', collect(stdout));
            cp.stderr?.on('data', collect(stderr));
            if (options.input !== undefined) {
                // A child may exit without reading its input; its exit code reports the outcome.
                cp.stdin?.on('error', e => {
                    if (!isBrokenPipe(e))
                        reject(e);
                });
                cp.stdin?.end(options.input);
            }
        });
    }
}

function isBrokenPipe(e: Error): boolean {
    return 'code' in e && (e.code === 'EPIPE' || e.code === 'ECONNRESET');
}

/**
 * Returns a shell-like rendering of `command` with secret values masked, for logs and descriptions.
 */
export function maskCommand(command: string[], secrets: Iterable<Secret> = []): string {
    return maskSecrets(command.map(quote).join(' '), secrets);
}

/**
 * Return a shell-escaped version of `x`
 */
export function quote(x: string): string {
    if (!x.length)
        return '\'\'';
    else if (!/[^\w@%+=:,./-]/.test(x))
        return x;

    const y = x.replace(/'/g, `'"'"'`);
    return `'${y}'`;
}

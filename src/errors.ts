/**
 * @module
 * Error types raised while declaring and running a build.
 */

/**
 * Base class of all errors raised by hoistbuild.
 */
export class HoistError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Bad registry, auth or task declaration. Raised while the build graph is constructed.
 */
export class ConfigurationError extends HoistError {}

/**
 * A registry, task or target that was asked for by name does not exist.
 */
export class NotFoundError extends HoistError {
    readonly kind: string;
    readonly key: string;

    constructor(kind: string, key: string) {
        super(`${kind} ${JSON.stringify(key)} not found`);
        this.kind = kind;
        this.key = key;
    }
}

/**
 * A second credential patch was requested for a file that is already patched.
 */
export class PatchConflictError extends ConfigurationError {
    readonly path: string;

    constructor(path: string) {
        super(`${path} is already patched by another task`);
        this.path = path;
    }
}

export class DuplicateTaskError extends ConfigurationError {
    readonly key: string;

    constructor(key: string) {
        super(`task ${JSON.stringify(key)} already exists`);
        this.key = key;
    }
}

/**
 * The task graph contains a cycle. `cycle` lists the task keys in dependency order,
 * with the first key repeated at the end.
 */
export class CycleError extends HoistError {
    readonly cycle: string[];

    constructor(cycle: string[]) {
        super(`circular dependency detected: ${cycle.join(' -> ')}`);
        this.cycle = cycle;
    }
}

export class UnresolvedDependencyError extends HoistError {
    readonly key: string;
    readonly dependency: string;

    constructor(key: string, dependency: string) {
        super(`task ${JSON.stringify(key)} depends on unknown task or artifact ${JSON.stringify(dependency)}`);
        this.key = key;
        this.dependency = dependency;
    }
}

/**
 * A task runner threw or a command it ran exited with a nonzero code.
 */
export class TaskExecutionError extends HoistError {
    readonly exitCode?: number;
    readonly stderr: string;

    constructor(message: string, options?: { exitCode?: number; stderr?: string; cause?: unknown }) {
        super(message, options && 'cause' in options ? { cause: options.cause } : undefined);
        this.exitCode = options?.exitCode;
        this.stderr = options?.stderr ?? '';
    }
}

/**
 * An image build backend failed.
 */
export class BuildError extends TaskExecutionError {}

/**
 * A credential patch could not be reverted. Secrets may be left on disk, so the run is aborted.
 */
export class CredentialRestoreError extends HoistError {
    readonly path: string;
    /** Error thrown by the patched body, if any. */
    readonly bodyError?: unknown;

    constructor(path: string, cause: unknown, bodyError?: unknown) {
        super(`failed to restore ${path}, credentials may be left on disk`, { cause });
        this.path = path;
        this.bodyError = bodyError;
    }
}

export class CancelledError extends HoistError {
    constructor(message = 'build cancelled') {
        super(message);
    }
}

/**
 * Returns a printable description of `error`.
 */
export function describeError(error: unknown): string {
    if (error instanceof TaskExecutionError && error.stderr)
        return `${error.message}\n${error.stderr}`;
    if (error instanceof Error)
        return error.message;
    return String(error);
}

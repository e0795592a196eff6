/**
 * @module
 * The image build capability shared by the Docker backends.
 */
import {
    runCommand,
} from '../cmdtask';
import {
    BuildError,
    TaskExecutionError,
} from '../errors';
import type {
    BackendExecutor,
    ExecResult,
} from '../executor';
import {
    dockerConfigFormat,
} from '../inject/formats';
import type {
    CredentialInjector,
} from '../inject/injector';
import type {
    Secret,
} from '../secret';
import type {
    Registry,
    SettingsStore,
} from '../settings';
import type {
    TaskContext,
} from '../task';
import {
    imageHost,
} from './util';
import os = require('os');
import path = require('path');

/**
 * Names of the image build backends.
 */
export type BackendKind = 'native' | 'buildx' | 'kaniko';

export const BACKEND_KINDS: readonly BackendKind[] = ['native', 'buildx', 'kaniko'];

/**
 * What to build.
 */
export interface ImageBuildRequest {
    /** Build context directory. */
    context: string;
    /** Default: `Dockerfile` in the build context. */
    dockerfile?: string;
    tags: string[];
    buildArgs?: Record<string, string>;
    /** Build secrets, by id. */
    secrets?: Record<string, Secret>;
    /** Push the tags after building. */
    push?: boolean;
    /**
     * Registries to authenticate against, by name or value.
     * Default: the Docker registries whose host matches a tag or the cache repository.
     */
    registries?: (Registry | string)[];
    platforms?: string[];
    /** Repository used as a layer cache. */
    cacheRepo?: string;
    /** Default: `true`. */
    cache?: boolean;
    /** Build stage to build. */
    target?: string;
    squash?: boolean;
    /** Write the image as a tarball to this file. */
    imageOutputFile?: string;
    /** Load the image into the local Docker daemon. */
    load?: boolean;
}

/**
 * Collaborators of a build, provided by the task running it.
 */
export interface BuildScope {
    readonly ctx: TaskContext;
    readonly executor: BackendExecutor;
    readonly injector: CredentialInjector;
    /** Docker `config.json` patched with registry credentials while pushing. */
    readonly dockerConfigFile: string;
    /** Directory relative paths of the request are resolved against. */
    readonly cwd: string;
}

export interface ImageBuildResult {
    /** First tag, or the image ID or tarball when there are no tags. */
    imageRef: string;
    /** Captured output of the backend commands. */
    logs: string;
}

/**
 * Builds container images. Implementations differ in how they pass secrets and registry auth and in the
 * outputs they support; the request is the same for all of them.
 */
export interface ImageBuilder {
    readonly kind: BackendKind;
    /**
     * Returns the request with the backend's defaults applied.
     *
     * @throws ConfigurationError if the backend cannot build the request.
     */
    validate(request: ImageBuildRequest): ImageBuildRequest;
    /**
     * @throws BuildError if a backend command fails.
     */
    build(request: ImageBuildRequest, scope: BuildScope): Promise<ImageBuildResult>;
}

/**
 * Default location of the Docker `config.json`.
 */
export function defaultDockerConfigFile(env: NodeJS.ProcessEnv = process.env): string {
    const dir = env.DOCKER_CONFIG || path.join(os.homedir(), '.docker');
    return path.join(dir, 'config.json');
}

/**
 * Registries whose credentials a build needs.
 */
export function authRegistries(request: ImageBuildRequest, settings: SettingsStore): Registry[] {
    if (request.registries)
        return request.registries.map(x => typeof x === 'string' ? settings.resolve(x) : x);
    const hosts = new Set(request.tags.map(imageHost));
    if (request.cacheRepo)
        hosts.add(imageHost(request.cacheRepo));
    return settings.registries('docker').filter(x => hosts.has(x.host));
}

/**
 * Values to mask in the output of a build.
 */
export function buildSecrets(request: ImageBuildRequest, registries: Registry[], settings: SettingsStore): Secret[] {
    const secrets = Object.values(request.secrets ?? {});
    for (const registry of registries) {
        const credentials = settings.credentialsFor(registry);
        if (credentials)
            secrets.push(credentials.secret);
    }
    return secrets;
}

/**
 * Runs `body` with the credentials of `registries` in the Docker config file of the scope. Registries without
 * credentials are left out; if none remain the file is not touched.
 */
export async function withPushAuth<T>(
    scope: BuildScope,
    registries: Registry[],
    body: () => Promise<T>,
): Promise<T> {
    const settings = scope.ctx.settings;
    const withCredentials = registries.filter(x => settings.credentialsFor(x));
    if (!withCredentials.length) {
        scope.ctx.logger.debug('no registry credentials to inject for push');
        return await body();
    }
    return await scope.injector.withInjectedAuth(scope.dockerConfigFile, withCredentials, body, dockerConfigFormat);
}

/**
 * Environment pointing the Docker CLI at the config file of the scope.
 */
export function dockerConfigEnv(scope: BuildScope): Record<string, string> {
    return { DOCKER_CONFIG: path.dirname(path.resolve(scope.dockerConfigFile)) };
}

/**
 * Output collected over the commands of one build.
 */
export class BuildLog {
    private readonly chunks: string[] = [];

    add(result: ExecResult): void {
        if (result.stdout)
            this.chunks.push(result.stdout);
        if (result.stderr)
            this.chunks.push(result.stderr);
    }

    toString(): string {
        return this.chunks.join('');
    }
}

/**
 * Runs a backend command, turning a nonzero exit into a {@link BuildError}.
 */
export async function runBuildCommand(
    scope: BuildScope,
    command: string[],
    env: Record<string, string>,
    secrets: Secret[],
    log: BuildLog,
    input?: string,
): Promise<ExecResult> {
    try {
        const result = await runCommand(scope.executor, command, env, scope.cwd, scope.ctx, secrets, input);
        log.add(result);
        return result;
    } catch (e) {
        if (e instanceof TaskExecutionError && !(e instanceof BuildError))
            throw new BuildError(e.message, { cause: e, exitCode: e.exitCode, stderr: e.stderr });
        throw e;
    }
}

const IMAGE_ID = /sha256:[0-9a-f]{64}/g;

/**
 * Reference to the built image.
 *
 * @throws BuildError if the build produced nothing to refer to.
 */
export function imageRefOf(request: ImageBuildRequest, logs: string): string {
    if (request.tags.length)
        return request.tags[0];
    const ids = logs.match(IMAGE_ID);
    if (ids)
        return ids[ids.length - 1];
    if (request.imageOutputFile)
        return request.imageOutputFile;
    throw new BuildError('the build produced no image reference');
}

/**
 * @module
 * Builds images with `docker build`.
 */
import {
    ConfigurationError,
} from '../errors';
import {
    childLogger,
} from '../logger';
import {
    BuildLog,
    BuildScope,
    ImageBuildRequest,
    ImageBuildResult,
    ImageBuilder,
    authRegistries,
    buildSecrets,
    dockerConfigEnv,
    imageRefOf,
    runBuildCommand,
    withPushAuth,
} from './image-builder';
import fs = require('fs-extra');
import os = require('os');
import path = require('path');

export interface NativeBuilderOptions {
    /** Set `DOCKER_BUILDKIT`. Default: `true`. */
    useBuildkit?: boolean;
}

const log = childLogger('docker.native');

/**
 * `docker build` followed by `docker push` of each tag. Build secrets are written to temporary files and passed
 * as `--secret id=<id>,src=<file>`.
 */
export class NativeImageBuilder implements ImageBuilder {
    readonly kind = 'native';
    private readonly useBuildkit: boolean;

    constructor(options: NativeBuilderOptions = {}) {
        this.useBuildkit = options.useBuildkit ?? true;
    }

    validate(request: ImageBuildRequest): ImageBuildRequest {
        if ((request.platforms ?? []).length > 1)
            throw new ConfigurationError('the native backend builds for a single platform, use buildx');
        if (request.push && !request.tags.length)
            throw new ConfigurationError('tags cannot be empty when pushing');
        if (request.squash)
            log.warn('squash is not supported by the native backend');
        if (request.load === false)
            log.warn('the native backend always loads the image');
        return { ...request };
    }

    /**
     * Returns the `docker build` command, without secrets.
     */
    buildCommand(request: ImageBuildRequest, cwd: string): string[] {
        const command = ['docker', 'build', path.resolve(cwd, request.context)];
        if (request.dockerfile)
            command.push('-f', path.resolve(cwd, request.dockerfile));
        if (request.platforms?.length)
            command.push('--platform', request.platforms[0]);
        for (const [key, value] of Object.entries(request.buildArgs ?? {}))
            command.push('--build-arg', `${key}=${value}`);
        if (request.cacheRepo)
            command.push('--cache-from', `type=registry,ref=${request.cacheRepo}`);
        if (request.cache === false)
            command.push('--no-cache');
        for (const tag of request.tags)
            command.push('--tag', tag);
        if (request.target)
            command.push('--target', request.target);
        if (request.imageOutputFile)
            command.push('--output', `type=tar,dest=${path.resolve(cwd, request.imageOutputFile)}`);
        return command;
    }

    async build(request: ImageBuildRequest, scope: BuildScope): Promise<ImageBuildResult> {
        request = this.validate(request);
        const settings = scope.ctx.settings;
        const registries = authRegistries(request, settings);
        const secrets = buildSecrets(request, registries, settings);
        const env = { DOCKER_BUILDKIT: this.useBuildkit ? '1' : '0' };
        const output = new BuildLog();

        const command = this.buildCommand(request, scope.cwd);
        const secretDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hoistbuild-secrets-'));
        try {
            for (const [id, secret] of Object.entries(request.secrets ?? {})) {
                const secretFile = path.join(secretDir, id);
                await fs.writeFile(secretFile, secret.reveal(), { mode: 0o600 });
                command.push('--secret', `id=${id},src=${secretFile}`);
            }
            await runBuildCommand(scope, command, env, secrets, output);
        } finally {
            await fs.remove(secretDir);
        }

        if (request.push) {
            await withPushAuth(scope, registries, async () => {
                for (const tag of request.tags)
                    await runBuildCommand(scope, ['docker', 'push', tag], { ...env, ...dockerConfigEnv(scope) }, secrets, output);
            });
        }

        const logs = output.toString();
        return { imageRef: imageRefOf(request, logs), logs };
    }
}

/**
 * @module
 * Builds images with `docker buildx build`.
 */
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
import path = require('path');

const log = childLogger('docker.buildx');

/** `docker buildx inspect` output of a builder that cannot export caches. */
const DOCKER_DRIVER = /Driver:\s*docker\n/;

/**
 * Buildx builds for several platforms at once and pushes as part of the build. Build secrets are read from the
 * environment of the build command (`--secret id=<id>`).
 */
export class BuildxImageBuilder implements ImageBuilder {
    readonly kind = 'buildx';

    validate(request: ImageBuildRequest): ImageBuildRequest {
        if (!request.load && !request.push) {
            log.info('activating --load because one of --load or --push is necessary with buildx');
            return { ...request, load: true };
        }
        return { ...request };
    }

    buildCommand(request: ImageBuildRequest, cwd: string): string[] {
        const command = ['docker', 'buildx', 'build', path.resolve(cwd, request.context)];
        if (request.dockerfile)
            command.push('-f', path.resolve(cwd, request.dockerfile));
        if (request.platforms?.length)
            command.push('--platform', request.platforms.join(','));
        for (const [key, value] of Object.entries(request.buildArgs ?? {}))
            command.push('--build-arg', `${key}=${value}`);
        for (const id of Object.keys(request.secrets ?? {}))
            command.push('--secret', `id=${id}`);
        if (request.cacheRepo)
            command.push('--cache-to', `type=registry,ref=${request.cacheRepo}`);
        if (request.cache === false)
            command.push('--no-cache');
        for (const tag of request.tags)
            command.push('--tag', tag);
        if (request.push)
            command.push('--push');
        if (request.squash)
            command.push('--squash');
        if (request.target)
            command.push('--target', request.target);
        if (request.imageOutputFile)
            command.push('--output', `type=tar,dest=${path.resolve(cwd, request.imageOutputFile)}`);
        if (request.load)
            command.push('--load');
        return command;
    }

    async build(request: ImageBuildRequest, scope: BuildScope): Promise<ImageBuildResult> {
        request = this.validate(request);
        const settings = scope.ctx.settings;
        const registries = authRegistries(request, settings);
        const secrets = buildSecrets(request, registries, settings);
        const output = new BuildLog();

        if (request.cacheRepo) {
            const inspect = await runBuildCommand(scope, ['docker', 'buildx', 'inspect'], {}, secrets, output);
            if (DOCKER_DRIVER.test(inspect.stdout)) {
                scope.ctx.logger.info('creating a buildx builder, the docker driver does not support cache exports');
                await runBuildCommand(scope, ['docker', 'buildx', 'create', '--use'], {}, secrets, output);
            }
        }

        const env: Record<string, string> = {};
        for (const [id, secret] of Object.entries(request.secrets ?? {}))
            env[id] = secret.reveal();
        const command = this.buildCommand(request, scope.cwd);
        if (request.push) {
            await withPushAuth(scope, registries, () => runBuildCommand(
                scope, command, { ...env, ...dockerConfigEnv(scope) }, secrets, output));
        } else {
            await runBuildCommand(scope, command, env, secrets, output);
        }

        const logs = output.toString();
        return { imageRef: imageRefOf(request, logs), logs };
    }
}

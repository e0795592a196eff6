/**
 * @module
 * Builds images with the Kaniko executor in a container.
 */
import {
    ConfigurationError,
} from '../errors';
import {
    quote,
} from '../executor';
import {
    dockerAuthKey,
} from '../inject/formats';
import {
    childLogger,
} from '../logger';
import type {
    Secret,
} from '../secret';
import type {
    Credentials,
} from '../settings';
import {
    BuildLog,
    BuildScope,
    ImageBuildRequest,
    ImageBuildResult,
    ImageBuilder,
    authRegistries,
    buildSecrets,
    imageRefOf,
    runBuildCommand,
} from './image-builder';
import {
    renderDockerAuth,
} from './util';
import fs = require('fs-extra');
import os = require('os');
import path = require('path');

export interface KanikoBuilderOptions {
    /** Default: `gcr.io/kaniko-project/executor:debug`. */
    image?: string;
    /** Mount point of the build context. Default: `/workspace`. */
    context?: string;
    /** Default: `true`. */
    cacheCopyLayers?: boolean;
    /** Default: `redo`. */
    snapshotMode?: string;
    /** Directory the build secrets are written to. Default: `/run/secrets`. */
    secretsMountDir?: string;
}

const log = childLogger('docker.kaniko');

/** Where the Dockerfile is mounted when it lies outside of the build context. */
const MOUNTED_DOCKERFILE = '/kaniko/Dockerfile';
/** Mount point of the directory the image tarball is written to. */
const OUTPUT_DIR = '/kaniko/out';

/**
 * Runs the Kaniko executor with `docker run`. Registry auth is written to the container's own
 * `/kaniko/.docker/config.json` and build secrets to files under the secrets mount directory, so no file on the
 * host is patched. The script doing so is passed on stdin.
 */
export class KanikoImageBuilder implements ImageBuilder {
    readonly kind = 'kaniko';
    readonly image: string;
    readonly context: string;
    readonly cacheCopyLayers: boolean;
    readonly snapshotMode: string;
    readonly secretsMountDir: string;

    constructor(options: KanikoBuilderOptions = {}) {
        this.image = options.image ?? 'gcr.io/kaniko-project/executor:debug';
        this.context = options.context ?? '/workspace';
        this.cacheCopyLayers = options.cacheCopyLayers ?? true;
        this.snapshotMode = options.snapshotMode ?? 'redo';
        this.secretsMountDir = options.secretsMountDir ?? '/run/secrets';
    }

    validate(request: ImageBuildRequest): ImageBuildRequest {
        const result = { ...request };
        if (result.cache !== false && !result.push && !result.cacheRepo) {
            log.warn('disabling cache, kaniko needs push or a cache repository for it');
            result.cache = false;
        }
        if (result.cacheRepo && result.cacheRepo.includes(':'))
            throw new ConfigurationError(`kaniko cache repository cannot contain ':' (got ${JSON.stringify(result.cacheRepo)})`);
        if ((result.imageOutputFile || result.load) && !result.tags.length)
            throw new ConfigurationError('need at least one tag when exporting to an image tarball');
        if ((result.platforms ?? []).length > 1)
            throw new ConfigurationError('the kaniko backend builds for a single platform');
        return result;
    }

    /**
     * Returns the executor command run inside the container.
     */
    executorCommand(request: ImageBuildRequest, dockerfile?: string, tarPath?: string): string[] {
        const command = ['/kaniko/executor'];
        for (const [key, value] of Object.entries(request.buildArgs ?? {}))
            command.push('--build-arg', `${key}=${value}`);
        if (request.cacheRepo)
            command.push('--cache-repo', request.cacheRepo);
        if (request.cache !== false)
            command.push('--cache=true');
        for (const tag of request.tags)
            command.push('--destination', tag);
        if (dockerfile)
            command.push('--dockerfile', dockerfile);
        if (!request.push)
            command.push('--no-push');
        command.push('--snapshotMode', this.snapshotMode);
        if (request.squash)
            command.push('--single-snapshot');
        if (this.cacheCopyLayers)
            command.push('--cache-copy-layers');
        if (request.target)
            command.push('--target', request.target);
        if (tarPath)
            command.push('--tarPath', tarPath);
        command.push('--context', this.context);
        return command;
    }

    /**
     * Renders the shell script run in the container: registry auth, build secrets, then the executor.
     */
    renderScript(auth: Record<string, Credentials>, secrets: Record<string, Secret>, executorCommand: string[]): string {
        const script = [
            'mkdir -p /kaniko/.docker',
            'cat << \'EOF\' > /kaniko/.docker/config.json',
            renderDockerAuth(auth, 2),
            'EOF',
        ];
        const ids = Object.keys(secrets);
        if (ids.length) {
            script.push(`mkdir -p ${quote(this.secretsMountDir)}`);
            for (const id of ids)
                script.push(`printf '%s' ${quote(secrets[id].reveal())} > ${quote(`${this.secretsMountDir}/${id}`)}`);
        }
        script.push(executorCommand.map(quote).join(' '));
        return `${script.join('\n')}\n`;
    }

    async build(request: ImageBuildRequest, scope: BuildScope): Promise<ImageBuildResult> {
        request = this.validate(request);
        const settings = scope.ctx.settings;
        const registries = authRegistries(request, settings);
        const secrets = buildSecrets(request, registries, settings);
        const auth: Record<string, Credentials> = {};
        for (const registry of registries) {
            const credentials = settings.credentialsFor(registry);
            if (credentials)
                auth[dockerAuthKey(registry)] = credentials;
        }
        const output = new BuildLog();

        const context = path.resolve(scope.cwd, request.context);
        const volumes = [`${context}:${this.context}`];
        let dockerfile: string | undefined;
        if (request.dockerfile) {
            const file = path.resolve(scope.cwd, request.dockerfile);
            const relative = path.relative(context, file);
            if (relative.startsWith('..') || path.isAbsolute(relative)) {
                dockerfile = MOUNTED_DOCKERFILE;
                volumes.push(`${file}:${MOUNTED_DOCKERFILE}`);
            } else {
                dockerfile = relative;
            }
        }

        let tempDir: string | undefined;
        let imageOutputFile = request.imageOutputFile ? path.resolve(scope.cwd, request.imageOutputFile) : undefined;
        try {
            if (request.load && !imageOutputFile) {
                tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hoistbuild-kaniko-'));
                imageOutputFile = path.join(tempDir, 'image.tgz');
            }
            let tarPath: string | undefined;
            if (imageOutputFile) {
                volumes.push(`${path.dirname(imageOutputFile)}:${OUTPUT_DIR}`);
                tarPath = `${OUTPUT_DIR}/${path.basename(imageOutputFile)}`;
            }

            const script = this.renderScript(auth, request.secrets ?? {}, this.executorCommand(request, dockerfile, tarPath));
            const command = ['docker', 'run', '--rm', '-i', '--entrypoint', ''];
            for (const volume of volumes)
                command.push('-v', volume);
            command.push('-w', this.context);
            if (request.platforms?.length)
                command.push('--platform', request.platforms[0]);
            command.push(this.image, 'sh', '-s');
            await runBuildCommand(scope, command, {}, secrets, output, script);

            if (request.load && imageOutputFile)
                await runBuildCommand(scope, ['docker', 'load', '-i', imageOutputFile], {}, secrets, output);
        } finally {
            if (tempDir)
                await fs.remove(tempDir);
        }

        const logs = output.toString();
        return { imageRef: imageRefOf(request, logs), logs };
    }
}

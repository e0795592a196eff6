/**
 * @module
 * Docker image build task.
 */
import type {
    Builder,
} from '../builder';
import {
    EcosystemTaskOptions,
    projectDir,
    projectFiles,
} from '../ecosystem';
import {
    ConfigurationError,
} from '../errors';
import {
    withFilePatch,
} from '../inject/patch';
import type {
    Task,
} from '../task';
import {
    BackendConfig,
    createImageBuilder,
} from './backend';
import {
    ImageBuildRequest,
    ImageBuildResult,
    defaultDockerConfigFile,
} from './image-builder';
import {
    prependSecretMounts,
} from './util';
import path = require('path');

export interface DockerBuildOptions extends EcosystemTaskOptions, Partial<ImageBuildRequest> {
    /** Default: `native`. */
    backend?: BackendConfig | string;
    /** Docker config file patched with registry credentials when pushing. Default: `$DOCKER_CONFIG/config.json`. */
    dockerConfigFile?: string;
    /**
     * Add a `--mount=type=secret` option for every build secret to each `RUN` instruction of the Dockerfile
     * while the image builds.
     */
    mountSecrets?: boolean;
}

/**
 * Adds a task building an image. Its result is the {@link ImageBuildResult}.
 *
 * @throws ConfigurationError if the backend cannot build the request.
 */
export function dockerBuild(builder: Builder, options: DockerBuildOptions = {}): Task {
    const dir = projectDir(builder, options);
    const imageBuilder = createImageBuilder(options.backend ?? 'native');
    const request = imageBuilder.validate({
        buildArgs: options.buildArgs,
        cache: options.cache,
        cacheRepo: options.cacheRepo,
        context: options.context ?? '.',
        dockerfile: options.dockerfile,
        imageOutputFile: options.imageOutputFile,
        load: options.load,
        platforms: options.platforms,
        push: options.push,
        registries: options.registries,
        secrets: options.secrets,
        squash: options.squash,
        tags: options.tags ?? [],
        target: options.target,
    });
    const dockerConfigFile = path.resolve(dir, options.dockerConfigFile ?? defaultDockerConfigFile());
    const dockerfile = path.resolve(dir, request.dockerfile ?? path.join(request.context, 'Dockerfile'));
    const secretIds = Object.keys(request.secrets ?? {});
    const mountSecrets = !!options.mountSecrets && secretIds.length > 0;

    const resources: string[] = [];
    if (request.push && imageBuilder.kind !== 'kaniko')
        resources.push(dockerConfigFile);
    if (mountSecrets)
        resources.push(dockerfile);

    return builder.addTask({
        deps: options.deps,
        description: options.description ?? `Build ${request.tags.join(', ') || 'image'} (${imageBuilder.kind})`,
        fn: async (ctx): Promise<ImageBuildResult> => {
            const scope = { ctx, cwd: dir, dockerConfigFile, executor: builder.executor, injector: builder.injector };
            const build = () => imageBuilder.build(request, scope);
            if (!mountSecrets)
                return await build();
            return await withFilePatch(dockerfile, current => {
                if (current === undefined)
                    throw new ConfigurationError(`${dockerfile} does not exist`);
                return prependSecretMounts(current, secretIds);
            }, build, { mode: 0o644, restrictMode: false });
        },
        inputs: projectFiles(builder, options, options.inputs),
        key: options.name ?? 'dockerBuild',
        outputs: projectFiles(builder, options, options.outputs),
        resources,
    });
}

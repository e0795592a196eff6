/**
 * @module
 * Package and publish Helm charts.
 */
import type {
    Builder,
} from '../builder';
import {
    EcosystemTaskOptions,
    projectDir,
    projectFiles,
    runTool,
} from '../ecosystem';
import {
    TaskExecutionError,
} from '../errors';
import {
    helmRegistryConfigFormat,
} from '../inject/formats';
import type {
    Registry,
} from '../settings';
import type {
    Task,
} from '../task';
import fs = require('fs-extra');
import os = require('os');
import path = require('path');

export interface HelmPackageOptions extends EcosystemTaskOptions {
    /** Chart version. Default: the version in `Chart.yaml`. */
    version?: string;
    appVersion?: string;
    /** Directory the chart archive is written to. Default: `build/helm`. */
    outputDir?: string;
}

const PACKAGED = /Successfully packaged chart and saved it to:\s*(\S.*?)\s*$/m;

/**
 * Adds a task running `helm package`. Its result is the path of the chart archive.
 */
export function helmPackage(builder: Builder, chartPath: string, options: HelmPackageOptions = {}): Task {
    const dir = projectDir(builder, options);
    const chart = path.resolve(dir, chartPath);
    const outputDir = path.resolve(dir, options.outputDir ?? path.join('build', 'helm'));
    const command = ['helm', 'package', chart, '--destination', outputDir];
    if (options.appVersion)
        command.push('--app-version', options.appVersion);
    if (options.version)
        command.push('--version', options.version);

    return builder.addTask({
        deps: options.deps,
        description: options.description ?? `Package Helm chart ${chartPath}`,
        fn: async ctx => {
            await fs.mkdirp(outputDir);
            const result = await runTool(builder, ctx, command, options);
            const match = PACKAGED.exec(result.stdout);
            if (!match)
                throw new TaskExecutionError('could not determine the packaged chart from the helm output');
            return path.resolve(dir, match[1]);
        },
        inputs: projectFiles(builder, options, options.inputs),
        key: options.name ?? `helmPackage/${path.basename(chart)}`,
        outputs: projectFiles(builder, options, options.outputs),
    });
}

export interface HelmPushOptions extends EcosystemTaskOptions {
    /**
     * Registry config file the credentials are written to.
     * Default: `$HELM_REGISTRY_CONFIG`, or `~/.config/helm/registry/config.json`.
     */
    registryConfig?: string;
}

/**
 * Default location of the Helm registry config.
 */
export function defaultHelmRegistryConfig(env: NodeJS.ProcessEnv = process.env): string {
    return env.HELM_REGISTRY_CONFIG || path.join(os.homedir(), '.config', 'helm', 'registry', 'config.json');
}

/**
 * OCI remote of a Helm registry.
 */
export function helmRemote(registry: Registry): string {
    return /^oci:\/\//.test(registry.url) ? registry.url : `oci://${registry.url.replace(/^[a-z]+:\/\//i, '')}`;
}

/**
 * Adds a task pushing the chart packaged by `packageTask` to `registry`, with the registry's credentials written
 * to the Helm registry config while it runs.
 */
export function helmPush(
    builder: Builder,
    packageTask: Task | string,
    registry: Registry | string,
    options: HelmPushOptions = {},
): Task {
    const packageKey = typeof packageTask === 'string' ? packageTask : packageTask.key;
    const registryConfig = path.resolve(projectDir(builder, options), options.registryConfig ?? defaultHelmRegistryConfig());
    const registryName = typeof registry === 'string' ? registry : registry.name;

    return builder.addTask({
        deps: [packageKey, ...(options.deps ?? [])],
        description: options.description ?? `Push Helm chart to ${registryName}`,
        fn: async ctx => {
            const chart = ctx.dependencyResult(packageKey);
            if (typeof chart !== 'string')
                throw new TaskExecutionError(`${packageKey} did not produce a chart archive`);
            const target = typeof registry === 'string' ? ctx.settings.resolve(registry) : registry;
            const credentials = ctx.settings.credentialsFor(target);
            const command = ['helm', 'push', chart, helmRemote(target), '--registry-config', registryConfig];
            const push = () => runTool(builder, ctx, command, options, {
                secrets: credentials ? [credentials.secret] : [],
            });
            if (!credentials) {
                ctx.logger.warn({ registry: target.name }, 'no credentials for helm registry');
                await push();
                return;
            }
            await builder.injector.withInjectedAuth(registryConfig, target, push, helmRegistryConfigFormat);
        },
        inputs: projectFiles(builder, options, options.inputs),
        key: options.name ?? `helmPush/${registryName}`,
        outputs: projectFiles(builder, options, options.outputs),
        resources: [registryConfig],
    });
}

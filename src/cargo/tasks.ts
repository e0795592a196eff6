/**
 * @module
 * Tasks for Rust projects built with Cargo.
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
    cargoConfigFormat,
    cargoCredentialsFormat,
} from '../inject/formats';
import {
    withFilePatch,
} from '../inject/patch';
import type {
    Registry,
} from '../settings';
import type {
    Task,
    TaskContext,
} from '../task';
import {
    parseCargoManifest,
    setPackageVersion,
} from './manifest';
import fs = require('fs-extra');
import os = require('os');
import path = require('path');

export type CargoBuildMode = 'debug' | 'release';

export interface CargoTaskOptions extends EcosystemTaskOptions {
    /** Sets `CARGO_INCREMENTAL`. Unset by default. */
    incremental?: boolean;
    /** Arguments appended to the Cargo command. */
    additionalArgs?: string[];
    /** Default: `.cargo/config.toml` in the project directory. */
    cargoConfigFile?: string;
}

/** Cargo config file, relative to the project directory. */
const CARGO_CONFIG = path.join('.cargo', 'config.toml');

function configFile(builder: Builder, options: CargoTaskOptions): string {
    return path.resolve(projectDir(builder, options), options.cargoConfigFile ?? CARGO_CONFIG);
}

function cargoEnv(options: CargoTaskOptions): Record<string, string> {
    const env: Record<string, string> = {};
    if (options.incremental !== undefined)
        env.CARGO_INCREMENTAL = options.incremental ? '1' : '0';
    return env;
}

/**
 * Runs `body` with the index URLs of all Cargo registries in the Cargo config file. The file is left alone if
 * there are no Cargo registries.
 */
async function withRegistryIndexes<T>(
    builder: Builder,
    ctx: TaskContext,
    options: CargoTaskOptions,
    body: () => Promise<T>,
): Promise<T> {
    const registries = ctx.settings.registries('cargo');
    if (!registries.length)
        return await body();
    return await builder.injector.withInjectedAuth(configFile(builder, options), registries, body, cargoConfigFormat);
}

function cargoTask(
    builder: Builder,
    key: string,
    command: string[],
    options: CargoTaskOptions,
    fn: (ctx: TaskContext) => Promise<unknown>,
    resources: string[] = [],
): Task {
    const full = [...command, ...(options.additionalArgs ?? [])];
    return builder.addTask({
        deps: options.deps,
        description: options.description ?? `Run \`${full.join(' ')}\`.`,
        fn,
        inputs: projectFiles(builder, options, options.inputs),
        key: options.name ?? key,
        outputs: projectFiles(builder, options, options.outputs),
        resources: [configFile(builder, options), ...resources],
    });
}

/**
 * Adds a task running `cargo build`. Its result is the list of binaries the build produces.
 */
export function cargoBuild(builder: Builder, mode: CargoBuildMode, options: CargoTaskOptions = {}): Task {
    const command = ['cargo', 'build', ...(mode === 'release' ? ['--release'] : [])];
    const full = [...command, ...(options.additionalArgs ?? [])];
    const key = `cargoBuild${mode === 'release' ? 'Release' : 'Debug'}`;
    return cargoTask(builder, key, command, options, async ctx => {
        await withRegistryIndexes(builder, ctx, options, () => runTool(builder, ctx, full, options, {
            env: cargoEnv(options),
        }));
        return await cargoBinaries(projectDir(builder, options), mode, options.env);
    });
}

/**
 * Paths of the binaries a build in `mode` produces, from the `[[bin]]` targets of `Cargo.toml`, or the
 * package name if it has a `src/main.rs`.
 */
export async function cargoBinaries(
    dir: string,
    mode: CargoBuildMode,
    env: Record<string, string | undefined> = {},
): Promise<string[]> {
    const manifestFile = path.join(dir, 'Cargo.toml');
    if (!(await fs.pathExists(manifestFile)))
        return [];
    const manifest = parseCargoManifest(await fs.readFile(manifestFile, 'utf-8'));
    let bins = manifest.bins;
    if (!bins.length && manifest.name && await fs.pathExists(path.join(dir, 'src', 'main.rs')))
        bins = [manifest.name];
    const targetDir = path.resolve(dir, env.CARGO_TARGET_DIR ?? process.env.CARGO_TARGET_DIR ?? 'target');
    return bins.map(x => path.join(targetDir, mode, x));
}

export function cargoTest(builder: Builder, options: CargoTaskOptions = {}): Task {
    const command = ['cargo', 'test', ...(options.additionalArgs ?? [])];
    return cargoTask(builder, 'cargoTest', ['cargo', 'test'], options, async ctx => {
        await withRegistryIndexes(builder, ctx, options, () => runTool(builder, ctx, command, options, {
            env: cargoEnv(options),
        }));
    });
}

export interface CargoClippyOptions extends CargoTaskOptions {
    /** Apply the suggestions. */
    fix?: boolean;
    /** What `--fix` may overwrite. Default: `staged`. */
    allow?: 'staged' | 'dirty' | 'none';
}

export function cargoClippy(builder: Builder, options: CargoClippyOptions = {}): Task {
    const command = ['cargo', 'clippy'];
    if (options.fix) {
        command.push('--fix');
        const allow = options.allow ?? 'staged';
        if (allow !== 'none')
            command.push(`--allow-${allow}`);
    }
    const full = [...command, ...(options.additionalArgs ?? [])];
    return cargoTask(builder, options.fix ? 'cargoClippyFix' : 'cargoClippy', command, options, async ctx => {
        await withRegistryIndexes(builder, ctx, options, () => runTool(builder, ctx, full, options));
    });
}

export interface CargoFmtOptions extends EcosystemTaskOptions {
    /** Only check the formatting. */
    check?: boolean;
}

export function cargoFmt(builder: Builder, options: CargoFmtOptions = {}): Task {
    const command = ['cargo', 'fmt', ...(options.check ? ['--check'] : [])];
    return builder.addTask({
        deps: options.deps,
        description: options.description ?? `Run \`${command.join(' ')}\`.`,
        fn: ctx => runTool(builder, ctx, command, options).then(() => undefined),
        inputs: projectFiles(builder, options, options.inputs),
        key: options.name ?? (options.check ? 'cargoFmtCheck' : 'cargoFmt'),
        outputs: projectFiles(builder, options, options.outputs),
    });
}

export interface CargoPublishOptions extends CargoTaskOptions {
    /** Build the packaged crate before uploading it. Default: `true`. */
    verify?: boolean;
    allowDirty?: boolean;
    /** Publish under this version. `Cargo.toml` is changed while the task runs. */
    version?: string;
    /** Directory of the Cargo credentials file. Default: `$CARGO_HOME`, or `~/.cargo`. */
    cargoHome?: string;
}

/**
 * Default Cargo home directory.
 */
export function defaultCargoHome(env: NodeJS.ProcessEnv = process.env): string {
    return env.CARGO_HOME || path.join(os.homedir(), '.cargo');
}

/**
 * Adds a task running `cargo publish` to `registry`. The registry's publish token is written to the Cargo
 * credentials file while the task runs.
 */
export function cargoPublish(builder: Builder, registry: Registry | string, options: CargoPublishOptions = {}): Task {
    const registryName = typeof registry === 'string' ? registry : registry.name;
    const allowDirty = options.allowDirty || options.version !== undefined;
    const command = ['cargo', 'publish', '--registry', registryName];
    if (options.verify === false)
        command.push('--no-verify');
    if (allowDirty)
        command.push('--allow-dirty');
    const full = [...command, ...(options.additionalArgs ?? [])];

    const dir = projectDir(builder, options);
    const cargoHome = path.resolve(dir, options.cargoHome ?? defaultCargoHome());
    const credentialsFile = path.join(cargoHome, 'credentials.toml');
    const manifestFile = path.join(dir, 'Cargo.toml');
    const version = options.version;
    const resources = version === undefined ? [credentialsFile] : [credentialsFile, manifestFile];

    return cargoTask(builder, 'cargoPublish', command, options, async ctx => {
        const target = typeof registry === 'string' ? ctx.settings.resolve(registry) : registry;
        const publish = () => runTool(builder, ctx, full, options, {
            env: { ...cargoEnv(options), CARGO_HOME: cargoHome },
            secrets: target.publishToken ? [target.publishToken] : [],
        });
        const withVersion = () => version === undefined ? publish() :
            withFilePatch(manifestFile, current => setPackageVersion(current, version), () => {
                ctx.logger.info({ version }, 'temporarily bumped Cargo.toml version');
                return publish();
            }, { mode: 0o644, restrictMode: false });
        await withRegistryIndexes(builder, ctx, options, () => builder.injector.withInjectedAuth(
            credentialsFile, target, withVersion, cargoCredentialsFormat));
    }, resources);
}

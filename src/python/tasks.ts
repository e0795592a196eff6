/**
 * @module
 * Tasks for Python projects managed with Poetry.
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
    ConfigurationError,
    TaskExecutionError,
} from '../errors';
import {
    poetryConfigFormat,
} from '../inject/formats';
import {
    withFilePatch,
} from '../inject/patch';
import {
    mergeTomlTables,
} from '../inject/toml';
import type {
    Registry,
} from '../settings';
import type {
    Task,
    TaskContext,
} from '../task';
import fs = require('fs-extra');
import path = require('path');

export interface PythonInstallOptions extends EcosystemTaskOptions {
    /** Package indexes whose credentials are written to `poetry.toml`. Default: all Python registries. */
    registries?: (Registry | string)[];
}

/**
 * Adds a task running `poetry install`, with the credentials of the package indexes in `poetry.toml`
 * while it runs.
 */
export function pythonInstall(builder: Builder, options: PythonInstallOptions = {}): Task {
    const poetryToml = path.join(projectDir(builder, options), 'poetry.toml');
    const command = ['poetry', 'install', '--no-interaction'];
    return builder.addTask({
        deps: options.deps,
        description: options.description ?? 'Install the Python project',
        fn: async ctx => {
            const settings = ctx.settings;
            const registries = (options.registries ?? settings.registries('python'))
                .map(x => typeof x === 'string' ? settings.resolve(x) : x)
                .filter(x => settings.credentialsFor(x));
            const install = () => runTool(builder, ctx, command, options, {
                secrets: registries.flatMap(x => settings.credentialsFor(x)?.secret ?? []),
            });
            if (!registries.length) {
                await install();
                return;
            }
            await builder.injector.withInjectedAuth(poetryToml, registries, install, poetryConfigFormat);
        },
        inputs: projectFiles(builder, options, options.inputs),
        key: options.name ?? 'pythonInstall',
        outputs: projectFiles(builder, options, options.outputs),
        resources: [poetryToml],
    });
}

export interface PythonBuildOptions extends EcosystemTaskOptions {
    /** Build under this version. `pyproject.toml` is changed while the task runs. */
    version?: string;
    /** Default: `dist`. */
    outputDir?: string;
}

const BUILT = /Built (\S+)/g;

/**
 * Adds a task running `poetry build`. Its result is the list of distribution files.
 */
export function pythonBuild(builder: Builder, options: PythonBuildOptions = {}): Task {
    const dir = projectDir(builder, options);
    const pyproject = path.join(dir, 'pyproject.toml');
    const outputDir = path.resolve(dir, options.outputDir ?? 'dist');
    const command = ['poetry', 'build', '--output', outputDir];
    const version = options.version;

    const build = async (ctx: TaskContext) => {
        const result = await runTool(builder, ctx, command, options);
        let files = [...result.stdout.matchAll(BUILT)].map(x => path.join(outputDir, x[1]));
        if (!files.length)
            files = await listDistributions(outputDir);
        if (!files.length)
            throw new TaskExecutionError('poetry build reported no distributions');
        return files;
    };

    return builder.addTask({
        deps: options.deps,
        description: options.description ?? 'Build Python distributions',
        fn: ctx => version === undefined ? build(ctx) :
            withFilePatch(pyproject, current => setPoetryVersion(current, version), () => build(ctx), {
                mode: 0o644,
                restrictMode: false,
            }),
        inputs: projectFiles(builder, options, options.inputs),
        key: options.name ?? 'pythonBuild',
        outputs: projectFiles(builder, options, options.outputs),
        resources: version === undefined ? [] : [pyproject],
    });
}

/**
 * Returns `pyproject.toml` with `[tool.poetry] version` set to `version`.
 */
export function setPoetryVersion(content: string | undefined, version: string): string {
    if (content === undefined)
        throw new ConfigurationError('pyproject.toml does not exist');
    return mergeTomlTables(content, [{ path: ['tool', 'poetry'], values: { version } }]);
}

/**
 * Adds a task uploading the distributions built by `buildTask` with `twine`. Credentials are passed in the
 * environment.
 */
export function pythonPublish(
    builder: Builder,
    registry: Registry | string,
    buildTask: Task | string,
    options: EcosystemTaskOptions = {},
): Task {
    const buildKey = typeof buildTask === 'string' ? buildTask : buildTask.key;
    const registryName = typeof registry === 'string' ? registry : registry.name;
    return builder.addTask({
        deps: [buildKey, ...(options.deps ?? [])],
        description: options.description ?? `Publish Python distributions to ${registryName}`,
        fn: async ctx => {
            const distributions = ctx.dependencyResult(buildKey);
            if (!Array.isArray(distributions) || !distributions.every((x): x is string => typeof x === 'string'))
                throw new TaskExecutionError(`${buildKey} did not produce distributions`);
            const target = typeof registry === 'string' ? ctx.settings.resolve(registry) : registry;
            const credentials = ctx.settings.credentialsFor(target);
            const env: Record<string, string> = {};
            if (credentials) {
                env.TWINE_USERNAME = credentials.principal;
                env.TWINE_PASSWORD = credentials.secret.reveal();
            }
            await runTool(builder, ctx, ['twine', 'upload', '--non-interactive', '--repository-url', target.url,
                                         ...distributions], options, {
                env,
                secrets: credentials ? [credentials.secret] : [],
            });
        },
        inputs: projectFiles(builder, options, options.inputs),
        key: options.name ?? `pythonPublish/${registryName}`,
        outputs: projectFiles(builder, options, options.outputs),
    });
}

export interface PythonLintOptions extends EcosystemTaskOptions {
    /** Default: `['src']`. */
    sourceDirs?: string[];
    testsDir?: string;
    configFile?: string;
    additionalArgs?: string[];
}

function lintTargets(options: PythonLintOptions): string[] {
    return [...(options.sourceDirs ?? ['src']), ...(options.testsDir ? [options.testsDir] : [])];
}

function toolTask(builder: Builder, key: string, description: string, command: string[],
                  options: EcosystemTaskOptions): Task {
    return builder.addTask({
        deps: options.deps,
        description: options.description ?? description,
        fn: ctx => runTool(builder, ctx, command, options).then(() => undefined),
        inputs: projectFiles(builder, options, options.inputs),
        key: options.name ?? key,
        outputs: projectFiles(builder, options, options.outputs),
    });
}

export interface PytestOptions extends EcosystemTaskOptions {
    /** Default: `tests`. */
    testsDir?: string;
    ignoreDirs?: string[];
    /** Succeed when pytest collects no tests. */
    allowNoTests?: boolean;
}

/** Exit code of pytest when no tests were collected. */
const PYTEST_NO_TESTS = 5;

export function pytest(builder: Builder, options: PytestOptions = {}): Task {
    const dir = projectDir(builder, options);
    const command = ['pytest', '-vv', path.resolve(dir, options.testsDir ?? 'tests')];
    for (const ignore of options.ignoreDirs ?? [])
        command.push('--ignore', path.resolve(dir, ignore));
    return builder.addTask({
        deps: options.deps,
        description: options.description ?? 'Run pytest',
        fn: async ctx => {
            try {
                await runTool(builder, ctx, command, options);
            } catch (e) {
                if (options.allowNoTests && e instanceof TaskExecutionError && e.exitCode === PYTEST_NO_TESTS) {
                    ctx.logger.info('no tests collected');
                    return;
                }
                throw e;
            }
        },
        inputs: projectFiles(builder, options, options.inputs),
        key: options.name ?? 'pytest',
        outputs: projectFiles(builder, options, options.outputs),
    });
}

export interface FormatterOptions extends PythonLintOptions {
    /** Only check, do not rewrite files. */
    check?: boolean;
}

export function black(builder: Builder, options: FormatterOptions = {}): Task {
    const command = ['black', ...lintTargets(options)];
    if (options.check)
        command.push('--check');
    if (options.configFile)
        command.push('--config', options.configFile);
    command.push(...(options.additionalArgs ?? []));
    return toolTask(builder, options.check ? 'blackCheck' : 'blackFormat', `Run \`${command.join(' ')}\``, command,
                    options);
}

export function isort(builder: Builder, options: FormatterOptions = {}): Task {
    const command = ['isort', ...lintTargets(options)];
    if (options.check)
        command.push('--check-only');
    if (options.configFile)
        command.push('--settings-file', options.configFile);
    command.push(...(options.additionalArgs ?? []));
    return toolTask(builder, options.check ? 'isortCheck' : 'isortFormat', `Run \`${command.join(' ')}\``, command,
                    options);
}

export function flake8(builder: Builder, options: PythonLintOptions = {}): Task {
    const command = ['flake8', ...lintTargets(options)];
    if (options.configFile)
        command.push('--config', options.configFile);
    command.push(...(options.additionalArgs ?? []));
    return toolTask(builder, 'flake8', `Run \`${command.join(' ')}\``, command, options);
}

/**
 * Distribution files in `dir`.
 */
export async function listDistributions(dir: string): Promise<string[]> {
    if (!(await fs.pathExists(dir)))
        return [];
    return (await fs.readdir(dir))
        .filter(x => x.endsWith('.whl') || x.endsWith('.tar.gz'))
        .sort()
        .map(x => path.join(dir, x));
}

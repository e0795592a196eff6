/**
 * @module
 * hoistbuild Public API
 */
export type {
    Builder,
    BuilderOptions,
    RunOptions,
} from './builder';
export {
    newBuilder,
} from './builder';
export type {
    CommandTask,
} from './cmdtask';
export {
    commandTaskToTask,
    runCommand,
} from './cmdtask';
export {
    applySettings,
    loadSettingsFiles,
    loadSettingsFromEnv,
} from './config';
export {
    Database,
    readDatabase,
} from './db';
export type {
    EcosystemTaskOptions,
} from './ecosystem';
export * from './errors';
export type {
    BackendExecutor,
    ExecOptions,
    ExecResult,
} from './executor';
export {
    ProcessExecutor,
    maskCommand,
} from './executor';
export {
    TaskGraph,
} from './graph';
export type {
    AuthMaterial,
    ConfigFormat,
    FormatName,
} from './inject/formats';
export {
    defaultFormat,
    getFormat,
} from './inject/formats';
export {
    CredentialInjector,
} from './inject/injector';
export type {
    CredentialPatch,
} from './inject/patch';
export {
    withFilePatch,
} from './inject/patch';
export type {
    Logger,
} from './logger';
export {
    childLogger,
    logger,
} from './logger';
export type {
    Progress,
} from './progress';
export {
    createProgress,
    printReport,
} from './progress';
export type {
    TaskReport,
} from './report';
export {
    RunReport,
} from './report';
export type {
    SchedulerOptions,
} from './scheduler';
export {
    Scheduler,
} from './scheduler';
export {
    Secret,
    maskSecrets,
} from './secret';
export type {
    Credentials,
    Ecosystem,
    Registry,
    RegistryOptions,
} from './settings';
export {
    SettingsStore,
} from './settings';
export type {
    Task,
    TaskContext,
    TaskFunction,
} from './task';
export {
    TaskStatus,
} from './task';

export * as cargo from './cargo/tasks';
export * as docker from './docker';
export * as helm from './helm/tasks';
export * as python from './python/tasks';

/**
 * @module
 * Shared test doubles.
 */
import type {
    BackendExecutor,
    ExecOptions,
    ExecResult,
} from '../src/executor';
import {
    childLogger,
} from '../src/logger';
import {
    SettingsStore,
} from '../src/settings';
import type {
    TaskContext,
} from '../src/task';
import fs = require('fs-extra');
import os = require('os');
import path = require('path');

/**
 * A command received by {@link FakeExecutor}.
 */
export interface ExecCall {
    command: string[];
    env: Record<string, string>;
    workingDir: string;
    input?: string;
}

export type ExecHandler = (call: ExecCall) => (Partial<ExecResult> | Promise<Partial<ExecResult>>);

/**
 * Records commands instead of running them. The handler decides the outcome, success with no output by default.
 */
export class FakeExecutor implements BackendExecutor {
    readonly calls: ExecCall[];
    private readonly handler: ExecHandler;

    constructor(handler: ExecHandler = () => ({})) {
        this.calls = [];
        this.handler = handler;
    }

    get commands(): string[][] {
        return this.calls.map(x => x.command);
    }

    async execute(
        command: string[],
        env: Record<string, string>,
        workingDir: string,
        options: ExecOptions = {},
    ): Promise<ExecResult> {
        const call: ExecCall = { command, env, input: options.input, workingDir };
        this.calls.push(call);
        const result = await this.handler(call);
        return { exitCode: result.exitCode ?? 0, stderr: result.stderr ?? '', stdout: result.stdout ?? '' };
    }
}

/**
 * A task context for calling task functions and helpers directly.
 */
export function makeContext(settings: SettingsStore = new SettingsStore(), signal?: AbortSignal): TaskContext {
    return {
        dependencyResult: key => {
            throw new Error(`no dependency ${key}`);
        },
        key: 'test',
        logger: childLogger('test'),
        output: [],
        settings,
        signal: signal ?? new AbortController().signal,
    };
}

export function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'hoistbuild-test-'));
}

/**
 * Resolves after `ms` milliseconds.
 */
export function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Deterministic pseudo-random numbers in [0, 1).
 */
export function seededRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state * 1664525 + 1013904223) >>> 0;
        return state / 0x100000000;
    };
}

import fs = require('fs-extra');
import type {
    Task,
} from './task';

// Record types
// The key names are very short to reduce database file size.

/**
 * Recorded state of a file.
 */
export interface FileStamp {
    /** File path. */
    k: string;
    /** Last mtime, negative if the file does not exist or last mtime not available. */
    m: number;
    /** Last size, negative if the file does not exist. */
    s: number;
}

/**
 * State of a task's files after its last successful run.
 */
export interface TaskRecord {
    /** Task key. */
    k: string;
    /** Input files. */
    i: FileStamp[];
    /** Output files. */
    o: FileStamp[];
    /** JSON form of the value the task returned, absent if it returned nothing. */
    r?: unknown;
}

/**
 * Database for persisting data between build runs.
 */
export class Database {
    readonly records: Map<string, TaskRecord>;
    private readonly filename?: string;
    private readonly maxFds: number;

    constructor(records?: Iterable<TaskRecord>, filename?: string, maxFds: number = 100) {
        this.filename = filename;
        this.maxFds = maxFds;
        this.records = new Map();
        for (const record of records ?? [])
            this.records.set(record.k, record);
    }

    async commit(): Promise<void> {
        if (!this.filename)
            return;
        const chunks: string[] = [];
        let isFirst = true;
        chunks.push('[');
        for (const record of this.records.values()) {
            chunks.push((isFirst ? '' : ',\n') + JSON.stringify(record));
            isFirst = false;
        }
        chunks.push(']\n');
        await fs.writeFile(this.filename, chunks.join(''));
    }

    /**
     * Returns true if `task` succeeded before and none of its inputs and outputs changed since. Tasks without
     * outputs are never up to date.
     */
    async isUpToDate(task: Task): Promise<boolean> {
        const record = this.records.get(task.key);
        if (!record || !task.outputs.length)
            return false;
        if (!sameFiles(record.i, task.inputs) || !sameFiles(record.o, task.outputs))
            return false;
        const current = await stampFiles([...task.inputs, ...task.outputs], this.maxFds);
        const recorded = [...record.i, ...record.o];
        for (let i = 0; i < current.length; i++) {
            if (current[i].m !== recorded[i].m || current[i].s !== recorded[i].s)
                return false;
        }
        return record.o.every(x => x.m >= 0);
    }

    /**
     * Records the current state of the task's files and its result after it succeeded. A result that has no JSON
     * form is not recorded, and neither is the task, so that it runs again next time.
     */
    async recordSuccess(task: Task, result?: unknown): Promise<void> {
        const stored = toJsonValue(result);
        if (!stored) {
            this.invalidate(task.key);
            return;
        }
        const stamps = await stampFiles([...task.inputs, ...task.outputs], this.maxFds);
        const record: TaskRecord = {
            i: stamps.slice(0, task.inputs.length),
            k: task.key,
            o: stamps.slice(task.inputs.length),
        };
        if (stored.value !== undefined)
            record.r = stored.value;
        this.records.set(task.key, record);
    }

    /**
     * Result recorded for the task by {@link recordSuccess}.
     */
    recordedResult(key: string): unknown {
        return this.records.get(key)?.r;
    }

    /**
     * Forgets the task's record, so that it runs next time.
     */
    invalidate(key: string): void {
        this.records.delete(key);
    }
}

/**
 * Returns the value as it reads back from JSON, or undefined if it cannot be written as JSON.
 */
function toJsonValue(value: unknown): { value: unknown } | undefined {
    if (value === undefined)
        return { value: undefined };
    let text: string | undefined;
    try {
        text = JSON.stringify(value);
    } catch (e) {
        // cyclic or BigInt values
        return undefined;
    }
    return text === undefined ? undefined : { value: JSON.parse(text) };
}

function sameFiles(stamps: FileStamp[], filenames: string[]): boolean {
    return stamps.length === filenames.length && stamps.every((x, i) => x.k === filenames[i]);
}

/**
 * Read database from file.
 */
export async function readDatabase(filename: string, maxFds?: number): Promise<Database> {
    const contents = await fs.readFile(filename, 'utf-8');
    const records: unknown = JSON.parse(contents);
    if (!Array.isArray(records))
        throw new Error(`${filename} is not a build database`);
    return new Database(records.filter(isTaskRecord), filename, maxFds);
}

function isTaskRecord(x: unknown): x is TaskRecord {
    if (typeof x !== 'object' || x === null)
        return false;
    return 'k' in x && typeof x.k === 'string' &&
        'i' in x && Array.isArray(x.i) && x.i.every(isFileStamp) &&
        'o' in x && Array.isArray(x.o) && x.o.every(isFileStamp);
}

function isFileStamp(x: unknown): x is FileStamp {
    if (typeof x !== 'object' || x === null)
        return false;
    return 'k' in x && typeof x.k === 'string' &&
        'm' in x && typeof x.m === 'number' &&
        's' in x && typeof x.s === 'number';
}

/**
 * Stats `filenames` with at most `maxFds` concurrent calls. Results are in the order of `filenames`.
 */
export async function stampFiles(filenames: string[], maxFds: number): Promise<FileStamp[]> {
    const stamps: FileStamp[] = filenames.map(k => ({ k, m: -1, s: -1 }));
    let next = 0;

    const workers = [];
    const numWorkers = Math.min(maxFds, filenames.length);
    for (let i = 0; i < numWorkers; i++)
        workers.push(scanWorker());

    await Promise.all(workers);
    return stamps;

    async function scanWorker(): Promise<void> {
        while (next < stamps.length) {
            const stamp = stamps[next++];
            [stamp.m, stamp.s] = await statFile(stamp.k);
        }
    }
}

/**
 * Returns the mtime and size of the file.
 */
export async function statFile(filename: string): Promise<[number, number]> {
    let stats;
    try {
        stats = await fs.stat(filename);
    } catch (e) {
        return [-1, -1];
    }
    return [stats.mtime.getTime(), stats.size];
}

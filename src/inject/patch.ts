/**
 * @module
 * Temporary, reverted edits of files.
 */
import {
    ConfigurationError,
    CredentialRestoreError,
    PatchConflictError,
} from '../errors';
import crypto = require('crypto');
import fs = require('fs-extra');
import path = require('path');

/**
 * State of a file captured before it is patched, used to put it back.
 */
export interface CredentialPatch {
    /** Absolute path of the file, after following symbolic links. */
    readonly path: string;
    /** Original content, undefined if the file did not exist. */
    readonly original?: Buffer;
    /** Original permission bits. */
    readonly mode?: number;
    /** Directories created for the file, innermost first. */
    readonly createdDirs: string[];
}

/**
 * Renders the patched content from the current content (undefined if the file does not exist).
 */
export type PatchRenderer = (current: string | undefined) => (string | Promise<string>);

/**
 * Options for {@link withFilePatch}.
 */
export interface FilePatchOptions {
    /** Permission bits for a file that did not exist before. Default: `0o600`. */
    mode?: number;
    /**
     * Clear the group and other permission bits of an existing file while it is patched. Default: `true`.
     */
    restrictMode?: boolean;
}

const MAX_LINKS = 40;

/** Paths patched right now in this process. */
const activePatches = new Set<string>();

/**
 * Returns true if `filePath`, or the file it links to, is currently patched.
 */
export function isPatched(filePath: string): boolean {
    return activePatches.has(path.resolve(filePath));
}

/**
 * Replaces the content of `filePath` with the output of `render` while `body` runs, then restores the file
 * byte-for-byte, or removes it (and the directories created for it) if it did not exist.
 *
 * The file is restored whether `body` returns, throws or is cancelled. If restoring fails,
 * {@link CredentialRestoreError} is thrown in place of the body's outcome. A symbolic link is followed and its
 * target is patched, so the link itself stays in place.
 *
 * @throws PatchConflictError if the file is already patched.
 */
export async function withFilePatch<T>(
    filePath: string,
    render: PatchRenderer,
    body: (patch: CredentialPatch) => (Promise<T> | T),
    options: FilePatchOptions = {},
): Promise<T> {
    const resolved = path.resolve(filePath);
    const target = await followLinks(resolved);
    const keys = [...new Set([resolved, target])];
    const conflict = keys.find(x => activePatches.has(x));
    if (conflict)
        throw new PatchConflictError(conflict);
    for (const key of keys)
        activePatches.add(key);
    try {
        const patch = await capturePatch(target);
        const content = await render(patch.original?.toString('utf-8'));
        let mode = patch.mode ?? options.mode ?? 0o600;
        if (patch.mode !== undefined && options.restrictMode !== false)
            mode &= 0o700;

        let result: T;
        try {
            for (const dir of [...patch.createdDirs].reverse())
                await fs.mkdir(dir);
            await writeFileAtomic(target, content, mode);
            result = await body(patch);
        } catch (bodyError) {
            await restoreOrThrow(patch, bodyError);
            throw bodyError;
        }
        await restoreOrThrow(patch);
        return result;
    } finally {
        for (const key of keys)
            activePatches.delete(key);
    }
}

/**
 * Follows symbolic links from `filePath` to the path that holds the content. A dangling link resolves to the
 * missing path it points at.
 */
export async function followLinks(filePath: string): Promise<string> {
    let current = path.resolve(filePath);
    for (let i = 0; i < MAX_LINKS; i++) {
        let stats;
        try {
            stats = await fs.lstat(current);
        } catch (e) {
            if (isNotFound(e))
                return current;
            throw e;
        }
        if (!stats.isSymbolicLink())
            return current;
        current = path.resolve(path.dirname(current), await fs.readlink(current));
    }
    throw new ConfigurationError(`too many symbolic links from ${filePath}`);
}

async function restoreOrThrow(patch: CredentialPatch, bodyError?: unknown): Promise<void> {
    try {
        await restorePatch(patch);
    } catch (e) {
        throw new CredentialRestoreError(patch.path, e, bodyError);
    }
}

/**
 * Records the current state of `filePath`.
 */
export async function capturePatch(filePath: string): Promise<CredentialPatch> {
    const resolved = path.resolve(filePath);
    let original: Buffer | undefined;
    let mode: number | undefined;
    try {
        original = await fs.readFile(resolved);
        mode = (await fs.stat(resolved)).mode & 0o777;
    } catch (e) {
        if (!isNotFound(e))
            throw e;
    }

    const createdDirs: string[] = [];
    if (original === undefined) {
        let dir = path.dirname(resolved);
        while (!(await fs.pathExists(dir))) {
            createdDirs.push(dir);
            dir = path.dirname(dir);
        }
    }
    return { createdDirs, mode, original, path: resolved };
}

/**
 * Puts the file back into the state recorded in `patch`.
 */
export async function restorePatch(patch: CredentialPatch): Promise<void> {
    if (patch.original === undefined) {
        await fs.remove(patch.path);
        for (const dir of patch.createdDirs) {
            if (!(await fs.pathExists(dir)))
                continue;
            if ((await fs.readdir(dir)).length)
                break; // something else was written there in the meantime
            await fs.rmdir(dir);
        }
        return;
    }
    await writeFileAtomic(patch.path, patch.original, patch.mode ?? 0o644);
}

/**
 * Writes through a temporary file in the same directory and renames it over `filePath`, so readers see
 * either the old or the new content.
 */
export async function writeFileAtomic(filePath: string, content: string | Buffer, mode: number): Promise<void> {
    const tmp = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${crypto.randomBytes(6).toString('hex')}.tmp`);
    try {
        await fs.writeFile(tmp, content, { mode });
        await fs.chmod(tmp, mode);
        await fs.rename(tmp, filePath);
    } catch (e) {
        await fs.remove(tmp);
        throw e;
    }
}

function isNotFound(e: unknown): boolean {
    return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

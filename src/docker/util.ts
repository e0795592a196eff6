/**
 * @module
 * Dockerfile and Docker config helpers.
 */
import {
    encodeBasicAuth,
} from '../inject/formats';
import type {
    Credentials,
} from '../settings';
import {
    normalizeHost,
} from '../settings';

/**
 * Renders a Docker `config.json` with an `auths` entry per index.
 */
export function renderDockerAuth(auth: Record<string, Credentials>, indent?: number): string {
    const auths: Record<string, { auth: string }> = {};
    for (const index of Object.keys(auth))
        auths[index] = { auth: encodeBasicAuth(auth[index]) };
    return JSON.stringify({ auths }, null, indent);
}

/**
 * Prepends `prefix` to and appends `suffix` to every `RUN` instruction of a Dockerfile. Continued instructions
 * get the suffix on their last line; comment lines inside them are left alone.
 */
export function updateRunCommands(dockerfileContent: string, prefix: string, suffix: string = ''): string {
    const lines = dockerfileContent.split('\n');
    let inRunCommand = false;
    for (let i = 0; i < lines.length; i++) {
        let line = lines[i];
        if (!line.startsWith('RUN ') && !inRunCommand)
            continue;
        if (!inRunCommand)
            line = `RUN ${prefix}${line.substring(4)}`;
        if (line.endsWith('\\')) {
            inRunCommand = true;
        } else if (!line.trimStart().startsWith('#')) {
            line += suffix;
            inRunCommand = false;
        }
        lines[i] = line;
    }
    return lines.join('\n');
}

/**
 * Adds a `--mount=type=secret,id=<secret>` option per build secret to every `RUN` instruction.
 */
export function prependSecretMounts(dockerfileContent: string, buildSecrets: Iterable<string>): string {
    const mounts = [...buildSecrets].map(x => `--mount=type=secret,id=${x}`);
    if (!mounts.length)
        return dockerfileContent;
    return updateRunCommands(dockerfileContent, `${mounts.join(' ')} `);
}

/**
 * Returns the normalized registry host of an image reference, e.g. `ghcr.io/org/app:1` -> `ghcr.io`.
 * References without a registry component belong to Docker Hub.
 */
export function imageHost(reference: string): string {
    const slash = reference.indexOf('/');
    if (slash < 0)
        return normalizeHost('docker.io');
    const first = reference.substring(0, slash);
    if (first.includes('.') || first.includes(':') || first === 'localhost')
        return normalizeHost(first);
    return normalizeHost('docker.io');
}

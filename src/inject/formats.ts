/**
 * @module
 * Configuration file formats the credential injector can merge registry credentials into.
 */
import {
    ConfigurationError,
} from '../errors';
import type {
    Credentials,
    Ecosystem,
    Registry,
} from '../settings';
import {
    mergeTomlTables,
} from './toml';

/**
 * A registry together with the credentials resolved for it.
 */
export interface AuthMaterial {
    registry: Registry;
    credentials?: Credentials;
}

export type FormatName =
    | 'cargo-config'
    | 'cargo-credentials'
    | 'docker-config'
    | 'helm-registry-config'
    | 'poetry-config';

/**
 * A configuration file syntax and the entries it carries for a registry.
 */
export interface ConfigFormat {
    readonly name: FormatName;
    /**
     * Returns `content` (undefined if the file does not exist) with the entries of `entries` merged in.
     * Entries of other registries are kept.
     */
    merge(content: string | undefined, entries: AuthMaterial[]): string;
}

/**
 * `.cargo/config.toml`: the registry index URL.
 */
export const cargoConfigFormat: ConfigFormat = {
    merge: (content, entries) => mergeTomlTables(content, entries.map(x => ({
        path: ['registries', x.registry.name],
        values: { index: x.registry.url },
    }))),
    name: 'cargo-config',
};

/**
 * `$CARGO_HOME/credentials.toml`: the registry publish token.
 */
export const cargoCredentialsFormat: ConfigFormat = {
    merge: (content, entries) => mergeTomlTables(content, entries.map(x => {
        if (!x.registry.publishToken)
            throw new ConfigurationError(`registry ${x.registry.name} has no publish token`);
        return {
            path: ['registries', x.registry.name],
            values: { token: x.registry.publishToken.reveal() },
        };
    })),
    name: 'cargo-credentials',
};

/**
 * `poetry.toml`: HTTP basic credentials of a package source.
 */
export const poetryConfigFormat: ConfigFormat = {
    merge: (content, entries) => mergeTomlTables(content, entries.map(x => {
        const credentials = requireCredentials(x);
        return {
            path: ['http-basic', x.registry.name],
            values: { password: credentials.secret.reveal(), username: credentials.principal },
        };
    })),
    name: 'poetry-config',
};

/**
 * Docker `config.json`: `auths` entries. A credential helper configured for the same host would take
 * precedence, so it is removed.
 */
export const dockerConfigFormat: ConfigFormat = {
    merge: (content, entries) => mergeDockerAuths(content, entries),
    name: 'docker-config',
};

/**
 * Helm `registry/config.json`, which has the layout of a Docker `config.json`.
 */
export const helmRegistryConfigFormat: ConfigFormat = {
    merge: (content, entries) => mergeDockerAuths(content, entries),
    name: 'helm-registry-config',
};

const FORMATS: Record<FormatName, ConfigFormat> = {
    'cargo-config': cargoConfigFormat,
    'cargo-credentials': cargoCredentialsFormat,
    'docker-config': dockerConfigFormat,
    'helm-registry-config': helmRegistryConfigFormat,
    'poetry-config': poetryConfigFormat,
};

const DEFAULT_FORMATS: Record<Ecosystem, FormatName> = {
    cargo: 'cargo-credentials',
    docker: 'docker-config',
    helm: 'helm-registry-config',
    python: 'poetry-config',
};

export function getFormat(name: FormatName): ConfigFormat {
    return FORMATS[name];
}

/**
 * The format used for a registry when none is given.
 */
export function defaultFormat(ecosystem: Ecosystem): ConfigFormat {
    return FORMATS[DEFAULT_FORMATS[ecosystem]];
}

function requireCredentials(entry: AuthMaterial): Credentials {
    if (!entry.credentials)
        throw new ConfigurationError(`no credentials for registry ${entry.registry.name} (${entry.registry.host})`);
    return entry.credentials;
}

/**
 * Key of a registry in the `auths` map. Docker Hub is stored under its legacy index URL.
 */
export function dockerAuthKey(registry: Registry): string {
    return registry.host === 'registry-1.docker.io' ? 'https://index.docker.io/v1/' : registry.host;
}

/**
 * Base64 of `principal:secret`, the `auth` field of a Docker `config.json` entry.
 */
export function encodeBasicAuth(credentials: Credentials): string {
    return Buffer.from(`${credentials.principal}:${credentials.secret.reveal()}`).toString('base64');
}

type JsonObject = { [key: string]: unknown };

function isJsonObject(x: unknown): x is JsonObject {
    return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function mergeDockerAuths(content: string | undefined, entries: AuthMaterial[]): string {
    let doc: JsonObject = {};
    if (content !== undefined && content.trim()) {
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (e) {
            throw new ConfigurationError('invalid JSON in registry config', { cause: e });
        }
        if (!isJsonObject(parsed))
            throw new ConfigurationError('registry config must be a JSON object');
        doc = parsed;
    }

    const auths: JsonObject = isJsonObject(doc.auths) ? doc.auths : {};
    const credHelpers = isJsonObject(doc.credHelpers) ? doc.credHelpers : undefined;
    for (const entry of entries) {
        const key = dockerAuthKey(entry.registry);
        const current = auths[key];
        auths[key] = { ...(isJsonObject(current) ? current : {}), auth: encodeBasicAuth(requireCredentials(entry)) };
        if (credHelpers) {
            delete credHelpers[key];
            delete credHelpers[entry.registry.host];
        }
    }
    doc.auths = auths;

    return `${JSON.stringify(doc, null, detectIndent(content))}\n`;
}

function detectIndent(content: string | undefined): string | number {
    const match = content ? /\n([ \t]+)\S/.exec(content) : null;
    return match ? match[1] : 2;
}

/**
 * @module
 * Registries and authentication entries of a build session.
 */
import {
    ConfigurationError,
    NotFoundError,
} from './errors';
import {
    Secret,
} from './secret';

/**
 * Package ecosystems a registry can belong to.
 */
export type Ecosystem = 'cargo' | 'docker' | 'helm' | 'python';

export const ECOSYSTEMS: readonly Ecosystem[] = ['cargo', 'docker', 'helm', 'python'];

/**
 * Principal and secret used to authenticate against a host.
 */
export interface Credentials {
    principal: string;
    secret: Secret;
}

/**
 * Credentials registered for a host with {@link SettingsStore#addAuth}.
 */
export interface AuthEntry extends Credentials {
    host: string;
}

/**
 * A named remote package or image endpoint.
 */
export interface Registry {
    readonly name: string;
    /** Index URL (Cargo), registry URL (Docker, Helm) or package index URL (Python). */
    readonly url: string;
    /** Normalized host of {@link url}. */
    readonly host: string;
    readonly ecosystem: Ecosystem;
    /** Credentials to read from the registry. */
    readonly readCredentials?: Credentials;
    /** Token for publishing to the registry. */
    readonly publishToken?: Secret;
}

/**
 * Options for {@link SettingsStore#addRegistry}.
 */
export interface RegistryOptions {
    ecosystem: Ecosystem;
    readCredentials?: Credentials;
    publishToken?: Secret;
}

/**
 * In-memory store of registries and auth entries. It is populated while the build is declared and frozen when
 * the build starts running; tasks only read from it.
 */
export class SettingsStore {
    private readonly registryMap: Map<string, Registry>;
    private readonly authMap: Map<string, AuthEntry>;
    private isFrozen: boolean;

    constructor() {
        this.registryMap = new Map();
        this.authMap = new Map();
        this.isFrozen = false;
    }

    get frozen(): boolean {
        return this.isFrozen;
    }

    /**
     * Disallow further changes.
     */
    freeze(): void {
        this.isFrozen = true;
    }

    addAuth(host: string, principal: string, secret: Secret): void {
        this.checkMutable();
        const key = normalizeHost(host);
        if (!key)
            throw new ConfigurationError('auth host must not be empty');
        if (!principal)
            throw new ConfigurationError(`auth principal for ${host} must not be empty`);
        this.authMap.set(key, { host: key, principal, secret });
    }

    /**
     * Adds a registry. A registry with the same name is replaced.
     */
    addRegistry(name: string, url: string, opts: RegistryOptions): Registry {
        this.checkMutable();
        if (!name)
            throw new ConfigurationError('registry name must not be empty');
        const host = hostOf(url);
        if (!host)
            throw new ConfigurationError(`registry ${name} has an invalid URL: ${JSON.stringify(url)}`);
        if (opts.readCredentials && !opts.readCredentials.principal)
            throw new ConfigurationError(`registry ${name} has read credentials without a principal`);
        const registry: Registry = {
            ecosystem: opts.ecosystem,
            host,
            name,
            publishToken: opts.publishToken,
            readCredentials: opts.readCredentials,
            url,
        };
        this.registryMap.set(name, registry);
        return registry;
    }

    resolve(name: string): Registry {
        const registry = this.registryMap.get(name);
        if (!registry)
            throw new NotFoundError('registry', name);
        return registry;
    }

    /**
     * Returns the registries in registration order, optionally only those of one ecosystem.
     */
    registries(ecosystem?: Ecosystem): Registry[] {
        const all = [...this.registryMap.values()];
        return ecosystem ? all.filter(x => x.ecosystem === ecosystem) : all;
    }

    /**
     * Returns the auth entry for a host or URL.
     */
    authFor(hostOrUrl: string): AuthEntry | undefined {
        return this.authMap.get(hostOf(hostOrUrl) ?? normalizeHost(hostOrUrl));
    }

    /**
     * Credentials to use for `registry`: its own read credentials, or those registered for its host.
     */
    credentialsFor(registry: Registry): Credentials | undefined {
        return registry.readCredentials ?? this.authFor(registry.host);
    }

    private checkMutable(): void {
        if (this.isFrozen)
            throw new ConfigurationError('settings cannot be changed while the build is running');
    }
}

/**
 * Normalizes a registry host for matching.
 */
export function normalizeHost(host: string): string {
    let result = host.trim().toLowerCase().replace(/^[a-z][a-z0-9+.-]*:\/\//, '');
    result = result.replace(/\/.*$/, '');
    if (result === 'docker.io' || result === 'index.docker.io')
        return 'registry-1.docker.io';
    return result;
}

/**
 * Returns the normalized host of a URL, or of a bare `host[:port][/path]` reference.
 */
export function hostOf(url: string): string | undefined {
    const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(url) ? url : `https://${url}`;
    let parsed: URL;
    try {
        parsed = new URL(withScheme);
    } catch (e) {
        if (e instanceof TypeError)
            return undefined;
        throw e;
    }
    if (!parsed.host)
        return undefined;
    return normalizeHost(parsed.host);
}

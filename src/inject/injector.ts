/**
 * @module
 * Scoped injection of registry credentials into configuration files.
 */
import {
    ConfigurationError,
} from '../errors';
import {
    childLogger,
} from '../logger';
import type {
    Logger,
} from '../logger';
import {
    Registry,
    SettingsStore,
} from '../settings';
import {
    AuthMaterial,
    ConfigFormat,
    defaultFormat,
} from './formats';
import {
    withFilePatch,
} from './patch';

/**
 * Writes registry credentials into a configuration file for the duration of a callback.
 */
export class CredentialInjector {
    private readonly settings: SettingsStore;
    private readonly log: Logger;

    constructor(settings: SettingsStore, logger?: Logger) {
        this.settings = settings;
        this.log = logger ?? childLogger('inject');
    }

    /**
     * Merges the auth entries of `registries` into `filePath`, runs `body`, then restores the file to its
     * previous bytes, or removes it if it did not exist.
     *
     * Registries may be given by name. The format defaults to the one of the first registry's ecosystem.
     *
     * @throws ConfigurationError if no registry is given, a name is unknown or the registries need different
     *         default formats.
     * @throws CredentialRestoreError if the file could not be restored.
     */
    async withInjectedAuth<T>(
        filePath: string,
        registries: Registry | string | (Registry | string)[],
        body: () => (Promise<T> | T),
        format?: ConfigFormat,
    ): Promise<T> {
        const resolved = (Array.isArray(registries) ? registries : [registries])
            .map(x => typeof x === 'string' ? this.settings.resolve(x) : x);
        if (!resolved.length)
            throw new ConfigurationError(`no registry to inject into ${filePath}`);
        const fmt = format ?? this.formatFor(resolved);
        const entries: AuthMaterial[] = resolved.map(registry => ({
            credentials: this.settings.credentialsFor(registry),
            registry,
        }));

        const names = resolved.map(x => x.name).join(', ');
        return await withFilePatch(filePath, current => fmt.merge(current, entries), async patch => {
            this.log.debug({ file: patch.path, format: fmt.name, registries: names }, 'injected credentials');
            try {
                return await body();
            } finally {
                this.log.debug({ file: patch.path }, 'restoring');
            }
        });
    }

    private formatFor(registries: Registry[]): ConfigFormat {
        const formats = new Set(registries.map(x => defaultFormat(x.ecosystem)));
        if (formats.size !== 1)
            throw new ConfigurationError('registries of different ecosystems need an explicit format');
        return defaultFormat(registries[0].ecosystem);
    }
}

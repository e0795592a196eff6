/**
 * @module
 * Loads registries and auth entries from settings files and the environment.
 *
 * A settings file is JSON of the form
 *
 * ```json
 * {
 *   "registries": [
 *     { "name": "private-repo", "url": "https://example.jfrog.io/artifactory/api/cargo/crates/index",
 *       "ecosystem": "cargo", "publishToken": { "env": "CARGO_PUBLISH_TOKEN" } }
 *   ],
 *   "auth": [
 *     { "host": "example.jfrog.io", "principal": "ci", "secret": { "env": "JFROG_PASSWORD" } }
 *   ]
 * }
 * ```
 *
 * Files are applied in order, so later files override registries of the same name.
 */
import {
    z,
} from 'zod';
import {
    ConfigurationError,
} from './errors';
import {
    childLogger,
} from './logger';
import {
    Secret,
} from './secret';
import {
    ECOSYSTEMS,
    Ecosystem,
    SettingsStore,
} from './settings';
import fs = require('fs-extra');

const log = childLogger('config');

const secretSchema = z.union([
    z.object({ value: z.string() }).strict(),
    z.object({ env: z.string().min(1) }).strict(),
]);

const credentialsSchema = z.object({
    principal: z.string().min(1),
    secret: secretSchema,
}).strict();

const ecosystemSchema = z.enum(['cargo', 'docker', 'helm', 'python']);

const registrySchema = z.object({
    ecosystem: ecosystemSchema,
    name: z.string().min(1),
    publishToken: secretSchema.optional(),
    readCredentials: credentialsSchema.optional(),
    url: z.string().min(1),
}).strict();

const authSchema = z.object({
    host: z.string().min(1),
    principal: z.string().min(1),
    secret: secretSchema,
}).strict();

export const settingsFileSchema = z.object({
    auth: z.array(authSchema).default([]),
    registries: z.array(registrySchema).default([]),
}).strict();

export type SettingsFile = z.infer<typeof settingsFileSchema>;

type SecretDeclaration = z.infer<typeof secretSchema>;

function toSecret(decl: SecretDeclaration, env: NodeJS.ProcessEnv): Secret {
    return 'env' in decl ? Secret.fromEnv(decl.env, env) : Secret.of(decl.value);
}

/**
 * Validates `data` and adds its registries and auth entries to `store`.
 *
 * @param source name of the file the data came from, for error messages
 */
export function applySettings(
    store: SettingsStore,
    data: unknown,
    source = '<settings>',
    env: NodeJS.ProcessEnv = process.env,
): void {
    const result = settingsFileSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues.map(x => `${x.path.join('.') || '<root>'}: ${x.message}`);
        throw new ConfigurationError(`invalid settings in ${source}: ${issues.join('; ')}`);
    }
    for (const entry of result.data.auth)
        store.addAuth(entry.host, entry.principal, toSecret(entry.secret, env));
    for (const entry of result.data.registries) {
        store.addRegistry(entry.name, entry.url, {
            ecosystem: entry.ecosystem,
            publishToken: entry.publishToken && toSecret(entry.publishToken, env),
            readCredentials: entry.readCredentials && {
                principal: entry.readCredentials.principal,
                secret: toSecret(entry.readCredentials.secret, env),
            },
        });
    }
}

/**
 * Reads the settings files in order and applies them to `store`. Missing files are skipped.
 */
export async function loadSettingsFiles(
    filenames: string[],
    store: SettingsStore,
    env: NodeJS.ProcessEnv = process.env,
): Promise<SettingsStore> {
    for (const filename of filenames) {
        if (!(await fs.pathExists(filename))) {
            log.debug({ filename }, 'settings file does not exist');
            continue;
        }
        const contents = await fs.readFile(filename, 'utf-8');
        let data: unknown;
        try {
            data = JSON.parse(contents);
        } catch (e) {
            throw new ConfigurationError(`${filename} is not valid JSON`, { cause: e });
        }
        applySettings(store, data, filename, env);
        log.debug({ filename }, 'loaded settings file');
    }
    return store;
}

/**
 * Adds registries declared through environment variables of the form
 * `REGISTRY_<NAME>_URL`, `REGISTRY_<NAME>_ECOSYSTEM`, `REGISTRY_<NAME>_USERNAME`,
 * `REGISTRY_<NAME>_PASSWORD` and `REGISTRY_<NAME>_TOKEN`.
 *
 * The registry is named after `<NAME>` in lower case with `_` replaced by `-`. Secrets are kept as
 * references to the environment variables.
 */
export function loadSettingsFromEnv(store: SettingsStore, env: NodeJS.ProcessEnv = process.env): SettingsStore {
    const names = new Set<string>();
    for (const key of Object.keys(env)) {
        const match = /^REGISTRY_(.+)_(URL|ECOSYSTEM|USERNAME|PASSWORD|TOKEN)$/.exec(key);
        if (match)
            names.add(match[1]);
    }

    for (const name of [...names].sort()) {
        const prefix = `REGISTRY_${name}_`;
        const url = env[`${prefix}URL`];
        if (!url) {
            log.warn({ registry: name }, `ignoring registry variables without ${prefix}URL`);
            continue;
        }
        const ecosystem = env[`${prefix}ECOSYSTEM`];
        if (!isEcosystem(ecosystem))
            throw new ConfigurationError(`${prefix}ECOSYSTEM must be one of ${ECOSYSTEMS.join(', ')}`);
        const username = env[`${prefix}USERNAME`];
        const hasPassword = env[`${prefix}PASSWORD`] !== undefined;
        store.addRegistry(name.toLowerCase().replace(/_/g, '-'), url, {
            ecosystem,
            publishToken: env[`${prefix}TOKEN`] !== undefined ? Secret.fromEnv(`${prefix}TOKEN`, env) : undefined,
            readCredentials: username && hasPassword ?
                { principal: username, secret: Secret.fromEnv(`${prefix}PASSWORD`, env) } :
                undefined,
        });
    }
    return store;
}

function isEcosystem(x: string | undefined): x is Ecosystem {
    return ECOSYSTEMS.some(e => e === x);
}

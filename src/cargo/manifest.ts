/**
 * @module
 * Reading and editing `Cargo.toml`.
 */
import {
    ConfigurationError,
} from '../errors';
import {
    mergeTomlTables,
} from '../inject/toml';
import TOML = require('@iarna/toml');

export interface CargoManifest {
    name?: string;
    version?: string;
    /** Names of the `[[bin]]` targets. */
    bins: string[];
}

type TomlValue = ReturnType<typeof TOML.parse>[string];

function isRecord(x: TomlValue | undefined): x is Record<string, TomlValue> {
    return typeof x === 'object' && x !== null && !Array.isArray(x) && !(x instanceof Date);
}

function stringField(table: Record<string, TomlValue>, key: string): string | undefined {
    const value = table[key];
    return typeof value === 'string' ? value : undefined;
}

/**
 * @throws ConfigurationError if `content` is not valid TOML.
 */
export function parseCargoManifest(content: string): CargoManifest {
    let doc: ReturnType<typeof TOML.parse>;
    try {
        doc = TOML.parse(content);
    } catch (e) {
        throw new ConfigurationError(`invalid Cargo.toml: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }
    const pkg: Record<string, TomlValue> = isRecord(doc.package) ? doc.package : {};
    const bins: string[] = [];
    const binTables = doc.bin;
    if (Array.isArray(binTables)) {
        for (const bin of binTables) {
            const name = isRecord(bin) ? stringField(bin, 'name') : undefined;
            if (name)
                bins.push(name);
        }
    }
    return { bins, name: stringField(pkg, 'name'), version: stringField(pkg, 'version') };
}

/**
 * Returns the manifest with `[package] version` set to `version`.
 *
 * @throws ConfigurationError if the manifest does not exist or has no `[package]` table.
 */
export function setPackageVersion(content: string | undefined, version: string): string {
    if (content === undefined)
        throw new ConfigurationError('Cargo.toml does not exist');
    if (parseCargoManifest(content).name === undefined)
        throw new ConfigurationError('Cargo.toml has no [package] name');
    return mergeTomlTables(content, [{ path: ['package'], values: { version } }]);
}

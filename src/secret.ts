/**
 * @module
 * References to secret values that never print themselves.
 */
import {
    ConfigurationError,
} from './errors';
import util = require('util');

const MASK = '[MASKED]';

type SecretSource =
    | { kind: 'literal'; value: string }
    | { kind: 'env'; name: string; env: NodeJS.ProcessEnv };

/**
 * A secret value or a reference to one. Printing, logging or serializing a `Secret` yields `[MASKED]`;
 * the value is only available through {@link Secret#reveal}.
 */
export class Secret {
    private readonly source: SecretSource;

    private constructor(source: SecretSource) {
        this.source = source;
    }

    static of(value: string): Secret {
        return new Secret({ kind: 'literal', value });
    }

    /**
     * Reference to an environment variable, read when the secret is revealed.
     */
    static fromEnv(name: string, env: NodeJS.ProcessEnv = process.env): Secret {
        return new Secret({ kind: 'env', name, env });
    }

    /** Where the value comes from, safe for display. */
    get origin(): string {
        return this.source.kind === 'env' ? `env:${this.source.name}` : 'literal';
    }

    reveal(): string {
        if (this.source.kind === 'literal')
            return this.source.value;
        const value = this.source.env[this.source.name];
        if (value === undefined)
            throw new ConfigurationError(`environment variable ${this.source.name} is not set`);
        return value;
    }

    toString(): string {
        return MASK;
    }

    toJSON(): string {
        return MASK;
    }

    [util.inspect.custom](): string {
        return MASK;
    }
}

/**
 * Replaces every occurrence of the given secrets' values in `text` with `[MASKED]`.
 */
export function maskSecrets(text: string, secrets: Iterable<Secret>): string {
    for (const secret of secrets) {
        let value: string;
        try {
            value = secret.reveal();
        } catch (e) {
            if (e instanceof ConfigurationError)
                continue; // unresolved secrets cannot appear in the text
            throw e;
        }
        if (value)
            text = text.split(value).join(MASK);
    }
    return text;
}

/**
 * @module
 * Section-level merges into TOML documents.
 */
import {
    ConfigurationError,
} from '../errors';
import TOML = require('@iarna/toml');
import util = require('util');

export type TomlTable = ReturnType<typeof TOML.parse>;

/**
 * String values to set in the table at `path`.
 */
export interface TableUpdate {
    path: string[];
    values: Record<string, string>;
}

interface Section {
    /** Table path of the header, undefined for the lines before the first header. */
    header?: string[];
    /** True for `[[array]]` headers. */
    isArray: boolean;
    lines: string[];
}

const TABLE_HEADER = /^\s*\[(?!\[)(.*)\]\s*(#.*)?$/;
const ARRAY_HEADER = /^\s*\[\[(.*)\]\]\s*(#.*)?$/;

/**
 * Sets the values of each update in the TOML document `content` (empty if undefined).
 *
 * Tables that are not updated keep their text, comments included. Updated tables keep their other lines; the
 * updated keys are rewritten at the end of the table. If the document declares a target table in a form that
 * cannot be edited line by line (inline tables, dotted keys), the whole document is re-serialized instead.
 *
 * @throws ConfigurationError if `content` is not valid TOML or a path runs through a non-table value.
 */
export function mergeTomlTables(content: string | undefined, updates: TableUpdate[]): string {
    const source = content ?? '';
    const expected = parseToml(source);
    for (const update of updates)
        Object.assign(tableAt(expected, update.path), update.values);

    const sections = splitSections(source);
    for (const update of updates)
        applyUpdate(sections, update);
    const merged = joinSections(sections);

    if (matches(merged, expected))
        return merged;
    return TOML.stringify(expected);
}

function parseToml(content: string): TomlTable {
    try {
        return TOML.parse(content);
    } catch (e) {
        throw new ConfigurationError(`invalid TOML: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }
}

/**
 * Returns true if `text` parses to exactly `expected`.
 */
function matches(text: string, expected: TomlTable): boolean {
    let actual: TomlTable;
    try {
        actual = TOML.parse(text);
    } catch (e) {
        return false; // the line-based edit produced an invalid document
    }
    return util.isDeepStrictEqual(toPlain(actual), toPlain(expected));
}

/**
 * The parser attaches symbols to tables, compare through JSON.
 */
function toPlain(table: TomlTable): unknown {
    return JSON.parse(JSON.stringify(table));
}

function tableAt(root: TomlTable, path: string[]): TomlTable {
    let table = root;
    for (const key of path) {
        const child = table[key];
        if (child === undefined) {
            const created: TomlTable = {};
            table[key] = created;
            table = created;
        } else if (isTable(child)) {
            table = child;
        } else {
            throw new ConfigurationError(`TOML key ${path.join('.')} is not a table`);
        }
    }
    return table;
}

function isTable(x: unknown): x is TomlTable {
    return typeof x === 'object' && x !== null && !Array.isArray(x) && !(x instanceof Date);
}

function splitSections(content: string): Section[] {
    const sections: Section[] = [{ isArray: false, lines: [] }];
    const lines = content.split('\n');
    if (lines.length && lines[lines.length - 1] === '')
        lines.pop();
    for (const line of lines) {
        const array = ARRAY_HEADER.exec(line);
        const table = array ? undefined : TABLE_HEADER.exec(line);
        if (array || table) {
            const inner = (array ?? table)?.[1] ?? '';
            sections.push({ header: parseHeader(inner), isArray: !!array, lines: [line] });
        } else {
            sections[sections.length - 1].lines.push(line);
        }
    }
    return sections;
}

/**
 * Parses the key path of a table header, e.g. `registries."my-repo"` -> `['registries', 'my-repo']`.
 */
export function parseHeader(inner: string): string[] | undefined {
    let table: TomlTable;
    try {
        table = TOML.parse(`[${inner}]`);
    } catch (e) {
        return undefined; // not a header after all, e.g. a line of a multi-line string
    }
    const path: string[] = [];
    while (true) {
        const keys = Object.keys(table);
        if (keys.length !== 1)
            break;
        const child = table[keys[0]];
        if (!isTable(child))
            break;
        path.push(keys[0]);
        table = child;
    }
    return path;
}

function applyUpdate(sections: Section[], update: TableUpdate): void {
    const keys = Object.keys(update.values);
    const assignments = keys.map(k => `${renderKey(k)} = ${renderString(update.values[k])}`);
    const section = sections.find(x => !x.isArray && x.header && samePath(x.header, update.path));

    if (!section) {
        const last = sections[sections.length - 1];
        if (last.lines.length && last.lines[last.lines.length - 1].trim() !== '')
            last.lines.push('');
        sections.push({
            header: update.path,
            isArray: false,
            lines: [`[${update.path.map(renderKey).join('.')}]`, ...assignments],
        });
        return;
    }

    const assigns = keys.map(k => new RegExp(`^\\s*(${escapeRegExp(k)}|"${escapeRegExp(k)}"|'${escapeRegExp(k)}')\\s*=`));
    const body = section.lines.slice(1).filter(line => !assigns.some(re => re.test(line)));
    let end = body.length;
    while (end > 0 && body[end - 1].trim() === '')
        end--;
    section.lines = [section.lines[0], ...body.slice(0, end), ...assignments, ...body.slice(end)];
}

function joinSections(sections: Section[]): string {
    const lines = sections.flatMap(x => x.lines);
    return lines.length ? `${lines.join('\n')}\n` : '';
}

function samePath(a: string[], b: string[]): boolean {
    return a.length === b.length && a.every((x, i) => x === b[i]);
}

function escapeRegExp(x: string): string {
    return x.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Renders a key, quoting it unless it is a bare key.
 */
export function renderKey(key: string): string {
    return /^[A-Za-z0-9_-]+$/.test(key) ? key : renderString(key);
}

/**
 * Renders a TOML basic string.
 */
export function renderString(value: string): string {
    let out = '"';
    for (const ch of value) {
        const code = ch.codePointAt(0) ?? 0;
        if (ch === '"')
            out += '\\"';
        else if (ch === '\\')
            out += '\\\\';
        else if (ch === '\n')
            out += '\\n';
        else if (ch === '\t')
            out += '\\t';
        else if (ch === '\r')
            out += '\\r';
        else if (code < 0x20 || code === 0x7f)
            out += `\\u${code.toString(16).padStart(4, '0')}`;
        else
            out += ch;
    }
    return `${out}"`;
}

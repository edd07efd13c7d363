/**
 * @file Config Subset Parser
 *
 * Parses the indentation-based configuration subset used for pipeline
 * configuration and state specifications: nested maps, block lists
 * (`- item`, including dash-only lines and `- key: value` lines that open
 * a nested map), flow lists (`[a, b, c]`), quoted and bare scalars, and
 * `#` comments. No anchors, aliases, multi-line scalars or documents.
 *
 * The parser keeps an explicit stack of open frames. Each frame records
 * the column of its first child; every later child must sit at exactly
 * that column.
 *
 * @module tree
 */

import { ConfigParseError, StructuralError } from '../core/errors.js';
import {
    bool,
    list,
    map,
    num,
    str,
    NULL_VALUE,
    type ConfigValue,
    type ListValue,
    type MapValue,
} from './types.js';
import { tree_fromPlain } from './convert.js';

interface Frame {
    /** Column of the line that opened the frame (-1 for the root). */
    indent: number;
    container: MapValue | ListValue;
    /** Column of the first child, fixed once seen. */
    childIndent: number | null;
}

interface SignificantLine {
    lineNo: number;
    indent: number;
    content: string;
}

const INT_PATTERN: RegExp = /^[-+]?\d+$/;
const FLOAT_PATTERN: RegExp = /^[-+]?(\d+\.\d*|\.\d+|\d+)([eE][-+]?\d+)?$/;

/**
 * Parse a configuration document into a value tree.
 *
 * @param text - Document text
 * @returns Root map (empty for an empty document)
 * @throws {ConfigParseError} On indentation or nesting errors
 */
export function tree_parse(text: string): MapValue {
    const lines: SignificantLine[] = lines_collect(text);
    const root: MapValue = map();
    const stack: Frame[] = [{ indent: -1, container: root, childIndent: null }];

    for (let i = 0; i < lines.length; i++) {
        const line: SignificantLine = lines[i];

        while (stack.length > 1 && line.indent <= stack[stack.length - 1].indent) {
            stack.pop();
        }
        const frame: Frame = stack[stack.length - 1];

        if (frame.childIndent === null) {
            frame.childIndent = line.indent;
        } else if (line.indent !== frame.childIndent) {
            throw new ConfigParseError('indentation does not match any open block', line.lineNo);
        }

        if (listItem_is(line.content)) {
            if (frame.container.kind !== 'list') {
                throw new ConfigParseError('list item where a map entry is expected', line.lineNo);
            }
            listItem_apply(frame.container, line, lines[i + 1], stack);
            continue;
        }

        if (frame.container.kind !== 'map') {
            throw new ConfigParseError('map entry where a list item is expected', line.lineNo);
        }
        const entry: { key: string; rest: string } | null = entry_split(line.content);
        if (!entry) {
            throw new ConfigParseError(`expected "key: value", got "${line.content}"`, line.lineNo);
        }
        const child: Frame | null = entry_apply(frame.container, entry, line.indent, line, lines[i + 1]);
        if (child) stack.push(child);
    }

    return root;
}

/**
 * Parse a document that is either JSON (starts with `{`) or the
 * configuration subset.
 *
 * @throws {StructuralError} On invalid JSON or a non-map JSON document
 */
export function document_parse(text: string): MapValue {
    if (!text.trimStart().startsWith('{')) {
        return tree_parse(text);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error: unknown) {
        throw new StructuralError('Invalid JSON document', { cause: error });
    }
    const value: ConfigValue = tree_fromPlain(parsed);
    if (value.kind !== 'map') {
        throw new StructuralError('JSON document must be an object');
    }
    return value;
}

/**
 * Coerce one scalar token: flow list, quoted string, bool, null, int,
 * float, else bare string.
 */
export function scalar_parse(raw: string): ConfigValue {
    const s: string = raw.trim();
    if (s.startsWith('[') && s.endsWith(']')) {
        return flowList_parse(s.slice(1, -1));
    }
    if (quoted_is(s)) return str(unquote(s));
    if (s === 'true') return bool(true);
    if (s === 'false') return bool(false);
    if (s === 'null' || s === '~') return NULL_VALUE;
    if (INT_PATTERN.test(s)) return num(Number.parseInt(s, 10));
    if (FLOAT_PATTERN.test(s)) return num(Number.parseFloat(s));
    return str(s);
}

// ─── Line Handling ───────────────────────────────────────────────

function lines_collect(text: string): SignificantLine[] {
    const out: SignificantLine[] = [];
    const raw: string[] = text.replace(/\r\n?/g, '\n').split('\n');
    raw.forEach((source: string, index: number): void => {
        const stripped: string = comment_strip(source).trimEnd();
        if (stripped.trim() === '') return;

        const leading: string = stripped.slice(0, stripped.length - stripped.trimStart().length);
        if (leading.includes('\t')) {
            throw new ConfigParseError('tabs are not allowed in indentation', index + 1);
        }
        out.push({ lineNo: index + 1, indent: leading.length, content: stripped.slice(leading.length) });
    });
    return out;
}

/**
 * Remove a `#` comment that starts the line or follows whitespace and
 * sits outside a quoted scalar.
 */
function comment_strip(line: string): string {
    let quote: string | null = null;
    for (let i = 0; i < line.length; i++) {
        const ch: string = line[i];
        const prev: string = i > 0 ? line[i - 1] : ' ';
        if (quote) {
            if (ch === quote && !(quote === '"' && prev === '\\')) quote = null;
            continue;
        }
        if ((ch === '"' || ch === "'") && /[\s[,:]/.test(prev)) {
            quote = ch;
            continue;
        }
        if (ch === '#' && /\s/.test(prev)) {
            return line.slice(0, i);
        }
    }
    return line;
}

function listItem_is(content: string): boolean {
    return content === '-' || content.startsWith('- ');
}

function listItem_apply(
    target: ListValue,
    line: SignificantLine,
    next: SignificantLine | undefined,
    stack: Frame[],
): void {
    const afterDash: string = line.content.slice(1);
    const itemText: string = afterDash.trim();

    if (itemText === '') {
        const item: MapValue = map();
        target.items.push(item);
        stack.push({ indent: line.indent, container: item, childIndent: null });
        return;
    }

    const entry: { key: string; rest: string } | null = inlineEntry_split(itemText);
    if (!entry) {
        target.items.push(scalar_parse(itemText));
        return;
    }

    // `- key: value` opens a map whose keys sit at the key's column.
    const keyIndent: number = line.indent + 1 + (afterDash.length - afterDash.trimStart().length);
    const item: MapValue = map();
    target.items.push(item);
    stack.push({ indent: line.indent, container: item, childIndent: keyIndent });
    const child: Frame | null = entry_apply(item, entry, keyIndent, line, next);
    if (child) stack.push(child);
}

/**
 * Store one `key: value` entry. Returns the frame to push when the value
 * is a nested block.
 */
function entry_apply(
    target: MapValue,
    entry: { key: string; rest: string },
    keyIndent: number,
    line: SignificantLine,
    next: SignificantLine | undefined,
): Frame | null {
    if (target.entries.has(entry.key)) {
        throw new ConfigParseError(`duplicate key "${entry.key}"`, line.lineNo);
    }

    if (entry.rest !== '') {
        target.entries.set(entry.key, scalar_parse(entry.rest));
        return null;
    }

    // Lookahead: the next significant line decides list, map, or empty.
    if (!next || next.indent <= keyIndent) {
        target.entries.set(entry.key, NULL_VALUE);
        return null;
    }
    const child: MapValue | ListValue = listItem_is(next.content) ? list() : map();
    target.entries.set(entry.key, child);
    return { indent: keyIndent, container: child, childIndent: null };
}

// ─── Token Handling ──────────────────────────────────────────────

/**
 * Split `key: rest` at the first colon outside quotes that is followed
 * by whitespace or the end of the line.
 */
function entry_split(content: string): { key: string; rest: string } | null {
    let quote: string | null = null;
    for (let i = 0; i < content.length; i++) {
        const ch: string = content[i];
        if (quote) {
            if (ch === quote) quote = null;
            continue;
        }
        if ((ch === '"' || ch === "'") && i === 0) {
            quote = ch;
            continue;
        }
        if (ch === ':' && (i + 1 === content.length || content[i + 1] === ' ')) {
            const rawKey: string = content.slice(0, i).trim();
            if (rawKey === '') return null;
            return {
                key: quoted_is(rawKey) ? unquote(rawKey) : rawKey,
                rest: content.slice(i + 1).trim(),
            };
        }
    }
    return null;
}

/**
 * Inline map entries inside list items only count when the key is a
 * plain identifier, so items such as `- http://host` stay scalars.
 */
function inlineEntry_split(itemText: string): { key: string; rest: string } | null {
    if (!/^[A-Za-z_][\w.-]*:(\s|$)/.test(itemText)) return null;
    return entry_split(itemText);
}

function flowList_parse(inner: string): ListValue {
    const parts: string[] = [];
    let quote: string | null = null;
    let start: number = 0;
    for (let i = 0; i < inner.length; i++) {
        const ch: string = inner[i];
        if (quote) {
            if (ch === quote) quote = null;
            continue;
        }
        if (ch === '"' || ch === "'") {
            quote = ch;
        } else if (ch === ',') {
            parts.push(inner.slice(start, i));
            start = i + 1;
        }
    }
    parts.push(inner.slice(start));

    return list(
        parts
            .map((part: string): string => part.trim())
            .filter((part: string): boolean => part !== '')
            .map((part: string): ConfigValue => scalar_parse(part)),
    );
}

function quoted_is(s: string): boolean {
    return s.length >= 2 && (
        (s.startsWith('"') && s.endsWith('"')) ||
        (s.startsWith("'") && s.endsWith("'"))
    );
}

function unquote(s: string): string {
    const body: string = s.slice(1, -1);
    if (s.startsWith("'")) return body.replace(/''/g, "'");
    return body.replace(/\\(["\\nt])/g, (_match: string, ch: string): string => {
        switch (ch) {
            case 'n': return '\n';
            case 't': return '\t';
            default:  return ch;
        }
    });
}

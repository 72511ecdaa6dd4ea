/**
 * Credentials file codec.
 *
 * Parsing is delegated to the `toml` package. Its output loses two things
 * the store has to keep: the int/float distinction of integral numbers
 * (`1` and `1.0` both become `1`) and the order of integer-like names (JS
 * objects enumerate those first). A line-level layout scan of the same
 * source recovers both.
 *
 * Serialization is a small writer for the flat `[section]` / `key = value`
 * shape; nothing else is ever written.
 */

import toml from 'toml';

import { CredentialParseError } from '../errors.js';
import { formatScalarLiteral, type ValueType } from '../models/value.js';

export type Section = Map<string, ValueType>;

/** Ordered section name -> section mapping. */
export type CredentialFile = Map<string, Section>;

// ---------------------------------------------------------------------------
// Layout scan
// ---------------------------------------------------------------------------

interface LayoutSection {
  name: string;
  /** Key name -> raw literal text as written (comment stripped). */
  entries: Array<[string, string]>;
}

const MULTILINE_DELIMITERS = ['"""', "'''"] as const;

/**
 * Read a quoted TOML name (`"a.b"` or `'a.b'`) starting at `text[0]`.
 * Returns the decoded name and the remainder, or null if unterminated.
 */
function readQuotedName(text: string): { name: string; rest: string } | null {
  const quote = text[0];
  for (let i = 1; i < text.length; i++) {
    const ch = text[i];
    if (quote === '"' && ch === '\\') {
      i++;
      continue;
    }
    if (ch === quote) {
      const raw = text.slice(0, i + 1);
      const name = quote === '"' ? decodeBasicString(raw) : raw.slice(1, -1);
      return { name, rest: text.slice(i + 1) };
    }
  }
  return null;
}

function decodeBasicString(raw: string): string {
  try {
    const decoded: unknown = JSON.parse(raw);
    return typeof decoded === 'string' ? decoded : raw.slice(1, -1);
  } catch {
    // TOML-only escapes (\U0001F600) are not JSON; the name then matches nothing
    // and the entry keeps the order the parser gave it.
    return raw.slice(1, -1);
  }
}

function readName(text: string, terminator: string): { name: string; rest: string } | null {
  const trimmed = text.trimStart();
  if (trimmed.startsWith('"') || trimmed.startsWith("'")) {
    return readQuotedName(trimmed);
  }
  const end = trimmed.indexOf(terminator);
  if (end === -1) return null;
  return { name: trimmed.slice(0, end).trim(), rest: trimmed.slice(end) };
}

function stripComment(literal: string): string {
  const hash = literal.indexOf('#');
  return (hash === -1 ? literal : literal.slice(0, hash)).trim();
}

function opensMultiline(literal: string): string | null {
  for (const delim of MULTILINE_DELIMITERS) {
    if (literal.startsWith(delim)) {
      const closed = literal.indexOf(delim, delim.length) !== -1;
      return closed ? null : delim;
    }
  }
  return null;
}

/**
 * Record section headers and the keys under them in source order. Only
 * called on text the parser already accepted, so malformed lines are
 * skipped rather than reported.
 */
function scanLayout(source: string): LayoutSection[] {
  const sections: LayoutSection[] = [];
  let current: LayoutSection | null = null;
  let openDelimiter: string | null = null;

  for (const line of source.split(/\r?\n/)) {
    if (openDelimiter !== null) {
      if (line.includes(openDelimiter)) openDelimiter = null;
      continue;
    }

    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith('#')) continue;

    if (trimmed.startsWith('[')) {
      const header = readName(trimmed.slice(1), ']');
      if (header !== null) {
        current = { name: header.name, entries: [] };
        sections.push(current);
      }
      continue;
    }

    const entry = readName(trimmed, '=');
    if (entry === null) continue;
    const eq = entry.rest.indexOf('=');
    if (eq === -1) continue;
    const literal = entry.rest.slice(eq + 1).trim();
    openDelimiter = opensMultiline(literal);
    current?.entries.push([entry.name, stripComment(literal)]);
  }

  return sections;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const FLOAT_LITERAL = /^[+-]?[\d_]*[.eE]/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return 'an array';
  if (value instanceof Date) return 'a date-time';
  if (isPlainObject(value)) return 'a nested table';
  return typeof value;
}

function toValue(
  filePath: string,
  address: string,
  raw: unknown,
  literal: string | undefined,
): ValueType {
  if (typeof raw === 'string') return { kind: 'string', value: raw };
  if (typeof raw === 'boolean') return { kind: 'boolean', value: raw };
  if (typeof raw === 'number') {
    const isFloat = !Number.isInteger(raw) || (literal !== undefined && FLOAT_LITERAL.test(literal));
    if (isFloat) return { kind: 'float', value: raw };
    if (!Number.isSafeInteger(raw)) {
      throw new CredentialParseError(
        filePath,
        `'${address}' = ${literal ?? raw} is outside the safe integer range (±${Number.MAX_SAFE_INTEGER})`,
      );
    }
    return { kind: 'integer', value: raw };
  }
  throw new CredentialParseError(
    filePath,
    `'${address}' is ${describeValue(raw)}; only strings, numbers and booleans are supported`,
  );
}

function parserLocation(err: unknown): string {
  if (err !== null && typeof err === 'object' && 'line' in err && 'column' in err) {
    const { line, column } = err;
    if (typeof line === 'number' && typeof column === 'number') {
      return ` (line ${line}, column ${column})`;
    }
  }
  return '';
}

/**
 * Order `names` by their position in `layoutOrder`; names the scan did not
 * see keep their relative parser order after the scanned ones.
 */
function orderBy(names: string[], layoutOrder: string[]): string[] {
  const wanted = new Set(names);
  const ordered = [...new Set(layoutOrder)].filter((n) => wanted.has(n));
  const seen = new Set(ordered);
  return [...ordered, ...names.filter((n) => !seen.has(n))];
}

/**
 * Parse credentials file text.
 *
 * @param filePath - used in error messages only.
 * @throws {CredentialParseError} on invalid TOML, duplicate names, or any
 *   value that is not a scalar directly inside a `[section]`.
 */
export function parseCredentialFile(source: string, filePath: string): CredentialFile {
  let raw: unknown;
  try {
    raw = source.trim().length === 0 ? {} : toml.parse(source);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CredentialParseError(filePath, `${message}${parserLocation(err)}`, { cause: err });
  }

  if (!isPlainObject(raw)) {
    throw new CredentialParseError(filePath, 'document is not a table');
  }

  const layout = scanLayout(source);
  const file: CredentialFile = new Map();

  for (const sectionName of orderBy(Object.keys(raw), layout.map((s) => s.name))) {
    const rawSection = raw[sectionName];
    if (!isPlainObject(rawSection)) {
      throw new CredentialParseError(
        filePath,
        `top-level '${sectionName}' is ${describeValue(rawSection)}; values must live inside a [section]`,
      );
    }

    const scanned = layout.find((s) => s.name === sectionName);
    const literals = new Map(scanned?.entries ?? []);
    const section: Section = new Map();

    for (const key of orderBy(Object.keys(rawSection), scanned?.entries.map(([k]) => k) ?? [])) {
      section.set(key, toValue(filePath, `${sectionName}.${key}`, rawSection[key], literals.get(key)));
    }
    file.set(sectionName, section);
  }

  return file;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

const BARE_NAME = /^[A-Za-z0-9_-]+$/;

const ESCAPES: Record<string, string> = {
  '\b': '\\b',
  '\t': '\\t',
  '\n': '\\n',
  '\f': '\\f',
  '\r': '\\r',
  '"': '\\"',
  '\\': '\\\\',
};

/** Quote a string as a TOML basic string. */
export function quoteTomlString(value: string): string {
  const escaped = value.replace(/[\u0000-\u001f\u007f"\\]/g, (ch) => {
    const known = ESCAPES[ch];
    if (known !== undefined) return known;
    return `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`;
  });
  return `"${escaped}"`;
}

function formatName(name: string): string {
  return BARE_NAME.test(name) ? name : quoteTomlString(name);
}

function formatValue(value: ValueType): string {
  return value.kind === 'string' ? quoteTomlString(value.value) : formatScalarLiteral(value);
}

/**
 * Serialize sections and keys in map order. Sections are separated by a
 * blank line and the output ends with a newline; an empty file serializes
 * to the empty string.
 */
export function serializeCredentialFile(file: CredentialFile): string {
  const blocks: string[] = [];
  for (const [sectionName, section] of file) {
    const lines = [`[${formatName(sectionName)}]`];
    for (const [key, value] of section) {
      lines.push(`${formatName(key)} = ${formatValue(value)}`);
    }
    blocks.push(lines.join('\n'));
  }
  return blocks.length === 0 ? '' : `${blocks.join('\n\n')}\n`;
}

/** Copy of a section whose Map and values are not shared with the original. */
export function cloneSection(section: Section): Section {
  const copy: Section = new Map();
  for (const [key, value] of section) {
    copy.set(key, { ...value });
  }
  return copy;
}

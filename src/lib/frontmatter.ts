/**
 * Front matter access for tracked documents.
 *
 * The header is read with gray-matter for its values, but kept as an ordered
 * list of raw fields for writing: unknown fields are opaque text and come
 * back byte for byte, in their original order. Only the identifier field is
 * ever added.
 */

import matter from "gray-matter";
import type { Identifier } from "./models.js";

/**
 * `---` line, header lines, closing `---` line. The header must start at
 * the first byte of the document.
 */
const HEADER_REGEX = /^(---[ \t]*\r?\n)(?:([\s\S]*?)\r?\n)?(---[ \t]*(?:\r?\n|$))/;

/** UTF-8 byte-order mark */
const BOM = "\uFEFF";

/** Identifiers that cannot be used as plain object keys */
const RESERVED_IDENTIFIERS = new Set(["__proto__"]);

/** Opening delimiter without a matching close */
const OPEN_DELIMITER_REGEX = /^---[ \t]*\r?\n/;

/** Top-level `key:` at column 0, optionally quoted */
const FIELD_KEY_REGEX =
  /^(?:"([^"]*)"|'([^']*)'|([^\s#'"?\-:][^:]*?))[ \t]*:(?:[ \t]|$)/;

/** YAML words that would not read back as strings when left unquoted */
const YAML_RESERVED = new Set([
  "true",
  "false",
  "yes",
  "no",
  "on",
  "off",
  "null",
  "y",
  "n",
  "~",
]);

/**
 * One top-level header entry. `key` is null for leading comments or blank
 * lines that precede the first key.
 */
export interface HeaderField {
  key: string | null;
  lines: string[];
}

export interface DocumentHeader {
  /** Opening delimiter line, terminator included */
  open: string;
  /** Closing delimiter line, terminator included if present */
  close: string;
  /** Line terminator used inside the header */
  newline: "\n" | "\r\n";
  fields: HeaderField[];
  /** Parsed values */
  data: Record<string, unknown>;
}

export interface ParsedDocument {
  /** Leading byte-order mark, or "" */
  bom: string;
  /** null when the document has no header */
  header: DocumentHeader | null;
  body: string;
}

export type ParseResult =
  | { ok: true; document: ParsedDocument }
  | { ok: false; reason: string };

export type IdentifierField =
  | { state: "absent" }
  | { state: "present"; identifier: Identifier }
  | { state: "invalid"; value: unknown; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Group header lines into top-level fields. Indented lines, list items and
 * comments belong to the field above them.
 */
export function splitFields(lines: string[]): HeaderField[] {
  const fields: HeaderField[] = [];
  let current: HeaderField | null = null;

  for (const line of lines) {
    const match = FIELD_KEY_REGEX.exec(line);
    if (match) {
      const key = match[1] ?? match[2] ?? match[3] ?? "";
      current = { key: key.trim(), lines: [line] };
      fields.push(current);
    } else if (current) {
      current.lines.push(line);
    } else {
      current = { key: null, lines: [line] };
      fields.push(current);
    }
  }

  return fields;
}

/**
 * Split a document into header and body.
 */
export function parseDocument(raw: string): ParseResult {
  const bom = raw.startsWith(BOM) ? BOM : "";
  const content = raw.slice(bom.length);
  const match = HEADER_REGEX.exec(content);

  if (!match) {
    if (OPEN_DELIMITER_REGEX.test(content)) {
      return { ok: false, reason: "front matter is not closed by a '---' line" };
    }
    return { ok: true, document: { bom, header: null, body: content } };
  }

  const [block, open, inner, close] = match;

  let parsed: unknown;
  try {
    // Passing options skips gray-matter's input cache, which would return
    // a failed parse as empty data on the next read of the same text.
    parsed = matter(block, {}).data;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, reason: message.split("\n")[0] };
  }

  if (!isRecord(parsed)) {
    return { ok: false, reason: "front matter is not a key/value mapping" };
  }

  const lines = inner === undefined ? [] : inner.split(/\r?\n/);

  return {
    ok: true,
    document: {
      bom,
      header: {
        open,
        close,
        newline: open.endsWith("\r\n") ? "\r\n" : "\n",
        fields: splitFields(lines),
        data: parsed,
      },
      body: content.slice(block.length),
    },
  };
}

/**
 * Read the identifier field.
 * Strings are trimmed; numbers are accepted and stringified. Reserved
 * names are invalid.
 */
export function readIdentifier(document: ParsedDocument, key: string): IdentifierField {
  const value = document.header?.data[key];

  if (value === undefined || value === null) {
    return { state: "absent" };
  }
  if (typeof value === "string") {
    const identifier = value.trim();
    if (RESERVED_IDENTIFIERS.has(identifier)) {
      return { state: "invalid", value, reason: `cannot be ${JSON.stringify(identifier)}` };
    }
    return identifier ? { state: "present", identifier } : { state: "absent" };
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return { state: "present", identifier: String(value) };
  }
  return { state: "invalid", value, reason: `must be a string, found ${JSON.stringify(value)}` };
}

/**
 * Render an identifier as a YAML scalar that reads back as the same string.
 */
export function formatScalar(value: string): string {
  const plain =
    /^[\p{L}\p{N}][\p{L}\p{N}_-]*$/u.test(value) &&
    !/^[0-9._+-]+$/.test(value) &&
    !YAML_RESERVED.has(value.toLowerCase());
  return plain ? value : JSON.stringify(value);
}

/**
 * Serialize a parsed document. Unmodified documents round-trip exactly
 * when their header uses a single line terminator.
 */
export function serializeDocument(document: ParsedDocument): string {
  const { bom, header, body } = document;
  if (!header) {
    return bom + body;
  }

  const lines = header.fields.flatMap((field) => field.lines);
  const text = lines.map((line) => line + header.newline).join("");
  return `${bom}${header.open}${text}${header.close}${body}`;
}

/**
 * Content of `document` with `identifier` stored under `key`.
 * A document without a header gets a minimal one. An empty identifier
 * field is filled in place; otherwise the field is appended.
 */
export function withIdentifier(
  document: ParsedDocument,
  key: string,
  identifier: Identifier,
): string {
  const existing = readIdentifier(document, key);
  if (existing.state !== "absent") {
    throw new Error(`Refusing to overwrite identifier field '${key}'`);
  }

  const line = `${key}: ${formatScalar(identifier)}`;
  const { header } = document;

  if (!header) {
    return `${document.bom}---\n${line}\n---\n${document.body}`;
  }

  const fields = header.fields.some((field) => field.key === key)
    ? header.fields.map((field) =>
        field.key === key ? { key, lines: [line] } : field,
      )
    : [...header.fields, { key, lines: [line] }];

  // A close delimiter at end of file has no terminator of its own.
  const close = header.close.endsWith("\n") ? header.close : header.close + header.newline;

  return serializeDocument({
    bom: document.bom,
    header: { ...header, fields, close },
    body: document.body,
  });
}

/**
 * Reference syntax in document bodies.
 *
 * Two forms are recognized:
 * - relative references: `[text](../concepts/intro.md)`, optionally with a
 *   title or `#anchor`, and reference definitions `[label]: intro.md`
 * - identifier references: `{{ internal_link('concepts-intro') }}`, the
 *   macro call the site generator expands at render time
 *
 * Fenced code blocks and inline code spans are left alone.
 */

/**
 * Inline link: prefix `[text](`, optional spaces, target, optional title
 * and the closing parenthesis.
 */
const INLINE_LINK_REGEX =
  /(!?\[(?:[^\]\\\n]|\\.)*\]\()([ \t]*)(<[^>\n]*>|[^\s()<>]+)((?:[ \t]+(?:"[^"\n]*"|'[^'\n]*'|\([^)\n]*\)))?[ \t]*\))/g;

/** Reference definition; footnotes (`[^1]:`) are excluded */
const DEFINITION_REGEX = /^( {0,3}\[(?!\^)[^\]\n]+\]:[ \t]*)(<[^>\n]*>|\S+)/gm;

/** Opening or closing code fence */
const FENCE_REGEX = /^ {0,3}(`{3,}|~{3,})/;

/** Inline code span delimited by a run of backticks */
const INLINE_CODE_REGEX = /(`+)(?:(?!\1)[\s\S])+?\1/g;

/**
 * A run of body text, flagged when it is code.
 */
export interface Segment {
  text: string;
  code: boolean;
}

/**
 * Relative reference found in prose.
 */
export interface RelativeReference {
  kind: "inline" | "definition";
  /** Target as written, angle brackets removed */
  target: string;
  /** Character offset of the target in the body */
  offset: number;
}

/**
 * Identifier reference found in prose.
 */
export interface IdentifierReference {
  identifier: string;
  /** Full macro text */
  raw: string;
  /** Character offset in the body */
  offset: number;
}

/**
 * Split a body into prose and code segments. Concatenating the segments
 * gives back the body.
 */
export function splitSegments(body: string): Segment[] {
  const segments: Segment[] = [];
  const lines = body.split(/(?<=\n)/);
  let prose = "";
  let fence: string | null = null;
  let code = "";

  for (const line of lines) {
    const match = FENCE_REGEX.exec(line);

    if (fence === null) {
      if (match) {
        fence = match[1];
        code = line;
      } else {
        prose += line;
      }
      continue;
    }

    code += line;
    if (
      match &&
      match[1][0] === fence[0] &&
      match[1].length >= fence.length &&
      line.trim() === match[1]
    ) {
      segments.push(...splitInlineCode(prose), { text: code, code: true });
      prose = "";
      code = "";
      fence = null;
    }
  }

  segments.push(...splitInlineCode(prose));
  if (code) {
    // Unclosed fence: the rest of the document is code.
    segments.push({ text: code, code: true });
  }

  return segments.filter((segment) => segment.text !== "");
}

function splitInlineCode(text: string): Segment[] {
  const segments: Segment[] = [];
  let last = 0;
  let match: RegExpExecArray | null;

  INLINE_CODE_REGEX.lastIndex = 0;
  while ((match = INLINE_CODE_REGEX.exec(text)) !== null) {
    segments.push({ text: text.slice(last, match.index), code: false });
    segments.push({ text: match[0], code: true });
    last = match.index + match[0].length;
  }
  segments.push({ text: text.slice(last), code: false });

  return segments;
}

/**
 * Apply `transform` to every prose segment. `base` is the segment's offset
 * in the body.
 */
export function mapProse(
  body: string,
  transform: (text: string, base: number) => string,
): string {
  let offset = 0;
  let result = "";

  for (const segment of splitSegments(body)) {
    result += segment.code ? segment.text : transform(segment.text, offset);
    offset += segment.text.length;
  }

  return result;
}

function unwrapTarget(target: string): string {
  return target.startsWith("<") && target.endsWith(">") ? target.slice(1, -1) : target;
}

/**
 * Rewrite relative reference targets. `replace` receives each reference and
 * returns the new target text, or null to keep it.
 */
export function replaceRelativeReferences(
  body: string,
  replace: (reference: RelativeReference) => string | null,
): string {
  return mapProse(body, (text, base) => {
    const inline = text.replace(
      INLINE_LINK_REGEX,
      (whole: string, prefix: string, space: string, target: string, rest: string, index: number) => {
        const next = replace({
          kind: "inline",
          target: unwrapTarget(target),
          offset: base + index + prefix.length + space.length,
        });
        return next === null ? whole : `${prefix}${space}${next}${rest}`;
      },
    );

    return inline.replace(
      DEFINITION_REGEX,
      (whole: string, prefix: string, target: string, index: number) => {
        const next = replace({
          kind: "definition",
          target: unwrapTarget(target),
          offset: base + index + prefix.length,
        });
        return next === null ? whole : `${prefix}${next}`;
      },
    );
  });
}

/**
 * Extract relative references in order of appearance.
 */
export function extractRelativeReferences(body: string): RelativeReference[] {
  const references: RelativeReference[] = [];
  replaceRelativeReferences(body, (reference) => {
    references.push(reference);
    return null;
  });
  return references.sort((a, b) => a.offset - b.offset);
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Regular expression matching identifier references for `macro`.
 */
export function identifierReferenceRegex(macro: string): RegExp {
  return new RegExp(
    `\\{\\{\\s*${escapeRegex(macro)}\\(\\s*(['"])((?:(?!\\1)[^\\n])+)\\1\\s*\\)\\s*\\}\\}`,
    "g",
  );
}

/**
 * Render an identifier reference.
 */
export function formatIdentifierReference(macro: string, identifier: string): string {
  const quote = identifier.includes("'") ? '"' : "'";
  return `{{ ${macro}(${quote}${identifier}${quote}) }}`;
}

/**
 * Rewrite identifier references. `replace` returns the replacement text, or
 * null to keep the macro.
 */
export function replaceIdentifierReferences(
  body: string,
  macro: string,
  replace: (reference: IdentifierReference) => string | null,
): string {
  const regex = identifierReferenceRegex(macro);

  return mapProse(body, (text, base) =>
    text.replace(
      regex,
      (raw: string, _quote: string, identifier: string, index: number) => {
        const next = replace({ identifier: identifier.trim(), raw, offset: base + index });
        return next ?? raw;
      },
    ),
  );
}

/**
 * Extract identifier references in order of appearance.
 */
export function extractIdentifierReferences(
  body: string,
  macro: string,
): IdentifierReference[] {
  const references: IdentifierReference[] = [];
  replaceIdentifierReferences(body, macro, (reference) => {
    references.push(reference);
    return null;
  });
  return references;
}

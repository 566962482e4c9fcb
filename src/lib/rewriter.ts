/**
 * Reference rewriting in both directions.
 *
 * - convertToIdentifiers: relative references -> identifier references,
 *   run once over the sources so links survive later moves.
 * - resolveIdentifiers: identifier references -> relative paths from the
 *   document's current location, run at build time.
 *
 * Both are pure: a body and a lookup go in, a body and diagnostics come out.
 */

import type { Diagnostic, Identifier, Location } from "./models.js";
import { relativeReference, resolveRelativeTarget } from "./location.js";
import {
  formatIdentifierReference,
  replaceIdentifierReferences,
  replaceRelativeReferences,
} from "./parsing.js";

/** Scheme such as "https:" or "mailto:" */
const SCHEME_REGEX = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;

/**
 * Render-time lookup: the relative path from `currentLocation` to the
 * document called `identifier`, or null when no such document exists.
 */
export type LinkResolver = (
  currentLocation: Location,
  identifier: Identifier,
) => string | null;

/**
 * One reference rewritten in place.
 */
export interface ReferenceChange {
  from: string;
  to: string;
}

export interface RewriteResult {
  body: string;
  changes: ReferenceChange[];
  diagnostics: Diagnostic[];
}

export interface ConvertContext {
  /** Location of the document being rewritten */
  location: Location;
  /** Identifier of the document at a location, if it has one */
  identifierAt: (location: Location) => Identifier | undefined;
  /** Tracked content extension, e.g. ".md" */
  extension: string;
  macro: string;
}

export interface ResolveContext {
  location: Location;
  resolve: LinkResolver;
  macro: string;
}

/**
 * Split "path#anchor" or "path?query" at the first delimiter.
 */
export function splitTarget(target: string): { path: string; suffix: string } {
  const cut = target.search(/[#?]/);
  return cut === -1
    ? { path: target, suffix: "" }
    : { path: target.slice(0, cut), suffix: target.slice(cut) };
}

function decodePath(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Stray "%" that is not an escape: the path is literal.
    return value;
  }
}

/**
 * Rewrite relative references to tracked documents as identifier
 * references. References already in identifier form, external URLs,
 * absolute paths, anchors and non-content files are not touched.
 */
export function convertToIdentifiers(body: string, context: ConvertContext): RewriteResult {
  const changes: ReferenceChange[] = [];
  const diagnostics: Diagnostic[] = [];
  const extension = context.extension.toLowerCase();

  const converted = replaceRelativeReferences(body, (reference) => {
    const { target } = reference;
    if (target.startsWith("//") || SCHEME_REGEX.test(target)) return null;

    const { path, suffix } = splitTarget(target);
    if (path === "" || path.startsWith("/")) return null;

    const decoded = decodePath(path);
    if (!decoded.toLowerCase().endsWith(extension)) return null;

    const resolved = resolveRelativeTarget(context.location, decoded);
    if (resolved === null) return null;

    const identifier = context.identifierAt(resolved);
    if (identifier === undefined) {
      diagnostics.push({
        kind: "unresolved-reference",
        location: context.location,
        reference: target,
        message: `${target} points to ${resolved}, which has no identifier`,
      });
      return null;
    }

    const next = formatIdentifierReference(context.macro, identifier) + suffix;
    changes.push({ from: target, to: next });
    return next;
  });

  return { body: converted, changes, diagnostics };
}

/**
 * Replace identifier references with relative paths from the document's
 * location. Unknown identifiers are reported once per occurrence and left
 * as written.
 */
export function resolveIdentifiers(body: string, context: ResolveContext): RewriteResult {
  const changes: ReferenceChange[] = [];
  const diagnostics: Diagnostic[] = [];

  const resolved = replaceIdentifierReferences(body, context.macro, (reference) => {
    const target = context.resolve(context.location, reference.identifier);
    if (target === null) {
      diagnostics.push({
        kind: "unresolved-reference",
        location: context.location,
        identifier: reference.identifier,
        reference: reference.raw,
        message: `No document has identifier '${reference.identifier}'`,
      });
      return null;
    }
    changes.push({ from: reference.raw, to: target });
    return target;
  });

  return { body: resolved, changes, diagnostics };
}

/**
 * Build the render-time resolver over an identifier -> location mapping.
 * Each path segment is percent-encoded, so names with spaces, "#", "?" or
 * parentheses stay a single link target.
 */
export function createLinkResolver(
  documents: ReadonlyMap<Identifier, Location>,
): LinkResolver {
  return (currentLocation, identifier) => {
    const target = documents.get(identifier);
    if (target === undefined) {
      return null;
    }
    return relativeReference(currentLocation, target)
      .split("/")
      .map((segment) =>
        // encodeURIComponent leaves parentheses, which would close the link.
        encodeURIComponent(segment).replace(/\(/g, "%28").replace(/\)/g, "%29"),
      )
      .join("/");
  };
}

/**
 * Identifier generation and assignment bookkeeping.
 *
 * Identifiers are derived from a document's location the first time it is
 * seen: "How To/Routing.md" becomes "how-to-routing". Unicode is handled by
 * NFKD decomposition with combining marks removed ("Café" -> "cafe");
 * letters without a decomposition ("ß", "文") are kept as they are.
 * Changing this scheme changes identifiers already written to documents.
 */

import type { Diagnostic, Identifier, Location } from "./models.js";

/** Joiner placed between path segments and words */
export const IDENTIFIER_JOINER = "-";

export type GenerateResult =
  | { ok: true; identifier: Identifier }
  | { ok: false; diagnostic: Diagnostic };

/**
 * Candidate identifier for a location.
 */
export function generateIdentifier(
  location: Location,
  extension: string,
): GenerateResult {
  const stem = location.toLowerCase().endsWith(extension.toLowerCase())
    ? location.slice(0, location.length - extension.length)
    : location;

  const identifier = stem
    .normalize("NFKD")
    .replace(/\p{M}+/gu, "")
    .toLowerCase()
    .replace(/[\/\s_.]+/gu, IDENTIFIER_JOINER)
    .replace(/[^\p{L}\p{N}-]+/gu, "")
    .replace(/-{2,}/g, IDENTIFIER_JOINER)
    .replace(/^-+|-+$/g, "");

  if (!identifier) {
    return {
      ok: false,
      diagnostic: {
        kind: "invalid-location",
        location,
        message: `Cannot derive an identifier from ${location}: no letters or digits in its path`,
      },
    };
  }

  return { ok: true, identifier };
}

/**
 * Assignments made so far in one run: identifier -> location.
 * Owned by the caller and passed in explicitly; there is no module state.
 */
export type Assignments = Map<Identifier, Location>;

/**
 * Two locations competing for one identifier.
 */
export interface Collision {
  identifier: Identifier;
  existing: Location;
  conflicting: Location;
}

/**
 * Record `identifier` for `location`, or report who already holds it.
 * Re-claiming an identifier for the same location is a no-op.
 */
export function claimIdentifier(
  assignments: Assignments,
  identifier: Identifier,
  location: Location,
): Collision | null {
  const holder = assignments.get(identifier);
  if (holder !== undefined && holder !== location) {
    return { identifier, existing: holder, conflicting: location };
  }
  assignments.set(identifier, location);
  return null;
}

/**
 * Location -> identifier view of an assignment map.
 */
export function invertAssignments(
  assignments: ReadonlyMap<Identifier, Location>,
): Map<Location, Identifier> {
  const byLocation = new Map<Location, Identifier>();
  for (const [identifier, location] of assignments) {
    byLocation.set(location, identifier);
  }
  return byLocation;
}

/**
 * Snapshot persistence.
 *
 * The before-snapshot is the durable record of where every document lived
 * when `waymark prepare` ran. It is plain JSON with documents sorted by
 * identifier so that it diffs cleanly under version control:
 *
 *   {
 *     "version": 1,
 *     "captured_at": "2026-01-01T00:00:00.000Z",
 *     "documents": { "concepts-intro": "concepts/intro.md" }
 *   }
 *
 * A flat `{ "<id>": "<location>" }` object, as written by older tooling,
 * is read as well.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { SnapshotCorruptError, SnapshotMissingError } from "./errors.js";
import { compareCodePoints, normalizeLocation } from "./location.js";
import type { Identifier, Location, Snapshot } from "./models.js";

/** Current artifact format version */
export const SNAPSHOT_VERSION = 1;

const DocumentsSchema = z.record(z.string().min(1), z.string().min(1));

const SnapshotFileSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  captured_at: z.string(),
  documents: DocumentsSchema,
});

/**
 * Parse failure without a file path. loadSnapshot wraps it in a
 * SnapshotCorruptError.
 */
export class SnapshotFormatError extends Error {}

/**
 * Create a snapshot from a mapping.
 */
export function createSnapshot(
  documents: ReadonlyMap<Identifier, Location>,
  capturedAt: Date = new Date(),
): Snapshot {
  return {
    version: SNAPSHOT_VERSION,
    capturedAt: capturedAt.toISOString(),
    documents: new Map(documents),
  };
}

/**
 * Serialize a snapshot to its artifact text.
 */
export function serializeSnapshot(snapshot: Snapshot): string {
  const documents = Object.fromEntries(
    [...snapshot.documents].sort(([a], [b]) => compareCodePoints(a, b)),
  );

  const artifact = {
    version: snapshot.version,
    captured_at: snapshot.capturedAt,
    documents,
  };
  return JSON.stringify(artifact, null, 2) + "\n";
}

function toMapping(documents: Record<string, string>): Map<Identifier, Location> {
  const mapping = new Map<Identifier, Location>();
  const holders = new Map<Location, Identifier>();

  for (const identifier of Object.keys(documents).sort(compareCodePoints)) {
    const raw = documents[identifier];
    const location = normalizeLocation(raw);
    if (location === null || location !== raw) {
      throw new SnapshotFormatError(`'${identifier}' has an invalid location '${raw}'`);
    }
    const holder = holders.get(location);
    if (holder !== undefined) {
      throw new SnapshotFormatError(
        `'${holder}' and '${identifier}' both point to ${location}`,
      );
    }
    holders.set(location, identifier);
    mapping.set(identifier, location);
  }

  return mapping;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasOwnProtoKey(value: unknown): boolean {
  return isRecord(value) && Object.prototype.hasOwnProperty.call(value, "__proto__");
}

/**
 * Parse artifact text. Throws SnapshotFormatError on anything that is not
 * a valid snapshot.
 */
export function parseSnapshot(text: string): Snapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SnapshotFormatError(`invalid JSON (${message})`);
  }

  // zod builds records on plain objects, where this key would vanish.
  if (hasOwnProtoKey(raw) || (isRecord(raw) && hasOwnProtoKey(raw.documents))) {
    throw new SnapshotFormatError(`identifier "__proto__" is not allowed`);
  }

  const current = SnapshotFileSchema.safeParse(raw);
  if (current.success) {
    return {
      version: current.data.version,
      capturedAt: current.data.captured_at,
      documents: toMapping(current.data.documents),
    };
  }

  const legacy = DocumentsSchema.safeParse(raw);
  if (legacy.success && !("version" in legacy.data)) {
    return {
      version: SNAPSHOT_VERSION,
      capturedAt: "",
      documents: toMapping(legacy.data),
    };
  }

  const issue = current.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
  throw new SnapshotFormatError(`${issue?.message ?? "unrecognized format"}${where}`);
}

/**
 * Load the snapshot artifact. A missing file and an unreadable one are
 * distinct failures; neither is treated as an empty snapshot.
 */
export function loadSnapshot(snapshotPath: string): Snapshot {
  if (!fs.existsSync(snapshotPath)) {
    throw new SnapshotMissingError(snapshotPath);
  }

  let text: string;
  try {
    text = fs.readFileSync(snapshotPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SnapshotCorruptError(snapshotPath, message);
  }

  try {
    return parseSnapshot(text);
  } catch (err) {
    if (err instanceof SnapshotFormatError) {
      throw new SnapshotCorruptError(snapshotPath, err.message);
    }
    throw err;
  }
}

/**
 * Write the snapshot atomically: a temporary sibling is written, then
 * renamed over the target.
 */
export function saveSnapshot(snapshotPath: string, snapshot: Snapshot): void {
  fs.mkdirSync(path.dirname(snapshotPath), { recursive: true });

  const tempPath = path.join(
    path.dirname(snapshotPath),
    `.${path.basename(snapshotPath)}.${process.pid}.tmp`,
  );
  fs.writeFileSync(tempPath, serializeSnapshot(snapshot));
  fs.renameSync(tempPath, snapshotPath);
}

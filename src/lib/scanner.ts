/**
 * Tree scanning and identifier assignment.
 *
 * Scanning is split in two: planScan works on document text only and
 * decides every identifier and header change; applyScan writes the planned
 * headers. A dry run is a plan that is never applied, and re-running on an
 * already prepared tree plans no writes.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { ConfigError, IdentifierCollisionError } from "./errors.js";
import { parseDocument, readIdentifier, withIdentifier, type ParsedDocument } from "./frontmatter.js";
import { claimIdentifier, generateIdentifier, type Assignments } from "./identifiers.js";
import { compareCodePoints, toFilePath, toLocation } from "./location.js";
import type { Diagnostic, Identifier, Location } from "./models.js";

/**
 * A tracked file on disk. `file` is the absolute path as the file system
 * spells it, which can differ from the NFC location (e.g. NFD names).
 */
export interface DocumentFile {
  location: Location;
  file: string;
}

/**
 * A document's location and text.
 */
export interface SourceDocument {
  location: Location;
  content: string;
  /** Absolute path the content was read from, when it came from disk */
  file?: string;
}

/**
 * A document with a known identifier.
 * - header: the identifier was already stored in the document
 * - generated: the identifier was derived from the location in this run
 */
export interface TrackedDocument {
  identifier: Identifier;
  location: Location;
  origin: "header" | "generated";
}

/**
 * Header change planned for one document.
 */
export interface PendingWrite {
  location: Location;
  /** Absolute path to write, when the source came from disk */
  file?: string;
  identifier: Identifier;
  before: string;
  after: string;
}

export interface ScanOptions {
  /** Front matter field holding the identifier */
  idKey: string;
  /** Tracked content extension */
  extension: string;
  /**
   * Generate identifiers for documents that have none (default true).
   * When false those documents are reported as untracked.
   */
  assign?: boolean;
}

export interface ScanPlan {
  /** Sorted by location */
  documents: TrackedDocument[];
  writes: PendingWrite[];
  diagnostics: Diagnostic[];
  /** identifier -> location for every tracked document */
  assignments: ReadonlyMap<Identifier, Location>;
}

/**
 * List tracked files under `docsDir`, recursively, sorted by location.
 * Hidden files and directories are skipped; symbolic links are not
 * followed.
 */
export function listDocumentFiles(docsDir: string, extension: string): DocumentFile[] {
  if (!fs.existsSync(docsDir) || !fs.statSync(docsDir).isDirectory()) {
    throw new ConfigError(`Documentation directory not found: ${docsDir}`);
  }

  const suffix = extension.toLowerCase();
  const files: DocumentFile[] = [];
  const pending = [docsDir];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      if (entry.name.startsWith(".")) continue;

      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(fullPath);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith(suffix)) {
        const location = toLocation(docsDir, fullPath);
        if (location !== null) {
          files.push({ location, file: fullPath });
        }
      }
    }
  }

  return files.sort(
    (a, b) => compareCodePoints(a.location, b.location) || compareCodePoints(a.file, b.file),
  );
}

/**
 * List tracked document locations under `docsDir`, sorted.
 */
export function listDocuments(docsDir: string, extension: string): Location[] {
  return listDocumentFiles(docsDir, extension).map((entry) => entry.location);
}

/**
 * Read the text of each file.
 */
export function readSources(files: DocumentFile[]): SourceDocument[] {
  return files.map(({ location, file }) => ({
    location,
    file,
    content: fs.readFileSync(file, "utf-8"),
  }));
}

function claimOrThrow(
  assignments: Assignments,
  identifier: Identifier,
  location: Location,
): void {
  const collision = claimIdentifier(assignments, identifier, location);
  if (collision) {
    throw new IdentifierCollisionError(
      collision.identifier,
      collision.existing,
      collision.conflicting,
    );
  }
}

/**
 * Decide identifiers for a set of documents.
 *
 * Identifiers already stored in headers are registered first, in scan
 * order, so a generated candidate can never take a stored identifier's
 * place. Any collision aborts the whole plan.
 */
export function planScan(sources: SourceDocument[], options: ScanOptions): ScanPlan {
  const assign = options.assign ?? true;
  const assignments: Assignments = new Map();
  const documents: TrackedDocument[] = [];
  const writes: PendingWrite[] = [];
  const diagnostics: Diagnostic[] = [];
  const untracked: Array<{ source: SourceDocument; document: ParsedDocument }> = [];

  for (const source of sources) {
    const parsed = parseDocument(source.content);
    if (!parsed.ok) {
      diagnostics.push({
        kind: "malformed-header",
        location: source.location,
        message: `Cannot parse front matter: ${parsed.reason}`,
      });
      continue;
    }

    const field = readIdentifier(parsed.document, options.idKey);
    if (field.state === "invalid") {
      diagnostics.push({
        kind: "invalid-identifier",
        location: source.location,
        message: `Field '${options.idKey}' ${field.reason}`,
      });
      continue;
    }

    if (field.state === "present") {
      claimOrThrow(assignments, field.identifier, source.location);
      documents.push({
        identifier: field.identifier,
        location: source.location,
        origin: "header",
      });
    } else {
      untracked.push({ source, document: parsed.document });
    }
  }

  for (const { source, document } of untracked) {
    if (!assign) {
      diagnostics.push({
        kind: "untracked-document",
        location: source.location,
        message: `No '${options.idKey}' field; run "waymark prepare" to assign one`,
      });
      continue;
    }

    const generated = generateIdentifier(source.location, options.extension);
    if (!generated.ok) {
      diagnostics.push(generated.diagnostic);
      continue;
    }

    claimOrThrow(assignments, generated.identifier, source.location);
    documents.push({
      identifier: generated.identifier,
      location: source.location,
      origin: "generated",
    });
    writes.push({
      location: source.location,
      file: source.file,
      identifier: generated.identifier,
      before: source.content,
      after: withIdentifier(document, options.idKey, generated.identifier),
    });
  }

  documents.sort((a, b) => compareCodePoints(a.location, b.location));

  return { documents, writes, diagnostics, assignments };
}

/**
 * List, read and plan the tree under `docsDir`. Two files whose names only
 * differ in Unicode normalization share a location; the second one is
 * reported and left out.
 */
export function scanTree(docsDir: string, options: ScanOptions): {
  sources: SourceDocument[];
  plan: ScanPlan;
} {
  const files: DocumentFile[] = [];
  const duplicates: Diagnostic[] = [];

  for (const entry of listDocumentFiles(docsDir, options.extension)) {
    const previous = files[files.length - 1];
    if (previous !== undefined && previous.location === entry.location) {
      duplicates.push({
        kind: "invalid-location",
        location: entry.location,
        message: `${entry.file} has the same normalized name as ${previous.file}`,
      });
      continue;
    }
    files.push(entry);
  }

  const sources = readSources(files);
  const plan = planScan(sources, options);
  return { sources, plan: { ...plan, diagnostics: [...duplicates, ...plan.diagnostics] } };
}

/**
 * Write planned headers. Returns the number of files written.
 */
export function applyScan(docsDir: string, plan: ScanPlan): number {
  for (const write of plan.writes) {
    fs.writeFileSync(write.file ?? toFilePath(docsDir, write.location), write.after);
  }
  return plan.writes.length;
}

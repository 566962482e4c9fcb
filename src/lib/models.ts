/**
 * Core data models for waymark.
 *
 * A documentation tree is tracked as a set of documents, each carrying a
 * permanent identifier in its front matter. Snapshots map identifiers to
 * locations; comparing two snapshots yields redirect rules.
 */

/**
 * Stable, human-readable document name (e.g., "concepts-intro").
 * Assigned once and never changed by later moves.
 */
export type Identifier = string;

/**
 * Normalized path of a document relative to the documentation root
 * (e.g., "concepts/intro.md"). Always uses "/" and never contains "." or
 * ".." segments.
 */
export type Location = string;

/**
 * Identifier -> location mapping captured at one point in time.
 */
export interface Snapshot {
  /** Artifact format version */
  version: number;
  /** ISO 8601 capture timestamp */
  capturedAt: string;
  /** Tracked documents */
  documents: ReadonlyMap<Identifier, Location>;
}

/**
 * "Requests for `from` must resolve to `to`."
 */
export interface RedirectRule {
  from: Location;
  to: Location;
}

/**
 * Kinds of per-document problems. None of them aborts a run.
 * - malformed-header: front matter could not be parsed
 * - invalid-identifier: identifier field holds a non-scalar value
 * - invalid-location: path cannot be tracked or yields no identifier
 * - untracked-document: document has no identifier yet
 * - unresolved-reference: reference target has no identifier, or an
 *   identifier reference names an unknown document
 * - removed-document: a previously tracked document disappeared
 */
export type DiagnosticKind =
  | "malformed-header"
  | "invalid-identifier"
  | "invalid-location"
  | "untracked-document"
  | "unresolved-reference"
  | "removed-document";

/**
 * A recoverable problem attached to one document.
 */
export interface Diagnostic {
  kind: DiagnosticKind;
  /** Location of the affected document */
  location: Location;
  message: string;
  /** Identifier involved, if any */
  identifier?: Identifier;
  /** Reference text involved, if any */
  reference?: string;
}

/**
 * Project configuration from waymark.toml.
 */
export interface ProjectConfig {
  /** Documentation root, relative to the project root */
  docs_dir: string;
  /** Snapshot artifact, relative to the project root */
  snapshot_file: string;
  /** Front matter field holding the identifier */
  id_key: string;
  /** Tracked content extension */
  extension: string;
  /** Macro name used by identifier references */
  macro: string;
}

/**
 * Default project configuration values.
 */
export const DEFAULT_CONFIG: ProjectConfig = {
  docs_dir: "docs",
  snapshot_file: "redirect_map.json",
  id_key: "id",
  extension: ".md",
  macro: "internal_link",
};

/**
 * Process exit codes.
 * WARNINGS means the run finished but reported per-document problems.
 */
export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE_ERROR: 2,
  DATA_ERROR: 3,
  WARNINGS: 4,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Options accepted by every command.
 */
export interface GlobalOptions {
  root?: string;
  docsDir?: string;
  snapshot?: string;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

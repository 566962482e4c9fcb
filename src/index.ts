/**
 * waymark - permanent identifiers for Markdown documentation.
 *
 * This is the library entry point for programmatic usage, e.g. from a
 * site generator hook. For CLI usage, see cli.ts.
 */

// Re-export models
export * from "./lib/models.js";

// Re-export errors
export {
  WaymarkError,
  IdentifierCollisionError,
  SnapshotMissingError,
  SnapshotCorruptError,
  ConsistencyError,
  ConfigError,
} from "./lib/errors.js";

// Re-export configuration
export { CONFIG_FILE, loadConfig, resolveWorkspace } from "./lib/config.js";
export type { Workspace } from "./lib/config.js";

// Re-export locations and identifiers
export {
  normalizeLocation,
  resolveRelativeTarget,
  relativeReference,
  compareCodePoints,
} from "./lib/location.js";
export {
  generateIdentifier,
  claimIdentifier,
  invertAssignments,
} from "./lib/identifiers.js";

// Re-export front matter access
export {
  parseDocument,
  readIdentifier,
  withIdentifier,
  serializeDocument,
} from "./lib/frontmatter.js";

// Re-export scanning and snapshots
export {
  listDocuments,
  listDocumentFiles,
  readSources,
  planScan,
  scanTree,
  applyScan,
} from "./lib/scanner.js";
export {
  createSnapshot,
  serializeSnapshot,
  parseSnapshot,
  loadSnapshot,
  saveSnapshot,
  SNAPSHOT_VERSION,
} from "./lib/snapshot.js";

// Re-export diffing and redirects
export { diffSnapshots } from "./lib/diff.js";
export {
  synthesizeRedirects,
  toRedirectMap,
  mergeRedirectMaps,
} from "./lib/redirects.js";

// Re-export reference rewriting
export {
  convertToIdentifiers,
  resolveIdentifiers,
  createLinkResolver,
} from "./lib/rewriter.js";
export { planConversion, applyConversion } from "./lib/conversion.js";
export { runBuild, writeRendered, writeRedirectsFile } from "./lib/build.js";

// Re-export types
export type { GenerateResult, Collision, Assignments } from "./lib/identifiers.js";
export type { ParsedDocument, DocumentHeader, HeaderField, IdentifierField } from "./lib/frontmatter.js";
export type { DocumentFile, SourceDocument, TrackedDocument, PendingWrite, ScanOptions, ScanPlan } from "./lib/scanner.js";
export type { SnapshotDiff, TrackedEntry, MovedEntry } from "./lib/diff.js";
export type { RedirectPlan, RedirectMap } from "./lib/redirects.js";
export type { LinkResolver, RewriteResult, ReferenceChange, ConvertContext, ResolveContext } from "./lib/rewriter.js";
export type { ConversionOptions, ConversionPlan, ConvertedDocument } from "./lib/conversion.js";
export type { BuildOptions, BuildResult, RenderedDocument } from "./lib/build.js";

/**
 * Build-time pass.
 *
 * Loads the before-snapshot written by `waymark prepare`, re-scans the
 * (possibly reorganized) tree in memory, and from the difference derives
 * redirect rules and the link resolver used to render identifier
 * references. Nothing under the documentation root is modified.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { WaymarkError } from "./errors.js";
import { diffSnapshots, type SnapshotDiff } from "./diff.js";
import { toFilePath } from "./location.js";
import { ExitCodes, type Diagnostic, type Location, type RedirectRule, type Snapshot } from "./models.js";
import { mergeRedirectMaps, synthesizeRedirects, type RedirectMap, type RedirectPlan } from "./redirects.js";
import { createLinkResolver, resolveIdentifiers, type LinkResolver, type ReferenceChange } from "./rewriter.js";
import { scanTree, type ScanPlan } from "./scanner.js";
import { loadSnapshot } from "./snapshot.js";

export interface BuildOptions {
  docsDir: string;
  snapshotPath: string;
  idKey: string;
  extension: string;
  macro: string;
}

/**
 * A document with its identifier references resolved.
 */
export interface RenderedDocument {
  location: Location;
  content: string;
  changes: ReferenceChange[];
}

export interface BuildResult {
  before: Snapshot;
  /** In-memory after-scan; new documents carry generated identifiers */
  after: ScanPlan;
  diff: SnapshotDiff;
  redirects: RedirectPlan;
  rendered: RenderedDocument[];
  /** Scan, removal and reference diagnostics, in that order */
  diagnostics: Diagnostic[];
  /** Render-time resolver over the after-scan */
  resolve: LinkResolver;
}

const RedirectsFileSchema = z
  .object({ redirect_maps: z.record(z.string(), z.string()).default({}) })
  .passthrough();

/**
 * Run the build-time pass.
 */
export function runBuild(options: BuildOptions): BuildResult {
  const before = loadSnapshot(options.snapshotPath);
  const { sources, plan } = scanTree(options.docsDir, {
    idKey: options.idKey,
    extension: options.extension,
  });

  const diff = diffSnapshots(before.documents, plan.assignments);
  const redirects = synthesizeRedirects(diff);
  const resolve = createLinkResolver(plan.assignments);

  const diagnostics: Diagnostic[] = [...plan.diagnostics, ...redirects.warnings];
  const rendered: RenderedDocument[] = [];

  for (const source of sources) {
    const result = resolveIdentifiers(source.content, {
      location: source.location,
      resolve,
      macro: options.macro,
    });
    rendered.push({
      location: source.location,
      content: result.body,
      changes: result.changes,
    });
    diagnostics.push(...result.diagnostics);
  }

  return { before, after: plan, diff, redirects, rendered, diagnostics, resolve };
}

/**
 * Write rendered documents under `outDir`, mirroring the source tree.
 * Returns the number of files written.
 */
export function writeRendered(outDir: string, rendered: RenderedDocument[]): number {
  for (const document of rendered) {
    const target = toFilePath(outDir, document.location);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, document.content);
  }
  return rendered.length;
}

/**
 * Merge `rules` into the `redirect_maps` of a JSON redirects file,
 * creating it when absent. Other top-level keys are kept.
 */
export function writeRedirectsFile(filePath: string, rules: RedirectRule[]): RedirectMap {
  let existing: z.infer<typeof RedirectsFileSchema> = { redirect_maps: {} };

  if (fs.existsSync(filePath)) {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new WaymarkError(`Cannot read ${filePath}: ${message}`, ExitCodes.DATA_ERROR);
    }
    const parsed = RedirectsFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new WaymarkError(
        `${filePath} must hold an object with a "redirect_maps" object`,
        ExitCodes.DATA_ERROR,
      );
    }
    existing = parsed.data;
  }

  const redirectMaps = mergeRedirectMaps(existing.redirect_maps, rules);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(
    filePath,
    JSON.stringify({ ...existing, redirect_maps: redirectMaps }, null, 2) + "\n",
  );
  return redirectMaps;
}

/**
 * waymark build - Compare the tree against the before-snapshot.
 *
 * Reports moved, added and removed documents, prints the redirect rules
 * for every move, and resolves identifier links. With --out the resolved
 * documents are written to a separate directory; with --redirects-file the
 * rules are merged into that file's `redirect_maps`.
 *
 * The sources and the snapshot are never modified.
 */

import * as path from "node:path";
import { Command } from "commander";
import { runBuild, writeRedirectsFile, writeRendered } from "../lib/build.js";
import { resolveWorkspace } from "../lib/config.js";
import { ConfigError } from "../lib/errors.js";
import type { GlobalOptions } from "../lib/models.js";
import {
  countUnresolved,
  exitCodeFor,
  formatDiagnostics,
  formatRules,
  formatSummary,
  reportError,
  statusFor,
  type RunSummary,
} from "../lib/output.js";

export const buildCommand = new Command("build")
  .description("Derive redirects for moved documents and resolve identifier links")
  .option("--out <dir>", "write resolved documents to this directory")
  .option("--redirects-file <path>", "merge redirect rules into this JSON file")
  .action(
    (options: { out?: string; redirectsFile?: string }, command: Command) => {
      const globalOpts = command.parent?.opts<GlobalOptions>() ?? {};

      try {
        const workspace = resolveWorkspace(globalOpts);
        const { config } = workspace;

        if (options.out && path.resolve(options.out) === workspace.docsDir) {
          throw new ConfigError("--out must not be the documentation directory");
        }

        const result = runBuild({
          docsDir: workspace.docsDir,
          snapshotPath: workspace.snapshotPath,
          idKey: config.id_key,
          extension: config.extension,
          macro: config.macro,
        });
        const { diff, redirects, diagnostics } = result;

        if (options.out) {
          const written = writeRendered(path.resolve(options.out), result.rendered);
          if (globalOpts.verbose && !globalOpts.json) {
            console.error(`Wrote ${written} documents to ${path.resolve(options.out)}`);
          }
        }
        if (options.redirectsFile) {
          writeRedirectsFile(path.resolve(options.redirectsFile), redirects.rules);
        }

        const summary: RunSummary = {
          unchanged: diff.unchanged.length,
          moved: diff.moved.length,
          added: diff.added.length,
          removed: diff.removed.length,
          unresolved: countUnresolved(diagnostics),
          skipped: result.after.diagnostics.length,
        };

        if (globalOpts.json) {
          console.log(
            JSON.stringify({
              status: statusFor(diagnostics),
              ...summary,
              rules: redirects.rules,
              diff,
              diagnostics,
            }),
          );
        } else {
          console.log(formatRules(redirects.rules));
          if (diagnostics.length > 0) {
            console.error(formatDiagnostics(diagnostics));
          }
          if (!globalOpts.quiet) {
            console.log(formatSummary(summary));
          }
        }

        process.exit(exitCodeFor(diagnostics));
      } catch (err) {
        process.exit(reportError(err, globalOpts.json));
      }
    },
  );

/**
 * waymark prepare - Assign identifiers and record the before-snapshot.
 *
 * Every document without an identifier gets one derived from its current
 * location, written into its front matter. The identifier -> location
 * mapping is then saved as the snapshot that later builds compare against.
 *
 * --dry-run prints the header changes that would be made and writes
 * nothing. A collision aborts before any file is touched.
 */

import { Command } from "commander";
import { resolveWorkspace } from "../lib/config.js";
import type { GlobalOptions } from "../lib/models.js";
import {
  exitCodeFor,
  formatDiagnostics,
  formatPreview,
  formatSummary,
  reportError,
  statusFor,
  type RunSummary,
} from "../lib/output.js";
import { applyScan, scanTree } from "../lib/scanner.js";
import { createSnapshot, saveSnapshot } from "../lib/snapshot.js";

export const prepareCommand = new Command("prepare")
  .description("Assign permanent identifiers and save the before-snapshot")
  .option("--dry-run", "show the changes without writing anything")
  .action((options: { dryRun?: boolean }, command: Command) => {
    const globalOpts = command.parent?.opts<GlobalOptions>() ?? {};
    const dryRun = options.dryRun === true;

    try {
      const workspace = resolveWorkspace(globalOpts);
      const { config } = workspace;

      if (!globalOpts.quiet && !globalOpts.json) {
        console.error(`Scanning ${workspace.docsDir}...`);
      }

      const { plan } = scanTree(workspace.docsDir, {
        idKey: config.id_key,
        extension: config.extension,
      });

      if (globalOpts.verbose && !globalOpts.json) {
        for (const document of plan.documents) {
          const verb = document.origin === "generated" ? "Assigning" : "Found existing";
          console.error(`  - ${verb} '${document.identifier}' in ${document.location}`);
        }
      }

      if (!dryRun) {
        applyScan(workspace.docsDir, plan);
        saveSnapshot(workspace.snapshotPath, createSnapshot(plan.assignments));
      }

      const summary: RunSummary = {
        assigned: plan.writes.length,
        existing: plan.documents.length - plan.writes.length,
        skipped: plan.diagnostics.length,
      };

      if (globalOpts.json) {
        console.log(
          JSON.stringify({
            status: statusFor(plan.diagnostics),
            dry_run: dryRun,
            snapshot: workspace.snapshotPath,
            ...summary,
            assignments: plan.writes.map((write) => ({
              id: write.identifier,
              path: write.location,
            })),
            diagnostics: plan.diagnostics,
          }),
        );
      } else {
        if (dryRun) {
          console.log(formatPreview(plan.writes));
          console.log("");
          console.log(`Would write snapshot: ${workspace.snapshotPath}`);
        } else if (!globalOpts.quiet) {
          console.log(`Snapshot saved to ${workspace.snapshotPath}`);
        }
        if (plan.diagnostics.length > 0) {
          console.error(formatDiagnostics(plan.diagnostics));
        }
        if (!globalOpts.quiet) {
          console.log(formatSummary(summary));
        }
      }

      process.exit(exitCodeFor(plan.diagnostics));
    } catch (err) {
      process.exit(reportError(err, globalOpts.json));
    }
  });

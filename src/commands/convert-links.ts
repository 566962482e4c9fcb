/**
 * waymark convert-links - Rewrite relative links as identifier links.
 *
 * `[Intro](../concepts/intro.md)` becomes
 * `[Intro]({{ internal_link('concepts-intro') }})`, which keeps working
 * however the tree is reorganized. Only identifiers already stored in
 * front matter are used, so run `waymark prepare` first.
 */

import { Command } from "commander";
import { resolveWorkspace } from "../lib/config.js";
import { applyConversion, planConversion } from "../lib/conversion.js";
import type { GlobalOptions } from "../lib/models.js";
import {
  countUnresolved,
  exitCodeFor,
  formatDiagnostics,
  formatSummary,
  reportError,
  statusFor,
  type RunSummary,
} from "../lib/output.js";

export const convertLinksCommand = new Command("convert-links")
  .description("Convert relative links between documents into identifier links")
  .option("--dry-run", "show the conversions without writing anything")
  .action((options: { dryRun?: boolean }, command: Command) => {
    const globalOpts = command.parent?.opts<GlobalOptions>() ?? {};
    const dryRun = options.dryRun === true;

    try {
      const workspace = resolveWorkspace(globalOpts);
      const { config } = workspace;

      const plan = planConversion(workspace.docsDir, {
        idKey: config.id_key,
        extension: config.extension,
        macro: config.macro,
      });
      const { diagnostics } = plan;
      const converted = plan.documents;

      if (!dryRun) {
        applyConversion(workspace.docsDir, plan);
      }

      const summary: RunSummary = {
        converted: converted.reduce((sum, entry) => sum + entry.changes.length, 0),
        unresolved: countUnresolved(diagnostics),
      };

      if (globalOpts.json) {
        console.log(
          JSON.stringify({
            status: statusFor(diagnostics),
            dry_run: dryRun,
            ...summary,
            documents: converted.map((entry) => ({
              path: entry.location,
              changes: entry.changes,
            })),
            diagnostics,
          }),
        );
      } else {
        if (dryRun || globalOpts.verbose) {
          for (const entry of converted) {
            console.log(`${entry.location}:`);
            for (const change of entry.changes) {
              console.log(`  ${change.from} -> ${change.to}`);
            }
          }
        }
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
  });

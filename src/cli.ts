#!/usr/bin/env node
/**
 * waymark CLI entry point.
 *
 * Permanent identifiers for Markdown documentation, so pages can move
 * without breaking links.
 */

import { Command } from "commander";
import { ExitCodes } from "./lib/models.js";
import { prepareCommand } from "./commands/prepare.js";
import { convertLinksCommand } from "./commands/convert-links.js";
import { buildCommand } from "./commands/build.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("waymark")
  .description("Permanent document identifiers and redirects for Markdown documentation")
  .version(VERSION, "-V, --version", "output the version number")
  .option("--root <path>", "project root containing waymark.toml")
  .option("--docs-dir <path>", "documentation directory (overrides docs_dir)")
  .option("--snapshot <path>", "snapshot file (overrides snapshot_file)")
  .option("--json", "output in JSON format")
  .option("-q, --quiet", "suppress non-essential output")
  .option("-v, --verbose", "show detailed output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.quiet && opts.verbose) {
      console.error("Error: --quiet and --verbose are mutually exclusive");
      process.exit(ExitCodes.USAGE_ERROR);
    }
  });

// Register commands
program.addCommand(prepareCommand);
program.addCommand(convertLinksCommand);
program.addCommand(buildCommand);

// Handle unknown commands
program.on("command:*", () => {
  console.error(`Error: Unknown command '${program.args[0]}'`);
  console.error('Run "waymark --help" for available commands.');
  process.exit(ExitCodes.USAGE_ERROR);
});

// Parse and execute
program.parseAsync(process.argv).catch((err: Error) => {
  if (process.env.DEBUG) {
    console.error(err);
  } else {
    console.error(`Error: ${err.message}`);
  }
  process.exit(ExitCodes.FAILURE);
});

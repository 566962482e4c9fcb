/**
 * Project configuration.
 *
 * Settings come from an optional waymark.toml in the project root, then
 * from command-line overrides. Paths in the file are relative to the
 * project root.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import toml from "toml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_CONFIG, type ProjectConfig } from "./models.js";

/** Config file name */
export const CONFIG_FILE = "waymark.toml";

const ConfigFileSchema = z
  .object({
    docs_dir: z.string().min(1),
    snapshot_file: z.string().min(1),
    id_key: z.string().regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, "must be a plain YAML key"),
    extension: z.string().regex(/^\.[^./\\]+$/, 'must look like ".md"'),
    macro: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a macro name"),
  })
  .partial()
  .strict();

/**
 * Resolved locations and settings for one run.
 */
export interface Workspace {
  /** Absolute project root */
  rootPath: string;
  /** Absolute documentation root */
  docsDir: string;
  /** Absolute snapshot artifact path */
  snapshotPath: string;
  config: ProjectConfig;
}

/**
 * Load waymark.toml from `rootPath`. A missing file gives the defaults; a
 * file that does not parse or validate is an error.
 */
export function loadConfig(rootPath: string): ProjectConfig {
  const configPath = path.join(rootPath, CONFIG_FILE);
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = toml.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse ${configPath}: ${message}`);
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join(".") || "(root)";
    throw new ConfigError(`Invalid ${configPath}: ${field} ${issue.message}`);
  }

  return { ...DEFAULT_CONFIG, ...result.data };
}

/**
 * Resolve the workspace from command options.
 *
 * Resolution order:
 * 1. --docs-dir / --snapshot, relative to the current directory
 * 2. waymark.toml in --root (or the current directory)
 * 3. defaults
 */
export function resolveWorkspace(options: {
  root?: string;
  docsDir?: string;
  snapshot?: string;
}): Workspace {
  const rootPath = options.root ? path.resolve(options.root) : process.cwd();
  const config = loadConfig(rootPath);

  const docsDir = options.docsDir
    ? path.resolve(options.docsDir)
    : path.resolve(rootPath, config.docs_dir);
  const snapshotPath = options.snapshot
    ? path.resolve(options.snapshot)
    : path.resolve(rootPath, config.snapshot_file);

  return { rootPath, docsDir, snapshotPath, config };
}

/**
 * Human-readable output: dry-run previews, diagnostics and run summaries.
 * Machine output (--json) is assembled by each command from the same data.
 */

import { WaymarkError } from "./errors.js";
import { ExitCodes, type Diagnostic, type ExitCode, type RedirectRule } from "./models.js";
import type { PendingWrite } from "./scanner.js";

/** Lines of context shown around a change */
const CONTEXT_LINES = 3;

/**
 * Counts reported at the end of a run. Commands fill in what applies.
 */
export interface RunSummary {
  assigned?: number;
  existing?: number;
  converted?: number;
  unchanged?: number;
  moved?: number;
  added?: number;
  removed?: number;
  unresolved?: number;
  skipped?: number;
}

const SUMMARY_LABELS: Array<[keyof RunSummary, string]> = [
  ["assigned", "Identifiers assigned"],
  ["existing", "Identifiers already present"],
  ["converted", "References converted"],
  ["unchanged", "Documents unchanged"],
  ["moved", "Documents moved"],
  ["added", "Documents added"],
  ["removed", "Documents removed"],
  ["unresolved", "Unresolved references"],
  ["skipped", "Documents skipped"],
];

function toLines(text: string): string[] {
  const lines = text.split("\n").map((line) => line.replace(/\r$/, ""));
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Single-hunk unified diff between two versions of a document. Header
 * changes are always one contiguous block, so one hunk covers them.
 */
export function formatLineDiff(label: string, before: string, after: string): string {
  const oldLines = toLines(before);
  const newLines = toLines(after);
  const limit = Math.min(oldLines.length, newLines.length);

  let prefix = 0;
  while (prefix < limit && oldLines[prefix] === newLines[prefix]) {
    prefix++;
  }
  let suffix = 0;
  while (
    suffix < limit - prefix &&
    oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
  ) {
    suffix++;
  }

  const removed = oldLines.slice(prefix, oldLines.length - suffix);
  const added = newLines.slice(prefix, newLines.length - suffix);
  const leading = oldLines.slice(Math.max(0, prefix - CONTEXT_LINES), prefix);
  const trailing = oldLines.slice(
    oldLines.length - suffix,
    oldLines.length - suffix + CONTEXT_LINES,
  );

  const start = prefix - leading.length + 1;
  const oldCount = leading.length + removed.length + trailing.length;
  const newCount = leading.length + added.length + trailing.length;

  return [
    `--- ${label}`,
    `+++ ${label}`,
    `@@ -${start},${oldCount} +${start},${newCount} @@`,
    ...leading.map((line) => ` ${line}`),
    ...removed.map((line) => `-${line}`),
    ...added.map((line) => `+${line}`),
    ...trailing.map((line) => ` ${line}`),
  ].join("\n");
}

/**
 * Preview of planned header writes.
 */
export function formatPreview(writes: PendingWrite[]): string {
  if (writes.length === 0) {
    return "No documents need an identifier.";
  }
  return writes
    .map((write) => formatLineDiff(write.location, write.before, write.after))
    .join("\n\n");
}

/**
 * One line per diagnostic.
 */
export function formatDiagnostics(diagnostics: Diagnostic[]): string {
  return diagnostics
    .map((diagnostic) => `warning[${diagnostic.kind}] ${diagnostic.location}: ${diagnostic.message}`)
    .join("\n");
}

/**
 * Redirect rules, one per line.
 */
export function formatRules(rules: RedirectRule[]): string {
  if (rules.length === 0) {
    return "No redirect rules.";
  }
  return [
    `Redirect rules (${rules.length}):`,
    ...rules.map((rule) => `  ${rule.from} -> ${rule.to}`),
  ].join("\n");
}

/**
 * Summary counts, in a fixed order.
 */
export function formatSummary(summary: RunSummary): string {
  const lines: string[] = [];
  for (const [key, label] of SUMMARY_LABELS) {
    const value = summary[key];
    if (value !== undefined) {
      lines.push(`${label}: ${value}`);
    }
  }
  return lines.join("\n");
}

export function countUnresolved(diagnostics: Diagnostic[]): number {
  return diagnostics.filter((diagnostic) => diagnostic.kind === "unresolved-reference").length;
}

/**
 * Exit status of a run that completed: warnings when any diagnostic was
 * reported.
 */
export function exitCodeFor(diagnostics: Diagnostic[]): ExitCode {
  return diagnostics.length > 0 ? ExitCodes.WARNINGS : ExitCodes.SUCCESS;
}

export function statusFor(diagnostics: Diagnostic[]): "success" | "warnings" {
  return diagnostics.length > 0 ? "warnings" : "success";
}

/**
 * Print an error and return the exit code it maps to.
 */
export function reportError(err: unknown, json = false): ExitCode {
  const message = err instanceof Error ? err.message : String(err);
  const exitCode = err instanceof WaymarkError ? err.exitCode : ExitCodes.FAILURE;

  if (json) {
    console.log(JSON.stringify({ status: "error", error: message }));
  } else if (process.env.DEBUG) {
    console.error(err);
  } else {
    console.error(`Error: ${message}`);
  }

  return exitCode;
}

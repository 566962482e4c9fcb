/**
 * Tests for human-readable output.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  formatLineDiff,
  formatPreview,
  formatDiagnostics,
  formatRules,
  formatSummary,
  countUnresolved,
  exitCodeFor,
  reportError,
} from "./output.js";
import { ExitCodes, type Diagnostic } from "./models.js";
import { SnapshotMissingError } from "./errors.js";

describe("formatLineDiff", () => {
  it("should show the added identifier line with context", () => {
    const text = formatLineDiff(
      "guide/install.md",
      "---\ntitle: Install\n---\nBody\n",
      "---\ntitle: Install\nid: guide-install\n---\nBody\n",
    );

    expect(text).toBe(
      [
        "--- guide/install.md",
        "+++ guide/install.md",
        "@@ -1,4 +1,5 @@",
        " ---",
        " title: Install",
        "+id: guide-install",
        " ---",
        " Body",
      ].join("\n"),
    );
  });

  it("should show a synthesized header", () => {
    const text = formatLineDiff("guide.md", "Body\n", "---\nid: guide\n---\nBody\n");

    expect(text.split("\n")).toEqual([
      "--- guide.md",
      "+++ guide.md",
      "@@ -1,1 +1,4 @@",
      "+---",
      "+id: guide",
      "+---",
      " Body",
    ]);
  });
});

describe("formatPreview", () => {
  it("should say when nothing needs writing", () => {
    expect(formatPreview([])).toBe("No documents need an identifier.");
  });
});

describe("formatDiagnostics", () => {
  it("should print one line per diagnostic", () => {
    const diagnostics: Diagnostic[] = [
      { kind: "malformed-header", location: "broken.md", message: "Cannot parse front matter" },
      { kind: "removed-document", location: "old/faq.md", message: "gone" },
    ];

    expect(formatDiagnostics(diagnostics)).toBe(
      "warning[malformed-header] broken.md: Cannot parse front matter\n" +
        "warning[removed-document] old/faq.md: gone",
    );
  });
});

describe("formatRules", () => {
  it("should list rules", () => {
    expect(formatRules([{ from: "old/guide.md", to: "new/guide.md" }])).toBe(
      "Redirect rules (1):\n  old/guide.md -> new/guide.md",
    );
  });

  it("should say when there are none", () => {
    expect(formatRules([])).toBe("No redirect rules.");
  });
});

describe("formatSummary", () => {
  it("should print only the counts that were set, in a fixed order", () => {
    expect(formatSummary({ removed: 1, moved: 2 })).toBe(
      "Documents moved: 2\nDocuments removed: 1",
    );
  });
});

describe("exit status", () => {
  const unresolved: Diagnostic = {
    kind: "unresolved-reference",
    location: "a.md",
    message: "x",
  };

  it("should report warnings when diagnostics exist", () => {
    expect(exitCodeFor([])).toBe(ExitCodes.SUCCESS);
    expect(exitCodeFor([unresolved])).toBe(ExitCodes.WARNINGS);
  });

  it("should count unresolved references", () => {
    expect(
      countUnresolved([unresolved, { kind: "removed-document", location: "b.md", message: "y" }]),
    ).toBe(1);
  });
});

describe("reportError", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should map waymark errors to their exit code", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});

    const code = reportError(new SnapshotMissingError("redirect_map.json"), true);

    expect(code).toBe(ExitCodes.DATA_ERROR);
    expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({
      status: "error",
      error: 'Snapshot not found at redirect_map.json. Run "waymark prepare" first.',
    });
  });

  it("should treat unknown errors as failures", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});

    expect(reportError(new Error("boom"))).toBe(ExitCodes.FAILURE);
  });
});

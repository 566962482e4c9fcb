/**
 * Tests for tree scanning and identifier assignment.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  listDocuments,
  listDocumentFiles,
  planScan,
  scanTree,
  applyScan,
} from "./scanner.js";
import { ConfigError, IdentifierCollisionError } from "./errors.js";

const OPTIONS = { idKey: "id", extension: ".md" };

describe("planScan", () => {
  it("should keep stored identifiers and generate missing ones", () => {
    const plan = planScan(
      [
        { location: "concepts/intro.md", content: "---\ntitle: Intro\n---\nBody\n" },
        { location: "how-to/routing.md", content: "---\nid: routing\n---\n" },
      ],
      OPTIONS,
    );

    expect(plan.documents).toEqual([
      { identifier: "concepts-intro", location: "concepts/intro.md", origin: "generated" },
      { identifier: "routing", location: "how-to/routing.md", origin: "header" },
    ]);
    expect(plan.writes).toEqual([
      {
        location: "concepts/intro.md",
        identifier: "concepts-intro",
        before: "---\ntitle: Intro\n---\nBody\n",
        after: "---\ntitle: Intro\nid: concepts-intro\n---\nBody\n",
      },
    ]);
    expect([...plan.assignments]).toEqual([
      ["routing", "how-to/routing.md"],
      ["concepts-intro", "concepts/intro.md"],
    ]);
    expect(plan.diagnostics).toEqual([]);
  });

  it("should register stored identifiers before generating new ones", () => {
    const sources = [
      { location: "a-b.md", content: "Body\n" },
      { location: "z.md", content: "---\nid: a-b\n---\n" },
    ];

    expect(() => planScan(sources, OPTIONS)).toThrow(
      "Identifier 'a-b' is claimed by both z.md and a-b.md",
    );
  });

  it("should abort when two locations generate the same identifier", () => {
    const sources = [
      { location: "a b.md", content: "" },
      { location: "a_b.md", content: "" },
    ];

    expect(() => planScan(sources, OPTIONS)).toThrow(IdentifierCollisionError);
  });

  it("should abort when two headers store the same identifier", () => {
    const sources = [
      { location: "one.md", content: "---\nid: same\n---\n" },
      { location: "two.md", content: "---\nid: same\n---\n" },
    ];

    expect(() => planScan(sources, OPTIONS)).toThrow(
      "Identifier 'same' is claimed by both one.md and two.md",
    );
  });

  it("should report a malformed header and continue", () => {
    const plan = planScan(
      [
        { location: "broken.md", content: "---\ntitle: [unclosed\n---\nBody\n" },
        { location: "ok.md", content: "Body\n" },
      ],
      OPTIONS,
    );

    expect(plan.diagnostics).toHaveLength(1);
    expect(plan.diagnostics[0].kind).toBe("malformed-header");
    expect(plan.diagnostics[0].location).toBe("broken.md");
    expect(plan.writes.map((write) => write.location)).toEqual(["ok.md"]);
    expect(plan.assignments.has("broken")).toBe(false);
  });

  it("should report identifiers that are not scalars", () => {
    const plan = planScan([{ location: "x.md", content: "---\nid: [a, b]\n---\n" }], OPTIONS);

    expect(plan.diagnostics).toEqual([
      {
        kind: "invalid-identifier",
        location: "x.md",
        message: `Field 'id' must be a string, found ["a","b"]`,
      },
    ]);
    expect(plan.documents).toEqual([]);
  });

  it("should reject an identifier that cannot be stored in the snapshot", () => {
    const plan = planScan([{ location: "a.md", content: "---\nid: __proto__\n---\n" }], OPTIONS);

    expect(plan.diagnostics).toEqual([
      {
        kind: "invalid-identifier",
        location: "a.md",
        message: `Field 'id' cannot be "__proto__"`,
      },
    ]);
    expect(plan.assignments.size).toBe(0);
  });

  it("should keep the header of a document with a byte-order mark", () => {
    const plan = planScan(
      [{ location: "hello.md", content: "\uFEFF---\ntitle: Hello\n---\nbody\n" }],
      OPTIONS,
    );

    expect(plan.writes[0].after).toBe("\uFEFF---\ntitle: Hello\nid: hello\n---\nbody\n");
  });

  it("should report locations that yield no identifier", () => {
    const plan = planScan([{ location: "!!!.md", content: "" }], OPTIONS);

    expect(plan.diagnostics.map((diagnostic) => diagnostic.kind)).toEqual(["invalid-location"]);
    expect(plan.writes).toEqual([]);
  });

  it("should only report untracked documents when assignment is off", () => {
    const plan = planScan(
      [{ location: "new.md", content: "Body\n" }],
      { ...OPTIONS, assign: false },
    );

    expect(plan.writes).toEqual([]);
    expect(plan.documents).toEqual([]);
    expect(plan.diagnostics).toEqual([
      {
        kind: "untracked-document",
        location: "new.md",
        message: `No 'id' field; run "waymark prepare" to assign one`,
      },
    ]);
  });

  it("should use the configured identifier key", () => {
    const plan = planScan([{ location: "guide.md", content: "Body\n" }], {
      idKey: "slug",
      extension: ".md",
    });

    expect(plan.writes[0].after).toBe("---\nslug: guide\n---\nBody\n");
  });
});

describe("Tree Operations", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "waymark-scan-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeDoc(location: string, content: string): void {
    const filePath = path.join(tempDir, ...location.split("/"));
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }

  describe("listDocuments", () => {
    it("should list tracked files sorted by location", () => {
      writeDoc("index.md", "");
      writeDoc("guide/b.md", "");
      writeDoc("guide/a.MD", "");
      writeDoc("guide/image.png", "");
      writeDoc(".hidden/secret.md", "");
      writeDoc("guide/.draft.md", "");

      expect(listDocuments(tempDir, ".md")).toEqual(["guide/a.MD", "guide/b.md", "index.md"]);
    });

    it("should keep the on-disk spelling of decomposed names", () => {
      writeDoc("Cafe\u0301.md", "");

      expect(listDocumentFiles(tempDir, ".md")).toEqual([
        { location: "Caf\u00e9.md", file: path.join(tempDir, "Cafe\u0301.md") },
      ]);
    });

    it("should fail when the directory does not exist", () => {
      expect(() => listDocuments(path.join(tempDir, "missing"), ".md")).toThrow(ConfigError);
    });
  });

  describe("scanTree / applyScan", () => {
    it("should write identifiers once and plan nothing on a second run", () => {
      writeDoc("index.md", "# Home\n");
      writeDoc("concepts/intro.md", "---\ntitle: Intro\n---\nBody\n");

      const first = scanTree(tempDir, OPTIONS);
      expect(applyScan(tempDir, first.plan)).toBe(2);
      expect(fs.readFileSync(path.join(tempDir, "index.md"), "utf-8")).toBe(
        "---\nid: index\n---\n# Home\n",
      );

      const second = scanTree(tempDir, OPTIONS);
      expect(second.plan.writes).toEqual([]);
      expect(second.plan.documents).toEqual([
        { identifier: "concepts-intro", location: "concepts/intro.md", origin: "header" },
        { identifier: "index", location: "index.md", origin: "header" },
      ]);
    });

    it("should read and write files stored with decomposed names", () => {
      writeDoc("Cafe\u0301.md", "Body\n");
      writeDoc("other.md", "---\nid: other\n---\n");

      const { plan } = scanTree(tempDir, OPTIONS);
      expect(plan.diagnostics).toEqual([]);
      expect(plan.assignments.get("cafe")).toBe("Caf\u00e9.md");

      applyScan(tempDir, plan);
      expect(fs.readFileSync(path.join(tempDir, "Cafe\u0301.md"), "utf-8")).toBe(
        "---\nid: cafe\n---\nBody\n",
      );
    });

    it("should leave the tree untouched when the plan is not applied", () => {
      writeDoc("index.md", "# Home\n");

      const { plan } = scanTree(tempDir, OPTIONS);

      expect(plan.writes).toHaveLength(1);
      expect(fs.readFileSync(path.join(tempDir, "index.md"), "utf-8")).toBe("# Home\n");
    });

    it("should keep the identifier after a document moves", () => {
      writeDoc("old/guide.md", "Body\n");
      applyScan(tempDir, scanTree(tempDir, OPTIONS).plan);

      fs.mkdirSync(path.join(tempDir, "new"));
      fs.renameSync(path.join(tempDir, "old", "guide.md"), path.join(tempDir, "new", "guide.md"));

      const { plan } = scanTree(tempDir, OPTIONS);
      expect(plan.assignments.get("old-guide")).toBe("new/guide.md");
      expect(plan.writes).toEqual([]);
    });
  });
});

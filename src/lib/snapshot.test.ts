/**
 * Tests for snapshot persistence.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  createSnapshot,
  serializeSnapshot,
  parseSnapshot,
  loadSnapshot,
  saveSnapshot,
  SnapshotFormatError,
} from "./snapshot.js";
import { SnapshotCorruptError, SnapshotMissingError } from "./errors.js";
import { ExitCodes } from "./models.js";

const CAPTURED = new Date("2026-01-01T00:00:00.000Z");

describe("serializeSnapshot", () => {
  it("should write documents sorted by identifier", () => {
    const snapshot = createSnapshot(
      new Map([
        ["how-to-routing", "how-to/routing.md"],
        ["concepts-intro", "concepts/intro.md"],
      ]),
      CAPTURED,
    );

    expect(serializeSnapshot(snapshot)).toBe(
      [
        "{",
        '  "version": 1,',
        '  "captured_at": "2026-01-01T00:00:00.000Z",',
        '  "documents": {',
        '    "concepts-intro": "concepts/intro.md",',
        '    "how-to-routing": "how-to/routing.md"',
        "  }",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("should write an empty snapshot", () => {
    const text = serializeSnapshot(createSnapshot(new Map(), CAPTURED));

    expect(JSON.parse(text)).toEqual({
      version: 1,
      captured_at: "2026-01-01T00:00:00.000Z",
      documents: {},
    });
  });
});

describe("parseSnapshot", () => {
  it("should read back what was written", () => {
    const documents = new Map([["intro", "intro.md"]]);
    const parsed = parseSnapshot(serializeSnapshot(createSnapshot(documents, CAPTURED)));

    expect(parsed.capturedAt).toBe("2026-01-01T00:00:00.000Z");
    expect([...parsed.documents]).toEqual([["intro", "intro.md"]]);
  });

  it("should accept a flat legacy mapping", () => {
    const parsed = parseSnapshot('{"concepts-intro": "concepts/intro.md"}');

    expect(parsed.version).toBe(1);
    expect(parsed.capturedAt).toBe("");
    expect(parsed.documents.get("concepts-intro")).toBe("concepts/intro.md");
  });

  it("should reject invalid JSON", () => {
    expect(() => parseSnapshot("{not json")).toThrow(SnapshotFormatError);
  });

  it("should reject a mapping with non-string locations", () => {
    expect(() => parseSnapshot('{"a": 1}')).toThrow(SnapshotFormatError);
  });

  it("should reject an unknown version", () => {
    expect(() =>
      parseSnapshot('{"version": 2, "captured_at": "", "documents": {}}'),
    ).toThrow(SnapshotFormatError);
  });

  it("should reject locations that are not normalized", () => {
    expect(() => parseSnapshot('{"a": "../a.md"}')).toThrow(
      "'a' has an invalid location '../a.md'",
    );
    expect(() => parseSnapshot('{"a": "x/./a.md"}')).toThrow(SnapshotFormatError);
  });

  it("should round-trip identifiers named like object members", () => {
    const documents = new Map([
      ["constructor", "constructor.md"],
      ["to-string", "toString.md"],
    ]);
    const parsed = parseSnapshot(serializeSnapshot(createSnapshot(documents, CAPTURED)));

    expect([...parsed.documents]).toEqual([...documents]);
  });

  it("should refuse a __proto__ identifier instead of dropping it", () => {
    expect(() => parseSnapshot('{"__proto__": "a.md"}')).toThrow(SnapshotFormatError);
    expect(() =>
      parseSnapshot('{"version": 1, "captured_at": "", "documents": {"__proto__": "a.md"}}'),
    ).toThrow('identifier "__proto__" is not allowed');
  });

  it("should reject two identifiers at one location", () => {
    expect(() => parseSnapshot('{"a": "x.md", "b": "x.md"}')).toThrow(
      "'a' and 'b' both point to x.md",
    );
  });
});

describe("loadSnapshot / saveSnapshot", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "waymark-snapshot-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should save and load a snapshot", () => {
    const snapshotPath = path.join(tempDir, "nested", "redirect_map.json");
    saveSnapshot(snapshotPath, createSnapshot(new Map([["a", "a.md"]]), CAPTURED));

    const loaded = loadSnapshot(snapshotPath);
    expect(loaded.documents.get("a")).toBe("a.md");
    expect(fs.readdirSync(path.dirname(snapshotPath))).toEqual(["redirect_map.json"]);
  });

  it("should fail distinctly when the snapshot is missing", () => {
    const snapshotPath = path.join(tempDir, "redirect_map.json");

    expect(() => loadSnapshot(snapshotPath)).toThrow(SnapshotMissingError);
    try {
      loadSnapshot(snapshotPath);
    } catch (err) {
      expect(err).toBeInstanceOf(SnapshotMissingError);
      if (err instanceof SnapshotMissingError) {
        expect(err.exitCode).toBe(ExitCodes.DATA_ERROR);
      }
    }
  });

  it("should fail distinctly when the snapshot is corrupt", () => {
    const snapshotPath = path.join(tempDir, "redirect_map.json");
    fs.writeFileSync(snapshotPath, "[]");

    expect(() => loadSnapshot(snapshotPath)).toThrow(SnapshotCorruptError);
  });
});

import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { canonicalizePath } from "../services/path-canonicalizer";
import { createManifestRecord } from "../value-objects/manifest-record";
import { makeTempDir, removeDir } from "../test-support/fixtures";
import { NodeManifestStore } from "./node-manifest-store";

function record(name: string) {
  const originalPath = `/music/${name}`;
  return createManifestRecord({
    originalPath,
    quarantinedPath: `/music/_Rekordbox_Orphans/${name}`,
    canonicalPath: canonicalizePath(originalPath),
    at: new Date("2024-05-01T12:00:00.000Z"),
  });
}

describe("NodeManifestStore", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    filePath = path.join(dir, "_Rekordbox_Orphans", "orphans_manifest.jsonl");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("reads a missing manifest as empty", async () => {
    const store = new NodeManifestStore(filePath);
    expect(await store.readAll()).toEqual({ records: [], corruptLines: [] });
  });

  it("appends one JSON object per line, creating the directory", async () => {
    const store = new NodeManifestStore(filePath);
    await store.append(record("a.mp3"));
    await store.append(record("b.mp3"));

    const content = await fs.readFile(filePath, "utf-8");
    expect(content).toBe(
      JSON.stringify(record("a.mp3")) + "\n" + JSON.stringify(record("b.mp3")) + "\n"
    );

    const { records, corruptLines } = await store.readAll();
    expect(records).toEqual([record("a.mp3"), record("b.mp3")]);
    expect(corruptLines).toEqual([]);
  });

  it("writes the documented field names", async () => {
    const store = new NodeManifestStore(filePath);
    await store.append(record("a.mp3"));

    const [line] = (await fs.readFile(filePath, "utf-8")).split("\n");
    expect(JSON.parse(line ?? "")).toEqual({
      original_path: "/music/a.mp3",
      quarantined_path: "/music/_Rekordbox_Orphans/a.mp3",
      timestamp: "2024-05-01T12:00:00.000Z",
      canonical_path: "/music/a.mp3",
    });
  });

  it("starts a new line after a torn last line", async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '{"original_path":"/music/x.mp3","quarantined_pa');

    const store = new NodeManifestStore(filePath);
    await store.append(record("a.mp3"));

    const { records, corruptLines } = await store.readAll();
    expect(records).toEqual([record("a.mp3")]);
    expect(corruptLines).toHaveLength(1);
    expect(corruptLines[0]?.lineNumber).toBe(1);
    expect(corruptLines[0]?.reason).toMatch(/^unparseable JSON \(/);
  });

  it("skips blank lines and reports invalid records by line number", async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(
      filePath,
      [
        "",
        JSON.stringify(record("a.mp3")),
        "{}",
        "[1,2]",
        JSON.stringify({ original_path: "/x", quarantined_path: "/q" }),
        JSON.stringify({ original_path: "/x", quarantined_path: "/q", timestamp: "t", canonical_path: 7 }),
        "",
      ].join("\n")
    );

    const { records, corruptLines } = await new NodeManifestStore(filePath).readAll();

    expect(records).toEqual([record("a.mp3")]);
    expect(corruptLines).toEqual([
      { lineNumber: 3, reason: 'missing or empty "original_path"' },
      { lineNumber: 4, reason: "not a JSON object" },
      { lineNumber: 5, reason: 'missing or empty "timestamp"' },
      { lineNumber: 6, reason: 'empty or non-string "canonical_path"' },
    ]);
  });

  it("accepts records without canonical_path and ignores unknown fields", async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(
      filePath,
      JSON.stringify({
        original_path: "/music/a.mp3",
        quarantined_path: "/music/_Rekordbox_Orphans/a.mp3",
        timestamp: "2024-05-01T12:00:00.000Z",
        size_bytes: 16,
      }) + "\n"
    );

    const { records, corruptLines } = await new NodeManifestStore(filePath).readAll();

    expect(corruptLines).toEqual([]);
    expect(records).toEqual([
      {
        original_path: "/music/a.mp3",
        quarantined_path: "/music/_Rekordbox_Orphans/a.mp3",
        timestamp: "2024-05-01T12:00:00.000Z",
      },
    ]);
  });
});

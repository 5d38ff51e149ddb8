import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { makeTempDir, removeDir, touch } from "../test-support/fixtures";
import { moveFile, pathExists } from "./node-fs";

function systemError(code: string) {
  return Object.assign(new Error(`${code}: simulated`), { code });
}

describe("node-fs", () => {
  let dir: string;
  const at = (name: string) => path.join(dir, name);

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it("reports whether a path exists", async () => {
    await touch(at("a.mp3"));

    expect(await pathExists(at("a.mp3"))).toBe(true);
    expect(await pathExists(at("b.mp3"))).toBe(false);
    expect(await pathExists(path.join(at("a.mp3"), "child"))).toBe(false);
  });

  it("sees a dangling symlink as existing", async () => {
    await fs.symlink(at("target.mp3"), at("link.mp3"));
    expect(await pathExists(at("link.mp3"))).toBe(true);
  });

  it("moves a file within a device", async () => {
    await touch(at("a.mp3"), "payload");

    await moveFile(at("a.mp3"), at("b.mp3"));

    expect(await pathExists(at("a.mp3"))).toBe(false);
    expect(await fs.readFile(at("b.mp3"), "utf-8")).toBe("payload");
  });

  it("refuses to replace an existing destination", async () => {
    await touch(at("a.mp3"), "payload");
    await touch(at("b.mp3"), "existing");

    await expect(moveFile(at("a.mp3"), at("b.mp3"))).rejects.toThrow(/EEXIST/);
    expect(await fs.readFile(at("b.mp3"), "utf-8")).toBe("existing");
    expect(await fs.readFile(at("a.mp3"), "utf-8")).toBe("payload");
  });

  it("copies then unlinks across devices", async () => {
    await touch(at("a.mp3"), "payload");
    vi.spyOn(fs, "link").mockRejectedValueOnce(systemError("EXDEV"));

    await moveFile(at("a.mp3"), at("b.mp3"));

    expect(await pathExists(at("a.mp3"))).toBe(false);
    expect(await fs.readFile(at("b.mp3"), "utf-8")).toBe("payload");
  });

  it("copies when the filesystem has no hard links", async () => {
    await touch(at("a.mp3"), "payload");
    vi.spyOn(fs, "link").mockRejectedValueOnce(systemError("EPERM"));

    await moveFile(at("a.mp3"), at("b.mp3"));

    expect(await fs.readFile(at("b.mp3"), "utf-8")).toBe("payload");
  });

  it("does not overwrite on the copy path", async () => {
    await touch(at("a.mp3"), "payload");
    await touch(at("b.mp3"), "existing");
    vi.spyOn(fs, "link").mockRejectedValueOnce(systemError("EXDEV"));

    await expect(moveFile(at("a.mp3"), at("b.mp3"))).rejects.toThrow(/EEXIST/);
    expect(await fs.readFile(at("b.mp3"), "utf-8")).toBe("existing");
    expect(await pathExists(at("a.mp3"))).toBe(true);
  });

  it("passes other errors through", async () => {
    await expect(moveFile(at("missing.mp3"), at("b.mp3"))).rejects.toThrow(/ENOENT/);
  });
});

import path from "node:path";
import { describe, it, expect } from "vitest";

import {
  canonicalizeLocation,
  canonicalizePath,
  decodePercentEscapes,
  isSameOrInside,
  sortCanonical,
} from "./path-canonicalizer";

const opts = { baseDir: "/base", homeDir: "/home/dj", pathApi: path.posix };
const c = (raw: string) => canonicalizePath(raw, opts);
const loc = (raw: string) => canonicalizeLocation(raw, opts);

describe("canonicalizeLocation", () => {
  it("strips file://localhost and decodes percent escapes", () => {
    expect(loc("file://localhost/Users/dj/Music/House%20%26%20Techno/My%20Track%2001.mp3")).toBe(
      "/Users/dj/Music/House & Techno/My Track 01.mp3"
    );
  });

  it("accepts file:/// and file:/ forms", () => {
    expect(loc("file:///music/a.mp3")).toBe("/music/a.mp3");
    expect(loc("file:/music/a.mp3")).toBe("/music/a.mp3");
    expect(loc("FILE://localhost/music/a.mp3")).toBe("/music/a.mp3");
  });

  it("trims whitespace around the location", () => {
    expect(loc("  /music/a.mp3\n")).toBe("/music/a.mp3");
  });

  it("keeps an escaped trailing space", () => {
    expect(loc("file://localhost/music/a%20")).toBe("/music/a ");
  });

  it("matches composed, decomposed and escaped spellings", () => {
    const escaped = loc("file://localhost/music/Caf%C3%A9.mp3");

    expect(escaped).toBe("/music/Cafe\u0301.mp3");
    expect(loc("/music/Caf\u00e9.mp3")).toBe(escaped);
    expect(c("/music/Caf\u00e9.mp3")).toBe(escaped);
    expect(c("/music/Cafe\u0301.mp3")).toBe(escaped);
  });

  it("keeps escapes that are not valid UTF-8 and decodes the ASCII ones", () => {
    expect(decodePercentEscapes("/m/%FF%41.mp3")).toBe("/m/%FFA.mp3");
    expect(loc("file:///m/%FF%41.mp3")).toBe("/m/%FFA.mp3");
  });

  it("decodes an escaped percent sign exactly once", () => {
    expect(loc("file://localhost/music/Mix%202%2520.mp3")).toBe("/music/Mix 2%20.mp3");
  });

  it("drops the slash in front of a Windows drive letter", () => {
    const p = canonicalizeLocation("file://localhost/C:/Music/a%20b.mp3", {
      baseDir: "C:\\",
      homeDir: "C:\\Users\\dj",
      pathApi: path.win32,
    });
    expect(p).toBe("C:\\Music\\a b.mp3");
  });

  it("produces keys that canonicalizePath leaves unchanged", () => {
    for (const raw of [
      "file://localhost/Users/dj/Music/House%20%26%20Techno/Caf%C3%A9.mp3",
      "file://localhost/Music/Mix%2541.mp3",
      "~/Music/a.mp3",
    ]) {
      const key = loc(raw);
      expect(c(key)).toBe(key);
    }
  });
});

describe("canonicalizePath", () => {
  it("takes percent signs literally", () => {
    expect(c("/music/Mix 2%20.mp3")).toBe("/music/Mix 2%20.mp3");
    expect(c("/Music/Mix%2541.mp3")).toBe("/Music/Mix%2541.mp3");
  });

  it("is idempotent", () => {
    for (const raw of ["/Music/Mix%2541.mp3", "music/Caf\u00e9.mp3", "~/a/../b.mp3", "/a/b/"]) {
      expect(c(c(raw))).toBe(c(raw));
    }
  });

  it("resolves relative paths against the base directory", () => {
    expect(c("music/a.mp3")).toBe("/base/music/a.mp3");
    expect(c("./x/../a.mp3")).toBe("/base/a.mp3");
  });

  it("expands ~ to the home directory", () => {
    expect(c("~/Music/a.mp3")).toBe("/home/dj/Music/a.mp3");
    expect(c("~")).toBe("/home/dj");
  });

  it("collapses . and .. segments and trailing separators", () => {
    expect(c("/a/./b/../c.mp3")).toBe("/a/c.mp3");
    expect(c("/a/b/")).toBe("/a/b");
  });
});

describe("isSameOrInside", () => {
  it("matches the directory itself and its descendants only", () => {
    const dir = c("/music/_Rekordbox_Orphans");

    expect(isSameOrInside(dir, dir, true, path.posix)).toBe(true);
    expect(isSameOrInside(c("/music/_Rekordbox_Orphans/a.mp3"), dir, true, path.posix)).toBe(true);
    expect(isSameOrInside(c("/music/_Rekordbox_Orphans_old/a.mp3"), dir, true, path.posix)).toBe(false);
    expect(isSameOrInside(c("/music"), dir, true, path.posix)).toBe(false);
  });

  it("folds case when comparison is case-insensitive", () => {
    const dir = c("/Music/Quarantine");
    const file = c("/music/quarantine/a.mp3");

    expect(isSameOrInside(file, dir, true, path.posix)).toBe(false);
    expect(isSameOrInside(file, dir, false, path.posix)).toBe(true);
  });

  it("handles the filesystem root as the directory", () => {
    expect(isSameOrInside(c("/a.mp3"), c("/"), true, path.posix)).toBe(true);
  });
});

describe("sortCanonical", () => {
  it("orders by UTF-16 code unit, upper case before lower case", () => {
    const sorted = sortCanonical([c("/b"), c("/a"), c("/B"), c("/a/z")]);
    expect(sorted).toEqual(["/B", "/a", "/a/z", "/b"]);
  });
});

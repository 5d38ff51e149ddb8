import os from "node:os";
import path from "node:path";

import type { CanonicalPath } from "@orphan-sweep/core-domain";

export type CanonicalizeOptions = {
  /** Base for relative inputs. Callers capture it once per run. */
  baseDir?: string;
  homeDir?: string;
  pathApi?: path.PlatformPath;
};

// file://localhost/x, file:///x, file:/x, file:x
const FILE_SCHEME = /^file:(?:\/\/localhost(?=\/|$)|\/\/(?=\/))?/i;
const PERCENT_RUN = /(?:%[0-9A-Fa-f]{2})+/g;
const WINDOWS_DRIVE_IN_URI = /^\/[A-Za-z]:[\\/]/;

function stripFileScheme(input: string): string {
  return input.replace(FILE_SCHEME, "");
}

function decodeRun(run: string): string {
  try {
    return decodeURIComponent(run);
  } catch {
    // not UTF-8 as a whole: decode ASCII escapes, keep the rest as written
    return run.replace(/%([0-9A-Fa-f]{2})/g, (escape, hex: string) => {
      const code = parseInt(hex, 16);
      return code < 0x80 ? String.fromCharCode(code) : escape;
    });
  }
}

/**
 * Decodes `%XX` runs only. Anything that is not an escape sequence is left
 * untouched, so a path that was never encoded comes back unchanged.
 */
export function decodePercentEscapes(input: string): string {
  return input.replace(PERCENT_RUN, decodeRun);
}

function expandHome(p: string, homeDir: string, pathApi: path.PlatformPath): string {
  if (p === "~") return homeDir;
  if (p.startsWith("~/") || p.startsWith(`~${pathApi.sep}`)) {
    return pathApi.join(homeDir, p.slice(2));
  }
  return p;
}

/**
 * Canonical key for a path taken literally: a disk walk result, a scan root or
 * a stored manifest path. Pure and idempotent; `%` and surrounding whitespace
 * are ordinary characters.
 */
export function canonicalizePath(raw: string, options: CanonicalizeOptions = {}): CanonicalPath {
  const pathApi = options.pathApi ?? path;
  const baseDir = options.baseDir ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();

  const p = expandHome(raw.normalize("NFD"), homeDir.normalize("NFD"), pathApi);
  const resolved = pathApi.resolve(baseDir.normalize("NFD"), p);

  return resolved as CanonicalPath;
}

/**
 * Canonical key for a collection location (`file://localhost/...` URI or a
 * plain path). Trims, strips the scheme and decodes `%XX` escapes before
 * canonicalizing, so `canonicalizePath` on the result returns it unchanged.
 */
export function canonicalizeLocation(raw: string, options: CanonicalizeOptions = {}): CanonicalPath {
  const pathApi = options.pathApi ?? path;

  let p = decodePercentEscapes(stripFileScheme(raw.trim())).normalize("NFD");
  if (pathApi === path.win32 && WINDOWS_DRIVE_IN_URI.test(p)) {
    p = p.slice(1);
  }

  return canonicalizePath(p, options);
}

/** Key used for set membership; folds case when the run is configured case-insensitive. */
export function comparisonKey(p: string, caseSensitive: boolean): string {
  return caseSensitive ? p : p.toLowerCase();
}

export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortCanonical(paths: Iterable<CanonicalPath>): CanonicalPath[] {
  return [...paths].sort(compareCodeUnits);
}

/** True when `candidate` is `dir` itself or lies below it. Both must be canonical. */
export function isSameOrInside(
  candidate: CanonicalPath,
  dir: CanonicalPath,
  caseSensitive: boolean,
  pathApi: path.PlatformPath = path
): boolean {
  const c = comparisonKey(candidate, caseSensitive);
  const d = comparisonKey(dir, caseSensitive);
  if (c === d) return true;
  const prefix = d.endsWith(pathApi.sep) ? d : d + pathApi.sep;
  return c.startsWith(prefix);
}

import path from "node:path";

import type { CanonicalPath } from "@orphan-sweep/core-domain";
import { canonicalizePath, isSameOrInside, type CanonicalizeOptions } from "../services/path-canonicalizer";

// Dot-prefixed names (.DS_Store, ._AppleDouble, .Spotlight-V100, .Trashes,
// .fseventsd, .TemporaryItems) are already hidden; these are the others.
const SYSTEM_ENTRY_NAMES = new Set([
  "thumbs.db",
  "ehthumbs.db",
  "desktop.ini",
  "$recycle.bin",
  "system volume information",
  "icon\r",
]);

export function isIgnoredEntryName(name: string): boolean {
  if (name.startsWith(".")) return true;
  return SYSTEM_ENTRY_NAMES.has(name.toLowerCase());
}

export type MediaIgnoreOptions = {
  quarantineDir: string;
  caseSensitive?: boolean;
  canonicalize?: CanonicalizeOptions;
};

/**
 * Predicate over absolute paths: platform metadata entries and anything at or
 * below the quarantine directory.
 */
export function createMediaIgnore(options: MediaIgnoreOptions) {
  const caseSensitive = options.caseSensitive ?? true;
  const quarantine: CanonicalPath = canonicalizePath(options.quarantineDir, options.canonicalize);

  return (absPath: string) => {
    if (isIgnoredEntryName(path.basename(absPath))) return true;
    const p = canonicalizePath(absPath, options.canonicalize);
    return isSameOrInside(p, quarantine, caseSensitive);
  };
}

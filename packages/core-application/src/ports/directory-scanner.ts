import type { CanonicalPath, ScannedSet } from "@orphan-sweep/core-domain";
import type { CanonicalizeOptions } from "../services/path-canonicalizer";

export type ScanOptions = {
  roots: readonly string[];
  // lower-case with leading dot
  allowedExtensions: ReadonlySet<string>;
  quarantineDir: string;
  caseSensitive?: boolean;
  canonicalize?: CanonicalizeOptions;
};

export type ScanResult = {
  files: ScannedSet;
  // roots actually walked, duplicates removed
  roots: CanonicalPath[];
};

export interface DirectoryScanner {
  scan(options: ScanOptions): Promise<ScanResult>;
}

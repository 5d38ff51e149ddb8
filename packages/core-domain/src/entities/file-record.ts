import type { CanonicalPath } from "../value-objects/canonical-path";

export interface ScannedFile {
  canonicalPath: CanonicalPath;
  // spelling found by the walk; may differ from canonicalPath in Unicode form
  diskPath: string;
}

export type ReferencedSet = ReadonlySet<CanonicalPath>;

export type ScannedSet = ReadonlyMap<CanonicalPath, ScannedFile>;

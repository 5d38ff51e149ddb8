import type { ManifestRecord } from "./manifest-record";

export type CorruptManifestLine = {
  lineNumber: number;
  reason: string;
};

export type RestoreFailure = {
  record: ManifestRecord;
  error: string;
};

export interface RestoreReport {
  restored: ManifestRecord[];
  alreadyGone: ManifestRecord[];
  conflicts: ManifestRecord[];
  failed: RestoreFailure[];
  corruptLines: CorruptManifestLine[];
}

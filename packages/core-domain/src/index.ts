export type { CanonicalPath } from "./value-objects/canonical-path";
export type { ScannedFile, ReferencedSet, ScannedSet } from "./entities/file-record";
export type { ReconciliationResult } from "./entities/reconciliation-result";
export type { ManifestRecord } from "./entities/manifest-record";
export type {
  MoveEntry,
  MoveSkipReason,
  MoveSkip,
  MoveFailure,
  MoveReport,
} from "./entities/move-report";
export type { CorruptManifestLine, RestoreFailure, RestoreReport } from "./entities/restore-report";

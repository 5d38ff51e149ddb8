import type { CanonicalPath } from "../value-objects/canonical-path";

export type MoveEntry = {
  canonicalPath: CanonicalPath;
  originalPath: string;
  quarantinedPath: string;
};

export type MoveSkipReason = "inside_quarantine" | "already_quarantined";

export type MoveSkip = {
  canonicalPath: CanonicalPath;
  originalPath: string;
  reason: MoveSkipReason;
};

export type MoveFailure = {
  canonicalPath: CanonicalPath;
  originalPath: string;
  error: string;
};

export interface MoveReport {
  dryRun: boolean;
  planned: MoveEntry[];
  moved: MoveEntry[];
  skipped: MoveSkip[];
  failed: MoveFailure[];
}

import type { CanonicalPath } from "../value-objects/canonical-path";

export interface ReconciliationResult {
  orphans: ReadonlySet<CanonicalPath>;
  missing: ReadonlySet<CanonicalPath>;
  inSync: ReadonlySet<CanonicalPath>;

  totalReferenced: number;
  totalScanned: number;
}

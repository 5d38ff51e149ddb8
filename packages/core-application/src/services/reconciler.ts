import type { CanonicalPath, ReconciliationResult } from "@orphan-sweep/core-domain";

import { comparisonKey, sortCanonical } from "./path-canonicalizer";

export type ReconcileOptions = {
  caseSensitive?: boolean;
};

// one path per key; the lexicographically smallest spelling wins
function reduceByKey(paths: Iterable<CanonicalPath>, caseSensitive: boolean) {
  const byKey = new Map<string, CanonicalPath>();
  for (const p of sortCanonical(paths)) {
    const key = comparisonKey(p, caseSensitive);
    if (!byKey.has(key)) byKey.set(key, p);
  }
  return byKey;
}

/**
 * orphans = scanned - referenced, missing = referenced - scanned,
 * inSync = scanned ∩ referenced (scanned spelling).
 */
export function reconcile(
  referenced: Iterable<CanonicalPath>,
  scanned: Iterable<CanonicalPath>,
  options: ReconcileOptions = {}
): ReconciliationResult {
  const caseSensitive = options.caseSensitive ?? true;

  const referencedByKey = reduceByKey(referenced, caseSensitive);
  const scannedByKey = reduceByKey(scanned, caseSensitive);

  const orphans = new Set<CanonicalPath>();
  const inSync = new Set<CanonicalPath>();
  const missing = new Set<CanonicalPath>();

  for (const [key, p] of scannedByKey) {
    if (referencedByKey.has(key)) inSync.add(p);
    else orphans.add(p);
  }

  for (const [key, p] of referencedByKey) {
    if (!scannedByKey.has(key)) missing.add(p);
  }

  return {
    orphans,
    missing,
    inSync,
    totalReferenced: referencedByKey.size,
    totalScanned: scannedByKey.size,
  };
}

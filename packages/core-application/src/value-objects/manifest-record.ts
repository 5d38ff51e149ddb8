import type { CanonicalPath, ManifestRecord } from "@orphan-sweep/core-domain";

export function createManifestRecord(params: {
  originalPath: string;
  quarantinedPath: string;
  canonicalPath: CanonicalPath;
  at: Date;
}): ManifestRecord {
  const { originalPath, quarantinedPath, canonicalPath, at } = params;
  return {
    original_path: originalPath,
    quarantined_path: quarantinedPath,
    canonical_path: canonicalPath,
    timestamp: at.toISOString(),
  };
}

function nonEmptyString(v: unknown): v is string {
  return typeof v === "string" && v.length > 0;
}

/**
 * Validates one decoded manifest line. Returns the reason it was rejected, or
 * the record. Unknown fields are dropped.
 */
export function parseManifestRecord(value: unknown): ManifestRecord | string {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return "not a JSON object";
  }

  const v: Record<string, unknown> = { ...value };
  const { original_path, quarantined_path, timestamp, canonical_path } = v;

  if (!nonEmptyString(original_path)) return 'missing or empty "original_path"';
  if (!nonEmptyString(quarantined_path)) return 'missing or empty "quarantined_path"';
  if (!nonEmptyString(timestamp)) return 'missing or empty "timestamp"';

  const record: ManifestRecord = { original_path, quarantined_path, timestamp };
  if (canonical_path === undefined) return record;
  if (!nonEmptyString(canonical_path)) return 'empty or non-string "canonical_path"';

  return { ...record, canonical_path };
}

/**
 * One line of `orphans_manifest.jsonl`. Field names are snake_case because
 * the file is meant to be read by other tools as well.
 */
export interface ManifestRecord {
  original_path: string;
  quarantined_path: string;
  timestamp: string;

  // absent in records written by other tools; original_path stands in
  canonical_path?: string;
}

import type { CorruptManifestLine, ManifestRecord } from "@orphan-sweep/core-domain";

export type ManifestReadResult = {
  records: ManifestRecord[];
  corruptLines: CorruptManifestLine[];
};

/**
 * Append-only log of quarantine moves. `append` must not resolve before the
 * record is durable on disk.
 */
export interface ManifestStore {
  readonly filePath: string;
  append(record: ManifestRecord): Promise<void>;
  readAll(): Promise<ManifestReadResult>;
}

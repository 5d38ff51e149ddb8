import fs from "node:fs/promises";
import path from "node:path";

import type {
  CanonicalPath,
  MoveEntry,
  MoveReport,
  ScannedSet,
} from "@orphan-sweep/core-domain";

import type { Clock } from "../ports/clock";
import { systemClock } from "../ports/clock";
import type { Logger } from "../ports/logger";
import type { ManifestStore } from "../ports/manifest-store";
import { describeError } from "../application/errors";
import { moveFile, pathExists } from "../infra/node-fs";
import { createManifestRecord } from "../value-objects/manifest-record";
import {
  canonicalizePath,
  comparisonKey,
  isSameOrInside,
  sortCanonical,
  type CanonicalizeOptions,
} from "./path-canonicalizer";

export type MoveOrphansParams = {
  orphans: Iterable<CanonicalPath>;
  // where the walk found each orphan; falls back to the canonical path
  scanned?: ScannedSet;
  quarantineDir: string;
  manifest: ManifestStore;
  dryRun: boolean;
  logger: Logger;
  clock?: Clock;
  caseSensitive?: boolean;
  canonicalize?: CanonicalizeOptions;
};

/** `track.mp3` -> `track (n).mp3`; names without an extension get the suffix at the end. */
export function collisionName(fileName: string, n: number): string {
  if (n === 0) return fileName;
  const { name, ext } = path.parse(fileName);
  return `${name} (${n})${ext}`;
}

type ManifestState = {
  // canonical keys with a quarantined file still on disk
  active: Set<string>;
  // every quarantined_path in the manifest; none is handed out again
  usedNames: Set<string>;
};

async function loadManifestState(
  manifest: ManifestStore,
  keyOf: (p: string) => string,
  logger: Logger,
  canonicalize?: CanonicalizeOptions
): Promise<ManifestState> {
  const { records, corruptLines } = await manifest.readAll();

  for (const c of corruptLines) {
    logger.warn("Skipping unreadable manifest line", {
      manifest: manifest.filePath,
      line: c.lineNumber,
      reason: c.reason,
    });
  }

  const active = new Set<string>();
  const usedNames = new Set<string>();

  for (const record of records) {
    usedNames.add(keyOf(record.quarantined_path));
    if (await pathExists(record.quarantined_path)) {
      active.add(keyOf(record.canonical_path ?? canonicalizePath(record.original_path, canonicalize)));
    }
  }

  return { active, usedNames };
}

async function pickDestination(
  quarantineDir: string,
  fileName: string,
  taken: Set<string>,
  keyOf: (p: string) => string
): Promise<string> {
  for (let n = 0; ; n++) {
    const candidate = path.join(quarantineDir, collisionName(fileName, n));
    if (taken.has(keyOf(candidate))) continue;
    if (await pathExists(candidate)) continue;
    return candidate;
  }
}

/**
 * Moves orphans into the flat quarantine directory, one manifest record per
 * successful move. Orphans are processed in code-unit order of their
 * canonical path so unchanged input always yields the same manifest.
 *
 * A per-file failure is reported and the run carries on.
 */
export async function moveOrphans(params: MoveOrphansParams): Promise<MoveReport> {
  const { scanned, quarantineDir, manifest, dryRun, logger } = params;
  const clock = params.clock ?? systemClock;
  const caseSensitive = params.caseSensitive ?? true;
  const keyOf = (p: string) => comparisonKey(p.normalize("NFD"), caseSensitive);

  const report: MoveReport = { dryRun, planned: [], moved: [], skipped: [], failed: [] };

  const quarantineCanonical = canonicalizePath(quarantineDir, params.canonicalize);
  const state = await loadManifestState(manifest, keyOf, logger, params.canonicalize);
  const taken = new Set(state.usedNames);

  let quarantineReady = false;

  for (const canonicalPath of sortCanonical(params.orphans)) {
    const originalPath = scanned?.get(canonicalPath)?.diskPath ?? canonicalPath;

    if (isSameOrInside(canonicalPath, quarantineCanonical, caseSensitive)) {
      report.skipped.push({ canonicalPath, originalPath, reason: "inside_quarantine" });
      logger.debug("Skipping file already inside quarantine", { path: originalPath });
      continue;
    }

    if (state.active.has(keyOf(canonicalPath))) {
      report.skipped.push({ canonicalPath, originalPath, reason: "already_quarantined" });
      logger.warn("Skipping file with an unrestored manifest record", { path: originalPath });
      continue;
    }

    const quarantinedPath = await pickDestination(
      quarantineDir,
      path.basename(originalPath),
      taken,
      keyOf
    );
    const entry: MoveEntry = { canonicalPath, originalPath, quarantinedPath };

    if (dryRun) {
      taken.add(keyOf(quarantinedPath));
      report.planned.push(entry);
      logger.info("Would move", { from: originalPath, to: quarantinedPath });
      continue;
    }

    try {
      if (!quarantineReady) {
        await fs.mkdir(quarantineDir, { recursive: true });
        quarantineReady = true;
      }
      await moveFile(originalPath, quarantinedPath);
      taken.add(keyOf(quarantinedPath));

      const record = createManifestRecord({
        originalPath,
        quarantinedPath,
        canonicalPath,
        at: clock.now(),
      });

      try {
        await manifest.append(record);
      } catch (err) {
        await rollBackUnrecordedMove(entry, err, logger);
        throw err;
      }
    } catch (err) {
      report.failed.push({ canonicalPath, originalPath, error: describeError(err) });
      logger.error("Move failed", { path: originalPath, error: describeError(err) });
      continue;
    }

    state.active.add(keyOf(canonicalPath));
    report.moved.push(entry);
    logger.info("Moved", { from: originalPath, to: quarantinedPath });
  }

  return report;
}

// Undoes a move whose manifest record could not be written.
async function rollBackUnrecordedMove(entry: MoveEntry, cause: unknown, logger: Logger) {
  try {
    await moveFile(entry.quarantinedPath, entry.originalPath);
    logger.warn("Manifest append failed; move rolled back", {
      path: entry.originalPath,
      error: describeError(cause),
    });
  } catch (rollbackErr) {
    logger.error("Manifest append failed and the file could not be put back", {
      original: entry.originalPath,
      quarantined: entry.quarantinedPath,
      error: describeError(rollbackErr),
    });
  }
}

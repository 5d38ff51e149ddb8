import fs from "node:fs/promises";
import path from "node:path";

import type { RestoreReport } from "@orphan-sweep/core-domain";

import type { Logger } from "../ports/logger";
import type { ManifestStore } from "../ports/manifest-store";
import { describeError, errorCode } from "../application/errors";
import { moveFile, pathExists } from "../infra/node-fs";

// false when `to` was taken after the existence check
async function moveBack(from: string, to: string): Promise<boolean> {
  try {
    await moveFile(from, to);
    return true;
  } catch (err) {
    if (errorCode(err) === "EEXIST") return false;
    throw err;
  }
}

/**
 * Replays the manifest oldest-first, moving each quarantined file back.
 *
 * Never overwrites: an occupied original location is reported as a conflict
 * and the quarantined copy stays where it is. A record whose quarantined file
 * is gone counts as already restored.
 */
export async function restoreFromManifest(params: {
  manifest: ManifestStore;
  logger: Logger;
}): Promise<RestoreReport> {
  const { manifest, logger } = params;
  const { records, corruptLines } = await manifest.readAll();

  const report: RestoreReport = {
    restored: [],
    alreadyGone: [],
    conflicts: [],
    failed: [],
    corruptLines,
  };

  for (const c of corruptLines) {
    logger.warn("Skipping unreadable manifest line", {
      manifest: manifest.filePath,
      line: c.lineNumber,
      reason: c.reason,
    });
  }

  for (const record of records) {
    const from = record.quarantined_path;
    const to = record.original_path;

    try {
      if (!(await pathExists(from))) {
        report.alreadyGone.push(record);
        logger.warn("Quarantined file not found; already restored or removed", { path: from });
        continue;
      }

      if (!(await pathExists(to))) {
        await fs.mkdir(path.dirname(to), { recursive: true });
        if (await moveBack(from, to)) {
          report.restored.push(record);
          logger.info("Restored", { from, to });
          continue;
        }
      }

      report.conflicts.push(record);
      logger.warn("Original location is occupied; leaving file in quarantine", {
        original: to,
        quarantined: from,
      });
    } catch (err) {
      report.failed.push({ record, error: describeError(err) });
      logger.error("Restore failed", { original: to, quarantined: from, error: describeError(err) });
    }
  }

  return report;
}

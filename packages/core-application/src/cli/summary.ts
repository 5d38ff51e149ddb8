import type { MoveReport, RestoreReport } from "@orphan-sweep/core-domain";

import type { PreviewSummary } from "../services/orphan-workflow";
import { sortCanonical } from "../services/path-canonicalizer";

export const EXIT_OK = 0;
export const EXIT_PARTIAL_FAILURE = 1;
export const EXIT_CONFIGURATION = 2;

export function formatPreviewSummary(preview: PreviewSummary): string[] {
  const { result } = preview;
  return [
    `Rekordbox collection records (XML): ${preview.inventoryRecords}`,
    `Unique referenced paths: ${result.totalReferenced}`,
    `Scanned disk files: ${result.totalScanned}`,
    `Orphans (on disk, not in collection): ${result.orphans.size}`,
    `Collection references missing on disk: ${preview.missingOnDisk.length}`,
    `Collection references outside scan filter: ${preview.existsNotScanned.length}`,
    `In sync: ${result.inSync.size}`,
  ];
}

export function formatOrphanList(preview: PreviewSummary, limit = 20): string[] {
  const orphans = sortCanonical(preview.result.orphans);
  if (orphans.length === 0) return [];

  const lines = ["", "Orphans:"];
  for (const p of orphans.slice(0, limit)) {
    lines.push(`  ${preview.scanned.get(p)?.diskPath ?? p}`);
  }
  if (orphans.length > limit) lines.push(`  ... and ${orphans.length - limit} more`);
  return lines;
}

export function formatMoveReport(report: MoveReport): string[] {
  const lines: string[] = [];

  for (const e of report.planned) lines.push(`[dry-run] ${e.originalPath} -> ${e.quarantinedPath}`);
  for (const e of report.moved) lines.push(`moved ${e.originalPath} -> ${e.quarantinedPath}`);
  for (const s of report.skipped) lines.push(`skipped (${s.reason}) ${s.originalPath}`);
  for (const f of report.failed) lines.push(`FAILED ${f.originalPath}: ${f.error}`);

  lines.push("");
  if (report.dryRun) {
    lines.push(`Dry run: ${report.planned.length} file(s) would be moved, nothing was changed.`);
  } else {
    lines.push(`Moved: ${report.moved.length}`);
  }
  lines.push(`Skipped: ${report.skipped.length}`);
  lines.push(`Failed: ${report.failed.length}`);
  return lines;
}

export function formatRestoreReport(report: RestoreReport): string[] {
  const lines: string[] = [];

  for (const r of report.restored) lines.push(`restored ${r.quarantined_path} -> ${r.original_path}`);
  for (const r of report.conflicts) {
    lines.push(`CONFLICT ${r.original_path} already exists; kept ${r.quarantined_path}`);
  }
  for (const f of report.failed) lines.push(`FAILED ${f.record.quarantined_path}: ${f.error}`);
  for (const c of report.corruptLines) lines.push(`manifest line ${c.lineNumber} skipped: ${c.reason}`);

  lines.push("");
  lines.push(`Restored: ${report.restored.length}`);
  lines.push(`Already restored or removed: ${report.alreadyGone.length}`);
  lines.push(`Conflicts: ${report.conflicts.length}`);
  lines.push(`Failed: ${report.failed.length}`);
  return lines;
}

export function exitCodeForMove(report: MoveReport): number {
  return report.failed.length > 0 ? EXIT_PARTIAL_FAILURE : EXIT_OK;
}

export function exitCodeForRestore(report: RestoreReport): number {
  return report.failed.length > 0 || report.conflicts.length > 0 ? EXIT_PARTIAL_FAILURE : EXIT_OK;
}

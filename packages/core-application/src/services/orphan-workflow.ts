import fs from "node:fs/promises";

import type {
  CanonicalPath,
  MoveReport,
  ReconciliationResult,
  ReferencedSet,
  RestoreReport,
  ScannedSet,
} from "@orphan-sweep/core-domain";

import type { Clock } from "../ports/clock";
import { systemClock } from "../ports/clock";
import type { DirectoryScanner } from "../ports/directory-scanner";
import type { InventoryReader } from "../ports/inventory-reader";
import type { Logger } from "../ports/logger";
import type { ManifestStore } from "../ports/manifest-store";
import {
  manifestPathFor,
  quarantineDirFor,
  type OrphanSweepConfig,
} from "../application/config";
import { ConfigurationError, describeError } from "../application/errors";
import { NodeDirectoryScanner } from "../adapters/node-directory-scanner";
import { NodeManifestStore } from "../adapters/node-manifest-store";
import { RekordboxXmlInventoryReader } from "../adapters/rekordbox-xml-inventory-reader";
import { pathExists } from "../infra/node-fs";
import { canonicalizeLocation, sortCanonical, type CanonicalizeOptions } from "./path-canonicalizer";
import { reconcile } from "./reconciler";
import { moveOrphans } from "./quarantine-mover";
import { restoreFromManifest } from "./restorer";

export type WorkflowDeps = {
  inventoryReader: InventoryReader;
  scanner: DirectoryScanner;
  openManifest: (filePath: string) => ManifestStore;
  logger: Logger;
  clock: Clock;
};

export function createNodeWorkflowDeps(logger: Logger, clock: Clock = systemClock): WorkflowDeps {
  return {
    inventoryReader: new RekordboxXmlInventoryReader(),
    scanner: new NodeDirectoryScanner(logger),
    openManifest: (filePath) => new NodeManifestStore(filePath),
    logger,
    clock,
  };
}

export type PreviewSummary = {
  // TRACK@Location entries, before de-duplication
  inventoryRecords: number;
  referenced: ReferencedSet;
  scanned: ScannedSet;
  result: ReconciliationResult;
  // missing = missingOnDisk + existsNotScanned
  missingOnDisk: CanonicalPath[];
  existsNotScanned: CanonicalPath[];
  quarantineDir: string;
  manifestPath: string;
};

export type MoveRun = {
  preview: PreviewSummary;
  report: MoveReport;
};

function canonicalizeOptionsFor(config: OrphanSweepConfig): CanonicalizeOptions {
  return { baseDir: config.baseDir, homeDir: config.homeDir };
}

async function assertDirectory(dir: string, label: string) {
  const stat = await fs.stat(dir).catch((err: unknown) => {
    throw new ConfigurationError(`${label} not found: ${dir} (${describeError(err)})`, err);
  });
  if (!stat.isDirectory()) {
    throw new ConfigurationError(`${label} is not a directory: ${dir}`);
  }
}

async function assertFile(file: string, label: string) {
  const stat = await fs.stat(file).catch((err: unknown) => {
    throw new ConfigurationError(`${label} not found: ${file} (${describeError(err)})`, err);
  });
  if (!stat.isFile()) {
    throw new ConfigurationError(`${label} is not a file: ${file}`);
  }
}

async function assertScanRoots(config: OrphanSweepConfig) {
  for (const root of config.scanRoots) {
    await assertDirectory(root, "Scan root");
  }
}

// The canonical spelling is NFD; the file itself may be stored NFC.
async function existsInAnyForm(p: CanonicalPath): Promise<boolean> {
  return (await pathExists(p)) || (await pathExists(p.normalize("NFC")));
}

export async function previewOrphans(
  config: OrphanSweepConfig,
  deps: WorkflowDeps
): Promise<PreviewSummary> {
  const { inventoryPath } = config;
  if (!inventoryPath) {
    throw new ConfigurationError("A collection XML is required (--rekordbox-xml)");
  }
  await assertFile(inventoryPath, "Collection XML");
  await assertScanRoots(config);

  const canonicalize = canonicalizeOptionsFor(config);
  const quarantineDir = quarantineDirFor(config);

  const locations = await deps.inventoryReader.readLocations(inventoryPath);
  const referenced: ReferencedSet = new Set(
    locations.map((loc) => canonicalizeLocation(loc, canonicalize))
  );
  deps.logger.debug("Collection read", {
    inventory: inventoryPath,
    records: locations.length,
    unique: referenced.size,
  });

  const { files: scanned } = await deps.scanner.scan({
    roots: config.scanRoots,
    allowedExtensions: config.allowedExtensions,
    quarantineDir,
    caseSensitive: config.caseSensitive,
    canonicalize,
  });

  const result = reconcile(referenced, scanned.keys(), { caseSensitive: config.caseSensitive });

  const missingOnDisk: CanonicalPath[] = [];
  const existsNotScanned: CanonicalPath[] = [];
  for (const p of sortCanonical(result.missing)) {
    if (await existsInAnyForm(p)) existsNotScanned.push(p);
    else missingOnDisk.push(p);
  }

  return {
    inventoryRecords: locations.length,
    referenced,
    scanned,
    result,
    missingOnDisk,
    existsNotScanned,
    quarantineDir,
    manifestPath: manifestPathFor(config),
  };
}

export async function moveOrphanFiles(
  config: OrphanSweepConfig,
  deps: WorkflowDeps,
  options: { dryRun: boolean }
): Promise<MoveRun> {
  const preview = await previewOrphans(config, deps);

  const report = await moveOrphans({
    orphans: preview.result.orphans,
    scanned: preview.scanned,
    quarantineDir: preview.quarantineDir,
    manifest: deps.openManifest(preview.manifestPath),
    dryRun: options.dryRun,
    logger: deps.logger,
    clock: deps.clock,
    caseSensitive: config.caseSensitive,
    canonicalize: canonicalizeOptionsFor(config),
  });

  return { preview, report };
}

export async function restoreOrphanFiles(
  config: OrphanSweepConfig,
  deps: WorkflowDeps
): Promise<RestoreReport> {
  await assertScanRoots(config);

  return restoreFromManifest({
    manifest: deps.openManifest(manifestPathFor(config)),
    logger: deps.logger,
  });
}

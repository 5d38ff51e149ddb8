import os from "node:os";
import path from "node:path";

import { ConfigurationError } from "./errors";

export const DEFAULT_EXTENSIONS = ["mp3", "wav", "aiff", "aif", "flac", "m4a"] as const;
export const DEFAULT_QUARANTINE_DIR_NAME = "_Rekordbox_Orphans";
export const DEFAULT_MANIFEST_FILE_NAME = "orphans_manifest.jsonl";

export type OrphanSweepConfig = {
  inventoryPath?: string;
  scanRoots: string[];
  // lower-case, with leading dot (".mp3")
  allowedExtensions: ReadonlySet<string>;
  quarantineDirName: string;
  manifestFileName: string;
  caseSensitive: boolean;
  baseDir: string;
  homeDir: string;
};

export type OrphanSweepConfigInput = {
  inventoryPath?: string;
  scanRoots: readonly string[];
  allowedExtensions?: Iterable<string>;
  quarantineDirName?: string;
  manifestFileName?: string;
  caseSensitive?: boolean;
  baseDir?: string;
  homeDir?: string;
};

export function normalizeExtension(raw: string): string {
  const ext = raw.trim().toLowerCase().replace(/^\.+/, "");
  if (!ext || /[\\/\s]/.test(ext)) {
    throw new ConfigurationError(`Invalid file extension: "${raw}"`);
  }
  return `.${ext}`;
}

function assertPlainName(value: string, label: string) {
  if (!value || value === "." || value === ".." || /[\\/]/.test(value)) {
    throw new ConfigurationError(`${label} must be a plain file name, got "${value}"`);
  }
}

function expandHome(p: string, homeDir: string) {
  if (p === "~") return homeDir;
  if (p.startsWith("~/")) return path.join(homeDir, p.slice(2));
  return p;
}

export function createConfig(input: OrphanSweepConfigInput): OrphanSweepConfig {
  const baseDir = path.resolve(input.baseDir ?? process.cwd());
  const homeDir = input.homeDir ?? os.homedir();
  const resolve = (p: string) => path.resolve(baseDir, expandHome(p.trim(), homeDir));

  const scanRoots = input.scanRoots.map((r) => r.trim()).filter((r) => r.length > 0);
  if (scanRoots.length === 0) {
    throw new ConfigurationError("At least one scan root is required (--scan-root)");
  }

  const allowedExtensions = new Set(
    [...(input.allowedExtensions ?? DEFAULT_EXTENSIONS)].map(normalizeExtension)
  );
  if (allowedExtensions.size === 0) {
    throw new ConfigurationError("The allowed extension list is empty");
  }

  const quarantineDirName = input.quarantineDirName ?? DEFAULT_QUARANTINE_DIR_NAME;
  const manifestFileName = input.manifestFileName ?? DEFAULT_MANIFEST_FILE_NAME;
  assertPlainName(quarantineDirName, "Quarantine directory name");
  assertPlainName(manifestFileName, "Manifest file name");

  const inventoryPath = input.inventoryPath?.trim();

  return {
    inventoryPath: inventoryPath ? resolve(inventoryPath) : undefined,
    scanRoots: scanRoots.map(resolve),
    allowedExtensions,
    quarantineDirName,
    manifestFileName,
    caseSensitive: input.caseSensitive ?? true,
    baseDir,
    homeDir,
  };
}

/** Quarantine always lives under the first scan root. */
export function quarantineDirFor(config: OrphanSweepConfig): string {
  const [firstRoot] = config.scanRoots;
  if (firstRoot === undefined) {
    throw new ConfigurationError("At least one scan root is required (--scan-root)");
  }
  return path.join(firstRoot, config.quarantineDirName);
}

export function manifestPathFor(config: OrphanSweepConfig): string {
  return path.join(quarantineDirFor(config), config.manifestFileName);
}

// Public API of core-application: ports, services and the Node adapters, so
// callers never reach into internal file paths.

// Ports (interfaces)
export * from "./ports/clock";
export * from "./ports/logger";
export type { ManifestStore, ManifestReadResult } from "./ports/manifest-store";
export type { InventoryReader } from "./ports/inventory-reader";
export type { DirectoryScanner, ScanOptions, ScanResult } from "./ports/directory-scanner";

// Application
export * from "./application/config";
export * from "./application/errors";

// Value objects
export * from "./value-objects/manifest-record";

// Services
export * from "./services/path-canonicalizer";
export * from "./services/reconciler";
export * from "./services/quarantine-mover";
export * from "./services/restorer";
export * from "./services/orphan-workflow";

// Node adapters
export * from "./adapters/console-logger";
export * from "./adapters/media-ignore";
export * from "./adapters/node-directory-scanner";
export * from "./adapters/node-manifest-store";
export * from "./adapters/rekordbox-xml-inventory-reader";
export { pathExists, moveFile } from "./infra/node-fs";

// CLI
export { runCli, buildProgram, CLI_NAME, type CliIo } from "./cli/program";
export * from "./cli/summary";

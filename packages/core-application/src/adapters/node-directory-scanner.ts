import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";

import type { CanonicalPath, ScannedFile } from "@orphan-sweep/core-domain";

import type { DirectoryScanner, ScanOptions, ScanResult } from "../ports/directory-scanner";
import type { Logger } from "../ports/logger";
import { ScanError, describeError } from "../application/errors";
import { canonicalizePath, compareCodeUnits, isSameOrInside } from "../services/path-canonicalizer";
import { createMediaIgnore } from "./media-ignore";
import { NullLogger } from "./console-logger";

type WalkContext = {
  root: string;
  options: ScanOptions;
  ignore: (absPath: string) => boolean;
  files: Map<CanonicalPath, ScannedFile>;
};

export class NodeDirectoryScanner implements DirectoryScanner {
  constructor(private readonly logger: Logger = new NullLogger()) {}

  private async assertDirectory(root: string): Promise<void> {
    const stat = await fs.stat(root).catch((err: unknown) => {
      throw new ScanError(`Scan root is not accessible: ${root} (${describeError(err)})`, root, err);
    });
    if (!stat.isDirectory()) {
      throw new ScanError(`Scan root is not a directory: ${root}`, root);
    }
  }

  private async walk(dirAbs: string, ctx: WalkContext): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirAbs, { withFileTypes: true });
    } catch (err) {
      throw new ScanError(`Cannot read directory ${dirAbs}: ${describeError(err)}`, ctx.root, err);
    }

    entries.sort((a, b) => compareCodeUnits(a.name, b.name));

    for (const entry of entries) {
      const abs = path.join(dirAbs, entry.name);

      if (ctx.ignore(abs)) {
        this.logger.debug("Ignored entry", { path: abs });
        continue;
      }

      if (entry.isDirectory()) {
        await this.walk(abs, ctx);
      } else if (entry.isFile()) {
        const ext = path.extname(entry.name).toLowerCase();
        if (!ctx.options.allowedExtensions.has(ext)) continue;

        const canonicalPath = canonicalizePath(abs, ctx.options.canonicalize);
        ctx.files.set(canonicalPath, { canonicalPath, diskPath: abs });
      }
      // symlinks, sockets, fifos: not media files
    }
  }

  async scan(options: ScanOptions): Promise<ScanResult> {
    const caseSensitive = options.caseSensitive ?? true;
    const baseDir = options.canonicalize?.baseDir ?? process.cwd();

    const ignore = createMediaIgnore({
      quarantineDir: options.quarantineDir,
      caseSensitive,
      canonicalize: options.canonicalize,
    });

    const walked: CanonicalPath[] = [];
    const files = new Map<CanonicalPath, ScannedFile>();

    for (const rawRoot of options.roots) {
      const root = path.resolve(baseDir, rawRoot);
      const canonicalRoot = canonicalizePath(root, options.canonicalize);

      const coveredBy = walked.find((w) => isSameOrInside(canonicalRoot, w, caseSensitive));
      if (coveredBy) {
        this.logger.warn("Skipping scan root already covered by an earlier root", {
          root,
          coveredBy,
        });
        continue;
      }

      await this.assertDirectory(root);
      walked.push(canonicalRoot);

      const before = files.size;
      await this.walk(root, { root, options, ignore, files });
      this.logger.debug("Scanned root", { root, files: files.size - before });
    }

    return { files, roots: walked };
  }
}

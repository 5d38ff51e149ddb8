import fs from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";

import type { CorruptManifestLine, ManifestRecord } from "@orphan-sweep/core-domain";

import type { ManifestReadResult, ManifestStore } from "../ports/manifest-store";
import { errorCode, describeError } from "../application/errors";
import { parseManifestRecord } from "../value-objects/manifest-record";

async function endsWithoutNewline(handle: FileHandle): Promise<boolean> {
  const { size } = await handle.stat();
  if (size === 0) return false;
  const last = Buffer.alloc(1);
  await handle.read(last, 0, 1, size - 1);
  return last[0] !== 0x0a;
}

/**
 * JSONL manifest. Every append is written and fsynced before it resolves; a
 * torn last line left by an interrupted run is closed off so the next record
 * starts on its own line.
 */
export class NodeManifestStore implements ManifestStore {
  constructor(public readonly filePath: string) {}

  async append(record: ManifestRecord): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const handle = await fs.open(this.filePath, "a+");
    try {
      const prefix = (await endsWithoutNewline(handle)) ? "\n" : "";
      await handle.write(prefix + JSON.stringify(record) + "\n", null, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
  }

  async readAll(): Promise<ManifestReadResult> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return { records: [], corruptLines: [] };
      throw err;
    }

    const records: ManifestRecord[] = [];
    const corruptLines: CorruptManifestLine[] = [];

    const lines = content.split("\n");
    lines.forEach((line, index) => {
      if (line.trim().length === 0) return;
      const lineNumber = index + 1;

      let decoded: unknown;
      try {
        decoded = JSON.parse(line);
      } catch (err) {
        corruptLines.push({ lineNumber, reason: `unparseable JSON (${describeError(err)})` });
        return;
      }

      const parsed = parseManifestRecord(decoded);
      if (typeof parsed === "string") {
        corruptLines.push({ lineNumber, reason: parsed });
        return;
      }
      records.push(parsed);
    });

    return { records, corruptLines };
  }
}

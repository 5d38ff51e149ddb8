import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { Clock } from "../ports/clock";
import type { LogData, LogLevel, Logger } from "../ports/logger";

export async function makeTempDir(prefix = "orphan-sweep-"): Promise<string> {
  // realpath: macOS tmpdir is a symlink into /private
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function touch(filePath: string, content = "\0".repeat(16)): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

function escapeXmlAttr(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll('"', "&quot;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;");
}

export async function writeCollectionXml(xmlPath: string, locations: string[]): Promise<void> {
  const tracks = locations
    .map((loc, i) => `    <TRACK TrackID="${i + 1}" Name="Track ${i + 1}" Location="${escapeXmlAttr(loc)}" />`)
    .join("\n");

  const xml = `<?xml version="1.0" encoding="UTF-8"?>
<DJ_PLAYLISTS Version="1.0.0">
  <PRODUCT Name="rekordbox" Version="6.8.5" Company="AlphaTheta" />
  <COLLECTION Entries="${locations.length}">
${tracks}
  </COLLECTION>
  <PLAYLISTS>
    <NODE Type="0" Name="ROOT" Count="1">
      <NODE Name="Set" Type="1" KeyType="0" Entries="1">
        <TRACK Key="1" />
      </NODE>
    </NODE>
  </PLAYLISTS>
</DJ_PLAYLISTS>
`;
  await fs.writeFile(xmlPath, xml, "utf-8");
}

/** file://localhost URI with every byte outside [A-Za-z0-9/._~-] percent-encoded. */
export function toFileUri(absPath: string): string {
  const encoded = absPath
    .split("/")
    .map((segment) => encodeURIComponent(segment))
    .join("/");
  return `file://localhost${encoded}`;
}

export function fixedClock(iso = "2024-05-01T12:00:00.000Z"): Clock {
  return { now: () => new Date(iso) };
}

export type LoggedEntry = { level: LogLevel; message: string; data?: LogData };

export class MemoryLogger implements Logger {
  readonly entries: LoggedEntry[] = [];

  debug(message: string, data?: LogData): void {
    this.entries.push({ level: "debug", message, data });
  }

  info(message: string, data?: LogData): void {
    this.entries.push({ level: "info", message, data });
  }

  warn(message: string, data?: LogData): void {
    this.entries.push({ level: "warn", message, data });
  }

  error(message: string, data?: LogData): void {
    this.entries.push({ level: "error", message, data });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

import { Command, CommanderError } from "commander";

import type { Clock } from "../ports/clock";
import { systemClock } from "../ports/clock";
import { ConsoleLogger, parseLogLevel, type LogSink } from "../adapters/console-logger";
import { createConfig, type OrphanSweepConfig } from "../application/config";
import { ConfigurationError, ScanError } from "../application/errors";
import {
  createNodeWorkflowDeps,
  moveOrphanFiles,
  previewOrphans,
  restoreOrphanFiles,
  type WorkflowDeps,
} from "../services/orphan-workflow";
import {
  EXIT_CONFIGURATION,
  EXIT_OK,
  exitCodeForMove,
  exitCodeForRestore,
  formatMoveReport,
  formatOrphanList,
  formatPreviewSummary,
  formatRestoreReport,
} from "./summary";

export const CLI_NAME = "orphan-sweep";

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
  logSink: LogSink;
  env: Record<string, string | undefined>;
  cwd: string;
  clock?: Clock;
};

type CommandOptions = Record<string, unknown>;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function commaList(value: string, previous: string[] | undefined): string[] {
  const items = value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return [...(previous ?? []), ...items];
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function configFromOptions(options: CommandOptions, io: CliIo): OrphanSweepConfig {
  const ext = stringArray(options.ext);
  return createConfig({
    inventoryPath: optionalString(options.rekordboxXml),
    scanRoots: stringArray(options.scanRoot),
    allowedExtensions: ext.length > 0 ? ext : undefined,
    caseSensitive: options.caseInsensitive !== true,
    baseDir: io.cwd,
  });
}

async function runCommand(
  name: string,
  io: CliIo,
  options: CommandOptions,
  body: (config: OrphanSweepConfig, deps: WorkflowDeps) => Promise<number>
): Promise<number> {
  try {
    const level = parseLogLevel(optionalString(options.logLevel) ?? io.env.LOG_LEVEL, "warn");
    const clock = io.clock ?? systemClock;
    const logger = new ConsoleLogger(level, name, io.logSink, clock);

    const config = configFromOptions(options, io);
    return await body(config, createNodeWorkflowDeps(logger, clock));
  } catch (err) {
    if (err instanceof ConfigurationError || err instanceof ScanError) {
      io.err(`Error: ${err.message}`);
      return EXIT_CONFIGURATION;
    }
    throw err;
  }
}

function emit(io: CliIo, lines: string[]) {
  for (const line of lines) io.out(line);
}

function withScanOptions(command: Command): Command {
  const noRoots: string[] = [];
  return command
    .option("--scan-root <dir>", "directory to scan for audio files (repeatable)", collect, noRoots)
    .option("--ext <list>", "comma-separated audio extensions to scan (default: mp3,wav,aiff,aif,flac,m4a)", commaList)
    .option("--case-insensitive", "compare paths without regard to letter case", false)
    .option("--log-level <level>", "debug, info, warn or error (default: $LOG_LEVEL or warn)");
}

export function buildProgram(io: CliIo, setExitCode: (code: number) => void): Command {
  const program = new Command(CLI_NAME)
    .description("Find audio files that a Rekordbox collection no longer references, and quarantine them reversibly")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.replace(/\n$/, "")),
      writeErr: (str) => io.err(str.replace(/\n$/, "")),
    });

  withScanOptions(
    program
      .command("preview")
      .description("report orphans and missing files; changes nothing")
      .requiredOption("--rekordbox-xml <file>", "Rekordbox collection export (XML)")
  ).action(async (options: CommandOptions) => {
    setExitCode(
      await runCommand("preview", io, options, async (config, deps) => {
        const preview = await previewOrphans(config, deps);
        emit(io, [...formatPreviewSummary(preview), ...formatOrphanList(preview)]);
        return EXIT_OK;
      })
    );
  });

  withScanOptions(
    program
      .command("move")
      .description("move orphans into the quarantine folder and record each move in the manifest")
      .requiredOption("--rekordbox-xml <file>", "Rekordbox collection export (XML)")
      .option("--dry-run", "show what would be moved without touching anything", false)
  ).action(async (options: CommandOptions) => {
    setExitCode(
      await runCommand("move", io, options, async (config, deps) => {
        const { preview, report } = await moveOrphanFiles(config, deps, {
          dryRun: options.dryRun === true,
        });
        emit(io, formatPreviewSummary(preview));
        io.out("");

        if (preview.result.orphans.size === 0) {
          io.out("No orphans found.");
          return EXIT_OK;
        }

        emit(io, formatMoveReport(report));
        return exitCodeForMove(report);
      })
    );
  });

  withScanOptions(
    program
      .command("restore")
      .description("move every file recorded in the manifest back to where it came from")
      .option("--rekordbox-xml <file>", "accepted for symmetry with the other commands; not read")
  ).action(async (options: CommandOptions) => {
    setExitCode(
      await runCommand("restore", io, options, async (config, deps) => {
        const report = await restoreOrphanFiles(config, deps);
        emit(io, formatRestoreReport(report));
        return exitCodeForRestore(report);
      })
    );
  });

  return program;
}

export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let exitCode = EXIT_OK;
  const program = buildProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  return exitCode;
}

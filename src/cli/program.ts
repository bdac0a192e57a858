import os from "node:os";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { MetadataTool } from "../restamp/metadata-tool.js";
import type { RestampProgressEvent } from "../restamp/types.js";
import { createConfigIO } from "../config/io.js";
import { resolveRunSettings, type RunOverrides } from "../config/settings.js";
import { createLogger, resolveLogLevel, type Logger } from "../logging/logger.js";
import { createExiftoolCommand, type ExiftoolCommandOptions } from "../restamp/exiftool.js";
import { runRestamp } from "../restamp/run.js";
import { VERSION } from "../version.js";
import { formatCliBannerLine, shouldEmitBanner } from "./banner.js";
import { exitCodeFor, formatRunSummary } from "./format.js";

/** Exit status for errors that stop a run before any file is processed. */
export const EXIT_SETUP_ERROR = 2;

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  createTool?: (opts: ExiftoolCommandOptions) => MetadataTool;
  logger?: Logger;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  isTty?: boolean;
};

type RunCommandOptions = {
  sidecars?: string;
  timeZone?: string;
  maxCollisions?: number;
  toolTimeout?: number;
  concurrency?: number;
  flat?: boolean;
  dryRun?: boolean;
  verify?: boolean;
  fileTimes?: boolean;
  json?: boolean;
};

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

function parsePositiveInt(value: string): number {
  const n = parseNonNegativeInt(value);
  if (n === 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function progressLine(event: RestampProgressEvent): string | null {
  switch (event.type) {
    case "restamp.file.done":
      return event.index % 100 === 0 || event.index === event.total
        ? `processed ${event.index}/${event.total}`
        : null;
    case "restamp.verify.progress":
      return event.verified_count === event.verified_total
        ? `verified ${event.verified_count}/${event.verified_total}`
        : null;
    default:
      return null;
  }
}

/**
 * Parse argv and run the selected command. Resolves to the process exit code;
 * never calls process.exit itself.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const homedir = deps.homedir ?? os.homedir;
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const createTool = deps.createTool ?? createExiftoolCommand;
  const isTty = deps.isTty ?? Boolean(process.stdout.isTTY);

  let exitCode = 0;
  const program = new Command();
  program
    .name("restamp")
    .description("Restore capture metadata from Google Photos Takeout sidecars into fresh copies")
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: stdout, writeErr: stderr });

  const loadSettings = (overrides: RunOverrides) => {
    const config = createConfigIO({ env, homedir }).loadConfig();
    const log = deps.logger ?? createLogger({ level: resolveLogLevel(env, config.log_level), env });
    return { settings: resolveRunSettings(config, overrides), log };
  };

  program
    .command("run")
    .description("Copy every media file from <source> to <dest> with its sidecar metadata applied")
    .argument("<source>", "Takeout media directory")
    .argument("<dest>", "Output directory (must not be inside <source>)")
    .option("--sidecars <dir>", "Directory holding the JSON sidecars (defaults to <source>)")
    .option("--time-zone <tz>", "IANA time zone for embedded image dates")
    .option("--max-collisions <n>", "Highest (n) suffix tried for a taken name", parseNonNegativeInt)
    .option("--tool-timeout <ms>", "Per-file metadata tool timeout", parsePositiveInt)
    .option("--concurrency <n>", "Files written in parallel", parsePositiveInt)
    .option("--flat", "Put every file directly under <dest> instead of mirroring folders")
    .option("--dry-run", "Plan the run and write only the report")
    .option("--verify", "Read embedded dates back after writing")
    .option("--file-times", "Set file modification times to the capture time")
    .option("--no-file-times", "Leave file modification times at copy time")
    .option("--json", "Print the run manifest as JSON")
    .action(async (source: string, dest: string, options: RunCommandOptions) => {
      let loaded: ReturnType<typeof loadSettings>;
      try {
        loaded = loadSettings({
          time_zone: options.timeZone,
          max_collision_attempts: options.maxCollisions,
          tool_timeout_ms: options.toolTimeout,
          concurrency: options.concurrency,
          layout: options.flat ? "flat" : undefined,
          verify: options.verify,
          set_file_times: options.fileTimes,
        });
      } catch (err) {
        stderr(`${describeError(err)}\n`);
        exitCode = EXIT_SETUP_ERROR;
        return;
      }
      const { settings, log } = loaded;

      if (shouldEmitBanner(argv, isTty)) {
        stdout(`\n${formatCliBannerLine(VERSION)}\n\n`);
      }

      const tool = createTool({
        command: settings.tool.command,
        args: settings.tool.args,
        timeoutMs: settings.tool.timeout_ms,
      });

      try {
        const manifest = await runRestamp(
          {
            source_path: source,
            dest_path: dest,
            sidecar_path: options.sidecars,
            time_zone: settings.time_zone,
            max_stem_length: settings.max_stem_length,
            edited_suffixes: settings.edited_suffixes,
            max_collision_attempts: settings.max_collision_attempts,
            layout: settings.layout,
            concurrency: settings.concurrency,
            set_file_times: settings.set_file_times,
            verify: settings.verify,
            dry_run: options.dryRun ?? false,
            report_dir: settings.report_dir,
          },
          { tool, logger: log },
          (event) => {
            const line = options.json ? null : progressLine(event);
            if (line) {
              log.info(line);
            }
          },
        );
        stdout(
          options.json
            ? `${JSON.stringify(manifest, null, 2)}\n`
            : `${formatRunSummary(manifest)}\n`,
        );
        exitCode = exitCodeFor(manifest);
      } catch (err) {
        log.error({ err: describeError(err) }, "run aborted");
        stderr(`restamp: ${describeError(err)}\n`);
        exitCode = EXIT_SETUP_ERROR;
      }
    });

  program
    .command("check-tool")
    .description("Check that the metadata tool can be invoked")
    .action(async () => {
      let loaded: ReturnType<typeof loadSettings>;
      try {
        loaded = loadSettings({});
      } catch (err) {
        stderr(`${describeError(err)}\n`);
        exitCode = EXIT_SETUP_ERROR;
        return;
      }
      const { command, args, timeout_ms } = loaded.settings.tool;
      const version = await createTool({ command, args, timeoutMs: timeout_ms }).version();
      if (version === null) {
        stderr(`${command} is not available; install exiftool or set tool.command in the config\n`);
        exitCode = 1;
        return;
      }
      stdout(`${command} ${version}\n`);
    });

  try {
    await program.parseAsync(argv);
  } catch (err) {
    // exitOverride turns help, version and usage errors into exceptions
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }
  return exitCode;
}

import type { RestampConfig } from "./types.js";
import { DEFAULT_MAX_COLLISION_ATTEMPTS, type DestinationLayout } from "../restamp/allocate.js";
import { DEFAULT_TOOL_COMMAND, DEFAULT_TOOL_TIMEOUT_MS } from "../restamp/exiftool.js";
import { isValidTimeZone } from "../restamp/field-map.js";
import { DEFAULT_EDITED_SUFFIXES, DEFAULT_MAX_STEM_LENGTH } from "../restamp/sidecar-match.js";

export type RunSettings = {
  time_zone: string;
  set_file_times: boolean;
  verify: boolean;
  concurrency: number;
  max_stem_length: number;
  edited_suffixes: string[];
  max_collision_attempts: number;
  layout: DestinationLayout;
  report_dir?: string;
  tool: {
    command: string;
    args: string[];
    timeout_ms: number;
  };
};

/** Values given on the command line; undefined means "not given". */
export type RunOverrides = Partial<
  Pick<
    RunSettings,
    | "time_zone"
    | "set_file_times"
    | "verify"
    | "concurrency"
    | "max_collision_attempts"
    | "layout"
  >
> & { tool_timeout_ms?: number };

/**
 * Merge defaults ← config file ← command-line overrides.
 * Throws when the resulting time zone is unknown.
 */
export function resolveRunSettings(
  config: RestampConfig,
  overrides: RunOverrides = {},
): RunSettings {
  const settings: RunSettings = {
    time_zone: overrides.time_zone ?? config.time_zone ?? "UTC",
    set_file_times: overrides.set_file_times ?? config.set_file_times ?? true,
    verify: overrides.verify ?? config.verify ?? false,
    concurrency: overrides.concurrency ?? config.concurrency ?? 1,
    max_stem_length: config.sidecar?.max_stem_length ?? DEFAULT_MAX_STEM_LENGTH,
    edited_suffixes: config.sidecar?.edited_suffixes ?? [...DEFAULT_EDITED_SUFFIXES],
    max_collision_attempts:
      overrides.max_collision_attempts ??
      config.collisions?.max_attempts ??
      DEFAULT_MAX_COLLISION_ATTEMPTS,
    layout: overrides.layout ?? config.layout ?? "mirror",
    report_dir: config.report_dir,
    tool: {
      command: config.tool?.command ?? DEFAULT_TOOL_COMMAND,
      args: config.tool?.args ?? [],
      timeout_ms: overrides.tool_timeout_ms ?? config.tool?.timeout_ms ?? DEFAULT_TOOL_TIMEOUT_MS,
    },
  };
  if (!isValidTimeZone(settings.time_zone)) {
    throw new Error(`Unknown time zone: ${settings.time_zone}`);
  }
  return settings;
}

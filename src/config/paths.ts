import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const STATE_DIRNAME = ".restamp";
const CONFIG_FILENAME = "restamp.json";

/**
 * Home directory, honoring RESTAMP_HOME. Throws when neither is available.
 */
export function resolveRequiredHomeDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.RESTAMP_HOME?.trim();
  if (override) {
    return path.resolve(expandHomePrefix(override, homedir));
  }
  const home = homedir();
  if (!home) {
    throw new Error("Unable to resolve home directory; set RESTAMP_HOME");
  }
  return home;
}

export function expandHomePrefix(input: string, homedir: () => string = os.homedir): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/") || input.startsWith("~\\")) {
    return path.join(homedir(), input.slice(2));
  }
  return input;
}

export function resolveUserPath(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return trimmed;
  }
  if (trimmed.startsWith("~")) {
    return path.resolve(expandHomePrefix(trimmed, () => resolveRequiredHomeDir(env, homedir)));
  }
  return path.resolve(trimmed);
}

/**
 * State directory holding the config file.
 * Can be overridden via RESTAMP_STATE_DIR.
 * Default: ~/.restamp
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.RESTAMP_STATE_DIR?.trim();
  if (override) {
    return resolveUserPath(override, env, homedir);
  }
  return path.join(resolveRequiredHomeDir(env, homedir), STATE_DIRNAME);
}

/**
 * Config file path (JSON5).
 * Can be overridden via RESTAMP_CONFIG_PATH.
 * Default: ~/.restamp/restamp.json
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.RESTAMP_CONFIG_PATH?.trim();
  if (override) {
    return resolveUserPath(override, env, homedir);
  }
  return path.join(resolveStateDir(env, homedir), CONFIG_FILENAME);
}

export function configExists(configPath: string): boolean {
  try {
    return fs.existsSync(configPath);
  } catch {
    return false;
  }
}

import fs from "node:fs";
import os from "node:os";
import JSON5 from "json5";
import { Value } from "@sinclair/typebox/value";
import { configExists, resolveConfigPath } from "./paths.js";
import { RestampConfigSchema, type RestampConfig } from "./types.js";

export class ConfigError extends Error {
  constructor(
    readonly configPath: string,
    readonly issues: string[],
  ) {
    super(`Invalid config at ${configPath}: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export type ConfigIODeps = {
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
};

export type ConfigIO = {
  configPath: string;
  loadConfig(): RestampConfig;
};

/**
 * List schema violations of a parsed config value (empty = valid).
 */
export function validateConfig(value: unknown): string[] {
  return [...Value.Errors(RestampConfigSchema, value)].map(
    (error) => `${error.path || "/"}: ${error.message}`,
  );
}

export function createConfigIO(deps: ConfigIODeps = {}): ConfigIO {
  const env = deps.env ?? process.env;
  const homedir = deps.homedir ?? os.homedir;
  const configPath = resolveConfigPath(env, homedir);

  return {
    configPath,
    loadConfig(): RestampConfig {
      // A missing config file means defaults
      if (!configExists(configPath)) {
        return {};
      }
      let parsed: unknown;
      try {
        parsed = JSON5.parse(fs.readFileSync(configPath, "utf-8"));
      } catch (err) {
        throw new ConfigError(configPath, [err instanceof Error ? err.message : String(err)]);
      }
      const issues = validateConfig(parsed);
      if (issues.length > 0 || !Value.Check(RestampConfigSchema, parsed)) {
        throw new ConfigError(configPath, issues);
      }
      return parsed;
    },
  };
}

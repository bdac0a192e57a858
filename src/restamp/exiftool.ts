import { execFile } from "node:child_process";
import type { FieldAssignment } from "./field-map.js";
import type { MetadataTool, ToolFailureKind, ToolResult } from "./metadata-tool.js";

export const DEFAULT_TOOL_COMMAND = "exiftool";
export const DEFAULT_TOOL_TIMEOUT_MS = 60_000;

export type ExiftoolCommandOptions = {
  command?: string;
  /** Arguments placed before the generated ones (e.g. a wrapper script). */
  args?: string[];
  timeoutMs?: number;
};

type ExecOutcome =
  | { ok: true; stdout: string; stderr: string }
  | { ok: false; kind: ToolFailureKind; reason: string };

function errorCode(err: Error): unknown {
  return "code" in err ? err.code : undefined;
}

function run(
  command: string,
  args: string[],
  timeoutMs: number,
): Promise<ExecOutcome> {
  return new Promise((resolve) => {
    execFile(
      command,
      args,
      { timeout: timeoutMs, killSignal: "SIGKILL", maxBuffer: 4 * 1024 * 1024 },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ ok: true, stdout, stderr });
          return;
        }
        const code = errorCode(err);
        const diagnostic = (stderr || stdout).trim();
        if (code === "ENOENT") {
          resolve({ ok: false, kind: "not_installed", reason: `${command} not found` });
        } else if ("killed" in err && err.killed) {
          resolve({
            ok: false,
            kind: "timeout",
            reason: `${command} timed out after ${timeoutMs}ms`,
          });
        } else if (typeof code === "number") {
          resolve({
            ok: false,
            kind: "exit_status",
            reason: `${command} exited with status ${code}${diagnostic ? `: ${diagnostic}` : ""}`,
          });
        } else {
          resolve({ ok: false, kind: "spawn", reason: diagnostic || err.message });
        }
      },
    );
  });
}

export function toExiftoolArgs(filePath: string, fields: FieldAssignment[]): string[] {
  return ["-overwrite_original", ...fields.map((f) => `-${f.tag}=${f.value}`), filePath];
}

/**
 * MetadataTool backed by the exiftool command line. Every invocation runs
 * under a timeout and is killed when it expires.
 */
export function createExiftoolCommand(opts: ExiftoolCommandOptions = {}): MetadataTool {
  const command = opts.command ?? DEFAULT_TOOL_COMMAND;
  const baseArgs = opts.args ?? [];
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;

  return {
    async setFields(filePath: string, fields: FieldAssignment[]): Promise<ToolResult> {
      const result = await run(command, [...baseArgs, ...toExiftoolArgs(filePath, fields)], timeoutMs);
      if (!result.ok) {
        return result;
      }
      return { ok: true };
    },

    async version(): Promise<string | null> {
      const result = await run(command, [...baseArgs, "-ver"], timeoutMs);
      if (!result.ok) {
        return null;
      }
      return result.stdout.trim() || null;
    },
  };
}

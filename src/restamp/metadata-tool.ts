import type { FieldAssignment } from "./field-map.js";

export type ToolFailureKind = "not_installed" | "exit_status" | "timeout" | "spawn";

export type ToolResult = { ok: true } | { ok: false; kind: ToolFailureKind; reason: string };

/**
 * Anything that can set metadata fields on a file and report whether it did.
 * The pipeline depends on this seam only, never on a particular binary.
 */
export interface MetadataTool {
  setFields(filePath: string, fields: FieldAssignment[]): Promise<ToolResult>;
  /** Tool version, or null when the tool cannot be run. */
  version(): Promise<string | null>;
}

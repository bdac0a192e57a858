import fs from "node:fs/promises";
import path from "node:path";
import type { MetadataTool } from "./metadata-tool.js";
import type { NormalizedMetadata } from "./types.js";
import { copyFileExclusive } from "./copy.js";
import { buildFieldAssignments } from "./field-map.js";
import { classifyMediaKind } from "./media-kind.js";

export type WriteOptions = {
  tool: MetadataTool;
  timeZone: string;
  /** Set the copy's atime/mtime to the capture time. */
  setFileTimes: boolean;
};

export type WriteResult =
  | { ok: true; hash: string; bytes: number; fields: number }
  | {
      ok: false;
      kind: "filesystem" | "tool_invocation";
      reason: string;
      /** True when a copy was left at the destination. */
      copied: boolean;
      hash?: string;
      bytes: number;
      fields: number;
    };

/**
 * Copy `sourcePath` to `destinationPath` and stamp the metadata into the copy.
 * Empty metadata yields a verbatim copy without invoking the tool. A tool
 * failure leaves the copy in place for inspection.
 */
export async function writeMetadata(
  sourcePath: string,
  destinationPath: string,
  metadata: NormalizedMetadata,
  opts: WriteOptions,
): Promise<WriteResult> {
  const kind = classifyMediaKind(path.extname(sourcePath));
  if (!kind) {
    return {
      ok: false,
      kind: "filesystem",
      reason: `unsupported media type: ${path.basename(sourcePath)}`,
      copied: false,
      bytes: 0,
      fields: 0,
    };
  }

  const fields = buildFieldAssignments(kind, metadata, opts.timeZone);

  const copy = await copyFileExclusive({ src: sourcePath, dst: destinationPath });
  if (!copy.ok) {
    return {
      ok: false,
      kind: "filesystem",
      reason: `copy failed: ${copy.error}`,
      copied: false,
      bytes: 0,
      fields: fields.length,
    };
  }

  if (fields.length > 0) {
    const result = await opts.tool.setFields(destinationPath, fields);
    if (!result.ok) {
      return {
        ok: false,
        kind: "tool_invocation",
        reason: result.reason,
        copied: true,
        hash: copy.hash,
        bytes: copy.bytes,
        fields: fields.length,
      };
    }
  }

  if (opts.setFileTimes && metadata.capturedAt) {
    try {
      await fs.utimes(destinationPath, metadata.capturedAt, metadata.capturedAt);
    } catch (err) {
      return {
        ok: false,
        kind: "filesystem",
        reason: `could not set file times: ${err instanceof Error ? err.message : String(err)}`,
        copied: true,
        hash: copy.hash,
        bytes: copy.bytes,
        fields: fields.length,
      };
    }
  }

  return { ok: true, hash: copy.hash, bytes: copy.bytes, fields: fields.length };
}

import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { OnProgress } from "./types.js";
import { logger as rootLogger, type Logger } from "../logging/logger.js";
import { classifyMediaKind, type MediaKind } from "./media-kind.js";

export type ScannedFile = {
  rel_path: string;
  abs_path: string;
  size: number;
  media_kind: MediaKind;
  /** Set when the file was listed but could not be stat'ed. */
  error?: string;
};

export type ScanOptions = {
  onProgress?: OnProgress;
  logger?: Logger;
  listDir?: (dir: string) => Promise<Dirent[]>;
  statFile?: (file: string) => Promise<{ size: number }>;
};

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Walk the source tree one directory at a time. The root must be listable;
 * a subdirectory that cannot be listed is logged and left out, and a file
 * that cannot be stat'ed is returned with `error` set.
 */
export async function scanSourceFiles(
  sourcePath: string,
  options: ScanOptions = {},
): Promise<ScannedFile[]> {
  const listDir = options.listDir ?? ((dir: string) => fs.readdir(dir, { withFileTypes: true }));
  const statFile = options.statFile ?? ((file: string) => fs.stat(file));
  const log = (options.logger ?? rootLogger).child({ module: "scan" });

  const files: ScannedFile[] = [];
  const pending: string[] = [sourcePath];

  for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
    let entries: Dirent[];
    try {
      entries = await listDir(dir);
    } catch (err) {
      if (dir === sourcePath) {
        throw err;
      }
      log.warn({ dir: path.relative(sourcePath, dir) }, `skipping unreadable folder: ${describeError(err)}`);
      continue;
    }

    for (const entry of entries) {
      // Skip dotfiles and dot-directories
      if (entry.name.startsWith(".")) {
        continue;
      }
      const absPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(absPath);
        continue;
      }
      if (!entry.isFile()) {
        continue;
      }
      const kind = classifyMediaKind(path.extname(entry.name));
      if (!kind) {
        continue;
      }

      const relPath = path.relative(sourcePath, absPath);
      try {
        const stat = await statFile(absPath);
        files.push({ rel_path: relPath, abs_path: absPath, size: stat.size, media_kind: kind });
      } catch (err) {
        log.warn({ file: relPath }, `cannot stat file: ${describeError(err)}`);
        files.push({
          rel_path: relPath,
          abs_path: absPath,
          size: 0,
          media_kind: kind,
          error: describeError(err),
        });
      }

      if (options.onProgress && files.length % 100 === 0) {
        options.onProgress({ type: "restamp.scan.progress", discovered_count: files.length });
      }
    }
  }

  // Deterministic order: collision numbering depends on it
  files.sort((a, b) => (a.rel_path < b.rel_path ? -1 : a.rel_path > b.rel_path ? 1 : 0));

  return files;
}

import { createReadStream } from "node:fs";
import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { HashTransform } from "./hash-transform.js";

export type CopyResult =
  | { ok: true; hash: string; bytes: number }
  | { ok: false; error: string };

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Copy `src` to `dst`, hashing the bytes on the way. The destination is
 * opened with O_EXCL, so an existing file is never replaced; a copy that
 * fails midway is removed.
 */
export async function copyFileExclusive(opts: { src: string; dst: string }): Promise<CopyResult> {
  const { src, dst } = opts;

  let handle: FileHandle;
  try {
    await fs.mkdir(path.dirname(dst), { recursive: true });
    handle = await fs.open(dst, "wx");
  } catch (err) {
    return { ok: false, error: describe(err) };
  }

  try {
    const ht = new HashTransform();
    await pipeline(createReadStream(src), ht, handle.createWriteStream());
    const stat = await fs.stat(dst);
    return { ok: true, hash: ht.digestHex(), bytes: stat.size };
  } catch (err) {
    // The write stream may already have closed the handle
    await handle.close().catch(() => undefined);
    await fs.rm(dst, { force: true });
    return { ok: false, error: describe(err) };
  }
}

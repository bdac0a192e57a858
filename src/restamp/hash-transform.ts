import crypto from "node:crypto";
import { Transform, type TransformCallback } from "node:stream";

export const DEFAULT_HASH_ALGO = "sha256";

/**
 * Transform stream that passes data through unchanged while computing a hash.
 */
export class HashTransform extends Transform {
  private readonly hash: crypto.Hash;

  constructor(algo: string = DEFAULT_HASH_ALGO) {
    super();
    this.hash = crypto.createHash(algo);
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.hash.update(chunk);
    callback(null, chunk);
  }

  digestHex(): string {
    return this.hash.digest("hex");
  }
}

import crypto from "node:crypto";
import { Readable, Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { describe, expect, it } from "vitest";
import { HashTransform } from "./hash-transform.js";

describe("HashTransform", () => {
  it("passes data through unchanged and hashes it", async () => {
    const chunks: Buffer[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });
    const ht = new HashTransform();
    await pipeline(Readable.from([Buffer.from("hello "), Buffer.from("world")]), ht, sink);

    expect(Buffer.concat(chunks).toString()).toBe("hello world");
    expect(ht.digestHex()).toBe(crypto.createHash("sha256").update("hello world").digest("hex"));
  });

  it("supports another algorithm", async () => {
    const ht = new HashTransform("sha512");
    const sink = new Writable({
      write(_chunk: Buffer, _encoding, callback) {
        callback();
      },
    });
    await pipeline(Readable.from([Buffer.from("test data")]), ht, sink);
    expect(ht.digestHex()).toBe(crypto.createHash("sha512").update("test data").digest("hex"));
  });
});

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { Outcome, RestampProgressEvent } from "./types.js";
import { isVerifiable, readEmbeddedCaptureDate, verifyOutcomes } from "./verify.js";

/** Smallest JPEG exifr reads: SOI, one APP1 Exif segment with DateTimeOriginal, EOI. */
function jpegWithDateTimeOriginal(value: string): Buffer {
  const tiff = Buffer.alloc(64);
  tiff.write("II", 0, "latin1");
  tiff.writeUInt16LE(42, 2);
  tiff.writeUInt32LE(8, 4);
  // IFD0: one entry pointing at the Exif IFD
  tiff.writeUInt16LE(1, 8);
  tiff.writeUInt16LE(0x8769, 10);
  tiff.writeUInt16LE(4, 12);
  tiff.writeUInt32LE(1, 14);
  tiff.writeUInt32LE(26, 18);
  tiff.writeUInt32LE(0, 22);
  // Exif IFD: DateTimeOriginal as 20 ASCII bytes
  tiff.writeUInt16LE(1, 26);
  tiff.writeUInt16LE(0x9003, 28);
  tiff.writeUInt16LE(2, 30);
  tiff.writeUInt32LE(20, 32);
  tiff.writeUInt32LE(44, 36);
  tiff.writeUInt32LE(0, 40);
  tiff.write(`${value}\0`, 44, "latin1");

  const payload = Buffer.concat([Buffer.from("Exif\0\0", "latin1"), tiff]);
  const length = Buffer.alloc(2);
  length.writeUInt16BE(payload.length + 2, 0);
  return Buffer.concat([
    Buffer.from([0xff, 0xd8, 0xff, 0xe1]),
    length,
    payload,
    Buffer.from([0xff, 0xd9]),
  ]);
}

function outcome(overrides: Partial<Outcome>): Outcome {
  return {
    src_rel: "a.jpg",
    dst_rel: "a.jpg",
    media_kind: "image",
    status: "success",
    captured_at: "2023-11-14T22:13:19.000Z",
    bytes: 10,
    ...overrides,
  };
}

describe("verify", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "restamp-verify-test-"));
    await fs.writeFile(path.join(tmpDir, "good.jpg"), jpegWithDateTimeOriginal("2023:11:14 22:13:19"));
    await fs.writeFile(path.join(tmpDir, "stale.jpg"), jpegWithDateTimeOriginal("2001:01:01 00:00:00"));
    await fs.writeFile(path.join(tmpDir, "plain.jpg"), "not really a jpeg");
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("reads the embedded DateTimeOriginal", async () => {
    expect(await readEmbeddedCaptureDate(path.join(tmpDir, "good.jpg"))).toBe("2023:11:14 22:13:19");
  });

  it("returns null for unreadable files", async () => {
    expect(await readEmbeddedCaptureDate(path.join(tmpDir, "plain.jpg"))).toBeNull();
    expect(await readEmbeddedCaptureDate(path.join(tmpDir, "missing.jpg"))).toBeNull();
  });

  it("only verifies successful images with a capture date", () => {
    expect(isVerifiable(outcome({}))).toBe(true);
    expect(isVerifiable(outcome({ dst_rel: "a.png" }))).toBe(false);
    expect(isVerifiable(outcome({ media_kind: "video", dst_rel: "a.mp4" }))).toBe(false);
    expect(isVerifiable(outcome({ status: "skipped_no_sidecar" }))).toBe(false);
    expect(isVerifiable(outcome({ captured_at: undefined }))).toBe(false);
  });

  it("marks matches and mismatches", async () => {
    const outcomes = [
      outcome({ src_rel: "good.jpg", dst_rel: "good.jpg" }),
      outcome({ src_rel: "stale.jpg", dst_rel: "stale.jpg" }),
      outcome({ src_rel: "plain.jpg", dst_rel: "plain.jpg" }),
      outcome({ src_rel: "skip.jpg", dst_rel: "skip.jpg", status: "failed" }),
    ];
    const events: RestampProgressEvent[] = [];

    await verifyOutcomes(outcomes, tmpDir, "UTC", (event) => events.push(event));

    expect(outcomes[0]).toMatchObject({ verified: true, embedded_date: "2023:11:14 22:13:19" });
    expect(outcomes[1]).toMatchObject({ verified: false, embedded_date: "2001:01:01 00:00:00" });
    expect(outcomes[2].verified).toBe(false);
    expect(outcomes[2].embedded_date).toBeUndefined();
    expect(outcomes[3].verified).toBeUndefined();
    expect(events).toEqual([
      { type: "restamp.verify.progress", verified_count: 3, verified_total: 3 },
    ]);
  });

  it("compares against the configured time zone", async () => {
    const outcomes = [outcome({ dst_rel: "good.jpg", captured_at: "2023-11-14T21:13:19.000Z" })];
    await verifyOutcomes(outcomes, tmpDir, "Europe/Paris");
    expect(outcomes[0].verified).toBe(true);
  });
});

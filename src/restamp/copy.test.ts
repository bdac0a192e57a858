import crypto from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { copyFileExclusive } from "./copy.js";

describe("copyFileExclusive", () => {
  let tmpDir: string;
  let src: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "restamp-copy-test-"));
    src = path.join(tmpDir, "source.jpg");
    await fs.writeFile(src, "fake-jpg-data");
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("copies bytes and returns their hash", async () => {
    const dst = path.join(tmpDir, "out", "nested", "copy.jpg");
    const result = await copyFileExclusive({ src, dst });

    expect(result).toEqual({
      ok: true,
      hash: crypto.createHash("sha256").update("fake-jpg-data").digest("hex"),
      bytes: "fake-jpg-data".length,
    });
    expect(await fs.readFile(dst, "utf-8")).toBe("fake-jpg-data");
  });

  it("never replaces an existing destination", async () => {
    const dst = path.join(tmpDir, "taken.jpg");
    await fs.writeFile(dst, "keep me");

    const result = await copyFileExclusive({ src, dst });

    expect(result.ok).toBe(false);
    expect(await fs.readFile(dst, "utf-8")).toBe("keep me");
  });

  it("removes the destination when the source cannot be read", async () => {
    const dst = path.join(tmpDir, "orphan.jpg");
    const result = await copyFileExclusive({ src: path.join(tmpDir, "missing.jpg"), dst });

    expect(result.ok).toBe(false);
    await expect(fs.stat(dst)).rejects.toThrow();
  });
});

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createExiftoolCommand, toExiftoolArgs } from "./exiftool.js";

// Stand-in for the exiftool binary: the current node running an inline script.
function scriptTool(script: string, timeoutMs = 10_000) {
  return createExiftoolCommand({
    command: process.execPath,
    args: ["-e", script, "--"],
    timeoutMs,
  });
}

describe("toExiftoolArgs", () => {
  it("overwrites in place and puts the file last", () => {
    expect(
      toExiftoolArgs("/out/a.jpg", [
        { tag: "DateTimeOriginal", value: "2023:11:14 22:13:19" },
        { tag: "XMP-dc:Subject", value: "Trip" },
      ]),
    ).toEqual([
      "-overwrite_original",
      "-DateTimeOriginal=2023:11:14 22:13:19",
      "-XMP-dc:Subject=Trip",
      "/out/a.jpg",
    ]);
  });
});

describe("createExiftoolCommand", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "restamp-exiftool-test-"));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("passes the field arguments to the command", async () => {
    const target = path.join(tmpDir, "a.jpg");
    await fs.writeFile(target, "fake-jpg");
    const tool = scriptTool(
      'const a = process.argv.slice(1); require("node:fs").writeFileSync(a[a.length - 1] + ".args.json", JSON.stringify(a));',
    );

    const result = await tool.setFields(target, [
      { tag: "DateTimeOriginal", value: "2023:11:14 22:13:19" },
    ]);

    expect(result).toEqual({ ok: true });
    const recorded: unknown = JSON.parse(await fs.readFile(`${target}.args.json`, "utf-8"));
    expect(recorded).toEqual(["-overwrite_original", "-DateTimeOriginal=2023:11:14 22:13:19", target]);
  });

  it("reports a non-zero exit with its diagnostic", async () => {
    const tool = scriptTool('process.stderr.write("Warning: bad tag\\n"); process.exit(3);');
    const result = await tool.setFields(path.join(tmpDir, "b.jpg"), []);
    expect(result).toEqual({
      ok: false,
      kind: "exit_status",
      reason: `${process.execPath} exited with status 3: Warning: bad tag`,
    });
  });

  it("kills the command when it times out", async () => {
    const tool = scriptTool("setTimeout(() => {}, 30000);", 300);
    const result = await tool.setFields(path.join(tmpDir, "c.jpg"), []);
    expect(result).toEqual({
      ok: false,
      kind: "timeout",
      reason: `${process.execPath} timed out after 300ms`,
    });
  });

  it("reports a missing command", async () => {
    const command = path.join(tmpDir, "no-such-exiftool");
    const tool = createExiftoolCommand({ command });
    expect(await tool.setFields(path.join(tmpDir, "d.jpg"), [])).toEqual({
      ok: false,
      kind: "not_installed",
      reason: `${command} not found`,
    });
    expect(await tool.version()).toBeNull();
  });

  it("reads the version from stdout", async () => {
    const tool = scriptTool('process.stdout.write("12.76\\n");');
    expect(await tool.version()).toBe("12.76");
  });

  it("returns null when the version probe fails", async () => {
    const tool = scriptTool("process.exit(1);");
    expect(await tool.version()).toBeNull();
  });
});

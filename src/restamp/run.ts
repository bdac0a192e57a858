import fs from "node:fs/promises";
import path from "node:path";
import type { MetadataTool } from "./metadata-tool.js";
import type { ScannedFile, ScanOptions } from "./scan.js";
import type {
  NormalizedMetadata,
  OnProgress,
  Outcome,
  OutcomeStatus,
  RestampParams,
  RunManifest,
  RunTotals,
} from "./types.js";
import { resolveUserPath } from "../config/paths.js";
import { logger as rootLogger, type Logger } from "../logging/logger.js";
import { VERSION } from "../version.js";
import { DestinationAllocator, layoutPath, type DestinationPath } from "./allocate.js";
import { createExiftoolCommand } from "./exiftool.js";
import { writeManifest, writeRunReport } from "./report.js";
import { scanSourceFiles } from "./scan.js";
import { extractMetadata, MetadataParseError } from "./sidecar-extract.js";
import { SidecarMatcher } from "./sidecar-match.js";
import { verifyOutcomes } from "./verify.js";
import { writeMetadata } from "./write-metadata.js";

export type RestampDeps = {
  tool?: MetadataTool;
  logger?: Logger;
  now?: () => Date;
  scan?: Pick<ScanOptions, "listDir" | "statFile">;
};

type PlannedWrite = {
  index: number;
  file: ScannedFile;
  destination: DestinationPath;
  metadata: NormalizedMetadata;
  /** Status the file ends with if the write succeeds. */
  statusOnSuccess: OutcomeStatus;
};

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isInside(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

type NamedPath = { name: string; path: string };

/** Writes under `written` must never land in the `read` tree, nor the reverse. */
function assertSeparate(written: NamedPath, read: NamedPath): void {
  if (isInside(written.path, read.path)) {
    throw new Error(`${written.name} must not be inside ${read.name}: ${written.path}`);
  }
  if (isInside(read.path, written.path)) {
    throw new Error(`${read.name} must not be inside ${written.name}: ${read.path}`);
  }
}

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}

export function computeTotals(outcomes: Outcome[]): RunTotals {
  const count = (status: OutcomeStatus) => outcomes.filter((o) => o.status === status).length;
  return {
    file_count: outcomes.length,
    success_count: count("success"),
    no_sidecar_count: count("skipped_no_sidecar"),
    parse_error_count: count("skipped_metadata_parse_error"),
    collision_count: count("skipped_collision_exhausted"),
    fail_count: count("failed"),
    planned_count: count("planned"),
    total_bytes: outcomes.reduce((sum, o) => sum + (o.dst_rel && o.hash ? o.bytes : 0), 0),
    verified_count: outcomes.filter((o) => o.verified !== undefined).length,
    verified_ok: outcomes.filter((o) => o.verified === true).length,
    verified_mismatch: outcomes.filter((o) => o.verified === false).length,
  };
}

/**
 * Reconcile every media file under the source root with its sidecar and
 * write a corrected copy under the destination root. Per-file failures are
 * recorded in the manifest; only an unusable source or destination throws.
 */
export async function runRestamp(
  params: RestampParams,
  deps: RestampDeps = {},
  onProgress?: OnProgress,
): Promise<RunManifest> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now().toISOString();
  const startMs = Date.now();
  const log = (deps.logger ?? rootLogger).child({ module: "run" });

  const sourcePath = resolveUserPath(params.source_path);
  const destPath = resolveUserPath(params.dest_path);
  const sidecarPath = params.sidecar_path ? resolveUserPath(params.sidecar_path) : sourcePath;
  const reportDir = params.report_dir
    ? resolveUserPath(params.report_dir)
    : path.join(destPath, ".restamp");

  const srcStat = await fs.stat(sourcePath);
  if (!srcStat.isDirectory()) {
    throw new Error(`source_path is not a directory: ${sourcePath}`);
  }
  const source = { name: "source_path", path: sourcePath };
  const sidecars = { name: "sidecar_path", path: sidecarPath };
  assertSeparate({ name: "dest_path", path: destPath }, source);
  if (sidecarPath !== sourcePath) {
    assertSeparate({ name: "dest_path", path: destPath }, sidecars);
  }
  for (const read of [source, sidecars]) {
    if (isInside(reportDir, read.path)) {
      throw new Error(`report_dir must not be inside ${read.name}: ${reportDir}`);
    }
  }
  await fs.mkdir(destPath, { recursive: true });

  const tool = deps.tool ?? createExiftoolCommand();
  const toolVersion = await tool.version();
  if (toolVersion === null && !params.dry_run) {
    log.warn("metadata tool is not available; files with metadata will be flagged as failed");
  }

  onProgress?.({ type: "restamp.start", source_path: sourcePath, dest_path: destPath });

  const scanned = await scanSourceFiles(sourcePath, { ...deps.scan, onProgress, logger: log });
  onProgress?.({ type: "restamp.scan.progress", discovered_count: scanned.length });
  log.info({ count: scanned.length, source: sourcePath }, "scanned source tree");

  // The allocator and matcher live for exactly this run.
  const allocator = new DestinationAllocator(destPath, params.max_collision_attempts);
  const matcher = new SidecarMatcher({
    maxStemLength: params.max_stem_length,
    editedSuffixes: params.edited_suffixes,
  });

  const outcomes: Outcome[] = new Array(scanned.length);
  let doneCount = 0;
  const finish = (index: number, outcome: Outcome) => {
    outcomes[index] = outcome;
    doneCount++;
    if (outcome.status === "failed" || outcome.status === "skipped_collision_exhausted") {
      log.warn({ file: outcome.src_rel, status: outcome.status }, outcome.detail ?? outcome.status);
    } else {
      log.debug({ file: outcome.src_rel, status: outcome.status, dst: outcome.dst_rel }, "file done");
    }
    onProgress?.({
      type: "restamp.file.done",
      index: doneCount,
      total: scanned.length,
      rel_path: outcome.src_rel,
      status: outcome.status,
    });
  };

  // ── Phase 1: match, extract, allocate (sequential, so collision order is deterministic) ──
  const plan: PlannedWrite[] = [];
  for (let i = 0; i < scanned.length; i++) {
    const file = scanned[i];
    const base: Outcome = {
      src_rel: file.rel_path,
      media_kind: file.media_kind,
      status: "failed",
      bytes: file.size,
    };

    if (file.error !== undefined) {
      finish(i, { ...base, status: "failed", error_kind: "filesystem", detail: file.error });
      continue;
    }

    try {
      const sidecarDir = path.join(sidecarPath, path.dirname(file.rel_path));
      let metadata: NormalizedMetadata = {};
      let statusOnSuccess: OutcomeStatus = "success";
      try {
        const record = await matcher.match(file.abs_path, sidecarDir);
        if (!record) {
          statusOnSuccess = "skipped_no_sidecar";
          base.error_kind = "no_sidecar";
          base.detail = "no matching sidecar";
        } else {
          base.sidecar_rel = path.relative(sidecarPath, record.path);
          metadata = extractMetadata(record, { now: now() });
        }
      } catch (err) {
        if (!(err instanceof MetadataParseError)) {
          throw err;
        }
        statusOnSuccess = "skipped_metadata_parse_error";
        base.sidecar_rel = path.relative(sidecarPath, err.sidecarPath);
        base.error_kind = "metadata_parse";
        base.detail = err.message;
      }
      if (metadata.capturedAt) {
        base.captured_at = metadata.capturedAt.toISOString();
      }
      if (metadata.gps) {
        base.gps = metadata.gps;
      }
      if (metadata.album) {
        base.album = metadata.album;
      }

      const allocation = await allocator.allocate(layoutPath(file.rel_path, params.layout));
      if (!allocation.ok) {
        finish(i, {
          ...base,
          status: "skipped_collision_exhausted",
          error_kind: "collision_exhausted",
          detail: `no free destination name after ${allocation.attempts} attempts`,
        });
        continue;
      }
      base.dst_rel = allocation.path.rel_path;

      if (params.dry_run) {
        // Skips keep their classification; only real stamps become "planned"
        finish(i, { ...base, status: statusOnSuccess === "success" ? "planned" : statusOnSuccess });
        continue;
      }

      outcomes[i] = base;
      plan.push({
        index: i,
        file,
        destination: allocation.path,
        metadata,
        statusOnSuccess,
      });
    } catch (err) {
      finish(i, {
        ...base,
        status: "failed",
        error_kind: "filesystem",
        detail: describeError(err),
      });
    }
  }

  // ── Phase 2: copy + stamp over the pre-computed plan ──
  const concurrency = Math.max(1, Math.floor(params.concurrency));
  for (let i = 0; i < plan.length; i += concurrency) {
    const batch = plan.slice(i, i + concurrency);
    await Promise.all(
      batch.map(async (item) => {
        const base = outcomes[item.index];
        try {
          const result = await writeMetadata(
            item.file.abs_path,
            item.destination.abs_path,
            item.metadata,
            { tool, timeZone: params.time_zone, setFileTimes: params.set_file_times },
          );
          if (result.ok) {
            finish(item.index, {
              ...base,
              status: item.statusOnSuccess,
              bytes: result.bytes,
              hash: result.hash,
              fields_written: result.fields,
            });
          } else {
            finish(item.index, {
              ...base,
              dst_rel: result.copied ? base.dst_rel : undefined,
              status: "failed",
              error_kind: result.kind,
              detail: result.reason,
              hash: result.hash,
              bytes: result.copied ? result.bytes : base.bytes,
              fields_written: 0,
            });
          }
        } catch (err) {
          const copied = await pathExists(item.destination.abs_path);
          finish(item.index, {
            ...base,
            dst_rel: copied ? base.dst_rel : undefined,
            status: "failed",
            error_kind: "filesystem",
            detail: describeError(err),
          });
        }
      }),
    );
  }

  // ── Phase 3: read back embedded dates ──
  if (params.verify && !params.dry_run) {
    await verifyOutcomes(outcomes, destPath, params.time_zone, onProgress);
  }

  const totals = computeTotals(outcomes);
  const manifest: RunManifest = {
    tool_version: 1,
    app_version: VERSION,
    metadata_tool_version: toolVersion,
    source_path: sourcePath,
    sidecar_path: sidecarPath,
    dest_path: destPath,
    time_zone: params.time_zone,
    dry_run: params.dry_run,
    started_at: startedAt,
    finished_at: now().toISOString(),
    totals,
    outcomes,
  };

  const manifestPath = await writeManifest(reportDir, manifest);
  manifest.manifest_path = manifestPath;

  const reportPath = await writeRunReport(reportDir, manifest);
  manifest.report_path = reportPath;

  // Re-write manifest now that it includes paths
  await fs.writeFile(manifestPath, JSON.stringify(manifest, null, 2));

  onProgress?.({
    type: "restamp.report.generated",
    manifest_path: manifestPath,
    report_path: reportPath,
  });

  const elapsedMs = Date.now() - startMs;
  log.info(
    {
      success: totals.success_count,
      no_sidecar: totals.no_sidecar_count,
      parse_error: totals.parse_error_count,
      collision: totals.collision_count,
      failed: totals.fail_count,
      elapsed_ms: elapsedMs,
    },
    "run finished",
  );
  onProgress?.({
    type: "restamp.done",
    success_count: totals.success_count,
    fail_count: totals.fail_count,
    elapsed_ms: elapsedMs,
  });

  return manifest;
}

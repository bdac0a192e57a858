import chalk, { type ChalkInstance } from "chalk";
import type { Outcome, OutcomeStatus, RunManifest } from "../restamp/types.js";
import { formatBytes, needsAttention, STATUS_LABELS } from "../restamp/report.js";

function paintStatus(c: ChalkInstance, status: OutcomeStatus, text: string): string {
  switch (status) {
    case "success":
    case "planned":
      return c.green(text);
    case "failed":
    case "skipped_collision_exhausted":
      return c.red(text);
    default:
      return c.yellow(text);
  }
}

function outcomeLine(c: ChalkInstance, o: Outcome): string {
  const label = paintStatus(c, o.status, STATUS_LABELS[o.status]);
  const reason =
    o.detail ?? (o.verified === false ? `embedded date ${o.embedded_date ?? "missing"}` : "");
  return `  ${o.src_rel}: ${label}${reason ? c.dim(` (${reason})`) : ""}`;
}

/**
 * Human-readable run summary: totals, then every file that needs attention.
 */
export function formatRunSummary(manifest: RunManifest, c: ChalkInstance = chalk): string {
  const t = manifest.totals;
  const lines = [
    c.bold(manifest.dry_run ? "Restamp dry run" : "Restamp run"),
    `  files:              ${t.file_count}`,
    `  restamped:          ${c.green(String(t.success_count))}`,
    `  no sidecar:         ${c.yellow(String(t.no_sidecar_count))}`,
    `  unreadable sidecar: ${c.yellow(String(t.parse_error_count))}`,
    `  name collisions:    ${c.red(String(t.collision_count))}`,
    `  failed:             ${c.red(String(t.fail_count))}`,
  ];
  if (manifest.dry_run) {
    lines.push(`  planned:            ${t.planned_count}`);
  }
  lines.push(`  copied:             ${formatBytes(t.total_bytes)}`);
  if (t.verified_count > 0) {
    lines.push(`  verified:           ${t.verified_ok}/${t.verified_count}`);
  }

  const attention = manifest.outcomes.filter(needsAttention);
  if (attention.length > 0) {
    lines.push("", c.bold(`Needs attention (${attention.length})`));
    for (const o of attention) {
      lines.push(outcomeLine(c, o));
    }
  }
  if (manifest.report_path) {
    lines.push("", `Report: ${manifest.report_path}`);
  }
  return lines.join("\n");
}

/** Exit status for a finished run: 1 when any file was not fully processed. */
export function exitCodeFor(manifest: RunManifest): number {
  return manifest.totals.fail_count > 0 || manifest.totals.collision_count > 0 ? 1 : 0;
}

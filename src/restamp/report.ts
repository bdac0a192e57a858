import fs from "node:fs/promises";
import path from "node:path";
import type { Outcome, OutcomeStatus, RunManifest } from "./types.js";

function timestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export async function writeManifest(reportDir: string, manifest: RunManifest): Promise<string> {
  const dir = path.join(reportDir, "manifests");
  await fs.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, `${timestamp(new Date(manifest.started_at))}_run.json`);
  await fs.writeFile(filePath, JSON.stringify(manifest, null, 2));
  return filePath;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  }
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function elapsed(start: string, end: string): string {
  const ms = new Date(end).getTime() - new Date(start).getTime();
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  return `${Math.floor(ms / 60_000)}m ${Math.round((ms % 60_000) / 1000)}s`;
}

export const STATUS_LABELS: Record<OutcomeStatus, string> = {
  success: "restamped",
  skipped_no_sidecar: "no sidecar (copied as-is)",
  skipped_metadata_parse_error: "unreadable sidecar (copied as-is)",
  skipped_collision_exhausted: "no free name (not copied)",
  failed: "failed",
  planned: "planned",
};

function statusClass(status: OutcomeStatus): string {
  switch (status) {
    case "success":
    case "planned":
      return "status-ok";
    case "failed":
    case "skipped_collision_exhausted":
      return "status-error";
    default:
      return "status-skipped";
  }
}

/** Outcomes the user has to look at: anything that is not a plain success. */
export function needsAttention(outcome: Outcome): boolean {
  return (
    (outcome.status !== "success" && outcome.status !== "planned") || outcome.verified === false
  );
}

function renderRow(o: Outcome): string {
  const verifiedBadge =
    o.verified === true
      ? ' <span style="color:#2e7d32">&#x2713;</span>'
      : o.verified === false
        ? ' <span style="color:#c62828">&#x2717;</span>'
        : "";
  return `<tr class="${o.status === "failed" ? "error" : ""}"><td class="mono">${escapeHtml(o.src_rel)}</td><td class="mono">${escapeHtml(o.dst_rel ?? "-")}</td><td>${escapeHtml(o.captured_at ?? "-")}</td><td><span class="${statusClass(o.status)}">${escapeHtml(STATUS_LABELS[o.status])}</span>${verifiedBadge}</td></tr>`;
}

export async function writeRunReport(reportDir: string, manifest: RunManifest): Promise<string> {
  const dir = path.join(reportDir, "reports");
  await fs.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, `${timestamp(new Date(manifest.started_at))}_report.html`);

  const t = manifest.totals;
  const attention = manifest.outcomes.filter(needsAttention);

  const html = `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Restamp Run Report</title>
<style>
  body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Helvetica, Arial, sans-serif; margin: 2rem; color: #1a1a1a; background: #fafafa; }
  h1 { font-size: 1.5rem; margin-bottom: 0.5rem; }
  .summary { background: #fff; border: 1px solid #ddd; border-radius: 8px; padding: 1.25rem; margin-bottom: 1.5rem; }
  .summary dt { font-weight: 600; display: inline; }
  .summary dd { display: inline; margin-left: 0.25rem; margin-right: 1.5rem; }
  .note { background: #f0f4ff; border-left: 4px solid #4a7dff; padding: 0.75rem 1rem; margin-bottom: 1.5rem; border-radius: 0 4px 4px 0; }
  table { border-collapse: collapse; width: 100%; margin-bottom: 1.5rem; font-size: 0.875rem; }
  th, td { border: 1px solid #ddd; padding: 0.4rem 0.6rem; text-align: left; }
  th { background: #f5f5f5; font-weight: 600; }
  tr.error { background: #fff0f0; }
  .mono { font-family: "SF Mono", Monaco, Consolas, monospace; font-size: 0.8rem; }
  .footer { margin-top: 2rem; font-size: 0.75rem; color: #888; border-top: 1px solid #ddd; padding-top: 0.5rem; }
  .status-ok { color: #2e7d32; }
  .status-skipped { color: #f57c00; }
  .status-error { color: #c62828; font-weight: 600; }
</style>
</head>
<body>
<h1>Restamp Run Report</h1>
${manifest.dry_run ? `<div class="note"><strong>Dry run:</strong> nothing was copied or written.</div>` : ""}
<div class="summary">
  <dl>
    <dt>Source:</dt><dd class="mono">${escapeHtml(manifest.source_path)}</dd>
    <dt>Sidecars:</dt><dd class="mono">${escapeHtml(manifest.sidecar_path)}</dd><br>
    <dt>Destination:</dt><dd class="mono">${escapeHtml(manifest.dest_path)}</dd><br>
    <dt>Files:</dt><dd>${t.file_count}</dd>
    <dt>Restamped:</dt><dd>${t.success_count}</dd>
    <dt>No sidecar:</dt><dd>${t.no_sidecar_count}</dd>
    <dt>Unreadable sidecar:</dt><dd>${t.parse_error_count}</dd>
    <dt>Name collisions:</dt><dd>${t.collision_count}</dd>
    <dt>Failures:</dt><dd>${t.fail_count}</dd>${
      manifest.dry_run
        ? `
    <dt>Planned:</dt><dd>${t.planned_count}</dd>`
        : ""
    }<br>
    <dt>Total size:</dt><dd>${formatBytes(t.total_bytes)}</dd>
    <dt>Time zone:</dt><dd>${escapeHtml(manifest.time_zone)}</dd>
    <dt>Metadata tool:</dt><dd>${escapeHtml(manifest.metadata_tool_version ?? "unavailable")}</dd><br>
    <dt>Elapsed:</dt><dd>${elapsed(manifest.started_at, manifest.finished_at)}</dd>
    <dt>Started:</dt><dd>${escapeHtml(manifest.started_at)}</dd>
    <dt>Finished:</dt><dd>${escapeHtml(manifest.finished_at)}</dd>
  </dl>
</div>
${
  t.verified_count > 0
    ? `<div class="note"><strong>Verification:</strong> ${t.verified_ok}/${t.verified_count} embedded capture dates match${t.verified_mismatch > 0 ? `, <strong style="color:#c62828">${t.verified_mismatch} MISMATCH</strong>` : ""}</div>`
    : ""
}
${
  attention.length > 0
    ? `<h2>Needs Attention (${attention.length})</h2>
<table>
<tr><th>File</th><th>Status</th><th>Reason</th></tr>
${attention.map((o) => `<tr class="${o.status === "failed" ? "error" : ""}"><td class="mono">${escapeHtml(o.src_rel)}</td><td><span class="${statusClass(o.status)}">${escapeHtml(STATUS_LABELS[o.status])}</span></td><td>${escapeHtml(o.detail ?? (o.verified === false ? `embedded date ${o.embedded_date ?? "missing"}` : "-"))}</td></tr>`).join("\n")}
</table>`
    : ""
}
<h2>All Files (${manifest.outcomes.length})</h2>
<table>
<tr><th>Source</th><th>Destination</th><th>Captured</th><th>Status</th></tr>
${manifest.outcomes.map(renderRow).join("\n")}
</table>

${manifest.manifest_path ? `<p>Manifest JSON: <span class="mono">${escapeHtml(manifest.manifest_path)}</span></p>` : ""}

<div class="footer">
  Generated by restamp v${escapeHtml(manifest.app_version)} &middot; tool_version ${manifest.tool_version}
</div>
</body>
</html>`;

  await fs.writeFile(filePath, html);
  return filePath;
}

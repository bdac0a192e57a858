import type { DestinationLayout } from "./allocate.js";
import type { MediaKind } from "./media-kind.js";

export type GpsCoordinate = {
  lat: number;
  lon: number;
};

export type NormalizedMetadata = {
  capturedAt?: Date;
  gps?: GpsCoordinate;
  album?: string;
};

export type SidecarRecord = {
  path: string;
  raw: string;
};

export type OutcomeStatus =
  | "success"
  | "skipped_no_sidecar"
  | "skipped_metadata_parse_error"
  | "skipped_collision_exhausted"
  | "failed"
  | "planned"; // dry runs only

export type ErrorKind =
  | "no_sidecar"
  | "metadata_parse"
  | "collision_exhausted"
  | "tool_invocation"
  | "filesystem";

export type Outcome = {
  src_rel: string; // relative to source root
  dst_rel?: string; // relative to destination root, absent when nothing was allocated
  media_kind: MediaKind;
  status: OutcomeStatus;
  detail?: string;
  error_kind?: ErrorKind;
  sidecar_rel?: string; // relative to sidecar root
  captured_at?: string; // ISO 8601
  gps?: GpsCoordinate;
  album?: string;
  bytes: number;
  hash?: string; // sha256 of the copied bytes
  fields_written?: number;
  verified?: boolean; // true=embedded date matches, false=mismatch, undefined=not checked
  embedded_date?: string;
};

export type RestampParams = {
  source_path: string;
  dest_path: string;
  sidecar_path?: string; // defaults to source_path
  time_zone: string;
  max_stem_length: number;
  edited_suffixes: string[];
  max_collision_attempts: number;
  layout: DestinationLayout;
  concurrency: number;
  set_file_times: boolean;
  verify: boolean;
  dry_run: boolean;
  report_dir?: string; // defaults to <dest_path>/.restamp
};

export type RunTotals = {
  file_count: number;
  success_count: number;
  no_sidecar_count: number;
  parse_error_count: number;
  collision_count: number;
  fail_count: number;
  planned_count: number;
  total_bytes: number;
  verified_count: number;
  verified_ok: number;
  verified_mismatch: number;
};

export type RunManifest = {
  tool_version: 1;
  app_version: string;
  metadata_tool_version: string | null;
  source_path: string;
  sidecar_path: string;
  dest_path: string;
  time_zone: string;
  dry_run: boolean;
  started_at: string; // ISO 8601
  finished_at: string;
  manifest_path?: string;
  report_path?: string;
  totals: RunTotals;
  outcomes: Outcome[];
};

export type RestampProgressEvent =
  | { type: "restamp.start"; source_path: string; dest_path: string }
  | { type: "restamp.scan.progress"; discovered_count: number }
  | {
      type: "restamp.file.done";
      index: number;
      total: number;
      rel_path: string;
      status: OutcomeStatus;
    }
  | { type: "restamp.verify.progress"; verified_count: number; verified_total: number }
  | { type: "restamp.report.generated"; manifest_path: string; report_path: string }
  | {
      type: "restamp.done";
      success_count: number;
      fail_count: number;
      elapsed_ms: number;
    };

export type OnProgress = (event: RestampProgressEvent) => void;

import path from "node:path";
import type { OnProgress, Outcome } from "./types.js";
import { formatExifDate } from "./field-map.js";

/** Containers whose EXIF block exifr reads back reliably. */
const VERIFIABLE_EXTENSIONS = new Set([".jpg", ".jpeg", ".heic"]);

/**
 * Read the raw `DateTimeOriginal` string embedded in a file. Returns null on
 * any error, or when the tag is missing.
 */
export async function readEmbeddedCaptureDate(filePath: string): Promise<string | null> {
  try {
    // Dynamic import to avoid loading exifr unless verification is on
    const exifr = await import("exifr");
    const data: unknown = await exifr.parse(filePath, {
      pick: ["DateTimeOriginal"],
      reviveValues: false,
    });
    if (typeof data !== "object" || data === null || !("DateTimeOriginal" in data)) {
      return null;
    }
    const value = data.DateTimeOriginal;
    return typeof value === "string" ? value.trim() : null;
  } catch {
    return null;
  }
}

export function isVerifiable(outcome: Outcome): boolean {
  return (
    outcome.status === "success" &&
    outcome.media_kind === "image" &&
    outcome.captured_at !== undefined &&
    outcome.dst_rel !== undefined &&
    VERIFIABLE_EXTENSIONS.has(path.extname(outcome.dst_rel).toLowerCase())
  );
}

/**
 * Re-read the capture date of every verifiable copy and compare it with the
 * value that was written. Mutates outcomes in place: sets embedded_date and
 * verified.
 */
export async function verifyOutcomes(
  outcomes: Outcome[],
  destRoot: string,
  timeZone: string,
  onProgress?: OnProgress,
): Promise<void> {
  const toVerify = outcomes.filter(isVerifiable);
  const total = toVerify.length;

  for (let i = 0; i < toVerify.length; i++) {
    const entry = toVerify[i];
    if (entry.dst_rel === undefined || entry.captured_at === undefined) {
      continue;
    }
    const expected = formatExifDate(new Date(entry.captured_at), timeZone).local;
    const embedded = await readEmbeddedCaptureDate(path.join(destRoot, entry.dst_rel));
    if (embedded !== null) {
      entry.embedded_date = embedded;
    }
    entry.verified = embedded === expected;

    if (onProgress && (i + 1) % 10 === 0) {
      onProgress({ type: "restamp.verify.progress", verified_count: i + 1, verified_total: total });
    }
  }

  if (onProgress && total > 0) {
    onProgress({ type: "restamp.verify.progress", verified_count: total, verified_total: total });
  }
}

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { GpsCoordinate, NormalizedMetadata, SidecarRecord } from "./types.js";

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

export class MetadataParseError extends Error {
  constructor(
    readonly sidecarPath: string,
    message: string,
  ) {
    super(message);
    this.name = "MetadataParseError";
  }
}

// Each field is checked on its own so one malformed field never costs the others.
const TimeFieldSchema = Type.Object({
  timestamp: Type.Union([Type.String(), Type.Number()]),
});

const GeoFieldSchema = Type.Object({
  latitude: Type.Number(),
  longitude: Type.Number(),
});

const AlbumTitlesSchema = Type.Array(Type.Unknown());

export type ExtractOptions = {
  now?: Date;
};

/**
 * Parse a sidecar record into normalized metadata. Throws MetadataParseError
 * only when the document itself is unusable; bad field values become absent.
 */
export function extractMetadata(
  record: SidecarRecord,
  opts: ExtractOptions = {},
): NormalizedMetadata {
  let doc: unknown;
  try {
    doc = JSON.parse(record.raw);
  } catch (err) {
    throw new MetadataParseError(
      record.path,
      `invalid sidecar JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (!isPlainObject(doc)) {
    throw new MetadataParseError(record.path, "sidecar is not a JSON object");
  }

  const metadata: NormalizedMetadata = {};

  const taken = doc.photoTakenTime;
  const capturedAt = Value.Check(TimeFieldSchema, taken)
    ? parseEpochSeconds(taken.timestamp, opts.now ?? new Date())
    : null;
  if (capturedAt) {
    metadata.capturedAt = capturedAt;
  }

  const gps = readGps(doc.geoData) ?? readGps(doc.geoDataExif);
  if (gps) {
    metadata.gps = gps;
  }

  const album = readAlbum(doc);
  if (album) {
    metadata.album = album;
  }

  return metadata;
}

/**
 * Epoch seconds → Date. Rejects non-numeric values, instants before 1970 and
 * instants more than a day past `now`.
 */
export function parseEpochSeconds(value: unknown, now: Date): Date | null {
  let seconds: number;
  if (typeof value === "number") {
    seconds = value;
  } else if (typeof value === "string" && /^\s*-?\d+(\.\d+)?\s*$/.test(value)) {
    seconds = Number(value);
  } else {
    return null;
  }
  if (!Number.isFinite(seconds) || seconds < 0) {
    return null;
  }
  const ms = seconds * 1000;
  if (ms > now.getTime() + ONE_DAY_MS) {
    return null;
  }
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Both coordinates must be nonzero and in range; (0, 0) is the exporter's "not recorded". */
export function readGps(value: unknown): GpsCoordinate | null {
  if (!Value.Check(GeoFieldSchema, value)) {
    return null;
  }
  const { latitude: lat, longitude: lon } = value;
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    return null;
  }
  if (lat === 0 || lon === 0) {
    return null;
  }
  if (Math.abs(lat) > 90 || Math.abs(lon) > 180) {
    return null;
  }
  return { lat, lon };
}

function readAlbum(doc: Record<string, unknown>): string | null {
  const titles = doc.albumTitles;
  if (Value.Check(AlbumTitlesSchema, titles)) {
    for (const title of titles) {
      if (typeof title === "string" && title.trim()) {
        return title.trim();
      }
    }
  }
  const album = doc.album;
  if (typeof album === "string" && album.trim()) {
    return album.trim();
  }
  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

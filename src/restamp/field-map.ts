import type { MediaKind } from "./media-kind.js";
import type { GpsCoordinate, NormalizedMetadata } from "./types.js";

export type FieldAssignment = {
  tag: string;
  value: string;
};

type DateStyle = "zoned" | "utc";

type FieldMap = {
  dateTags: readonly string[];
  dateStyle: DateStyle;
  offsetTags: readonly string[];
  gps: (gps: GpsCoordinate) => FieldAssignment[];
  albumTags: (album: string) => FieldAssignment[];
};

function exifGps(gps: GpsCoordinate): FieldAssignment[] {
  return [
    { tag: "GPSLatitude", value: String(Math.abs(gps.lat)) },
    { tag: "GPSLatitudeRef", value: gps.lat >= 0 ? "N" : "S" },
    { tag: "GPSLongitude", value: String(Math.abs(gps.lon)) },
    { tag: "GPSLongitudeRef", value: gps.lon >= 0 ? "E" : "W" },
  ];
}

function albumKeywords(album: string): FieldAssignment[] {
  return [
    { tag: "XMP-dc:Subject", value: album },
    { tag: "XMP-lr:HierarchicalSubject", value: `Album|${album}` },
  ];
}

/**
 * Tags stamped per media kind. Image readers key off the EXIF "date taken"
 * fields; video containers ignore those and expose the QuickTime creation
 * dates instead, which are stored in UTC.
 */
export const FIELD_MAPS: Record<MediaKind, FieldMap> = {
  image: {
    dateTags: ["DateTimeOriginal", "CreateDate", "ModifyDate"],
    dateStyle: "zoned",
    offsetTags: ["OffsetTimeOriginal", "OffsetTimeDigitized", "OffsetTime"],
    gps: exifGps,
    albumTags: albumKeywords,
  },
  video: {
    dateTags: [
      "QuickTime:CreateDate",
      "QuickTime:ModifyDate",
      "QuickTime:TrackCreateDate",
      "QuickTime:TrackModifyDate",
      "QuickTime:MediaCreateDate",
      "QuickTime:MediaModifyDate",
    ],
    dateStyle: "utc",
    offsetTags: [],
    gps: (gps) => [{ tag: "Keys:GPSCoordinates", value: `${gps.lat}, ${gps.lon}` }],
    albumTags: albumKeywords,
  },
};

export type ExifDate = {
  /** `YYYY:MM:DD HH:MM:SS` wall-clock time in the requested zone */
  local: string;
  /** `+HH:MM` / `-HH:MM` */
  offset: string;
};

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

function partsToNumber(parts: Intl.DateTimeFormatPart[], type: string): number {
  const value = parts.find((p) => p.type === type)?.value;
  return value ? Number(value) : Number.NaN;
}

/**
 * Format an instant as an EXIF date string in an IANA time zone.
 * Throws RangeError for an unknown zone.
 */
export function formatExifDate(date: Date, timeZone: string): ExifDate {
  const utcMs = Math.floor(date.getTime() / 1000) * 1000;
  const fmt = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  });
  const parts = fmt.formatToParts(new Date(utcMs));
  const year = partsToNumber(parts, "year");
  const month = partsToNumber(parts, "month");
  const day = partsToNumber(parts, "day");
  const hour = partsToNumber(parts, "hour");
  const minute = partsToNumber(parts, "minute");
  const second = partsToNumber(parts, "second");

  const asIfUtc = Date.UTC(year, month - 1, day, hour, minute, second);
  const offsetMinutes = Math.round((asIfUtc - utcMs) / 60_000);
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);

  return {
    local: `${pad(year, 4)}:${pad(month)}:${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}`,
    offset: `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`,
  };
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Field assignments for one file. Absent metadata contributes nothing, so an
 * empty list means there is nothing to stamp.
 */
export function buildFieldAssignments(
  kind: MediaKind,
  metadata: NormalizedMetadata,
  timeZone: string,
): FieldAssignment[] {
  const map = FIELD_MAPS[kind];
  const fields: FieldAssignment[] = [];

  if (metadata.capturedAt) {
    if (map.dateStyle === "utc") {
      const { local } = formatExifDate(metadata.capturedAt, "UTC");
      for (const tag of map.dateTags) {
        fields.push({ tag, value: `${local}+00:00` });
      }
    } else {
      const { local, offset } = formatExifDate(metadata.capturedAt, timeZone);
      for (const tag of map.dateTags) {
        fields.push({ tag, value: local });
      }
      for (const tag of map.offsetTags) {
        fields.push({ tag, value: offset });
      }
    }
  }

  if (metadata.gps) {
    fields.push(...map.gps(metadata.gps));
  }

  if (metadata.album) {
    fields.push(...map.albumTags(metadata.album));
  }

  return fields;
}

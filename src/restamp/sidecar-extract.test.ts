import { describe, expect, it } from "vitest";
import {
  extractMetadata,
  MetadataParseError,
  parseEpochSeconds,
  readGps,
} from "./sidecar-extract.js";

const NOW = new Date("2024-06-01T00:00:00Z");

function extract(doc: unknown) {
  return extractMetadata({ path: "/sidecars/a.jpg.json", raw: JSON.stringify(doc) }, { now: NOW });
}

describe("extractMetadata", () => {
  it("reads a string epoch timestamp", () => {
    const metadata = extract({ photoTakenTime: { timestamp: "1699999999", formatted: "x" } });
    expect(metadata.capturedAt?.toISOString()).toBe("2023-11-14T22:13:19.000Z");
  });

  it("reads a numeric epoch timestamp", () => {
    const metadata = extract({ photoTakenTime: { timestamp: 1600000000 } });
    expect(metadata.capturedAt?.getTime()).toBe(1600000000 * 1000);
  });

  it("ignores creationTime when photoTakenTime is missing", () => {
    const metadata = extract({ creationTime: { timestamp: "1600000000" } });
    expect(metadata).toEqual({});
  });

  it("drops an unparseable timestamp but keeps other fields", () => {
    const metadata = extract({
      photoTakenTime: { timestamp: "yesterday" },
      geoData: { latitude: 48.8584, longitude: 2.2945 },
    });
    expect(metadata).toEqual({ gps: { lat: 48.8584, lon: 2.2945 } });
  });

  it("treats 0,0 geoData as absent", () => {
    const metadata = extract({
      photoTakenTime: { timestamp: "1699999999" },
      geoData: { latitude: 0, longitude: 0, altitude: 0 },
    });
    expect(metadata.gps).toBeUndefined();
  });

  it("falls back to geoDataExif", () => {
    const metadata = extract({
      geoData: { latitude: 0, longitude: 0 },
      geoDataExif: { latitude: -33.8568, longitude: 151.2153 },
    });
    expect(metadata.gps).toEqual({ lat: -33.8568, lon: 151.2153 });
  });

  it("takes the first non-empty album title", () => {
    const metadata = extract({ albumTitles: ["  ", 7, " Summer Trip "] });
    expect(metadata.album).toBe("Summer Trip");
  });

  it("falls back to a plain album field", () => {
    expect(extract({ album: "Family" }).album).toBe("Family");
  });

  it("returns empty metadata for an empty object", () => {
    expect(extract({})).toEqual({});
  });

  it("throws MetadataParseError for invalid JSON", () => {
    const record = { path: "/sidecars/broken.jpg.json", raw: "{ not json" };
    expect(() => extractMetadata(record)).toThrow(MetadataParseError);
    expect(() => extractMetadata(record)).toThrow(/^invalid sidecar JSON: /);
  });

  it("throws MetadataParseError for a non-object document", () => {
    const record = { path: "/sidecars/list.jpg.json", raw: "[1, 2]" };
    expect(() => extractMetadata(record)).toThrow("sidecar is not a JSON object");
  });

  it("keeps the sidecar path on the error", () => {
    try {
      extractMetadata({ path: "/sidecars/broken.jpg.json", raw: "" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MetadataParseError);
      expect(err instanceof MetadataParseError ? err.sidecarPath : null).toBe(
        "/sidecars/broken.jpg.json",
      );
    }
  });
});

describe("parseEpochSeconds", () => {
  it("accepts the epoch itself", () => {
    expect(parseEpochSeconds("0", NOW)?.getTime()).toBe(0);
  });

  it("rejects negative values", () => {
    expect(parseEpochSeconds("-1", NOW)).toBeNull();
  });

  it("rejects instants more than a day in the future", () => {
    const twoDaysAhead = NOW.getTime() / 1000 + 2 * 86_400;
    expect(parseEpochSeconds(twoDaysAhead, NOW)).toBeNull();
  });

  it("accepts instants within a day of now", () => {
    const hourAhead = NOW.getTime() / 1000 + 3600;
    expect(parseEpochSeconds(hourAhead, NOW)?.getTime()).toBe(NOW.getTime() + 3_600_000);
  });

  it("rejects non-numeric strings", () => {
    expect(parseEpochSeconds("12abc", NOW)).toBeNull();
    expect(parseEpochSeconds("", NOW)).toBeNull();
    expect(parseEpochSeconds(null, NOW)).toBeNull();
  });
});

describe("readGps", () => {
  it("rejects out-of-range coordinates", () => {
    expect(readGps({ latitude: 91, longitude: 10 })).toBeNull();
    expect(readGps({ latitude: 10, longitude: -181 })).toBeNull();
  });

  it("rejects a single zero coordinate", () => {
    expect(readGps({ latitude: 51.5, longitude: 0 })).toBeNull();
  });

  it("rejects non-numeric coordinates", () => {
    expect(readGps({ latitude: "51.5", longitude: "-0.1" })).toBeNull();
  });
});

import fs from "node:fs/promises";
import path from "node:path";
import type { SidecarRecord } from "./types.js";
import { MetadataParseError } from "./sidecar-extract.js";

export const DEFAULT_MAX_STEM_LENGTH = 46;
export const DEFAULT_EDITED_SUFFIXES = ["-edited"];

const SIDECAR_EXT = ".json";
const SUPPLEMENTAL = ".supplemental-metadata";

export type SidecarMatchOptions = {
  /** Longest sidecar filename (without `.json`) the exporter writes. */
  maxStemLength: number;
  /** Suffixes an editor appends to the media name, e.g. `photo-edited.jpg`. */
  editedSuffixes: string[];
};

/**
 * Candidate sidecar filenames for a media filename, most specific first.
 * The first entry is always the exact `<name>.<ext>.json`.
 */
export function sidecarCandidates(filename: string, opts: SidecarMatchOptions): string[] {
  const stems: string[] = [];
  const push = (stem: string) => {
    if (stem) {
      stems.push(stem);
    }
  };

  const addForName = (name: string) => {
    push(name);
    push(name + SUPPLEMENTAL);
  };

  addForName(filename);
  for (const stem of [...stems]) {
    push(stem.slice(0, opts.maxStemLength));
  }

  // photo(1).jpg -> photo.jpg(1).json
  const ext = path.extname(filename);
  const base = filename.slice(0, filename.length - ext.length);
  const counter = base.match(/^(.*)(\(\d+\))$/);
  if (counter) {
    const [, name, suffix] = counter;
    for (const stem of [name + ext, name + ext + SUPPLEMENTAL]) {
      push(stem + suffix);
      push(stem.slice(0, opts.maxStemLength) + suffix);
    }
  }

  // photo-edited.jpg -> sidecar of photo.jpg
  for (const suffix of opts.editedSuffixes) {
    if (suffix && base.toLowerCase().endsWith(suffix.toLowerCase())) {
      const original = base.slice(0, base.length - suffix.length) + ext;
      addForName(original);
      push(original.slice(0, opts.maxStemLength));
      push((original + SUPPLEMENTAL).slice(0, opts.maxStemLength));
    }
  }

  // photo.json
  push(base);

  return [...new Set(stems.map((stem) => stem + SIDECAR_EXT))];
}

type DirListing = {
  exact: Set<string>;
  folded: Map<string, string>; // lower-cased name -> actual name
};

/**
 * Locates the sidecar record of a media file. Directory listings are cached
 * for the lifetime of the matcher, so one instance should serve one run.
 */
export class SidecarMatcher {
  private readonly listings = new Map<string, Promise<DirListing>>();

  constructor(private readonly opts: SidecarMatchOptions) {}

  /**
   * Resolve and read the sidecar of `mediaPath`. A matched sidecar that
   * cannot be read throws {@link MetadataParseError}.
   */
  async match(mediaPath: string, sidecarDir: string): Promise<SidecarRecord | null> {
    const listing = await this.listDir(sidecarDir);
    for (const candidate of sidecarCandidates(path.basename(mediaPath), this.opts)) {
      const actual = listing.exact.has(candidate)
        ? candidate
        : listing.folded.get(candidate.toLowerCase());
      if (actual) {
        const sidecarPath = path.join(sidecarDir, actual);
        try {
          const raw = await fs.readFile(sidecarPath, "utf-8");
          return { path: sidecarPath, raw };
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          throw new MetadataParseError(sidecarPath, `unreadable sidecar: ${reason}`);
        }
      }
    }
    return null;
  }

  private listDir(dir: string): Promise<DirListing> {
    let listing = this.listings.get(dir);
    if (!listing) {
      listing = readListing(dir);
      this.listings.set(dir, listing);
    }
    return listing;
  }
}

/** A missing directory lists as empty. Only files and symlinks are listed. */
async function readListing(dir: string): Promise<DirListing> {
  const listing: DirListing = { exact: new Set(), folded: new Map() };
  let names: string[];
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    names = entries
      .filter((entry) => entry.isFile() || entry.isSymbolicLink())
      .map((entry) => entry.name);
  } catch (err) {
    if (isNotFound(err)) {
      return listing;
    }
    throw err;
  }
  for (const name of names.toSorted()) {
    if (!name.toLowerCase().endsWith(SIDECAR_EXT)) {
      continue;
    }
    listing.exact.add(name);
    const key = name.toLowerCase();
    if (!listing.folded.has(key)) {
      listing.folded.set(key, name);
    }
  }
  return listing;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export type MediaKind = "image" | "video";

type MediaKindSpec = {
  extensions: readonly string[];
};

/**
 * Extensions recognised per media kind. A new extension is one entry here;
 * the tags each kind receives live in field-map.ts.
 */
export const MEDIA_KINDS: Record<MediaKind, MediaKindSpec> = {
  image: { extensions: [".jpg", ".jpeg", ".heic", ".png"] },
  video: { extensions: [".mp4", ".mov", ".m4v"] },
};

export const ALL_MEDIA_KINDS: readonly MediaKind[] = ["image", "video"];

const KIND_BY_EXTENSION = new Map<string, MediaKind>(
  ALL_MEDIA_KINDS.flatMap((kind) =>
    MEDIA_KINDS[kind].extensions.map((ext) => [ext, kind] as const),
  ),
);

/**
 * Classify a file extension (with leading dot, any case). Returns null for
 * files the pipeline does not handle.
 */
export function classifyMediaKind(ext: string): MediaKind | null {
  return KIND_BY_EXTENSION.get(ext.toLowerCase()) ?? null;
}

export function isEligibleExtension(ext: string): boolean {
  return KIND_BY_EXTENSION.has(ext.toLowerCase());
}

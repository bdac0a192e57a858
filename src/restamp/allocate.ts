import fs from "node:fs/promises";
import path from "node:path";

export const DEFAULT_MAX_COLLISION_ATTEMPTS = 1000;

/**
 * `mirror` keeps each file's relative directory; `flat` puts every file
 * directly under the destination root.
 */
export type DestinationLayout = "mirror" | "flat";

export type DestinationPath = {
  abs_path: string;
  rel_path: string; // relative to the destination root
};

export type AllocationResult =
  | { ok: true; path: DestinationPath }
  | { ok: false; attempts: number; rel_path: string };

/**
 * `dir/name.ext` → `dir/name (n).ext`. n = 0 returns the path unchanged.
 */
export function disambiguate(relPath: string, n: number): string {
  if (n === 0) {
    return relPath;
  }
  const { dir, name, ext } = path.parse(relPath);
  return path.join(dir, `${name} (${n})${ext}`);
}

export function layoutPath(relPath: string, layout: DestinationLayout): string {
  return layout === "flat" ? path.basename(relPath) : relPath;
}

/**
 * Hands out destination paths for one run. A path is reserved before
 * `allocate` resolves, so no two callers ever receive the same path even if
 * their copies happen later. Allocation is serialized through a promise chain.
 */
export class DestinationAllocator {
  private readonly issued = new Set<string>();
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    readonly destRoot: string,
    readonly maxAttempts: number = DEFAULT_MAX_COLLISION_ATTEMPTS,
  ) {}

  allocate(relativePath: string): Promise<AllocationResult> {
    const next = this.tail.then(() => this.allocateLocked(relativePath));
    this.tail = next.catch(() => undefined);
    return next;
  }

  isIssued(relPath: string): boolean {
    return this.issued.has(issuedKey(relPath));
  }

  get issuedCount(): number {
    return this.issued.size;
  }

  private async allocateLocked(relativePath: string): Promise<AllocationResult> {
    // n = 0 is the undecorated name; the bound applies to the numbered retries
    for (let n = 0; n <= this.maxAttempts; n++) {
      const candidate = disambiguate(relativePath, n);
      const key = issuedKey(candidate);
      if (this.issued.has(key)) {
        continue;
      }
      const absPath = path.join(this.destRoot, candidate);
      if (await exists(absPath)) {
        continue;
      }
      this.issued.add(key);
      return { ok: true, path: { abs_path: absPath, rel_path: candidate } };
    }
    return { ok: false, attempts: this.maxAttempts, rel_path: relativePath };
  }
}

// Destination volumes are often case-insensitive; reserve conservatively.
function issuedKey(relPath: string): string {
  return path.normalize(relPath).toLowerCase();
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return false;
    }
    throw err;
  }
}

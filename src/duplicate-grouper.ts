import type { Fingerprint } from './fingerprint.js';

export interface DuplicateGroup {
  digest: string;
  size: number;
  /** Member paths in the order they were added. */
  paths: string[];
}

/**
 * Accumulates fingerprint → paths for one target tree. Owned by the caller and handed to
 * whatever adds to it; nothing else writes to it.
 */
export class DuplicateGrouper {
  private readonly buckets = new Map<string, DuplicateGroup>();

  private static keyOf(fingerprint: Fingerprint): string {
    return `${fingerprint.size}:${fingerprint.digest}`;
  }

  /**
   * Zero-byte files are refused: they belong to the empties pass.
   */
  add(path: string, fingerprint: Fingerprint): boolean {
    if (fingerprint.size === 0) {
      return false;
    }

    const key = DuplicateGrouper.keyOf(fingerprint);
    const bucket = this.buckets.get(key);
    if (bucket) {
      if (!bucket.paths.includes(path)) {
        bucket.paths.push(path);
      }
    } else {
      this.buckets.set(key, { digest: fingerprint.digest, size: fingerprint.size, paths: [path] });
    }
    return true;
  }

  get fileCount(): number {
    let count = 0;
    for (const bucket of this.buckets.values()) {
      count += bucket.paths.length;
    }
    return count;
  }

  /** Groups with at least two members, in first-seen order. */
  groups(): DuplicateGroup[] {
    const groups: DuplicateGroup[] = [];
    for (const bucket of this.buckets.values()) {
      if (bucket.paths.length > 1) {
        groups.push({ ...bucket, paths: [...bucket.paths] });
      }
    }
    return groups;
  }
}

/**
 * Tag Index
 *
 * Secondary index `tag → Set<id>` kept beside the primary quote store.
 * Buckets are created on first use and dropped as soon as they empty out.
 */

import { isNonBlank } from '../errors.js';

const EMPTY: ReadonlySet<string> = new Set<string>();

export class TagIndex {
  private buckets = new Map<string, Set<string>>();

  add(id: string, tags: Iterable<string | null | undefined>): void {
    for (const tag of tags) {
      if (!isNonBlank(tag)) continue;

      let bucket = this.buckets.get(tag);
      if (!bucket) {
        bucket = new Set();
        this.buckets.set(tag, bucket);
      }
      bucket.add(id);
    }
  }

  remove(id: string, tags: Iterable<string | null | undefined>): void {
    for (const tag of tags) {
      if (!isNonBlank(tag)) continue;

      const bucket = this.buckets.get(tag);
      if (!bucket) continue;

      bucket.delete(id);
      if (bucket.size === 0) {
        this.buckets.delete(tag);
      }
    }
  }

  /**
   * Ids filed under exactly this tag (empty for an unknown tag)
   */
  lookup(tag: string): ReadonlySet<string> {
    return this.buckets.get(tag) ?? EMPTY;
  }

  /**
   * Union of the buckets for every given tag. No tags means no matches.
   */
  lookupAny(tags: Iterable<string | null | undefined> | null | undefined): Set<string> {
    const ids = new Set<string>();
    if (!tags) return ids;

    for (const tag of tags) {
      if (!isNonBlank(tag)) continue;
      for (const id of this.lookup(tag)) {
        ids.add(id);
      }
    }
    return ids;
  }

  has(tag: string): boolean {
    return this.buckets.has(tag);
  }

  clear(): void {
    this.buckets.clear();
  }

  /** Number of non-empty buckets */
  get size(): number {
    return this.buckets.size;
  }
}

import { extractProductId } from './identifier.js';

export type Admission =
  | { status: 'new'; asin: string }
  | { status: 'seen'; asin: string }
  | { status: 'malformed' };

/**
 * Identifiers already handled in one traversal. Create one per run.
 */
export class DedupTracker {
  private readonly visited = new Set<string>();
  private skippedCount = 0;

  isNew(asin: string): boolean {
    return !this.visited.has(asin);
  }

  mark(asin: string): void {
    this.visited.add(asin);
  }

  /**
   * Classifies a listing link. Links without a valid identifier are never new
   * and count towards `skipped`.
   */
  admit(url: string): Admission {
    const asin = extractProductId(url);
    if (!asin) {
      this.skippedCount += 1;
      return { status: 'malformed' };
    }
    return this.isNew(asin) ? { status: 'new', asin } : { status: 'seen', asin };
  }

  get size(): number {
    return this.visited.size;
  }

  get skipped(): number {
    return this.skippedCount;
  }
}

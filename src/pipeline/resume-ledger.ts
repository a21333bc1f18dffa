/**
 * ResumeLedger - identifiers already summarized or scheduled in this run
 *
 * Seeded from the summary store in resume mode. Only the producer calls
 * `admit`, so a listing that repeats an identifier schedules it once.
 */
export class ResumeLedger {
  private readonly seen: Set<string>;

  constructor(identifiers: Iterable<string> = []) {
    this.seen = new Set(identifiers);
  }

  get size(): number {
    return this.seen.size;
  }

  has(identifier: string): boolean {
    return this.seen.has(identifier);
  }

  /**
   * @returns false when the identifier was already known
   */
  admit(identifier: string): boolean {
    if (this.seen.has(identifier)) {
      return false;
    }
    this.seen.add(identifier);
    return true;
  }
}

/**
 * @fileoverview Ordinal scales
 *
 * A scale is a finite, totally ordered list of levels declared once in the
 * knowledge base (lowest first). Threshold requirements and `at_least` /
 * `at_most` conditions compare positions on a scale, never raw strings.
 */

export class OrdinalScale {
  private readonly positions: ReadonlyMap<string, number>;

  constructor(
    readonly name: string,
    readonly levels: readonly string[],
  ) {
    this.positions = new Map(levels.map((level, index) => [level, index]));
  }

  /** Position of `level`, or -1 when it is not on the scale. */
  indexOf(level: string): number {
    return this.positions.get(level) ?? -1;
  }

  has(level: unknown): level is string {
    return typeof level === 'string' && this.positions.has(level);
  }

  /**
   * Negative when `a` is below `b`, zero when equal, positive when above.
   * Levels not on the scale sort below every known level.
   */
  compare(a: string, b: string): number {
    return this.indexOf(a) - this.indexOf(b);
  }

  atLeast(actual: string, threshold: string): boolean {
    return this.has(actual) && this.has(threshold) && this.compare(actual, threshold) >= 0;
  }

  atMost(actual: string, ceiling: string): boolean {
    return this.has(actual) && this.has(ceiling) && this.compare(actual, ceiling) <= 0;
  }

  max(a: string, b: string): string {
    return this.compare(a, b) >= 0 ? a : b;
  }

  min(a: string, b: string): string {
    return this.compare(a, b) <= 0 ? a : b;
  }

  get lowest(): string | undefined {
    return this.levels[0];
  }

  get highest(): string | undefined {
    return this.levels[this.levels.length - 1];
  }
}

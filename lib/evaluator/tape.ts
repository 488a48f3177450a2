/**
 * Growable tape of single-code-point symbols.
 *
 * Backed by two stacks meeting at the original cell 0: `front` holds the
 * prepended cells in reverse, `back` holds the rest, so growth at either end
 * is amortized O(1).
 *
 * @module
 */

export class Tape {
  private readonly front: string[] = [];
  private readonly back: string[];

  constructor(input = "") {
    this.back = Array.from(input);
  }

  get length(): number {
    return this.front.length + this.back.length;
  }

  inBounds(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.length;
  }

  /** Returns undefined outside the tape. */
  read(index: number): string | undefined {
    if (!this.inBounds(index)) {
      return undefined;
    }
    return index < this.front.length
      ? this.front[this.front.length - 1 - index]
      : this.back[index - this.front.length];
  }

  write(index: number, symbol: string): void {
    if (!this.inBounds(index)) {
      throw new RangeError(
        `tape index ${index} out of bounds [0, ${this.length})`,
      );
    }
    if (index < this.front.length) {
      this.front[this.front.length - 1 - index] = symbol;
    } else {
      this.back[index - this.front.length] = symbol;
    }
  }

  prepend(symbol: string): void {
    this.front.push(symbol);
  }

  append(symbol: string): void {
    this.back.push(symbol);
  }

  toArray(): string[] {
    return [...this.front].reverse().concat(this.back);
  }

  toString(): string {
    return this.toArray().join("");
  }
}

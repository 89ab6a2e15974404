export type ConstSet<T> = Pick<Set<T>, 'size' | 'has'> & Iterable<T>;

/**
 * An immutable set of numbers that can be reduced to a canonical
 * string key.
 */
export class NumberSet implements ConstSet<number> {
  private data: Set<number>;
  constructor(items: Iterable<number> = []) {
    this.data = new Set(items);
  }
  get size(): number {
    return this.data.size;
  }

  [Symbol.iterator]() {
    return this.data[Symbol.iterator]();
  }

  has(a: number): boolean {
    return this.data.has(a);
  }

  /**
   * The members in ascending order.
   */
  sorted(): number[] {
    return Array.from(this.data.values()).sort((a, b) => a - b);
  }

  hash(): string {
    return `{${this.sorted().join(',')}}`;
  }
}

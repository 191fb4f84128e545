/**
 * Ordered map over numeric keys
 *
 * Keys are kept in a sorted array; point reads, and the nearest-neighbour
 * lookups the booking index needs, are binary searches.
 */
export class SortedMap<V> {
  private keys: number[] = [];
  private values: V[] = [];

  get size(): number {
    return this.keys.length;
  }

  // Index of the first key >= target
  private lowerBound(target: number): number {
    let lo = 0;
    let hi = this.keys.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const key = this.keys[mid];
      if (key !== undefined && key < target) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  // Index of the first key > target
  private upperBound(target: number): number {
    let lo = 0;
    let hi = this.keys.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const key = this.keys[mid];
      if (key !== undefined && key <= target) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  private entryAt(index: number): [number, V] | null {
    const key = this.keys[index];
    const value = this.values[index];
    if (key === undefined || value === undefined) return null;
    return [key, value];
  }

  has(key: number): boolean {
    return this.keys[this.lowerBound(key)] === key;
  }

  get(key: number): V | undefined {
    const index = this.lowerBound(key);
    return this.keys[index] === key ? this.values[index] : undefined;
  }

  set(key: number, value: V): void {
    const index = this.lowerBound(key);
    if (this.keys[index] === key) {
      this.values[index] = value;
      return;
    }
    this.keys.splice(index, 0, key);
    this.values.splice(index, 0, value);
  }

  delete(key: number): boolean {
    const index = this.lowerBound(key);
    if (this.keys[index] !== key) return false;
    this.keys.splice(index, 1);
    this.values.splice(index, 1);
    return true;
  }

  /** Entry with the smallest key strictly greater than `key`. */
  higherEntry(key: number): [number, V] | null {
    return this.entryAt(this.upperBound(key));
  }

  /** Entry with the largest key strictly less than `key`. */
  lowerEntry(key: number): [number, V] | null {
    return this.entryAt(this.lowerBound(key) - 1);
  }

  *entries(): IterableIterator<[number, V]> {
    for (let i = 0; i < this.keys.length; i++) {
      const entry = this.entryAt(i);
      if (entry) yield entry;
    }
  }
}

import { SortedMap } from '../src/utils/sorted-map';

describe('SortedMap', () => {
  let map: SortedMap<string>;

  beforeEach(() => {
    map = new SortedMap<string>();
    map.set(30, 'c');
    map.set(10, 'a');
    map.set(20, 'b');
  });

  it('iterates in key order regardless of insertion order', () => {
    expect([...map.entries()]).toEqual([
      [10, 'a'],
      [20, 'b'],
      [30, 'c'],
    ]);
    expect(map.size).toBe(3);
  });

  it('overwrites the value of an existing key', () => {
    map.set(20, 'B');
    expect(map.get(20)).toBe('B');
    expect(map.size).toBe(3);
  });

  it('finds the nearest entry strictly above a key', () => {
    expect(map.higherEntry(5)).toEqual([10, 'a']);
    expect(map.higherEntry(10)).toEqual([20, 'b']);
    expect(map.higherEntry(25)).toEqual([30, 'c']);
    expect(map.higherEntry(30)).toBeNull();
  });

  it('finds the nearest entry strictly below a key', () => {
    expect(map.lowerEntry(10)).toBeNull();
    expect(map.lowerEntry(11)).toEqual([10, 'a']);
    expect(map.lowerEntry(30)).toEqual([20, 'b']);
    expect(map.lowerEntry(100)).toEqual([30, 'c']);
  });

  it('deletes keys', () => {
    expect(map.delete(20)).toBe(true);
    expect(map.delete(20)).toBe(false);
    expect(map.has(20)).toBe(false);
    expect(map.get(20)).toBeUndefined();
    expect(map.higherEntry(10)).toEqual([30, 'c']);
  });

  it('answers lookups on an empty map', () => {
    const empty = new SortedMap<number>();
    expect(empty.higherEntry(0)).toBeNull();
    expect(empty.lowerEntry(0)).toBeNull();
    expect(empty.has(0)).toBe(false);
  });
});

/**
 * Unit tests for the bounded series buffer
 */

import { SeriesBuffer, DEFAULT_BUFFER_CAPACITY } from '../../src/acquisition/series-buffer';

describe('SeriesBuffer', () => {
  it('should default to a capacity of 100', () => {
    expect(new SeriesBuffer().capacity).toBe(100);
    expect(DEFAULT_BUFFER_CAPACITY).toBe(100);
  });

  it('should keep values in insertion order below capacity', () => {
    const buffer = new SeriesBuffer(5);
    [3, 1, 2].forEach(value => buffer.push(value));

    expect(buffer.length).toBe(3);
    expect(buffer.snapshot()).toEqual([3, 1, 2]);
  });

  it('should hold exactly the last CAP values after CAP + k pushes', () => {
    const capacity = 100;
    for (const k of [1, 2, 50, 250]) {
      const buffer = new SeriesBuffer(capacity);
      const pushed = Array.from({ length: capacity + k }, (_, i) => i * 0.5);
      pushed.forEach(value => buffer.push(value));

      expect(buffer.length).toBe(capacity);
      expect(buffer.snapshot()).toEqual(pushed.slice(-capacity));
    }
  });

  it('should return a copy that later pushes do not change', () => {
    const buffer = new SeriesBuffer(2);
    buffer.push(1);
    const snapshot = buffer.snapshot();
    buffer.push(2);
    buffer.push(3);
    snapshot.push(99);

    expect(snapshot).toEqual([1, 99]);
    expect(buffer.snapshot()).toEqual([2, 3]);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new SeriesBuffer(0)).toThrow(RangeError);
    expect(() => new SeriesBuffer(2.5)).toThrow('Buffer capacity must be a positive integer, got 2.5');
  });
});

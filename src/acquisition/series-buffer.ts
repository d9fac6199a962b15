export const DEFAULT_BUFFER_CAPACITY = 100;

/**
 * Fixed-capacity FIFO of the most recent samples of one channel
 */
export class SeriesBuffer {
  private values: number[] = [];

  constructor(readonly capacity: number = DEFAULT_BUFFER_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.values.length;
  }

  /**
   * Append a value, evicting the oldest one once capacity is exceeded
   */
  push(value: number): void {
    this.values.push(value);
    if (this.values.length > this.capacity) {
      this.values.shift();
    }
  }

  /**
   * Copy of the contents, oldest first
   */
  snapshot(): number[] {
    return this.values.slice();
  }
}

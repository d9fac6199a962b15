/**
 * Raw value generator used when no scan plan is active, so the pipeline runs
 * without hardware
 */
export interface StandInSource {
  next(channelCount: number): number[];
}

/**
 * Independent uniform values in [min, max) per channel
 */
export class RandomStandInSource implements StandInSource {
  constructor(
    private readonly min = 0,
    private readonly max = 100,
    private readonly random: () => number = Math.random
  ) {}

  next(channelCount: number): number[] {
    return Array.from({ length: channelCount }, () => this.min + (this.max - this.min) * this.random());
  }
}

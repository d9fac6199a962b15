import { Coefficient, ConditioningCoefficients, IDENTITY_CONDITIONING } from './signal-conditioner';

export interface ChannelInfo extends ConditioningCoefficients {
  index: number;
  name: string;
}

export function defaultChannelName(index: number): string {
  return `Channel_${index + 1}`;
}

/**
 * One acquisition channel. The index is fixed for the session; the name and
 * the conditioning coefficients may change between ticks.
 */
export class Channel {
  readonly index: number;
  private name: string;
  private coefficients: Readonly<ConditioningCoefficients>;

  constructor(index: number, name?: string, coefficients: Partial<ConditioningCoefficients> = {}) {
    this.index = index;
    this.name = name ?? defaultChannelName(index);
    this.coefficients = Object.freeze({ ...IDENTITY_CONDITIONING, ...coefficients });
  }

  getName(): string {
    return this.name;
  }

  setName(name: string): void {
    this.name = name;
  }

  /**
   * Current coefficients. The whole triple is replaced on every update, so a
   * reader always sees one complete set.
   */
  getCoefficients(): Readonly<ConditioningCoefficients> {
    return this.coefficients;
  }

  setCoefficients(zero: Coefficient, multiplier: Coefficient, gain: Coefficient): void {
    this.coefficients = Object.freeze({ zero, multiplier, gain });
  }

  toInfo(): ChannelInfo {
    return { index: this.index, name: this.name, ...this.coefficients };
  }
}

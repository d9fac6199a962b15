import { RegisterTransport } from '../common/types';
import { Logger } from '../../logging/logger';
import { decodeRegisters } from './register-decoder';
import { REGISTER_WIDTH, SourceBinding, SourceBindingInput, SourceBindingSchema } from './types';

/**
 * A successful read of one binding
 */
export interface ScanReading {
  /** Position of the binding in the plan (feeds the channel with the same index) */
  position: number;
  name: string;
  value: number;
}

/**
 * Ordered list of register bindings executed once per tick.
 *
 * Failed reads (transport absence or decoder rejection) are left out of the
 * result instead of being filled with zero, so a failed read stays
 * distinguishable from a device that reported zero.
 */
export class SourceScanPlan {
  private readonly bindings: readonly SourceBinding[];

  constructor(bindings: readonly SourceBindingInput[] = []) {
    this.bindings = Object.freeze(bindings.map(binding => Object.freeze(SourceBindingSchema.parse(binding))));
  }

  get size(): number {
    return this.bindings.length;
  }

  isEmpty(): boolean {
    return this.bindings.length === 0;
  }

  getBindings(): SourceBinding[] {
    return this.bindings.map(binding => ({ ...binding }));
  }

  /**
   * Issue one read per binding, in order, and decode each result
   */
  async scan(transport: RegisterTransport, logger?: Logger): Promise<ScanReading[]> {
    const readings: ScanReading[] = [];

    for (const [position, binding] of this.bindings.entries()) {
      const words = await transport.readRegisters(binding.address, REGISTER_WIDTH[binding.type], binding.slaveId);
      if (!words) {
        logger?.debug(`No response for ${binding.name} (slave ${binding.slaveId}, address ${binding.address})`);
        continue;
      }

      const value = decodeRegisters(words, binding.type);
      if (value === undefined) {
        logger?.debug(`Could not decode ${binding.name} as ${binding.type} from ${words.length} word(s)`);
        continue;
      }

      readings.push({ position, name: binding.name, value });
    }

    return readings;
  }
}

/**
 * Name → value view of a scan result
 */
export function toNamedValues(readings: readonly ScanReading[]): Map<string, number> {
  return new Map(readings.map(reading => [reading.name, reading.value]));
}

/**
 * Per-channel raw vector: the reading at position k feeds channel k, every
 * channel without a reading gets 0. Always exactly `channelCount` long.
 */
export function assembleChannelVector(readings: readonly ScanReading[], channelCount: number): number[] {
  const vector = new Array<number>(channelCount).fill(0);
  for (const reading of readings) {
    if (reading.position < channelCount) {
      vector[reading.position] = reading.value;
    }
  }
  return vector;
}

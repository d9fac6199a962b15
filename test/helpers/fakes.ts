/**
 * In-process stand-ins for the logger, the transports and the stand-in source
 */

import { RegisterTransport } from '../../src/adapters/common/types';
import { ConnectionError } from '../../src/lib/errors';
import { Logger } from '../../src/logging/logger';
import { StandInSource } from '../../src/acquisition/stand-in-source';

export class MockLogger implements Logger {
  debug = jest.fn();
  info = jest.fn();
  warn = jest.fn();
  error = jest.fn();
}

type RegisterKey = `${number}:${number}`;

/**
 * Register transport backed by a map of (slave, address) → words
 */
export class FakeRegisterTransport implements RegisterTransport {
  readonly kind = 'modbus' as const;
  readonly reads: Array<{ address: number; count: number; slaveId: number }> = [];
  ports: string[] = ['/dev/ttyUSB0'];
  failConnect = false;

  private connectedTo: string | null = null;
  private registers = new Map<RegisterKey, number[] | null>();

  setRegisters(slaveId: number, address: number, words: number[] | null): void {
    this.registers.set(`${slaveId}:${address}`, words);
  }

  async listAvailable(): Promise<string[]> {
    return [...this.ports];
  }

  async connect(endpoint: string): Promise<void> {
    if (this.failConnect) {
      throw new ConnectionError(endpoint, new Error('No such file or directory'));
    }
    this.connectedTo = endpoint;
  }

  async disconnect(): Promise<void> {
    this.connectedTo = null;
  }

  isConnected(): boolean {
    return this.connectedTo !== null;
  }

  getEndpoint(): string | null {
    return this.connectedTo;
  }

  async readRegisters(address: number, count: number, slaveId: number): Promise<number[] | null> {
    this.reads.push({ address, count, slaveId });
    return this.registers.get(`${slaveId}:${address}`) ?? null;
  }

  async readCoils(): Promise<boolean[] | null> {
    return null;
  }
}

/**
 * Stand-in source that replays queued vectors, then a constant vector
 */
export class ScriptedStandInSource implements StandInSource {
  private readonly queue: Array<number[] | Error>;

  constructor(queue: Array<number[] | Error> = [], private readonly fallback = 1) {
    this.queue = [...queue];
  }

  next(channelCount: number): number[] {
    const item = this.queue.shift();
    if (item instanceof Error) {
      throw item;
    }
    return item ?? new Array<number>(channelCount).fill(this.fallback);
  }
}

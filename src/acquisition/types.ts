import { TransportKind } from '../adapters/common/types';

export type SessionState = 'idle' | 'running';

/**
 * Immutable result of one tick, as published to display consumers
 */
export interface TickSnapshot {
  readonly sequence: number;
  readonly timestamp: Date;
  readonly raw: readonly number[];
  readonly values: readonly number[];
}

export interface SessionStatus {
  state: SessionState;
  connected: boolean;
  transport: TransportKind;
  endpoint: string | null;
  logFile: string | null;
  /** Whether the CSV log is open */
  recording: boolean;
  loggedRows: number;
  ticks: number;
  failedTicks: number;
  lastError: string | null;
}

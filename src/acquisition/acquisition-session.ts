import { EventEmitter } from 'events';
import { ZodError } from 'zod';
import { AnyTransport, isRegisterTransport } from '../adapters/common/types';
import { SourceScanPlan, assembleChannelVector } from '../adapters/modbus/scan-plan';
import { SourceBinding, SourceBindingInput } from '../adapters/modbus/types';
import {
  AlreadyRunningError,
  ChannelIndexError,
  ConfigValidationError,
  SessionStateError,
  describeError,
  fromZodError,
  toError
} from '../lib/errors';
import { Logger } from '../logging/logger';
import { AcquisitionLogger, AcquisitionLoggerOptions } from './acquisition-logger';
import { Channel, ChannelInfo } from './channel';
import { SeriesBuffer, DEFAULT_BUFFER_CAPACITY } from './series-buffer';
import { Coefficient, ConditioningCoefficients, tryCondition } from './signal-conditioner';
import { RandomStandInSource, StandInSource } from './stand-in-source';
import { SessionStatus, TickSnapshot } from './types';

export const DEFAULT_BAUD_RATE = 9600;
export const DEFAULT_TIMEOUT = 1000; // ms
export const DEFAULT_CHANNEL_COUNT = 3;
export const MAX_CHANNEL_COUNT = 8;
export const DEFAULT_TICK_INTERVAL = 100; // ms
export const DEFAULT_FAILURE_BACKOFF = 1000; // ms
export const DEFAULT_STOP_TIMEOUT = 2000; // ms

export interface ChannelSettings extends Partial<ConditioningCoefficients> {
  name?: string;
}

export interface AcquisitionSessionOptions {
  transport: AnyTransport;
  logger: Logger;
  channelCount?: number;
  /** Per-channel overrides, by position */
  channels?: ChannelSettings[];
  scanPlan?: SourceBindingInput[];
  connectionTimeout?: number;
  tickInterval?: number;
  failureBackoff?: number;
  stopTimeout?: number;
  bufferCapacity?: number;
  recording?: AcquisitionLoggerOptions;
  standInSource?: StandInSource;
  now?: () => Date;
}

/**
 * State of one start → stop cycle. The loop only ever watches its own run,
 * so a loop that outlives the stop wait cannot continue into a later run.
 */
interface ActiveRun {
  active: boolean;
  starting: Promise<string>;
  buffers: SeriesBuffer[];
  loop: Promise<void> | null;
  wake: (() => void) | null;
  stopping: Promise<void> | null;
}

/**
 * Acquisition Session
 * ===================
 *
 * Aggregate root of the pipeline: owns the transport, the channels, the scan
 * plan, the series buffers and the CSV log, and runs the acquisition loop
 * (scan → decode → condition → log → buffer → publish) until stopped.
 *
 * Events:
 *   'started' (logFile: string)
 *   'stopped'
 *   'tick' (snapshot: TickSnapshot)
 *   'tick-error' (error: Error)
 *   'connected' (endpoint: string)
 *   'disconnected'
 */
export class AcquisitionSession extends EventEmitter {
  private readonly transport: AnyTransport;
  private readonly logger: Logger;
  private readonly recorder: AcquisitionLogger;
  private readonly standIn: StandInSource;
  private readonly channels: Channel[];
  private readonly connectionTimeout: number;
  private readonly tickInterval: number;
  private readonly failureBackoff: number;
  private readonly stopTimeout: number;
  private readonly bufferCapacity: number;
  private readonly now: () => Date;

  private scanPlan: SourceScanPlan;
  private current: ActiveRun | null = null;
  private buffers: SeriesBuffer[];
  private latest: TickSnapshot | null = null;
  private ticks = 0;
  private failedTicks = 0;
  private lastError: string | null = null;

  constructor(options: AcquisitionSessionOptions) {
    super();
    const channelCount = options.channelCount ?? DEFAULT_CHANNEL_COUNT;
    if (!Number.isInteger(channelCount) || channelCount < 1 || channelCount > MAX_CHANNEL_COUNT) {
      throw new ConfigValidationError(`Channel count must be between 1 and ${MAX_CHANNEL_COUNT}, got ${channelCount}`);
    }

    this.transport = options.transport;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.recorder = new AcquisitionLogger(this.logger, { now: this.now, ...options.recording });
    this.standIn = options.standInSource ?? new RandomStandInSource();
    this.connectionTimeout = options.connectionTimeout ?? DEFAULT_TIMEOUT;
    this.tickInterval = options.tickInterval ?? DEFAULT_TICK_INTERVAL;
    this.failureBackoff = options.failureBackoff ?? DEFAULT_FAILURE_BACKOFF;
    this.stopTimeout = options.stopTimeout ?? DEFAULT_STOP_TIMEOUT;
    this.bufferCapacity = options.bufferCapacity ?? DEFAULT_BUFFER_CAPACITY;

    this.channels = Array.from({ length: channelCount }, (_, index) => {
      const settings = options.channels?.[index] ?? {};
      const { name, ...coefficients } = settings;
      return new Channel(index, name, coefficients);
    });
    this.buffers = this.allocateBuffers();
    this.scanPlan = this.buildScanPlan(options.scanPlan ?? []);
  }

  // ==========================================================================
  // Connection
  // ==========================================================================

  listAvailablePorts(): Promise<string[]> {
    return this.transport.listAvailable();
  }

  /**
   * Open the transport. Rejects with ConnectionError when the endpoint cannot
   * be opened, and with SessionStateError while acquisition is running.
   */
  async connect(endpoint: string, speed: number = DEFAULT_BAUD_RATE): Promise<void> {
    if (this.current) {
      throw new SessionStateError('Cannot connect while acquisition is running');
    }
    await this.transport.connect(endpoint, speed, this.connectionTimeout);
    this.emit('connected', endpoint);
  }

  /**
   * Close the transport, stopping acquisition first when it is running
   */
  async disconnect(): Promise<void> {
    if (this.current) {
      await this.stop();
    }
    const wasConnected = this.transport.isConnected();
    await this.transport.disconnect();
    if (wasConnected) {
      this.emit('disconnected');
    }
  }

  isConnected(): boolean {
    return this.transport.isConnected();
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  /**
   * Replace the scan plan. Only allowed while idle.
   */
  setScanPlan(bindings: readonly SourceBindingInput[]): void {
    if (this.current) {
      throw new SessionStateError('Scan plan can only be changed while acquisition is stopped');
    }
    this.scanPlan = this.buildScanPlan(bindings);
    this.logger.info(`Scan plan set: ${this.scanPlan.size} binding(s)`);
  }

  getScanPlan(): SourceBinding[] {
    return this.scanPlan.getBindings();
  }

  /**
   * Update a channel's coefficients. Takes effect on the current or next tick.
   */
  setChannelConditioning(index: number, zero: Coefficient, multiplier: Coefficient, gain: Coefficient): void {
    this.getChannel(index).setCoefficients(zero, multiplier, gain);
  }

  /**
   * Rename a channel. A running log keeps the names captured at start.
   */
  setChannelName(index: number, name: string): void {
    this.getChannel(index).setName(name);
  }

  getChannels(): ChannelInfo[] {
    return this.channels.map(channel => channel.toInfo());
  }

  get channelCount(): number {
    return this.channels.length;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Open a new log and launch the acquisition loop. Resolves to the log path.
   * Rejects with AlreadyRunningError, without side effects, while running.
   */
  async start(fileStem?: string): Promise<string> {
    if (this.current) {
      throw new AlreadyRunningError();
    }

    const names = this.channels.map(channel => channel.getName());
    const run: ActiveRun = {
      active: true,
      starting: this.recorder.start(names, fileStem),
      buffers: this.allocateBuffers(),
      loop: null,
      wake: null,
      stopping: null
    };
    this.current = run;

    let logFile: string;
    try {
      logFile = await run.starting;
    } catch (error) {
      if (this.current === run) {
        this.current = null;
      }
      this.logger.error(`Failed to start acquisition: ${describeError(error)}`);
      throw error;
    }

    // stop() was called while the log was being opened; it closes the log
    if (!run.active) {
      return logFile;
    }

    this.buffers = run.buffers;
    this.latest = null;
    this.ticks = 0;
    this.failedTicks = 0;
    this.lastError = null;

    run.loop = this.runLoop(run);
    this.logger.info(`Data acquisition started (${names.length} channels)`);
    this.emit('started', logFile);
    return logFile;
  }

  /**
   * Signal the loop to stop, wait a bounded time for it to exit, close the log.
   * Safe to call while idle.
   */
  stop(): Promise<void> {
    const run = this.current;
    if (!run) {
      return Promise.resolve();
    }
    if (!run.stopping) {
      run.stopping = this.finishRun(run);
    }
    return run.stopping;
  }

  isRunning(): boolean {
    return this.current !== null;
  }

  // ==========================================================================
  // Consumer views
  // ==========================================================================

  /**
   * Copy of a channel's recent samples, oldest first
   */
  getBufferSnapshot(index: number): number[] {
    this.getChannel(index);
    return this.buffers[index].snapshot();
  }

  /**
   * Conditioned values of the most recent tick, one per channel (empty before the first tick)
   */
  getLatestTick(): number[] {
    return this.latest ? [...this.latest.values] : [];
  }

  getLatestSnapshot(): TickSnapshot | null {
    return this.latest;
  }

  getStatus(): SessionStatus {
    return {
      state: this.current ? 'running' : 'idle',
      connected: this.transport.isConnected(),
      transport: this.transport.kind,
      endpoint: this.transport.getEndpoint(),
      logFile: this.recorder.getFilePath(),
      recording: this.recorder.isActive(),
      loggedRows: this.recorder.getRowCount(),
      ticks: this.ticks,
      failedTicks: this.failedTicks,
      lastError: this.lastError
    };
  }

  // ==========================================================================
  // Acquisition loop
  // ==========================================================================

  private async runLoop(run: ActiveRun): Promise<void> {
    while (run.active) {
      let delay = this.tickInterval;

      try {
        await this.tick(run);
      } catch (error) {
        // A loop abandoned by stop() must not touch a later run's statistics
        if (!run.active) {
          break;
        }
        const err = toError(error);
        delay = this.failureBackoff;
        this.failedTicks++;
        this.lastError = err.message;
        this.logger.warn(`Acquisition error: ${err.message}`);
        setImmediate(() => this.emit('tick-error', err));
      }

      if (!run.active) {
        break;
      }
      await this.sleep(run, delay);
    }

    this.logger.debug('Acquisition loop exited');
  }

  private async tick(run: ActiveRun): Promise<void> {
    const raw = await this.acquireRaw();

    // Stopped during an in-flight read
    if (!run.active) {
      return;
    }

    const values = this.channels.map(channel => this.conditionChannel(channel, raw[channel.index]));

    await this.recorder.append(values);

    values.forEach((value, index) => run.buffers[index].push(value));

    this.ticks++;
    const snapshot: TickSnapshot = Object.freeze({
      sequence: this.ticks,
      timestamp: this.now(),
      raw: Object.freeze(raw),
      values: Object.freeze(values)
    });
    this.latest = snapshot;
    setImmediate(() => this.emit('tick', snapshot));
  }

  /**
   * Raw vector for every channel: from the scan plan when one is set and a
   * register transport is connected, otherwise from the stand-in source
   */
  private async acquireRaw(): Promise<number[]> {
    const channelCount = this.channels.length;
    const plan = this.scanPlan;

    if (!plan.isEmpty() && isRegisterTransport(this.transport) && this.transport.isConnected()) {
      const readings = await plan.scan(this.transport, this.logger);
      return assembleChannelVector(readings, channelCount);
    }

    const generated = this.standIn.next(channelCount);
    return Array.from({ length: channelCount }, (_, index) => generated[index] ?? 0);
  }

  private conditionChannel(channel: Channel, raw: number): number {
    const value = tryCondition(raw, channel.getCoefficients());
    if (value === undefined) {
      this.logger.debug(`Non-numeric conditioning on ${channel.getName()}, using raw value`);
      return raw;
    }
    return value;
  }

  private sleep(run: ActiveRun, ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        run.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      run.wake = done;
    });
  }

  private async finishRun(run: ActiveRun): Promise<void> {
    run.active = false;
    run.wake?.();

    const started = await run.starting.then(() => true, () => false);

    if (started && run.loop) {
      const exited = await this.waitForExit(run.loop);
      if (!exited) {
        this.logger.warn(`Acquisition loop did not exit within ${this.stopTimeout}ms, stopping anyway`);
      }
    }

    try {
      await this.recorder.stop();
    } finally {
      if (this.current === run) {
        this.current = null;
      }
    }

    this.logger.info('Data acquisition stopped');
    this.emit('stopped');
  }

  private async waitForExit(loop: Promise<void>): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.stopTimeout);
    });

    try {
      return await Promise.race([loop.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private getChannel(index: number): Channel {
    const channel = Number.isInteger(index) ? this.channels[index] : undefined;
    if (!channel) {
      throw new ChannelIndexError(index, this.channels.length);
    }
    return channel;
  }

  private allocateBuffers(): SeriesBuffer[] {
    return this.channels.map(() => new SeriesBuffer(this.bufferCapacity));
  }

  private buildScanPlan(bindings: readonly SourceBindingInput[]): SourceScanPlan {
    try {
      return new SourceScanPlan(bindings);
    } catch (error) {
      if (error instanceof ZodError) {
        throw fromZodError('Invalid scan plan', error);
      }
      throw error;
    }
  }
}

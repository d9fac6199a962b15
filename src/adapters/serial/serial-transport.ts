import { SerialPort } from 'serialport';
import { ByteTransport } from '../common/types';
import { scanPorts } from '../common/port-scanner';
import { ConnectionError, describeError } from '../../lib/errors';
import { Logger } from '../../logging/logger';

interface PendingRead {
  size: number;
  resolve: () => void;
  timer: NodeJS.Timeout;
}

/**
 * Raw byte transport over a serial port.
 *
 * Incoming bytes accumulate in a receive buffer; `read(size)` waits up to the
 * configured timeout for `size` bytes and returns whatever has arrived by then.
 */
export class SerialTransport implements ByteTransport {
  readonly kind = 'serial' as const;

  private port: SerialPort | null = null;
  private endpoint: string | null = null;
  private timeout = 1000;
  private rxBuffer: Buffer = Buffer.alloc(0);
  private pendingRead: PendingRead | null = null;

  constructor(private readonly logger: Logger) {}

  listAvailable(): Promise<string[]> {
    return scanPorts(this.logger);
  }

  async connect(endpoint: string, speed: number, timeout: number): Promise<void> {
    if (this.port) {
      await this.disconnect();
    }

    this.rxBuffer = Buffer.alloc(0);
    this.timeout = timeout;

    let port: SerialPort;
    try {
      port = new SerialPort({ path: endpoint, baudRate: speed, autoOpen: false });
    } catch (error) {
      this.logger.error(`Invalid serial settings for ${endpoint}: ${describeError(error)}`);
      throw new ConnectionError(endpoint, error);
    }

    await new Promise<void>((resolve, reject) => {
      port.open((error) => {
        if (error) {
          port.removeAllListeners();
          this.logger.error(`Failed to open serial port ${endpoint}: ${error.message}`);
          reject(new ConnectionError(endpoint, error));
          return;
        }
        resolve();
      });
    });

    port.on('data', (data: Buffer) => this.onData(data));
    port.on('error', (error: Error) => {
      this.logger.warn(`Serial port error on ${endpoint}: ${error.message}`);
    });
    port.on('close', () => {
      // A stale close from a previous port must not tear down a newer one
      if (this.port === port) {
        this.logger.warn(`Serial port closed: ${endpoint}`);
        this.resetLink();
      }
    });

    this.port = port;
    this.endpoint = endpoint;
    this.logger.info(`Connected to ${endpoint} (serial, ${speed} baud)`);
  }

  async disconnect(): Promise<void> {
    const port = this.port;
    const endpoint = this.endpoint;
    this.resetLink();

    if (!port) {
      return;
    }

    // The error listener stays: a write still in flight may fail after close
    port.removeAllListeners('data');
    port.removeAllListeners('close');
    if (port.isOpen) {
      await new Promise<void>((resolve) => {
        port.close((error) => {
          if (error) {
            this.logger.warn(`Error closing serial port ${endpoint}: ${error.message}`);
          }
          resolve();
        });
      });
    }
    this.logger.info(`Disconnected from ${endpoint}`);
  }

  isConnected(): boolean {
    return this.port !== null && this.port.isOpen;
  }

  getEndpoint(): string | null {
    return this.endpoint;
  }

  /**
   * Write bytes and wait until they are transmitted.
   * Returns false when not connected or when the write fails.
   */
  async write(data: Buffer): Promise<boolean> {
    const port = this.port;
    if (!port || !port.isOpen) {
      return false;
    }

    return new Promise<boolean>((resolve) => {
      port.write(data, (writeError) => {
        if (writeError) {
          this.logger.warn(`Serial write failed: ${writeError.message}`);
          resolve(false);
          return;
        }
        port.drain((drainError) => {
          if (drainError) {
            this.logger.warn(`Serial drain failed: ${drainError.message}`);
          }
          resolve(!drainError);
        });
      });
    });
  }

  /**
   * Read up to `size` bytes, waiting at most the connect timeout.
   * Returns an empty buffer when not connected.
   */
  async read(size: number): Promise<Buffer> {
    if (!this.isConnected() || size <= 0) {
      return Buffer.alloc(0);
    }

    if (this.rxBuffer.length < size && !this.pendingRead) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => this.settlePendingRead(), this.timeout);
        this.pendingRead = { size, resolve, timer };
      });
    }

    const chunk = Buffer.from(this.rxBuffer.subarray(0, size));
    this.rxBuffer = this.rxBuffer.subarray(chunk.length);
    return chunk;
  }

  private onData(data: Buffer): void {
    this.rxBuffer = Buffer.concat([this.rxBuffer, data]);
    if (this.pendingRead && this.rxBuffer.length >= this.pendingRead.size) {
      this.settlePendingRead();
    }
  }

  private settlePendingRead(): void {
    const pending = this.pendingRead;
    if (!pending) {
      return;
    }
    this.pendingRead = null;
    clearTimeout(pending.timer);
    pending.resolve();
  }

  private resetLink(): void {
    this.settlePendingRead();
    this.port = null;
    this.endpoint = null;
    this.rxBuffer = Buffer.alloc(0);
  }
}

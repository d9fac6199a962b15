import * as fs from 'fs';
import * as path from 'path';
import { formatFileStamp, formatRowTimestamp } from '../lib/time-format';
import { Logger } from '../logging/logger';

export const DEFAULT_LOG_DIRECTORY = 'logs';
export const DEFAULT_FILE_PREFIX = 'acq_log';

export interface AcquisitionLoggerOptions {
  directory?: string;
  filePrefix?: string;
  now?: () => Date;
}

/**
 * Append-only CSV writer for one acquisition run.
 *
 * Header: `Timestamp,<name_1>,...,<name_N>`. Each row is written straight
 * to the file before `append` resolves, so a crash loses at most the row in
 * flight.
 */
export class AcquisitionLogger {
  private readonly directory: string;
  private readonly filePrefix: string;
  private readonly now: () => Date;
  private handle: fs.promises.FileHandle | null = null;
  private filePath: string | null = null;
  private rows = 0;
  // Serializes header, rows and close on the one handle
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly logger: Logger, options: AcquisitionLoggerOptions = {}) {
    this.directory = options.directory ?? DEFAULT_LOG_DIRECTORY;
    this.filePrefix = options.filePrefix ?? DEFAULT_FILE_PREFIX;
    this.now = options.now ?? (() => new Date());
  }

  isActive(): boolean {
    return this.handle !== null;
  }

  getFilePath(): string | null {
    return this.filePath;
  }

  getRowCount(): number {
    return this.rows;
  }

  /**
   * Open a new log file and write the header. Returns the file path.
   */
  async start(channelNames: readonly string[], fileStem?: string): Promise<string> {
    if (this.handle) {
      this.logger.warn(`Closing ${this.filePath} before starting a new log`);
      await this.stop();
    }

    const filePath = this.resolvePath(fileStem);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });

    const handle = await fs.promises.open(filePath, 'w');
    try {
      await handle.write(toCsvLine(['Timestamp', ...channelNames]));
    } catch (error) {
      await handle.close();
      throw error;
    }

    this.handle = handle;
    this.filePath = filePath;
    this.rows = 0;
    this.logger.info(`Logging to ${filePath}`);
    return filePath;
  }

  /**
   * Write one timestamped row. Does nothing when no log is open.
   */
  append(values: readonly number[]): Promise<void> {
    const line = toCsvLine([formatRowTimestamp(this.now()), ...values.map(value => String(value))]);
    return this.enqueue(async () => {
      if (!this.handle) {
        return;
      }
      await this.handle.write(line);
      this.rows++;
    });
  }

  /**
   * Close the file. Safe to call when never started.
   */
  stop(): Promise<void> {
    return this.enqueue(async () => {
      const handle = this.handle;
      if (!handle) {
        return;
      }
      this.handle = null;
      await handle.close();
      this.logger.info(`Closed ${this.filePath} (${this.rows} rows)`);
    });
  }

  private enqueue(operation: () => Promise<void>): Promise<void> {
    const next = this.writes.then(operation);
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.writes = next.catch(() => undefined);
    return next;
  }

  private resolvePath(fileStem?: string): string {
    const stem = fileStem === undefined ? '' : sanitizeStem(fileStem);
    const name = stem !== '' ? stem : `${this.filePrefix}_${formatFileStamp(this.now())}`;
    return path.join(this.directory, `${name}.csv`);
  }
}

/**
 * File stem with a trailing `.csv` removed and path or reserved characters replaced
 */
export function sanitizeStem(stem: string): string {
  const cleaned = stem
    .trim()
    .replace(/\.csv$/i, '')
    .replace(/[<>:"/\\|?*\u0000-\u001f]/g, '_')
    .trim();
  return /^\.*$/.test(cleaned) ? '' : cleaned;
}

function escapeCsvField(field: string): string {
  return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

function toCsvLine(fields: readonly string[]): string {
  return `${fields.map(escapeCsvField).join(',')}\n`;
}

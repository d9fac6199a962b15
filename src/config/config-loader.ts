import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { RegisterDecodeType } from '../adapters/modbus/types';
import { ConfigValidationError, describeError, fromZodError } from '../lib/errors';
import { AcquisitionConfig, AcquisitionConfigInput, AcquisitionConfigSchema } from './types';

type Env = Record<string, string | undefined>;

/**
 * Configuration loader for the acquisition pipeline
 */
export class ConfigLoader {

  /**
   * Load configuration from a JSON file
   */
  static loadFromFile(configPath: string): AcquisitionConfig {
    if (!fs.existsSync(configPath)) {
      throw new ConfigValidationError(`Configuration file not found: ${configPath}`);
    }

    let rawConfig: unknown;
    try {
      rawConfig = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    } catch (error) {
      throw new ConfigValidationError(`Failed to read configuration ${configPath}: ${describeError(error)}`);
    }

    return ConfigLoader.validate(rawConfig);
  }

  /**
   * Load configuration from environment variables.
   *
   * ACQ_CONFIG may hold a full JSON configuration; ACQ_CONNECTION_TYPE,
   * ACQ_PORT, ACQ_BAUD_RATE, ACQ_LOG_DIR and LOG_LEVEL override single values.
   */
  static loadFromEnv(env: Env = process.env): AcquisitionConfig {
    let base: Record<string, unknown> = {};
    if (env.ACQ_CONFIG) {
      try {
        const parsed: unknown = JSON.parse(env.ACQ_CONFIG);
        if (!isRecord(parsed)) {
          throw new Error('expected a JSON object');
        }
        base = parsed;
      } catch (error) {
        throw new ConfigValidationError(`Failed to parse ACQ_CONFIG: ${describeError(error)}`);
      }
    }

    const connection = { ...asRecord(base.connection) };
    if (env.ACQ_CONNECTION_TYPE) connection.type = env.ACQ_CONNECTION_TYPE;
    if (env.ACQ_PORT) connection.port = env.ACQ_PORT;
    const baudRate = parseNumber(env.ACQ_BAUD_RATE);
    if (baudRate !== undefined) connection.baudRate = baudRate;

    const recording = { ...asRecord(base.recording) };
    if (env.ACQ_LOG_DIR) recording.directory = env.ACQ_LOG_DIR;

    const diagnostics = { ...asRecord(base.diagnostics) };
    if (env.LOG_LEVEL) diagnostics.level = env.LOG_LEVEL;

    return ConfigLoader.validate({ ...base, connection, recording, diagnostics });
  }

  /**
   * Create example configuration
   */
  static createExampleConfig(): AcquisitionConfig {
    return ConfigLoader.validate({
      connection: {
        type: 'modbus',
        port: '/dev/ttyUSB0',
        baudRate: 9600,
        timeout: 1000
      },
      channels: {
        count: 3,
        settings: [
          { name: 'Temperature', zero: -5, multiplier: 2, gain: 1 },
          { name: 'Pressure', zero: 0, multiplier: 0.001, gain: 1 },
          { name: 'Flow' }
        ]
      },
      scanPlan: [
        { slaveId: 1, address: 10, type: RegisterDecodeType.FLOAT32, name: 'Temperature' },
        { slaveId: 2, address: 0, type: RegisterDecodeType.UINT32, name: 'Pressure' },
        { slaveId: 2, address: 4, type: RegisterDecodeType.INT16, name: 'Flow' }
      ],
      recording: {
        directory: 'logs',
        filePrefix: 'acq_log'
      },
      acquisition: {
        tickInterval: 100,
        failureBackoff: 1000,
        stopTimeout: 2000,
        bufferCapacity: 100
      },
      diagnostics: {
        level: 'info'
      }
    });
  }

  /**
   * Save configuration to file
   */
  static saveToFile(config: AcquisitionConfigInput, configPath: string): void {
    const validated = ConfigLoader.validate(config);

    const configDir = path.dirname(configPath);
    if (!fs.existsSync(configDir)) {
      fs.mkdirSync(configDir, { recursive: true });
    }

    fs.writeFileSync(configPath, JSON.stringify(validated, null, 2), 'utf8');
  }

  /**
   * Validate configuration
   */
  static validate(config: unknown): AcquisitionConfig {
    try {
      return AcquisitionConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw fromZodError('Invalid configuration', error);
      }
      throw error;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

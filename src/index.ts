import winston from 'winston';
import { AcquisitionSession } from './acquisition/acquisition-session';
import { createTransport } from './adapters/transport-factory';
import { AcquisitionConfig } from './config/types';
import { Logger, componentLogger } from './logging/logger';

export * from './acquisition/acquisition-session';
export * from './acquisition/acquisition-logger';
export * from './acquisition/channel';
export * from './acquisition/series-buffer';
export * from './acquisition/signal-conditioner';
export * from './acquisition/stand-in-source';
export * from './acquisition/types';
export * from './adapters/common/types';
export { scanPorts } from './adapters/common/port-scanner';
export { createTransport } from './adapters/transport-factory';
export { decodeRegisters } from './adapters/modbus/register-decoder';
export { SourceScanPlan, toNamedValues, assembleChannelVector } from './adapters/modbus/scan-plan';
export type { ScanReading } from './adapters/modbus/scan-plan';
export * from './adapters/modbus/types';
export { ConfigLoader } from './config/config-loader';
export * from './config/types';
export * from './lib/errors';
export { createLogger, componentLogger } from './logging/logger';
export type { Logger, LogLevel, LoggerOptions } from './logging/logger';

/**
 * Build a session, and its transport, from a validated configuration
 */
export async function createAcquisitionSession(
  config: AcquisitionConfig,
  rootLogger: winston.Logger
): Promise<AcquisitionSession> {
  const transportLogger: Logger = componentLogger(rootLogger, config.connection.type === 'modbus' ? 'ModbusTransport' : 'SerialTransport');
  const transport = await createTransport(config.connection.type, transportLogger);

  return new AcquisitionSession({
    transport,
    logger: componentLogger(rootLogger, 'AcquisitionSession'),
    channelCount: config.channels.count,
    channels: config.channels.settings,
    scanPlan: config.scanPlan,
    connectionTimeout: config.connection.timeout,
    tickInterval: config.acquisition.tickInterval,
    failureBackoff: config.acquisition.failureBackoff,
    stopTimeout: config.acquisition.stopTimeout,
    bufferCapacity: config.acquisition.bufferCapacity,
    recording: {
      directory: config.recording.directory,
      filePrefix: config.recording.filePrefix
    }
  });
}

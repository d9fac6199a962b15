#!/usr/bin/env node

import * as dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createAcquisitionSession } from './index';
import { scanPorts } from './adapters/common/port-scanner';
import { ConfigLoader } from './config/config-loader';
import { AcquisitionConfig } from './config/types';
import { TickSnapshot } from './acquisition/types';
import { describeError } from './lib/errors';
import { LogLevel, componentLogger, createLogger } from './logging/logger';

// Load environment variables
dotenv.config();

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface RunArgs {
  config?: string;
  port?: string;
  baud?: number;
  stem?: string;
  duration?: number;
  logLevel?: LogLevel;
}

async function runAcquisition(args: RunArgs): Promise<void> {
  const loaded: AcquisitionConfig = args.config ? ConfigLoader.loadFromFile(args.config) : ConfigLoader.loadFromEnv();
  const config = ConfigLoader.validate({
    ...loaded,
    connection: {
      ...loaded.connection,
      ...(args.port ? { port: args.port } : {}),
      ...(args.baud ? { baudRate: args.baud } : {})
    },
    diagnostics: {
      ...loaded.diagnostics,
      ...(args.logLevel ? { level: args.logLevel } : {})
    }
  });

  const rootLogger = createLogger({ level: config.diagnostics.level, file: config.diagnostics.file });
  const logger = componentLogger(rootLogger, 'CLI');
  const session = await createAcquisitionSession(config, rootLogger);

  session.on('tick', (snapshot: TickSnapshot) => {
    logger.debug(`Tick ${snapshot.sequence}: ${snapshot.values.join(', ')}`);
  });
  session.on('tick-error', (error: Error) => {
    logger.warn(`Tick failed: ${error.message}`);
  });

  if (config.connection.port) {
    await session.connect(config.connection.port, config.connection.baudRate);
  } else {
    logger.warn('No port configured, acquiring from the stand-in source');
  }

  const logFile = await session.start(args.stem);

  await new Promise<void>((resolve) => {
    const timer = args.duration ? setTimeout(resolve, args.duration * 1000) : undefined;
    const onSignal = () => {
      clearTimeout(timer);
      resolve();
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });

  logger.info('Shutting down acquisition...');
  await session.disconnect();
  const status = session.getStatus();
  logger.info(`Recorded ${status.ticks} tick(s) to ${logFile}`);
  console.log(logFile);
}

/**
 * CLI interface for the acquisition pipeline
 */
async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName('serial-acq')
    .command('ports', 'List available serial ports', () => undefined, async () => {
      const ports = await scanPorts();
      ports.forEach(port => console.log(port));
    })
    .command(
      'run',
      'Acquire, condition and log samples until interrupted',
      (cmd) => cmd
        .option('config', { alias: 'c', type: 'string', description: 'Path to configuration file' })
        .option('port', { alias: 'p', type: 'string', description: 'Serial endpoint to connect to' })
        .option('baud', { alias: 'b', type: 'number', description: 'Line speed' })
        .option('stem', { alias: 's', type: 'string', description: 'Log file name (without .csv)' })
        .option('duration', { alias: 'd', type: 'number', description: 'Stop after this many seconds' })
        .option('log-level', { alias: 'l', choices: LOG_LEVELS, description: 'Diagnostic log level' }),
      (argv) => runAcquisition(argv)
    )
    .command(
      'example-config <path>',
      'Write an example configuration file',
      (cmd) => cmd.positional('path', { type: 'string', demandOption: true }),
      (argv) => {
        ConfigLoader.saveToFile(ConfigLoader.createExampleConfig(), argv.path);
        console.log(`Example configuration saved to: ${argv.path}`);
      }
    )
    .command(
      'validate-config <path>',
      'Validate a configuration file',
      (cmd) => cmd.positional('path', { type: 'string', demandOption: true }),
      (argv) => {
        const config = ConfigLoader.loadFromFile(argv.path);
        console.log('Configuration is valid');
        console.log(`Channels: ${config.channels.count}`);
        console.log(`Scan plan: ${config.scanPlan.length} binding(s)`);
      }
    )
    .demandCommand(1)
    .strict()
    .help()
    .alias('help', 'h')
    .version()
    .alias('version', 'v')
    .parseAsync();
}

if (require.main === module) {
  main().catch(error => {
    console.error('Error:', describeError(error));
    process.exit(1);
  });
}

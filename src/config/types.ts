import { z } from 'zod';
import { SourceBindingSchema } from '../adapters/modbus/types';

const CoefficientSchema = z.union([z.number(), z.string()]);

/**
 * Connection Configuration Schema
 */
export const ConnectionConfigSchema = z.object({
  type: z.enum(['serial', 'modbus']).optional().default('modbus'),
  port: z.string().min(1).optional(),
  baudRate: z.number().int().positive().optional().default(9600),
  timeout: z.number().min(100).max(30000).optional().default(1000) // milliseconds
});

export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;

/**
 * Per-channel overrides, by position
 */
export const ChannelConfigSchema = z.object({
  name: z.string().optional(),
  zero: CoefficientSchema.optional(),
  multiplier: CoefficientSchema.optional(),
  gain: CoefficientSchema.optional()
});

export const ChannelsConfigSchema = z.object({
  count: z.number().int().min(1).max(8).optional().default(3),
  settings: z.array(ChannelConfigSchema).max(8).optional().default([])
});

export const RecordingConfigSchema = z.object({
  directory: z.string().min(1).optional().default('logs'),
  filePrefix: z.string().min(1).optional().default('acq_log')
});

export const LoopConfigSchema = z.object({
  tickInterval: z.number().min(1).optional().default(100), // milliseconds
  failureBackoff: z.number().min(1).optional().default(1000), // milliseconds
  stopTimeout: z.number().min(1).optional().default(2000), // milliseconds
  bufferCapacity: z.number().int().min(1).optional().default(100)
});

export const DiagnosticsConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).optional().default('info'),
  file: z.string().optional()
});

/**
 * Acquisition Configuration Schema
 */
export const AcquisitionConfigSchema = z.object({
  connection: ConnectionConfigSchema.optional().default({}),
  channels: ChannelsConfigSchema.optional().default({}),
  scanPlan: z.array(SourceBindingSchema).optional().default([]),
  recording: RecordingConfigSchema.optional().default({}),
  acquisition: LoopConfigSchema.optional().default({}),
  diagnostics: DiagnosticsConfigSchema.optional().default({})
});

export type AcquisitionConfig = z.infer<typeof AcquisitionConfigSchema>;
export type AcquisitionConfigInput = z.input<typeof AcquisitionConfigSchema>;

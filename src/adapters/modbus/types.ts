import { z } from 'zod';

/**
 * Decode type for a register binding
 */
export enum RegisterDecodeType {
  INT16 = 'INT16',
  UINT16 = 'UINT16',
  INT32 = 'INT32',
  UINT32 = 'UINT32',
  FLOAT32 = 'FLOAT32'
}

/**
 * Number of 16-bit registers each decode type occupies
 */
export const REGISTER_WIDTH: Record<RegisterDecodeType, number> = {
  [RegisterDecodeType.INT16]: 1,
  [RegisterDecodeType.UINT16]: 1,
  [RegisterDecodeType.INT32]: 2,
  [RegisterDecodeType.UINT32]: 2,
  [RegisterDecodeType.FLOAT32]: 2
};

export const DEFAULT_SLAVE_ID = 1;

/**
 * Source Binding Schema: one named register read per tick
 */
export const SourceBindingSchema = z.object({
  slaveId: z.number().int().min(1).max(4).optional().default(DEFAULT_SLAVE_ID),
  address: z.number().int().min(0).max(65535),
  type: z.nativeEnum(RegisterDecodeType),
  name: z.string().min(1)
});

export type SourceBinding = z.infer<typeof SourceBindingSchema>;
export type SourceBindingInput = z.input<typeof SourceBindingSchema>;

/**
 * Transport factory: creates the transport for a connection type.
 * Implementations are loaded lazily so the serial bindings are only pulled in
 * when a transport is actually built.
 */

import type { AnyTransport, TransportKind } from './common/types';
import type { Logger } from '../logging/logger';

export async function createTransport(kind: TransportKind, logger: Logger): Promise<AnyTransport> {
  switch (kind) {
    case 'serial': {
      const { SerialTransport } = await import('./serial/serial-transport');
      return new SerialTransport(logger);
    }
    case 'modbus': {
      const { ModbusTransport } = await import('./modbus/modbus-transport');
      return new ModbusTransport(logger);
    }
    default:
      throw new Error(`Unsupported transport type: ${String(kind)}`);
  }
}

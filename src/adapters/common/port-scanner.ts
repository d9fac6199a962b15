/**
 * Serial port enumeration via the `serialport` package.
 */

import { SerialPort } from 'serialport';
import { Logger } from '../../logging/logger';

/**
 * List the device paths of all serial ports on the host.
 * Enumeration failures (permissions, missing drivers) yield an empty list.
 */
export async function scanPorts(logger?: Logger): Promise<string[]> {
  try {
    const ports = await SerialPort.list();
    return ports.map(port => port.path);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger?.warn(`Serial port enumeration failed: ${errorMessage}`);
    return [];
  }
}

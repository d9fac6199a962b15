import ModbusRTU from 'modbus-serial';
import { RegisterTransport } from '../common/types';
import { scanPorts } from '../common/port-scanner';
import { ConnectionError, describeError } from '../../lib/errors';
import { Logger } from '../../logging/logger';

/**
 * Modbus RTU transport over a serial line.
 *
 * Wraps a single modbus-serial client. The slave identifier is set per request
 * so one link can poll several slaves. Reads resolve to null on any protocol,
 * timeout or link failure.
 */
export class ModbusTransport implements RegisterTransport {
  readonly kind = 'modbus' as const;

  private client: ModbusRTU | null = null;
  private endpoint: string | null = null;

  constructor(private readonly logger: Logger) {}

  listAvailable(): Promise<string[]> {
    return scanPorts(this.logger);
  }

  /**
   * Connect to a Modbus RTU line
   */
  async connect(endpoint: string, speed: number, timeout: number): Promise<void> {
    if (this.client) {
      await this.disconnect();
    }

    const client = new ModbusRTU();
    this.setupErrorHandlers(client, endpoint);
    try {
      this.logger.info(`Connecting to Modbus line: ${endpoint}`);
      await client.connectRTUBuffered(endpoint, { baudRate: speed });
      client.setTimeout(timeout);
    } catch (error) {
      this.logger.error(`Failed to connect Modbus on ${endpoint}: ${describeError(error)}`);
      throw new ConnectionError(endpoint, error);
    }

    this.client = client;
    this.endpoint = endpoint;
    this.logger.info(`Connected to ${endpoint} (Modbus RTU, ${speed} baud)`);
  }

  /**
   * Disconnect from the Modbus line
   */
  async disconnect(): Promise<void> {
    const client = this.client;
    const endpoint = this.endpoint;
    this.client = null;
    this.endpoint = null;

    if (!client || !client.isOpen) {
      return;
    }

    await new Promise<void>((resolve) => {
      client.close(() => resolve());
    });
    this.logger.info(`Disconnected from Modbus line: ${endpoint}`);
  }

  /**
   * Line errors are re-emitted by the client and would be unhandled without
   * a listener. The handlers stay for the client's lifetime, so a failure
   * that arrives while closing is still logged.
   */
  private setupErrorHandlers(client: ModbusRTU, endpoint: string): void {
    client.on('error', (error: unknown) => {
      this.logger.warn(`Modbus line error on ${endpoint}: ${describeError(error)}`);
    });

    client.on('close', () => {
      if (this.client !== client) {
        return;
      }
      this.logger.warn(`Modbus line closed: ${endpoint}`);
      this.client = null;
      this.endpoint = null;
    });
  }

  isConnected(): boolean {
    return this.client !== null && this.client.isOpen;
  }

  getEndpoint(): string | null {
    return this.endpoint;
  }

  /**
   * Read holding registers (function code 3)
   */
  async readRegisters(address: number, count: number, slaveId: number): Promise<number[] | null> {
    const client = this.client;
    if (!client || !client.isOpen) {
      return null;
    }

    try {
      client.setID(slaveId);
      const result = await client.readHoldingRegisters(address, count);
      return result.data.slice(0, count);
    } catch (error) {
      this.logger.debug(`Register read failed (slave ${slaveId}, address ${address}): ${describeError(error)}`);
      return null;
    }
  }

  /**
   * Read coils (function code 1)
   */
  async readCoils(address: number, count: number, slaveId: number): Promise<boolean[] | null> {
    const client = this.client;
    if (!client || !client.isOpen) {
      return null;
    }

    try {
      client.setID(slaveId);
      const result = await client.readCoils(address, count);
      // Coil responses are padded to whole bytes
      return result.data.slice(0, count);
    } catch (error) {
      this.logger.debug(`Coil read failed (slave ${slaveId}, address ${address}): ${describeError(error)}`);
      return null;
    }
  }
}

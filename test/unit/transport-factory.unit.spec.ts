/**
 * Unit tests for the transport factory
 */

jest.mock('modbus-serial', () => ({
  __esModule: true,
  default: jest.fn()
}));

jest.mock('serialport', () => jest.requireActual('../helpers/mock-serialport'));

import { createTransport } from '../../src/adapters/transport-factory';
import { ModbusTransport } from '../../src/adapters/modbus/modbus-transport';
import { SerialTransport } from '../../src/adapters/serial/serial-transport';
import { isRegisterTransport } from '../../src/adapters/common/types';
import { MockLogger } from '../helpers/fakes';

describe('createTransport', () => {
  it('should build a Modbus register transport', async () => {
    const transport = await createTransport('modbus', new MockLogger());

    expect(transport).toBeInstanceOf(ModbusTransport);
    expect(transport.kind).toBe('modbus');
    expect(isRegisterTransport(transport)).toBe(true);
  });

  it('should build a raw serial transport', async () => {
    const transport = await createTransport('serial', new MockLogger());

    expect(transport).toBeInstanceOf(SerialTransport);
    expect(transport.kind).toBe('serial');
    expect(isRegisterTransport(transport)).toBe(false);
    expect(transport.isConnected()).toBe(false);
  });
});

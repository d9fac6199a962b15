/**
 * Unit tests for SerialTransport
 *
 * The serialport package is replaced by an in-process mock port, so no
 * device or native binding is touched.
 */

jest.mock('serialport', () => jest.requireActual('../helpers/mock-serialport'));

import { SerialTransport } from '../../src/adapters/serial/serial-transport';
import { ConnectionError } from '../../src/lib/errors';
import { MockLogger } from '../helpers/fakes';
import { MockSerialPort } from '../helpers/mock-serialport';

describe('SerialTransport', () => {
  let logger: MockLogger;
  let transport: SerialTransport;

  beforeEach(() => {
    MockSerialPort.reset();
    logger = new MockLogger();
    transport = new SerialTransport(logger);
  });

  afterEach(async () => {
    await transport.disconnect();
  });

  describe('Port enumeration', () => {
    it('should list device paths', async () => {
      MockSerialPort.listResult = [{ path: '/dev/ttyUSB0' }, { path: '/dev/ttyACM0' }];

      expect(await transport.listAvailable()).toEqual(['/dev/ttyUSB0', '/dev/ttyACM0']);
    });

    it('should return an empty list when enumeration fails', async () => {
      MockSerialPort.listResult = new Error('permission denied');

      expect(await transport.listAvailable()).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith('Serial port enumeration failed: permission denied');
    });
  });

  describe('Connection', () => {
    it('should open the port with the requested speed', async () => {
      await transport.connect('/dev/ttyUSB0', 19200, 1000);

      const port = MockSerialPort.latest();
      expect(port.path).toBe('/dev/ttyUSB0');
      expect(port.baudRate).toBe(19200);
      expect(transport.isConnected()).toBe(true);
      expect(transport.getEndpoint()).toBe('/dev/ttyUSB0');
    });

    it('should reject with ConnectionError when the port cannot be opened', async () => {
      MockSerialPort.openError = new Error('No such file or directory');

      const failure = transport.connect('/dev/ttyUSB9', 9600, 1000);

      await expect(failure).rejects.toThrow(ConnectionError);
      await expect(failure).rejects.toThrow('Failed to connect to /dev/ttyUSB9: No such file or directory');
      expect(transport.isConnected()).toBe(false);
      expect(transport.getEndpoint()).toBeNull();
    });

    it('should close the port on disconnect and tolerate a second call', async () => {
      await transport.connect('/dev/ttyUSB0', 9600, 1000);
      const port = MockSerialPort.latest();

      await transport.disconnect();
      await transport.disconnect();

      expect(port.isOpen).toBe(false);
      expect(transport.isConnected()).toBe(false);
      expect(logger.info).toHaveBeenCalledWith('Disconnected from /dev/ttyUSB0');
    });

    it('should still log port errors raised after disconnect', async () => {
      await transport.connect('/dev/ttyUSB0', 9600, 1000);
      const port = MockSerialPort.latest();

      await transport.disconnect();

      expect(() => port.emit('error', new Error('write EIO'))).not.toThrow();
      expect(logger.warn).toHaveBeenCalledWith('Serial port error on /dev/ttyUSB0: write EIO');
      expect(port.listenerCount('data')).toBe(0);
      expect(port.listenerCount('close')).toBe(0);
    });

    it('should drop the link when the device goes away', async () => {
      await transport.connect('/dev/ttyUSB0', 9600, 1000);

      MockSerialPort.latest().unplug();

      expect(transport.isConnected()).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('Serial port closed: /dev/ttyUSB0');
    });

    it('should replace an existing link on reconnect', async () => {
      await transport.connect('/dev/ttyUSB0', 9600, 1000);
      const first = MockSerialPort.latest();

      await transport.connect('/dev/ttyUSB1', 9600, 1000);

      expect(first.isOpen).toBe(false);
      expect(transport.getEndpoint()).toBe('/dev/ttyUSB1');
      expect(transport.isConnected()).toBe(true);
    });
  });

  describe('Write', () => {
    it('should transmit the bytes', async () => {
      await transport.connect('/dev/ttyUSB0', 9600, 1000);

      const ok = await transport.write(Buffer.from([0x01, 0x03, 0x00]));

      expect(ok).toBe(true);
      expect(MockSerialPort.latest().written).toEqual([Buffer.from([0x01, 0x03, 0x00])]);
    });

    it('should report false when the write fails', async () => {
      await transport.connect('/dev/ttyUSB0', 9600, 1000);
      MockSerialPort.latest().writeError = new Error('device busy');

      expect(await transport.write(Buffer.from('hi'))).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('Serial write failed: device busy');
    });

    it('should report false when not connected', async () => {
      expect(await transport.write(Buffer.from('hi'))).toBe(false);
      expect(MockSerialPort.instances).toHaveLength(0);
    });
  });

  describe('Read', () => {
    it('should return buffered bytes immediately', async () => {
      await transport.connect('/dev/ttyUSB0', 9600, 1000);
      MockSerialPort.latest().receive([1, 2, 3]);

      expect(await transport.read(2)).toEqual(Buffer.from([1, 2]));
      expect(await transport.read(2)).toEqual(Buffer.from([3]));
    });

    it('should wait for the requested number of bytes', async () => {
      await transport.connect('/dev/ttyUSB0', 9600, 1000);
      const port = MockSerialPort.latest();

      const pending = transport.read(4);
      port.receive([1, 2]);
      port.receive([3, 4, 5]);

      expect(await pending).toEqual(Buffer.from([1, 2, 3, 4]));
      expect(await transport.read(1)).toEqual(Buffer.from([5]));
    });

    it('should return a short read after the timeout', async () => {
      await transport.connect('/dev/ttyUSB0', 9600, 20);
      MockSerialPort.latest().receive([9]);

      expect(await transport.read(4)).toEqual(Buffer.from([9]));
    });

    it('should return an empty buffer when not connected', async () => {
      expect(await transport.read(4)).toEqual(Buffer.alloc(0));
    });
  });
});

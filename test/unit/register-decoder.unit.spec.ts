/**
 * Unit tests for register decoding
 */

import { decodeRegisters } from '../../src/adapters/modbus/register-decoder';
import { RegisterDecodeType } from '../../src/adapters/modbus/types';

const SAMPLE_WORDS = [0, 1, 255, 12345, 32767, 32768, 40000, 65535];

describe('decodeRegisters', () => {
  describe('16-bit types', () => {
    it('should return the word unchanged for UINT16', () => {
      for (const word of SAMPLE_WORDS) {
        expect(decodeRegisters([word], RegisterDecodeType.UINT16)).toBe(word);
      }
    });

    it('should wrap words at or above 32768 for INT16', () => {
      for (const word of SAMPLE_WORDS) {
        const expected = word >= 32768 ? word - 65536 : word;
        expect(decodeRegisters([word], RegisterDecodeType.INT16)).toBe(expected);
      }
    });

    it('should decode INT16 boundaries', () => {
      expect(decodeRegisters([32767], RegisterDecodeType.INT16)).toBe(32767);
      expect(decodeRegisters([32768], RegisterDecodeType.INT16)).toBe(-32768);
      expect(decodeRegisters([65535], RegisterDecodeType.INT16)).toBe(-1);
    });
  });

  describe('32-bit integer types', () => {
    it('should combine words high-first for UINT32', () => {
      for (const high of SAMPLE_WORDS) {
        for (const low of SAMPLE_WORDS) {
          expect(decodeRegisters([high, low], RegisterDecodeType.UINT32)).toBe(high * 65536 + low);
        }
      }
    });

    it('should subtract 2^32 for INT32 values at or above 2^31', () => {
      for (const high of SAMPLE_WORDS) {
        for (const low of SAMPLE_WORDS) {
          const combined = high * 65536 + low;
          const expected = combined >= 2 ** 31 ? combined - 2 ** 32 : combined;
          expect(decodeRegisters([high, low], RegisterDecodeType.INT32)).toBe(expected);
        }
      }
    });

    it('should decode INT32 boundaries', () => {
      expect(decodeRegisters([0x7fff, 0xffff], RegisterDecodeType.INT32)).toBe(2147483647);
      expect(decodeRegisters([0x8000, 0x0000], RegisterDecodeType.INT32)).toBe(-2147483648);
      expect(decodeRegisters([0xffff, 0xffff], RegisterDecodeType.INT32)).toBe(-1);
      expect(decodeRegisters([0xffff, 0xffff], RegisterDecodeType.UINT32)).toBe(4294967295);
    });
  });

  describe('FLOAT32', () => {
    it('should reconstruct an IEEE-754 single from big-endian words', () => {
      expect(decodeRegisters([0x4048, 0xf5c3], RegisterDecodeType.FLOAT32)).toBeCloseTo(3.14, 5);
    });

    it('should decode exact values', () => {
      expect(decodeRegisters([0x41a0, 0x0000], RegisterDecodeType.FLOAT32)).toBe(20);
      expect(decodeRegisters([0xc2c8, 0x0000], RegisterDecodeType.FLOAT32)).toBe(-100);
      expect(decodeRegisters([0x0000, 0x0000], RegisterDecodeType.FLOAT32)).toBe(0);
    });
  });

  describe('rejections', () => {
    it('should return undefined when the word count does not match the type', () => {
      expect(decodeRegisters([], RegisterDecodeType.UINT16)).toBeUndefined();
      expect(decodeRegisters([1, 2], RegisterDecodeType.INT16)).toBeUndefined();
      expect(decodeRegisters([1], RegisterDecodeType.UINT32)).toBeUndefined();
      expect(decodeRegisters([1, 2, 3], RegisterDecodeType.FLOAT32)).toBeUndefined();
    });

    it('should return undefined for words that are not 16-bit values', () => {
      expect(decodeRegisters([70000], RegisterDecodeType.UINT16)).toBeUndefined();
      expect(decodeRegisters([-1], RegisterDecodeType.INT16)).toBeUndefined();
      expect(decodeRegisters([1.5, 0], RegisterDecodeType.INT32)).toBeUndefined();
    });
  });
});

import { RegisterDecodeType, REGISTER_WIDTH } from './types';

/**
 * Decode one or two 16-bit register words (big-endian word order, first word
 * holds the high bits) into a number.
 *
 * Returns undefined when the word count does not match the type's width or a
 * word is not a valid 16-bit value.
 */
export function decodeRegisters(words: readonly number[], type: RegisterDecodeType): number | undefined {
  const width = REGISTER_WIDTH[type];
  if (width === undefined || words.length !== width) {
    return undefined;
  }

  if (!words.every(word => Number.isInteger(word) && word >= 0 && word <= 0xffff)) {
    return undefined;
  }

  const buffer = Buffer.alloc(width * 2);
  words.forEach((word, i) => buffer.writeUInt16BE(word, i * 2));

  switch (type) {
    case RegisterDecodeType.UINT16:
      return buffer.readUInt16BE(0);
    case RegisterDecodeType.INT16:
      return buffer.readInt16BE(0);
    case RegisterDecodeType.UINT32:
      return buffer.readUInt32BE(0);
    case RegisterDecodeType.INT32:
      return buffer.readInt32BE(0);
    case RegisterDecodeType.FLOAT32:
      return buffer.readFloatBE(0);
    default:
      return undefined;
  }
}

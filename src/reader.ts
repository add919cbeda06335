import {
  InsufficientBytesError,
  VarIntTooLargeError,
  VarLongTooLargeError,
} from "./errors";
import {
  Decoded,
  Endian,
  MaxVarIntBytes,
  MaxVarLongBytes,
  fromZigZag32,
  fromZigZag64,
} from "./types";

// Module-level singleton to avoid repeated instantiation
const textDecoder = new TextDecoder();

/**
 * Reads `length` bytes starting at `offset`.
 *
 * Every typed reader below is built on this one. The returned bytes are a
 * view into `data`, not a copy.
 *
 * @throws InsufficientBytesError if fewer than `length` bytes remain
 * @throws RangeError if `offset` or `length` is negative or not an integer
 */
export function read(data: Uint8Array, offset: number, length: number): Decoded<Uint8Array> {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new RangeError(`Invalid offset: ${offset}`);
  }
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Invalid length: ${length}`);
  }
  if (offset + length > data.length) {
    throw new InsufficientBytesError(length, Math.max(0, data.length - offset), offset);
  }
  return { value: data.subarray(offset, offset + length), offset: offset + length };
}

/**
 * Reads a fixed number of bytes and interprets them through a DataView.
 */
function readFixed<T>(
  data: Uint8Array,
  offset: number,
  width: number,
  decode: (view: DataView) => T
): Decoded<T> {
  const { value: bytes, offset: next } = read(data, offset, width);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return { value: decode(view), offset: next };
}

/**
 * Reads a boolean. Any nonzero byte is true.
 */
export function readBool(data: Uint8Array, offset: number): Decoded<boolean> {
  const { value, offset: next } = readUint8(data, offset);
  return { value: value !== 0, offset: next };
}

export function readInt8(data: Uint8Array, offset: number): Decoded<number> {
  return readFixed(data, offset, 1, (view) => view.getInt8(0));
}

export function readUint8(data: Uint8Array, offset: number): Decoded<number> {
  return readFixed(data, offset, 1, (view) => view.getUint8(0));
}

export function readInt16(
  data: Uint8Array,
  offset: number,
  endian: Endian = Endian.Big
): Decoded<number> {
  return readFixed(data, offset, 2, (view) => view.getInt16(0, endian === Endian.Little));
}

export function readUint16(
  data: Uint8Array,
  offset: number,
  endian: Endian = Endian.Big
): Decoded<number> {
  return readFixed(data, offset, 2, (view) => view.getUint16(0, endian === Endian.Little));
}

export function readInt32(
  data: Uint8Array,
  offset: number,
  endian: Endian = Endian.Big
): Decoded<number> {
  return readFixed(data, offset, 4, (view) => view.getInt32(0, endian === Endian.Little));
}

export function readUint32(
  data: Uint8Array,
  offset: number,
  endian: Endian = Endian.Big
): Decoded<number> {
  return readFixed(data, offset, 4, (view) => view.getUint32(0, endian === Endian.Little));
}

export function readInt64(
  data: Uint8Array,
  offset: number,
  endian: Endian = Endian.Big
): Decoded<bigint> {
  return readFixed(data, offset, 8, (view) => view.getBigInt64(0, endian === Endian.Little));
}

export function readUint64(
  data: Uint8Array,
  offset: number,
  endian: Endian = Endian.Big
): Decoded<bigint> {
  return readFixed(data, offset, 8, (view) => view.getBigUint64(0, endian === Endian.Little));
}

/**
 * Reads a 32-bit float (IEEE 754).
 */
export function readFloat32(
  data: Uint8Array,
  offset: number,
  endian: Endian = Endian.Big
): Decoded<number> {
  return readFixed(data, offset, 4, (view) => view.getFloat32(0, endian === Endian.Little));
}

/**
 * Reads a 64-bit float (IEEE 754).
 */
export function readFloat64(
  data: Uint8Array,
  offset: number,
  endian: Endian = Endian.Big
): Decoded<number> {
  return readFixed(data, offset, 8, (view) => view.getFloat64(0, endian === Endian.Little));
}

/**
 * Reads a triad. Only the low nibble of the most significant byte is kept,
 * so the result never exceeds 0x0fffff.
 */
export function readTriad(
  data: Uint8Array,
  offset: number,
  endian: Endian = Endian.Big
): Decoded<number> {
  const { value: b, offset: next } = read(data, offset, 3);
  const value =
    endian === Endian.Little
      ? b[0] | (b[1] << 8) | ((b[2] & 0x0f) << 16)
      : b[2] | (b[1] << 8) | ((b[0] & 0x0f) << 16);
  return { value, offset: next };
}

/**
 * Reads an unsigned 32-bit varint (LEB128).
 *
 * @throws VarIntTooLargeError if a sixth group is read
 * @throws InsufficientBytesError if the data ends mid-sequence
 */
export function readUnsignedVarInt(data: Uint8Array, offset: number): Decoded<number> {
  let result = 0;
  let pos = offset;

  for (let groups = 1; ; groups++) {
    const { value: b, offset: next } = readUint8(data, pos);
    pos = next;

    if (groups > MaxVarIntBytes) {
      throw new VarIntTooLargeError(offset);
    }
    result |= (b & 0x7f) << (7 * (groups - 1));

    if ((b & 0x80) === 0) {
      return { value: result >>> 0, offset: pos };
    }
  }
}

/**
 * Reads an unsigned 64-bit varint (LEB128).
 *
 * @throws VarLongTooLargeError if an eleventh group is read
 * @throws InsufficientBytesError if the data ends mid-sequence
 */
export function readUnsignedVarLong(data: Uint8Array, offset: number): Decoded<bigint> {
  let result = 0n;
  let pos = offset;

  for (let groups = 1; ; groups++) {
    const { value: b, offset: next } = readUint8(data, pos);
    pos = next;

    if (groups > MaxVarLongBytes) {
      throw new VarLongTooLargeError(offset);
    }
    result |= BigInt(b & 0x7f) << BigInt(7 * (groups - 1));

    if ((b & 0x80) === 0) {
      return { value: BigInt.asUintN(64, result), offset: pos };
    }
  }
}

/**
 * Reads a signed 32-bit varint using ZigZag decoding.
 */
export function readVarInt(data: Uint8Array, offset: number): Decoded<number> {
  const { value, offset: next } = readUnsignedVarInt(data, offset);
  return { value: fromZigZag32(value), offset: next };
}

/**
 * Reads a signed 64-bit varint using ZigZag decoding.
 */
export function readVarLong(data: Uint8Array, offset: number): Decoded<bigint> {
  const { value, offset: next } = readUnsignedVarLong(data, offset);
  return { value: fromZigZag64(value), offset: next };
}

/**
 * Reads length-prefixed bytes. The result is a view into `data`.
 */
export function readLengthPrefixedBytes(data: Uint8Array, offset: number): Decoded<Uint8Array> {
  const { value: length, offset: next } = readUnsignedVarInt(data, offset);
  return read(data, next, length);
}

/**
 * Reads a length-prefixed UTF-8 string.
 * Malformed sequences decode to U+FFFD rather than failing.
 */
export function readString(data: Uint8Array, offset: number): Decoded<string> {
  const { value: bytes, offset: next } = readLengthPrefixedBytes(data, offset);
  return { value: textDecoder.decode(bytes), offset: next };
}

/**
 * Converts a 64-bit value to a JavaScript number.
 *
 * WARNING: JavaScript numbers can only safely represent integers
 * up to Number.MAX_SAFE_INTEGER (2^53-1). Values beyond that lose precision.
 */
export function toSafeNumber(value: bigint, kind: string, warnOnPrecisionLoss: boolean): number {
  if (warnOnPrecisionLoss) {
    if (value > BigInt(Number.MAX_SAFE_INTEGER) ||
        value < BigInt(Number.MIN_SAFE_INTEGER)) {
      console.warn(
        `wirecursor: ${kind} value ${value} exceeds safe integer range ` +
        `(${Number.MIN_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}), ` +
        `precision may be lost. Use the bigint reader for full precision.`
      );
    }
  }
  return Number(value);
}

/**
 * Reads a signed 64-bit integer as a number.
 *
 * @param warnOnPrecisionLoss - If true (default), logs a warning when
 *                              precision loss occurs
 */
export function readInt64AsNumber(
  data: Uint8Array,
  offset: number,
  endian: Endian = Endian.Big,
  warnOnPrecisionLoss: boolean = true
): Decoded<number> {
  const { value, offset: next } = readInt64(data, offset, endian);
  return { value: toSafeNumber(value, "int64", warnOnPrecisionLoss), offset: next };
}

/**
 * Reads an unsigned 64-bit integer as a number.
 */
export function readUint64AsNumber(
  data: Uint8Array,
  offset: number,
  endian: Endian = Endian.Big,
  warnOnPrecisionLoss: boolean = true
): Decoded<number> {
  const { value, offset: next } = readUint64(data, offset, endian);
  return { value: toSafeNumber(value, "uint64", warnOnPrecisionLoss), offset: next };
}

/**
 * Reads a ZigZag varlong as a number.
 */
export function readVarLongAsNumber(
  data: Uint8Array,
  offset: number,
  warnOnPrecisionLoss: boolean = true
): Decoded<number> {
  const { value, offset: next } = readVarLong(data, offset);
  return { value: toSafeNumber(value, "varlong", warnOnPrecisionLoss), offset: next };
}

/**
 * Reads an unsigned varlong as a number.
 */
export function readUnsignedVarLongAsNumber(
  data: Uint8Array,
  offset: number,
  warnOnPrecisionLoss: boolean = true
): Decoded<number> {
  const { value, offset: next } = readUnsignedVarLong(data, offset);
  return { value: toSafeNumber(value, "uvarlong", warnOnPrecisionLoss), offset: next };
}

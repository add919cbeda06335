import { Endian, toZigZag32, toZigZag64 } from "./types";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

/**
 * Options for Writer configuration.
 */
export interface WriterOptions {
  /** Initial buffer capacity. Default: 256 */
  initialCapacity?: number;
}

/**
 * Writer appends encoded values to a buffer it owns.
 *
 * Writes never fail: the buffer grows as needed, and values outside a
 * field's width wrap the way a two's complement cast does.
 *
 * @example
 * ```typescript
 * const writer = new Writer();
 * writer.writeUint16(0x0102, Endian.Little);
 * writer.writeString("hello");
 * const data = writer.finish();
 * ```
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;

  constructor(options: WriterOptions = {}) {
    const capacity = Math.max(1, options.initialCapacity ?? INITIAL_CAPACITY);
    this.buffer = new Uint8Array(capacity);
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
  }

  /**
   * Returns the number of bytes written.
   */
  get length(): number {
    return this.pos;
  }

  /**
   * Returns a view of the written bytes.
   * The view is only valid until the next write or reset.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Returns a copy of the written bytes that later writes do not affect.
   */
  finish(): Uint8Array {
    return this.buffer.slice(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has at least the specified capacity.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes raw bytes.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes a boolean as 0x01 or 0x00.
   */
  writeBool(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  writeInt8(value: number): void {
    this.writeByte(value);
  }

  writeUint8(value: number): void {
    this.writeByte(value);
  }

  writeInt16(value: number, endian: Endian = Endian.Big): void {
    this.ensureCapacity(2);
    this.view.setInt16(this.pos, value, endian === Endian.Little);
    this.pos += 2;
  }

  writeUint16(value: number, endian: Endian = Endian.Big): void {
    this.ensureCapacity(2);
    this.view.setUint16(this.pos, value, endian === Endian.Little);
    this.pos += 2;
  }

  writeInt32(value: number, endian: Endian = Endian.Big): void {
    this.ensureCapacity(4);
    this.view.setInt32(this.pos, value, endian === Endian.Little);
    this.pos += 4;
  }

  writeUint32(value: number, endian: Endian = Endian.Big): void {
    this.ensureCapacity(4);
    this.view.setUint32(this.pos, value, endian === Endian.Little);
    this.pos += 4;
  }

  writeInt64(value: bigint, endian: Endian = Endian.Big): void {
    this.ensureCapacity(8);
    this.view.setBigInt64(this.pos, BigInt.asIntN(64, value), endian === Endian.Little);
    this.pos += 8;
  }

  writeUint64(value: bigint, endian: Endian = Endian.Big): void {
    this.ensureCapacity(8);
    this.view.setBigUint64(this.pos, BigInt.asUintN(64, value), endian === Endian.Little);
    this.pos += 8;
  }

  /**
   * Writes a 32-bit float (IEEE 754).
   */
  writeFloat32(value: number, endian: Endian = Endian.Big): void {
    this.ensureCapacity(4);
    this.view.setFloat32(this.pos, value, endian === Endian.Little);
    this.pos += 4;
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeFloat64(value: number, endian: Endian = Endian.Big): void {
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value, endian === Endian.Little);
    this.pos += 8;
  }

  /**
   * Writes the low 24 bits of a value as a triad.
   * Unlike readTriad, nothing is masked here.
   */
  writeTriad(value: number, endian: Endian = Endian.Big): void {
    const b0 = value & 0xff;
    const b1 = (value >>> 8) & 0xff;
    const b2 = (value >>> 16) & 0xff;
    this.ensureCapacity(3);
    if (endian === Endian.Little) {
      this.buffer[this.pos++] = b0;
      this.buffer[this.pos++] = b1;
      this.buffer[this.pos++] = b2;
    } else {
      this.buffer[this.pos++] = b2;
      this.buffer[this.pos++] = b1;
      this.buffer[this.pos++] = b0;
    }
  }

  /**
   * Writes an unsigned 32-bit varint (LEB128).
   */
  writeUnsignedVarInt(value: number): void {
    value >>>= 0;
    this.ensureCapacity(5); // Max 5 bytes for 32-bit
    while (value > 0x7f) {
      this.buffer[this.pos++] = (value & 0x7f) | 0x80;
      value >>>= 7;
    }
    this.buffer[this.pos++] = value;
  }

  /**
   * Writes an unsigned 64-bit varint (LEB128).
   */
  writeUnsignedVarLong(value: bigint): void {
    value = BigInt.asUintN(64, value);
    this.ensureCapacity(10); // Max 10 bytes for 64-bit
    while (value > 0x7fn) {
      this.buffer[this.pos++] = Number(value & 0x7fn) | 0x80;
      value >>= 7n;
    }
    this.buffer[this.pos++] = Number(value);
  }

  /**
   * Writes a signed 32-bit varint using ZigZag encoding.
   */
  writeVarInt(value: number): void {
    this.writeUnsignedVarInt(toZigZag32(value));
  }

  /**
   * Writes a signed 64-bit varint using ZigZag encoding.
   */
  writeVarLong(value: bigint): void {
    this.writeUnsignedVarLong(toZigZag64(value));
  }

  /**
   * Writes a string prefixed with its UTF-8 byte length.
   */
  writeString(value: string): void {
    this.writeLengthPrefixedBytes(textEncoder.encode(value));
  }

  /**
   * Writes length-prefixed bytes.
   */
  writeLengthPrefixedBytes(data: Uint8Array): void {
    this.writeUnsignedVarInt(data.length);
    this.writeBytes(data);
  }
}

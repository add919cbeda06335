/**
 * Stateful cursor over an owned buffer.
 *
 * A Stream bundles a growable buffer, a read offset and a latched fault, so
 * that a protocol layer can issue field-by-field reads and writes without
 * threading the offset through every call or checking every result.
 *
 * Writes always append to the end of the buffer. Reads start at the offset.
 * The first failed read latches a StreamFault; from then on every get* call
 * returns the zero value of its kind without touching the buffer, while put*
 * calls keep appending. reset() clears the buffer, the offset and the fault.
 */

import { Writer } from "./writer";
import * as codec from "./reader";
import { DecodeError, StreamFault } from "./errors";
import { Decoded, Endian } from "./types";

/**
 * Convention used by feof() and by get() with a negative length.
 *
 * - `legacy`: the last byte already counts as the end (`offset >= length - 1`),
 *   and "all remaining" leaves that byte unread.
 * - `strict`: the end is past the last byte (`offset >= length`).
 */
export type EndOfBufferMode = "legacy" | "strict";

/**
 * Options for Stream configuration.
 */
export interface StreamOptions {
  /** Byte order used when a call does not name one. Default: Endian.Big */
  endian?: Endian;
  /** End-of-buffer convention. Default: "legacy" */
  endOfBuffer?: EndOfBufferMode;
  /** Initial capacity of the owned buffer. Default: 256 */
  initialCapacity?: number;
}

const EMPTY = new Uint8Array(0);

/**
 * Stream reads and writes primitive values at a tracked offset.
 *
 * @example
 * ```typescript
 * const out = new Stream();
 * out.putVarInt(-3);
 * out.putString("hello");
 *
 * const input = Stream.from(out.bytes());
 * const n = input.getVarInt();
 * const s = input.getString();
 * if (input.error) {
 *   // input.error.offset is where the failing read started
 * }
 * ```
 */
export class Stream {
  private writer: Writer;
  private pos: number;
  private fault: StreamFault | null;
  private readonly endian: Endian;
  private readonly endOfBuffer: EndOfBufferMode;

  constructor(options: StreamOptions = {}) {
    this.writer = new Writer({ initialCapacity: options.initialCapacity });
    this.pos = 0;
    this.fault = null;
    this.endian = options.endian ?? Endian.Big;
    this.endOfBuffer = options.endOfBuffer ?? "legacy";
  }

  /**
   * Creates a stream for reading, pre-loaded with a copy of `data`.
   *
   * @throws RangeError if `offset` is outside the data
   */
  static from(data: Uint8Array, offset: number = 0, options: StreamOptions = {}): Stream {
    const stream = new Stream({
      ...options,
      initialCapacity: options.initialCapacity ?? Math.max(data.length, 1),
    });
    stream.setBuffer(data);
    stream.offset = offset;
    return stream;
  }

  /**
   * Returns the current read offset.
   */
  get offset(): number {
    return this.pos;
  }

  /**
   * Moves the read offset.
   *
   * @throws RangeError if the offset is outside the buffer
   */
  set offset(offset: number) {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.writer.length) {
      throw new RangeError(
        `Offset ${offset} is outside the buffer (length ${this.writer.length})`
      );
    }
    this.pos = offset;
  }

  /**
   * Returns the number of bytes in the buffer.
   */
  get length(): number {
    return this.writer.length;
  }

  /**
   * Returns the number of bytes after the offset.
   */
  get remaining(): number {
    return this.writer.length - this.pos;
  }

  /**
   * Returns a view of the buffer, valid until the next put or reset.
   */
  get buffer(): Uint8Array {
    return this.writer.bytes();
  }

  /**
   * Returns a copy of the buffer.
   */
  bytes(): Uint8Array {
    return this.writer.finish();
  }

  /**
   * Replaces the buffer with a copy of `data`. The offset is kept.
   *
   * @throws RangeError if the offset lies past the end of `data`
   */
  setBuffer(data: Uint8Array): void {
    if (this.pos > data.length) {
      throw new RangeError(
        `Offset ${this.pos} is outside the new buffer (length ${data.length})`
      );
    }
    this.writer.reset();
    this.writer.writeBytes(data);
  }

  /**
   * Returns the latched fault, or null if every read has succeeded.
   */
  get error(): StreamFault | null {
    return this.fault;
  }

  /**
   * Latches an external failure, such as a protocol-level validation error,
   * at the current offset. Has no effect when a fault is already latched.
   */
  setError(cause: Error): void {
    if (this.fault === null) {
      this.fault = new StreamFault(cause, this.pos, this.writer.finish());
    }
  }

  /**
   * Returns true once the offset has reached the end of the buffer,
   * as defined by the stream's end-of-buffer mode.
   */
  feof(): boolean {
    if (this.endOfBuffer === "strict") {
      return this.pos >= this.writer.length;
    }
    return this.pos >= this.writer.length - 1;
  }

  /**
   * Clears the buffer, the offset and any latched fault.
   */
  reset(): void {
    this.writer.reset();
    this.pos = 0;
    this.fault = null;
  }

  /**
   * Runs a read primitive at the offset, latching its failure.
   */
  private decode<T>(zero: T, readValue: (data: Uint8Array, offset: number) => Decoded<T>): T {
    if (this.fault !== null) {
      return zero;
    }
    try {
      const { value, offset } = readValue(this.writer.bytes(), this.pos);
      this.pos = offset;
      return value;
    } catch (e) {
      if (e instanceof DecodeError) {
        this.setError(e);
        return zero;
      }
      throw e;
    }
  }

  /**
   * Reads `length` raw bytes. A negative length reads the remaining bytes.
   * The result is a copy.
   */
  get(length: number): Uint8Array {
    if (length < 0) {
      const tail = this.endOfBuffer === "strict" ? 0 : 1;
      length = Math.max(0, this.writer.length - this.pos - tail);
    }
    return this.decode(EMPTY, (data, offset) => {
      const { value, offset: next } = codec.read(data, offset, length);
      return { value: value.slice(), offset: next };
    });
  }

  putBytes(data: Uint8Array): void {
    this.writer.writeBytes(data);
  }

  putBool(value: boolean): void {
    this.writer.writeBool(value);
  }

  getBool(): boolean {
    return this.decode(false, codec.readBool);
  }

  putInt8(value: number): void {
    this.writer.writeInt8(value);
  }

  getInt8(): number {
    return this.decode(0, codec.readInt8);
  }

  putUint8(value: number): void {
    this.writer.writeUint8(value);
  }

  getUint8(): number {
    return this.decode(0, codec.readUint8);
  }

  putInt16(value: number, endian: Endian = this.endian): void {
    this.writer.writeInt16(value, endian);
  }

  getInt16(endian: Endian = this.endian): number {
    return this.decode(0, (data, offset) => codec.readInt16(data, offset, endian));
  }

  putUint16(value: number, endian: Endian = this.endian): void {
    this.writer.writeUint16(value, endian);
  }

  getUint16(endian: Endian = this.endian): number {
    return this.decode(0, (data, offset) => codec.readUint16(data, offset, endian));
  }

  putInt32(value: number, endian: Endian = this.endian): void {
    this.writer.writeInt32(value, endian);
  }

  getInt32(endian: Endian = this.endian): number {
    return this.decode(0, (data, offset) => codec.readInt32(data, offset, endian));
  }

  putUint32(value: number, endian: Endian = this.endian): void {
    this.writer.writeUint32(value, endian);
  }

  getUint32(endian: Endian = this.endian): number {
    return this.decode(0, (data, offset) => codec.readUint32(data, offset, endian));
  }

  putInt64(value: bigint, endian: Endian = this.endian): void {
    this.writer.writeInt64(value, endian);
  }

  getInt64(endian: Endian = this.endian): bigint {
    return this.decode(0n, (data, offset) => codec.readInt64(data, offset, endian));
  }

  /**
   * Reads a signed 64-bit integer as a number, warning on precision loss.
   */
  getInt64AsNumber(endian: Endian = this.endian, warnOnPrecisionLoss: boolean = true): number {
    return this.decode(0, (data, offset) =>
      codec.readInt64AsNumber(data, offset, endian, warnOnPrecisionLoss)
    );
  }

  putUint64(value: bigint, endian: Endian = this.endian): void {
    this.writer.writeUint64(value, endian);
  }

  getUint64(endian: Endian = this.endian): bigint {
    return this.decode(0n, (data, offset) => codec.readUint64(data, offset, endian));
  }

  putFloat32(value: number, endian: Endian = this.endian): void {
    this.writer.writeFloat32(value, endian);
  }

  getFloat32(endian: Endian = this.endian): number {
    return this.decode(0, (data, offset) => codec.readFloat32(data, offset, endian));
  }

  putFloat64(value: number, endian: Endian = this.endian): void {
    this.writer.writeFloat64(value, endian);
  }

  getFloat64(endian: Endian = this.endian): number {
    return this.decode(0, (data, offset) => codec.readFloat64(data, offset, endian));
  }

  putTriad(value: number, endian: Endian = this.endian): void {
    this.writer.writeTriad(value, endian);
  }

  getTriad(endian: Endian = this.endian): number {
    return this.decode(0, (data, offset) => codec.readTriad(data, offset, endian));
  }

  putVarInt(value: number): void {
    this.writer.writeVarInt(value);
  }

  getVarInt(): number {
    return this.decode(0, codec.readVarInt);
  }

  putVarLong(value: bigint): void {
    this.writer.writeVarLong(value);
  }

  getVarLong(): bigint {
    return this.decode(0n, codec.readVarLong);
  }

  /**
   * Reads a ZigZag varlong as a number, warning on precision loss.
   */
  getVarLongAsNumber(warnOnPrecisionLoss: boolean = true): number {
    return this.decode(0, (data, offset) =>
      codec.readVarLongAsNumber(data, offset, warnOnPrecisionLoss)
    );
  }

  putUnsignedVarInt(value: number): void {
    this.writer.writeUnsignedVarInt(value);
  }

  getUnsignedVarInt(): number {
    return this.decode(0, codec.readUnsignedVarInt);
  }

  putUnsignedVarLong(value: bigint): void {
    this.writer.writeUnsignedVarLong(value);
  }

  getUnsignedVarLong(): bigint {
    return this.decode(0n, codec.readUnsignedVarLong);
  }

  putString(value: string): void {
    this.writer.writeString(value);
  }

  getString(): string {
    return this.decode("", codec.readString);
  }

  putLengthPrefixedBytes(data: Uint8Array): void {
    this.writer.writeLengthPrefixedBytes(data);
  }

  /**
   * Reads length-prefixed bytes. The result is a copy.
   */
  getLengthPrefixedBytes(): Uint8Array {
    return this.decode(EMPTY, (data, offset) => {
      const { value, offset: next } = codec.readLengthPrefixedBytes(data, offset);
      return { value: value.slice(), offset: next };
    });
  }
}

/**
 * wirecursor - bit-exact binary buffer codec for TypeScript
 *
 * Fixed-width integers and floats in either byte order, triads, ZigZag
 * varints and length-prefixed strings, plus a cursor Stream that latches
 * its first read failure.
 *
 * @example
 * ```typescript
 * import { Stream, Endian } from 'wirecursor';
 *
 * // Encoding
 * const out = new Stream();
 * out.putUint16(0xcafe, Endian.Little);
 * out.putString("hello");
 *
 * // Decoding
 * const input = Stream.from(out.bytes());
 * const id = input.getUint16(Endian.Little);
 * const name = input.getString();
 * if (input.error) {
 *   throw input.error;
 * }
 * ```
 */

// Core types
export {
  Endian,
  MinInt32,
  MaxInt32,
  MaxUint32,
  MinInt64,
  MaxInt64,
  MaxUint64,
  MaxVarIntBytes,
  MaxVarLongBytes,
  TriadMask,
  toZigZag32,
  fromZigZag32,
  toZigZag64,
  fromZigZag64,
} from "./types";
export type { Decoded } from "./types";

// Errors
export {
  CodecError,
  DecodeError,
  InsufficientBytesError,
  VarIntTooLargeError,
  VarLongTooLargeError,
  StreamFault,
} from "./errors";

// Read primitives
export {
  read,
  readBool,
  readInt8,
  readUint8,
  readInt16,
  readUint16,
  readInt32,
  readUint32,
  readInt64,
  readUint64,
  readFloat32,
  readFloat64,
  readTriad,
  readUnsignedVarInt,
  readUnsignedVarLong,
  readVarInt,
  readVarLong,
  readLengthPrefixedBytes,
  readString,
  readInt64AsNumber,
  readUint64AsNumber,
  readVarLongAsNumber,
  readUnsignedVarLongAsNumber,
} from "./reader";

// Writer
import { Writer } from "./writer";
export { Writer };
export type { WriterOptions } from "./writer";

// Stream
import { Stream, StreamOptions } from "./stream";
export { Stream };
export type { StreamOptions, EndOfBufferMode } from "./stream";

/**
 * Library version.
 */
export const VERSION = "0.3.0";

/**
 * Marshal encodes a value using a custom encoder function.
 */
export function marshal<T>(value: T, encoder: (writer: Writer, value: T) => void): Uint8Array {
  const writer = new Writer();
  encoder(writer, value);
  return writer.finish();
}

/**
 * Unmarshal decodes a value using a custom decoder function.
 *
 * @throws StreamFault if any read in the decoder failed
 */
export function unmarshal<T>(
  data: Uint8Array,
  decoder: (stream: Stream) => T,
  options: StreamOptions = {}
): T {
  const stream = Stream.from(data, 0, options);
  const value = decoder(stream);
  if (stream.error !== null) {
    throw stream.error;
  }
  return value;
}

/**
 * Base error class for codec errors.
 */
export class CodecError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CodecError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends CodecError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when a read needs more bytes than remain after the offset.
 */
export class InsufficientBytesError extends DecodeError {
  readonly needed: number;
  readonly available: number;
  readonly offset: number;

  constructor(needed: number, available: number, offset: number) {
    super(
      `Insufficient bytes: needed ${needed} at offset ${offset}, only ${available} available`
    );
    this.name = "InsufficientBytesError";
    this.needed = needed;
    this.available = available;
    this.offset = offset;
  }
}

/**
 * Error thrown when a 32-bit varint runs past five groups.
 */
export class VarIntTooLargeError extends DecodeError {
  constructor(offset: number) {
    super(`Unsigned varint too large at offset ${offset}: exceeded 5 bytes`);
    this.name = "VarIntTooLargeError";
  }
}

/**
 * Error thrown when a 64-bit varint runs past ten groups.
 */
export class VarLongTooLargeError extends DecodeError {
  constructor(offset: number) {
    super(`Unsigned varlong too large at offset ${offset}: exceeded 10 bytes`);
    this.name = "VarLongTooLargeError";
  }
}

/**
 * Fault latched by a Stream after its first failed read.
 *
 * Records where the read started and the stream contents at that moment.
 */
export class StreamFault extends DecodeError {
  readonly offset: number;
  readonly buffer: Uint8Array;
  declare cause: Error;

  constructor(cause: Error, offset: number, buffer: Uint8Array) {
    super(`Stream fault at offset ${offset}: ${cause.message}`, { cause });
    this.name = "StreamFault";
    this.offset = offset;
    this.buffer = buffer;
  }
}

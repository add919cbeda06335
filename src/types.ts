/**
 * Byte order of a fixed-width multi-byte value.
 */
export enum Endian {
  /** Most significant byte first */
  Big = 0,
  /** Least significant byte first */
  Little = 1,
}

/**
 * Result of a read primitive: the decoded value and the offset just past it.
 */
export interface Decoded<T> {
  value: T;
  offset: number;
}

/**
 * Signed and unsigned 32-bit bounds.
 */
export const MinInt32 = -0x80000000;
export const MaxInt32 = 0x7fffffff;
export const MaxUint32 = 0xffffffff;

/**
 * Signed and unsigned 64-bit bounds.
 */
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1
export const MaxUint64 = BigInt("0xffffffffffffffff");

/**
 * Maximum number of 7-bit groups in a varint.
 * ceil(32/7) = 5 and ceil(64/7) = 10.
 */
export const MaxVarIntBytes = 5;
export const MaxVarLongBytes = 10;

/**
 * Bits a triad keeps on read: two full bytes plus the low nibble of the third.
 */
export const TriadMask = 0x0fffff;

/**
 * Encode a signed 32-bit integer using ZigZag encoding.
 * The result is an unsigned 32-bit integer.
 */
export function toZigZag32(n: number): number {
  n |= 0;
  return ((n << 1) ^ (n >> 31)) >>> 0;
}

/**
 * Decode a ZigZag encoded 32-bit integer.
 */
export function fromZigZag32(u: number): number {
  u >>>= 0;
  return (u >>> 1) ^ -(u & 1);
}

/**
 * Encode a signed 64-bit integer using ZigZag encoding.
 * Values outside the int64 range wrap before encoding.
 */
export function toZigZag64(n: bigint): bigint {
  n = BigInt.asIntN(64, n);
  return BigInt.asUintN(64, (n << 1n) ^ (n >> 63n));
}

/**
 * Decode a ZigZag encoded 64-bit integer.
 */
export function fromZigZag64(u: bigint): bigint {
  u = BigInt.asUintN(64, u);
  return BigInt.asIntN(64, (u >> 1n) ^ -(u & 1n));
}

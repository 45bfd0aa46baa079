/**
 * Wire types of the protobuf binary encoding.
 *
 * Values 6 and 7 are not assigned; a tag carrying either is rejected by the
 * reader as an unknown wire type.
 */
export enum WireType {
  /** Variable-length integer (LEB128) */
  Varint = 0,
  /** Fixed 64-bit value (little-endian) */
  Fixed64 = 1,
  /** Length-prefixed bytes (string, bytes, messages, packed arrays) */
  Bytes = 2,
  /** Start of a group (deprecated) */
  StartGroup = 3,
  /** End of a group (deprecated) */
  EndGroup = 4,
  /** Fixed 32-bit value (little-endian) */
  Fixed32 = 5,
}

/**
 * Field tag combining field number and wire type.
 */
export interface FieldTag {
  fieldNumber: number;
  wireType: WireType;
}

/**
 * Integer bounds for each width.
 */
export const MinInt32 = -2147483648;
export const MaxInt32 = 2147483647;
export const MaxUint32 = 0xffffffff;
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1
export const MaxUint64 = BigInt("0xffffffffffffffff");

/**
 * Largest field number a tag can carry (2^29 - 1).
 */
export const MaxFieldNumber = 536870911;

const WIRE_TYPE_MASK = 0x07;
const FIELD_NUMBER_SHIFT = 3;

/**
 * Narrows a 3-bit wire type value to an assigned WireType.
 */
export function isWireType(value: number): value is WireType {
  return value >= WireType.Varint && value <= WireType.Fixed32;
}

/**
 * Encode a field tag as the unsigned value written before each field.
 */
export function encodeTag(fieldNumber: number, wireType: WireType): number {
  return ((fieldNumber << FIELD_NUMBER_SHIFT) | wireType) >>> 0;
}

/**
 * Split a tag value into field number and raw wire type bits.
 */
export function splitTag(tag: number): { fieldNumber: number; wireType: number } {
  return {
    fieldNumber: tag >>> FIELD_NUMBER_SHIFT,
    wireType: tag & WIRE_TYPE_MASK,
  };
}

/**
 * Encode a signed 32-bit integer using ZigZag encoding.
 * The result is unsigned.
 */
export function zigzagEncode(n: number): number {
  return ((n << 1) ^ (n >> 31)) >>> 0;
}

/**
 * Encode a signed bigint using ZigZag encoding.
 * @throws RangeError if n is outside the valid 64-bit signed integer range
 */
export function zigzagEncode64(n: bigint): bigint {
  if (n < MinInt64 || n > MaxInt64) {
    throw new RangeError(
      `BigInt value ${n} is outside valid 64-bit signed integer range [${MinInt64}, ${MaxInt64}]`
    );
  }
  return (n << 1n) ^ (n >> 63n);
}

/**
 * Decode a ZigZag encoded 32-bit integer.
 */
export function zigzagDecode(n: number): number {
  return (n >>> 1) ^ -(n & 1);
}

/**
 * Decode a ZigZag encoded bigint.
 */
export function zigzagDecode64(n: bigint): bigint {
  return (n >> 1n) ^ -(n & 1n);
}

/**
 * A zigzag-coded 32-bit value as read off the wire.
 */
export class SInt32 {
  constructor(public readonly value: number) {}
}

/**
 * A zigzag-coded 64-bit value as read off the wire.
 */
export class SInt64 {
  constructor(public readonly value: bigint) {}
}

/**
 * An enum number. Open enums keep numbers the schema does not name.
 */
export class Enum {
  constructor(public readonly value: number) {}
}

import { EncodeError } from "./errors";
import {
  Enum,
  MaxFieldNumber,
  MaxInt32,
  MaxInt64,
  MaxUint32,
  MaxUint64,
  MinInt32,
  MinInt64,
  WireType,
  encodeTag,
  zigzagEncode,
  zigzagEncode64,
} from "./types";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

function checkInt32(value: number, kind: string): void {
  if (!Number.isInteger(value) || value < MinInt32 || value > MaxInt32) {
    throw new EncodeError(`${kind} value ${value} is outside [${MinInt32}, ${MaxInt32}]`);
  }
}

function checkUint32(value: number, kind: string): void {
  if (!Number.isInteger(value) || value < 0 || value > MaxUint32) {
    throw new EncodeError(`${kind} value ${value} is outside [0, ${MaxUint32}]`);
  }
}

function checkInt64(value: bigint, kind: string): void {
  if (value < MinInt64 || value > MaxInt64) {
    throw new EncodeError(`${kind} value ${value} is outside [${MinInt64}, ${MaxInt64}]`);
  }
}

function checkUint64(value: bigint, kind: string): void {
  if (value < 0n || value > MaxUint64) {
    throw new EncodeError(`${kind} value ${value} is outside [0, ${MaxUint64}]`);
  }
}

/**
 * Writer encodes protobuf wire data into a growable buffer.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(initialCapacity);
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns a copy of the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.slice(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = Math.max(this.buffer.length, 1) * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer);
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes a field tag.
   */
  writeTag(fieldNumber: number, wireType: WireType): void {
    if (!Number.isInteger(fieldNumber) || fieldNumber < 1 || fieldNumber > MaxFieldNumber) {
      throw new EncodeError(`field number ${fieldNumber} is outside [1, ${MaxFieldNumber}]`);
    }
    this.writeVarint(encodeTag(fieldNumber, wireType));
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes raw bytes without a length prefix.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes an unsigned 32-bit varint (LEB128).
   */
  writeVarint(value: number): void {
    let remaining = value >>> 0;
    this.ensureCapacity(5); // Max 5 bytes for 32-bit
    while (remaining > 0x7f) {
      this.buffer[this.pos++] = (remaining & 0x7f) | 0x80;
      remaining >>>= 7;
    }
    this.buffer[this.pos++] = remaining;
  }

  /**
   * Writes an unsigned 64-bit varint (LEB128). Negative values are written
   * as their two's complement.
   */
  writeVarint64(value: bigint): void {
    let remaining = BigInt.asUintN(64, value);
    this.ensureCapacity(10); // Max 10 bytes for 64-bit
    while (remaining > 0x7fn) {
      this.buffer[this.pos++] = Number(remaining & 0x7fn) | 0x80;
      remaining >>= 7n;
    }
    this.buffer[this.pos++] = Number(remaining);
  }

  /**
   * Writes an int32. Negative values are sign-extended to ten bytes.
   */
  writeInt32(value: number): void {
    checkInt32(value, "int32");
    if (value < 0) {
      this.writeVarint64(BigInt(value));
    } else {
      this.writeVarint(value);
    }
  }

  writeInt64(value: bigint): void {
    checkInt64(value, "int64");
    this.writeVarint64(value);
  }

  writeUint32(value: number): void {
    checkUint32(value, "uint32");
    this.writeVarint(value);
  }

  writeUint64(value: bigint): void {
    checkUint64(value, "uint64");
    this.writeVarint64(value);
  }

  /**
   * Writes a signed 32-bit integer using ZigZag encoding.
   */
  writeSint32(value: number): void {
    checkInt32(value, "sint32");
    this.writeVarint(zigzagEncode(value));
  }

  /**
   * Writes a signed 64-bit integer using ZigZag encoding.
   */
  writeSint64(value: bigint): void {
    checkInt64(value, "sint64");
    this.writeVarint64(zigzagEncode64(value));
  }

  writeBool(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  /**
   * Writes an enum number (encoded like int32).
   */
  writeEnum(value: Enum): void {
    this.writeInt32(value.value);
  }

  /**
   * Writes a fixed 32-bit unsigned value.
   */
  writeFixed32(value: number): void {
    checkUint32(value, "fixed32");
    this.ensureCapacity(4);
    this.view.setUint32(this.pos, value, true); // Little-endian
    this.pos += 4;
  }

  /**
   * Writes a fixed 64-bit unsigned value.
   */
  writeFixed64(value: bigint): void {
    checkUint64(value, "fixed64");
    this.ensureCapacity(8);
    this.view.setBigUint64(this.pos, BigInt.asUintN(64, value), true);
    this.pos += 8;
  }

  writeSfixed32(value: number): void {
    checkInt32(value, "sfixed32");
    this.ensureCapacity(4);
    this.view.setInt32(this.pos, value, true);
    this.pos += 4;
  }

  writeSfixed64(value: bigint): void {
    checkInt64(value, "sfixed64");
    this.ensureCapacity(8);
    this.view.setBigInt64(this.pos, BigInt.asIntN(64, value), true);
    this.pos += 8;
  }

  /**
   * Writes a 32-bit float (IEEE 754).
   */
  writeFloat(value: number): void {
    this.ensureCapacity(4);
    this.view.setFloat32(this.pos, value, true);
    this.pos += 4;
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeDouble(value: number): void {
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value, true);
    this.pos += 8;
  }

  /**
   * Writes a length-prefixed UTF-8 string.
   */
  writeString(value: string): void {
    const bytes = textEncoder.encode(value);
    this.writeVarint(bytes.length);
    this.writeBytes(bytes);
  }

  /**
   * Writes length-prefixed bytes.
   */
  writeLengthPrefixedBytes(data: Uint8Array): void {
    this.writeVarint(data.length);
    this.writeBytes(data);
  }
}

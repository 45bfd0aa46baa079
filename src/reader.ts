import {
  BufferUnderflowError,
  DecodeError,
  InvalidStringError,
  UnknownWireTypeError,
} from "./errors";
import {
  Enum,
  SInt32,
  SInt64,
  WireType,
  isWireType,
  splitTag,
  zigzagDecode,
  zigzagDecode64,
} from "./types";
import type { FieldTag } from "./types";

// Module-level singleton; fatal so that invalid UTF-8 throws instead of
// decoding to U+FFFD
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Reader decodes protobuf wire data from a binary buffer.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new BufferUnderflowError(needed, this.remaining);
    }
  }

  /**
   * Reads a raw byte.
   */
  readByte(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads raw bytes.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * Maximum number of bytes for a varint.
   * A uint64 has 64 bits, and each varint byte encodes 7 bits,
   * so we need ceil(64/7) = 10 bytes maximum.
   */
  private static readonly MAX_VARINT_BYTES = 10;

  /**
   * Reads a varint and returns its low 32 bits, unsigned.
   * Ten-byte encodings (negative int32) are accepted and truncated.
   */
  readVarint(): number {
    let result = 0;

    for (let i = 0; i < Reader.MAX_VARINT_BYTES; i++) {
      this.checkAvailable(1);
      const b = this.buffer[this.pos++];

      // Bytes past the fifth only carry bits above 32
      if (i < 5) {
        result |= (b & 0x7f) << (7 * i);
      }
      if ((b & 0x80) === 0) {
        return result >>> 0;
      }
    }

    throw new DecodeError("Varint overflow: exceeded 10 bytes", "malformed-varint");
  }

  /**
   * Reads an unsigned 64-bit varint (LEB128).
   */
  readVarint64(): bigint {
    let result = 0n;
    let shift = 0n;

    for (let i = 0; i < Reader.MAX_VARINT_BYTES; i++) {
      this.checkAvailable(1);
      const b = this.buffer[this.pos++];

      // The 10th byte carries only bit 63
      if (i === 9 && b > 1) {
        throw new DecodeError("Varint64 overflow: 10th byte must be 0 or 1", "malformed-varint");
      }

      result |= BigInt(b & 0x7f) << shift;
      if ((b & 0x80) === 0) {
        return result;
      }
      shift += 7n;
    }

    throw new DecodeError("Varint64 overflow: exceeded 10 bytes", "malformed-varint");
  }

  /**
   * Reads a field tag.
   * @throws UnknownWireTypeError for wire types 6 and 7
   */
  readTag(): FieldTag {
    const { fieldNumber, wireType } = splitTag(this.readVarint());
    if (!isWireType(wireType)) {
      throw new UnknownWireTypeError(wireType);
    }
    if (fieldNumber === 0) {
      throw new DecodeError("Invalid field number 0", "invalid-tag");
    }
    return { fieldNumber, wireType };
  }

  readInt32(): number {
    return this.readVarint() | 0;
  }

  readInt64(): bigint {
    return BigInt.asIntN(64, this.readVarint64());
  }

  readUint32(): number {
    return this.readVarint();
  }

  readUint64(): bigint {
    return this.readVarint64();
  }

  /**
   * Reads a ZigZag encoded 32-bit integer.
   */
  readSint32(): SInt32 {
    return new SInt32(zigzagDecode(this.readVarint()));
  }

  /**
   * Reads a ZigZag encoded 64-bit integer.
   */
  readSint64(): SInt64 {
    return new SInt64(zigzagDecode64(this.readVarint64()));
  }

  readBool(): boolean {
    return this.readVarint64() !== 0n;
  }

  readEnum(): Enum {
    return new Enum(this.readInt32());
  }

  readFixed32(): number {
    this.checkAvailable(4);
    const value = this.view.getUint32(this.pos, true); // Little-endian
    this.pos += 4;
    return value;
  }

  readFixed64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigUint64(this.pos, true);
    this.pos += 8;
    return value;
  }

  readSfixed32(): number {
    this.checkAvailable(4);
    const value = this.view.getInt32(this.pos, true);
    this.pos += 4;
    return value;
  }

  readSfixed64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigInt64(this.pos, true);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a 32-bit float (IEEE 754).
   */
  readFloat(): number {
    this.checkAvailable(4);
    const value = this.view.getFloat32(this.pos, true);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readDouble(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos, true);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a length-prefixed UTF-8 string.
   * @throws InvalidStringError if the payload is not valid UTF-8
   */
  readString(): string {
    const bytes = this.readLengthPrefixedBytes();
    try {
      return textDecoder.decode(bytes);
    } catch (err) {
      if (err instanceof TypeError) {
        throw new InvalidStringError(bytes.length);
      }
      throw err;
    }
  }

  /**
   * Reads length-prefixed bytes.
   */
  readLengthPrefixedBytes(): Uint8Array {
    const length = this.readVarint();
    return this.readBytes(length);
  }

  /**
   * Reads a packed repeated field: a length-prefixed run of elements.
   */
  readPacked<T>(readElement: (reader: Reader) => T): T[] {
    const sub = this.subReader(this.readVarint());
    const values: T[] = [];
    while (sub.hasMore) {
      values.push(readElement(sub));
    }
    return values;
  }

  /**
   * Skips a field based on its wire type.
   */
  skipField(wireType: WireType): void {
    switch (wireType) {
      case WireType.Varint:
        // Consume bytes until one with the high bit clear
        for (let i = 0; ; i++) {
          if (i === Reader.MAX_VARINT_BYTES) {
            throw new DecodeError("Varint overflow: exceeded 10 bytes", "malformed-varint");
          }
          if ((this.readByte() & 0x80) === 0) {
            break;
          }
        }
        break;
      case WireType.Fixed64:
        this.checkAvailable(8);
        this.pos += 8;
        break;
      case WireType.Bytes: {
        const length = this.readVarint();
        this.checkAvailable(length);
        this.pos += length;
        break;
      }
      case WireType.Fixed32:
        this.checkAvailable(4);
        this.pos += 4;
        break;
      case WireType.StartGroup:
      case WireType.EndGroup:
        throw new DecodeError(`Group wire type ${wireType} is not supported`, "unsupported-group");
    }
  }

  /**
   * Creates a sub-reader for reading nested messages.
   */
  subReader(length: number): Reader {
    this.checkAvailable(length);
    const sub = new Reader(this.buffer.subarray(this.pos, this.pos + length));
    this.pos += length;
    return sub;
  }
}

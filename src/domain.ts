import { floatLiteral, floatText, textBytesLiteral, textStringLiteral, tsBigIntLiteral, tsBytesLiteral, tsStringLiteral } from "./format";
import { Reader } from "./reader";
import { Enum, MaxInt32, MaxInt64, MaxUint32, MaxUint64, MinInt32, MinInt64, WireType } from "./types";
import { Writer } from "./writer";

/**
 * Every scalar kind the generator knows. Adding a kind means adding it here
 * and giving it an entry in KIND_TABLE; the table's type enforces the rest.
 */
export const SCALAR_KINDS = [
  "int32",
  "int64",
  "uint32",
  "uint64",
  "sint32",
  "sint64",
  "bool",
  "enum",
  "fixed32",
  "fixed64",
  "sfixed32",
  "sfixed64",
  "float",
  "double",
  "bytes",
  "string",
] as const;

export type ScalarKind = (typeof SCALAR_KINDS)[number];

/**
 * Decoded value type of each kind, after unwrapping.
 */
export interface ScalarValueMap {
  int32: number;
  int64: bigint;
  uint32: number;
  uint64: bigint;
  sint32: number;
  sint64: bigint;
  bool: boolean;
  enum: number;
  fixed32: number;
  fixed64: bigint;
  sfixed32: number;
  sfixed64: bigint;
  float: number;
  double: number;
  bytes: Uint8Array;
  string: string;
}

export type ScalarValue = ScalarValueMap[ScalarKind];

/**
 * Reader methods that take no argument; used to name read operations in
 * emitted code.
 */
export type ReaderMethod = {
  [M in keyof Reader]: Reader[M] extends () => unknown ? M : never;
}[keyof Reader];

/**
 * Writer methods that take exactly one value.
 */
export type WriterMethod = {
  [M in keyof Writer]: Writer[M] extends () => unknown
    ? never
    : Writer[M] extends (value: never) => void
      ? M
      : never;
}[keyof Writer];

export interface KindDescriptor<T extends ScalarValue = ScalarValue> {
  readonly kind: ScalarKind;
  readonly wireType: WireType;
  /** Type of the decoded value in emitted TypeScript. */
  readonly tsType: "number" | "bigint" | "boolean" | "Uint8Array" | "string";
  readonly read: ReaderMethod;
  readonly write: WriterMethod;
  /** Property access stripping the reader's wrapper (zigzag and enum kinds). */
  readonly unwrap?: ".value";
  /** Wrapper the writer expects around the value. */
  readonly wrap?: "Enum";
  /** Payload width of fixed-width kinds. */
  readonly width?: 4 | 8;
  readonly zero: T;
  is(value: unknown): value is T;
  isDefault(value: T): boolean;
  /** Canonical equality: bit patterns for floats, contents for bytes. */
  equals(a: T, b: T): boolean;
  /** Value in the oracle's text grammar. */
  text(value: T): string;
  /** Value as a TypeScript expression. */
  literal(value: T): string;
  /** TypeScript condition that holds when `expr` is not the default value. */
  presentExpr(expr: string): string;
  readValue(reader: Reader): T;
  writeValue(writer: Writer, value: T): void;
}

type KindTable = {
  readonly [K in ScalarKind]: KindDescriptor<ScalarValueMap[K]> & { readonly kind: K };
};

function isInt(min: number, max: number) {
  return (value: unknown): value is number =>
    typeof value === "number" && Number.isInteger(value) && value >= min && value <= max;
}

function isBigInt(min: bigint, max: bigint) {
  return (value: unknown): value is bigint => typeof value === "bigint" && value >= min && value <= max;
}

const scratch = new DataView(new ArrayBuffer(8));

function float32Bits(value: number): number {
  scratch.setFloat32(0, value, true);
  return scratch.getUint32(0, true);
}

function float64Bits(value: number): bigint {
  scratch.setFloat64(0, value, true);
  return scratch.getBigUint64(0, true);
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

interface IntegerKindOptions<K extends ScalarKind> {
  kind: K;
  wireType: WireType;
  read: ReaderMethod;
  write: WriterMethod;
  readValue(reader: Reader): number;
  writeValue(writer: Writer, value: number): void;
  is(value: unknown): value is number;
  unwrap?: ".value";
  wrap?: "Enum";
  width?: 4;
}

function integerKind<K extends ScalarKind>(options: IntegerKindOptions<K>): KindDescriptor<number> & { readonly kind: K } {
  return {
    ...options,
    tsType: "number",
    zero: 0,
    isDefault: (value) => value === 0,
    equals: (a, b) => a === b,
    text: (value) => String(value),
    literal: (value) => String(value),
    presentExpr: (expr) => `${expr} !== 0`,
  };
}

interface BigIntKindOptions<K extends ScalarKind> {
  kind: K;
  wireType: WireType;
  read: ReaderMethod;
  write: WriterMethod;
  readValue(reader: Reader): bigint;
  writeValue(writer: Writer, value: bigint): void;
  is(value: unknown): value is bigint;
  unwrap?: ".value";
  width?: 8;
}

function bigIntKind<K extends ScalarKind>(options: BigIntKindOptions<K>): KindDescriptor<bigint> & { readonly kind: K } {
  return {
    ...options,
    tsType: "bigint",
    zero: 0n,
    isDefault: (value) => value === 0n,
    equals: (a, b) => a === b,
    text: (value) => String(value),
    literal: tsBigIntLiteral,
    presentExpr: (expr) => `${expr} !== 0n`,
  };
}

const isNumber = (value: unknown): value is number => typeof value === "number";

export const KIND_TABLE: KindTable = {
  int32: integerKind({
    kind: "int32",
    wireType: WireType.Varint,
    read: "readInt32",
    write: "writeInt32",
    readValue: (r) => r.readInt32(),
    writeValue: (w, v) => w.writeInt32(v),
    is: isInt(MinInt32, MaxInt32),
  }),
  int64: bigIntKind({
    kind: "int64",
    wireType: WireType.Varint,
    read: "readInt64",
    write: "writeInt64",
    readValue: (r) => r.readInt64(),
    writeValue: (w, v) => w.writeInt64(v),
    is: isBigInt(MinInt64, MaxInt64),
  }),
  uint32: integerKind({
    kind: "uint32",
    wireType: WireType.Varint,
    read: "readUint32",
    write: "writeUint32",
    readValue: (r) => r.readUint32(),
    writeValue: (w, v) => w.writeUint32(v),
    is: isInt(0, MaxUint32),
  }),
  uint64: bigIntKind({
    kind: "uint64",
    wireType: WireType.Varint,
    read: "readUint64",
    write: "writeUint64",
    readValue: (r) => r.readUint64(),
    writeValue: (w, v) => w.writeUint64(v),
    is: isBigInt(0n, MaxUint64),
  }),
  sint32: integerKind({
    kind: "sint32",
    wireType: WireType.Varint,
    read: "readSint32",
    write: "writeSint32",
    unwrap: ".value",
    readValue: (r) => r.readSint32().value,
    writeValue: (w, v) => w.writeSint32(v),
    is: isInt(MinInt32, MaxInt32),
  }),
  sint64: bigIntKind({
    kind: "sint64",
    wireType: WireType.Varint,
    read: "readSint64",
    write: "writeSint64",
    unwrap: ".value",
    readValue: (r) => r.readSint64().value,
    writeValue: (w, v) => w.writeSint64(v),
    is: isBigInt(MinInt64, MaxInt64),
  }),
  bool: {
    kind: "bool",
    wireType: WireType.Varint,
    tsType: "boolean",
    read: "readBool",
    write: "writeBool",
    zero: false,
    is: (value): value is boolean => typeof value === "boolean",
    isDefault: (value) => !value,
    equals: (a, b) => a === b,
    text: (value) => (value ? "true" : "false"),
    literal: (value) => (value ? "true" : "false"),
    presentExpr: (expr) => expr,
    readValue: (r) => r.readBool(),
    writeValue: (w, v) => w.writeBool(v),
  },
  enum: integerKind({
    kind: "enum",
    wireType: WireType.Varint,
    read: "readEnum",
    write: "writeEnum",
    unwrap: ".value",
    wrap: "Enum",
    readValue: (r) => r.readEnum().value,
    writeValue: (w, v) => w.writeEnum(new Enum(v)),
    is: isInt(MinInt32, MaxInt32),
  }),
  fixed32: integerKind({
    kind: "fixed32",
    wireType: WireType.Fixed32,
    read: "readFixed32",
    write: "writeFixed32",
    width: 4,
    readValue: (r) => r.readFixed32(),
    writeValue: (w, v) => w.writeFixed32(v),
    is: isInt(0, MaxUint32),
  }),
  fixed64: bigIntKind({
    kind: "fixed64",
    wireType: WireType.Fixed64,
    read: "readFixed64",
    write: "writeFixed64",
    width: 8,
    readValue: (r) => r.readFixed64(),
    writeValue: (w, v) => w.writeFixed64(v),
    is: isBigInt(0n, MaxUint64),
  }),
  sfixed32: integerKind({
    kind: "sfixed32",
    wireType: WireType.Fixed32,
    read: "readSfixed32",
    write: "writeSfixed32",
    width: 4,
    readValue: (r) => r.readSfixed32(),
    writeValue: (w, v) => w.writeSfixed32(v),
    is: isInt(MinInt32, MaxInt32),
  }),
  sfixed64: bigIntKind({
    kind: "sfixed64",
    wireType: WireType.Fixed64,
    read: "readSfixed64",
    write: "writeSfixed64",
    width: 8,
    readValue: (r) => r.readSfixed64(),
    writeValue: (w, v) => w.writeSfixed64(v),
    is: isBigInt(MinInt64, MaxInt64),
  }),
  float: {
    kind: "float",
    wireType: WireType.Fixed32,
    tsType: "number",
    read: "readFloat",
    write: "writeFloat",
    width: 4,
    zero: 0,
    is: isNumber,
    isDefault: (value) => float32Bits(value) === 0,
    equals: (a, b) => float32Bits(a) === float32Bits(b),
    text: floatText,
    literal: floatLiteral,
    presentExpr: (expr) => `!Object.is(${expr}, 0)`,
    readValue: (r) => r.readFloat(),
    writeValue: (w, v) => w.writeFloat(v),
  },
  double: {
    kind: "double",
    wireType: WireType.Fixed64,
    tsType: "number",
    read: "readDouble",
    write: "writeDouble",
    width: 8,
    zero: 0,
    is: isNumber,
    isDefault: (value) => float64Bits(value) === 0n,
    equals: (a, b) => float64Bits(a) === float64Bits(b),
    text: floatText,
    literal: floatLiteral,
    presentExpr: (expr) => `!Object.is(${expr}, 0)`,
    readValue: (r) => r.readDouble(),
    writeValue: (w, v) => w.writeDouble(v),
  },
  bytes: {
    kind: "bytes",
    wireType: WireType.Bytes,
    tsType: "Uint8Array",
    read: "readLengthPrefixedBytes",
    write: "writeLengthPrefixedBytes",
    zero: new Uint8Array(0),
    is: (value): value is Uint8Array => value instanceof Uint8Array,
    isDefault: (value) => value.length === 0,
    equals: bytesEqual,
    text: textBytesLiteral,
    literal: tsBytesLiteral,
    presentExpr: (expr) => `${expr}.length > 0`,
    readValue: (r) => r.readLengthPrefixedBytes().slice(),
    writeValue: (w, v) => w.writeLengthPrefixedBytes(v),
  },
  string: {
    kind: "string",
    wireType: WireType.Bytes,
    tsType: "string",
    read: "readString",
    write: "writeString",
    zero: "",
    is: (value): value is string => typeof value === "string",
    isDefault: (value) => value === "",
    equals: (a, b) => a === b,
    text: textStringLiteral,
    literal: tsStringLiteral,
    presentExpr: (expr) => `${expr} !== ""`,
    readValue: (r) => r.readString(),
    writeValue: (w, v) => w.writeString(v),
  },
};

/**
 * Look up a kind's descriptor.
 */
export function describeKind(kind: ScalarKind): KindDescriptor {
  return KIND_TABLE[kind];
}

/**
 * Raw IEEE-754 bit pattern of a float value at its kind's width.
 */
export function floatBits(kind: "float", value: number): number;
export function floatBits(kind: "double", value: number): bigint;
export function floatBits(kind: "float" | "double", value: number): number | bigint {
  return kind === "float" ? float32Bits(value) : float64Bits(value);
}

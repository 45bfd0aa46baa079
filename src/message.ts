import type { KindDescriptor, ScalarValue } from "./domain";
import { CorpusError, DecodeError, UnsupportedFieldKindError } from "./errors";
import { Reader } from "./reader";
import { enumNumber, isPackable, scalarDescriptor, scalarKindOf } from "./schema";
import type { FieldSpec, MessageSpec } from "./schema";
import { WireType } from "./types";
import { Writer } from "./writer";

/**
 * A composite case as authored: schema field names mapped to sub-values.
 * `null` marks an absent field; enum fields hold their symbolic name.
 */
export type CaseValue = ScalarValue | null | CaseValue[] | CompositeCase;

export interface CompositeCase {
  [field: string]: CaseValue;
}

/**
 * A message in the comparison domain, keyed by property name. Implicit
 * fields always hold a value, explicit and message fields may be undefined,
 * repeated fields are arrays, enums are numbers.
 */
export type FieldValue = ScalarValue | undefined | FieldValue[] | MessageValue;

export interface MessageValue {
  [property: string]: FieldValue;
}

export function isCompositeCase(value: CaseValue): value is CompositeCase {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

export function isMessageValue(value: FieldValue): value is MessageValue {
  return typeof value === "object" && !Array.isArray(value) && !(value instanceof Uint8Array);
}

function mismatch(owner: MessageSpec, spec: FieldSpec, value: unknown, operation: string): UnsupportedFieldKindError {
  return new UnsupportedFieldKindError(scalarKindOf(spec.type) ?? "message", {
    operation,
    field: `${owner.name}.${spec.name}`,
    details: { value: String(value) },
  });
}

function normalizeElement(owner: MessageSpec, spec: FieldSpec, raw: CaseValue): FieldValue {
  const type = spec.type;
  if (type.kind === "message") {
    if (!isCompositeCase(raw)) {
      throw mismatch(owner, spec, raw, "case.normalize");
    }
    return normalizeCase(type.message, raw);
  }
  if (type.kind === "enum" && typeof raw === "string") {
    const number = enumNumber(type.enumType, raw);
    if (number === undefined) {
      throw new CorpusError(`unknown enum symbol ${raw}`, {
        operation: "case.normalize",
        field: `${owner.name}.${spec.name}`,
      });
    }
    return number;
  }
  if (!scalarDescriptor(type).is(raw)) {
    throw mismatch(owner, spec, raw, "case.normalize");
  }
  return raw;
}

/**
 * Bring an authored case into the comparison domain. Absent implicit fields
 * become the kind's zero value, absent explicit and message fields become
 * undefined, absent repeated fields become empty lists.
 */
export function normalizeCase(spec: MessageSpec, input: CompositeCase): MessageValue {
  const out: MessageValue = {};
  for (const f of spec.fields) {
    const raw = input[f.name] ?? null;
    if (f.cardinality === "repeated") {
      if (raw !== null && !Array.isArray(raw)) {
        throw mismatch(spec, f, raw, "case.normalize");
      }
      out[f.property] = (raw ?? []).map((element) => normalizeElement(spec, f, element));
    } else if (raw === null) {
      out[f.property] = initialValue(f);
    } else {
      out[f.property] = normalizeElement(spec, f, raw);
    }
  }
  return out;
}

function asScalar(owner: MessageSpec, spec: FieldSpec, descriptor: KindDescriptor, value: FieldValue): ScalarValue {
  if (!descriptor.is(value)) {
    throw mismatch(owner, spec, value, "message.encode");
  }
  return value;
}

function asMessage(owner: MessageSpec, spec: FieldSpec, value: FieldValue): MessageValue {
  if (!isMessageValue(value)) {
    throw mismatch(owner, spec, value, "message.encode");
  }
  return value;
}

function writeMessage(writer: Writer, spec: MessageSpec, value: MessageValue): void {
  for (const f of spec.fields) {
    const current = value[f.property];
    const type = f.type;
    const elements = f.cardinality === "repeated" ? current : [current];
    if (!Array.isArray(elements)) {
      throw mismatch(spec, f, current, "message.encode");
    }

    if (type.kind === "message") {
      for (const element of elements) {
        if (element === undefined) {
          continue;
        }
        writer.writeTag(f.number, WireType.Bytes);
        writer.writeLengthPrefixedBytes(encodeMessage(type.message, asMessage(spec, f, element)));
      }
      continue;
    }

    const descriptor = scalarDescriptor(type);
    if (f.cardinality === "repeated" && f.packed) {
      if (elements.length === 0) {
        continue;
      }
      const packed = new Writer();
      for (const element of elements) {
        descriptor.writeValue(packed, asScalar(spec, f, descriptor, element));
      }
      writer.writeTag(f.number, WireType.Bytes);
      writer.writeLengthPrefixedBytes(packed.bytes());
      continue;
    }

    for (const element of elements) {
      if (element === undefined) {
        continue;
      }
      const scalar = asScalar(spec, f, descriptor, element);
      if (f.cardinality === "implicit" && descriptor.isDefault(scalar)) {
        continue;
      }
      writer.writeTag(f.number, descriptor.wireType);
      descriptor.writeValue(writer, scalar);
    }
  }
}

/**
 * Encode a normalized message in ascending field-number order, leaving
 * default implicit fields and empty packed fields off the wire.
 */
export function encodeMessage(spec: MessageSpec, value: MessageValue): Uint8Array {
  const writer = new Writer();
  writeMessage(writer, spec, value);
  return writer.bytes();
}

function initialValue(spec: FieldSpec): FieldValue {
  if (spec.cardinality === "repeated") {
    return [];
  }
  if (spec.cardinality === "implicit" && spec.type.kind !== "message") {
    return scalarDescriptor(spec.type).zero;
  }
  return undefined;
}

function expectWireType(owner: MessageSpec, spec: FieldSpec, actual: WireType, expected: WireType): void {
  if (actual !== expected) {
    throw new DecodeError(`${owner.name}.${spec.name}: wire type ${actual}, expected ${expected}`, "invalid-tag");
  }
}

/**
 * Read one occurrence of a field. Packed runs yield several elements.
 */
function readOccurrence(reader: Reader, owner: MessageSpec, spec: FieldSpec, wireType: WireType): FieldValue[] {
  const type = spec.type;
  if (type.kind === "message") {
    expectWireType(owner, spec, wireType, WireType.Bytes);
    return [readMessage(reader.subReader(reader.readVarint()), type.message)];
  }
  const descriptor = scalarDescriptor(type);
  if (spec.cardinality === "repeated" && isPackable(type) && wireType === WireType.Bytes) {
    return reader.readPacked((sub) => descriptor.readValue(sub));
  }
  expectWireType(owner, spec, wireType, descriptor.wireType);
  return [descriptor.readValue(reader)];
}

function readMessage(reader: Reader, spec: MessageSpec): MessageValue {
  const out: MessageValue = {};
  for (const f of spec.fields) {
    out[f.property] = initialValue(f);
  }

  while (reader.hasMore) {
    const tag = reader.readTag();
    const f = spec.fields.find((candidate) => candidate.number === tag.fieldNumber);
    if (f === undefined) {
      reader.skipField(tag.wireType);
      continue;
    }
    const occurrence = readOccurrence(reader, spec, f, tag.wireType);
    const list = out[f.property];
    if (f.cardinality === "repeated" && Array.isArray(list)) {
      list.push(...occurrence);
    } else {
      out[f.property] = occurrence[occurrence.length - 1];
    }
  }
  return out;
}

/**
 * Decode wire bytes into a message value. Singular fields keep their last
 * occurrence, repeated fields accept packed and unpacked runs, unknown
 * field numbers are skipped.
 */
export function decodeMessage(spec: MessageSpec, bytes: Uint8Array): MessageValue {
  return readMessage(new Reader(bytes), spec);
}

function elementEquals(spec: FieldSpec, a: FieldValue, b: FieldValue): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  const type = spec.type;
  if (type.kind === "message") {
    return isMessageValue(a) && isMessageValue(b) && messagesEqual(type.message, a, b);
  }
  const descriptor = scalarDescriptor(type);
  return descriptor.is(a) && descriptor.is(b) && descriptor.equals(a, b);
}

/**
 * Field-by-field equality under each kind's canonical equality rule.
 */
export function messagesEqual(spec: MessageSpec, a: MessageValue, b: MessageValue): boolean {
  return spec.fields.every((f) => {
    const left = a[f.property];
    const right = b[f.property];
    if (f.cardinality === "repeated") {
      return (
        Array.isArray(left) &&
        Array.isArray(right) &&
        left.length === right.length &&
        left.every((element, i) => elementEquals(f, element, right[i]))
      );
    }
    return elementEquals(f, left, right);
  });
}

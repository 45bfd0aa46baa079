import type { CompositeInput } from "./corpus/composite";
import type { ScalarInput } from "./corpus/scalars";
import { describeKind, floatBits } from "./domain";
import type { ScalarValue } from "./domain";
import { DecodeError, MalformedOracleOutputError, NonCanonicalEncodingError } from "./errors";
import { toHex } from "./format";
import { decodeMessage, encodeMessage, messagesEqual, normalizeCase } from "./message";
import type { MessageValue } from "./message";
import { Reader } from "./reader";
import type { MessageSpec } from "./schema";

/**
 * A simple-tier fixture: the oracle's bytes and the value they decode to.
 * Float kinds carry the payload's raw bit pattern, which is what emitted
 * tests compare.
 */
export interface ScalarFixture {
  label: string;
  bytes: Uint8Array;
  expected: ScalarValue;
  bits?: number | bigint;
}

export interface MessageFixture {
  label: string;
  bytes: Uint8Array;
  expected: MessageValue;
}

function payloadView(bytes: Uint8Array, width: 4 | 8, label: string): DataView {
  // One tag byte, then the little-endian payload
  if (bytes.length < width + 1) {
    throw new MalformedOracleOutputError(`expected at least ${width + 1} bytes, got ${bytes.length}`, {
      operation: "canonical.float",
      field: label,
      details: { hex: toHex(bytes) },
    });
  }
  return new DataView(bytes.buffer, bytes.byteOffset + 1, width);
}

/**
 * Bit pattern of a single-field float blob.
 */
export function floatBitsFromEncoded(bytes: Uint8Array, label = "float"): number {
  return payloadView(bytes, 4, label).getUint32(0, true);
}

/**
 * Bit pattern of a single-field double blob.
 */
export function doubleBitsFromEncoded(bytes: Uint8Array, label = "double"): bigint {
  return payloadView(bytes, 8, label).getBigUint64(0, true);
}

function decodeFailure(err: unknown, operation: string, label: string, bytes: Uint8Array): never {
  if (err instanceof DecodeError) {
    throw new MalformedOracleOutputError(`oracle output does not decode: ${err.message}`, {
      operation,
      field: label,
      details: { reason: err.reason, hex: toHex(bytes) },
    });
  }
  throw err;
}

function readScalar(input: ScalarInput, bytes: Uint8Array): ScalarValue {
  const descriptor = describeKind(input.kind);
  const reader = new Reader(bytes);
  const tag = reader.readTag();
  if (tag.fieldNumber !== 1 || tag.wireType !== descriptor.wireType) {
    throw new MalformedOracleOutputError(
      `expected field 1 with wire type ${descriptor.wireType}, got field ${tag.fieldNumber} with wire type ${tag.wireType}`,
      { operation: "canonical.scalar", field: input.label, details: { hex: toHex(bytes) } }
    );
  }
  const value = descriptor.readValue(reader);
  if (reader.hasMore) {
    throw new MalformedOracleOutputError(`${reader.remaining} trailing bytes`, {
      operation: "canonical.scalar",
      field: input.label,
      details: { hex: toHex(bytes) },
    });
  }
  return value;
}

/**
 * Decode the oracle's single-field blob and check that it carries the
 * intended value. Floats are checked by bit pattern; any NaN payload
 * matches a NaN input.
 */
export function canonicalizeScalar(input: ScalarInput, bytes: Uint8Array): ScalarFixture {
  const descriptor = describeKind(input.kind);
  let decoded: ScalarValue;
  try {
    decoded = readScalar(input, bytes);
  } catch (err) {
    return decodeFailure(err, "canonical.scalar", input.label, bytes);
  }

  let bits: number | bigint | undefined;
  let agrees = descriptor.equals(decoded, input.value);
  if (input.kind === "float" || input.kind === "double") {
    bits = input.kind === "float" ? floatBitsFromEncoded(bytes, input.label) : doubleBitsFromEncoded(bytes, input.label);
    const intended = typeof input.value === "number" ? input.value : Number.NaN;
    const expectedBits = input.kind === "float" ? floatBits("float", intended) : floatBits("double", intended);
    agrees = Number.isNaN(intended) ? typeof decoded === "number" && Number.isNaN(decoded) : bits === expectedBits;
  }
  if (!agrees) {
    throw new MalformedOracleOutputError(`oracle encoded ${descriptor.text(decoded)}, intended ${input.text}`, {
      operation: "canonical.scalar",
      field: input.label,
      details: { hex: toHex(bytes) },
    });
  }
  return { label: input.label, bytes, expected: decoded, bits };
}

/**
 * Check that the oracle's bytes decode to the normalized case and that
 * re-encoding the case in canonical order reproduces them exactly.
 */
export function canonicalizeMessage(spec: MessageSpec, input: CompositeInput, bytes: Uint8Array): MessageFixture {
  const normalized = normalizeCase(spec, input.value);
  let decoded: MessageValue;
  try {
    decoded = decodeMessage(spec, bytes);
  } catch (err) {
    return decodeFailure(err, "canonical.message", input.label, bytes);
  }
  if (!messagesEqual(spec, decoded, normalized)) {
    throw new MalformedOracleOutputError("decoded message differs from the case", {
      operation: "canonical.message",
      field: input.label,
      details: { hex: toHex(bytes) },
    });
  }

  const reencoded = encodeMessage(spec, normalized);
  if (toHex(reencoded) !== toHex(bytes)) {
    throw new NonCanonicalEncodingError("re-encoding does not reproduce the oracle bytes", {
      operation: "canonical.message",
      field: input.label,
      details: { oracle: toHex(bytes), reencoded: toHex(reencoded) },
    });
  }
  return { label: input.label, bytes, expected: decoded };
}

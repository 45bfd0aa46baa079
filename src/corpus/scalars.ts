import { z } from "zod";
import { SCALAR_KINDS, describeKind } from "../domain";
import type { ScalarKind, ScalarValue } from "../domain";
import { MaxInt32, MaxInt64, MaxUint32, MaxUint64, MinInt32, MinInt64 } from "../types";
import { simpleMessage } from "../messages";
import { enumNumber } from "../schema";
import type { MessageSpec } from "../schema";
import { kindValueSchema, parseData, readDataFile } from "./pools";

/**
 * One value of the simple tier, with the text the oracle receives for it.
 */
export interface ScalarInput {
  kind: ScalarKind;
  label: string;
  value: ScalarValue;
  text: string;
}

export interface ScalarCorpus {
  kind: ScalarKind;
  message: MessageSpec;
  inputs: ScalarInput[];
}

export const SCALAR_VALUES_FILE = "scalar-values.json";

/**
 * Authored values of one kind: numbers, decimal strings, hex or enum symbols
 * depending on the kind.
 */
interface AuthoredValue {
  value: ScalarValue;
  text: string;
}

function authoredSchema(kind: ScalarKind, message: MessageSpec) {
  const type = message.fields[0].type;
  if (type.kind === "enum") {
    const enumType = type.enumType;
    return z.array(
      z.string().transform((symbol, ctx): AuthoredValue => {
        const number = enumNumber(enumType, symbol);
        if (number === undefined) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown ${enumType.name} symbol ${symbol}` });
          return z.NEVER;
        }
        return { value: number, text: symbol };
      })
    );
  }
  const descriptor = describeKind(kind);
  return z.array(kindValueSchema(kind).transform((value): AuthoredValue => ({ value, text: descriptor.text(value) })));
}

function powers(base: bigint, limit: bigint): bigint[] {
  const out: bigint[] = [];
  for (let p = base; p <= limit; p *= base) {
    out.push(p);
  }
  return out;
}

const VARINT_STEP = 128n;

/**
 * Values at which the varint encoding gains a byte: `2^(7k)-1` and `2^(7k)`.
 */
function varintThresholds(max: bigint): bigint[] {
  return powers(VARINT_STEP, max + 1n).flatMap((p) => (p <= max ? [p - 1n, p] : [p - 1n]));
}

/**
 * Signed values at which the zigzag encoding gains a byte, on both sides.
 */
function zigzagThresholds(max: bigint): bigint[] {
  return powers(VARINT_STEP, 2n * max + 2n).flatMap((p) => {
    const half = p / 2n;
    return [half - 1n, half, -half, -half - 1n].filter((n) => n <= max && n >= -max - 1n);
  });
}

/**
 * Boundary values of a kind, appended after the authored ones.
 */
export function boundaryValues(kind: ScalarKind): ScalarValue[] {
  const small = (values: bigint[]): number[] => values.map(Number);
  switch (kind) {
    case "int32":
      return [...small(varintThresholds(BigInt(MaxInt32))), MinInt32, MaxInt32];
    case "int64":
      return [...varintThresholds(MaxInt64), MinInt64, MaxInt64];
    case "uint32":
      return [...small(varintThresholds(BigInt(MaxUint32))), 0, MaxUint32];
    case "uint64":
      return [...varintThresholds(MaxUint64), 0n, MaxUint64];
    case "sint32":
      return [...small(zigzagThresholds(BigInt(MaxInt32))), MinInt32, MaxInt32];
    case "sint64":
      return [...zigzagThresholds(MaxInt64), MinInt64, MaxInt64];
    case "fixed32":
      return [0, MaxUint32];
    case "sfixed32":
      return [MinInt32, MaxInt32];
    case "fixed64":
      return [0n, MaxUint64];
    case "sfixed64":
      return [MinInt64, MaxInt64];
    case "float":
    case "double":
      return [Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY];
    case "bool":
    case "enum":
    case "bytes":
    case "string":
      return [];
  }
}

/**
 * Build the scalar corpus of every kind: authored values in file order,
 * then boundary values not already present.
 */
export function buildScalarCorpus(data: unknown = readDataFile(SCALAR_VALUES_FILE)): ScalarCorpus[] {
  const shape: Record<string, z.ZodType<AuthoredValue[], z.ZodTypeDef, unknown>> = {};
  for (const kind of SCALAR_KINDS) {
    shape[kind] = authoredSchema(kind, simpleMessage(kind));
  }
  const authored = parseData(z.object(shape).strict(), data, SCALAR_VALUES_FILE);

  return SCALAR_KINDS.map((kind) => {
    const message = simpleMessage(kind);
    const descriptor = describeKind(kind);
    const entries: AuthoredValue[] = [...(authored[kind] ?? [])];
    for (const value of boundaryValues(kind)) {
      if (!entries.some((entry) => descriptor.equals(entry.value, value))) {
        entries.push({ value, text: descriptor.text(value) });
      }
    }
    return {
      kind,
      message,
      inputs: entries.map((entry, i) => ({ kind, label: `${kind}[${i}]`, ...entry })),
    };
  });
}

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { describeKind } from "../domain";
import type { ScalarKind, ScalarValue } from "../domain";
import { CorpusError } from "../errors";
import { fromHex, parseFloatToken } from "../format";
import type { CaseValue, CompositeCase } from "../message";
import type { FieldSpec, MessageSpec, ScalarFieldType } from "../schema";

/**
 * Directory holding the curated value files. Resolves the same from src/
 * and from the compiled dist/.
 */
export const DATA_DIR = path.resolve(__dirname, "..", "..", "data");

type ValueSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const decimalString = z.string().regex(/^-?\d+$/, "expected a decimal integer string");

const hexString = z.string().regex(/^(?:[0-9a-f]{2})*$/, "expected lowercase hex with an even number of digits");

const floatSchema: ValueSchema<number> = z.union([
  z.number(),
  z
    .string()
    .refine((token) => token === "nan" || token === "inf" || token === "-inf" || Number.isFinite(Number(token)), {
      message: "expected a decimal float or one of nan, inf, -inf",
    })
    .transform(parseFloatToken),
]);

/**
 * Schema of one value of a kind as written in the data files, with the
 * kind's range check applied after conversion.
 */
export function kindValueSchema(kind: ScalarKind): ValueSchema<ScalarValue> {
  const descriptor = describeKind(kind);
  const inRange = (value: ScalarValue): boolean => descriptor.is(value);
  const rangeMessage = { message: `value out of range for ${kind}` };
  switch (kind) {
    case "int32":
    case "uint32":
    case "sint32":
    case "fixed32":
    case "sfixed32":
    case "enum":
      return z.number().int().refine(inRange, rangeMessage);
    case "int64":
    case "uint64":
    case "sint64":
    case "fixed64":
    case "sfixed64":
      return decimalString.transform((text) => BigInt(text)).refine(inRange, rangeMessage);
    case "bool":
      return z.boolean();
    case "float":
      return floatSchema.transform((value) => Math.fround(value));
    case "double":
      return floatSchema;
    case "bytes":
      return hexString.transform(fromHex);
    case "string":
      return z.string();
  }
}

function scalarFieldSchema(type: ScalarFieldType): ValueSchema<CaseValue> {
  if (type.kind === "enum") {
    const symbols = type.enumType.values.map(([symbol]) => symbol);
    return z.string().refine((symbol) => symbols.includes(symbol), {
      message: `expected one of ${symbols.join(", ")}`,
    });
  }
  return kindValueSchema(type.scalar);
}

function elementSchema(spec: FieldSpec): ValueSchema<CaseValue> {
  const type = spec.type;
  return type.kind === "message" ? compositeCaseSchema(type.message) : scalarFieldSchema(type);
}

/**
 * Schema of one sub-value of a field: a list for repeated fields, a single
 * element otherwise. `null` marks the field absent.
 */
export function fieldValueSchema(spec: FieldSpec): ValueSchema<CaseValue> {
  const element = elementSchema(spec);
  const value: ValueSchema<CaseValue> = spec.cardinality === "repeated" ? z.array(element) : element;
  return value.nullable();
}

/**
 * Schema of an authored case of a message type. Unknown keys are rejected,
 * missing keys read as absent.
 */
export function compositeCaseSchema(spec: MessageSpec): ValueSchema<CompositeCase> {
  const shape: Record<string, ValueSchema<CaseValue | undefined>> = {};
  for (const f of spec.fields) {
    shape[f.name] = fieldValueSchema(f).optional();
  }
  return z
    .object(shape)
    .strict()
    .transform((raw) => {
      const out: CompositeCase = {};
      for (const f of spec.fields) {
        out[f.name] = raw[f.name] ?? null;
      }
      return out;
    });
}

/**
 * Read and parse a JSON file from the data directory.
 */
export function readDataFile(file: string, dataDir: string = DATA_DIR): unknown {
  const filePath = path.join(dataDir, file);
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new CorpusError(`cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`, {
      operation: "corpus.load",
      field: file,
    });
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new CorpusError(`invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`, {
      operation: "corpus.load",
      field: file,
    });
  }
}

/**
 * Validate data against a schema, reporting every issue with its path.
 */
export function parseData<T>(schema: ValueSchema<T>, data: unknown, source: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new CorpusError(`${source} failed validation`, {
      operation: "corpus.load",
      field: source,
      details: { issues },
    });
  }
  return result.data;
}

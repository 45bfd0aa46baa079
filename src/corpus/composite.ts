import { z } from "zod";
import { CorpusError } from "../errors";
import { normalizeCase } from "../message";
import type { CaseValue, CompositeCase, MessageValue } from "../message";
import { DIFFICULT, MIDDLE } from "../messages";
import { scalarDescriptor } from "../schema";
import type { MessageSpec } from "../schema";
import { compositeCaseSchema, fieldValueSchema, parseData, readDataFile } from "./pools";

export type CompositeTier = "middle" | "difficult";

/**
 * Where a composite tier's cases come from. A selector names a pool and its
 * multiplier: synthetic case `i` takes `pool[(i * multiplier) % pool.length]`.
 * A pool is named after a field, or after a oneof group whose members it
 * sets together.
 */
export interface CompositeCorpusDefinition {
  tier: CompositeTier;
  message: MessageSpec;
  file: string;
  selectors: ReadonlyArray<readonly [pool: string, multiplier: number]>;
  total: number;
}

export const MIDDLE_CORPUS: CompositeCorpusDefinition = {
  tier: "middle",
  message: MIDDLE,
  file: "middle-corpus.json",
  selectors: [
    ["id", 1],
    ["values", 3],
    ["packed_values", 5],
    ["label", 7],
    ["data", 11],
    ["nested", 13],
    ["status", 17],
    ["tags", 19],
  ],
  total: 80,
};

export const DIFFICULT_CORPUS: CompositeCorpusDefinition = {
  tier: "difficult",
  message: DIFFICULT,
  file: "difficult-corpus.json",
  selectors: [
    ["big", 1],
    ["zigzag", 3],
    ["ratio", 5],
    ["scores", 7],
    ["items", 11],
    ["counts", 13],
    ["choice", 17],
    ["payload", 19],
  ],
  total: 70,
};

export interface CompositeInput {
  label: string;
  value: CompositeCase;
}

export interface CompositeCorpus {
  tier: CompositeTier;
  message: MessageSpec;
  cases: CompositeInput[];
}

type Pool = CompositeCase[];

/**
 * Schema of one pool. Entries are parsed into partial cases so that field
 * pools and oneof pools combine the same way.
 */
function poolSchema(message: MessageSpec, pool: string): z.ZodType<Pool, z.ZodTypeDef, unknown> {
  const target = message.fields.find((f) => f.name === pool);
  if (target !== undefined) {
    return z.array(fieldValueSchema(target).transform((value): CompositeCase => ({ [pool]: value })));
  }
  const members = message.fields.filter((f) => f.oneof === pool);
  if (members.length === 0) {
    throw new CorpusError(`pool ${pool} names neither a field nor a oneof group`, {
      operation: "corpus.define",
      field: message.name,
    });
  }
  const shape: Record<string, z.ZodType<CaseValue | undefined, z.ZodTypeDef, unknown>> = {};
  for (const f of members) {
    shape[f.name] = fieldValueSchema(f).optional();
  }
  return z.array(
    z
      .object(shape)
      .strict()
      .transform((entry) => {
        const out: CompositeCase = {};
        for (const f of members) {
          out[f.name] = entry[f.name] ?? null;
        }
        return out;
      })
  );
}

/**
 * Synthetic case `index`: each selector contributes its pool entry at
 * `(index * multiplier) % length`.
 */
export function selectSynthetic(
  selectors: CompositeCorpusDefinition["selectors"],
  pools: Record<string, Pool>,
  index: number
): CompositeCase {
  const out: CompositeCase = {};
  for (const [name, multiplier] of selectors) {
    const pool = pools[name];
    if (pool === undefined || pool.length === 0) {
      throw new CorpusError(`pool ${name} is empty`, { operation: "corpus.synthesize", field: name });
    }
    Object.assign(out, pool[(index * multiplier) % pool.length]);
  }
  return out;
}

/**
 * Whether a normalized case puts nothing on the wire: every repeated field
 * empty, every optional field unset, every implicit field zero.
 */
export function isAllDefault(message: MessageSpec, value: MessageValue): boolean {
  return message.fields.every((f) => {
    const current = value[f.property];
    if (f.cardinality === "repeated") {
      return Array.isArray(current) && current.length === 0;
    }
    if (current === undefined) {
      return true;
    }
    if (f.cardinality === "explicit" || f.type.kind === "message") {
      return false;
    }
    const descriptor = scalarDescriptor(f.type);
    return descriptor.is(current) && descriptor.isDefault(current);
  });
}

/**
 * Seeds in file order followed by the synthetic cases. Fails when no case
 * is all-default.
 */
export function buildCompositeCorpus(
  definition: CompositeCorpusDefinition,
  data: unknown = readDataFile(definition.file)
): CompositeCorpus {
  const { message, selectors } = definition;
  const poolShape: Record<string, z.ZodType<Pool, z.ZodTypeDef, unknown>> = {};
  for (const [name] of selectors) {
    poolShape[name] = poolSchema(message, name);
  }
  const schema = z
    .object({
      seeds: z.array(compositeCaseSchema(message)),
      pools: z.object(poolShape).strict(),
    })
    .strict();
  const parsed = parseData(schema, data, definition.file);

  const cases: CompositeInput[] = parsed.seeds.map((value, i) => ({ label: `seed[${i}]`, value }));
  for (let i = 0; i < definition.total; i++) {
    cases.push({ label: `synthetic[${i}]`, value: selectSynthetic(selectors, parsed.pools, i) });
  }

  if (!cases.some((c) => isAllDefault(message, normalizeCase(message, c.value)))) {
    throw new CorpusError("corpus has no all-default case", {
      operation: "corpus.build",
      field: definition.tier,
    });
  }
  return { tier: definition.tier, message, cases };
}

import path from "node:path";
import { z } from "zod";
import { TIERS } from "./emit/artifact";
import type { Tier } from "./emit/artifact";
import { ConfigError } from "./errors";

/**
 * Generator configuration. Every key can be set on the command line; most
 * also read an environment variable.
 *
 * | Key          | Env                    | Default        |
 * | ------------ | ---------------------- | -------------- |
 * | protoc       | WIREVEC_PROTOC         | `protoc`       |
 * | schemaDir    | WIREVEC_SCHEMA_DIR     | `proto`        |
 * | includeDirs  | WIREVEC_INCLUDE_DIRS   | none           |
 * | outDir       | WIREVEC_OUT_DIR        | `tests/golden` |
 * | codecModule  | WIREVEC_CODEC_MODULE   | `../../src`    |
 * | logLevel     | LOG_LEVEL              | `info`         |
 */
export interface GeneratorConfig {
  /** Reference encoder executable */
  protoc: string;
  /** Directory holding the schema files */
  schemaDir: string;
  /** Extra import directories handed to protoc */
  includeDirs: string[];
  /** Directory the artifacts are written to */
  outDir: string;
  /** Module specifier emitted artifacts import the codec under test from */
  codecModule: string;
  tiers: Tier[];
  /** Compare with the files on disk instead of writing */
  check: boolean;
  logLevel: string;
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const configSchema = z.object({
  protoc: z.string().min(1).default("protoc"),
  schemaDir: z.string().min(1).default("proto"),
  includeDirs: z.array(z.string().min(1)).default([]),
  outDir: z.string().min(1).default(path.join("tests", "golden")),
  codecModule: z.string().min(1).default("../../src"),
  tiers: z
    .array(z.enum(TIERS))
    .min(1)
    .default([...TIERS]),
  check: z.boolean().default(false),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type ConfigOverrides = Partial<GeneratorConfig>;

function splitPathList(value: string | undefined): string[] | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  return value.split(path.delimiter).filter((dir) => dir.length > 0);
}

/**
 * Resolve the configuration: overrides first, then environment variables,
 * then defaults.
 * @throws ConfigError listing every validation issue
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): GeneratorConfig {
  const merged = {
    protoc: overrides.protoc ?? env.WIREVEC_PROTOC,
    schemaDir: overrides.schemaDir ?? env.WIREVEC_SCHEMA_DIR,
    includeDirs: overrides.includeDirs ?? splitPathList(env.WIREVEC_INCLUDE_DIRS),
    outDir: overrides.outDir ?? env.WIREVEC_OUT_DIR,
    codecModule: overrides.codecModule ?? env.WIREVEC_CODEC_MODULE,
    tiers: overrides.tiers,
    check: overrides.check,
    logLevel: overrides.logLevel ?? env.LOG_LEVEL,
  };

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  return {
    ...result.data,
    // Each tier once, in pipeline order
    tiers: TIERS.filter((tier) => result.data.tiers.includes(tier)),
  };
}

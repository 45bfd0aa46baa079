import chalk from "chalk";
import type { Command } from "commander";
import { loadConfig } from "../config";
import type { ConfigOverrides } from "../config";
import { isTier } from "../emit/artifact";
import { ConfigError, GeneratorError } from "../errors";
import { generate } from "../pipeline";
import type { TierResult } from "../pipeline";
import type { CommandDeps } from "./deps";

interface GenerateOptions {
  protoc?: string;
  schemaDir?: string;
  include?: string[];
  out?: string;
  codecModule?: string;
  tier?: string[];
  check?: boolean;
  logLevel?: string;
}

function toOverrides(options: GenerateOptions): ConfigOverrides {
  const tiers = options.tier?.map((tier) => {
    if (!isTier(tier)) {
      throw new ConfigError([`tiers: unknown tier ${tier}`]);
    }
    return tier;
  });
  return {
    protoc: options.protoc,
    schemaDir: options.schemaDir,
    includeDirs: options.include,
    outDir: options.out,
    codecModule: options.codecModule,
    tiers,
    check: options.check,
    logLevel: options.logLevel,
  };
}

function formatResult(result: TierResult): string {
  const status =
    result.status === "written" || result.status === "fresh"
      ? chalk.green(result.status)
      : chalk.yellow(result.status);
  return `${status} ${result.tier.padEnd(9)} ${chalk.gray(`${result.cases} cases`)} ${result.path}`;
}

/**
 * Register the 'generate' command: run the pipeline for the selected tiers.
 *
 * @example
 * ```bash
 * wirevec generate
 * wirevec generate --tier simple middle --out tests/golden
 * wirevec generate --check
 * ```
 */
export function registerGenerateCommand(program: Command, deps: CommandDeps): void {
  program
    .command("generate")
    .description("Encode the corpus through protoc and write the golden test files")
    .option("--protoc <path>", "reference encoder executable")
    .option("--schema-dir <dir>", "directory holding the schema files")
    .option("--include <dir...>", "extra protoc import directories")
    .option("--out <dir>", "output directory for the artifacts")
    .option("--codec-module <specifier>", "module the artifacts import the codec from")
    .option("--tier <tier...>", "tiers to generate: simple, middle, difficult, malformed")
    .option("--check", "compare with the files on disk instead of writing")
    .option("--log-level <level>", "pino log level")
    .action((options: GenerateOptions) => {
      const config = loadConfig(toOverrides(options), deps.env);
      const logger = deps.createLogger(config.logLevel);
      try {
        const results = generate(config, deps.createOracle(config, logger), logger);
        for (const result of results) {
          deps.print(formatResult(result));
        }
      } catch (err) {
        if (err instanceof GeneratorError) {
          logger.error(
            { code: err.code, operation: err.operation, field: err.field, details: err.details },
            err.message
          );
        }
        throw err;
      }
    });
}

import type { GeneratorConfig } from "../config";
import { createLogger } from "../logger";
import type { Logger } from "../logger";
import { ProtocOracle } from "../oracle";
import type { Oracle } from "../oracle";

/**
 * What the commands reach outside the pipeline for.
 */
export interface CommandDeps {
  env: NodeJS.ProcessEnv;
  createLogger(level: string): Logger;
  createOracle(config: GeneratorConfig, logger: Logger): Oracle;
  print(line: string): void;
}

export const defaultDeps: CommandDeps = {
  env: process.env,
  createLogger: (level) => createLogger(level),
  createOracle: (config, logger) =>
    new ProtocOracle({
      protoc: config.protoc,
      schemaDir: config.schemaDir,
      includeDirs: config.includeDirs,
      logger,
    }),
  print: (line) => console.log(line),
};

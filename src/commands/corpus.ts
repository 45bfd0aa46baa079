import chalk from "chalk";
import type { Command } from "commander";
import { isTier } from "../emit/artifact";
import { ConfigError } from "../errors";
import { renderCorpusText } from "../pipeline";
import type { CommandDeps } from "./deps";

/**
 * Register the 'corpus' command: print every case of a tier with the text
 * the oracle would receive, without running the oracle.
 */
export function registerCorpusCommand(program: Command, deps: CommandDeps): void {
  program
    .command("corpus <tier>")
    .description("Print the oracle text of every case of a tier")
    .action((tier: string) => {
      if (!isTier(tier)) {
        throw new ConfigError([`tier: unknown tier ${tier}`]);
      }
      for (const entry of renderCorpusText(tier)) {
        deps.print(chalk.cyan(`# ${entry.label}`));
        deps.print(entry.text.trimEnd());
      }
    });
}

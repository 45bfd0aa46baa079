#!/usr/bin/env node
import chalk from "chalk";
import { GeneratorError } from "./errors";
import { createProgram } from "./program";

async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error(chalk.red("Fatal error:"), error instanceof Error ? error.message : String(error));
  if (error instanceof GeneratorError) {
    console.error(chalk.gray(`  code: ${error.code}`));
  }
  process.exit(1);
});

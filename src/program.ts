import { Command } from "commander";
import { registerCorpusCommand, registerGenerateCommand, defaultDeps } from "./commands";
import type { CommandDeps } from "./commands";
import { VERSION } from "./index";

export function createProgram(deps: CommandDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name("wirevec")
    .description("Golden test vectors for the protobuf wire format, checked against protoc")
    .version(VERSION);

  registerGenerateCommand(program, deps);
  registerCorpusCommand(program, deps);

  return program;
}

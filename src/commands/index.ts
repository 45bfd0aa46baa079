export { registerGenerateCommand } from "./generate";
export { registerCorpusCommand } from "./corpus";
export { defaultDeps } from "./deps";
export type { CommandDeps } from "./deps";

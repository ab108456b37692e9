export {
  consoleOutput,
  describeScene,
  runDump,
  runTokens,
  type DumpOptions,
  type Output,
  type TokensOptions,
} from "./commands.js";
export { run } from "./program.js";

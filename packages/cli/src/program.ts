import { Command, CommanderError } from "commander";
import { consoleOutput, runDump, runTokens, type Output } from "./commands.js";

interface DumpFlags {
  json?: boolean;
  logLevel?: string;
}

interface TokensFlags {
  comments: boolean;
}

/**
 * Run the CLI on `argv` (without the node and script entries) and resolve
 * to the process exit code.
 */
export async function run(argv: string[], output: Output = consoleOutput): Promise<number> {
  let exitCode = 0;

  const program = new Command();
  program
    .name("pbrtkit")
    .description("Inspect pbrt-v4 scene files")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.out(text.trimEnd()),
      writeErr: (text) => output.err(text.trimEnd()),
    });

  program
    .command("dump")
    .description("Load a scene and print a summary")
    .argument("<file>", "scene file")
    .option("--json", "print the whole scene as JSON")
    .option("--log-level <level>", "debug, info, warn, error or silent")
    .action((file: string, flags: DumpFlags) => {
      exitCode = runDump(file, flags, output);
    });

  program
    .command("tokens")
    .description("Print the token stream of a scene file")
    .argument("<file>", "scene file")
    .option("--no-comments", "drop comment tokens")
    .action((file: string, flags: TokensFlags) => {
      exitCode = runTokens(file, { skipComments: !flags.comments }, output);
    });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}

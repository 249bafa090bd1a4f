import { buildCli } from "./cli/index.js";
import { printErrorReport } from "./core/error-format.js";

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    // Parsing may be what failed, so the flag is read from argv directly.
    const debug = argv.includes("--debug");
    printErrorReport(err, { mode: debug ? "debug" : "short" });
    process.exitCode = 1;
  }
}

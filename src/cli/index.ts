import { Command } from "commander";

import { registerConfigureCommand } from "./configure.js";
import { registerListCommand } from "./list.js";
import { registerValidateCommand } from "./validate.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("strata")
    .description("Multi-axis build configuration for product source trees")
    .option("--debug", "Show error codes, causes and stack traces", false);

  registerConfigureCommand(program);
  registerListCommand(program);
  registerValidateCommand(program);

  return program;
}

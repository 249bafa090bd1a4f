import { Command } from "commander";

import { listBuildUnits } from "../core/units.js";

import { loadConfigForCli } from "./config.js";

export function registerValidateCommand(program: Command): void {
  program
    .command("validate")
    .description("Validate a project descriptor without writing anything")
    .argument("[conf]", "Project descriptor (default: nearest strata.yaml)")
    .action((conf: string | undefined) => {
      for (const line of validateCommand(conf)) console.log(line);
    });
}

export function validateCommand(
  explicitConfigPath?: string,
  io: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): string[] {
  const { config, configPath } = loadConfigForCli({ explicitConfigPath, ...io });
  const units = listBuildUnits(config);

  return [
    `${configPath}: OK`,
    `  versions: ${Object.keys(config.versions).length}`,
    `  products: ${Object.keys(config.products).length} (${units.length} build units)`,
    `  modes: ${Object.keys(config.modes).length}`,
    `  sites: ${Object.keys(config.sites).length}`,
  ];
}

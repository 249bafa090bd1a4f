import path from "node:path";

import { Command } from "commander";

import { resolveDescriptorPath } from "../core/config-discovery.js";
import { configure, type ConfigureResult } from "../core/configure.js";
import { DEFAULT_VERSION } from "../core/descriptor/schema.js";
import { JsonlLogger } from "../core/logger.js";

import { resolveLogPath } from "./config.js";

type ConfigureCommandOptions = {
  conf?: string;
  init: boolean;
  env?: string;
  product: string[];
  mode?: string;
  site?: string;
  version?: string;
  buildDir?: string;
  write: boolean;
  config: boolean;
  fetch: boolean;
  quiet: boolean;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerConfigureCommand(program: Command): void {
  program
    .command("configure")
    .description("Resolve the build selection and write the build configuration")
    .option("--conf <path>", "Project descriptor (default: nearest strata.yaml)")
    .option("--init", "Initialize a new build environment", false)
    .option("--env <file>", "Write the environment script to this file")
    .option("--product <names>", "Select build product(s); repeatable", collectValues, [])
    .option("--mode <name>", "Select the build mode")
    .option("--site <name>", "Select the build site")
    .option("--version <name>", `Select the version ("${DEFAULT_VERSION}" follows the products)`)
    .option("--build-dir <path>", "Build directory (fixed once initialized)")
    .option("--write", "Rewrite configuration files even when unchanged", false)
    .option("-n, --no-config", "Ignore and do not update the cached selection")
    .option("--fetch", "Run the fetch commands of the selected layers", false)
    .option("-q, --quiet", "Suppress non-error output", false)
    .action(async (opts: ConfigureCommandOptions) => {
      await configureCommand(opts);
    });
}

// =============================================================================
// ACTION
// =============================================================================

export async function configureCommand(
  opts: ConfigureCommandOptions,
  io: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<ConfigureResult> {
  const cwd = io.cwd ?? process.cwd();
  const env = io.env ?? process.env;
  const { configPath } = resolveDescriptorPath({ explicitPath: opts.conf, env, cwd });

  const result = await configure({
    configPath,
    env,
    cwd,
    phase: opts.init ? "init" : "reconfigure",
    input: {
      products: opts.product.length > 0 ? opts.product : undefined,
      mode: opts.mode,
      site: opts.site,
      version: opts.version,
      buildDir: opts.buildDir,
    },
    envFile: opts.env ? path.resolve(cwd, opts.env) : undefined,
    useCache: opts.config,
    fetch: opts.fetch,
    force: opts.write,
    createLogger: (config) =>
      new JsonlLogger(resolveLogPath(config, env), { command: "configure" }),
    onFetchCommand: opts.quiet
      ? undefined
      : (group, command) => console.log(`Fetching ${group.name}: ${command}`),
  });

  if (!opts.quiet) {
    for (const line of formatSelectionSummary(result)) console.log(line);
  }
  return result;
}

export function formatSelectionSummary(result: Pick<ConfigureResult, "selection">): string[] {
  const { selection } = result;
  const version =
    selection.version === selection.actualVersion
      ? selection.version
      : `${selection.version} (${selection.actualVersion})`;

  return [
    `PRODUCT    = ${selection.products.join(" ")}`,
    `MODE       = ${selection.mode}`,
    `SITE       = ${selection.site}`,
    `VERSION    = ${version}`,
  ];
}

function collectValues(value: string, previous: string[]): string[] {
  return [...previous, value];
}

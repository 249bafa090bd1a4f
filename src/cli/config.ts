import path from "node:path";

import { resolveDescriptorPath, type DescriptorSource } from "../core/config-discovery.js";
import { loadDescriptor } from "../core/descriptor/loader.js";
import type { ProjectConfig } from "../core/descriptor/schema.js";

const STATE_DIR = ".strata";
const LOG_FILE = path.join("logs", "configure.jsonl");

export function loadConfigForCli(args: {
  explicitConfigPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): {
  config: ProjectConfig;
  configPath: string;
  source: DescriptorSource;
} {
  const cwd = args.cwd ?? process.cwd();
  const env = args.env ?? process.env;

  const resolved = resolveDescriptorPath({ explicitPath: args.explicitConfigPath, env, cwd });
  const config = loadDescriptor(resolved.configPath, { env });
  return { config, configPath: resolved.configPath, source: resolved.source };
}

// STRATA_HOME holds engine logs; it defaults to .strata under the project root.
export function resolveStrataHome(config: ProjectConfig, env: NodeJS.ProcessEnv): string {
  const home = env.STRATA_HOME;
  return home ? path.resolve(home) : path.join(config.project_root, STATE_DIR);
}

export function resolveLogPath(config: ProjectConfig, env: NodeJS.ProcessEnv): string {
  return path.join(resolveStrataHome(config, env), LOG_FILE);
}

import fs from "node:fs";
import path from "node:path";

import { SchemaError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { findUp } from "./utils.js";

export const DESCRIPTOR_FILE = "strata.yaml";

export type DescriptorSource = "explicit" | "env" | "search";

export type DescriptorResolution = {
  configPath: string;
  source: DescriptorSource;
};

// Explicit path first, then STRATA_CONF, then the nearest strata.yaml above cwd.
export function resolveDescriptorPath(args: {
  explicitPath?: string;
  env?: Record<string, string | undefined>;
  cwd?: string;
}): DescriptorResolution {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    return { configPath: path.resolve(cwd, args.explicitPath), source: "explicit" };
  }

  const fromEnv = args.env?.STRATA_CONF;
  if (fromEnv) {
    return { configPath: path.resolve(cwd, fromEnv), source: "env" };
  }

  const dir = findDescriptorDir(cwd);
  if (dir) {
    return { configPath: path.join(dir, DESCRIPTOR_FILE), source: "search" };
  }

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.schema,
    title: "Project descriptor not found.",
    message: `No ${DESCRIPTOR_FILE} found in ${cwd} or any parent directory.`,
    hint: "Pass --conf <path>, set STRATA_CONF, or run strata from inside the project tree.",
    cause: new SchemaError(`${DESCRIPTOR_FILE} not found above ${cwd}`),
  });
}

export function findDescriptorDir(startDir: string): string | null {
  return findUp(startDir, (dir) => fs.existsSync(path.join(dir, DESCRIPTOR_FILE)));
}

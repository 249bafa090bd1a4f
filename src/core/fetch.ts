/*
Purpose: plan and run the external commands that fetch a selection's sources.
Assumptions: commands are shell snippets run one at a time from the project root;
the first failure stops the run.
Usage: const groups = planFetch(config, plan); await runFetch(groups, { cwd, env, logger }).
*/

import { execa } from "execa";

import type { ProjectConfig } from "./descriptor/schema.js";
import { FetchError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { PROJECT_ROOT_VARIABLE, type VariableMap } from "./expand.js";
import type { LayerPlan } from "./layers.js";
import { logEngineEvent, type JsonlLogger } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type FetchSource = "project" | "version" | "layer";

export type FetchGroup = {
  source: FetchSource;
  name: string;
  commands: string[];
};

export type FetchCommandResult = {
  group: string;
  command: string;
  exitCode: number;
  output: string;
};

export type RunFetchOptions = {
  cwd: string;
  env: VariableMap;
  logger?: JsonlLogger;
  onCommand?: (group: FetchGroup, command: string) => void;
};

const OUTPUT_PREVIEW_LIMIT = 4000;

// =============================================================================
// PLANNING
// =============================================================================

export function planFetch(config: ProjectConfig, plan: LayerPlan): FetchGroup[] {
  const groups: FetchGroup[] = [
    { source: "project", name: "project", commands: config.fetch?.commands ?? [] },
    {
      source: "version",
      name: plan.version,
      commands: config.versions[plan.version]?.fetch?.commands ?? [],
    },
    ...plan.collections.map(
      (collection): FetchGroup => ({
        source: "layer",
        name: collection.name,
        commands: collection.fetch,
      }),
    ),
  ];

  return groups
    .map((group) => ({ ...group, commands: group.commands.filter((cmd) => cmd.trim().length > 0) }))
    .filter((group) => group.commands.length > 0);
}

// =============================================================================
// EXECUTION
// =============================================================================

export async function runFetch(
  groups: FetchGroup[],
  opts: RunFetchOptions,
): Promise<FetchCommandResult[]> {
  const env = { ...opts.env, [PROJECT_ROOT_VARIABLE]: opts.cwd };
  const executed: FetchCommandResult[] = [];

  logEngineEvent(opts.logger, "fetch.start", {
    groups: groups.map((group) => group.name),
    command_count: groups.reduce((count, group) => count + group.commands.length, 0),
  });

  for (const group of groups) {
    for (const command of group.commands) {
      opts.onCommand?.(group, command);
      logEngineEvent(opts.logger, "fetch.cmd.start", { group: group.name, cmd: command });

      const result = await execa(command, {
        shell: true,
        cwd: opts.cwd,
        env,
        extendEnv: false,
        reject: false,
        all: true,
      });

      const output = typeof result.all === "string" ? result.all : "";
      const exitCode = result.exitCode ?? 1;
      executed.push({ group: group.name, command, exitCode, output });

      if (exitCode !== 0) {
        const preview = truncateOutput(output, OUTPUT_PREVIEW_LIMIT);
        logEngineEvent(opts.logger, "fetch.cmd.fail", {
          group: group.name,
          cmd: command,
          exit_code: exitCode,
          output: preview.text,
          output_truncated: preview.truncated,
        });
        throw createFetchFailureError(command, exitCode, output);
      }

      logEngineEvent(opts.logger, "fetch.cmd.complete", { group: group.name, cmd: command });
    }
  }

  logEngineEvent(opts.logger, "fetch.complete", { command_count: executed.length });
  return executed;
}

// =============================================================================
// HELPERS
// =============================================================================

function truncateOutput(text: string, limit: number): { text: string; truncated: boolean } {
  if (text.length <= limit) return { text, truncated: false };
  return { text: text.slice(0, limit), truncated: true };
}

function createFetchFailureError(command: string, exitCode: number, output: string): UserFacingError {
  const body = output.length > 0 ? `\n${output}` : "";
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.fetch,
    title: "Fetch failed.",
    message: `Fetch command "${command}" exited with ${exitCode}.${body}`,
    hint: "Fix the command or its sources, then re-run with --fetch.",
    cause: new FetchError(`Fetch command failed: "${command}"`, command, exitCode, output),
  });
}

/*
Purpose: describe a selection as shell environment variables and the values the env.sh template needs.
Assumptions: the script is sourced by a POSIX shell; values are quoted for that shell.
Usage: const env = buildEnvironment({ config, selection, compat, phase: "init" }).
*/

import { passthroughVariable } from "./compat.js";
import type { ProjectConfig } from "./descriptor/schema.js";
import { PROJECT_ROOT_VARIABLE } from "./expand.js";
import type { ConfigurePhase, Selection } from "./selection.js";
import { joinFragments } from "./units.js";
import { uniqueInOrder } from "./utils.js";

export type EnvironmentArgs = {
  config: ProjectConfig;
  selection: Selection;
  compat: string;
  phase: ConfigurePhase;
};

export type EnvironmentScriptValues = {
  exports: string[];
  initExports: string[];
  passthrough: string;
  preInit: string;
  postInit: string;
  init: boolean;
  oeinit: string;
  pyrex: { bind: string; root: string; oeinit: string; conf: string; init: string } | null;
};

// Read by build configuration, so the build tool must let them through.
const PASSTHROUGH_NAMES = [
  PROJECT_ROOT_VARIABLE,
  "STRATA_PRODUCTS",
  "STRATA_MODE",
  "STRATA_SITE",
  "STRATA_ACTUAL_VERSION",
];

const SAFE_SHELL_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function buildEnvironment(args: EnvironmentArgs): Map<string, string> {
  const { config, selection } = args;
  const env = new Map<string, string>([
    ["STRATA_PRODUCTS", selection.products.join(" ")],
    ["STRATA_MODE", selection.mode],
    ["STRATA_SITE", selection.site],
    ["STRATA_VERSION", selection.version],
    ["STRATA_ACTUAL_VERSION", selection.actualVersion],
    ["STRATA_COMPAT", args.compat],
    ["STRATA_BUILD_DIR", selection.buildDir],
    ["STRATA_INIT", args.phase === "init" ? "true" : "false"],
  ]);

  if (args.phase === "init") {
    env.set(PROJECT_ROOT_VARIABLE, config.project_root);
    const bitbakeDir = config.versions[selection.actualVersion]?.bitbakedir;
    if (bitbakeDir) env.set("BITBAKEDIR", bitbakeDir);
  }

  return env;
}

export function environmentScriptValues(args: EnvironmentArgs): EnvironmentScriptValues {
  const { config, selection } = args;
  const env = buildEnvironment(args);
  const version = config.versions[selection.actualVersion];

  const exports: string[] = [];
  const initExports: string[] = [];
  for (const [name, value] of env) {
    const line = `${name}=${shellQuote(value)}`;
    if (name === PROJECT_ROOT_VARIABLE || name === "BITBAKEDIR") {
      initExports.push(line);
    } else {
      exports.push(line);
    }
  }

  const variable = passthroughVariable(args.compat);
  const names = uniqueInOrder([...PASSTHROUGH_NAMES, ...config.hooks.env_passthrough_vars]);

  return {
    exports,
    initExports,
    passthrough: `${variable}="\${${variable}} ${names.join(" ")}"`,
    preInit: joinFragments([config.hooks.pre_init]),
    postInit: joinFragments([config.hooks.post_init]),
    init: args.phase === "init",
    oeinit: shellQuote(version.oeinit),
    pyrex: version.pyrex
      ? {
          bind: shellQuote(config.project_root),
          root: shellQuote(version.pyrex.root),
          oeinit: shellQuote(version.oeinit),
          conf: shellQuote(version.pyrex.conf),
          init: shellQuote(`${version.pyrex.root}/pyrex-init-build-env`),
        }
      : null,
  };
}

export function shellQuote(value: string): string {
  if (SAFE_SHELL_WORD.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/*
Purpose: merge explicit axis values, cached state and descriptor defaults into one Selection.
Assumptions: pure; persistence happens elsewhere and only after emission succeeds.
Usage: resolveSelection({ config, input: { mode: "release" }, cached, phase: "reconfigure", cwd }).
*/

import path from "node:path";

import { CORE_NAME, DEFAULT_VERSION, type ProjectConfig } from "./descriptor/schema.js";
import type { CachedState } from "./cache-store.js";
import { SelectionError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { compareNames, productUnits, type BuildUnit } from "./units.js";
import { sortedUnique, splitWords } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

// "init" sets up a new environment; "reconfigure" adjusts an initialized one.
export type ConfigurePhase = "init" | "reconfigure";

export type SelectionInput = {
  products?: string[];
  mode?: string;
  site?: string;
  version?: string;
  buildDir?: string;
};

export type Selection = {
  products: string[];
  units: BuildUnit[];
  mode: string;
  site: string;
  // Either a declared version or the "default" sentinel.
  version: string;
  actualVersion: string;
  buildDir: string;
};

export type ResolveSelectionArgs = {
  config: ProjectConfig;
  input: SelectionInput;
  cached: CachedState | null;
  phase: ConfigurePhase;
  cwd: string;
};

export const DEFAULT_BUILD_DIR = "build";

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveSelection(args: ResolveSelectionArgs): Selection {
  const { config, input, cached } = args;
  // Cached state an initialized environment is locked to.
  const locked = args.phase === "reconfigure" ? cached : null;

  const products = resolveProducts(config, input, cached);
  const mode = resolveProfile("mode", input.mode ?? cached?.mode ?? config.defaults.mode, config.modes);
  const site = resolveProfile("site", input.site ?? cached?.site ?? config.defaults.site, config.sites);

  if (input.version !== undefined) {
    assertKnownVersion(config, input.version);
    if (locked && input.version !== locked.version) {
      throw createImmutableError(
        "version",
        `Version cannot change from "${locked.version}" to "${input.version}" after the environment is initialized.`,
        `--version=${input.version}`,
      );
    }
  }

  const version = input.version ?? cached?.version ?? DEFAULT_VERSION;
  assertKnownVersion(config, version);

  const actualVersion =
    version === DEFAULT_VERSION ? resolveDefaultVersion(config, products) : version;

  if (locked && actualVersion !== locked.actual_version) {
    throw createImmutableError(
      "version",
      `The environment builds version "${locked.actual_version}" and cannot switch to version "${actualVersion}" required by products: ${products.join(" ")}.`,
      `--product='${products.join(" ")}' --version=${DEFAULT_VERSION}`,
    );
  }

  const explicitBuildDir =
    input.buildDir !== undefined ? path.resolve(args.cwd, input.buildDir) : undefined;
  if (locked && explicitBuildDir !== undefined && explicitBuildDir !== locked.build_dir) {
    throw createImmutableError(
      "build directory",
      `Build directory cannot change from ${locked.build_dir} to ${explicitBuildDir} after the environment is initialized.`,
      `--build-dir=${input.buildDir}`,
    );
  }

  const buildDir =
    explicitBuildDir ??
    cached?.build_dir ??
    path.resolve(args.cwd, config.defaults.build_dir ?? DEFAULT_BUILD_DIR);

  const units = products
    .flatMap((name) => productUnits(name, config.products[name]))
    .sort((a, b) => compareNames(a.name, b.name));

  return { products, units, mode, site, version, actualVersion, buildDir };
}

export function isUnitActive(unit: BuildUnit | string, selection: Pick<Selection, "units">): boolean {
  const name = typeof unit === "string" ? unit : unit.name;
  return selection.units.some((candidate) => candidate.name === name);
}

// =============================================================================
// AXES
// =============================================================================

function resolveProducts(
  config: ProjectConfig,
  input: SelectionInput,
  cached: CachedState | null,
): string[] {
  const explicit = sortedUnique(splitWords(input.products ?? []));
  const fallback =
    cached?.products ??
    config.defaults.products ??
    (config.defaults.product ? [config.defaults.product] : []);
  const products = explicit.length > 0 ? explicit : sortedUnique(fallback);

  if (products.length === 0) {
    throw createSelectionError(
      "No product selected.",
      "One or more products must be selected.",
      `Pass --product <name>. Choose from: ${formatChoices(Object.keys(config.products))}`,
    );
  }

  for (const name of products) {
    if (name === CORE_NAME) {
      throw createSelectionError(
        "Reserved product name.",
        `"${CORE_NAME}" names the base configuration and cannot be selected as a product.`,
        `Choose from: ${formatChoices(Object.keys(config.products))}`,
      );
    }
    if (!Object.hasOwn(config.products, name)) {
      throw createSelectionError(
        "Unknown product.",
        `Unknown product "${name}".`,
        `Choose from: ${formatChoices(Object.keys(config.products))}`,
      );
    }
  }

  return products;
}

function resolveProfile(
  axis: "mode" | "site",
  value: string | undefined,
  choices: Record<string, unknown>,
): string {
  if (value === undefined) {
    throw createSelectionError(
      `No ${axis} selected.`,
      `A build ${axis} must be selected.`,
      `Pass --${axis} <name>. Choose from: ${formatChoices(Object.keys(choices))}`,
    );
  }
  if (!Object.hasOwn(choices, value)) {
    throw createSelectionError(
      `Unknown ${axis}.`,
      `Unknown ${axis} "${value}".`,
      `Choose from: ${formatChoices(Object.keys(choices))}`,
    );
  }
  return value;
}

function assertKnownVersion(config: ProjectConfig, version: string): void {
  if (version === DEFAULT_VERSION || Object.hasOwn(config.versions, version)) return;
  throw createSelectionError(
    "Unknown version.",
    `Unknown version "${version}".`,
    `Choose from: ${formatChoices([...Object.keys(config.versions), DEFAULT_VERSION])}`,
  );
}

function resolveDefaultVersion(config: ProjectConfig, products: string[]): string {
  const byVersion = new Map<string, string[]>();
  for (const name of products) {
    const version = config.products[name].default_version;
    byVersion.set(version, [...(byVersion.get(version) ?? []), name]);
  }

  const versions = [...byVersion.keys()];
  if (versions.length === 1) return versions[0];

  const detail = versions
    .sort(compareNames)
    .map((version) => `  ${version}: ${(byVersion.get(version) ?? []).join(" ")}`)
    .join("\n");
  throw createSelectionError(
    "Default versions disagree.",
    `Multiple products with different default versions were chosen:\n${detail}`,
    "Select products that share a default version, or pass --version explicitly.",
  );
}

// =============================================================================
// ERRORS
// =============================================================================

function formatChoices(names: string[]): string {
  return names.length > 0 ? [...names].sort(compareNames).join(", ") : "(none declared)";
}

function createSelectionError(title: string, message: string, hint?: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.selection,
    title,
    message,
    hint,
    cause: new SelectionError(message),
  });
}

function createImmutableError(field: string, message: string, initFlags: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.selection,
    title: `Cannot change ${field} on reconfigure.`,
    message,
    hint: `Initialize a new environment with ${initFlags}.`,
    cause: new SelectionError(message),
  });
}

/*
Purpose: expand %NAME and %{NAME} references in descriptor strings.
Assumptions: variables come from an explicit map (never process.env directly) plus
STRATA_PROJECT_ROOT; variable values may reference other variables.
Usage: const ctx = createExpansionContext({ env, projectRoot }); expandDocument(raw, ctx).
*/

import { UserFacingError, USER_FACING_ERROR_CODES, VariableError } from "./errors.js";

// =============================================================================
// TYPES & CONSTANTS
// =============================================================================

export const PROJECT_ROOT_VARIABLE = "STRATA_PROJECT_ROOT";
export const MAX_EXPANSION_DEPTH = 16;

export type VariableMap = Record<string, string | undefined>;

export type ExpansionContext = {
  variables: VariableMap;
  // Fully expanded variable values, filled lazily.
  resolved: Map<string, string>;
};

const REFERENCE_PATTERN = /%(%|\{([^}]*)\}?|([A-Za-z_][A-Za-z0-9_]*))/g;
const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// =============================================================================
// PUBLIC API
// =============================================================================

export function createExpansionContext(args: {
  env: VariableMap;
  projectRoot: string;
}): ExpansionContext {
  return {
    variables: { ...args.env, [PROJECT_ROOT_VARIABLE]: args.projectRoot },
    resolved: new Map(),
  };
}

export function expandString(text: string, ctx: ExpansionContext, location = "<value>"): string {
  return substitute(text, ctx, [], location);
}

// Expands every string value of a parsed YAML document. Keys are left alone.
export function expandDocument(value: unknown, ctx: ExpansionContext, location: string[] = []): unknown {
  if (typeof value === "string") {
    return expandString(value, ctx, formatLocation(location));
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => expandDocument(item, ctx, [...location, String(index)]));
  }

  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = expandDocument(item, ctx, [...location, key]);
    }
    return out;
  }

  return value;
}

// =============================================================================
// INTERNALS
// =============================================================================

function substitute(text: string, ctx: ExpansionContext, chain: string[], location: string): string {
  return text.replace(
    REFERENCE_PATTERN,
    (match: string, body: string, braced: string | undefined, bare: string | undefined) => {
      if (body === "%") return "%";

      if (bare !== undefined) {
        return resolveVariable(bare, ctx, chain, location);
      }

      if (braced !== undefined) {
        if (!match.endsWith("}")) {
          throw createVariableError(
            braced,
            location,
            `Unterminated variable reference "${match}" in ${location}.`,
          );
        }
        if (!NAME_PATTERN.test(braced)) {
          throw createVariableError(
            braced,
            location,
            `Invalid variable reference "${match}" in ${location}.`,
          );
        }
        return resolveVariable(braced, ctx, chain, location);
      }

      // A lone "%" followed by something that is not a reference stays literal.
      return match;
    },
  );
}

function resolveVariable(
  name: string,
  ctx: ExpansionContext,
  chain: string[],
  location: string,
): string {
  const cached = ctx.resolved.get(name);
  if (cached !== undefined) return cached;

  if (chain.includes(name)) {
    const cycle = [...chain.slice(chain.indexOf(name)), name].join(" -> ");
    throw createVariableError(name, location, `Cyclic variable reference ${cycle} in ${location}.`);
  }

  if (chain.length >= MAX_EXPANSION_DEPTH) {
    throw createVariableError(
      name,
      location,
      `Variable expansion deeper than ${MAX_EXPANSION_DEPTH} levels at "${name}" in ${location}.`,
    );
  }

  const raw = ctx.variables[name];
  if (raw === undefined) {
    throw createVariableError(name, location, `Undefined variable "${name}" referenced in ${location}.`);
  }

  const value = substitute(raw, ctx, [...chain, name], location);
  ctx.resolved.set(name, value);
  return value;
}

function formatLocation(location: string[]): string {
  return location.length > 0 ? location.join(".") : "<root>";
}

function createVariableError(variable: string, location: string, message: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.variable,
    title: "Descriptor variable could not be expanded.",
    message,
    hint: `Export ${variable} in the environment or escape a literal percent sign as "%%".`,
    cause: new VariableError(message, variable),
  });
}

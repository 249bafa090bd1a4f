import { describe, expect, it } from "vitest";

import { UserFacingError, USER_FACING_ERROR_CODES, VariableError } from "./errors.js";
import {
  MAX_EXPANSION_DEPTH,
  createExpansionContext,
  expandDocument,
  expandString,
} from "./expand.js";

function context(env: Record<string, string>) {
  return createExpansionContext({ env, projectRoot: "/proj" });
}

function expansionError(fn: () => unknown): UserFacingError {
  try {
    fn();
  } catch (err) {
    if (err instanceof UserFacingError) return err;
    throw err;
  }
  throw new Error("expected expansion to fail");
}

describe("expandString", () => {
  it("expands bare and braced references", () => {
    const ctx = context({ BSP: "meta-board", TOP: "/src" });

    expect(expandString("%TOP/%{BSP}-extra", ctx)).toBe("/src/meta-board-extra");
  });

  it("provides the project root variable", () => {
    expect(expandString("%{STRATA_PROJECT_ROOT}/layers", context({}))).toBe("/proj/layers");
  });

  it("treats %% and a stray % as literal text", () => {
    const ctx = context({ X: "x" });

    expect(expandString("100%% of %X", ctx)).toBe("100% of x");
    expect(expandString("50% off, 7%-8", ctx)).toBe("50% off, 7%-8");
  });

  it("expands references inside variable values", () => {
    const ctx = context({ A: "%{B}/a", B: "%C/b", C: "/c" });

    expect(expandString("%A", ctx)).toBe("/c/b/a");
  });

  it("rejects a direct self-reference", () => {
    const error = expansionError(() => expandString("%{FOO}", context({ FOO: "%{FOO}" }), "sites.local.conf"));

    expect(error.code).toBe(USER_FACING_ERROR_CODES.variable);
    expect(error.message).toBe("Cyclic variable reference FOO -> FOO in sites.local.conf.");
    expect(error.cause).toBeInstanceOf(VariableError);
    expect((error.cause as VariableError).variable).toBe("FOO");
  });

  it("reports the full chain of an indirect cycle", () => {
    const error = expansionError(() => expandString("%A", context({ A: "%{B}", B: "%{A}" }), "core.conf"));

    expect(error.message).toBe("Cyclic variable reference A -> B -> A in core.conf.");
  });

  it("names undefined variables and where they were referenced", () => {
    const error = expansionError(() => expandString("%{MISSING}/x", context({}), "versions.v1.oeinit"));

    expect(error.message).toBe('Undefined variable "MISSING" referenced in versions.v1.oeinit.');
    expect(error.hint).toContain("MISSING");
  });

  it("rejects unterminated and invalid braced references", () => {
    expect(expansionError(() => expandString("%{OPEN", context({}), "x")).message).toBe(
      'Unterminated variable reference "%{OPEN" in x.',
    );
    expect(expansionError(() => expandString("%{1BAD}", context({}), "x")).message).toBe(
      'Invalid variable reference "%{1BAD}" in x.',
    );
  });

  it("stops chains deeper than the maximum depth", () => {
    const env: Record<string, string> = {};
    for (let i = 0; i <= MAX_EXPANSION_DEPTH; i += 1) {
      env[`V${i}`] = `%{V${i + 1}}`;
    }
    env[`V${MAX_EXPANSION_DEPTH + 1}`] = "end";

    const error = expansionError(() => expandString("%V0", context(env), "x"));

    expect(error.message).toBe(
      `Variable expansion deeper than ${MAX_EXPANSION_DEPTH} levels at "V${MAX_EXPANSION_DEPTH}" in x.`,
    );
  });

  it("accepts chains up to the maximum depth", () => {
    const env: Record<string, string> = {};
    for (let i = 0; i < MAX_EXPANSION_DEPTH - 1; i += 1) {
      env[`V${i}`] = `%{V${i + 1}}`;
    }
    env[`V${MAX_EXPANSION_DEPTH - 1}`] = "end";

    expect(expandString("%V0", context(env))).toBe("end");
  });
});

describe("expandDocument", () => {
  it("expands string values and leaves keys and other scalars alone", () => {
    const doc = {
      "%KEY": ["%{TOP}/a", 3, true, null],
      nested: { path: "%TOP" },
    };

    expect(expandDocument(doc, context({ TOP: "/src", KEY: "k" }))).toEqual({
      "%KEY": ["/src/a", 3, true, null],
      nested: { path: "/src" },
    });
  });

  it("names the document path of a failing reference", () => {
    const error = expansionError(() =>
      expandDocument({ versions: { v1: { layers: [{ paths: ["%NOPE"] }] } } }, context({})),
    );

    expect(error.message).toBe('Undefined variable "NOPE" referenced in versions.v1.layers.0.paths.0.');
  });
});

import { describe, expect, it } from "vitest";

import { SAMPLE_DESCRIPTOR, parseTestDescriptor } from "./descriptor.test-helpers.js";
import { buildEnvironment, environmentScriptValues, shellQuote } from "./environment.js";
import { resolveSelection, type ConfigurePhase } from "./selection.js";

const WITH_PYREX = SAMPLE_DESCRIPTOR.replace(
  "    compat: scarthgap\n",
  [
    "    compat: scarthgap",
    "    bitbakedir: /proj/bitbake",
    "    pyrex:",
    "      root: /proj/pyrex",
    "      conf: /proj/conf/pyrex.ini",
    "",
  ].join("\n"),
);

const WITH_HOOKS = `${SAMPLE_DESCRIPTOR}
hooks:
  pre_init: |
    echo "configuring"
  env_passthrough_vars: [SSTATE_MIRRORS, STRATA_SITE]
`;

function args(text: string, products: string[], phase: ConfigurePhase, compat: string) {
  const config = parseTestDescriptor(text);
  const selection = resolveSelection({ config, input: { products }, cached: null, phase, cwd: "/work" });
  return { config, selection, compat, phase };
}

describe("buildEnvironment", () => {
  it("describes an initialized selection", () => {
    const env = buildEnvironment(args(SAMPLE_DESCRIPTOR, ["p2", "p1"], "init", "kirkstone"));

    expect([...env.entries()]).toEqual([
      ["STRATA_PRODUCTS", "p1 p2"],
      ["STRATA_MODE", "release"],
      ["STRATA_SITE", "local"],
      ["STRATA_VERSION", "default"],
      ["STRATA_ACTUAL_VERSION", "v1"],
      ["STRATA_COMPAT", "kirkstone"],
      ["STRATA_BUILD_DIR", "/work/build"],
      ["STRATA_INIT", "true"],
      ["STRATA_PROJECT_ROOT", "/proj"],
    ]);
  });

  it("adds BITBAKEDIR on init when the version names one", () => {
    const env = buildEnvironment(args(WITH_PYREX, ["next"], "init", "scarthgap"));

    expect(env.get("BITBAKEDIR")).toBe("/proj/bitbake");
  });

  it("leaves init-only variables out of a reconfigure", () => {
    const env = buildEnvironment(args(WITH_PYREX, ["next"], "reconfigure", "scarthgap"));

    expect(env.get("STRATA_INIT")).toBe("false");
    expect(env.has("STRATA_PROJECT_ROOT")).toBe(false);
    expect(env.has("BITBAKEDIR")).toBe(false);
  });
});

describe("environmentScriptValues", () => {
  it("quotes exports and separates the init-only ones", () => {
    const values = environmentScriptValues(args(SAMPLE_DESCRIPTOR, ["p1", "p2"], "init", "kirkstone"));

    expect(values.exports[0]).toBe("STRATA_PRODUCTS='p1 p2'");
    expect(values.initExports).toEqual(["STRATA_PROJECT_ROOT=/proj"]);
    expect(values.oeinit).toBe("/proj/layers/v1/poky/oe-init-build-env");
    expect(values.pyrex).toBeNull();
  });

  it("extends the passthrough list named by the compatibility release", () => {
    const values = environmentScriptValues(args(WITH_HOOKS, ["alpha"], "init", "dunfell"));

    expect(values.passthrough).toBe(
      'BB_ENV_EXTRAWHITE="${BB_ENV_EXTRAWHITE} STRATA_PROJECT_ROOT STRATA_PRODUCTS STRATA_MODE STRATA_SITE STRATA_ACTUAL_VERSION SSTATE_MIRRORS"',
    );
    expect(values.preInit).toBe('echo "configuring"');
    expect(values.postInit).toBe("");
  });

  it("routes initialization through pyrex when configured", () => {
    const values = environmentScriptValues(args(WITH_PYREX, ["next"], "init", "scarthgap"));

    expect(values.pyrex).toEqual({
      bind: "/proj",
      root: "/proj/pyrex",
      oeinit: "/proj/layers/v2/poky/oe-init-build-env",
      conf: "/proj/conf/pyrex.ini",
      init: "/proj/pyrex/pyrex-init-build-env",
    });
    expect(values.initExports).toEqual(["STRATA_PROJECT_ROOT=/proj", "BITBAKEDIR=/proj/bitbake"]);
  });
});

describe("shellQuote", () => {
  it("leaves plain words bare and single-quotes the rest", () => {
    expect(shellQuote("/opt/build-1.0")).toBe("/opt/build-1.0");
    expect(shellQuote("a b")).toBe("'a b'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
    expect(shellQuote("")).toBe("''");
  });
});

import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  SAMPLE_DESCRIPTOR,
  makeTempDir,
  parseTestDescriptor,
  removeTempDirs,
} from "../descriptor.test-helpers.js";
import { SchemaError, UserFacingError, USER_FACING_ERROR_CODES } from "../errors.js";

import { loadDescriptor } from "./loader.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  removeTempDirs(tempDirs);
});

function loadError(fn: () => unknown): UserFacingError {
  try {
    fn();
  } catch (err) {
    if (err instanceof UserFacingError) return err;
    throw err;
  }
  throw new Error("expected the descriptor to be rejected");
}

const MINIMAL = `
version: 2
versions:
  v1:
    oeinit: /poky/oe-init-build-env
modes:
  release: {}
sites:
  local: {}
`;

// =============================================================================
// TESTS
// =============================================================================

describe("loadDescriptor", () => {
  it("loads, expands and defaults a descriptor from disk", () => {
    const dir = makeTempDir(tempDirs, "strata-loader-");
    const configPath = path.join(dir, "strata.yaml");
    fs.writeFileSync(
      configPath,
      `${MINIMAL}
project_root: ..
cache: "%{STRATA_PROJECT_ROOT}/state/cache.yaml"
core:
  conf: 'TOPDIR_HINT = "%{HOME_DIR}"'
`,
      "utf8",
    );

    const config = loadDescriptor(configPath, { env: { HOME_DIR: "/home/dev" } });
    const projectRoot = path.dirname(dir);

    expect(config.config_path).toBe(configPath);
    expect(config.project_root).toBe(projectRoot);
    expect(config.cache).toBe(path.join(projectRoot, "state", "cache.yaml"));
    expect(config.core.conf).toBe('TOPDIR_HINT = "/home/dev"');
    expect(config.versions.v1.compat).toBe("auto");
    expect(config.versions.v1.layers).toEqual([]);
    expect(config.products).toEqual({});
    expect(config.hooks).toEqual({ pre_init: "", post_init: "", env_passthrough_vars: [] });
  });

  it("defaults the cache next to the project root", () => {
    const config = parseTestDescriptor(MINIMAL);

    expect(config.cache).toBe("/proj/.config.yaml");
  });

  it("reports a missing descriptor with its path", () => {
    const dir = makeTempDir(tempDirs, "strata-loader-");
    const configPath = path.join(dir, "missing.yaml");

    const error = loadError(() => loadDescriptor(configPath, { env: {} }));

    expect(error.code).toBe(USER_FACING_ERROR_CODES.schema);
    expect(error.title).toBe("Project descriptor missing.");
    expect(error.message).toBe(`Project descriptor not found at ${configPath}.`);
    expect(error.cause).toBeInstanceOf(SchemaError);
  });

  it("rejects unknown keys with their dotted path", () => {
    const error = loadError(() =>
      parseTestDescriptor(`${MINIMAL}
products:
  alpha:
    default_version: v1
    layrs: [core]
`),
    );

    expect(error.title).toBe("Project descriptor invalid.");
    expect(error.message).toBe(
      "Invalid descriptor /proj/strata.yaml:\nproducts.alpha: Unrecognized keys: layrs",
    );
  });

  it("rejects unsupported schema versions", () => {
    const error = loadError(() => parseTestDescriptor(MINIMAL.replace("version: 2", "version: 3")));

    expect(error.message).toBe("Invalid descriptor /proj/strata.yaml:\nversion: Expected one of 1, 2");
  });

  it("reports YAML syntax errors as schema errors", () => {
    const error = loadError(() => parseTestDescriptor("version: [1\n"));

    expect(error.code).toBe(USER_FACING_ERROR_CODES.schema);
    expect(error.message.startsWith("Invalid descriptor /proj/strata.yaml:\n<root>: ")).toBe(true);
  });

  it("surfaces variable errors from string values", () => {
    const error = loadError(() =>
      parseTestDescriptor(MINIMAL.replace("/poky/oe-init-build-env", "%{POKY}/oe-init-build-env")),
    );

    expect(error.code).toBe(USER_FACING_ERROR_CODES.variable);
    expect(error.message).toBe('Undefined variable "POKY" referenced in versions.v1.oeinit.');
  });

  it("collects referential problems", () => {
    const error = loadError(() =>
      parseTestDescriptor(`${MINIMAL}
products:
  core:
    default_version: v1
  alpha:
    default_version: v9
    multiconfig_enabled: false
    multiconfigs: [extra]
    deploy_deps: [ghost]
`),
    );

    expect(error.message).toBe(
      [
        "Invalid descriptor /proj/strata.yaml:",
        'products.core: "core" is reserved for the base configuration',
        'products.alpha.default_version: Unknown version "v9"',
        "products.alpha.multiconfigs: Must be empty when multiconfig_enabled is false",
        'products.alpha.deploy_deps: Unknown build unit "ghost"',
      ].join("\n"),
    );
  });

  it("rejects a version named after the default sentinel", () => {
    const error = loadError(() =>
      parseTestDescriptor(`
version: 1
versions:
  v1:
    oeinit: /poky/oe-init-build-env
  default:
    oeinit: /poky/oe-init-build-env
modes:
  release: {}
sites:
  local: {}
`),
    );

    expect(error.message).toBe(
      'Invalid descriptor /proj/strata.yaml:\nversions.default: "default" is reserved for the default version',
    );
  });

  it("rejects subproducts on products built without multiconfig", () => {
    const error = loadError(() =>
      parseTestDescriptor(`${MINIMAL}
products:
  board:
    default_version: v1
    multiconfig_enabled: false
    subproducts:
      mcu: {}
`),
    );

    expect(error.message).toBe(
      "Invalid descriptor /proj/strata.yaml:\nproducts.board.subproducts: Subproducts require multiconfig_enabled to be true",
    );
  });

  it("accepts the sample project", () => {
    const config = parseTestDescriptor(SAMPLE_DESCRIPTOR);

    expect(Object.keys(config.products)).toEqual(["alpha", "p1", "p2", "next"]);
    expect(config.versions.v1.layers[0]).toEqual({
      name: "core",
      paths: ["/proj/layers/v1/meta"],
      bbmask: [],
    });
    expect(config.versions.v1.oeinit).toBe("/proj/layers/v1/poky/oe-init-build-env");
  });
});

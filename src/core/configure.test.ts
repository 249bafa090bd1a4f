import fs from "node:fs";
import path from "node:path";

import { execa } from "execa";
import { afterEach, describe, expect, it, vi } from "vitest";

import { CacheStore } from "./cache-store.js";
import { configure, type ConfigureOptions } from "./configure.js";
import { makeTempDir, removeTempDirs } from "./descriptor.test-helpers.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { JsonlLogger } from "./logger.js";

// =============================================================================
// TEST SETUP
// =============================================================================

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);
const tempDirs: string[] = [];

afterEach(() => {
  removeTempDirs(tempDirs);
  execaMock.mockReset();
});

const DESCRIPTOR = `
version: 2
defaults:
  mode: release
  site: local
versions:
  v1:
    compat: kirkstone
    oeinit: "%{STRATA_PROJECT_ROOT}/poky/oe-init-build-env"
    layers:
      - name: core
        paths: ["%{STRATA_PROJECT_ROOT}/layers/meta"]
      - name: A
        paths: ["%{STRATA_PROJECT_ROOT}/layers/meta-a"]
        fetch:
          commands: [cmd-A]
  v2:
    compat: scarthgap
    oeinit: "%{STRATA_PROJECT_ROOT}/poky-next/oe-init-build-env"
    layers:
      - name: core
        paths: ["%{STRATA_PROJECT_ROOT}/layers/meta-next"]
modes:
  release: {}
  debug: {}
sites:
  local: {}
core:
  layers: [core]
products:
  alpha:
    default_version: v1
    layers: [A]
    targets: [alpha-image]
  next:
    default_version: v2
  bundle:
    default_version: v1
    layers: [A]
    deploy_deps: [alpha]
`;

function makeProject(): string {
  const dir = makeTempDir(tempDirs, "strata-configure-");
  fs.writeFileSync(path.join(dir, "strata.yaml"), DESCRIPTOR, "utf8");
  return dir;
}

function options(dir: string, overrides: Partial<ConfigureOptions> = {}): ConfigureOptions {
  return {
    configPath: path.join(dir, "strata.yaml"),
    env: {},
    cwd: dir,
    phase: "init",
    input: { products: ["alpha"] },
    useCache: true,
    ...overrides,
  };
}

function cachePath(dir: string): string {
  return path.join(dir, ".config.yaml");
}

// =============================================================================
// TESTS
// =============================================================================

describe("configure", () => {
  it("initializes an environment and records the selection", async () => {
    const dir = makeProject();

    const result = await configure(options(dir, { envFile: path.join(dir, "env.sh") }));

    expect(result.artifacts.map((artifact) => path.relative(dir, artifact.path))).toEqual([
      path.join("build", "conf", "site.conf"),
      path.join("build", "conf", "bblayers.conf"),
      path.join("build", "strata", "conf", "multiconfig", "product-alpha.conf"),
      "env.sh",
    ]);
    expect(result.compat).toEqual({ compat: "kirkstone", source: "declared" });
    expect(fs.readFileSync(path.join(dir, "build", "conf", "bblayers.conf"), "utf8")).toContain(
      `BBLAYERS += "${dir}/layers/meta-a"\n`,
    );
    expect(new CacheStore(cachePath(dir)).load()).toEqual({
      cache_version: 1,
      products: ["alpha"],
      mode: "release",
      site: "local",
      version: "default",
      actual_version: "v1",
      build_dir: path.join(dir, "build"),
    });
  });

  it("reuses cached values on reconfigure and saves the change", async () => {
    const dir = makeProject();
    await configure(options(dir));

    const result = await configure(
      options(dir, { phase: "reconfigure", input: { mode: "debug" } }),
    );

    expect(result.selection.products).toEqual(["alpha"]);
    expect(new CacheStore(cachePath(dir)).load()?.mode).toBe("debug");
    expect(fs.readFileSync(path.join(dir, "build", "conf", "site.conf"), "utf8")).toContain(
      'STRATA_TARGETS_core = "${STRATA_TARGETS_alpha}"\n',
    );
  });

  it("leaves the cache untouched when reconfigure rejects a version change", async () => {
    const dir = makeProject();
    await configure(options(dir));
    const before = fs.readFileSync(cachePath(dir), "utf8");

    const error = await configure(
      options(dir, { phase: "reconfigure", input: { version: "v2" } }),
    ).catch((err) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect((error as UserFacingError).code).toBe(USER_FACING_ERROR_CODES.selection);
    expect(fs.readFileSync(cachePath(dir), "utf8")).toBe(before);
  });

  it("writes nothing when a fetch command fails", async () => {
    const dir = makeProject();
    execaMock.mockResolvedValueOnce({
      exitCode: 1,
      all: "",
    } as Awaited<ReturnType<typeof execa>>);

    const error = await configure(options(dir, { fetch: true })).catch((err) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect((error as UserFacingError).message).toBe('Fetch command "cmd-A" exited with 1.');
    expect(fs.existsSync(cachePath(dir))).toBe(false);
    expect(fs.existsSync(path.join(dir, "build"))).toBe(false);
  });

  it("rejects an unselected deploy dependency before fetching", async () => {
    const dir = makeProject();

    const error = await configure(
      options(dir, { fetch: true, input: { products: ["bundle"] } }),
    ).catch((err) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    const userError = error as UserFacingError;
    expect(userError.code).toBe(USER_FACING_ERROR_CODES.emission);
    expect(userError.message).toBe('Unit "bundle" deploys from "alpha", which is not selected.');
    expect(execaMock).not.toHaveBeenCalled();
    expect(fs.existsSync(cachePath(dir))).toBe(false);
  });

  it("runs fetch commands from the project root before writing", async () => {
    const dir = makeProject();
    execaMock.mockResolvedValueOnce({ exitCode: 0, all: "" } as Awaited<ReturnType<typeof execa>>);
    const announced: string[] = [];

    const result = await configure(
      options(dir, {
        fetch: true,
        onFetchCommand: (group, command) => announced.push(`${group.name}: ${command}`),
      }),
    );

    expect(announced).toEqual(["A: cmd-A"]);
    expect(execaMock).toHaveBeenCalledWith("cmd-A", expect.objectContaining({ cwd: dir }));
    expect(result.fetched).toEqual([{ group: "A", command: "cmd-A", exitCode: 0, output: "" }]);
  });

  it("neither reads nor writes the cache when caching is off", async () => {
    const dir = makeProject();

    await configure(options(dir, { useCache: false }));

    expect(fs.existsSync(cachePath(dir))).toBe(false);
  });

  it("logs each stage of the run", async () => {
    const dir = makeProject();
    const logPath = path.join(dir, "logs", "configure.jsonl");

    await configure(
      options(dir, { createLogger: () => new JsonlLogger(logPath, { command: "configure" }) }),
    );

    const types = fs
      .readFileSync(logPath, "utf8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line).type);
    expect(types).toEqual([
      "descriptor.loaded",
      "selection.resolved",
      "compat.resolved",
      "artifact.write",
      "artifact.write",
      "artifact.write",
      "cache.saved",
    ]);
  });
});

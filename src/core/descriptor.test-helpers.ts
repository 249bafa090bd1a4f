import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { parseDescriptor } from "./descriptor/loader.js";
import type { ProjectConfig } from "./descriptor/schema.js";
import type { VariableMap } from "./expand.js";

export const TEST_PROJECT_ROOT = "/proj";

// Two isolated products over collections A, B and C, plus the single-product "alpha" case.
export const SAMPLE_DESCRIPTOR = `
version: 2
defaults:
  mode: release
  site: local
versions:
  v1:
    description: First generation
    compat: kirkstone
    oeinit: "%{STRATA_PROJECT_ROOT}/layers/v1/poky/oe-init-build-env"
    layers:
      - name: core
        paths: ["%{STRATA_PROJECT_ROOT}/layers/v1/meta"]
      - name: A
        paths: ["/proj/layers/a"]
        bbmask: ["meta-a/recipes-broken/"]
      - name: B
        paths: ["/proj/layers/b1", "/proj/layers/b2"]
      - name: C
        paths: ["/proj/layers/c"]
  v2:
    compat: scarthgap
    oeinit: /proj/layers/v2/poky/oe-init-build-env
    layers:
      - name: core
        paths: ["/proj/layers/v2/meta"]
modes:
  release:
    description: Release build
    conf: |
      BUILD_MODE = "release"
  debug:
    description: Debug build
sites:
  local:
    description: Local workstation
    conf: |
      SSTATE_DIR = "/var/cache/sstate"
  ci:
    description: CI runners
core:
  layers: [core]
  conf: |
    DISTRO = "testdistro"
products:
  alpha:
    description: Alpha board
    default_version: v1
    layers: [core]
    targets: [alpha-image]
  p1:
    description: First product
    default_version: v1
    layers: [A, B]
    targets: [p1-image, p1-sdk]
    conf: |
      MACHINE = "p1"
  p2:
    description: Second product
    default_version: v1
    layers: [B, C]
    targets: [p2-image]
  next:
    description: Next generation board
    default_version: v2
    targets: [next-image]
`;

export function parseTestDescriptor(
  text: string = SAMPLE_DESCRIPTOR,
  opts: { root?: string; env?: VariableMap } = {},
): ProjectConfig {
  const root = opts.root ?? TEST_PROJECT_ROOT;
  return parseDescriptor(text, path.join(root, "strata.yaml"), { env: opts.env ?? {} });
}

export function makeTempDir(tempDirs: string[], prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export function removeTempDirs(tempDirs: string[]): void {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
}

/*
Purpose: render the build-tool configuration fragments for a resolved selection and write them.
Assumptions: rendering is deterministic; writing skips files whose content is already current.
Usage: const artifacts = await renderArtifacts({ ... }); await writeArtifacts(artifacts, { force }).
*/

import path from "node:path";

import { atomicWrite } from "./atomic.js";
import { hashIgnoreAssignment } from "./compat.js";
import type { ProjectConfig } from "./descriptor/schema.js";
import { environmentScriptValues } from "./environment.js";
import { EmissionError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { PROJECT_ROOT_VARIABLE } from "./expand.js";
import type { LayerPlan } from "./layers.js";
import { logEngineEvent, type JsonlLogger } from "./logger.js";
import { isUnitActive, type ConfigurePhase, type Selection } from "./selection.js";
import { renderArtifactTemplate, type ArtifactTemplateName } from "./templates.js";
import { joinFragments, listBuildUnits, type BuildUnit } from "./units.js";
import { readTextIfExists, sortedUnique } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type Artifact = {
  kind: ArtifactTemplateName;
  path: string;
  content: string;
};

export type ArtifactStatus = {
  path: string;
  status: "written" | "unchanged";
};

export type RenderArtifactsArgs = {
  config: ProjectConfig;
  selection: Selection;
  plan: LayerPlan;
  compat: string;
  phase: ConfigurePhase;
  // Environment script destination; omitted when no script is wanted.
  envFile?: string;
};

export const MULTICONFIG_DIR = path.join("strata", "conf", "multiconfig");

// =============================================================================
// RENDERING
// =============================================================================

export async function renderArtifacts(args: RenderArtifactsArgs): Promise<Artifact[]> {
  const { config, selection, plan } = args;
  assertDeployDeps(config, selection);

  const confDir = path.join(selection.buildDir, "conf");
  const artifacts: Artifact[] = [
    {
      kind: "site.conf",
      path: path.join(confDir, "site.conf"),
      content: await renderArtifactTemplate("site.conf", siteConfValues(args)),
    },
    {
      kind: "bblayers.conf",
      path: path.join(confDir, "bblayers.conf"),
      content: await renderArtifactTemplate("bblayers.conf", {
        // Non-isolated units repeat the base masks under their own name for STRATA_PRODUCT.
        namespaces: [plan.base, ...plan.units].map((namespace) => ({
          name: namespace.name,
          masks: namespace.masks,
        })),
        layerPaths: plan.layerPaths,
        layerConf: joinFragments([config.core.layerconf]),
      }),
    },
  ];

  for (const unit of isolatedUnits(config, selection)) {
    artifacts.push({
      kind: "multiconfig.conf",
      path: multiconfigPath(selection.buildDir, unit.name),
      content: await renderArtifactTemplate("multiconfig.conf", {
        name: unit.name,
        description: quoteConfValue(unit.description),
        conf: joinFragments([unit.conf]),
      }),
    });
  }

  if (args.envFile !== undefined) {
    artifacts.push({
      kind: "env.sh",
      path: path.resolve(args.envFile),
      content: await renderArtifactTemplate("env.sh", environmentScriptValues(args)),
    });
  }

  return artifacts;
}

export function multiconfigPath(buildDir: string, unitName: string): string {
  return path.join(buildDir, MULTICONFIG_DIR, `${multiconfigName(unitName)}.conf`);
}

export function multiconfigName(unitName: string): string {
  return `product-${unitName}`;
}

// =============================================================================
// WRITING
// =============================================================================

export async function writeArtifacts(
  artifacts: Artifact[],
  opts: { force?: boolean; logger?: JsonlLogger } = {},
): Promise<ArtifactStatus[]> {
  const results: ArtifactStatus[] = [];

  for (const artifact of artifacts) {
    if (!opts.force && readCurrent(artifact.path) === artifact.content) {
      results.push({ path: artifact.path, status: "unchanged" });
      continue;
    }

    await atomicWrite(artifact.path, artifact.content);
    logEngineEvent(opts.logger, "artifact.write", { kind: artifact.kind, path: artifact.path });
    results.push({ path: artifact.path, status: "written" });
  }

  return results;
}

// =============================================================================
// SITE.CONF
// =============================================================================

function siteConfValues(args: RenderArtifactsArgs): Record<string, unknown> {
  const { config, selection, plan } = args;
  const legacy = config.version === 1;

  const active = activeUnits(config, selection);
  const multiconfigs = sortedUnique(
    isolatedUnits(config, selection).flatMap((unit) => [multiconfigName(unit.name), ...unit.multiconfigs]),
  );

  return {
    siteConf: joinFragments([config.sites[selection.site].conf]),
    modeConf: joinFragments([config.modes[selection.mode].conf]),
    legacyDeployAliases: legacy,
    defaultProduct: plan.defaultProduct,
    coreTargets: active.map((unit) => `\${STRATA_TARGETS_${unit.name}}`).join(" "),
    units: listBuildUnits(config).map((unit) => ({
      name: unit.name,
      legacyAlias: legacy ? `\${STRATA_DEPLOY_DIR_${unit.name}}` : null,
      targets: sortedUnique(unit.targets).join(" "),
    })),
    deployDeps: active
      .filter((unit) => unit.deployDeps.length > 0)
      .map((unit) => ({ name: unit.name, deps: sortedUnique(unit.deployDeps).join(" ") })),
    sharedConf: active
      .filter((unit) => !unit.isolated)
      .map((unit) => joinFragments([unit.conf]))
      .filter((conf) => conf.length > 0),
    multiconfigs: multiconfigs.join(" "),
    hashIgnore: hashIgnoreAssignment(args.compat, [PROJECT_ROOT_VARIABLE]),
    coreConf: joinFragments([config.core.conf]),
  };
}

// =============================================================================
// HELPERS
// =============================================================================

function activeUnits(config: ProjectConfig, selection: Selection): BuildUnit[] {
  return listBuildUnits(config).filter((unit) => isUnitActive(unit, selection));
}

function isolatedUnits(config: ProjectConfig, selection: Selection): BuildUnit[] {
  return activeUnits(config, selection).filter((unit) => unit.isolated);
}

// Fails when an active unit deploys from a unit that is not selected.
export function assertDeployDeps(config: ProjectConfig, selection: Selection): void {
  const declared = new Map(listBuildUnits(config).map((unit) => [unit.name, unit]));

  for (const unit of activeUnits(config, selection)) {
    const missing = unit.deployDeps.filter((dep) => !isUnitActive(dep, selection));
    if (missing.length === 0) continue;

    const products = sortedUnique(missing.map((dep) => declared.get(dep)?.product ?? dep));
    const message = `Unit "${unit.name}" deploys from ${missing.map((dep) => `"${dep}"`).join(", ")}, which ${missing.length === 1 ? "is" : "are"} not selected.`;
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.emission,
      title: "Deploy dependency not selected.",
      message,
      hint: `Select ${products.join(" ")} as well: --product '${sortedUnique([...selection.products, ...products]).join(" ")}'.`,
      cause: new EmissionError(message),
    });
  }
}

// Value placed inside a double-quoted assignment.
function quoteConfValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

function readCurrent(filePath: string): string | null {
  try {
    return readTextIfExists(filePath);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.emission,
      title: "Failed to read configuration.",
      message: `Could not read ${filePath} to compare it with the new content.`,
      cause: new EmissionError(`Reading ${filePath} failed`, err),
    });
  }
}

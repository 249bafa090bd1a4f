/*
Purpose: run one configure invocation from descriptor to written artifacts and saved cache.
Assumptions: any failure before the final step leaves the cache file untouched.
Usage: const result = await configure({ configPath, env, cwd, phase: "init", input, useCache: true }).
*/

import { CacheStore, toCachedState } from "./cache-store.js";
import { resolveCompat, type CompatResolution } from "./compat.js";
import { loadDescriptor } from "./descriptor/loader.js";
import type { ProjectConfig } from "./descriptor/schema.js";
import {
  assertDeployDeps,
  renderArtifacts,
  writeArtifacts,
  type ArtifactStatus,
} from "./emitter.js";
import type { VariableMap } from "./expand.js";
import { planFetch, runFetch, type FetchCommandResult, type FetchGroup } from "./fetch.js";
import { composeLayers, type LayerPlan } from "./layers.js";
import { logEngineEvent, type JsonlLogger } from "./logger.js";
import {
  resolveSelection,
  type ConfigurePhase,
  type Selection,
  type SelectionInput,
} from "./selection.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigureOptions = {
  configPath: string;
  env: VariableMap;
  cwd: string;
  phase: ConfigurePhase;
  input: SelectionInput;
  envFile?: string;
  // False for --no-config: the cache is neither read nor written.
  useCache: boolean;
  fetch?: boolean;
  force?: boolean;
  // Built once the project root is known.
  createLogger?: (config: ProjectConfig) => JsonlLogger | undefined;
  onFetchCommand?: (group: FetchGroup, command: string) => void;
};

export type ConfigureResult = {
  config: ProjectConfig;
  selection: Selection;
  plan: LayerPlan;
  compat: CompatResolution;
  fetched: FetchCommandResult[];
  artifacts: ArtifactStatus[];
};

// =============================================================================
// PIPELINE
// =============================================================================

export async function configure(opts: ConfigureOptions): Promise<ConfigureResult> {
  const config = loadDescriptor(opts.configPath, { env: opts.env });
  const logger = opts.createLogger?.(config);
  logEngineEvent(logger, "descriptor.loaded", {
    path: config.config_path,
    project_root: config.project_root,
    schema_version: config.version,
  });

  const store = opts.useCache ? new CacheStore(config.cache, logger) : null;
  const cached = store ? store.load() : null;

  const selection = resolveSelection({
    config,
    input: opts.input,
    cached,
    phase: opts.phase,
    cwd: opts.cwd,
  });
  logEngineEvent(logger, "selection.resolved", {
    phase: opts.phase,
    products: selection.products,
    units: selection.units.map((unit) => unit.name),
    mode: selection.mode,
    site: selection.site,
    version: selection.version,
    actual_version: selection.actualVersion,
    build_dir: selection.buildDir,
    from_cache: cached !== null,
  });

  const plan = composeLayers(config, selection);
  // Checked before fetching so an unusable selection costs no downloads.
  assertDeployDeps(config, selection);
  const fetched = opts.fetch
    ? await runFetch(planFetch(config, plan), {
        cwd: config.project_root,
        env: opts.env,
        logger,
        onCommand: opts.onFetchCommand,
      })
    : [];

  // layer.conf files may only exist once fetched.
  const compat = await resolveCompat(config.versions[selection.actualVersion]);
  logEngineEvent(logger, "compat.resolved", { compat: compat.compat, source: compat.source });

  const rendered = await renderArtifacts({
    config,
    selection,
    plan,
    compat: compat.compat,
    phase: opts.phase,
    envFile: opts.envFile,
  });
  const artifacts = await writeArtifacts(rendered, { force: opts.force, logger });

  if (store) {
    await store.save(toCachedState(selection));
  }

  return { config, selection, plan, compat, fetched, artifacts };
}

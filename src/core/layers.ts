/*
Purpose: turn a Selection into the layer paths each build unit sees and the paths it must mask.
Assumptions: collection order always follows the resolved version's declaration order.
Usage: const plan = composeLayers(config, selection); plan.units[0].masks.
*/

import { CORE_NAME, type LayerCollectionConfig, type ProjectConfig } from "./descriptor/schema.js";
import { LayerError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import type { Selection } from "./selection.js";
import type { BuildUnit } from "./units.js";
import { uniqueInOrder } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ResolvedCollection = {
  name: string;
  paths: string[];
  masks: string[];
  fetch: string[];
};

export type NamespaceLayers = {
  // "core" for the base namespace, otherwise a build unit name.
  name: string;
  isolated: boolean;
  collections: string[];
  paths: string[];
  masks: string[];
};

export type LayerPlan = {
  version: string;
  // Every collection required by core or a selected unit, in version order.
  collections: ResolvedCollection[];
  layerPaths: string[];
  base: NamespaceLayers;
  units: NamespaceLayers[];
  // Value STRATA_PRODUCT falls back to outside a multiconfig.
  defaultProduct: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function composeLayers(config: ProjectConfig, selection: Selection): LayerPlan {
  const version = config.versions[selection.actualVersion];
  if (!version) {
    throw createLayerError(
      "Unknown version.",
      `Version "${selection.actualVersion}" is not declared by ${config.config_path}.`,
    );
  }

  const index = new CollectionIndex(selection.actualVersion, version.layers);

  const coreNames = index.order(config.core.layers, CORE_NAME);
  const unitNames = new Map<string, string[]>();
  for (const unit of selection.units) {
    unitNames.set(unit.name, index.order([...config.core.layers, ...unit.layers], unit.location));
  }

  const requested = index.order(
    [...coreNames, ...[...unitNames.values()].flat()],
    CORE_NAME,
  );
  const requestedPaths = index.paths(requested);

  const nonIsolated = selection.units.filter((unit) => !unit.isolated);
  for (const unit of nonIsolated) {
    index.assertUnambiguous(unitNames.get(unit.name) ?? [], unit);
  }

  const base = composeBase({ index, coreNames, requested, requestedPaths, shared: nonIsolated.length > 0 });

  const units = selection.units.map((unit): NamespaceLayers => {
    // Non-isolated units build in the shared base namespace.
    if (!unit.isolated) return { ...base, name: unit.name };

    const collections = unitNames.get(unit.name) ?? [];
    const paths = index.paths(collections);
    const own = new Set(paths);
    return {
      name: unit.name,
      isolated: true,
      collections,
      paths,
      masks: uniqueInOrder([
        ...requestedPaths.filter((layerPath) => !own.has(layerPath)),
        ...index.masks(collections),
      ]),
    };
  });

  return {
    version: selection.actualVersion,
    collections: requested.map((name) => index.resolve(name)),
    layerPaths: requestedPaths,
    base,
    units,
    defaultProduct: nonIsolated.length === 1 ? nonIsolated[0].name : CORE_NAME,
  };
}

// =============================================================================
// BASE NAMESPACE
// =============================================================================

function composeBase(args: {
  index: CollectionIndex;
  coreNames: string[];
  requested: string[];
  requestedPaths: string[];
  shared: boolean;
}): NamespaceLayers {
  const { index } = args;

  // Non-isolated units build in the base namespace and see every requested layer.
  if (args.shared) {
    return {
      name: CORE_NAME,
      isolated: false,
      collections: args.requested,
      paths: args.requestedPaths,
      masks: index.masks(args.requested),
    };
  }

  const paths = index.paths(args.coreNames);
  const own = new Set(paths);
  return {
    name: CORE_NAME,
    isolated: false,
    collections: args.coreNames,
    paths,
    masks: uniqueInOrder([
      ...args.requestedPaths.filter((layerPath) => !own.has(layerPath)),
      ...index.masks(args.coreNames),
    ]),
  };
}

// =============================================================================
// COLLECTION INDEX
// =============================================================================

class CollectionIndex {
  private readonly declarations = new Map<string, LayerCollectionConfig[]>();
  private readonly position = new Map<string, number>();

  constructor(
    private readonly versionName: string,
    layers: LayerCollectionConfig[],
  ) {
    layers.forEach((collection, i) => {
      const existing = this.declarations.get(collection.name);
      if (existing) {
        existing.push(collection);
        return;
      }
      this.declarations.set(collection.name, [collection]);
      this.position.set(collection.name, i);
    });
  }

  // Deduplicated names in version order; unknown names fail with the requester named.
  order(names: string[], requester: string): string[] {
    for (const name of names) {
      if (!this.declarations.has(name)) {
        throw createLayerError(
          "Unknown layer collection.",
          `Layer collection "${name}" required by ${requester} is not declared by version "${this.versionName}".`,
          `Declare "${name}" under versions.${this.versionName}.layers or remove it from ${requester}.`,
        );
      }
    }
    return uniqueInOrder(names).sort(
      (a, b) => (this.position.get(a) ?? 0) - (this.position.get(b) ?? 0),
    );
  }

  resolve(name: string): ResolvedCollection {
    const [first] = this.declarations.get(name) ?? [];
    if (!first) {
      throw createLayerError(
        "Unknown layer collection.",
        `Layer collection "${name}" is not declared by version "${this.versionName}".`,
      );
    }
    return {
      name,
      paths: first.paths,
      masks: first.bbmask,
      fetch: first.fetch?.commands ?? [],
    };
  }

  paths(names: string[]): string[] {
    return uniqueInOrder(names.flatMap((name) => this.resolve(name).paths));
  }

  masks(names: string[]): string[] {
    return uniqueInOrder(names.flatMap((name) => this.resolve(name).masks));
  }

  assertUnambiguous(names: string[], unit: BuildUnit): void {
    for (const name of names) {
      const declarations = this.declarations.get(name) ?? [];
      const variants = uniqueInOrder(declarations.map((decl) => decl.paths.join(" ")));
      if (variants.length > 1) {
        throw createLayerError(
          "Conflicting layer paths.",
          `Layer collection "${name}" resolves to different paths in version "${this.versionName}" and is required by non-isolated unit "${unit.name}":\n${variants.map((paths) => `  ${paths}`).join("\n")}`,
          "Give each declaration of the collection a distinct name, or enable multiconfig for the product.",
        );
      }
    }
  }
}

function createLayerError(title: string, message: string, hint?: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.layer,
    title,
    message,
    hint,
    cause: new LayerError(message),
  });
}

import type { Descriptor, ProductConfig } from "./descriptor/schema.js";

// A buildable unit is a product without subproducts, or one subproduct of a product.
export type BuildUnit = {
  name: string;
  product: string;
  subproduct?: string;
  description: string;
  defaultVersion: string;
  layers: string[];
  targets: string[];
  conf: string;
  isolated: boolean;
  multiconfigs: string[];
  deployDeps: string[];
  // Descriptor path of the declaring entry, for error messages.
  location: string;
};

export function subproductUnitName(product: string, subproduct: string): string {
  return `${product}-${subproduct}`;
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export function listBuildUnits(descriptor: Pick<Descriptor, "products">): BuildUnit[] {
  return Object.entries(descriptor.products)
    .flatMap(([name, product]) => productUnits(name, product))
    .sort((a, b) => compareNames(a.name, b.name));
}

export function productUnits(name: string, product: ProductConfig): BuildUnit[] {
  const base = {
    product: name,
    defaultVersion: product.default_version,
    layers: product.layers,
    isolated: product.multiconfig_enabled,
    multiconfigs: product.multiconfigs,
  };

  const subproducts = Object.entries(product.subproducts ?? {}).sort(([a], [b]) =>
    compareNames(a, b),
  );

  if (subproducts.length === 0) {
    return [
      {
        ...base,
        name,
        description: product.description,
        targets: product.targets,
        conf: product.conf,
        deployDeps: product.deploy_deps,
        location: `products.${name}`,
      },
    ];
  }

  return subproducts.map(([subName, sub]) => ({
    ...base,
    name: subproductUnitName(name, subName),
    subproduct: subName,
    description: sub.description ?? product.description,
    targets: sub.targets,
    conf: joinFragments([product.conf, sub.conf]),
    deployDeps: [...product.deploy_deps, ...sub.deploy_deps],
    location: `products.${name}.subproducts.${subName}`,
  }));
}

export function joinFragments(fragments: string[]): string {
  return fragments
    .map((fragment) => fragment.trimEnd())
    .filter((fragment) => fragment.length > 0)
    .join("\n");
}

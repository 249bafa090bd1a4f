import { Command } from "commander";

import { CacheStore, type CachedState } from "../core/cache-store.js";
import { DEFAULT_VERSION, type ProjectConfig } from "../core/descriptor/schema.js";
import { compareNames, listBuildUnits } from "../core/units.js";

import { loadConfigForCli } from "./config.js";

type ItemRow = {
  current: boolean;
  name: string;
  description: string;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerListCommand(program: Command): void {
  program
    .command("list")
    .description("List the products, modes, sites and versions a project declares")
    .option("--conf <path>", "Project descriptor (default: nearest strata.yaml)")
    .action((opts: { conf?: string }) => {
      const { config } = loadConfigForCli({ explicitConfigPath: opts.conf });
      const cached = new CacheStore(config.cache).load();
      for (const line of formatChoiceList(config, cached)) console.log(line);
    });
}

// =============================================================================
// FORMATTING
// =============================================================================

// Current choices (from the cache) are marked with "*".
export function formatChoiceList(config: ProjectConfig, cached: CachedState | null): string[] {
  const products = new Set(cached?.products ?? []);
  const units = listBuildUnits(config).filter((unit) => unit.subproduct !== undefined);

  const sections: Array<[string, ItemRow[]]> = [
    [
      "Possible products:",
      describeItems(config.products, (name) => products.has(name)),
    ],
    [
      "Possible modes:",
      describeItems(config.modes, (name) => name === cached?.mode),
    ],
    [
      "Possible sites:",
      describeItems(config.sites, (name) => name === cached?.site),
    ],
    [
      "Possible versions:",
      [
        ...describeItems(config.versions, (name) => name === cached?.version),
        {
          current: cached?.version === DEFAULT_VERSION,
          name: DEFAULT_VERSION,
          description: "Default version of the selected products",
        },
      ],
    ],
  ];

  if (units.length > 0) {
    sections.push([
      "Subproduct units:",
      units.map((unit) => ({
        current: products.has(unit.product),
        name: unit.name,
        description: unit.description,
      })),
    ]);
  }

  return sections.flatMap(([heading, rows]) => [heading, ...formatRows(rows)]);
}

function describeItems(
  items: Record<string, { description: string }>,
  isCurrent: (name: string) => boolean,
): ItemRow[] {
  return Object.keys(items)
    .sort(compareNames)
    .map((name) => ({ current: isCurrent(name), name, description: items[name].description }));
}

function formatRows(rows: ItemRow[]): string[] {
  const nameWidth = Math.max(0, ...rows.map((row) => row.name.length));
  return rows.map((row) => {
    const marker = row.current ? " *" : "  ";
    const line = `${marker}  ${row.name.padEnd(nameWidth)}  ${row.description}`;
    return line.trimEnd();
  });
}

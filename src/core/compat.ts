import path from "node:path";

import fse from "fs-extra";

import type { VersionConfig } from "./descriptor/schema.js";
import { LayerError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { uniqueInOrder } from "./utils.js";

// =============================================================================
// RELEASES
// =============================================================================

// Oldest first.
export const KNOWN_RELEASES = [
  "pyro",
  "rocko",
  "sumo",
  "thud",
  "warrior",
  "zeus",
  "dunfell",
  "gatesgarth",
  "hardknott",
  "honister",
  "kirkstone",
  "langdale",
  "mickledore",
  "nanbield",
  "scarthgap",
  "styhead",
  "walnascar",
] as const;

export const AUTO_COMPAT = "auto";
export const FALLBACK_COMPAT = "pyro";

const PASSTHROUGH_SINCE = "kirkstone";
const COLON_OVERRIDES_SINCE = "honister";
const LAYERSERIES_PATTERN = /^\s*LAYERSERIES_CORENAMES\s*[?:]?=\s*"([^"]*)"/m;

export type CompatResolution = {
  compat: string;
  // Where the codename came from, for logs.
  source: "declared" | "layer.conf" | "fallback";
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function resolveCompat(version: VersionConfig): Promise<CompatResolution> {
  if (version.compat !== AUTO_COMPAT) {
    return { compat: version.compat, source: "declared" };
  }

  const layerPaths = uniqueInOrder(version.layers.flatMap((collection) => collection.paths));
  const codenames: string[] = [];
  for (const layerPath of layerPaths) {
    codenames.push(...(await readLayerSeries(layerPath)));
  }

  const newest = pickNewestRelease(codenames);
  return newest === null
    ? { compat: FALLBACK_COMPAT, source: "fallback" }
    : { compat: newest, source: "layer.conf" };
}

export function pickNewestRelease(codenames: string[]): string | null {
  let newest: string | null = null;
  for (const name of codenames) {
    if (newest === null || releaseRank(name) > releaseRank(newest)) newest = name;
  }
  return newest;
}

export function passthroughVariable(compat: string): string {
  return releaseRank(compat) >= releaseRank(PASSTHROUGH_SINCE)
    ? "BB_ENV_PASSTHROUGH_ADDITIONS"
    : "BB_ENV_EXTRAWHITE";
}

// Assignment keeping the named variables out of task signatures.
export function hashIgnoreAssignment(compat: string, names: string[]): string {
  const rank = releaseRank(compat);
  const variable =
    rank >= releaseRank(PASSTHROUGH_SINCE) ? "BB_BASEHASH_IGNORE_VARS" : "BB_HASHBASE_WHITELIST";
  const append = rank >= releaseRank(COLON_OVERRIDES_SINCE) ? ":append" : "_append";
  return `${variable}${append} = " ${names.join(" ")}"`;
}

// =============================================================================
// INTERNALS
// =============================================================================

// Codenames this tool does not know yet are assumed to be newer than all it does.
function releaseRank(name: string): number {
  const index = KNOWN_RELEASES.findIndex((release) => release === name);
  return index === -1 ? KNOWN_RELEASES.length : index;
}

async function readLayerSeries(layerPath: string): Promise<string[]> {
  const confPath = path.join(layerPath, "conf", "layer.conf");
  if (!(await fse.pathExists(confPath))) return [];

  let text: string;
  try {
    text = await fse.readFile(confPath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.layer,
      title: "Layer configuration unreadable.",
      message: `Could not read ${confPath} to detect the release series.`,
      hint: "Fix the file permissions, or declare compat for the version in the descriptor.",
      cause: new LayerError(`Reading ${confPath} failed`, err),
    });
  }

  const match = LAYERSERIES_PATTERN.exec(text);
  if (!match) return [];
  return match[1].split(/\s+/).filter((name) => name.length > 0);
}

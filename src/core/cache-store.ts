/*
Purpose: persist the last successfully emitted selection between invocations.
Assumptions: the cache is advisory; an unreadable or outdated file behaves as absent.
Usage: const store = new CacheStore(config.cache); const cached = store.load(); await store.save(state).
*/

import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";

import { atomicWrite } from "./atomic.js";
import { logEngineEvent, type JsonlLogger } from "./logger.js";
import type { Selection } from "./selection.js";
import { readTextIfExists } from "./utils.js";

export const CACHE_VERSION = 1;

export const CachedStateSchema = z
  .object({
    cache_version: z.literal(CACHE_VERSION),
    products: z.array(z.string().min(1)),
    mode: z.string().min(1),
    site: z.string().min(1),
    version: z.string().min(1),
    actual_version: z.string().min(1),
    build_dir: z.string().min(1),
  })
  .strict();

export type CachedState = z.infer<typeof CachedStateSchema>;

export class CacheStore {
  constructor(
    public readonly filePath: string,
    private readonly logger?: JsonlLogger,
  ) {}

  load(): CachedState | null {
    let text: string | null;
    try {
      text = readTextIfExists(this.filePath);
    } catch (err) {
      this.ignore("unreadable", err instanceof Error ? err.message : String(err));
      return null;
    }
    if (text === null) return null;

    let raw: unknown;
    try {
      raw = parseYaml(text);
    } catch (err) {
      this.ignore("malformed", err instanceof Error ? err.message : String(err));
      return null;
    }

    const parsed = CachedStateSchema.safeParse(raw);
    if (!parsed.success) {
      this.ignore("incompatible", parsed.error.issues.map((issue) => issue.message).join("; "));
      return null;
    }

    return parsed.data;
  }

  async save(state: CachedState): Promise<void> {
    await atomicWrite(this.filePath, stringifyYaml(state));
    logEngineEvent(this.logger, "cache.saved", { path: this.filePath });
  }

  private ignore(reason: string, detail: string): void {
    logEngineEvent(this.logger, "cache.ignored", { path: this.filePath, reason, detail });
  }
}

export function toCachedState(selection: Selection): CachedState {
  return {
    cache_version: CACHE_VERSION,
    products: [...selection.products],
    mode: selection.mode,
    site: selection.site,
    version: selection.version,
    actual_version: selection.actualVersion,
    build_dir: selection.buildDir,
  };
}

/*
Purpose: append-only JSONL event log for configure runs.
Assumptions: one process writes a given log file at a time; events are small.
Usage: const log = new JsonlLogger(file, { command: "configure" }); logEngineEvent(log, "cache.saved", { path }).
*/

import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  private dirReady = false;

  constructor(
    public readonly filePath: string,
    private readonly context: JsonObject = {},
  ) {}

  log(event: LogEvent): void {
    if (!this.dirReady) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.dirReady = true;
    }

    const record: JsonObject = { ts: isoNow(), ...this.context, type: event.type };
    if (event.payload) record.payload = event.payload;

    fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }
}

export function logEngineEvent(
  logger: JsonlLogger | undefined,
  type: string,
  payload?: JsonObject,
): void {
  logger?.log({ type, payload });
}

import fs from "node:fs";
import path from "node:path";

export function isoNow(): string {
  return new Date().toISOString();
}

// First occurrence wins; order is otherwise preserved.
export function uniqueInOrder<T>(values: Iterable<T>): T[] {
  return Array.from(new Set(values));
}

export function sortedUnique(values: Iterable<string>): string[] {
  return uniqueInOrder(values).sort();
}

export function splitWords(values: string[]): string[] {
  return values.flatMap((value) => value.split(/\s+/)).filter((word) => word.length > 0);
}

export function findUp(start: string, predicate: (dir: string) => boolean): string | null {
  let current = path.resolve(start);
  while (true) {
    if (predicate(current)) return current;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function readTextIfExists(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw err;
  }
}

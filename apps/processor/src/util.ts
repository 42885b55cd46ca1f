import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export function nowMs(): number {
  return Date.now();
}

export function newId(prefix: string): string {
  // uniqueness is required, ordering is not
  return `${prefix}_${randomUUID().replace(/-/g, "").slice(0, 24)}`;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Nearest directory at or above `startDir` holding `marker`, or null at the filesystem root. */
export function ancestorContaining(startDir: string, marker: string): string | null {
  for (let dir = path.resolve(startDir); ; dir = path.dirname(dir)) {
    if (fs.existsSync(path.join(dir, marker))) return dir;
    if (path.dirname(dir) === dir) return null;
  }
}

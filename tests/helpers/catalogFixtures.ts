/**
 * Catalog test fixtures
 *
 * Builds valid user-agent entries and writes catalog JSON to temp dirs.
 *
 * Usage:
 *   const dir = createTempDir();
 *   const file = writeCatalogFile(dir.path, "desktop.json", rawRecords(3, "Desk"));
 *   // ...
 *   dir.cleanup();
 */

import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import type { UserAgentEntry, UserAgentRecordRaw } from "@/types/catalog";

/**
 * Entry with a deterministic, valid text (>= 10 chars) per index
 */
export function entry(label: string, index: number, weight = 1): UserAgentEntry {
  return { text: `TestAgent/${label}-${index} (fixture)`, weight };
}

export function entries(count: number, label: string): UserAgentEntry[] {
  return Array.from({ length: count }, (_, i) => entry(label, i));
}

export function rawRecords(count: number, label: string): UserAgentRecordRaw[] {
  return entries(count, label).map((e) => ({ ua: e.text, pct: e.weight }));
}

export interface TempDir {
  path: string;
  cleanup: () => void;
}

export function createTempDir(): TempDir {
  const path = mkdtempSync(join(tmpdir(), "ua-catalog-test-"));
  return {
    path,
    cleanup: () => rmSync(path, { recursive: true, force: true }),
  };
}

export function writeCatalogFile(dir: string, name: string, content: unknown): string {
  const file = join(dir, name);
  writeFileSync(file, typeof content === "string" ? content : JSON.stringify(content), "utf-8");
  return file;
}

/**
 * Run `fn`, assert it throws an instance of `type`, and return the error
 */
export function catchError<E extends Error>(
  fn: () => unknown,
  type: new (...args: never[]) => E,
): E {
  try {
    fn();
  } catch (err) {
    if (err instanceof type) {
      return err;
    }
    throw err;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}

/**
 * Ledger stores.
 *
 * The file store keeps the whole ledger in one JSON document and replaces it
 * atomically on every save.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { LedgerFormatError } from "../errors";
import { validateLedger } from "./validate";
import type { LedgerSnapshot, LedgerStore } from "./types";

export class JsonFileLedgerStore implements LedgerStore {
  constructor(private readonly path: string) {}

  getPath(): string {
    return this.path;
  }

  async load(): Promise<LedgerSnapshot | null> {
    let content: string;
    try {
      content = await readFile(this.path, "utf8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new LedgerFormatError(
        `Ledger ${this.path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const result = validateLedger(parsed);
    if (!result.ok) {
      throw new LedgerFormatError(`Ledger ${this.path} failed validation`, result.errors);
    }
    return result.snapshot;
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(snapshot, null, 2) + "\n", "utf8");
    await rename(tmp, this.path);
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/**
 * Keeps the last saved snapshot in memory. Used by tests and dry runs.
 */
export class MemoryLedgerStore implements LedgerStore {
  private stored: string | null = null;
  saves = 0;

  constructor(initial?: LedgerSnapshot) {
    if (initial) this.stored = JSON.stringify(initial);
  }

  async load(): Promise<LedgerSnapshot | null> {
    if (this.stored === null) return null;
    const result = validateLedger(JSON.parse(this.stored));
    if (!result.ok) {
      throw new LedgerFormatError("Stored ledger failed validation", result.errors);
    }
    return result.snapshot;
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    this.stored = JSON.stringify(snapshot);
    this.saves++;
  }
}

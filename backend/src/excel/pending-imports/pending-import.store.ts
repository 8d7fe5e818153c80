import type { PendingImport } from "../import/import.types";

export const PENDING_IMPORT_STORE = Symbol("PENDING_IMPORT_STORE");

/**
 * Keeps analyzed imports between analyze and apply. Entries past their
 * `expiresAt` are never returned.
 */
export interface PendingImportStore {
  save(pending: PendingImport): Promise<void>;
  get(importId: string): Promise<PendingImport | null>;
  delete(importId: string): Promise<void>;
}

export function isExpired(pending: Pick<PendingImport, "expiresAt">, now: Date) {
  return Date.parse(pending.expiresAt) <= now.getTime();
}

export class MemoryPendingImportStore implements PendingImportStore {
  private readonly entries = new Map<string, PendingImport>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async save(pending: PendingImport) {
    this.purgeExpired();
    this.entries.set(pending.importId, structuredClone(pending));
  }

  async get(importId: string) {
    const pending = this.entries.get(importId);
    if (!pending) {
      return null;
    }
    if (isExpired(pending, this.now())) {
      this.entries.delete(importId);
      return null;
    }

    return structuredClone(pending);
  }

  async delete(importId: string) {
    this.entries.delete(importId);
  }

  get size() {
    return this.entries.size;
  }

  private purgeExpired() {
    const now = this.now();
    for (const [importId, pending] of this.entries) {
      if (isExpired(pending, now)) {
        this.entries.delete(importId);
      }
    }
  }
}

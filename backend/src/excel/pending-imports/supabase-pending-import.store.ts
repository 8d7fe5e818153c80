import { isDbRow } from "../../price-store/row-mappers";
import type { SupabaseService } from "../../supabase/supabase.service";
import type { PendingChange, PendingImport } from "../import/import.types";
import type { PendingImportStore } from "./pending-import.store";

const TABLE = "pending_imports";

function isPendingChange(value: unknown): value is PendingChange {
  return (
    isDbRow(value) &&
    typeof value.seq === "number" &&
    typeof value.applied === "boolean" &&
    (value.action === "add" || value.action === "update") &&
    typeof value.dataType === "string" &&
    typeof value.price === "number"
  );
}

function isPendingImport(value: unknown): value is PendingImport {
  return (
    isDbRow(value) &&
    typeof value.importId === "string" &&
    typeof value.fileName === "string" &&
    typeof value.createdAt === "string" &&
    typeof value.expiresAt === "string" &&
    isDbRow(value.counts) &&
    Array.isArray(value.diffItems) &&
    Array.isArray(value.errors) &&
    Array.isArray(value.warnings) &&
    Array.isArray(value.changes) &&
    value.changes.every(isPendingChange)
  );
}

/**
 * Pending imports in the `pending_imports` table, so an analysis survives a
 * restart and is visible to every instance behind the load balancer.
 */
export class SupabasePendingImportStore implements PendingImportStore {
  constructor(
    private readonly supabaseService: SupabaseService,
    private readonly now: () => Date = () => new Date()
  ) {}

  async save(pending: PendingImport) {
    const client = this.supabaseService.db;
    const purge = await client.from(TABLE).delete().lte("expires_at", this.now().toISOString());
    if (purge.error) {
      throw new Error(`Unable to purge expired imports: ${purge.error.message}`);
    }

    const { error } = await client.from(TABLE).upsert({
      id: pending.importId,
      file_name: pending.fileName,
      payload: pending,
      created_at: pending.createdAt,
      expires_at: pending.expiresAt,
    });
    if (error) {
      throw new Error(`Unable to save import ${pending.importId}: ${error.message}`);
    }
  }

  async get(importId: string) {
    const { data, error } = await this.supabaseService.db
      .from(TABLE)
      .select("payload")
      .eq("id", importId)
      .gt("expires_at", this.now().toISOString())
      .maybeSingle();
    if (error) {
      throw new Error(`Unable to read import ${importId}: ${error.message}`);
    }
    if (!isDbRow(data)) {
      return null;
    }
    if (!isPendingImport(data.payload)) {
      throw new Error(`Import ${importId} has an unreadable payload`);
    }

    return data.payload;
  }

  async delete(importId: string) {
    const { error } = await this.supabaseService.db.from(TABLE).delete().eq("id", importId);
    if (error) {
      throw new Error(`Unable to delete import ${importId}: ${error.message}`);
    }
  }
}

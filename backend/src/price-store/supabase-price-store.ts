import { Injectable } from "@nestjs/common";
import type { SupabaseClient } from "@supabase/supabase-js";
import { SupabaseService } from "../supabase/supabase.service";
import {
  type PricedTable,
  type PriceStore,
  type PriceStoreOp,
  UnitOfWorkSession,
} from "./price-store";
import {
  type AuditHistoryQuery,
  type BasePriceQuery,
  type FilmPriceQuery,
  type GrindingPriceQuery,
  type ImportExportHistoryQuery,
  compareBasePriceRows,
  compareFilmPrices,
  compareGrindingPrices,
  matchesBasePriceQuery,
  matchesFilmPriceQuery,
  matchesGrindingPriceQuery,
} from "./price-store.queries";
import {
  fromBasePrice,
  fromFilmPrice,
  fromGrindingPrice,
  fromImportExportAudit,
  fromMaterial,
  fromPriceChangeAudit,
  isDbRow,
  toBasePriceRow,
  toDbRows,
  toExchangeRate,
  toFilmPrice,
  toGrindingPrice,
  toImportExportAudit,
  toMaterial,
  toMaterialGroup,
  toPriceChangeAudit,
  toProcessingOption,
  toThicknessModifier,
  toWidthModifier,
} from "./row-mappers";

const PAGE_SIZE = 1000;
const BASE_PRICE_SELECT = "*, material:materials!inner(*, group:material_groups(*))";

type QueryResult = PromiseLike<{ data: unknown; error: { message: string } | null }>;

@Injectable()
export class SupabasePriceStore implements PriceStore {
  constructor(private readonly supabaseService: SupabaseService) {}

  openSession() {
    return new SupabasePriceStoreSession(this.supabaseService.db);
  }
}

/**
 * Server-side filters only narrow what PostgREST sends back; the shared
 * matchers decide which rows a query returns.
 */
class SupabasePriceStoreSession extends UnitOfWorkSession {
  constructor(private readonly client: SupabaseClient) {
    super();
  }

  private async fetchAllPages(table: string, fetchPage: (from: number, to: number) => QueryResult) {
    const rows: Record<string, unknown>[] = [];
    let from = 0;

    while (true) {
      const { data, error } = await fetchPage(from, from + PAGE_SIZE - 1);
      if (error) {
        throw new Error(`Unable to read ${table}: ${error.message}`);
      }

      const page = toDbRows(table, data);
      rows.push(...page);
      if (page.length < PAGE_SIZE) {
        break;
      }

      from += PAGE_SIZE;
    }

    return rows;
  }

  private async fetchOne(table: string, request: QueryResult) {
    const { data, error } = await request;
    if (error) {
      throw new Error(`Unable to read ${table}: ${error.message}`);
    }

    return isDbRow(data) ? data : null;
  }

  private async fetchPage(table: string, request: PromiseLike<{
    data: unknown;
    error: { message: string } | null;
    count: number | null;
  }>) {
    const { data, error, count } = await request;
    if (error) {
      throw new Error(`Unable to read ${table}: ${error.message}`);
    }

    const rows = toDbRows(table, data);
    return { rows, total: count ?? rows.length };
  }

  async listMaterials() {
    const rows = await this.fetchAllPages("materials", (from, to) =>
      this.client.from("materials").select("*").order("grade").range(from, to)
    );
    return rows.map(toMaterial);
  }

  async listMaterialGroups() {
    const rows = await this.fetchAllPages("material_groups", (from, to) =>
      this.client.from("material_groups").select("*").order("display_order").range(from, to)
    );
    return rows.map(toMaterialGroup);
  }

  async listBasePrices(query: BasePriceQuery) {
    const rows = await this.fetchAllPages("base_prices", (from, to) => {
      let request = this.client.from("base_prices").select(BASE_PRICE_SELECT);
      if (query.activeOnly) {
        request = request.eq("is_active", true);
      }
      if (query.positiveOnly) {
        request = request.gt("price_pln_per_kg", 0);
      }
      if (query.materialIds?.length) {
        request = request.in("material_id", query.materialIds);
      }
      if (query.surfaceFinishes?.length) {
        request = request.in("surface_finish", query.surfaceFinishes);
      }
      if (query.thicknessMin !== undefined) {
        request = request.gte("thickness", query.thicknessMin);
      }
      if (query.thicknessMax !== undefined) {
        request = request.lte("thickness", query.thicknessMax);
      }
      if (query.widths?.length) {
        request = request.in("width", query.widths);
      }

      return request.order("id").range(from, to);
    });

    return rows
      .map(toBasePriceRow)
      .filter((row) => matchesBasePriceQuery(row, query))
      .sort(compareBasePriceRows);
  }

  async listGrindingPrices(query: GrindingPriceQuery) {
    const rows = await this.fetchAllPages("grinding_prices", (from, to) => {
      let request = this.client.from("grinding_prices").select("*");
      if (query.activeOnly) {
        request = request.eq("is_active", true);
      }
      if (query.providers?.length) {
        request = request.in("provider", query.providers);
      }
      if (query.thickness !== undefined) {
        request = request.eq("thickness", query.thickness);
      }

      return request.order("id").range(from, to);
    });

    return rows
      .map(toGrindingPrice)
      .filter((row) => matchesGrindingPriceQuery(row, query))
      .sort(compareGrindingPrices);
  }

  async listFilmPrices(query: FilmPriceQuery) {
    const rows = await this.fetchAllPages("film_prices", (from, to) => {
      let request = this.client.from("film_prices").select("*");
      if (query.activeOnly) {
        request = request.eq("is_active", true);
      }
      if (query.filmTypes?.length) {
        request = request.in("film_type", query.filmTypes);
      }
      if (query.thickness !== undefined) {
        request = request.eq("thickness", query.thickness);
      }

      return request.order("id").range(from, to);
    });

    return rows
      .map(toFilmPrice)
      .filter((row) => matchesFilmPriceQuery(row, query))
      .sort(compareFilmPrices);
  }

  async listThicknessModifiers() {
    const rows = await this.fetchAllPages("thickness_modifiers", (from, to) =>
      this.client
        .from("thickness_modifiers")
        .select("*")
        .order("grade")
        .order("surface_finish")
        .order("thickness")
        .range(from, to)
    );
    return rows.map(toThicknessModifier);
  }

  async listWidthModifiers() {
    const rows = await this.fetchAllPages("width_modifiers", (from, to) =>
      this.client.from("width_modifiers").select("*").order("width").range(from, to)
    );
    return rows.map(toWidthModifier);
  }

  async findProcessingOption(grade: string, surfaceFinish: string) {
    const row = await this.fetchOne(
      "processing_options",
      this.client
        .from("processing_options")
        .select("*")
        .eq("grade", grade)
        .eq("surface_finish", surfaceFinish)
        .order("id")
        .limit(1)
        .maybeSingle()
    );
    return row ? toProcessingOption(row) : null;
  }

  async findLatestExchangeRate(currencyFrom: string, currencyTo: string) {
    const row = await this.fetchOne(
      "exchange_rates",
      this.client
        .from("exchange_rates")
        .select("*")
        .eq("is_active", true)
        .eq("currency_from", currencyFrom)
        .eq("currency_to", currencyTo)
        .order("valid_from", { ascending: false })
        .limit(1)
        .maybeSingle()
    );
    return row ? toExchangeRate(row) : null;
  }

  async listPriceChangeAudits(query: AuditHistoryQuery) {
    let request = this.client.from("price_change_audits").select("*", { count: "exact" });
    if (query.changeType !== undefined) {
      request = request.eq("change_type", query.changeType);
    }

    const { rows, total } = await this.fetchPage(
      "price_change_audits",
      request
        .order("created_at", { ascending: false })
        .range(query.offset, query.offset + query.limit - 1)
    );
    return { items: rows.map(toPriceChangeAudit), total };
  }

  async listImportExportAudits(query: ImportExportHistoryQuery) {
    let request = this.client.from("import_export_audits").select("*", { count: "exact" });
    if (query.operationType !== undefined) {
      request = request.eq("operation_type", query.operationType);
    }

    const { rows, total } = await this.fetchPage(
      "import_export_audits",
      request
        .order("created_at", { ascending: false })
        .range(query.offset, query.offset + query.limit - 1)
    );
    return { items: rows.map(toImportExportAudit), total };
  }

  async priceRowExists(table: PricedTable, id: string) {
    const row = await this.fetchOne(
      table,
      this.client.from(table).select("id").eq("id", id).maybeSingle()
    );
    return row !== null;
  }

  protected async findStoredMaterialById(id: string) {
    const row = await this.fetchOne(
      "materials",
      this.client.from("materials").select("*").eq("id", id).maybeSingle()
    );
    return row ? toMaterial(row) : null;
  }

  protected async findStoredMaterialByGrade(grade: string) {
    const row = await this.fetchOne(
      "materials",
      this.client.from("materials").select("*").eq("grade", grade).maybeSingle()
    );
    return row ? toMaterial(row) : null;
  }

  protected async flush(ops: PriceStoreOp[]) {
    const payload = ops.map((op) => {
      if (op.kind === "set_price") {
        return op;
      }

      switch (op.table) {
        case "materials":
          return { kind: op.kind, table: op.table, row: fromMaterial(op.row) };
        case "base_prices":
          return { kind: op.kind, table: op.table, row: fromBasePrice(op.row) };
        case "grinding_prices":
          return { kind: op.kind, table: op.table, row: fromGrindingPrice(op.row) };
        case "film_prices":
          return { kind: op.kind, table: op.table, row: fromFilmPrice(op.row) };
        case "price_change_audits":
          return { kind: op.kind, table: op.table, row: fromPriceChangeAudit(op.row) };
        case "import_export_audits":
          return { kind: op.kind, table: op.table, row: fromImportExportAudit(op.row) };
      }
    });

    const { error } = await this.client.rpc("apply_price_store_ops", { ops: payload });
    if (error) {
      throw new Error(`Unable to commit ${ops.length} price store changes: ${error.message}`);
    }
  }
}

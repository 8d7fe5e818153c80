import { randomUUID } from "node:crypto";
import type {
  AuditHistoryQuery,
  BasePriceQuery,
  FilmPriceQuery,
  GrindingPriceQuery,
  ImportExportHistoryQuery,
} from "./price-store.queries";
import type {
  BasePrice,
  BasePriceRow,
  ExchangeRate,
  FilmPrice,
  GrindingPrice,
  ImportExportAudit,
  Material,
  MaterialGroup,
  NewBasePrice,
  NewFilmPrice,
  NewGrindingPrice,
  NewImportExportAudit,
  NewMaterial,
  NewPriceChangeAudit,
  PriceChangeAudit,
  ProcessingOption,
  ThicknessModifier,
  WidthModifier,
} from "./price-store.types";

export const PRICE_STORE = Symbol("PRICE_STORE");

export type PricedTable = "base_prices" | "grinding_prices" | "film_prices";

export type PriceStoreOp =
  | { kind: "insert"; table: "materials"; row: Material }
  | { kind: "insert"; table: "base_prices"; row: BasePrice }
  | { kind: "insert"; table: "grinding_prices"; row: GrindingPrice }
  | { kind: "insert"; table: "film_prices"; row: FilmPrice }
  | { kind: "insert"; table: "price_change_audits"; row: PriceChangeAudit }
  | { kind: "insert"; table: "import_export_audits"; row: ImportExportAudit }
  | { kind: "set_price"; table: PricedTable; id: string; price: number };

export type Page<T> = {
  items: T[];
  total: number;
};

export interface PriceStoreSession {
  listMaterials(): Promise<Material[]>;
  findMaterialById(id: string): Promise<Material | null>;
  findMaterialByGrade(grade: string): Promise<Material | null>;
  listMaterialGroups(): Promise<MaterialGroup[]>;
  listBasePrices(query: BasePriceQuery): Promise<BasePriceRow[]>;
  listGrindingPrices(query: GrindingPriceQuery): Promise<GrindingPrice[]>;
  listFilmPrices(query: FilmPriceQuery): Promise<FilmPrice[]>;
  listThicknessModifiers(): Promise<ThicknessModifier[]>;
  listWidthModifiers(): Promise<WidthModifier[]>;
  /** First rule for the exact (grade, finish) pair. */
  findProcessingOption(grade: string, surfaceFinish: string): Promise<ProcessingOption | null>;
  /** Active rate with the latest `validFrom`. */
  findLatestExchangeRate(currencyFrom: string, currencyTo: string): Promise<ExchangeRate | null>;
  listPriceChangeAudits(query: AuditHistoryQuery): Promise<Page<PriceChangeAudit>>;
  listImportExportAudits(query: ImportExportHistoryQuery): Promise<Page<ImportExportAudit>>;
  priceRowExists(table: PricedTable, id: string): Promise<boolean>;

  insertMaterial(material: NewMaterial): Material;
  insertBasePrice(price: NewBasePrice): BasePrice;
  insertGrindingPrice(price: NewGrindingPrice): GrindingPrice;
  insertFilmPrice(price: NewFilmPrice): FilmPrice;
  setPrice(table: PricedTable, id: string, price: number): void;
  insertPriceChangeAudit(audit: NewPriceChangeAudit): PriceChangeAudit;
  insertImportExportAudit(audit: NewImportExportAudit): ImportExportAudit;

  readonly pendingOpCount: number;
  commit(): Promise<void>;
  rollback(): void;
}

export interface PriceStore {
  openSession(): PriceStoreSession;
}

/**
 * Reads hit the backing store immediately; writes are queued and reach it in
 * one `flush` on commit. Materials inserted in this session are visible to
 * the material lookups before commit.
 */
export abstract class UnitOfWorkSession implements PriceStoreSession {
  private ops: PriceStoreOp[] = [];
  private readonly pendingMaterials = new Map<string, Material>();

  protected constructor(
    private readonly generateId: () => string = randomUUID,
    private readonly now: () => Date = () => new Date()
  ) {}

  abstract listMaterials(): Promise<Material[]>;
  abstract listMaterialGroups(): Promise<MaterialGroup[]>;
  abstract listBasePrices(query: BasePriceQuery): Promise<BasePriceRow[]>;
  abstract listGrindingPrices(query: GrindingPriceQuery): Promise<GrindingPrice[]>;
  abstract listFilmPrices(query: FilmPriceQuery): Promise<FilmPrice[]>;
  abstract listThicknessModifiers(): Promise<ThicknessModifier[]>;
  abstract listWidthModifiers(): Promise<WidthModifier[]>;
  abstract findProcessingOption(
    grade: string,
    surfaceFinish: string
  ): Promise<ProcessingOption | null>;
  abstract findLatestExchangeRate(
    currencyFrom: string,
    currencyTo: string
  ): Promise<ExchangeRate | null>;
  abstract listPriceChangeAudits(query: AuditHistoryQuery): Promise<Page<PriceChangeAudit>>;
  abstract listImportExportAudits(
    query: ImportExportHistoryQuery
  ): Promise<Page<ImportExportAudit>>;
  abstract priceRowExists(table: PricedTable, id: string): Promise<boolean>;

  protected abstract findStoredMaterialById(id: string): Promise<Material | null>;
  protected abstract findStoredMaterialByGrade(grade: string): Promise<Material | null>;
  protected abstract flush(ops: PriceStoreOp[]): Promise<void>;

  async findMaterialById(id: string) {
    return this.pendingMaterials.get(id) ?? this.findStoredMaterialById(id);
  }

  async findMaterialByGrade(grade: string) {
    for (const material of this.pendingMaterials.values()) {
      if (material.grade === grade) {
        return material;
      }
    }

    return this.findStoredMaterialByGrade(grade);
  }

  insertMaterial(material: NewMaterial) {
    const row: Material = { id: this.generateId(), ...material };
    this.pendingMaterials.set(row.id, row);
    this.ops.push({ kind: "insert", table: "materials", row });
    return row;
  }

  insertBasePrice(price: NewBasePrice) {
    const row: BasePrice = { id: this.generateId(), ...price };
    this.ops.push({ kind: "insert", table: "base_prices", row });
    return row;
  }

  insertGrindingPrice(price: NewGrindingPrice) {
    const row: GrindingPrice = { id: this.generateId(), ...price };
    this.ops.push({ kind: "insert", table: "grinding_prices", row });
    return row;
  }

  insertFilmPrice(price: NewFilmPrice) {
    const row: FilmPrice = { id: this.generateId(), ...price };
    this.ops.push({ kind: "insert", table: "film_prices", row });
    return row;
  }

  /** A target row that no longer exists is skipped at commit. */
  setPrice(table: PricedTable, id: string, price: number) {
    this.ops.push({ kind: "set_price", table, id, price });
  }

  insertPriceChangeAudit(audit: NewPriceChangeAudit) {
    const row: PriceChangeAudit = {
      id: this.generateId(),
      ...audit,
      createdAt: this.now().toISOString(),
    };
    this.ops.push({ kind: "insert", table: "price_change_audits", row });
    return row;
  }

  insertImportExportAudit(audit: NewImportExportAudit) {
    const row: ImportExportAudit = {
      id: this.generateId(),
      ...audit,
      createdAt: this.now().toISOString(),
    };
    this.ops.push({ kind: "insert", table: "import_export_audits", row });
    return row;
  }

  get pendingOpCount() {
    return this.ops.length;
  }

  async commit() {
    const ops = this.ops;
    this.ops = [];
    this.pendingMaterials.clear();
    if (ops.length === 0) {
      return;
    }

    await this.flush(ops);
  }

  rollback() {
    this.ops = [];
    this.pendingMaterials.clear();
  }
}

/**
 * Opens a session for `work` and discards whatever it left uncommitted.
 */
export async function runInSession<T>(
  store: PriceStore,
  work: (session: PriceStoreSession) => Promise<T>
): Promise<T> {
  const session = store.openSession();
  try {
    return await work(session);
  } finally {
    session.rollback();
  }
}

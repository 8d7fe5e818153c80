import { randomUUID } from "node:crypto";
import {
  type Page,
  type PricedTable,
  type PriceStore,
  type PriceStoreOp,
  UnitOfWorkSession,
} from "../src/price-store/price-store";
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
} from "../src/price-store/price-store.queries";
import type {
  BasePrice,
  BasePriceRow,
  ExchangeRate,
  FilmPrice,
  GrindingPrice,
  ImportExportAudit,
  Material,
  MaterialGroup,
  PriceChangeAudit,
  ProcessingOption,
  ThicknessModifier,
  WidthModifier,
} from "../src/price-store/price-store.types";

export type PriceStoreData = {
  materialGroups: MaterialGroup[];
  materials: Material[];
  basePrices: BasePrice[];
  grindingPrices: GrindingPrice[];
  filmPrices: FilmPrice[];
  thicknessModifiers: ThicknessModifier[];
  widthModifiers: WidthModifier[];
  exchangeRates: ExchangeRate[];
  processingOptions: ProcessingOption[];
  priceChangeAudits: PriceChangeAudit[];
  importExportAudits: ImportExportAudit[];
};

function emptyData(): PriceStoreData {
  return {
    materialGroups: [],
    materials: [],
    basePrices: [],
    grindingPrices: [],
    filmPrices: [],
    thicknessModifiers: [],
    widthModifiers: [],
    exchangeRates: [],
    processingOptions: [],
    priceChangeAudits: [],
    importExportAudits: [],
  };
}

function setPriceIn(
  rows: Array<{ id: string; pricePlnPerKg: number }>,
  id: string,
  price: number
) {
  const row = rows.find((entry) => entry.id === id);
  if (row) {
    row.pricePlnPerKg = price;
  }
}

function paginate<T>(rows: T[], limit: number, offset: number): Page<T> {
  return {
    items: rows.slice(offset, offset + limit),
    total: rows.length,
  };
}

/**
 * Price store kept in process memory. Each session reads a snapshot taken
 * when it was opened; commit applies the queued ops to a copy of the current
 * data and swaps it in, so a failing op leaves the store untouched.
 */
export class InMemoryPriceStore implements PriceStore {
  private data: PriceStoreData;
  readonly commits: PriceStoreOp[][] = [];

  constructor(
    seed: Partial<PriceStoreData> = {},
    private readonly generateId: () => string = randomUUID,
    private readonly now: () => Date = () => new Date()
  ) {
    this.data = structuredClone({ ...emptyData(), ...seed });
  }

  openSession() {
    return new InMemoryPriceStoreSession(
      structuredClone(this.data),
      (ops) => this.apply(ops),
      this.generateId,
      this.now
    );
  }

  snapshot(): PriceStoreData {
    return structuredClone(this.data);
  }

  private apply(ops: PriceStoreOp[]) {
    const next = structuredClone(this.data);

    for (const op of ops) {
      if (op.kind === "set_price") {
        if (op.table === "base_prices") {
          setPriceIn(next.basePrices, op.id, op.price);
        } else if (op.table === "grinding_prices") {
          setPriceIn(next.grindingPrices, op.id, op.price);
        } else {
          setPriceIn(next.filmPrices, op.id, op.price);
        }
        continue;
      }

      switch (op.table) {
        case "materials":
          if (next.materials.some((material) => material.grade === op.row.grade)) {
            throw new Error(`Material ${op.row.grade} already exists`);
          }
          next.materials.push(op.row);
          break;
        case "base_prices":
          next.basePrices.push(op.row);
          break;
        case "grinding_prices":
          next.grindingPrices.push(op.row);
          break;
        case "film_prices":
          next.filmPrices.push(op.row);
          break;
        case "price_change_audits":
          next.priceChangeAudits.push(op.row);
          break;
        case "import_export_audits":
          next.importExportAudits.push(op.row);
          break;
      }
    }

    this.data = next;
    this.commits.push(ops);
  }
}

class InMemoryPriceStoreSession extends UnitOfWorkSession {
  constructor(
    private readonly data: PriceStoreData,
    private readonly onCommit: (ops: PriceStoreOp[]) => void,
    generateId: () => string,
    now: () => Date
  ) {
    super(generateId, now);
  }

  async listMaterials() {
    return [...this.data.materials];
  }

  async listMaterialGroups() {
    return [...this.data.materialGroups];
  }

  async listBasePrices(query: BasePriceQuery) {
    const rows: BasePriceRow[] = [];
    for (const price of this.data.basePrices) {
      const material = this.data.materials.find((entry) => entry.id === price.materialId);
      if (!material) {
        continue;
      }

      const group =
        this.data.materialGroups.find((entry) => entry.id === material.groupId) ?? null;
      const row: BasePriceRow = { ...price, material, group };
      if (matchesBasePriceQuery(row, query)) {
        rows.push(row);
      }
    }

    return rows.sort(compareBasePriceRows);
  }

  async listGrindingPrices(query: GrindingPriceQuery) {
    return this.data.grindingPrices
      .filter((price) => matchesGrindingPriceQuery(price, query))
      .sort(compareGrindingPrices);
  }

  async listFilmPrices(query: FilmPriceQuery) {
    return this.data.filmPrices
      .filter((price) => matchesFilmPriceQuery(price, query))
      .sort(compareFilmPrices);
  }

  async listThicknessModifiers() {
    return [...this.data.thicknessModifiers];
  }

  async listWidthModifiers() {
    return [...this.data.widthModifiers];
  }

  async findProcessingOption(grade: string, surfaceFinish: string) {
    return (
      this.data.processingOptions.find(
        (option) => option.grade === grade && option.surfaceFinish === surfaceFinish
      ) ?? null
    );
  }

  async findLatestExchangeRate(currencyFrom: string, currencyTo: string) {
    const candidates = this.data.exchangeRates
      .filter(
        (rate) =>
          rate.isActive && rate.currencyFrom === currencyFrom && rate.currencyTo === currencyTo
      )
      .sort((left, right) => right.validFrom.localeCompare(left.validFrom));

    return candidates[0] ?? null;
  }

  async listPriceChangeAudits(query: AuditHistoryQuery) {
    const rows = this.data.priceChangeAudits
      .filter((audit) => query.changeType === undefined || audit.changeType === query.changeType)
      .sort((left, right) => right.createdAt.localeCompare(left.createdAt));

    return paginate(rows, query.limit, query.offset);
  }

  async listImportExportAudits(query: ImportExportHistoryQuery) {
    const rows = this.data.importExportAudits
      .filter(
        (audit) =>
          query.operationType === undefined || audit.operationType === query.operationType
      )
      .sort((left, right) => right.createdAt.localeCompare(left.createdAt));

    return paginate(rows, query.limit, query.offset);
  }

  async priceRowExists(table: PricedTable, id: string) {
    const rows =
      table === "base_prices"
        ? this.data.basePrices
        : table === "grinding_prices"
          ? this.data.grindingPrices
          : this.data.filmPrices;
    return rows.some((row) => row.id === id);
  }

  protected async findStoredMaterialById(id: string) {
    return this.data.materials.find((material) => material.id === id) ?? null;
  }

  protected async findStoredMaterialByGrade(grade: string) {
    return this.data.materials.find((material) => material.grade === grade) ?? null;
  }

  protected async flush(ops: PriceStoreOp[]) {
    this.onCommit(ops);
  }
}

export function sequentialIds(prefix = "id") {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

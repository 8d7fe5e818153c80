import { InMemoryPriceStore } from "../../../test/in-memory-price-store";
import {
  buildBasePrice,
  buildFilmPrice,
  buildGrindingPrice,
  buildMaterial,
} from "../../../test/price-store.fixtures";
import { runInSession } from "../../price-store/price-store";
import { loadPriceIndex } from "./price-index";
import { reconcileWorkbook } from "./reconcile";
import type { SheetGrid } from "./workbook-grid";

function buildStore() {
  return new InMemoryPriceStore({
    materials: [buildMaterial({ id: "m-304", grade: "1.4301" })],
    basePrices: [
      buildBasePrice({ id: "bp-1", materialId: "m-304", pricePlnPerKg: 8.2 }),
      buildBasePrice({ id: "bp-2", materialId: "m-304", thickness: 2, pricePlnPerKg: 8 }),
    ],
    grindingPrices: [buildGrindingPrice({ id: "gp-1", provider: "CAMU", pricePlnPerKg: 2.5 })],
    filmPrices: [buildFilmPrice({ id: "fp-1", filmType: "FOLIA_ZWYKLA", pricePlnPerKg: 0.3 })],
  });
}

const WORKBOOK: SheetGrid[] = [
  {
    name: "Cennik baza",
    rows: [
      ["Gatunek", "Powierzchnia", "Grubosc", "Szerokosc", "Cena"],
      ["1.4301", "2B", 1, 1250, 8.2005],
      ["1.4301", "2B", 2, 1250, 8.5],
      ["S355JR", "HR", 3, 1500, 5.1],
      ["1.4301", "2B", 1, 1250, 9],
      ["1.4301", "2B", 1, "x", 9],
    ],
  },
  {
    name: "Cennik szlifu",
    rows: [
      ["Dostawca", "Granulacja", "Wariant szerokosci", "Z SB", "Grubosc (mm)", "Cena PLN/kg"],
      ["CAMU", "K320/K400", null, "nie", 1, 2.5],
      ["CAMU", "K320/K400", null, "tak", 1, 2.9],
    ],
  },
  {
    name: "Cennik folii",
    rows: [
      ["Typ folii", "Grubosc (mm)", "Cena PLN/kg"],
      ["FOLIA_ZWYKLA", 1, 0.25],
    ],
  },
];

describe("reconcileWorkbook", () => {
  it("classifies every priced row against the current prices", async () => {
    const index = await runInSession(buildStore(), loadPriceIndex);
    const result = reconcileWorkbook(WORKBOOK, index);

    expect(result.counts).toEqual({
      totalRows: 8,
      validRows: 6,
      errorRows: 2,
      added: 2,
      updated: 2,
      unchanged: 2,
    });
    expect(result.diffItems.map((item) => [item.sheet, item.rowNumber, item.changeType])).toEqual([
      ["Cennik baza", 3, "updated"],
      ["Cennik baza", 4, "added"],
      ["Cennik baza", 5, "error"],
      ["Cennik baza", 6, "error"],
      ["Cennik szlifu", 3, "added"],
      ["Cennik folii", 2, "updated"],
    ]);
    expect(result.errors).toEqual([
      { sheet: "Cennik baza", row: 5, error: "Duplicate row, same key as row 2" },
      { sheet: "Cennik baza", row: 6, error: "Invalid width 'x'" },
    ]);
    expect(result.warnings).toEqual([]);
  });

  it("itemizes an update with old, new and delta", async () => {
    const index = await runInSession(buildStore(), loadPriceIndex);
    const [updated] = reconcileWorkbook(WORKBOOK, index).diffItems;

    expect(updated).toEqual({
      rowNumber: 3,
      sheet: "Cennik baza",
      changeType: "updated",
      dataType: "base_price",
      grade: "1.4301",
      surfaceFinish: "2B",
      thickness: 2,
      width: 1250,
      provider: null,
      grit: null,
      widthVariant: null,
      withSb: null,
      filmType: null,
      currentPrice: 8,
      newPrice: 8.5,
      priceChange: 0.5,
      errorMessage: null,
    });
  });

  it("queues numbered pending changes", async () => {
    const index = await runInSession(buildStore(), loadPriceIndex);
    const { changes } = reconcileWorkbook(WORKBOOK, index);

    expect(changes).toEqual([
      { action: "update", dataType: "base_price", targetId: "bp-2", price: 8.5, seq: 1, applied: false },
      {
        action: "add",
        dataType: "base_price",
        grade: "S355JR",
        materialId: null,
        surfaceFinish: "HR",
        thickness: 3,
        width: 1500,
        length: 3000,
        price: 5.1,
        seq: 2,
        applied: false,
      },
      {
        action: "add",
        dataType: "grinding",
        provider: "CAMU",
        grit: "K320/K400",
        widthVariant: null,
        withSb: true,
        thickness: 1,
        price: 2.9,
        seq: 3,
        applied: false,
      },
      { action: "update", dataType: "film", targetId: "fp-1", price: 0.25, seq: 4, applied: false },
    ]);
  });

  it("diffs against the base price in force when a key has several active rows", async () => {
    const store = new InMemoryPriceStore({
      materials: [buildMaterial({ id: "m-304", grade: "1.4301" })],
      basePrices: [
        buildBasePrice({
          id: "bp-new",
          materialId: "m-304",
          pricePlnPerKg: 9,
          validFrom: "2026-01-01T00:00:00.000Z",
        }),
        buildBasePrice({
          id: "bp-old",
          materialId: "m-304",
          pricePlnPerKg: 8,
          validFrom: "2025-01-01T00:00:00.000Z",
        }),
      ],
    });
    const index = await runInSession(store, loadPriceIndex);
    const sheet = (price: number): SheetGrid[] => [
      {
        name: "Cennik baza",
        rows: [
          ["Gatunek", "Powierzchnia", "Grubosc", "Szerokosc", "Cena"],
          ["1.4301", "2B", 1, 1250, price],
        ],
      },
    ];

    expect(reconcileWorkbook(sheet(9), index).counts).toMatchObject({ updated: 0, unchanged: 1 });
    expect(reconcileWorkbook(sheet(9.5), index).changes).toEqual([
      { action: "update", dataType: "base_price", targetId: "bp-new", price: 9.5, seq: 1, applied: false },
    ]);
  });

  it("warns when no price sheet is recognised", async () => {
    const index = await runInSession(buildStore(), loadPriceIndex);
    const result = reconcileWorkbook([{ name: "Notatki", rows: [["x"]] }], index);

    expect(result.warnings).toEqual(["No price sheets recognised. Sheets in file: Notatki"]);
    expect(result.counts.totalRows).toBe(0);
    expect(result.diffItems).toEqual([]);
  });
});

import { InMemoryPriceStore, type PriceStoreData } from "../../test/in-memory-price-store";
import {
  buildBasePrice,
  buildExchangeRate,
  buildFilmPrice,
  buildGrindingPrice,
  buildMaterial,
  buildProcessingOption,
} from "../../test/price-store.fixtures";
import { BasePriceNotFoundError, MaterialNotFoundError } from "../common/errors";
import { loadAppConfig } from "../config/app-config";
import { evaluateProcessingOption } from "./processing-gate";
import { PricingService } from "./pricing.service";
import { sheetAreaM2, sheetWeightKg, standardSheetLength } from "./sheet-geometry";

const SHEET = {
  materialId: "m-304",
  surfaceFinish: "2B",
  thickness: 1,
  width: 1250,
  length: 2500,
};

function buildService(extra: Partial<PriceStoreData> = {}) {
  const store = new InMemoryPriceStore({
    materials: [
      buildMaterial({ id: "m-304", grade: "1.4301" }),
      buildMaterial({ id: "m-430", grade: "1.4016", density: 7.7 }),
    ],
    basePrices: [buildBasePrice({ id: "bp-1", materialId: "m-304", pricePlnPerKg: 8.2 })],
    grindingPrices: [
      buildGrindingPrice({ id: "g-1", provider: "CAMU", grit: "K320/K400", pricePlnPerKg: 0 }),
      buildGrindingPrice({ id: "g-2", provider: "CAMU", grit: "K240/K180", pricePlnPerKg: 0.95 }),
    ],
    filmPrices: [
      buildFilmPrice({ id: "f-1", filmType: "FOLIA_ZWYKLA", pricePlnPerKg: 0.2 }),
      buildFilmPrice({ id: "f-2", filmType: "Nitto 3100", pricePlnPerKg: 0 }),
    ],
    ...extra,
  });

  return new PricingService(store, loadAppConfig({}));
}

describe("sheet geometry", () => {
  it("computes weight from density and millimetre dimensions", () => {
    expect(sheetWeightKg(7.9, 1, 1250, 2500)).toBeCloseTo(24.6875, 10);
    expect(sheetAreaM2(1250, 2500)).toBe(3.125);
  });

  it("maps standard widths to their sheet length", () => {
    expect(standardSheetLength(1500)).toBe(3000);
    expect(standardSheetLength(2000)).toBe(6000);
    expect(standardSheetLength(1100)).toBe(2200);
  });
});

describe("evaluateProcessingOption", () => {
  it("checks thickness before width before the grinding flag", () => {
    const option = buildProcessingOption({
      id: "po-1",
      thicknessMax: 0.8,
      widthMax: 1000,
      grindingAllowed: false,
    });

    expect(evaluateProcessingOption(option, 1, 1250, true)).toEqual({
      allowed: false,
      note: "Grubość powyżej maksimum (0.8mm)",
    });
    expect(evaluateProcessingOption(option, 0.5, 1250, true)).toEqual({
      allowed: false,
      note: "Szerokość powyżej maksimum (1000mm)",
    });
    expect(evaluateProcessingOption(option, 0.5, 1000, true)).toEqual({
      allowed: false,
      note: "Szlifowanie niedostępne",
    });
    expect(evaluateProcessingOption(option, 0.5, 1000, false)).toEqual({ allowed: true, note: null });
  });
});

describe("PricingService.computePrice", () => {
  it("prices the bare sheet with the default exchange rate", async () => {
    const service = buildService();

    const breakdown = await service.computePrice(SHEET);

    expect(breakdown).toMatchObject({
      basePricePlnPerKg: 8.2,
      filmCostPlnPerKg: 0,
      grindingCostPlnPerKg: 0,
      totalPricePlnPerKg: 8.2,
      totalPriceEurPerKg: 1.8721,
      exchangeRate: 4.38,
      weightKg: 24.688,
      areaM2: 3.125,
      sheetPricePln: 202.44,
      sheetPriceEur: 46.22,
      pricePerM2Pln: 64.78,
      film: { status: "not_requested", cost: 0 },
      grinding: { status: "not_requested", cost: 0 },
      unappliedModifiers: [],
      notes: null,
    });
  });

  it("adds available film and grinding surcharges", async () => {
    const service = buildService({
      exchangeRates: [
        buildExchangeRate({ id: "r-1", rate: 4.2, validFrom: "2026-01-01T00:00:00.000Z" }),
        buildExchangeRate({ id: "r-2", rate: 4.3, validFrom: "2026-02-01T00:00:00.000Z" }),
        buildExchangeRate({
          id: "r-3",
          rate: 5,
          validFrom: "2026-05-01T00:00:00.000Z",
          isActive: false,
        }),
      ],
    });

    const breakdown = await service.computePrice({
      ...SHEET,
      filmType: "FOLIA_ZWYKLA",
      grinding: { provider: "CAMU", grit: "K240/K180" },
    });

    expect(breakdown.totalPricePlnPerKg).toBe(9.35);
    expect(breakdown.exchangeRate).toBe(4.3);
    expect(breakdown.totalPriceEurPerKg).toBe(2.1744);
    expect(breakdown.film).toEqual({ status: "applied", cost: 0.2 });
    expect(breakdown.grinding).toEqual({ status: "applied", cost: 0.95 });
    expect(breakdown.configuration).toEqual({
      material: "1.4301",
      surface: "2B",
      film: "FOLIA_ZWYKLA",
      grinding: "CAMU",
      grit: "K240/K180",
      widthVariant: null,
      withSb: false,
    });
  });

  it("keeps a disabled grinding combination at zero cost without failing", async () => {
    const service = buildService();

    const breakdown = await service.computePrice({
      ...SHEET,
      grinding: { provider: "CAMU", grit: "K320/K400" },
    });

    expect(breakdown.grindingCostPlnPerKg).toBe(0);
    expect(breakdown.totalPricePlnPerKg).toBe(8.2);
    expect(breakdown.grinding).toEqual({ status: "unavailable", cost: 0, reason: "blocked" });
    expect(breakdown.configuration.grinding).toBeNull();
  });

  it("reports a blocked film the same way", async () => {
    const service = buildService();

    const breakdown = await service.computePrice({ ...SHEET, filmType: "Nitto 3100" });

    expect(breakdown.film).toEqual({ status: "unavailable", cost: 0, reason: "blocked" });
    expect(breakdown.filmCostPlnPerKg).toBe(0);
  });

  it("short-circuits on a processing rule that forbids grinding", async () => {
    const service = buildService({
      processingOptions: [
        buildProcessingOption({
          id: "po-1",
          grade: "1.4301",
          surfaceFinish: "2B",
          grindingAllowed: false,
        }),
      ],
    });

    const breakdown = await service.computePrice({
      ...SHEET,
      filmType: "FOLIA_ZWYKLA",
      grinding: { provider: "CAMU", grit: "K240/K180" },
    });

    expect(breakdown.totalPricePlnPerKg).toBe(8.2);
    expect(breakdown.notes).toBe("Szlifowanie niedostępne");
    expect(breakdown.grinding).toEqual({ status: "blocked", cost: 0, note: "Szlifowanie niedostępne" });
    expect(breakdown.film).toEqual({ status: "blocked", cost: 0, note: "Szlifowanie niedostępne" });
  });

  it("uses the active base price with the latest validity start", async () => {
    const service = buildService({
      basePrices: [
        buildBasePrice({ id: "bp-old", materialId: "m-304", pricePlnPerKg: 8.2 }),
        buildBasePrice({
          id: "bp-new",
          materialId: "m-304",
          pricePlnPerKg: 8.5,
          validFrom: "2026-03-01T00:00:00.000Z",
          notes: "cena marcowa",
        }),
        buildBasePrice({
          id: "bp-off",
          materialId: "m-304",
          pricePlnPerKg: 9,
          validFrom: "2026-06-01T00:00:00.000Z",
          isActive: false,
        }),
      ],
    });

    const breakdown = await service.computePrice(SHEET);

    expect(breakdown.basePricePlnPerKg).toBe(8.5);
    expect(breakdown.notes).toBe("cena marcowa");
  });

  it("lists matching modifiers without adding them", async () => {
    const service = buildService({
      thicknessModifiers: [
        {
          id: "tm-1",
          grade: "1.4301",
          surfaceFinish: "2B",
          baseWidth: 1000,
          thickness: 1,
          priceModifier: 0.3,
        },
      ],
      widthModifiers: [
        { id: "wm-1", grade: null, width: 1250, priceModifier: 0.1 },
        { id: "wm-2", grade: "1.4016", width: 1250, priceModifier: 0.5 },
      ],
    });

    const breakdown = await service.computePrice(SHEET);

    expect(breakdown.totalPricePlnPerKg).toBe(8.2);
    expect(breakdown.unappliedModifiers).toEqual([
      { kind: "thickness", id: "tm-1", baseWidth: 1000, priceModifier: 0.3 },
      { kind: "width", id: "wm-1", grade: null, priceModifier: 0.1 },
    ]);
  });

  it("fails for an unknown material", async () => {
    const service = buildService();

    await expect(service.computePrice({ ...SHEET, materialId: "missing" })).rejects.toBeInstanceOf(
      MaterialNotFoundError
    );
  });

  it("fails when no base price exists for the exact width", async () => {
    const service = buildService();

    const attempt = service.computePrice({ ...SHEET, width: 1500, length: 3000 });

    await expect(attempt).rejects.toBeInstanceOf(BasePriceNotFoundError);
    await expect(attempt).rejects.toThrow("No base price for 1.4301 2B 1mm x 1500mm");
  });
});

describe("PricingService lookups", () => {
  it("lists only priced processing options for a thickness", async () => {
    const service = buildService();

    await expect(service.getAvailableOptions("m-304", "2B", 1)).resolves.toEqual({
      processingAllowed: true,
      notes: null,
      films: [{ type: "FOLIA_ZWYKLA", pricePlnPerKg: 0.2 }],
      grindings: [
        {
          provider: "CAMU",
          grit: "K240/K180",
          widthVariant: null,
          withSb: false,
          pricePlnPerKg: 0.95,
        },
      ],
    });
  });

  it("returns the price table with EUR values", async () => {
    const service = buildService();

    const rows = await service.getPriceTable({ grade: "1.4301" });

    expect(rows).toEqual([
      {
        id: "bp-1",
        materialId: "m-304",
        materialName: "Materiał 1.4301",
        grade: "1.4301",
        category: "stal_nierdzewna",
        surfaceFinish: "2B",
        thickness: 1,
        width: 1250,
        length: 2500,
        pricePlnPerKg: 8.2,
        priceEurPerKg: 1.8721,
        notes: null,
      },
    ]);
  });
});

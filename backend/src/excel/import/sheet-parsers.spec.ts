import { parseBasePriceSheet } from "./base-price-sheet";
import { parseFilmSheet } from "./film-sheet";
import {
  type LegacyParserState,
  nextLegacyState,
  parseGrindingSheet,
} from "./grinding-sheet";

describe("parseBasePriceSheet", () => {
  it("reads rows through header synonyms and fills the standard length", () => {
    const parsed = parseBasePriceSheet({
      name: "Cennik baza",
      rows: [
        ["Gatunek", "Powierzchnia", "Grubosc", "Szerokosc", "Cena PLN/kg"],
        ["1.4301", "2B", 1, 1250, 8.2],
        ["1.4301", "2B", "abc", 1250, 8],
        [null, "2B", 1, 1250, 5],
        ["DC01", "HR", 2, 1500, null],
        ["DC01", "HR", "2,5", 1500, "4,15"],
      ],
    });

    expect(parsed.warnings).toEqual([]);
    expect(parsed.entries).toEqual([
      {
        ok: true,
        rowNumber: 2,
        value: { grade: "1.4301", surfaceFinish: "2B", thickness: 1, width: 1250, length: 2500, price: 8.2 },
      },
      { ok: false, rowNumber: 3, error: "Invalid thickness 'abc'" },
      {
        ok: true,
        rowNumber: 6,
        value: { grade: "DC01", surfaceFinish: "HR", thickness: 2.5, width: 1500, length: 3000, price: 4.15 },
      },
    ]);
  });

  it("warns and skips the sheet without a grade column", () => {
    const parsed = parseBasePriceSheet({
      name: "Arkusz1",
      rows: [["Material name", "Cena"], ["1.4301", 8.2]],
    });

    expect(parsed.entries).toEqual([]);
    expect(parsed.warnings).toEqual(["Arkusz1: no grade column found. Headers: Material name, Cena"]);
  });

  it("warns and skips the sheet when a required column is missing", () => {
    const parsed = parseBasePriceSheet({
      name: "Cennik baza",
      rows: [
        ["Gatunek", "Grubosc", "Cena"],
        ["1.4301", 1, 8.2],
        ["1.4404", 1, 12],
      ],
    });

    expect(parsed.entries).toEqual([]);
    expect(parsed.warnings).toEqual(["Cennik baza: missing required columns: surfaceFinish, width"]);
  });
});

describe("grinding legacy layout state machine", () => {
  it("opens a section on a provider name", () => {
    const state = nextLegacyState({ kind: "idle" }, ["COSTA", null]);
    expect(state).toEqual({ kind: "awaiting_header", provider: "COSTA" });
  });

  it("ignores grit headers outside a section", () => {
    const idle: LegacyParserState = { kind: "idle" };
    expect(nextLegacyState(idle, [null, "K320/K400"])).toBe(idle);
  });

  it("keeps the column map across price rows", () => {
    const reading = nextLegacyState({ kind: "awaiting_header", provider: "CAMU" }, [null, "k80/k120"]);
    expect(reading).toEqual({
      kind: "reading_prices",
      provider: "CAMU",
      columns: [{ index: 1, grit: "K80/K120", widthVariant: null, withSb: false }],
    });
    expect(nextLegacyState(reading, [1, 2.1])).toBe(reading);
  });
});

describe("parseGrindingSheet", () => {
  it("walks provider sections of the legacy layout", () => {
    const parsed = parseGrindingSheet({
      name: "Dane szlif",
      rows: [
        ["Cennik szlifowania 2026", null, null, null],
        ["CAMU", null, null, null],
        [null, "K320/K400", "K240/K180+SB", "SB"],
        [1, 2.5, 3.1, 0.8],
        ["1,5", 0, null, "abc"],
        ["BORYS", null, null, null],
        [null, "x1000/1250/1500", "x2000", null],
        [2, 1.9, 2.4, null],
      ],
    });

    expect(parsed.warnings).toEqual([]);
    expect(parsed.entries).toEqual([
      {
        ok: true,
        rowNumber: 4,
        value: { provider: "CAMU", grit: "K320/K400", widthVariant: null, withSb: false, thickness: 1, price: 2.5 },
      },
      {
        ok: true,
        rowNumber: 4,
        value: { provider: "CAMU", grit: "K240/K180", widthVariant: null, withSb: true, thickness: 1, price: 3.1 },
      },
      {
        ok: true,
        rowNumber: 4,
        value: { provider: "CAMU", grit: null, widthVariant: null, withSb: true, thickness: 1, price: 0.8 },
      },
      {
        ok: true,
        rowNumber: 5,
        value: { provider: "CAMU", grit: "K320/K400", widthVariant: null, withSb: false, thickness: 1.5, price: 0 },
      },
      { ok: false, rowNumber: 5, error: "Invalid price 'abc'" },
      {
        ok: true,
        rowNumber: 8,
        value: {
          provider: "BORYS",
          grit: null,
          widthVariant: "x1000/1250/1500",
          withSb: false,
          thickness: 2,
          price: 1.9,
        },
      },
      {
        ok: true,
        rowNumber: 8,
        value: { provider: "BORYS", grit: null, widthVariant: "x2000", withSb: false, thickness: 2, price: 2.4 },
      },
    ]);
  });

  it("reads the exported table layout", () => {
    const parsed = parseGrindingSheet({
      name: "Cennik szlifu",
      rows: [
        ["Dostawca", "Granulacja", "Wariant szerokosci", "Z SB", "Grubosc (mm)", "Cena PLN/kg"],
        ["camu", "K80/K120", null, "tak", 0.8, 1.75],
        ["XYZ", "K80/K120", null, "nie", 1, 2],
        ["BABCIA", "K320/K400", null, "nie", 1, null],
        ["COSTA", "K320/K400", null, null, 0, 3],
      ],
    });

    expect(parsed.entries).toEqual([
      {
        ok: true,
        rowNumber: 2,
        value: { provider: "CAMU", grit: "K80/K120", widthVariant: null, withSb: true, thickness: 0.8, price: 1.75 },
      },
      { ok: false, rowNumber: 3, error: "Unknown grinding provider 'XYZ'" },
      { ok: false, rowNumber: 5, error: "thickness must be greater than 0, got 0" },
    ]);
  });

  it("skips an exported table without a thickness column", () => {
    const parsed = parseGrindingSheet({
      name: "Cennik szlifu",
      rows: [
        ["Dostawca", "Granulacja", "Cena PLN/kg"],
        ["CAMU", "K80/K120", 1.75],
      ],
    });

    expect(parsed.entries).toEqual([]);
    expect(parsed.warnings).toEqual(["Cennik szlifu: missing required columns: thickness"]);
  });

  it("warns when no section is found", () => {
    const parsed = parseGrindingSheet({ name: "Szlif", rows: [["nic tu nie ma"]] });
    expect(parsed.warnings).toEqual(["Szlif: no grinding price sections found"]);
  });
});

describe("parseFilmSheet", () => {
  it("maps legacy film headers to film types", () => {
    const parsed = parseFilmSheet({
      name: "Dane folia",
      rows: [
        ["Grubość", "cena FZ", "cena FF", "Novacel 4228", "uwagi"],
        [0.5, 0.35, 0.42, null, "x"],
        ["razem", 1, 1, 1, null],
        [1, 0.3, -0.1, 0.9, null],
      ],
    });

    expect(parsed.entries).toEqual([
      { ok: true, rowNumber: 2, value: { filmType: "FOLIA_ZWYKLA", thickness: 0.5, price: 0.35 } },
      { ok: true, rowNumber: 2, value: { filmType: "FOLIA_FIBER", thickness: 0.5, price: 0.42 } },
      { ok: true, rowNumber: 4, value: { filmType: "FOLIA_ZWYKLA", thickness: 1, price: 0.3 } },
      { ok: false, rowNumber: 4, error: "price cannot be negative, got -0.1" },
      { ok: true, rowNumber: 4, value: { filmType: "Novacel 4228", thickness: 1, price: 0.9 } },
    ]);
  });

  it("reads the exported table layout", () => {
    const parsed = parseFilmSheet({
      name: "Cennik folii",
      rows: [
        ["Typ folii", "Grubosc (mm)", "Cena PLN/kg"],
        ["nitto 3100", 1, 0.55],
        ["FOLIA X", 1, 1],
      ],
    });

    expect(parsed.entries).toEqual([
      { ok: true, rowNumber: 2, value: { filmType: "Nitto 3100", thickness: 1, price: 0.55 } },
      { ok: false, rowNumber: 3, error: "Unknown film type 'FOLIA X'" },
    ]);
  });

  it("skips an exported table without a thickness column", () => {
    const parsed = parseFilmSheet({
      name: "Cennik folii",
      rows: [
        ["Typ folii", "Cena PLN/kg"],
        ["Nitto 3100", 0.55],
      ],
    });

    expect(parsed.entries).toEqual([]);
    expect(parsed.warnings).toEqual(["Cennik folii: missing required columns: thickness"]);
  });

  it("warns when the legacy header row is missing", () => {
    const parsed = parseFilmSheet({ name: "Folia", rows: [["Grubość", "Cena"], [1, 2]] });
    expect(parsed.entries).toEqual([]);
    expect(parsed.warnings).toEqual(["Folia: no film headers found"]);
  });
});

import { InMemoryPriceStore, sequentialIds } from "../../test/in-memory-price-store";
import { buildBasePrice, buildMaterial } from "../../test/price-store.fixtures";
import { describeNewMaterial } from "./material-catalogue";

describe("UnitOfWorkSession", () => {
  const seed = {
    materials: [buildMaterial({ id: "m-1", grade: "1.4301" })],
    basePrices: [buildBasePrice({ id: "bp-1", materialId: "m-1", pricePlnPerKg: 8.2 })],
  };

  it("queues writes until commit", async () => {
    const store = new InMemoryPriceStore(seed, sequentialIds("new"));
    const session = store.openSession();

    session.setPrice("base_prices", "bp-1", 9.1);
    const material = session.insertMaterial(describeNewMaterial("S355JR"));

    expect(material.id).toBe("new-1");
    expect(session.pendingOpCount).toBe(2);
    expect(store.snapshot().basePrices[0]?.pricePlnPerKg).toBe(8.2);

    await session.commit();

    const data = store.snapshot();
    expect(data.basePrices[0]?.pricePlnPerKg).toBe(9.1);
    expect(data.materials.map((entry) => entry.grade)).toEqual(["1.4301", "S355JR"]);
    expect(session.pendingOpCount).toBe(0);
  });

  it("sees materials inserted earlier in the same session", async () => {
    const store = new InMemoryPriceStore(seed, sequentialIds("new"));
    const session = store.openSession();

    const inserted = session.insertMaterial(describeNewMaterial("DC01"));

    await expect(session.findMaterialByGrade("DC01")).resolves.toEqual(inserted);
    await expect(session.findMaterialById("new-1")).resolves.toEqual(inserted);
    await expect(session.findMaterialByGrade("1.4301")).resolves.toMatchObject({ id: "m-1" });
  });

  it("drops queued writes on rollback", async () => {
    const store = new InMemoryPriceStore(seed);
    const session = store.openSession();

    session.setPrice("base_prices", "bp-1", 1);
    session.rollback();
    await session.commit();

    expect(store.snapshot().basePrices[0]?.pricePlnPerKg).toBe(8.2);
    expect(store.commits).toHaveLength(0);
  });

  it("leaves the store untouched when one queued write fails", async () => {
    const store = new InMemoryPriceStore(seed);
    const session = store.openSession();

    session.setPrice("base_prices", "bp-1", 9.9);
    session.insertMaterial(describeNewMaterial("1.4301"));

    await expect(session.commit()).rejects.toThrow("Material 1.4301 already exists");
    expect(store.snapshot().basePrices[0]?.pricePlnPerKg).toBe(8.2);
  });

  it("skips a price update whose row is gone", async () => {
    const store = new InMemoryPriceStore(seed);
    const session = store.openSession();

    await expect(session.priceRowExists("base_prices", "bp-1")).resolves.toBe(true);
    await expect(session.priceRowExists("base_prices", "missing")).resolves.toBe(false);

    session.setPrice("base_prices", "missing", 1);
    session.setPrice("base_prices", "bp-1", 9.9);
    await session.commit();

    expect(store.snapshot().basePrices[0]?.pricePlnPerKg).toBe(9.9);
  });
});

describe("describeNewMaterial", () => {
  it("uses the catalogue entry for a known grade", () => {
    expect(describeNewMaterial("S355JR")).toEqual({
      name: "Stal konstrukcyjna S355JR",
      category: "stal_czarna",
      density: 7.85,
      grade: "S355JR",
      groupId: null,
      displayOrder: 0,
      isActive: true,
    });
  });

  it("defaults unknown grades to stainless", () => {
    expect(describeNewMaterial("X-99")).toMatchObject({
      name: "Materiał X-99",
      category: "stal_nierdzewna",
      density: 7.9,
    });
  });
});

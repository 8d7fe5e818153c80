import { readFile } from "node:fs/promises";
import { join } from "node:path";

const MIGRATION = join(__dirname, "../supabase/migrations/0001_price_store.sql");

function squash(sql: string) {
  return sql.replace(/\s+/g, " ");
}

describe("price store migration", () => {
  it("allows one active base price per key and validity start", async () => {
    const sql = squash(await readFile(MIGRATION, "utf8"));

    expect(sql).toContain(
      "create unique index if not exists base_prices_active_key_idx on base_prices (material_id, surface_finish, thickness, width, valid_from) where is_active;"
    );
  });

  it("lets a price update on a missing row pass", async () => {
    const sql = squash(await readFile(MIGRATION, "utf8"));
    const setPrice = sql.slice(sql.indexOf("if op ->> 'kind' = 'set_price'"), sql.indexOf("elsif op ->> 'kind' = 'insert'"));

    expect(setPrice).toContain("update %I set price_pln_per_kg = $1 where id = $2");
    expect(setPrice).not.toContain("row_count");
  });
});

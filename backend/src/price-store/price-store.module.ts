import { Module } from "@nestjs/common";
import { PRICE_STORE } from "./price-store";
import { SupabasePriceStore } from "./supabase-price-store";

@Module({
  providers: [
    {
      provide: PRICE_STORE,
      useClass: SupabasePriceStore,
    },
  ],
  exports: [PRICE_STORE],
})
export class PriceStoreModule {}

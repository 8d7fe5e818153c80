import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/auth.module";
import { PriceStoreModule } from "../price-store/price-store.module";
import { BulkPricingController } from "./bulk-pricing.controller";
import { BulkPricingService } from "./bulk-pricing.service";

@Module({
  imports: [AuthModule, PriceStoreModule],
  controllers: [BulkPricingController],
  providers: [BulkPricingService]
})
export class BulkPricingModule {}

import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/auth.module";
import { PriceStoreModule } from "../price-store/price-store.module";
import { PricingController } from "./pricing.controller";
import { PricingService } from "./pricing.service";

@Module({
  imports: [AuthModule, PriceStoreModule],
  controllers: [PricingController],
  providers: [PricingService],
  exports: [PricingService]
})
export class PricingModule {}

import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/auth.module";
import { PriceStoreModule } from "../price-store/price-store.module";
import { AvailabilityController } from "./availability.controller";
import { AvailabilityService } from "./availability.service";

@Module({
  imports: [AuthModule, PriceStoreModule],
  controllers: [AvailabilityController],
  providers: [AvailabilityService],
  exports: [AvailabilityService]
})
export class AvailabilityModule {}

import { Module } from "@nestjs/common";
import { AuthModule } from "./auth/auth.module";
import { AvailabilityModule } from "./availability/availability.module";
import { BulkPricingModule } from "./bulk-pricing/bulk-pricing.module";
import { AppConfigModule } from "./config/app-config.module";
import { ExcelModule } from "./excel/excel.module";
import { HealthController } from "./health/health.controller";
import { PricingModule } from "./pricing/pricing.module";
import { SupabaseModule } from "./supabase/supabase.module";

@Module({
  imports: [
    AppConfigModule,
    SupabaseModule,
    AuthModule,
    AvailabilityModule,
    PricingModule,
    BulkPricingModule,
    ExcelModule
  ],
  controllers: [HealthController]
})
export class AppModule {}

import { Body, Controller, Get, HttpCode, Post, Query, UseGuards } from "@nestjs/common";
import { SupabaseAuthGuard } from "../auth/supabase-auth.guard";
import { CalculatePriceDto } from "./dto/calculate-price.dto";
import { AvailableOptionsQueryDto, PriceTableQueryDto } from "./dto/price-table-query.dto";
import { PricingService } from "./pricing.service";

@Controller("prices")
@UseGuards(SupabaseAuthGuard)
export class PricingController {
  constructor(private readonly pricingService: PricingService) {}

  @Post("calculate")
  @HttpCode(200)
  async calculate(@Body() payload: CalculatePriceDto) {
    return this.pricingService.computePrice(payload);
  }

  @Get("table")
  async table(@Query() query: PriceTableQueryDto) {
    return this.pricingService.getPriceTable(query);
  }

  @Get("options")
  async options(@Query() query: AvailableOptionsQueryDto) {
    return this.pricingService.getAvailableOptions(query.materialId, query.surfaceFinish, query.thickness);
  }
}

import { Body, Controller, Get, HttpCode, Post, Query, Req, UseGuards } from "@nestjs/common";
import { type AuthenticatedRequest, SupabaseAuthGuard } from "../auth/supabase-auth.guard";
import type { BulkChange } from "./bulk-pricing.types";
import { BulkPricingService } from "./bulk-pricing.service";
import {
  AuditHistoryQueryDto,
  type BulkPriceChangeDto,
  BulkPriceApplyDto,
  BulkPricePreviewDto,
  FilterOptionsQueryDto,
} from "./dto/bulk-price-change.dto";

const DEFAULT_ROUND_TO = 2;

function toBulkChange(payload: BulkPriceChangeDto): BulkChange {
  return {
    filters: payload.filters,
    changeType: payload.changeType,
    changeValue: payload.changeValue,
    roundTo: payload.roundTo ?? DEFAULT_ROUND_TO,
  };
}

@Controller("bulk-prices")
@UseGuards(SupabaseAuthGuard)
export class BulkPricingController {
  constructor(private readonly bulkPricingService: BulkPricingService) {}

  @Post("preview")
  @HttpCode(200)
  async preview(@Body() payload: BulkPricePreviewDto) {
    return this.bulkPricingService.previewBulkChange(
      toBulkChange(payload),
      payload.page ?? 1,
      payload.perPage ?? 50
    );
  }

  @Post("apply")
  @HttpCode(200)
  async apply(@Body() payload: BulkPriceApplyDto, @Req() req: AuthenticatedRequest) {
    return this.bulkPricingService.applyBulkChange(
      toBulkChange(payload),
      req.actingUser,
      payload.notes
    );
  }

  @Get("filter-options")
  async filterOptions(@Query() query: FilterOptionsQueryDto) {
    return this.bulkPricingService.filterOptions(query);
  }

  @Get("audit")
  async audit(@Query() query: AuditHistoryQueryDto) {
    return this.bulkPricingService.getAuditHistory(query.limit ?? 20, query.offset ?? 0, query.changeType);
  }
}

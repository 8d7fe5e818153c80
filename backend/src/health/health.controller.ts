import { Controller, Get, Inject } from "@nestjs/common";
import { APP_CONFIG, type AppConfig } from "../config/app-config";
import { SupabaseService } from "../supabase/supabase.service";

@Controller("health")
export class HealthController {
  constructor(
    private readonly supabaseService: SupabaseService,
    @Inject(APP_CONFIG) private readonly config: AppConfig
  ) {}

  @Get()
  health() {
    return {
      status: "ok",
      service: "price-engine",
      pendingImportStore: this.config.pendingImportStore,
      uptimeSeconds: Math.round(process.uptime()),
      checkedAt: new Date().toISOString()
    };
  }

  /** Counts materials to prove the price store answers. */
  @Get("db")
  async priceStore() {
    return this.supabaseService.ping();
  }
}

import type { Provider } from "@nestjs/common";
import { APP_CONFIG, type AppConfig } from "../../config/app-config";
import { SupabaseService } from "../../supabase/supabase.service";
import {
  MemoryPendingImportStore,
  PENDING_IMPORT_STORE,
  type PendingImportStore,
} from "./pending-import.store";
import { SupabasePendingImportStore } from "./supabase-pending-import.store";

export const pendingImportStoreProvider: Provider = {
  provide: PENDING_IMPORT_STORE,
  inject: [APP_CONFIG, SupabaseService],
  useFactory: (config: AppConfig, supabaseService: SupabaseService): PendingImportStore =>
    config.pendingImportStore === "supabase"
      ? new SupabasePendingImportStore(supabaseService)
      : new MemoryPendingImportStore(),
};

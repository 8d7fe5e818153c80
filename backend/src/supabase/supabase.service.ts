import { Inject, Injectable } from "@nestjs/common";
import { createClient, SupabaseClient } from "@supabase/supabase-js";
import type { User } from "@supabase/supabase-js";
import { APP_CONFIG, type AppConfig } from "../config/app-config";

@Injectable()
export class SupabaseService {
  private readonly client: SupabaseClient;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    if (!config.supabaseUrl || !config.supabaseServiceRoleKey) {
      throw new Error("Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY in backend .env");
    }

    this.client = createClient(config.supabaseUrl, config.supabaseServiceRoleKey, {
      auth: { persistSession: false },
    });
  }

  get db() {
    return this.client;
  }

  async ping() {
    const { count, error } = await this.client
      .from("materials")
      .select("id", { count: "exact", head: true });

    if (error) {
      return {
        ok: false,
        error: error.message
      };
    }

    return {
      ok: true,
      materialCount: count ?? 0
    };
  }

  async getUserFromAccessToken(accessToken: string): Promise<User | null> {
    const { data, error } = await this.client.auth.getUser(accessToken);

    if (error || !data.user) {
      return null;
    }

    return data.user;
  }
}

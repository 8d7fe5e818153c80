export const APP_CONFIG = Symbol("APP_CONFIG");

export type PendingImportStoreKind = "memory" | "supabase";

export type AppConfig = {
  port: number;
  corsOrigin: string;
  supabaseUrl: string | null;
  supabaseServiceRoleKey: string | null;
  defaultExchangeRate: number;
  pendingImportStore: PendingImportStoreKind;
  pendingImportTtlMinutes: number;
  importPreviewPageSize: number;
  uploadMaxBytes: number;
};

type Env = Record<string, string | undefined>;

function readText(env: Env, key: string) {
  const value = env[key]?.trim();
  return value ? value : null;
}

function readPositiveNumber(env: Env, key: string, fallback: number) {
  const raw = readText(env, key);
  if (raw === null) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${key} must be a positive number, got '${raw}'`);
  }

  return value;
}

function readPositiveInteger(env: Env, key: string, fallback: number) {
  const value = readPositiveNumber(env, key, fallback);
  if (!Number.isInteger(value)) {
    throw new Error(`${key} must be an integer, got '${value}'`);
  }

  return value;
}

function readPendingImportStore(env: Env): PendingImportStoreKind {
  const raw = readText(env, "PENDING_IMPORT_STORE") ?? "memory";
  if (raw !== "memory" && raw !== "supabase") {
    throw new Error(`PENDING_IMPORT_STORE must be 'memory' or 'supabase', got '${raw}'`);
  }

  return raw;
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    port: readPositiveInteger(env, "PORT", 4000),
    corsOrigin: readText(env, "CORS_ORIGIN") ?? "http://localhost:5173",
    supabaseUrl: readText(env, "SUPABASE_URL"),
    supabaseServiceRoleKey: readText(env, "SUPABASE_SERVICE_ROLE_KEY"),
    defaultExchangeRate: readPositiveNumber(env, "DEFAULT_EXCHANGE_RATE", 4.38),
    pendingImportStore: readPendingImportStore(env),
    pendingImportTtlMinutes: readPositiveNumber(env, "PENDING_IMPORT_TTL_MINUTES", 60),
    importPreviewPageSize: readPositiveInteger(env, "IMPORT_PREVIEW_PAGE_SIZE", 50),
    uploadMaxBytes: readPositiveInteger(env, "UPLOAD_MAX_BYTES", 50 * 1024 * 1024),
  };

  return Object.freeze(config);
}

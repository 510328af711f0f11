export type DatabaseType = "mysql" | "better-sqlite3";

function databaseType(value: string | undefined): DatabaseType {
  return value === "better-sqlite3" ? "better-sqlite3" : "mysql";
}

/** Parses a numeric variable, keeping an explicit 0; unset or non-numeric gives the fallback. */
export function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export default class Settings {
  // ============================================
  // APPLICATION
  // ============================================
  static readonly NODE_ENV = process.env.NODE_ENV || "development";
  static readonly PORT = Number(process.env.PORT) || 3000;

  // ============================================
  // DATABASE
  // ============================================
  static readonly DB_TYPE: DatabaseType = databaseType(process.env.DB_TYPE);
  static readonly DB_HOST = process.env.DB_HOST || "localhost";
  static readonly DB_PORT = Number(process.env.DB_PORT) || 3306;
  static readonly DB_USER = process.env.DB_USER || "db_user";
  static readonly DB_PASSWORD = process.env.DB_PASSWORD || "password";
  // file path (or ":memory:") when DB_TYPE is better-sqlite3
  static readonly DB_NAME = process.env.DB_NAME || "workforce_db";
  static readonly DB_LOGGING = process.env.DB_LOGGING === "true";

  // ============================================
  // REDIS
  // ============================================
  static readonly REDIS_HOST = process.env.REDIS_HOST || "localhost";
  static readonly REDIS_PORT = Number(process.env.REDIS_PORT) || 6379;
  static readonly REDIS_PASSWORD = process.env.REDIS_PASSWORD || undefined;
  static readonly REDIS_DB = Number(process.env.REDIS_DB) || 0;

  static readonly CACHE_TTL = Number(process.env.CACHE_TTL) || 60;
  static readonly IDEMPOTENCY_TTL = Number(process.env.IDEMPOTENCY_TTL) || 86400;

  // ============================================
  // ADMIN PANEL
  // ============================================
  static readonly ADMIN_EMAIL = process.env.ADMIN_EMAIL || "admin@example.com";
  static readonly ADMIN_PASSWORD = process.env.ADMIN_PASSWORD || "change-me";
  static readonly ADMIN_SESSION_TTL = Number(process.env.ADMIN_SESSION_TTL) || 3600;

  // ============================================
  // FINANCE
  // ============================================
  static readonly TARGET_PROFIT_MARGIN = numberFromEnv(process.env.TARGET_PROFIT_MARGIN, 0.1);

  // ============================================
  // AI INSIGHTS
  // ============================================
  static readonly INSIGHTS_API_KEY = process.env.INSIGHTS_API_KEY || "";
  static readonly INSIGHTS_API_URL =
    process.env.INSIGHTS_API_URL || "https://api.groq.com/openai/v1/chat/completions";
  static readonly INSIGHTS_MODEL = process.env.INSIGHTS_MODEL || "llama3-70b-8192";
  static readonly INSIGHTS_TIMEOUT_MS = 10000;

  // ============================================
  // MAIL
  // ============================================
  static readonly SMTP_HOST = process.env.SMTP_HOST || "smtp.gmail.com";
  static readonly SMTP_PORT = Number(process.env.SMTP_PORT) || 465;
  static readonly SMTP_USER = process.env.SMTP_USER || "";
  static readonly SMTP_PASSWORD = process.env.SMTP_PASSWORD || "";
  static readonly LEAVE_NOTIFY_TO = process.env.LEAVE_NOTIFY_TO || process.env.SMTP_USER || "";
}

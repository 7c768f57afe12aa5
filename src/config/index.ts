import { DEFAULT_UTC_OFFSET_HOURS } from "../core/selectors/date-wheel-selector";
import { DEFAULT_PAGE_LENGTH } from "../core/selectors/paginated-selector";
import { DEFAULT_DRAIN_INTERVAL_MS } from "../services/record-sink";
import { parseEnvBool, parseEnvFloat, parseEnvInt, parseEnvString, type Env } from "./env";

const SHA256_HEX_PATTERN = /^[0-9a-f]{64}$/i;

export interface SheetConfig {
  credentialsPath: string;
  spreadsheetId: string;
  dataTab: string;
  registerTab: string;
  staffColumn: string;
  courseColumn: string;
  codeColumn: string;
  insertRow: number;
}

export interface AppConfig {
  telegramToken: string;
  authSecretHash: string;
  sheet: SheetConfig;
  selectorPageSize: number;
  utcOffsetHours: number;
  drainIntervalMs: number;
  sessionIdleTtlMs: number;
  auditLogPath: string;
  auditLogJson: boolean;
}

export class ConfigError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.missing = missing;
  }
}

/**
 * Read configuration from the environment.
 * @throws ConfigError when a required value is absent or malformed
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const telegramToken = parseEnvString(env, "TELEGRAM_BOT_TOKEN");
  const authSecretHash = parseEnvString(env, "AUTH_SECRET_HASH").toLowerCase();
  const spreadsheetId = parseEnvString(env, "SPREADSHEET_ID");

  const missing = [
    ["TELEGRAM_BOT_TOKEN", telegramToken],
    ["AUTH_SECRET_HASH", authSecretHash],
    ["SPREADSHEET_ID", spreadsheetId],
  ]
    .filter(([, value]) => !value)
    .map(([key]) => key ?? "");

  if (missing.length > 0) {
    throw new ConfigError(`Missing required configuration: ${missing.join(", ")}`, missing);
  }

  if (!SHA256_HEX_PATTERN.test(authSecretHash)) {
    throw new ConfigError("AUTH_SECRET_HASH must be a hex-encoded SHA-256 digest");
  }

  const insertRow = parseEnvInt(env, "SHEET_INSERT_ROW", 4);
  if (insertRow < 1) {
    throw new ConfigError("SHEET_INSERT_ROW must be 1 or greater");
  }

  return {
    telegramToken,
    authSecretHash,
    sheet: {
      credentialsPath: parseEnvString(env, "GOOGLE_APPLICATION_CREDENTIALS", "cred.json"),
      spreadsheetId,
      dataTab: parseEnvString(env, "SHEET_DATA_TAB", "DATA"),
      registerTab: parseEnvString(env, "SHEET_REGISTER_TAB", "REGISTER"),
      staffColumn: parseEnvString(env, "SHEET_STAFF_COLUMN", "STAFF"),
      courseColumn: parseEnvString(env, "SHEET_COURSE_COLUMN", "COURSE"),
      codeColumn: parseEnvString(env, "SHEET_CODE_COLUMN", "CODE"),
      insertRow,
    },
    selectorPageSize: Math.max(1, parseEnvInt(env, "SELECTOR_PAGE_SIZE", DEFAULT_PAGE_LENGTH)),
    utcOffsetHours: parseEnvFloat(env, "TIMEZONE_OFFSET_HOURS", DEFAULT_UTC_OFFSET_HOURS),
    drainIntervalMs: Math.max(
      100,
      parseEnvInt(env, "SINK_DRAIN_INTERVAL_MS", DEFAULT_DRAIN_INTERVAL_MS)
    ),
    sessionIdleTtlMs: Math.max(0, parseEnvInt(env, "SESSION_IDLE_TTL_MINUTES", 0)) * 60 * 1000,
    auditLogPath: parseEnvString(env, "AUDIT_LOG_PATH", "/tmp/consult-intake-audit.log"),
    auditLogJson: parseEnvBool(env, "AUDIT_LOG_JSON", false),
  };
}

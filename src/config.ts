import { DEFAULT_REQUEST_TIMEOUT_MS } from "./utils/http";

export type AppConfig = {
  port: number;
  databasePath: string;
  requestTimeoutMs: number;
  dealLookbackDays: number;
  hubspot: {
    token: string;
    portalId: string | null;
    pipelineId: string;
    wonStageId: string;
  };
  holded: {
    apiKey: string;
  };
  slack: {
    botToken: string;
  };
  email: {
    resendApiKey: string;
    from: string;
    adminEmail: string;
  };
  google: {
    clientId: string;
    clientSecret: string;
    refreshToken: string;
    spreadsheetId: string;
    driveParentFolderId: string;
    usersRange: string;
    servicesRange: string;
    sheetsCacheTtlMs: number;
  };
  schedule: {
    times: string[];
    timeZone: string;
  };
};

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

const TIME_SLOT_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  const required = (name: string): string => {
    const value = env[name]?.trim();
    if (!value) {
      problems.push(`${name} is required`);
      return "";
    }
    return value;
  };

  const optional = (name: string, fallback: string): string =>
    env[name]?.trim() || fallback;

  const positiveInt = (name: string, fallback: number): number => {
    const raw = env[name]?.trim();
    if (!raw) {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
      problems.push(`${name} must be a positive integer`);
      return fallback;
    }
    return value;
  };

  const times = optional("POLL_TIMES", "10:00,13:50")
    .split(",")
    .map((slot) => slot.trim())
    .filter(Boolean);
  for (const slot of times) {
    if (!TIME_SLOT_PATTERN.test(slot)) {
      problems.push(`POLL_TIMES entry "${slot}" is not HH:MM`);
    }
  }

  const config: AppConfig = {
    port: positiveInt("PORT", 3001),
    databasePath: optional("DATABASE_PATH", "data/onboardings.db"),
    requestTimeoutMs: positiveInt("REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS),
    dealLookbackDays: positiveInt("DEAL_LOOKBACK_DAYS", 7),
    hubspot: {
      token: required("HUBSPOT_TOKEN"),
      portalId: env.HUBSPOT_PORTAL_ID?.trim() || null,
      pipelineId: optional("HUBSPOT_PIPELINE_ID", "20024183"),
      wonStageId: optional("HUBSPOT_WON_STAGE_ID", "48577422"),
    },
    holded: {
      apiKey: required("HOLDED_API_KEY"),
    },
    slack: {
      botToken: required("SLACK_BOT_TOKEN"),
    },
    email: {
      resendApiKey: required("RESEND_API_KEY"),
      from: required("EMAIL_FROM"),
      adminEmail: required("ADMIN_EMAIL"),
    },
    google: {
      clientId: required("GOOGLE_CLIENT_ID"),
      clientSecret: required("GOOGLE_CLIENT_SECRET"),
      refreshToken: required("GOOGLE_REFRESH_TOKEN"),
      spreadsheetId: required("GOOGLE_SPREADSHEET_ID"),
      driveParentFolderId: required("DRIVE_PARENT_FOLDER_ID"),
      usersRange: optional("SHEETS_USERS_RANGE", "usuarios!A:G"),
      servicesRange: optional("SHEETS_SERVICES_RANGE", "servicios!A:C"),
      sheetsCacheTtlMs: positiveInt("SHEETS_CACHE_TTL_MS", 3_600_000),
    },
    schedule: {
      times,
      timeZone: optional("POLL_TIMEZONE", "Europe/Madrid"),
    },
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return config;
}

import dotenv from "dotenv";
import cron from "node-cron";
import { ConfigurationError } from "./errors";
import { LogLevel, isLogLevel } from "./logger";

dotenv.config();

type Env = Record<string, string | undefined>;

export interface AppConfig {
  gmail: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    refreshToken: string;
    query: string;
  };
  notion: {
    token: string;
    databaseId: string;
  };
  openai: {
    apiKey: string;
    classifyModel: string;
    extractModel: string;
  };
  pipeline: {
    maxMessages: number;
    confidenceThreshold: number;
  };
  cron: {
    schedule?: string;
  };
  logLevel: LogLevel;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const missing: string[] = [];

  const required = (key: string): string => {
    const value = env[key]?.trim();
    if (!value) {
      missing.push(key);
      return "";
    }
    return value;
  };

  const optional = (key: string, fallback: string): string =>
    env[key]?.trim() || fallback;

  const config: AppConfig = {
    gmail: {
      clientId: required("GMAIL_CLIENT_ID"),
      clientSecret: required("GMAIL_CLIENT_SECRET"),
      redirectUri: optional(
        "GMAIL_REDIRECT_URI",
        "http://localhost:3000/oauth2callback"
      ),
      refreshToken: required("GMAIL_REFRESH_TOKEN"),
      query: optional("GMAIL_QUERY", "is:unread"),
    },
    notion: {
      token: required("NOTION_TOKEN"),
      databaseId: required("NOTION_DATABASE_ID"),
    },
    openai: {
      apiKey: required("OPENAI_API_KEY"),
      classifyModel: optional("CLASSIFY_MODEL", "gpt-4o-mini"),
      extractModel: optional("EXTRACT_MODEL", "gpt-4o"),
    },
    pipeline: {
      maxMessages: parseMaxMessages(optional("MAX_MESSAGES", "20")),
      confidenceThreshold: parseThreshold(
        optional("CONFIDENCE_THRESHOLD", "0.5")
      ),
    },
    cron: {
      schedule: parseSchedule(env.CRON_SCHEDULE),
    },
    logLevel: parseLogLevel(env),
  };

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(", ")}`
    );
  }

  return config;
}

function parseMaxMessages(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(
      `MAX_MESSAGES must be a positive integer, got "${raw}"`
    );
  }
  return value;
}

function parseThreshold(raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(
      `CONFIDENCE_THRESHOLD must be a number between 0 and 1, got "${raw}"`
    );
  }
  return value;
}

function parseSchedule(raw: string | undefined): string | undefined {
  const schedule = raw?.trim();
  if (!schedule) return undefined;
  if (!cron.validate(schedule)) {
    throw new ConfigurationError(`CRON_SCHEDULE is not valid: "${schedule}"`);
  }
  return schedule;
}

function parseLogLevel(env: Env): LogLevel {
  if (env.DEBUG === "true") return "debug";
  const level = (env.LOG_LEVEL ?? "info").trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigurationError(`LOG_LEVEL is not valid: "${level}"`);
  }
  return level;
}

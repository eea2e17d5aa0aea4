import { LOG_LEVELS, type Level } from "./logger";

export type MatchStrategy = "lexical" | "semantic" | "blended";

const STRATEGIES: readonly MatchStrategy[] = ["lexical", "semantic", "blended"];

export type Env = {
  SLACK_BOT_TOKEN: string;
  SLACK_SIGNING_SECRET: string;
  SLACK_APP_TOKEN: string;
  OPENAI_API_KEY?: string;
  OPENAI_EMBEDDING_MODEL: string;
  COMMANDS_DIR: string;
  MATCH_STRATEGY: MatchStrategy;
  API_TIMEOUT_MS: number;
  AUTH_LOGIN_URL?: string;
  AUTH_REQUIRED_COOKIES: string[];
  AUTH_TIMEOUT_MS: number;
  SESSION_EXPIRED_MESSAGE?: string;
  LOG_LEVEL: Level;
};

function required(source: NodeJS.ProcessEnv, key: string): string {
  const value = source[key];
  if (!value) {
    throw new Error(`Missing required env: ${key}`);
  }
  return value;
}

function oneOf<T extends string>(
  source: NodeJS.ProcessEnv,
  key: string,
  allowed: readonly T[],
  fallback: T
): T {
  const value = source[key];
  if (!value) return fallback;
  const found = allowed.find((candidate) => candidate === value);
  if (!found) {
    throw new Error(`Invalid env ${key}: "${value}" (expected one of ${allowed.join(", ")})`);
  }
  return found;
}

function positiveNumber(source: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = source[key];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid env ${key}: "${raw}" (expected a positive number)`);
  }
  return value;
}

function list(source: NodeJS.ProcessEnv, key: string, fallback: string): string[] {
  return (source[key] || fallback)
    .split(",")
    .map((v) => v.trim())
    .filter(Boolean);
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const openaiKey = source.OPENAI_API_KEY || undefined;
  const strategy = oneOf(source, "MATCH_STRATEGY", STRATEGIES, openaiKey ? "blended" : "lexical");
  if (strategy !== "lexical" && !openaiKey) {
    throw new Error(`MATCH_STRATEGY=${strategy} needs OPENAI_API_KEY for embeddings`);
  }

  return {
    SLACK_BOT_TOKEN: required(source, "SLACK_BOT_TOKEN"),
    SLACK_SIGNING_SECRET: required(source, "SLACK_SIGNING_SECRET"),
    SLACK_APP_TOKEN: required(source, "SLACK_APP_TOKEN"),
    OPENAI_API_KEY: openaiKey,
    OPENAI_EMBEDDING_MODEL: source.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small",
    COMMANDS_DIR: source.COMMANDS_DIR || "commands",
    MATCH_STRATEGY: strategy,
    API_TIMEOUT_MS: positiveNumber(source, "API_TIMEOUT_MS", 10000),
    AUTH_LOGIN_URL: source.AUTH_LOGIN_URL || undefined,
    AUTH_REQUIRED_COOKIES: list(source, "AUTH_REQUIRED_COOKIES", "XSRF-TOKEN,laravel_session"),
    AUTH_TIMEOUT_MS: positiveNumber(source, "AUTH_TIMEOUT_MS", 10000),
    SESSION_EXPIRED_MESSAGE: source.SESSION_EXPIRED_MESSAGE || undefined,
    LOG_LEVEL: oneOf(source, "LOG_LEVEL", LOG_LEVELS, "info"),
  };
}

import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const isProdEnv = process.env.APP_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const envInfo = {
  envFile,
  envPath,
  envFileExists
};

export const DEFAULT_UPSTREAM_BASE_URL =
  "https://www.frbsf.org/research-and-insights/publications/economic-letter/";
export const DEFAULT_BEDROCK_MODEL_ID = "anthropic.claude-3-5-sonnet-20240620-v1:0";

// Empty strings count as unset so a blank line in an env file keeps the default.
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const optionalInt = (min = 0) =>
  optionalString.transform((value, ctx) => {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected an integer >= ${min}, got "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

const intWithDefault = (fallback: number, min = 0) =>
  optionalInt(min).transform((value) => value ?? fallback);

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "expected an http(s) URL");

const EnvSchema = z.object({
  UPSTREAM_BASE_URL: optionalString.transform((value) => value ?? DEFAULT_UPSTREAM_BASE_URL).pipe(httpUrl),
  FETCH_TIMEOUT_MS: intWithDefault(30_000, 1),
  FETCH_MAX_ATTEMPTS: intWithDefault(3, 1),
  FETCH_BACKOFF_BASE_MS: intWithDefault(500),
  FETCH_BACKOFF_MAX_MS: intWithDefault(10_000),
  INGEST_DEADLINE_MS: optionalInt(1),
  MAX_NEW_PAGES: intWithDefault(5, 1),
  MAX_OLDER_PAGES: intWithDefault(5, 1),
  USER_AGENT: optionalString.transform((value) => value ?? "letterfetch/0.1"),
  PORT: intWithDefault(8000, 1).pipe(z.number().max(65535)),
  LOG_LEVEL: optionalString
    .transform((value) => value?.toLowerCase() ?? "info")
    .pipe(z.enum(["debug", "info", "warn", "error"])),
  DATABASE_URL: optionalString,
  POSTGRES_URL: optionalString,
  AWS_REGION: optionalString.transform((value) => value ?? "us-east-1"),
  AWS_PROFILE: optionalString,
  BEDROCK_MODEL_ID: optionalString.transform((value) => value ?? DEFAULT_BEDROCK_MODEL_ID),
  ANSWER_MAX_TOKENS: intWithDefault(2000, 1)
});

export type LogLevel = "debug" | "info" | "warn" | "error";

export type FetchSettings = {
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  userAgent: string;
};

export type AppConfig = {
  upstreamBaseUrl: string;
  fetch: FetchSettings;
  ingest: {
    deadlineMs: number;
    maxNewPages: number;
    maxOlderPages: number;
  };
  port: number;
  logLevel: LogLevel;
  dbUrl: string;
  answers: {
    region: string;
    profile: string | undefined;
    modelId: string;
    maxTokens: number;
  };
};

/**
 * Worst-case wall time of one upstream request: every attempt runs into its
 * timeout and every pause between attempts is taken.
 */
export const retryBudgetMs = (settings: Omit<FetchSettings, "userAgent">): number => {
  let budget = settings.maxAttempts * settings.timeoutMs;
  for (let attempt = 1; attempt < settings.maxAttempts; attempt += 1) {
    budget += Math.min(settings.backoffBaseMs * 2 ** (attempt - 1), settings.backoffMaxMs);
  }
  return budget;
};

const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");

export const parseConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  const vars = result.data;

  const fetchSettings: FetchSettings = {
    timeoutMs: vars.FETCH_TIMEOUT_MS,
    maxAttempts: vars.FETCH_MAX_ATTEMPTS,
    backoffBaseMs: vars.FETCH_BACKOFF_BASE_MS,
    backoffMaxMs: vars.FETCH_BACKOFF_MAX_MS,
    userAgent: vars.USER_AGENT
  };

  return {
    upstreamBaseUrl: vars.UPSTREAM_BASE_URL,
    fetch: fetchSettings,
    ingest: {
      deadlineMs: vars.INGEST_DEADLINE_MS ?? retryBudgetMs(fetchSettings),
      maxNewPages: vars.MAX_NEW_PAGES,
      maxOlderPages: vars.MAX_OLDER_PAGES
    },
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    dbUrl: vars.DATABASE_URL ?? vars.POSTGRES_URL ?? "",
    answers: {
      region: vars.AWS_REGION,
      profile: vars.AWS_PROFILE,
      modelId: vars.BEDROCK_MODEL_ID,
      maxTokens: vars.ANSWER_MAX_TOKENS
    }
  };
};

export const config = parseConfig(process.env);

export const requireDbUrl = (current: AppConfig = config): string => {
  if (!current.dbUrl) {
    const details = envInfo.envFileExists
      ? `Check ${envInfo.envFile}.`
      : `Expected ${envInfo.envFile} (not found).`;
    throw new ConfigError(`DATABASE_URL is required. ${details}`);
  }
  return current.dbUrl;
};

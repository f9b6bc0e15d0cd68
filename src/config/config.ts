import { z } from "zod";
import { ConfigurationError } from "../errors.js";

const REQUIRED_VARIABLES = [
  "SOURCE_USERNAME",
  "SOURCE_PASSWORD",
  "DEST_USERNAME",
  "DEST_TOKEN",
] as const;

const requiredString = z.string().trim().min(1);
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace"]);

export const EnvSchema = z.object({
  SOURCE_USERNAME: requiredString,
  SOURCE_PASSWORD: requiredString,
  DEST_USERNAME: requiredString,
  DEST_TOKEN: requiredString,
  DEST_OWNER: optionalString,
  DEST_PRIVATE: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
  DEST_API_URL: z.string().url().default("https://api.github.com"),
  DEST_GIT_URL: z.string().url().default("https://github.com"),
  REPO_LIST_PATH: z.string().min(1).default("repos.txt"),
  CLONE_DIR: z.string().min(1).default("temp_repos"),
  MAX_NAME_ATTEMPTS: z.coerce.number().int().positive().default(1000),
  GIT_TIMEOUT_MS: optionalString.pipe(z.coerce.number().int().positive().optional()),
  LOG_FILE: z.string().min(1).default("repo_migration.log"),
  LOG_LEVEL: LogLevelSchema.default("info"),
  REPORT_PATH: optionalString,
});

export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface Credentials {
  readonly sourceUser: string;
  readonly sourceSecret: string;
  readonly destUser: string;
  readonly destToken: string;
}

export interface Config {
  readonly credentials: Credentials;
  /** Organisation to create repositories in; the destination user when unset. */
  readonly destOwner: string | undefined;
  readonly destPrivate: boolean;
  readonly destApiUrl: string;
  readonly destGitUrl: string;
  readonly repoListPath: string;
  readonly cloneDir: string;
  readonly maxNameAttempts: number;
  readonly gitTimeoutMs: number | undefined;
  readonly logFile: string;
  readonly logLevel: LogLevel;
  readonly reportPath: string | undefined;
}

type Env = Record<string, string | undefined>;

/**
 * Builds the immutable process configuration from environment variables.
 * Throws ConfigurationError listing every missing secret, or describing
 * the first invalid optional setting.
 */
export function loadConfig(env: Env): Config {
  const missing = REQUIRED_VARIABLES.filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigurationError(missing);
  }

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join(".") ?? "environment";
    throw new ConfigurationError([], `Invalid value for ${variable}: ${issue?.message ?? "invalid"}`);
  }

  const values = parsed.data;
  return Object.freeze({
    credentials: Object.freeze({
      sourceUser: values.SOURCE_USERNAME,
      sourceSecret: values.SOURCE_PASSWORD,
      destUser: values.DEST_USERNAME,
      destToken: values.DEST_TOKEN,
    }),
    destOwner: values.DEST_OWNER,
    destPrivate: values.DEST_PRIVATE,
    destApiUrl: values.DEST_API_URL.replace(/\/+$/, ""),
    destGitUrl: values.DEST_GIT_URL.replace(/\/+$/, ""),
    repoListPath: values.REPO_LIST_PATH,
    cloneDir: values.CLONE_DIR,
    maxNameAttempts: values.MAX_NAME_ATTEMPTS,
    gitTimeoutMs: values.GIT_TIMEOUT_MS,
    logFile: values.LOG_FILE,
    logLevel: values.LOG_LEVEL,
    reportPath: values.REPORT_PATH,
  });
}

/**
 * Logging settings never fail, so fatal configuration errors can still be
 * written to the log file.
 */
export function loadLoggingOptions(env: Env): { file: string; level: LogLevel } {
  const level = LogLevelSchema.safeParse(env.LOG_LEVEL);
  return {
    file: env.LOG_FILE?.trim() || "repo_migration.log",
    level: level.success ? level.data : "info",
  };
}

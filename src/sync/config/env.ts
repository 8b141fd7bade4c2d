import { z } from "zod";
import { ConfigError } from "@/sync/errors";
import type { SourceConnectionConfig, WebhookCredentials } from "@/sync/types/api";
import type { LogLevel } from "@/sync/logger";

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().default(fallback);

const envSchema = z.object({
  MYSQL_HOST: z.string().min(1, "MYSQL_HOST is required"),
  MYSQL_USER: z.string().min(1, "MYSQL_USER is required"),
  MYSQL_PASSWORD: z.string().min(1, "MYSQL_PASSWORD is required"),
  MYSQL_DATABASE: z.string().min(1).default("bi_data"),
  MYSQL_PORT: intFromEnv(3306).pipe(z.number().min(1).max(65535)),
  MYSQL_CONNECT_TIMEOUT_MS: intFromEnv(10_000).pipe(z.number().positive()),

  WEBHOOK_BASE_URL: z.string().url("WEBHOOK_BASE_URL must be a valid URL"),
  WEBHOOK_API_KEY: z.string().min(1, "WEBHOOK_API_KEY is required"),

  SYNC_BATCH_SIZE: intFromEnv(200).pipe(z.number().positive()),
  SYNC_MAX_BATCH_BYTES: z.coerce.number().int().positive().optional(),
  SYNC_RETRY_ATTEMPTS: intFromEnv(3).pipe(z.number().min(1)),
  SYNC_RETRY_BASE_DELAY_MS: intFromEnv(2_000).pipe(z.number().nonnegative()),
  SYNC_RETRY_MAX_DELAY_MS: intFromEnv(30_000).pipe(z.number().nonnegative()),
  SYNC_RETRY_JITTER: z.coerce.number().min(0).max(1).default(0.25),
  SYNC_REQUEST_TIMEOUT_MS: intFromEnv(30_000).pipe(z.number().positive()),
  SYNC_FETCH_PAGE_SIZE: intFromEnv(1_000).pipe(z.number().positive()),
  SYNC_RECONNECT_ATTEMPTS: intFromEnv(2).pipe(z.number().nonnegative()),
  SYNC_FROM_DATE: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "SYNC_FROM_DATE must be YYYY-MM-DD")
    .default("2025-04-01"),
  SYNC_ON_BATCH_FAILURE: z.enum(["halt", "skip"]).default("halt"),
  SYNC_QUEUE_CAPACITY: intFromEnv(2).pipe(z.number().positive()),
  SYNC_RUN_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  SYNC_STATE_PATH: z.string().min(1).default("./sync_state.db"),
  SYNC_LOCK_STALE_MS: intFromEnv(6 * 60 * 60 * 1000).pipe(z.number().positive()),

  SYNC_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info"),
  SYNC_DRY_RUN: z
    .string()
    .default("false")
    .transform((v) => v === "true"),
});

type SyncEnv = z.infer<typeof envSchema>;

export type BatchFailurePolicy = "halt" | "skip";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0..1, spread applied around each computed delay. */
  jitter: number;
}

/** Everything a run needs, built once at startup and passed down. */
export interface SyncConfig {
  source: SourceConnectionConfig;
  webhook: WebhookCredentials & { requestTimeoutMs: number };
  retry: RetryPolicy;
  batchSize: number;
  maxBatchBytes?: number;
  fetchPageSize: number;
  reconnectAttempts: number;
  fromDate: string;
  onBatchFailure: BatchFailurePolicy;
  queueCapacity: number;
  runTimeoutMs?: number;
  statePath: string;
  lockStaleAfterMs: number;
  logLevel: LogLevel;
  dryRun: boolean;
}

export function parseEnv(source: Record<string, string | undefined>): SyncEnv {
  // Blank values count as unset so the defaults apply.
  const present = Object.fromEntries(
    Object.entries(source).filter(([, v]) => v !== undefined && v.trim() !== ""),
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return result.data;
}

export function loadConfig(source: Record<string, string | undefined>): SyncConfig {
  const env = parseEnv(source);
  return {
    source: {
      host: env.MYSQL_HOST,
      user: env.MYSQL_USER,
      password: env.MYSQL_PASSWORD,
      database: env.MYSQL_DATABASE,
      port: env.MYSQL_PORT,
      connectTimeoutMs: env.MYSQL_CONNECT_TIMEOUT_MS,
    },
    webhook: {
      baseUrl: env.WEBHOOK_BASE_URL,
      apiKey: env.WEBHOOK_API_KEY,
      requestTimeoutMs: env.SYNC_REQUEST_TIMEOUT_MS,
    },
    retry: {
      maxAttempts: env.SYNC_RETRY_ATTEMPTS,
      baseDelayMs: env.SYNC_RETRY_BASE_DELAY_MS,
      maxDelayMs: env.SYNC_RETRY_MAX_DELAY_MS,
      jitter: env.SYNC_RETRY_JITTER,
    },
    batchSize: env.SYNC_BATCH_SIZE,
    maxBatchBytes: env.SYNC_MAX_BATCH_BYTES,
    fetchPageSize: env.SYNC_FETCH_PAGE_SIZE,
    reconnectAttempts: env.SYNC_RECONNECT_ATTEMPTS,
    fromDate: env.SYNC_FROM_DATE,
    onBatchFailure: env.SYNC_ON_BATCH_FAILURE,
    queueCapacity: env.SYNC_QUEUE_CAPACITY,
    runTimeoutMs: env.SYNC_RUN_TIMEOUT_MS,
    statePath: env.SYNC_STATE_PATH,
    lockStaleAfterMs: env.SYNC_LOCK_STALE_MS,
    logLevel: env.SYNC_LOG_LEVEL,
    dryRun: env.SYNC_DRY_RUN,
  };
}

import { promises as fs } from "fs";
import os from "os";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { isLogLevel, type LogLevel } from "../core/log.js";

export const DEFAULT_CONFIG_PATH = "config/default.config.yaml";

const zNullableString = z.string().nullable().optional();

const zConfigFile = z.object({
  version: z.literal(1),
  tool: z
    .object({
      path: z.string().min(1).default("interproscan.sh"),
      disable_precalc: z.boolean().default(true)
    })
    .prefault({}),
  limits: z
    .object({
      max_file_size_bytes: z.number().int().positive().default(100_000_000),
      timeout_seconds: z.number().positive().default(1800),
      kill_grace_seconds: z.number().nonnegative().default(5)
    })
    .prefault({}),
  scheduler: z
    .object({
      max_concurrent_jobs: z.number().int().min(1).max(64).default(2),
      max_queued_jobs: z.number().int().min(1).default(100),
      aging_interval_seconds: z.number().nonnegative().default(0)
    })
    .prefault({}),
  storage: z
    .object({
      temp_dir: zNullableString,
      results_dir: z.string().min(1).default("var/results"),
      result_retention_days: z.number().positive().default(30),
      retention_sweep_seconds: z.number().positive().default(3600)
    })
    .prefault({}),
  notifications: z
    .object({
      webhook_url: zNullableString,
      timeout_seconds: z.number().positive().default(10)
    })
    .prefault({}),
  jobs: z
    .object({
      list_default_limit: z.number().int().min(1).max(500).default(20)
    })
    .prefault({}),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info")
    })
    .prefault({})
});

export type ConfigFile = z.infer<typeof zConfigFile>;

export interface GatewayConfig {
  toolPath: string;
  disablePrecalc: boolean;
  maxFileSizeBytes: number;
  timeoutSeconds: number;
  killGraceSeconds: number;
  maxConcurrentJobs: number;
  maxQueuedJobs: number;
  agingIntervalSeconds: number;
  tempDir: string;
  resultsDir: string;
  resultRetentionDays: number;
  retentionSweepSeconds: number;
  notifyWebhookUrl: string | null;
  notifyTimeoutSeconds: number;
  listDefaultLimit: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

/**
 * Resolves a `${VAR}` or `$VAR` token against the environment. Plain values are
 * returned unchanged; an unset or blank variable yields null.
 */
export function expandEnvToken(value: string, env: Env = process.env): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return null;
  const v = env[varName]?.trim();
  return v ? v : null;
}

function expandNullable(value: string | null | undefined, env: Env): string | null {
  if (value === null || value === undefined) return null;
  const expanded = expandEnvToken(value, env);
  return expanded && expanded.trim().length > 0 ? expanded : null;
}

function numberFromEnv(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return n;
}

function integerFromEnv(env: Env, name: string): number | undefined {
  const n = numberFromEnv(env, name);
  if (n !== undefined && !Number.isInteger(n)) {
    throw new Error(`invalid ${name}: expected an integer`);
  }
  return n;
}

export function resolveConfig(file: ConfigFile, env: Env = process.env): GatewayConfig {
  const envLogLevel = env.BIO_MCP_LOG_LEVEL?.trim().toLowerCase();
  if (envLogLevel && !isLogLevel(envLogLevel)) {
    throw new Error(`invalid BIO_MCP_LOG_LEVEL: ${envLogLevel}`);
  }

  const tempDir = env.BIO_MCP_TEMP_DIR?.trim() || expandNullable(file.storage.temp_dir, env) || os.tmpdir();
  const resultsDir = env.BIO_MCP_RESULTS_DIR?.trim() || file.storage.results_dir;

  return {
    toolPath: env.BIO_MCP_INTERPRO_PATH?.trim() || file.tool.path,
    disablePrecalc: file.tool.disable_precalc,
    maxFileSizeBytes: integerFromEnv(env, "BIO_MCP_MAX_FILE_SIZE") ?? file.limits.max_file_size_bytes,
    timeoutSeconds: numberFromEnv(env, "BIO_MCP_TIMEOUT") ?? file.limits.timeout_seconds,
    killGraceSeconds: file.limits.kill_grace_seconds,
    maxConcurrentJobs: integerFromEnv(env, "BIO_MCP_MAX_CONCURRENT_JOBS") ?? file.scheduler.max_concurrent_jobs,
    maxQueuedJobs: file.scheduler.max_queued_jobs,
    agingIntervalSeconds: file.scheduler.aging_interval_seconds,
    tempDir: path.resolve(tempDir),
    resultsDir: path.resolve(resultsDir),
    resultRetentionDays: file.storage.result_retention_days,
    retentionSweepSeconds: file.storage.retention_sweep_seconds,
    notifyWebhookUrl: expandNullable(file.notifications.webhook_url, env),
    notifyTimeoutSeconds: file.notifications.timeout_seconds,
    listDefaultLimit: file.jobs.list_default_limit,
    logLevel: envLogLevel && isLogLevel(envLogLevel) ? envLogLevel : file.logging.level
  };
}

export function parseConfig(raw: unknown, env: Env = process.env): GatewayConfig {
  const parsed = zConfigFile.safeParse(raw ?? { version: 1 });
  if (!parsed.success) {
    throw new Error(`invalid config: ${z.prettifyError(parsed.error)}`);
  }
  return resolveConfig(parsed.data, env);
}

export async function loadConfig(filePath: string, env: Env = process.env): Promise<GatewayConfig> {
  const raw = await fs.readFile(filePath, "utf8");
  try {
    const parsed: unknown = YAML.parse(raw);
    return parseConfig(parsed, env);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new Error(`${message} (at ${filePath})`);
  }
}

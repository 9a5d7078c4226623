import { createRequire } from 'node:module';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

const require = createRequire(import.meta.url);
const packageJsonPath = fileURLToPath(
  new URL('../package.json', import.meta.url)
);
const packageJson = z
  .object({ version: z.string().min(1) })
  .safeParse(require(packageJsonPath));
if (!packageJson.success) {
  throw new Error('package.json version is missing');
}

export const clientVersion: string = packageJson.data.version;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'text' | 'json';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const { env } = process;

export class ConfigError extends Error {
  override name = 'ConfigError';
}

function parseIntegerValue(
  envValue: string | undefined,
  min?: number,
  max?: number
): number | null {
  if (!envValue) return null;
  const parsed = Number.parseInt(envValue, 10);
  if (Number.isNaN(parsed)) return null;
  if (min !== undefined && parsed < min) return null;
  if (max !== undefined && parsed > max) return null;
  return parsed;
}

export function parseInteger(
  envValue: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  return parseIntegerValue(envValue, min, max) ?? defaultValue;
}

export function parseBoolean(
  envValue: string | undefined,
  defaultValue: boolean
): boolean {
  if (!envValue) return defaultValue;

  const normalized = envValue.trim().toLowerCase();
  return normalized !== 'false' && normalized !== '0';
}

export function parseList(envValue: string | undefined): string[] {
  if (!envValue) return [];
  return envValue
    .split(/[\s,]+/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

const ALLOWED_LOG_LEVELS: ReadonlySet<string> = new Set(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.has(value);
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  if (!envValue) return 'info';
  const level = envValue.toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

function parseLogFormat(envValue: string | undefined): LogFormat {
  return envValue?.trim().toLowerCase() === 'json' ? 'json' : 'text';
}

const DEFAULT_DIAL_TIMEOUT_SECONDS = 30;
const DEFAULT_KEEPALIVE_SECONDS = 30 * 60;
const DEFAULT_TLS_TIMEOUT_SECONDS = 30;
const DEFAULT_CONCURRENT_TRANSFERS = 3;

export const transferConfigSchema = z
  .object({
    dialTimeoutSeconds: z.number().int().min(1).max(3600),
    keepAliveSeconds: z.number().int().min(1).max(86400),
    tlsTimeoutSeconds: z.number().int().min(1).max(3600),
    concurrentTransfers: z.number().int().min(1).max(1024),
    batchTransfers: z.boolean(),
    logStats: z.boolean(),
    traceHttp: z.boolean(),
    debugHttp: z.boolean(),
    logDir: z.string().min(1),
    sslNoVerifyHosts: z.array(z.string().min(1)),
    sslCaFile: z.string().min(1).optional(),
  })
  .strict();

export type TransferConfig = z.infer<typeof transferConfigSchema>;

export function loadTransferConfig(
  source: NodeJS.ProcessEnv = env
): TransferConfig {
  return {
    dialTimeoutSeconds: parseInteger(
      source.TRANSFER_DIAL_TIMEOUT,
      DEFAULT_DIAL_TIMEOUT_SECONDS,
      1,
      3600
    ),
    keepAliveSeconds: parseInteger(
      source.TRANSFER_KEEPALIVE,
      DEFAULT_KEEPALIVE_SECONDS,
      1,
      86400
    ),
    tlsTimeoutSeconds: parseInteger(
      source.TRANSFER_TLS_TIMEOUT,
      DEFAULT_TLS_TIMEOUT_SECONDS,
      1,
      3600
    ),
    concurrentTransfers: parseInteger(
      source.TRANSFER_CONCURRENCY,
      DEFAULT_CONCURRENT_TRANSFERS,
      1,
      1024
    ),
    batchTransfers: parseBoolean(source.TRANSFER_BATCH, false),
    logStats: parseBoolean(source.TRANSFER_LOG_STATS, false),
    traceHttp: parseBoolean(source.TRANSFER_TRACE_HTTP, false),
    debugHttp: parseBoolean(source.TRANSFER_DEBUG_HTTP, false),
    logDir:
      source.TRANSFER_LOG_DIR?.trim() ||
      path.join(process.cwd(), '.transfer', 'logs'),
    sslNoVerifyHosts: parseList(source.TRANSFER_SSL_NO_VERIFY_HOSTS),
    ...(source.TRANSFER_SSL_CA_INFO
      ? { sslCaFile: source.TRANSFER_SSL_CA_INFO }
      : {}),
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Merges caller overrides over the environment-derived defaults. Unknown keys
 * and out-of-range values are rejected with a {@link ConfigError}.
 */
export function resolveTransferConfig(
  overrides: unknown = {},
  base: TransferConfig = config.transfer
): TransferConfig {
  const parsed = transferConfigSchema.partial().safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid transfer options: ${formatIssues(parsed.error)}`
    );
  }
  return { ...base, ...parsed.data };
}

export const config = {
  client: {
    name: 'transfer-meter',
    version: clientVersion,
  },
  transfer: loadTransferConfig(),
  logging: {
    level: parseLogLevel(env.LOG_LEVEL),
    format: parseLogFormat(env.LOG_FORMAT),
  },
};

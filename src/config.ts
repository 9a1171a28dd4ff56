/**
 * Configuration: environment variables validated into a typed structure.
 *
 * Usage:
 *   const config = loadConfig(process.env);
 *   const executor = new PipelineExecutor({ retry: config.retry });
 *
 * Storage and CDN sections are optional so the executor can be used with
 * caller-supplied stages alone; buildMediaStages() refuses to run without
 * them.
 */

import { z } from 'zod';
import { RetryPolicyConfig } from './domain/pipeline';
import { TypedError, configError } from './domain/errors';
import { DEFAULT_RETRY_POLICY } from './engine/retry-policy';
import { LogLevel, parseLogLevel } from './logger';

export type Env = Record<string, string | undefined>;

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const booleanFromEnv = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  PIPELINE_MAX_ATTEMPTS: intFromEnv(DEFAULT_RETRY_POLICY.maxAttempts, 1),
  PIPELINE_BACKOFF_BASE_MS: intFromEnv(DEFAULT_RETRY_POLICY.backoffBaseMs, 0),
  PIPELINE_BACKOFF_CAP_MS: intFromEnv(DEFAULT_RETRY_POLICY.backoffCapMs, 0),
  PIPELINE_STAGE_TIMEOUT_MS: intFromEnv(DEFAULT_RETRY_POLICY.timeoutMs, 1),
  PIPELINE_CONCURRENCY: intFromEnv(4, 1),

  OPTIMIZER_FORMAT: z.enum(['webp', 'jpeg', 'png']).default('webp'),
  OPTIMIZER_QUALITY: z.coerce.number().int().min(1).max(100).default(80),
  OPTIMIZER_MAX_DIMENSION: z.coerce.number().int().min(1).optional(),
  OPTIMIZER_OUTPUT_DIR: z.string().min(1).default('.optimized'),
  OPTIMIZE_IMAGES: booleanFromEnv(true),

  STORAGE_ENDPOINT: z.string().url().optional(),
  STORAGE_REGION: z.string().min(1).default('kr-standard'),
  STORAGE_BUCKET: z.string().min(1).optional(),
  STORAGE_ACCESS_KEY: z.string().min(1).optional(),
  STORAGE_SECRET_KEY: z.string().min(1).optional(),
  STORAGE_PUBLIC_URL: z.string().url().optional(),

  CDN_API_ENDPOINT: z.string().url().optional(),
  CDN_SERVICE_ID: z.string().min(1).optional(),
  CDN_DOMAIN: z.string().url().optional(),
  CDN_API_KEY: z.string().min(1).optional(),
  CDN_WAIT_FOR_PURGE: booleanFromEnv(false),

  PORT: intFromEnv(5000, 0),
  LOG_LEVEL: z.string().default(LogLevel.Info),
});

export type ImageFormat = 'webp' | 'jpeg' | 'png';

export interface OptimizerConfig {
  format: ImageFormat;
  quality: number;
  maxDimension?: number;
  outputDir: string;
  /** When false, images are uploaded as they are. */
  optimizeImages: boolean;
}

export interface StorageConfig {
  endpoint: string;
  region: string;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  /** Base URL objects are reachable under; defaults to `${endpoint}/${bucket}`. */
  publicUrl?: string;
}

export interface CdnConfig {
  apiEndpoint: string;
  serviceId: string;
  /** Public CDN origin, e.g. https://cdn.example.com */
  domain: string;
  apiKey?: string;
  waitForPurge: boolean;
}

export interface AppConfig {
  retry: RetryPolicyConfig;
  concurrency: number;
  optimizer: OptimizerConfig;
  storage?: StorageConfig;
  cdn?: CdnConfig;
  port: number;
  logLevel: LogLevel;
}

/** Thrown when the environment does not describe a usable configuration. */
export class ConfigError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ConfigError';
  }
}

/** Read and validate configuration from environment variables. */
export function loadConfig(env: Env = process.env): AppConfig {
  // Blank variables count as unset
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }

  const parsed = envSchema.safeParse(cleaned);
  const issues: string[] = parsed.success
    ? []
    : parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);

  // The checks below read raw values so they still run when a field failed to parse
  const baseMs = Number(cleaned.PIPELINE_BACKOFF_BASE_MS ?? DEFAULT_RETRY_POLICY.backoffBaseMs);
  const capMs = Number(cleaned.PIPELINE_BACKOFF_CAP_MS ?? DEFAULT_RETRY_POLICY.backoffCapMs);
  if (capMs < baseMs) {
    issues.push('PIPELINE_BACKOFF_CAP_MS: must not be smaller than PIPELINE_BACKOFF_BASE_MS');
  }

  const rawLevel = cleaned.LOG_LEVEL ?? LogLevel.Info;
  const logLevel = parseLogLevel(rawLevel);
  if (!logLevel) {
    issues.push(`LOG_LEVEL: unknown level "${rawLevel}"`);
  }

  checkSection(issues, 'storage', {
    STORAGE_ENDPOINT: cleaned.STORAGE_ENDPOINT,
    STORAGE_BUCKET: cleaned.STORAGE_BUCKET,
    STORAGE_ACCESS_KEY: cleaned.STORAGE_ACCESS_KEY,
    STORAGE_SECRET_KEY: cleaned.STORAGE_SECRET_KEY,
  });
  checkSection(issues, 'cdn', {
    CDN_API_ENDPOINT: cleaned.CDN_API_ENDPOINT,
    CDN_SERVICE_ID: cleaned.CDN_SERVICE_ID,
    CDN_DOMAIN: cleaned.CDN_DOMAIN,
  });

  if (!parsed.success || !logLevel || issues.length > 0) {
    throw new ConfigError(configError('Invalid configuration', issues));
  }

  const vars = parsed.data;
  const {
    STORAGE_ENDPOINT: endpoint,
    STORAGE_BUCKET: bucket,
    STORAGE_ACCESS_KEY: accessKeyId,
    STORAGE_SECRET_KEY: secretAccessKey,
  } = vars;
  const { CDN_API_ENDPOINT: apiEndpoint, CDN_SERVICE_ID: serviceId, CDN_DOMAIN: domain } = vars;

  return {
    retry: {
      maxAttempts: vars.PIPELINE_MAX_ATTEMPTS,
      backoffBaseMs: vars.PIPELINE_BACKOFF_BASE_MS,
      backoffCapMs: vars.PIPELINE_BACKOFF_CAP_MS,
      timeoutMs: vars.PIPELINE_STAGE_TIMEOUT_MS,
    },
    concurrency: vars.PIPELINE_CONCURRENCY,
    optimizer: {
      format: vars.OPTIMIZER_FORMAT,
      quality: vars.OPTIMIZER_QUALITY,
      maxDimension: vars.OPTIMIZER_MAX_DIMENSION,
      outputDir: vars.OPTIMIZER_OUTPUT_DIR,
      optimizeImages: vars.OPTIMIZE_IMAGES,
    },
    storage:
      endpoint && bucket && accessKeyId && secretAccessKey
        ? {
            endpoint,
            region: vars.STORAGE_REGION,
            bucket,
            accessKeyId,
            secretAccessKey,
            publicUrl: vars.STORAGE_PUBLIC_URL,
          }
        : undefined,
    cdn:
      apiEndpoint && serviceId && domain
        ? {
            apiEndpoint,
            serviceId,
            domain: domain.replace(/\/+$/, ''),
            apiKey: vars.CDN_API_KEY,
            waitForPurge: vars.CDN_WAIT_FOR_PURGE,
          }
        : undefined,
    port: vars.PORT,
    logLevel,
  };
}

/** A section is either fully configured or absent; record an issue when it is half set. */
function checkSection(issues: string[], name: string, values: Record<string, string | undefined>): void {
  const missing = Object.entries(values)
    .filter(([, value]) => value === undefined)
    .map(([key]) => key);
  if (missing.length > 0 && missing.length < Object.keys(values).length) {
    issues.push(`${name}: missing ${missing.join(', ')}`);
  }
}

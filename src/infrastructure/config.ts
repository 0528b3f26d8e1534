import { z } from 'zod';
import type { Logger } from 'pino';
import { ConfigurationError } from '../domain/index.js';

export const DEFAULT_BASE_URL = 'https://api.agent-beacon.dev';
export const API_KEY_PREFIX = 'bk_';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Options accepted by the client constructors. Everything is optional. */
export interface ClientOptions {
  /** Credential. Falls back to `BEACON_API_KEY`. */
  apiKey?: string | undefined;
  /** Collector base URL. Falls back to `BEACON_API_URL`, then the public endpoint. */
  baseUrl?: string | undefined;
  /** Time between timer-triggered flushes. */
  flushIntervalMs?: number | undefined;
  /** Queue length that triggers a flush; also the maximum batch length. */
  batchSize?: number | undefined;
  /** Per-request network timeout. */
  timeoutMs?: number | undefined;
  /** Delivery attempts per batch before it is dropped. */
  maxRetries?: number | undefined;
  retryBaseDelayMs?: number | undefined;
  retryMaxDelayMs?: number | undefined;
  retryJitterMs?: number | undefined;
  /** Time budget for the final flush performed by `close()`. */
  closeTimeoutMs?: number | undefined;
  /** Per-event cap on the serialized size. */
  maxEventBytes?: number | undefined;
  /** Falls back to `BEACON_LOG_LEVEL`, then `info`. Ignored when `logger` is given. */
  logLevel?: LogLevel | undefined;
}

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

/**
 * Zod schema for the resolved configuration.
 *
 * The key must be a single token of at least 8 characters; the
 * `bk_` prefix is only advisory (see `resolveConfig`).
 */
export const clientConfigSchema = z.object({
  apiKey: z
    .string({ required_error: 'API key is required. Pass apiKey or set BEACON_API_KEY.' })
    .min(8, 'API key is too short')
    .regex(/^\S+$/, 'API key must not contain whitespace'),
  baseUrl: z
    .string()
    .url('Base URL must be an absolute URL')
    .refine((url) => /^https?:\/\//.test(url), 'Base URL must use http or https')
    .transform((url) => url.replace(/\/+$/, '')),
  flushIntervalMs: positiveInt.default(5_000),
  batchSize: positiveInt.default(100),
  timeoutMs: positiveInt.default(10_000),
  maxRetries: positiveInt.default(3),
  retryBaseDelayMs: nonNegativeInt.default(500),
  retryMaxDelayMs: nonNegativeInt.default(30_000),
  retryJitterMs: nonNegativeInt.default(250),
  closeTimeoutMs: positiveInt.default(5_000),
  maxEventBytes: z.number().int().min(1024).default(64 * 1024),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type ClientConfig = z.infer<typeof clientConfigSchema>;

/**
 * Merges explicit options over environment variables and defaults.
 *
 * Explicit values always win; the environment is only consulted for
 * options left `undefined`.
 *
 * @throws ConfigurationError if the key is missing or malformed, or any
 *   numeric option is out of range.
 */
export function resolveConfig(options: ClientOptions = {}, env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = clientConfigSchema.safeParse({
    ...options,
    apiKey: nonEmpty(options.apiKey) ?? nonEmpty(env['BEACON_API_KEY']),
    baseUrl: nonEmpty(options.baseUrl) ?? nonEmpty(env['BEACON_API_URL']) ?? DEFAULT_BASE_URL,
    logLevel: options.logLevel ?? nonEmpty(env['BEACON_LOG_LEVEL']),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    const missingKey = parsed.error.issues.some(
      (issue) => issue.path[0] === 'apiKey' && issue.code === 'invalid_type',
    );
    throw new ConfigurationError(
      missingKey ? 'API key is required. Pass apiKey or set BEACON_API_KEY.' : `Invalid client configuration: ${issues.join('; ')}`,
      issues,
    );
  }

  if (parsed.data.retryMaxDelayMs < parsed.data.retryBaseDelayMs) {
    throw new ConfigurationError('Invalid client configuration: retryMaxDelayMs must be >= retryBaseDelayMs', [
      'retryMaxDelayMs: must be >= retryBaseDelayMs',
    ]);
  }

  return parsed.data;
}

/** Logs the advisory prefix check. Kept apart so the caller chooses the logger. */
export function warnOnKeyShape(config: ClientConfig, log: Logger): void {
  if (!config.apiKey.startsWith(API_KEY_PREFIX)) {
    log.warn({ expectedPrefix: API_KEY_PREFIX }, `API key should start with '${API_KEY_PREFIX}'`);
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

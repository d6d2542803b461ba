/**
 * Zod Schemas for Service Configuration
 *
 * The environment is validated once at startup; services receive the typed
 * AppConfig and never read process.env themselves.
 */

import { z } from 'zod';
import { parseBooleanFlag } from '../utils/env-parsing';

// =============================================================================
// Primitive Schemas
// =============================================================================

export const UrlSchema = z.string().url('Invalid URL format');

export const RedisUrlSchema = z
  .string()
  .regex(/^rediss?:\/\/\S+$/, 'Redis URL must start with redis:// or rediss://');

export const PortSchema = z.number().int().min(0).max(65535);

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

/**
 * Unset or blank env values are treated as absent.
 */
const optionalEnvString = z
  .string()
  .optional()
  .transform(value => (value === undefined || value.trim() === '' ? undefined : value.trim()));

/**
 * Integer env value with a default. Non-numeric input is an error.
 */
function envInteger(defaultValue: number) {
  return optionalEnvString
    .refine(value => value === undefined || /^-?\d+$/.test(value), 'Expected an integer')
    .transform(value => (value === undefined ? defaultValue : Number(value)));
}

function envFlag(defaultValue: boolean) {
  return optionalEnvString.transform(value => parseBooleanFlag(value, defaultValue));
}

// =============================================================================
// Application Config
// =============================================================================

export const TracingConfigSchema = z.object({
  enabled: z.boolean(),
  otlpEndpoint: UrlSchema.optional(),
  zipkinUrl: UrlSchema.optional(),
  logSpans: z.boolean(),
});

export const AppConfigSchema = z.object({
  serviceName: z.string().min(1),
  redisUrl: RedisUrlSchema,
  apiUrl: UrlSchema,
  queueName: z.string().min(1),
  /** Consumer group every service of one queue shares */
  consumerGroup: z.string().min(1),
  port: PortSchema,
  metricsPort: PortSchema,
  consumerRetryDelayMs: z.number().int().positive(),
  logLevel: LogLevelSchema,
  tracing: TracingConfigSchema,
});

export type TracingConfig = z.infer<typeof TracingConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Per-service defaults for values that differ between services.
 */
export interface ConfigDefaults {
  serviceName: string;
  queueName: string;
  port: number;
  metricsPort: number;
}

/**
 * Raw environment → AppConfig.
 *
 * Only `'1'` (or another truthy spelling) of `USE_OPENTELEMETRY` turns
 * tracing on. `CONSUMER_GROUP` defaults to `<queue>:consumers`.
 */
export function createEnvSchema(defaults: ConfigDefaults) {
  return z
    .object({
      SERVICE_NAME: optionalEnvString,
      REDIS_URL: optionalEnvString,
      API_URL: optionalEnvString,
      QUEUE_NAME: optionalEnvString,
      CONSUMER_GROUP: optionalEnvString,
      PORT: envInteger(defaults.port),
      METRICS_PORT: envInteger(defaults.metricsPort),
      CONSUMER_RETRY_DELAY_MS: envInteger(3000),
      USE_OPENTELEMETRY: envFlag(false),
      OTEL_EXPORTER_ENDPOINT: optionalEnvString,
      ZIPKIN_URL: optionalEnvString,
      LOG_SPANS: envFlag(false),
      LOG_LEVEL: optionalEnvString,
    })
    .transform(env => ({
      serviceName: env.SERVICE_NAME ?? defaults.serviceName,
      redisUrl: env.REDIS_URL ?? 'redis://localhost:6379',
      apiUrl: env.API_URL ?? 'http://localhost:5002',
      queueName: env.QUEUE_NAME ?? defaults.queueName,
      consumerGroup: env.CONSUMER_GROUP ?? `${env.QUEUE_NAME ?? defaults.queueName}:consumers`,
      port: env.PORT,
      metricsPort: env.METRICS_PORT,
      consumerRetryDelayMs: env.CONSUMER_RETRY_DELAY_MS,
      logLevel: env.LOG_LEVEL ?? 'info',
      tracing: {
        enabled: env.USE_OPENTELEMETRY,
        otlpEndpoint: env.OTEL_EXPORTER_ENDPOINT,
        zipkinUrl: env.ZIPKIN_URL,
        logSpans: env.LOG_SPANS,
      },
    }))
    .pipe(AppConfigSchema);
}

// =============================================================================
// Validation Helpers
// =============================================================================

export interface ValidationIssue {
  path: string;
  message: string;
}

export function formatIssues(error: z.ZodError): ValidationIssue[] {
  return error.errors.map((issue: z.ZodIssue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

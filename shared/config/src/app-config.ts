/**
 * Service configuration loader.
 */

import { ConfigurationError, NO_TRACING_SINK_MESSAGE } from '@msgtrace/core';
import { AppConfig, ConfigDefaults, createEnvSchema, formatIssues } from './schemas';

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Parse and validate the environment.
 *
 * @throws ConfigurationError listing every invalid value, or when tracing is
 * enabled without a span sink
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env, {
 *   serviceName: 'web-api', queueName: Queues.WEB, port: 5000, metricsPort: 5000,
 * });
 * ```
 */
export function loadConfig(env: EnvSource, defaults: ConfigDefaults): AppConfig {
  const result = createEnvSchema(defaults).safeParse(env);

  if (!result.success) {
    const issues = formatIssues(result.error).map(issue => `${issue.path || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n  - ${issues.join('\n  - ')}`, issues);
  }

  const { tracing } = result.data;
  if (tracing.enabled && !tracing.otlpEndpoint && !tracing.zipkinUrl && !tracing.logSpans) {
    throw new ConfigurationError(NO_TRACING_SINK_MESSAGE, [
      'USE_OPENTELEMETRY is set but none of OTEL_EXPORTER_ENDPOINT, ZIPKIN_URL or LOG_SPANS is',
    ]);
  }

  return result.data;
}

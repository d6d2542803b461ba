/**
 * @msgtrace/config
 *
 * Environment parsing and validated service configuration.
 */

export { loadConfig } from './app-config';
export type { EnvSource } from './app-config';

export {
  AppConfigSchema,
  TracingConfigSchema,
  UrlSchema,
  RedisUrlSchema,
  PortSchema,
  LogLevelSchema,
  createEnvSchema,
  formatIssues,
} from './schemas';
export type { AppConfig, TracingConfig, ConfigDefaults, ValidationIssue } from './schemas';

export { safeParseInt, parseBooleanFlag } from './utils/env-parsing';

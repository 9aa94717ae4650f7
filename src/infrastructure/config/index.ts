/**
 * spanline - Configuration Module
 */

export {
  collectorOptionsSchema,
  statsOptionsSchema,
  fileSinkOptionsSchema,
  consoleSinkOptionsSchema,
  samplingOptionsSchema,
  parseOptions,
} from './schemas';

export type {
  CollectorSettings,
  CollectorSettingsInput,
  StatsSettings,
  StatsSettingsInput,
  FileSinkSettings,
  FileSinkSettingsInput,
  ConsoleSinkSettings,
  ConsoleSinkSettingsInput,
  SamplingSettings,
  SamplingSettingsInput,
} from './schemas';

export { loadConfigFromEnv, LOG_LEVELS } from './env';
export type { PipelineConfig, LogLevel } from './env';

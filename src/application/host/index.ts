/**
 * spanline - Hosting Module
 *
 * Pipeline host, background services and logging
 */

// Logger
export type { ILogger, LoggerOptions } from './logger';
export { PinoLogger, createLogger } from './logger';

// Background services
export type { IBackgroundService } from './background';
export { BackgroundServiceBase } from './background';

// Pipeline
export type { PipelineOptions, PipelineStatus, PipelineHealth } from './pipeline';
export { TelemetryPipeline } from './pipeline';

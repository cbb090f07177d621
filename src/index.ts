/**
 * Public API
 */

export * from './anomaly';
export { parseConfig, parseSimulatorConfig, loadConfigFromEnv, getConfigSummary } from './config';
export type { AppConfig, DetectorConfigInput, SimulatorConfig } from './config';
export { createLogger } from './logging/logger';
export type { Logger, LoggerOptions } from './logging/logger';
export { LogComponents } from './logging/components';
export * from './simulation';
export { startMonitor } from './monitor';
export type { MonitorHandle, MonitorOptions } from './monitor';

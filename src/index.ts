/**
 * toolloop - A tool-calling orchestration loop for language models
 */

export * from './agent/index.js';
export * from './tools/index.js';

export {
  CancelledError,
  cancellationReason,
  deriveSignal,
  raceAbort,
  sleep,
  type CancellationReason,
  type DerivedSignal,
} from './cancellation/cancellation.js';

export {
  Logger,
  LOG_LEVELS,
  DEFAULT_LOGGER_CONFIG,
  type LogLevel,
  type EntryLevel,
  type LogContext,
  type LogEntry,
  type LoggerConfig,
} from './logging/logger.js';

export {
  ConfigManager,
  ToolloopConfigSchema,
  DEFAULT_CONFIG,
  type ToolloopConfig,
  type PartialToolloopConfig,
  type ConfigValidationResult,
} from './config/config-manager.js';

export { Workspace, expandHome } from './storage/workspace.js';

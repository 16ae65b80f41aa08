import { join } from 'node:path';
import { ConfigManager, type ToolloopConfig } from '../../config/config-manager.js';
import { Logger } from '../../logging/logger.js';
import { Workspace, expandHome } from '../../storage/workspace.js';

const LOG_FILE_NAME = 'toolloop.log';

/**
 * Everything a command needs from the environment
 */
export interface CliContext {
  workspace: Workspace;
  configManager: ConfigManager;
  config: ToolloopConfig;
  logger: Logger;
  /** Configuration problems; defaults are in effect when present */
  configErrors: string[];
}

/**
 * Absolute path of the main log file for a configuration
 */
export function logFilePath(config: ToolloopConfig): string {
  return join(expandHome(config.logging.path), LOG_FILE_NAME);
}

/**
 * Opens the workspace (creating any missing directories), loads configuration and
 * builds the file logger
 */
export async function loadCliContext(workspace: Workspace = new Workspace()): Promise<CliContext> {
  await workspace.initialize();

  const configManager = new ConfigManager(workspace.configPath);
  const result = await configManager.load();
  const config = configManager.config;

  const logger = new Logger({
    level: config.logging.level,
    path: logFilePath(config),
    maxSize: config.logging.maxSize,
    maxFiles: config.logging.maxFiles,
  });

  return {
    workspace,
    configManager,
    config,
    logger,
    configErrors: result.success ? [] : (result.errors ?? []),
  };
}

/**
 * Prints configuration problems to stderr
 */
export function reportConfigErrors(errors: readonly string[]): void {
  if (errors.length === 0) return;
  console.error('Configuration problems (using defaults):');
  for (const error of errors) {
    console.error(`  - ${error}`);
  }
}

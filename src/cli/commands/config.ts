/**
 * Config command - View and edit configuration
 */

import { Command } from 'commander';
import { ConfigManager } from '../../config/config-manager.js';
import { Workspace } from '../../storage/workspace.js';

/**
 * Creates the config command with subcommands
 */
export function configCommand(): Command {
  const cmd = new Command('config');

  cmd.description('View and edit configuration');

  cmd
    .command('show')
    .description('Show the effective configuration')
    .action(async () => {
      await showConfig();
    });

  cmd
    .command('get <key>')
    .description('Get a configuration value (e.g., orchestrator.maxToolRounds)')
    .action(async (key: string) => {
      await getConfig(key);
    });

  cmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., tools.timeoutMs 5000)')
    .action(async (key: string, value: string) => {
      await setConfig(key, value);
    });

  cmd.action(async () => {
    await showConfig();
  });

  return cmd;
}

/**
 * Parses a command-line value into a number or boolean where it looks like one
 */
export function parseConfigValue(value: string): unknown {
  const numValue = Number(value);
  if (value.trim() !== '' && !Number.isNaN(numValue)) {
    return numValue;
  }
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;
  return value;
}

async function showConfig(): Promise<void> {
  const workspace = new Workspace();
  const configManager = new ConfigManager(workspace.configPath);

  const result = await configManager.load();

  console.log('Current Configuration:\n');
  console.log(JSON.stringify(configManager.config, null, 2));

  if (!result.success && result.errors) {
    console.log('\nWarnings (defaults shown):');
    for (const error of result.errors) {
      console.log(`  - ${error}`);
    }
  }
}

async function setConfig(key: string, value: string): Promise<void> {
  const workspace = new Workspace();
  if (!(await workspace.exists())) {
    await workspace.initialize();
  }

  // Only the file's own settings are saved, never environment overrides
  const configManager = new ConfigManager(workspace.configPath, {});
  const loaded = await configManager.load();
  if (!loaded.success) {
    console.error('Existing configuration is invalid:');
    for (const error of loaded.errors ?? []) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  const parsedValue = parseConfigValue(value);
  const result = configManager.set(key, parsedValue);

  if (!result.success) {
    console.error('Invalid configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  try {
    await configManager.save();
    console.log(`Set ${key} = ${JSON.stringify(parsedValue)}`);
  } catch (error) {
    console.error('Failed to save configuration:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

async function getConfig(key: string): Promise<void> {
  const workspace = new Workspace();
  const configManager = new ConfigManager(workspace.configPath);

  await configManager.load();

  const value = configManager.get(key);

  if (value === undefined) {
    console.error(`Configuration key not set: ${key}`);
    process.exit(1);
  }

  if (typeof value === 'object') {
    console.log(JSON.stringify(value, null, 2));
  } else {
    console.log(String(value));
  }
}

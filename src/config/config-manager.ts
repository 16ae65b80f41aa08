import { z } from 'zod';
import { readFile, writeFile, rename, unlink } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { randomUUID } from 'node:crypto';

/**
 * Configuration schema. Every section defaults, so `{}` is a valid config.
 */
export const ToolloopConfigSchema = z.object({
  orchestrator: z.object({
    maxToolRounds: z.number().int().positive().optional(),
    timeoutMs: z.number().int().positive().optional(),
  }).default({}),

  tools: z.object({
    timeoutMs: z.number().int().positive().optional(),
  }).default({}),

  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    path: z.string().min(1).default('~/.toolloop/logs'),
    maxSize: z.number().int().min(1024).default(10 * 1024 * 1024), // 10MB
    maxFiles: z.number().int().min(1).max(100).default(5),
  }).default({}),
});

export type ToolloopConfig = z.infer<typeof ToolloopConfigSchema>;

/**
 * User-supplied configuration before defaults are applied
 */
export type PartialToolloopConfig = z.input<typeof ToolloopConfigSchema>;

export const DEFAULT_CONFIG: ToolloopConfig = ToolloopConfigSchema.parse({});

const ENV_PREFIX = 'TOOLLOOP_';

const ENV_MAPPINGS: Record<string, string[]> = {
  [`${ENV_PREFIX}ORCHESTRATOR_MAX_TOOL_ROUNDS`]: ['orchestrator', 'maxToolRounds'],
  [`${ENV_PREFIX}ORCHESTRATOR_TIMEOUT_MS`]: ['orchestrator', 'timeoutMs'],
  [`${ENV_PREFIX}TOOLS_TIMEOUT_MS`]: ['tools', 'timeoutMs'],
  [`${ENV_PREFIX}LOGGING_LEVEL`]: ['logging', 'level'],
  [`${ENV_PREFIX}LOGGING_PATH`]: ['logging', 'path'],
  [`${ENV_PREFIX}LOGGING_MAX_SIZE`]: ['logging', 'maxSize'],
  [`${ENV_PREFIX}LOGGING_MAX_FILES`]: ['logging', 'maxFiles'],
};

const NUMERIC_KEYS = new Set(['maxToolRounds', 'timeoutMs', 'maxSize', 'maxFiles']);

export interface ConfigValidationResult {
  success: boolean;
  config?: ToolloopConfig;
  errors?: string[];
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * ConfigManager - Loads, validates and saves configuration
 *
 * Precedence is defaults, then the JSON file, then `TOOLLOOP_*` environment
 * variables. Saves go through a temp file and a rename.
 */
export class ConfigManager {
  private configPath: string;
  private currentConfig: ToolloopConfig;
  private env: NodeJS.ProcessEnv;

  /**
   * @param configPath - Path to the JSON configuration file
   * @param env - Environment to read overrides from
   */
  constructor(configPath: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.currentConfig = DEFAULT_CONFIG;
    this.env = env;
  }

  get config(): ToolloopConfig {
    return this.currentConfig;
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Loads configuration with precedence: defaults → file → environment
   */
  async load(): Promise<ConfigValidationResult> {
    let fileConfig: unknown = {};

    try {
      const content = await readFile(this.configPath, 'utf-8');
      fileConfig = JSON.parse(content);
    } catch (error) {
      if (!isMissing(error)) {
        return {
          success: false,
          errors: [`Failed to read config file: ${error instanceof Error ? error.message : String(error)}`],
        };
      }
    }

    if (!isRecord(fileConfig)) {
      return { success: false, errors: ['Configuration file must contain a JSON object'] };
    }

    let envOverrides: ConfigRecord;
    try {
      envOverrides = this.getEnvironmentOverrides();
    } catch (error) {
      return { success: false, errors: [error instanceof Error ? error.message : String(error)] };
    }

    return this.validate(this.deepMerge(fileConfig, envOverrides));
  }

  /**
   * Validates a configuration and, on success, makes it current
   */
  validate(partialConfig: unknown): ConfigValidationResult {
    const result = ToolloopConfigSchema.safeParse(partialConfig);

    if (result.success) {
      this.currentConfig = result.data;
      return { success: true, config: result.data };
    }

    const errors = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `Configuration error at '${path}': ${issue.message}`;
    });

    return { success: false, errors };
  }

  /**
   * Validates and writes the configuration atomically
   */
  async save(config?: PartialToolloopConfig): Promise<void> {
    const configToSave = config ?? this.currentConfig;

    const validation = this.validate(configToSave);
    if (!validation.success) {
      throw new Error(`Invalid configuration: ${validation.errors?.join(', ')}`);
    }

    await this.atomicWrite(this.configPath, JSON.stringify(configToSave, null, 2));
  }

  async atomicWrite(filePath: string, content: string): Promise<void> {
    const tempPath = join(dirname(filePath), `.config-${randomUUID()}.tmp`);

    try {
      await writeFile(tempPath, content, { mode: 0o600 });
      await rename(tempPath, filePath);
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        if (!isMissing(cleanupError)) throw cleanupError;
      });
      throw error;
    }
  }

  private getEnvironmentOverrides(): ConfigRecord {
    const overrides: ConfigRecord = {};

    for (const [envVar, path] of Object.entries(ENV_MAPPINGS)) {
      const value = this.env[envVar];
      if (value !== undefined) {
        this.setNestedValue(overrides, path, this.parseEnvValue(value, path));
      }
    }

    return overrides;
  }

  private parseEnvValue(value: string, path: string[]): unknown {
    const key = path[path.length - 1] ?? '';

    if (NUMERIC_KEYS.has(key)) {
      const num = Number(value);
      if (value.trim() === '' || Number.isNaN(num)) {
        throw new Error(`Invalid numeric value for ${path.join('.')}: ${value}`);
      }
      return num;
    }

    return value;
  }

  private setNestedValue(obj: ConfigRecord, path: string[], value: unknown): void {
    let current = obj;
    for (const key of path.slice(0, -1)) {
      const next = current[key];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: ConfigRecord = {};
        current[key] = created;
        current = created;
      }
    }
    const lastKey = path[path.length - 1];
    if (lastKey !== undefined) {
      current[lastKey] = value;
    }
  }

  /**
   * Deep merges two plain objects; later values win
   */
  private deepMerge(base: ConfigRecord, overrides: ConfigRecord): ConfigRecord {
    const result: ConfigRecord = { ...base };

    for (const [key, value] of Object.entries(overrides)) {
      const existing = result[key];
      result[key] = isRecord(value) && isRecord(existing) ? this.deepMerge(existing, value) : value;
    }

    return result;
  }

  /**
   * Reads a value by dotted path, e.g. `orchestrator.maxToolRounds`
   */
  get(path: string): unknown {
    let current: unknown = this.currentConfig;

    for (const part of path.split('.')) {
      if (!isRecord(current)) {
        return undefined;
      }
      current = current[part];
    }

    return current;
  }

  /**
   * Sets a value by dotted path and revalidates the whole configuration
   */
  set(path: string, value: unknown): ConfigValidationResult {
    const parts = path.split('.');
    const next: ConfigRecord = structuredClone(this.currentConfig);
    this.setNestedValue(next, parts, value);
    return this.validate(next);
  }
}

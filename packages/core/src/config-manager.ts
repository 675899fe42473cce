import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type BinderyConfig,
  type BinderyConfigOverrides,
  DEFAULT_CONFIG,
  binderyConfigSchema,
  ConfigError,
} from '@bindery/shared';

export interface ConfigLoadOptions {
  configPath?: string;
  /** Defaults to `process.env` */
  env?: NodeJS.ProcessEnv;
}

const CONFIG_FILE_NAMES = ['bindery.config.yaml', 'bindery.config.yml', 'bindery.config.json'];

export class ConfigManager {
  private config: BinderyConfig = DEFAULT_CONFIG;

  async load(options?: ConfigLoadOptions): Promise<BinderyConfig> {
    // 1. Start with defaults
    let merged = deepMerge({}, DEFAULT_CONFIG);

    // 2. Load config file
    const fileConfig = await this.loadConfigFile(options?.configPath);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    // 3. Load environment variables
    merged = deepMerge(merged, loadEnvVars(options?.env ?? process.env));

    // 4. Validate
    this.config = validate(merged);
    return this.config;
  }

  get<K extends keyof BinderyConfig>(key: K): BinderyConfig[K] {
    return this.config[key];
  }

  getAll(): BinderyConfig {
    return this.config;
  }

  set(overrides: BinderyConfigOverrides): void {
    this.config = validate(deepMerge(deepMerge({}, this.config), overrides));
  }

  private async loadConfigFile(configPath?: string): Promise<Record<string, unknown> | null> {
    if (configPath) {
      if (existsSync(configPath)) {
        return this.parseConfigFile(configPath);
      }
      return null;
    }

    // Search cwd and parent directories
    let dir = resolve(process.cwd());

    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return this.parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }

    return null;
  }

  private async parseConfigFile(p: string): Promise<Record<string, unknown>> {
    const content = await readFile(p, 'utf-8');
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`cannot parse ${p}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    return parsed;
  }
}

export function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const extensions: Record<string, unknown> = {};
  const server: Record<string, unknown> = {};
  const config: Record<string, unknown> = {};

  if (env.BINDERY_EXTENSION_REPOSITORY) {
    extensions.repository = env.BINDERY_EXTENSION_REPOSITORY;
  }
  if (env.BINDERY_EXTENSIONS_DIR) {
    extensions.dir = env.BINDERY_EXTENSIONS_DIR;
  }
  if (env.BINDERY_UPDATE_STRATEGY) {
    extensions.updateStrategy = env.BINDERY_UPDATE_STRATEGY;
  }

  if (env.BINDERY_SERVER_PORT) {
    server.port = parseInt(env.BINDERY_SERVER_PORT, 10);
  }
  if (env.BINDERY_SERVER_HOST) {
    server.host = env.BINDERY_SERVER_HOST;
  }
  if (env.BINDERY_API_KEY) {
    server.apiKey = env.BINDERY_API_KEY;
  }

  if (Object.keys(extensions).length > 0) config.extensions = extensions;
  if (Object.keys(server).length > 0) config.server = server;

  if (env.BINDERY_LOG_LEVEL) {
    config.logging = { level: env.BINDERY_LOG_LEVEL };
  }

  return config;
}

function validate(merged: Record<string, unknown>): BinderyConfig {
  const result = binderyConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  return result.data;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: object, source: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  const entries: Array<[string, unknown]> = Object.entries(source);
  for (const [key, value] of entries) {
    const current = result[key];
    if (isPlainObject(value) && isPlainObject(current)) {
      result[key] = deepMerge(current, value);
    } else if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

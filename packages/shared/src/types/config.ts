import type { UpdateStrategy } from './source.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ExtensionsConfig {
  repository?: string;
  dir: string;
  indexTimeoutMs: number;
  updateStrategy: UpdateStrategy;
}

export interface ServerConfig {
  port: number;
  host: string;
  apiKey?: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface BinderyConfig {
  extensions: ExtensionsConfig;
  server: ServerConfig;
  logging: LoggingConfig;
}

export type BinderyConfigOverrides = {
  [K in keyof BinderyConfig]?: Partial<BinderyConfig[K]>;
};

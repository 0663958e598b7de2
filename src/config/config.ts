// Configuration system
// Schema-driven values with layered overrides: defaults < env < runtime

import { readFileSync } from 'node:fs';
import { Env } from '../env.ts';

/**
 * Schema property definition
 */
export interface ConfigProperty {
  type: 'string' | 'integer' | 'number' | 'boolean';
  default?: unknown;
  env?: string;
  enum?: string[];
  minimum?: number;
  maximum?: number;
  description?: string;
}

/**
 * Config schema structure
 */
export interface ConfigSchema {
  properties: Record<string, ConfigProperty>;
}

/**
 * Initialization options for RasterConfig
 */
export interface ConfigInitOptions {
  /** Values set by the embedding program; they win over env vars */
  overrides?: Record<string, unknown>;
}

/**
 * Where a resolved value came from.
 *
 * Priority order (lowest to highest):
 * 1. Schema defaults
 * 2. Env vars
 * 3. Runtime overrides passed to init()
 */
export type ConfigSource = 'default' | 'env' | 'runtime';

const PROPERTY_TYPES: ReadonlySet<string> = new Set(['string', 'integer', 'number', 'boolean']);

function isConfigProperty(value: unknown): value is ConfigProperty {
  if (value === null || typeof value !== 'object' || !('type' in value)) return false;
  return typeof value.type === 'string' && PROPERTY_TYPES.has(value.type);
}

function loadSchema(): ConfigSchema {
  const raw: unknown = JSON.parse(readFileSync(new URL('./schema.json', import.meta.url), 'utf8'));
  const properties: Record<string, ConfigProperty> = {};
  const declared = raw !== null && typeof raw === 'object' && 'properties' in raw ? raw.properties : undefined;
  if (declared === null || typeof declared !== 'object') {
    throw new Error('Config schema has no properties object');
  }
  for (const [path, prop] of Object.entries(declared)) {
    if (!isConfigProperty(prop)) {
      throw new Error(`Config schema property "${path}" is malformed`);
    }
    properties[path] = prop;
  }
  return { properties };
}

// Module-level singletons
let _schema: ConfigSchema | null = null;
let _instance: RasterConfig | null = null;

function getSchemaOnce(): ConfigSchema {
  if (!_schema) {
    _schema = loadSchema();
  }
  return _schema;
}

export class RasterConfig {
  private data: Record<string, unknown> = {};
  private sources: Record<string, ConfigSource> = {};

  private constructor(overrides: Record<string, unknown>) {
    for (const [path, prop] of Object.entries(getSchemaOnce().properties)) {
      const { value, source } = this.resolveValue(path, prop, overrides);
      this.data[path] = value;
      this.sources[path] = source;
    }
  }

  private resolveValue(
    path: string,
    prop: ConfigProperty,
    overrides: Record<string, unknown>
  ): { value: unknown; source: ConfigSource } {
    // 1. Runtime override (highest - explicit caller intent)
    const override = overrides[path];
    if (override !== undefined && this.accepts(prop, override)) {
      return { value: override, source: 'runtime' };
    }

    // 2. Env var
    if (prop.env) {
      const envVal = Env.get(prop.env);
      if (envVal !== undefined && envVal !== '') {
        const parsed = this.parseEnvValue(envVal, prop);
        if (this.accepts(prop, parsed)) {
          return { value: parsed, source: 'env' };
        }
      }
    }

    // 3. Default from schema
    return { value: prop.default, source: 'default' };
  }

  private parseEnvValue(value: string, prop: ConfigProperty): unknown {
    switch (prop.type) {
      case 'boolean':
        return value === 'true' || value === '1';
      case 'integer':
        return parseInt(value, 10);
      case 'number':
        return parseFloat(value);
      default:
        return prop.enum ? this.matchEnum(prop.enum, value) : value;
    }
  }

  private matchEnum(options: string[], value: string): string {
    return options.find(option => option.toLowerCase() === value.toLowerCase()) ?? value;
  }

  /**
   * Check a candidate value against the property's type, enum and range.
   */
  private accepts(prop: ConfigProperty, value: unknown): boolean {
    switch (prop.type) {
      case 'boolean':
        return typeof value === 'boolean';
      case 'integer':
      case 'number':
        if (typeof value !== 'number' || !Number.isFinite(value)) return false;
        if (prop.type === 'integer' && !Number.isInteger(value)) return false;
        if (prop.minimum !== undefined && value < prop.minimum) return false;
        if (prop.maximum !== undefined && value > prop.maximum) return false;
        return true;
      case 'string':
        if (typeof value !== 'string') return false;
        return !prop.enum || prop.enum.includes(value);
    }
  }

  getSource(key: string): ConfigSource | undefined {
    return this.sources[key];
  }

  private getString(key: string): string {
    const value = this.data[key];
    return typeof value === 'string' ? value : '';
  }

  private getNumber(key: string): number {
    const value = this.data[key];
    return typeof value === 'number' ? value : NaN;
  }

  // Logging
  get logLevel(): string {
    return this.getString('log.level');
  }

  get logFile(): string {
    return this.getString('log.file');
  }

  get logFormat(): string {
    return this.getString('log.format');
  }

  // Codecs
  get jpegQuality(): number {
    return this.getNumber('jpeg.quality');
  }

  get sixelMaxColors(): number {
    return this.getNumber('sixel.maxColors');
  }

  /**
   * Initialize config (call once at startup)
   */
  static init(options?: ConfigInitOptions): RasterConfig {
    if (_instance) {
      throw new Error('Config already initialized. Call reset() first if re-initialization is needed.');
    }
    _instance = new RasterConfig(options?.overrides ?? {});
    return _instance;
  }

  /**
   * Get initialized config (auto-inits with defaults if not initialized)
   */
  static get(): RasterConfig {
    if (!_instance) {
      return this.init();
    }
    return _instance;
  }

  static isInitialized(): boolean {
    return _instance !== null;
  }

  /**
   * Reset singleton (for testing)
   */
  static reset(): void {
    _instance = null;
  }

  /**
   * Get the schema for documentation/validation
   */
  static getSchema(): ConfigSchema {
    return getSchemaOnce();
  }
}

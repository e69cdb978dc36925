/**
 * Application Configuration
 *
 * One AppConfig per application. Values are read on demand; nothing here
 * caches a derived value, so a `set` is visible to the next read.
 */

import * as fs from 'fs';
import { parse as parseDotenv } from 'dotenv';
import { MissingConfigError } from './errors.js';

export class AppConfig {
  private readonly values: Map<string, unknown>;

  constructor(initial: Record<string, unknown> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  /**
   * Read a value that must be present. No default is substituted.
   */
  require(key: string): unknown {
    if (!this.values.has(key)) {
      throw new MissingConfigError(key);
    }
    return this.values.get(key);
  }

  requireString(key: string): string {
    const value = this.require(key);
    if (typeof value !== 'string') {
      throw new MissingConfigError(key, `Configuration value '${key}' must be a string`);
    }
    return value;
  }

  set(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  keys(): string[] {
    return Array.from(this.values.keys());
  }
}

export interface LoadConfigOptions {
  /** Only variables starting with this prefix are kept; the prefix is stripped */
  prefix?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Optional dotenv file, overridden by `env` */
  envFile?: string;
  /** Lowest-precedence values */
  defaults?: Record<string, unknown>;
}

/**
 * Build an AppConfig from defaults, a dotenv file and the environment,
 * in increasing order of precedence.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const { prefix = '', env = process.env, envFile, defaults = {} } = options;
  const config = new AppConfig(defaults);

  const sources: Array<Record<string, string | undefined>> = [];
  if (envFile && fs.existsSync(envFile)) {
    sources.push(parseDotenv(fs.readFileSync(envFile)));
  }
  sources.push(env);

  for (const source of sources) {
    for (const [name, value] of Object.entries(source)) {
      if (value === undefined || !name.startsWith(prefix)) continue;
      const key = name.slice(prefix.length);
      if (key) config.set(key, value);
    }
  }

  return config;
}

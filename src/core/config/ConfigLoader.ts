// ---------------------------------------------------------------------------
// PrioBus — Configuration Loader
// ---------------------------------------------------------------------------
// Loads YAML config from disk, applies environment variable overrides,
// validates the result and returns a typed PrioBusConfig.
// ---------------------------------------------------------------------------

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { PrioBusConfig } from '../types/config';
import { ConfigError, toError } from '../../shared/errors';
import { deepMerge, isPlainObject } from '../../shared/utils';
import { ConfigValidator } from './ConfigValidator';
import { DEFAULT_DISPATCHER_CONFIG, DEFAULT_LOGGING_CONFIG } from './defaults';

/** Environment variable, config section, key, and whether the value is numeric. */
const ENV_OVERRIDES: ReadonlyArray<[string, string, string, 'number' | 'string']> = [
  ['PRIOBUS_DISPATCHER_MAX_EVENTS_PER_DRAIN', 'dispatcher', 'maxEventsPerDrain', 'number'],
  ['PRIOBUS_DISPATCHER_HANDLER_ERRORS', 'dispatcher', 'handlerErrors', 'string'],
  ['PRIOBUS_LOGGING_LEVEL', 'logging', 'level', 'string'],
  ['PRIOBUS_LOGGING_FORMAT', 'logging', 'format', 'string'],
];

function defaults(): Record<string, unknown> {
  return {
    dispatcher: { ...DEFAULT_DISPATCHER_CONFIG },
    logging: { ...DEFAULT_LOGGING_CONFIG },
  };
}

export class ConfigLoader {
  constructor(
    private readonly validator: ConfigValidator = new ConfigValidator(),
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  /**
   * Load configuration from a YAML file.
   *
   * A missing file is not an error: defaults (plus env overrides) apply.
   *
   * @returns Merged configuration (defaults ← file ← env overrides).
   * @throws ConfigError if the file cannot be read or parsed, or the
   *   merged result fails validation.
   */
  load(configPath?: string): PrioBusConfig {
    const merged = defaults();

    if (configPath !== undefined) {
      const fromFile = this.readFile(path.resolve(configPath));
      if (fromFile) deepMerge(merged, fromFile);
    }

    this.applyEnvOverrides(merged);
    return this.check(merged, configPath);
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private readFile(resolvedPath: string): Record<string, unknown> | undefined {
    if (!fs.existsSync(resolvedPath)) {
      return undefined;
    }

    let raw: string;
    try {
      raw = fs.readFileSync(resolvedPath, 'utf-8');
    } catch (err) {
      throw new ConfigError(`Failed to read config file: ${resolvedPath}`, toError(err));
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(raw);
    } catch (err) {
      throw new ConfigError(`Failed to parse YAML in config file: ${resolvedPath}`, toError(err));
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file is empty or not an object: ${resolvedPath}`);
    }
    return parsed;
  }

  /**
   * Overrides follow the convention `PRIOBUS_<SECTION>_<KEY>`, e.g.
   *   PRIOBUS_LOGGING_LEVEL=debug
   */
  private applyEnvOverrides(config: Record<string, unknown>): void {
    for (const [name, section, key, kind] of ENV_OVERRIDES) {
      const value = this.env[name];
      if (value === undefined || value === '') continue;

      const current = config[section];
      const target: Record<string, unknown> = isPlainObject(current) ? current : {};
      config[section] = target;

      const numeric = Number(value);
      target[key] = kind === 'number' && !Number.isNaN(numeric) ? numeric : value;
    }
  }

  private check(config: Record<string, unknown>, source: string | undefined): PrioBusConfig {
    if (this.validator.isValid(config)) {
      return config;
    }
    const { errors } = this.validator.validate(config);
    throw new ConfigError(
      `Invalid configuration${source ? ` in ${source}` : ''}: ${errors.join('; ')}`,
    );
  }
}

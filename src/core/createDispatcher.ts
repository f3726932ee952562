// ---------------------------------------------------------------------------
// PrioBus — Composition Root
// ---------------------------------------------------------------------------
// Wires configuration, logging and a dispatcher together. The dispatcher
// is an explicitly owned object; whoever coordinates event flow calls
// this once and keeps the result.
//
// Usage:
//   const { dispatcher } = createDispatcher({ configPath: 'config/default.yaml' });
//   dispatcher.addHandler('player.joined', { priority: 10, callback: onJoin });
//   dispatcher.pushEvent(createEvent('player.joined', 1));
//   dispatcher.processEvents();
// ---------------------------------------------------------------------------

import type { PrioBusConfig } from './types/config';
import type { ILogger } from './types/logger';
import { ConfigLoader } from './config/ConfigLoader';
import { ConfigValidator } from './config/ConfigValidator';
import { EventDispatcher } from './dispatcher/EventDispatcher';
import { Logger } from '../shared/logger';
import { ConfigError } from '../shared/errors';

export interface CreateDispatcherOptions {
  /** YAML file to load. Ignored when `config` is given. */
  configPath?: string;

  /** Fully-formed configuration; validated but not merged with defaults. */
  config?: PrioBusConfig;

  /** Overrides the logger built from `config.logging`. */
  logger?: ILogger;

  /** Environment used for `PRIOBUS_*` overrides. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

export interface DispatcherRuntime {
  readonly dispatcher: EventDispatcher;
  readonly config: PrioBusConfig;
  readonly logger: ILogger;
}

export function createDispatcher(options: CreateDispatcherOptions = {}): DispatcherRuntime {
  const validator = new ConfigValidator();
  const config = options.config ?? new ConfigLoader(validator, options.env).load(options.configPath);

  if (options.config) {
    const result = validator.validate(options.config);
    if (!result.valid) {
      throw new ConfigError(`Invalid configuration: ${result.errors.join('; ')}`);
    }
  }

  const logger = options.logger ?? new Logger({ ...config.logging, prefix: 'PrioBus' });
  const dispatcher = new EventDispatcher({ logger, config: config.dispatcher });

  logger.info('Dispatcher created', {
    maxEventsPerDrain: config.dispatcher.maxEventsPerDrain,
    handlerErrors: config.dispatcher.handlerErrors,
  });

  return { dispatcher, config, logger };
}

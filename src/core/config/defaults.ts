import type { DispatcherConfig, LoggingConfig } from '../types/config';

export const DEFAULT_DISPATCHER_CONFIG: Readonly<DispatcherConfig> = {
  maxEventsPerDrain: 0,
  handlerErrors: 'isolate',
};

export const DEFAULT_LOGGING_CONFIG: Readonly<LoggingConfig> = {
  level: 'info',
  format: 'text',
};

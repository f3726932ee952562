export { ConfigLoader } from './ConfigLoader';
export { ConfigValidator } from './ConfigValidator';
export type { ValidationResult } from './ConfigValidator';
export { DEFAULT_DISPATCHER_CONFIG, DEFAULT_LOGGING_CONFIG } from './defaults';

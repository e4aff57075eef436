// Export utilities
export {
  logger,
  getLogger,
  formatLine,
  configureLogger,
  isLogLevel,
  resolveLogLevel,
} from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';

// Export configuration
export { loadConfig, ConfigurationError } from './config';
export type { AppConfig, OpenAIConfig } from './config';

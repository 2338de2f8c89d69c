// Types
export * from './types/index.js';

// Zod schemas
export * from './schemas/index.js';

// Export document validation (AJV)
export * from './validation/index.js';

// Pure utils (date, money, headers, constants)
export * from './utils/index.js';

// Errors
export {
  StatementError,
  UnknownBankError,
  AuthenticationError,
  UnreadableDocumentError,
  FormatMismatchError,
  isStatementError,
  type StatementErrorKind,
  type AuthenticationFailure,
} from './errors.js';

// Ambient: configuration and logging
export { loadConfig, getConfig, LOG_LEVELS, type Config, type LogLevel } from './config.js';
export { logger, type LogContext } from './logger.js';

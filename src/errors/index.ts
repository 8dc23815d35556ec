/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Validation errors
export {
  ValidationError,
  SchemaValidationError,
} from './ApplicationError.js';

// Resource errors
export { ResourceNotFoundError } from './ApplicationError.js';

// Operational errors (retryable)
export {
  OperationalError,
  DatabaseError,
  DuplicateKeyError,
  ForeignKeyViolationError,
  FileSystemError,
  NetworkError,
} from './ApplicationError.js';

// Permanent errors (not retryable)
export {
  PermanentError,
  ConfigurationError,
  InvalidStateError,
} from './ApplicationError.js';

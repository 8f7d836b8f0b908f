/**
 * Shared error types
 */

export {
  ErrorCode,
  getErrorMessage,
  TdfError,
  MissingTagError,
} from './errors.js';

export {
  ErrorCategory,
  ErrorCode,
  getErrorCategory,
  getErrorMessage,
  isClusterAccessError,
} from './error-codes';
export { LintError, errorMessage } from './lint-error';

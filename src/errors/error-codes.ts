/**
 * Error Codes for the upgrade lint engine
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  SELECTION = 'SELECTION',
  EXECUTION = 'EXECUTION',
  CLUSTER_ACCESS = 'CLUSTER_ACCESS',
}

/**
 * Error Codes
 * L1xx: Configuration Errors - prevent a lint run from starting
 * L2xx: Registry and Selection Errors - surfaced before any check runs
 * L3xx: Execution Errors - attached to a single check execution
 * L4xx: Cluster Access Errors - produced by the resource reader
 */
export enum ErrorCode {
  // L1xx: Configuration Errors
  L101_CONFIG_FILE_UNREADABLE = 'L101',
  L102_CONFIG_SCHEMA_VALIDATION_FAILURE = 'L102',
  L103_INVALID_VERSION = 'L103',
  L104_DOWNGRADE_NOT_SUPPORTED = 'L104',

  // L2xx: Registry and Selection Errors
  L201_DUPLICATE_CHECK_ID = 'L201',
  L202_INVALID_SELECTOR_PATTERN = 'L202',

  // L3xx: Execution Errors
  L301_CHECK_EXECUTION_FAILED = 'L301',
  L302_INVALID_CHECK_RESULT = 'L302',
  L303_CHECK_TIMEOUT = 'L303',
  L304_CHECK_CANCELED = 'L304',

  // L4xx: Cluster Access Errors
  L401_RESOURCE_NOT_FOUND = 'L401',
  L402_RESOURCE_TYPE_NOT_REGISTERED = 'L402',
  L403_ACCESS_DENIED = 'L403',
  L404_REQUEST_TIMEOUT = 'L404',
  L405_API_UNAVAILABLE = 'L405',
  L406_MALFORMED_FIELD = 'L406',
  L407_CLUSTER_REQUEST_FAILED = 'L407',
}

/**
 * Error messages for each error code
 */
const ERROR_MESSAGES: Record<string, string> = {
  // L1xx
  L101: 'Configuration file could not be read',
  L102: 'Configuration schema validation failed',
  L103: 'Invalid version string',
  L104: 'Target version is older than the current version (downgrades not supported)',

  // L2xx
  L201: 'Check ID is already registered',
  L202: 'Invalid check selector pattern',

  // L3xx
  L301: 'Check execution failed',
  L302: 'Check returned an invalid result',
  L303: 'Check execution timed out',
  L304: 'Check execution canceled',

  // L4xx
  L401: 'Resource not found',
  L402: 'Resource type is not registered in the cluster',
  L403: 'Insufficient permissions to access cluster resources',
  L404: 'Request timed out',
  L405: 'API server is unavailable or overloaded',
  L406: 'Resource field has an unexpected type',
  L407: 'Cluster request failed',
};

/**
 * Get the error category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const codeStr = code.toString();
  if (codeStr.startsWith('L1')) {
    return ErrorCategory.CONFIGURATION;
  }
  if (codeStr.startsWith('L2')) {
    return ErrorCategory.SELECTION;
  }
  if (codeStr.startsWith('L3')) {
    return ErrorCategory.EXECUTION;
  }
  if (codeStr.startsWith('L4')) {
    return ErrorCategory.CLUSTER_ACCESS;
  }
  throw new Error(`Unknown error code: ${code}`);
}

/**
 * Get the error message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  const codeStr = code.toString();
  return ERROR_MESSAGES[codeStr] || `Unknown error: ${code}`;
}

/**
 * Check if the error code is a cluster access error (L4xx)
 */
export function isClusterAccessError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.CLUSTER_ACCESS;
}

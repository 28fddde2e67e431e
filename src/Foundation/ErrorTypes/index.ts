/**
 * Foundation/ErrorTypes
 *
 * Unified error handling for the package.
 */

export { ErrorCode, getErrorCodeMessage } from './ErrorCodes';

export {
  ErrorCategory,
  getCategoryFromCode,
  inferCategoryFromError,
  getSystemErrorCode,
} from './ErrorCategory';

export {
  SDKError,
  type SDKErrorOptions,
  type SDKErrorProtocol,
  asSDKError,
  isSDKError,
  toError,
} from './SDKError';

export { InputError } from './InputError';
export { ModelError } from './ModelError';
export { IOError } from './IOError';
export { ValidationError } from './ValidationError';

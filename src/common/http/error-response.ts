import type { ErrorCode } from './error-codes';

/**
 * Shape of every error response written by AllExceptionsFilter.
 */
export interface ErrorResponseBody {
  statusCode: number;
  errorCode: ErrorCode;
  message: string;
  /** Individual validation messages, present for 422 responses */
  details?: string[];
  /** ISO 8601 */
  timestamp: string;
  path: string;
  requestId?: string;
}

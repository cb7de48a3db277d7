import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { ConnectionError, McpMeshError, TimeoutError, toErrorMessage } from '../errors.js';

/**
 * Convert whatever the SDK or a transport threw into the mesh error taxonomy.
 * Errors that are already mesh errors (including a deadline's `TimeoutError` used as
 * the abort reason) pass through unchanged.
 */
export function toConnectorError(error: unknown, operation: string, timeoutMs: number): McpMeshError {
  if (error instanceof McpMeshError) {
    return error;
  }
  if (error instanceof McpError && error.code === ErrorCode.RequestTimeout) {
    return new TimeoutError(operation, timeoutMs, { cause: error });
  }
  return new ConnectionError(`${operation} failed: ${toErrorMessage(error)}`, { cause: error });
}

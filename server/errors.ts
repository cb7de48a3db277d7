/**
 * Error taxonomy for the connectivity layer.
 *
 * Every error raised by this package extends {@link McpMeshError} and carries a stable
 * `code`. Registry and façade operations never throw these at callers; they convert
 * them into an {@link OperationResult} through {@link toOperationFailure}.
 */

export type MeshErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'CONNECTION_ERROR'
  | 'TIMEOUT'
  | 'TOKEN_VALIDATION_FAILED'
  | 'OAUTH_FLOW_FAILED'
  | 'ALREADY_HOSTED'
  | 'SERVER_NOT_FOUND';

export abstract class McpMeshError extends Error {
  abstract readonly code: MeshErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bad or missing configuration. Raised before any I/O and never retried.
 */
export class ConfigurationError extends McpMeshError {
  readonly code = 'CONFIGURATION_ERROR';
}

/**
 * Transport open, handshake or request failure.
 */
export class ConnectionError extends McpMeshError {
  readonly code = 'CONNECTION_ERROR';
}

export class TimeoutError extends McpMeshError {
  readonly code = 'TIMEOUT';
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`${operation} timed out after ${timeoutMs}ms`, options);
    this.timeoutMs = timeoutMs;
  }
}

export type TokenRejectionReason = 'invalid' | 'expired' | 'insufficient_scope';

export class TokenValidationError extends McpMeshError {
  readonly code = 'TOKEN_VALIDATION_FAILED';
  readonly reason: TokenRejectionReason;

  constructor(reason: TokenRejectionReason, message: string) {
    super(message);
    this.reason = reason;
  }
}

export class OAuthFlowError extends McpMeshError {
  readonly code = 'OAUTH_FLOW_FAILED';
}

export class AlreadyHostedError extends McpMeshError {
  readonly code = 'ALREADY_HOSTED';
  readonly serverName: string;

  constructor(serverName: string) {
    super(`Server '${serverName}' is already hosted`);
    this.serverName = serverName;
  }
}

export class ServerNotFoundError extends McpMeshError {
  readonly code = 'SERVER_NOT_FOUND';
  readonly serverName: string;

  constructor(serverName: string) {
    super(`Server '${serverName}' is not registered`);
    this.serverName = serverName;
  }
}

export interface OperationSuccess<T> {
  status: 'success';
  serverName: string;
  data: T;
}

export interface OperationFailure {
  status: 'error' | 'timeout';
  serverName: string;
  message: string;
  /** A {@link MeshErrorCode}, or an operation-level code such as `TOOL_ERROR`. */
  errorCode: string;
}

export type OperationResult<T> = OperationSuccess<T> | OperationFailure;

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}

export function operationSuccess<T>(serverName: string, data: T): OperationSuccess<T> {
  return { status: 'success', serverName, data };
}

export function toOperationFailure(error: unknown, serverName: string): OperationFailure {
  if (error instanceof TimeoutError) {
    return { status: 'timeout', serverName, message: error.message, errorCode: error.code };
  }
  if (error instanceof McpMeshError) {
    return { status: 'error', serverName, message: error.message, errorCode: error.code };
  }
  return { status: 'error', serverName, message: toErrorMessage(error), errorCode: 'UNEXPECTED_ERROR' };
}

export function isSuccess<T>(result: OperationResult<T>): result is OperationSuccess<T> {
  return result.status === 'success';
}

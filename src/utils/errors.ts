import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';

/**
 * Raised when a toggle (or any lookup) names a session that was never configured
 */
export class UnknownSessionError extends McpError {
  constructor(public readonly sessionName: string) {
    super(ErrorCode.InvalidParams, `Unknown session: ${sessionName}`, { session: sessionName });
    this.name = 'UnknownSessionError';
  }
}

/**
 * Raised at setup when two configuration entries share a name
 */
export class DuplicateSessionNameError extends McpError {
  constructor(public readonly sessionName: string) {
    super(ErrorCode.InvalidRequest, `Duplicate session name: ${sessionName}`, { session: sessionName });
    this.name = 'DuplicateSessionNameError';
  }
}

/**
 * Wrap any error into an McpError
 */
export function wrapError(error: unknown, context: string): McpError {
  if (error instanceof McpError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  return new McpError(
    ErrorCode.InternalError,
    `${context}: ${message}`,
    { originalError: message }
  );
}

/**
 * Create a validation error for invalid parameters
 */
export function createValidationError(message: string, details?: Record<string, unknown>): McpError {
  return new McpError(
    ErrorCode.InvalidParams,
    message,
    details
  );
}

/**
 * Render an error as the text of a failed tool call
 */
export function errorText(error: unknown): string {
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

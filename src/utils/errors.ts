import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';

export type AgentErrorCode =
  | 'NOT_FOUND'
  | 'EXEC_FAILURE'
  | 'SESSION_CLOSED'
  | 'COMMAND_REJECTED'
  | 'INTERNAL';

/**
 * Typed failure of a control operation. Scoped to one session, never fatal to the agent.
 */
export class AgentError extends Error {
  constructor(
    readonly code: AgentErrorCode,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AgentError';
  }
}

const HTTP_STATUS: Record<AgentErrorCode, number> = {
  NOT_FOUND: 404,
  EXEC_FAILURE: 500,
  SESSION_CLOSED: 409,
  COMMAND_REJECTED: 403,
  INTERNAL: 500,
};

export function httpStatusFor(code: AgentErrorCode): number {
  return HTTP_STATUS[code];
}

/**
 * Wrap any error into an McpError
 */
export function wrapError(error: unknown, context: string): McpError {
  if (error instanceof McpError) {
    return error;
  }

  if (error instanceof AgentError) {
    const mcpCode = error.code === 'INTERNAL' || error.code === 'EXEC_FAILURE'
      ? ErrorCode.InternalError
      : ErrorCode.InvalidRequest;
    return new McpError(mcpCode, `${context}: ${error.message}`, { code: error.code, ...error.details });
  }

  const message = error instanceof Error ? error.message : String(error);

  return new McpError(
    ErrorCode.InternalError,
    `${context}: ${message}`,
    { originalError: message }
  );
}

export function createNotFoundError(id: string, kind: string = 'Process'): AgentError {
  return new AgentError('NOT_FOUND', `${kind} not found: ${id}`, { id });
}

export function createExecError(command: string, cause: unknown): AgentError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new AgentError('EXEC_FAILURE', `Failed to execute "${command}": ${reason}`, { command });
}

export function createSessionClosedError(id: string): AgentError {
  return new AgentError('SESSION_CLOSED', `Session ${id} has already exited`, { id });
}

export function createRejectedError(command: string, reason: string): AgentError {
  return new AgentError('COMMAND_REJECTED', reason, { command });
}

export function createInternalError(message: string, details?: Record<string, unknown>): AgentError {
  return new AgentError('INTERNAL', message, details);
}

/**
 * Narrow an unknown error to a Node.js system error carrying an errno code
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

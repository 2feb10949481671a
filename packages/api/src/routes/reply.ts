import type { FastifyReply } from 'fastify';
import { AppError, CancelledError, ValidationError, errorMessage } from '../errors';

export interface ErrorBody {
  error: string;
  code: string;
  requestId: string;
  details?: unknown;
}

/**
 * Map any thrown value to the API error body and its HTTP status.
 *
 * Fastify's own errors (bad JSON, wrong content type) keep their 4xx
 * status; anything untyped is a 500 with a generic message.
 */
export function toErrorResponse(error: unknown, requestId: string): { status: number; body: ErrorBody } {
  if (error instanceof ValidationError) {
    return {
      status: error.statusCode,
      body: { error: error.message, code: error.code, requestId, details: error.issues },
    };
  }

  if (error instanceof AppError) {
    return { status: error.statusCode, body: { error: error.message, code: error.code, requestId } };
  }

  if (isClientError(error)) {
    return {
      status: error.statusCode,
      body: { error: error.message, code: error.code ?? 'BAD_REQUEST', requestId },
    };
  }

  return { status: 500, body: { error: 'Internal server error', code: 'INTERNAL_ERROR', requestId } };
}

/** The response side of a client connection. */
export interface ClientConnection {
  readonly writableEnded: boolean;
  once(event: 'close', listener: () => void): unknown;
}

/**
 * Signal that aborts with CancelledError when the client goes away before
 * the response has been written.
 */
export function abortOnDisconnect(connection: ClientConnection, operation: string): AbortSignal {
  const controller = new AbortController();
  connection.once('close', () => {
    if (!connection.writableEnded) {
      controller.abort(new CancelledError(operation));
    }
  });
  return controller.signal;
}

export function sendError(reply: FastifyReply, error: unknown, requestId: string): FastifyReply {
  const { status, body } = toErrorResponse(error, requestId);

  if (status >= 500) {
    reply.log.error({ requestId, code: body.code, error: errorMessage(error) }, 'Request failed');
  } else {
    reply.log.warn({ requestId, code: body.code, error: body.error }, 'Request rejected');
  }

  return reply.code(status).send(body);
}

function isClientError(error: unknown): error is { statusCode: number; message: string; code?: string } {
  if (typeof error !== 'object' || error === null || !('statusCode' in error) || !('message' in error)) {
    return false;
  }
  const { statusCode, message } = error;
  const code = 'code' in error ? error.code : undefined;
  return (
    typeof statusCode === 'number' &&
    statusCode >= 400 &&
    statusCode < 500 &&
    typeof message === 'string' &&
    (code === undefined || typeof code === 'string')
  );
}

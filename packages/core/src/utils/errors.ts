/**
 * Extracts a readable message from an unknown error value.
 * Use in route catch blocks: `sendError(reply, 400, toErrorMessage(err))`
 */
export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

const HTTP_STATUS_NAMES: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  409: 'Conflict',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};

export function httpStatusName(code: number): string {
  return HTTP_STATUS_NAMES[code] ?? 'Error';
}

export interface ErrorBody {
  error: string;
  message: string;
  statusCode: number;
}

/** Structural slice of FastifyReply used by sendError. */
export interface ErrorReply<R> {
  code(statusCode: number): { send(payload: ErrorBody): R };
}

export function sendError<R>(reply: ErrorReply<R>, statusCode: number, message: string): R {
  return reply.code(statusCode).send({ error: httpStatusName(statusCode), message, statusCode });
}

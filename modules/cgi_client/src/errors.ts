export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number
  ) {
    super(message);
  }
}

export function forbidden(message: string = 'Forbidden'): GatewayError {
  return new GatewayError(message, 'FORBIDDEN', 403);
}

export function badRequest(message: string = 'Bad Request', code: string = 'BAD_REQUEST'): GatewayError {
  return new GatewayError(message, code, 400);
}

export function notFound(message: string = 'Not Found', code: string = 'NOT_FOUND'): GatewayError {
  return new GatewayError(message, code, 404);
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

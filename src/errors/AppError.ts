/**
 * HTTP-facing error with a status code. Engine-level failures use the
 * domain errors in `./domainErrors`; the error handler maps those.
 *
 * @example
 * throw AppError.notFound('Game not found');
 * throw AppError.badRequest('Home and away teams must differ', { homeTeam, awayTeam });
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /** 400, with the offending input echoed back in `details`. */
  static badRequest(message: string, details?: unknown): AppError {
    return new AppError(message, 400, 'BAD_REQUEST', details);
  }

  /** 401 - missing or wrong admin token */
  static unauthorized(message = 'Unauthorized'): AppError {
    return new AppError(message, 401, 'UNAUTHORIZED');
  }

  static notFound(message = 'Not found'): AppError {
    return new AppError(message, 404, 'NOT_FOUND');
  }

  /** 503 - route disabled by configuration */
  static unavailable(message: string): AppError {
    return new AppError(message, 503, 'UNAVAILABLE');
  }
}

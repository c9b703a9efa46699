/**
 * Error carrying an HTTP status and a stable machine-readable code.
 * Rendered by the global error handler as `{ error: { code, message } }`.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(statusCode: number, code: string, message: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

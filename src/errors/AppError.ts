/**
 * Base class for errors that map to an HTTP status code
 * Anything that is not an AppError is rendered as a 500 by the error handler
 */
export class AppError extends Error {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

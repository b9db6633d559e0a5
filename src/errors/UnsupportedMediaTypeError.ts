import { AppError } from './AppError';

/**
 * Unsupported Media Type Error (415)
 */
export class UnsupportedMediaTypeError extends AppError {
  constructor(expectedMediaType: string) {
    super(`Content-Type must be ${expectedMediaType}`, 415);
    Object.setPrototypeOf(this, UnsupportedMediaTypeError.prototype);
  }
}

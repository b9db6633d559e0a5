import { AppError } from './AppError';

/**
 * Method Not Allowed Error (405)
 * Carries the verbs the path does support so the response can set `Allow`
 */
export class MethodNotAllowedError extends AppError {
  public readonly allowedMethods: readonly string[];

  constructor(method: string, allowedMethods: readonly string[]) {
    super(`Method ${method} is not allowed on this resource`, 405);
    this.allowedMethods = allowedMethods;
    Object.setPrototypeOf(this, MethodNotAllowedError.prototype);
  }
}

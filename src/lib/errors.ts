// src/lib/errors.ts

/**
 * Base class for application errors.
 * Each subclass maps to one recovery policy in the conversation controller.
 */
export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed user input (phone, email, discount code, oversized audio).
 * Recovered locally by re-prompting.
 */
export class ValidationError extends AppError {}

/**
 * Generator or speech provider failure, including timeouts
 */
export class ExternalServiceError extends AppError {
  constructor(
    message: string,
    readonly service: 'generator' | 'speech',
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Missing record (profile not found when generation is requested)
 */
export class NotFoundError extends AppError {}

/**
 * Storage write failure; the unit of work is rolled back
 */
export class PersistenceError extends AppError {}

/**
 * Check whether an error came from an aborted operation
 */
export function isAbortError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return err.name === 'AbortError' || err.name === 'APIUserAbortError';
}

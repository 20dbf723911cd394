/**
 * Error taxonomy of the desk. Every error carries a short message meant for the
 * operator; `usage` is the expected input shape when one applies.
 */

export type DeskErrorCode =
  | 'VALIDATION'
  | 'AUTHORIZATION'
  | 'NOT_FOUND'
  | 'TRANSPORT'
  | 'PERSISTENCE';

export class DeskError extends Error {
  readonly code: DeskErrorCode;
  readonly usage?: string;
  /** HTTP status used when the error reaches the tracker server */
  readonly statusCode: number;

  constructor(code: DeskErrorCode, message: string, options?: { usage?: string; cause?: unknown; statusCode?: number }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.usage = options?.usage;
    this.statusCode = options?.statusCode ?? 500;
  }
}

export class ValidationError extends DeskError {
  constructor(message: string, usage?: string) {
    super('VALIDATION', message, { usage, statusCode: 400 });
  }
}

export class AuthorizationError extends DeskError {
  constructor(message = "You're not authorized to use this command.") {
    super('AUTHORIZATION', message, { statusCode: 403 });
  }
}

export class NotFoundError extends DeskError {
  constructor(message: string, usage?: string) {
    super('NOT_FOUND', message, { usage, statusCode: 404 });
  }
}

export class TransportError extends DeskError {
  constructor(message: string, cause?: unknown) {
    super('TRANSPORT', message, { cause, statusCode: 502 });
  }
}

export class PersistenceError extends DeskError {
  constructor(message: string, cause?: unknown) {
    super('PERSISTENCE', message, { cause });
  }
}

export function isDeskError(err: unknown): err is DeskError {
  return err instanceof DeskError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

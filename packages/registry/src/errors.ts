export type RegistryErrorCode =
  | "validation_error"
  | "authorization_error"
  | "not_found"
  | "conflict"
  | "invariant_violation";

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;
  // snake_case detail, stable across releases
  readonly reason: string;

  constructor(code: RegistryErrorCode, reason: string, message?: string) {
    super(message ?? reason);
    this.name = new.target.name;
    this.code = code;
    this.reason = reason;
  }
}

export class ValidationError extends RegistryError {
  constructor(reason: string, message?: string) {
    super("validation_error", reason, message);
  }
}

export class AuthorizationError extends RegistryError {
  constructor(reason: string, message?: string) {
    super("authorization_error", reason, message);
  }
}

export class NotFoundError extends RegistryError {
  constructor(reason: string, message?: string) {
    super("not_found", reason, message);
  }
}

export class ConflictError extends RegistryError {
  constructor(reason: string, message?: string) {
    super("conflict", reason, message);
  }
}

export class InvariantViolation extends RegistryError {
  constructor(reason: string, message?: string) {
    super("invariant_violation", reason, message);
  }
}

export const isRegistryError = (value: unknown): value is RegistryError =>
  value instanceof RegistryError;

import { HttpException, HttpStatus } from "@nestjs/common";

export type DomainErrorKind =
  | "ValidationError"
  | "NotFound"
  | "Forbidden"
  | "IllegalTransition"
  | "PreconditionFailed"
  | "Conflict"
  | "Unavailable";

const STATUS_BY_KIND: Record<DomainErrorKind, HttpStatus> = {
  ValidationError: HttpStatus.BAD_REQUEST,
  NotFound: HttpStatus.NOT_FOUND,
  Forbidden: HttpStatus.FORBIDDEN,
  IllegalTransition: HttpStatus.CONFLICT,
  PreconditionFailed: HttpStatus.PRECONDITION_FAILED,
  Conflict: HttpStatus.CONFLICT,
  Unavailable: HttpStatus.SERVICE_UNAVAILABLE,
};

/**
 * Base for every rejection raised by the order core. `kind` is the stable
 * taxonomy a caller branches on; `code` narrows it (e.g. `DriverUnavailable`
 * vs `AlreadyAssigned` are both `Conflict`).
 */
export class DomainError extends HttpException {
  constructor(
    readonly kind: DomainErrorKind,
    readonly code: string,
    message: string,
  ) {
    const statusCode = STATUS_BY_KIND[kind];
    super({ statusCode, error: kind, code, message }, statusCode);
  }
}

export class ValidationError extends DomainError {
  constructor(message: string, code = "InvalidInput") {
    super("ValidationError", code, message);
  }
}

export class NotFoundError extends DomainError {
  constructor(message: string, code: "OrderNotFound" | "DriverNotFound") {
    super("NotFound", code, message);
  }
}

export class ForbiddenError extends DomainError {
  constructor(message: string, code = "Forbidden") {
    super("Forbidden", code, message);
  }
}

export class IllegalTransitionError extends DomainError {
  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super("IllegalTransition", "IllegalTransition", `Invalid transition: ${from} -> ${to}`);
  }
}

export class PreconditionFailedError extends DomainError {
  constructor(message: string, code = "PreconditionFailed") {
    super("PreconditionFailed", code, message);
  }
}

export class ConflictError extends DomainError {
  constructor(message: string, code: "AlreadyAssigned" | "DriverUnavailable" | "DriverBusy") {
    super("Conflict", code, message);
  }
}

export class UnavailableError extends DomainError {
  constructor(message: string, code: "NoDriversAvailable" | "LockTimeout" | "Contention") {
    super("Unavailable", code, message);
  }
}

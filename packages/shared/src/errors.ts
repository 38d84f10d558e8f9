import { ZodError } from "zod";

export type ErrorCode =
  | "validation_error"
  | "version_conflict"
  | "storage_failure"
  | "projection_handler_error"
  | "projection_not_found"
  | "projection_already_registered"
  | "rebuild_cancelled"
  | "saga_step_failure"
  | "saga_compensation_failure"
  | "saga_not_found"
  | "unknown_saga_type"
  | "step_timeout";

export class StrataError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StrataError";
    Object.setPrototypeOf(this, StrataError.prototype);
  }
}

/**
 * Malformed command or event. Raised before anything is appended.
 */
export class ValidationError extends StrataError {
  constructor(message: string, public readonly issues: string[] = [message]) {
    super("validation_error", message);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static fromZod(error: ZodError, message = "validation failed"): ValidationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return new ValidationError(message, issues);
  }
}

export class VersionConflictError extends StrataError {
  constructor(
    public readonly streamId: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number
  ) {
    super(
      "version_conflict",
      `Version conflict on stream '${streamId}': expected version ${expectedVersion}, actual version ${actualVersion}`
    );
    this.name = "VersionConflictError";
    Object.setPrototypeOf(this, VersionConflictError.prototype);
  }
}

/**
 * I/O or transport fault in durable storage. Callers may retry with backoff.
 */
export class StorageFailureError extends StrataError {
  constructor(message: string, cause?: unknown) {
    super("storage_failure", cause ? `${message}: ${errorMessage(cause)}` : message, { cause });
    this.name = "StorageFailureError";
    Object.setPrototypeOf(this, StorageFailureError.prototype);
  }
}

export class ProjectionHandlerError extends StrataError {
  constructor(
    public readonly projectionName: string,
    public readonly eventType: string,
    public readonly globalPosition: number,
    cause: unknown
  ) {
    super(
      "projection_handler_error",
      `[Projection: ${projectionName}] failed to process '${eventType}' at position ${globalPosition}: ${errorMessage(cause)}`,
      { cause }
    );
    this.name = "ProjectionHandlerError";
    Object.setPrototypeOf(this, ProjectionHandlerError.prototype);
  }
}

export class ProjectionNotFoundError extends StrataError {
  constructor(public readonly projectionName: string) {
    super("projection_not_found", `[Projection: ${projectionName}] not registered`);
    this.name = "ProjectionNotFoundError";
    Object.setPrototypeOf(this, ProjectionNotFoundError.prototype);
  }
}

export class ProjectionAlreadyRegisteredError extends StrataError {
  constructor(public readonly projectionName: string) {
    super("projection_already_registered", `[Projection: ${projectionName}] already registered`);
    this.name = "ProjectionAlreadyRegisteredError";
    Object.setPrototypeOf(this, ProjectionAlreadyRegisteredError.prototype);
  }
}

export class RebuildCancelledError extends StrataError {
  constructor(
    public readonly projectionName: string,
    reason = "rebuild cancelled"
  ) {
    super("rebuild_cancelled", `[Projection: ${projectionName}] ${reason}`);
    this.name = "RebuildCancelledError";
    Object.setPrototypeOf(this, RebuildCancelledError.prototype);
  }
}

export class SagaStepFailureError extends StrataError {
  constructor(
    public readonly sagaId: string,
    public readonly stepName: string,
    cause: unknown
  ) {
    super("saga_step_failure", `Saga '${sagaId}' step '${stepName}' failed: ${errorMessage(cause)}`, { cause });
    this.name = "SagaStepFailureError";
    Object.setPrototypeOf(this, SagaStepFailureError.prototype);
  }
}

/**
 * Terminal. The saga stays in `compensation_failed` until an operator steps in.
 */
export class SagaCompensationFailureError extends StrataError {
  constructor(
    public readonly sagaId: string,
    public readonly stepName: string,
    cause: unknown
  ) {
    super(
      "saga_compensation_failure",
      `Saga '${sagaId}' compensation of step '${stepName}' failed: ${errorMessage(cause)}`,
      { cause }
    );
    this.name = "SagaCompensationFailureError";
    Object.setPrototypeOf(this, SagaCompensationFailureError.prototype);
  }
}

export class SagaNotFoundError extends StrataError {
  constructor(public readonly sagaId: string) {
    super("saga_not_found", `Saga '${sagaId}' not found`);
    this.name = "SagaNotFoundError";
    Object.setPrototypeOf(this, SagaNotFoundError.prototype);
  }
}

export class UnknownSagaTypeError extends StrataError {
  constructor(public readonly sagaType: string) {
    super("unknown_saga_type", `Saga type '${sagaType}' is not registered`);
    this.name = "UnknownSagaTypeError";
    Object.setPrototypeOf(this, UnknownSagaTypeError.prototype);
  }
}

export class StepTimeoutError extends StrataError {
  constructor(
    public readonly action: string,
    public readonly timeoutMs: number
  ) {
    super("step_timeout", `'${action}' timed out after ${timeoutMs}ms`);
    this.name = "StepTimeoutError";
    Object.setPrototypeOf(this, StepTimeoutError.prototype);
  }
}

export const errorMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return JSON.stringify(err) ?? String(err);
};

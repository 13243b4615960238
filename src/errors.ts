import { AppError } from "./middleware/errorHandler.js";

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, { code: "validation_failed", details });
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, { code: "not_found" });
  }
}

/** Model credential missing; only the generator is affected. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 503, { code: "not_configured" });
  }
}

export type GenerationErrorKind =
  | "validation"
  | "model_unavailable"
  | "malformed_response"
  | "schema_violation";

export class GenerationError extends Error {
  readonly kind: GenerationErrorKind;

  constructor(kind: GenerationErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class InvalidProfileError extends GenerationError {
  constructor(message: string, cause?: unknown) {
    super("validation", message, cause);
  }
}

export class ModelUnavailableError extends GenerationError {
  constructor(message: string, cause?: unknown) {
    super("model_unavailable", message, cause);
  }
}

export class MalformedResponseError extends GenerationError {
  constructor(message: string, cause?: unknown) {
    super("malformed_response", message, cause);
  }
}

export class SchemaViolationError extends GenerationError {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super("schema_violation", message);
    this.issues = issues;
  }
}

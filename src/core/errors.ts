export class DomainError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed or missing input. Never retried. */
export class ValidationError extends DomainError {
  constructor(message: string) {
    super(400, "validation_error", message);
  }
}

export class AuthorizationError extends DomainError {
  constructor(message: string) {
    super(403, "authorization_error", message);
  }
}

export class NotFoundError extends DomainError {
  constructor(message: string) {
    super(404, "not_found", message);
  }
}

/** The entity is not in a state that allows the operation; callers should re-fetch. */
export class StateConflictError extends DomainError {
  constructor(message: string) {
    super(409, "state_conflict", message);
  }
}

export class GenerationExhaustedError extends DomainError {
  constructor(
    public readonly prefix: string,
    public readonly length: number,
    public readonly attempts: number
  ) {
    super(
      503,
      "generation_exhausted",
      `No free asset tag found for prefix "${prefix}" with ${length} digits after ${attempts} attempts.`
    );
  }
}

/** A write would leave a reference to a missing or foreign entity. */
export class CrossEntityInconsistencyError extends DomainError {
  constructor(message: string) {
    super(422, "cross_entity_inconsistency", message);
  }
}

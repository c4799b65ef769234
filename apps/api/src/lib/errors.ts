export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed or missing input. */
export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

/** Missing or invalid session, or bad credentials. */
export class AuthError extends HttpError {
  constructor(message = "Authentication required") {
    super(401, message);
  }
}

/** Resource absent, or owned by someone else. */
export class NotFoundError extends HttpError {
  constructor(message = "NOT_FOUND") {
    super(404, message);
  }
}

/** Duplicate value on a unique field. Reported as a bad request. */
export class ConflictError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

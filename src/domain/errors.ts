/**
 * API error taxonomy
 *
 * Every failure a handler reports on purpose is one of these. Routes map them
 * straight to an HTTP status and an `{ error }` body.
 */

export class ApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/**
 * Credential missing or not matching a known teacher (401)
 */
export class UnauthenticatedError extends ApiError {
  constructor(message = "Authentication required for this action") {
    super(401, message);
  }
}

/**
 * Referenced activity, announcement or teacher does not exist (404)
 */
export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(404, message);
  }
}

/**
 * Business-rule violation: duplicate signup, bad dates, missing fields (400)
 */
export class InvalidRequestError extends ApiError {
  constructor(message: string) {
    super(400, message);
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

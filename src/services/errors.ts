/**
 * Error types surfaced by the streaming core.
 *
 * Each carries an HTTP status and a machine-readable code so the routing
 * layer can answer with the usual `{ error: { code, message } }` body.
 */

export class RelayError extends Error {
  status: number;
  code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = "RelayError";
    this.status = status;
    this.code = code;
  }
}

/** A caller passed a value that breaks a contract (e.g. a non-integer retry). */
export class ValidationError extends RelayError {
  constructor(message: string) {
    super(400, "VALIDATION_ERROR", message);
    this.name = "ValidationError";
  }
}

/** An explicit subscriber id is already held by an active subscriber. */
export class DuplicateSubscriptionError extends RelayError {
  subscriberId: string;

  constructor(subscriberId: string) {
    super(400, "DUPLICATE_SUBSCRIPTION", `Subscriber ${subscriberId} is already registered`);
    this.name = "DuplicateSubscriptionError";
    this.subscriberId = subscriberId;
  }
}

/**
 * Thrown by a pre-subscription hook to refuse a connection with a specific
 * status (401 for a bad token, 403 for a forbidden channel, ...).
 */
export class SubscriptionRejectedError extends RelayError {
  constructor(status: number, code: string, message: string) {
    super(status, code, message);
    this.name = "SubscriptionRejectedError";
  }
}

export type ChallengeErrorCode =
  | "NO_ELIGIBLE_ITEMS"
  | "ALREADY_ANSWERED_CORRECTLY"
  | "ATTEMPTS_EXHAUSTED"
  | "MALFORMED_ANSWER_PAYLOAD"
  | "ITEM_NOT_FOUND"
  | "ITEM_IN_USE"
  | "SELECTION_CONTENTION"
  | "ATTEMPT_CONFLICT"
  | "STORE_UNAVAILABLE";

export class ChallengeError extends Error {
  readonly code: ChallengeErrorCode;

  constructor(code: ChallengeErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ChallengeError";
    this.code = code;
  }
}

export function isChallengeError(
  error: unknown,
  code?: ChallengeErrorCode
): error is ChallengeError {
  return (
    error instanceof ChallengeError && (code === undefined || error.code === code)
  );
}

/** Thrown by store implementations for failures worth one more try. */
export class TransientStoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransientStoreError";
  }
}

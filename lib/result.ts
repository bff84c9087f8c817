export type FailureReason =
  | "not-found"
  | "fetch-error"
  | "invalid-response"
  | "unavailable"
  | "malformed-document"
  | "invalid-input";

export type Success<T> = { ok: true; value: T };
export type Failure = { ok: false; reason: FailureReason; message: string };

export type Result<T> = Success<T> | Failure;

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(reason: FailureReason, message: string): Failure {
  return { ok: false, reason, message };
}

const REASON_LABELS: Record<FailureReason, string> = {
  "not-found": "Not found",
  "fetch-error": "Fetch failed",
  "invalid-response": "Unexpected response",
  unavailable: "Unavailable",
  "malformed-document": "Malformed document",
  "invalid-input": "Invalid input",
};

export function describeFailure(failure: Failure): string {
  return `${REASON_LABELS[failure.reason]}: ${failure.message}`;
}

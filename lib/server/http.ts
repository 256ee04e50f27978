import { NextResponse } from "next/server";
import { isChallengeError } from "@/lib/challenge/errors";
import type { ChallengeErrorCode } from "@/lib/challenge/errors";

const STATUS_BY_CODE: Record<ChallengeErrorCode, number> = {
  NO_ELIGIBLE_ITEMS: 503,
  ALREADY_ANSWERED_CORRECTLY: 409,
  ATTEMPTS_EXHAUSTED: 409,
  MALFORMED_ANSWER_PAYLOAD: 400,
  ITEM_NOT_FOUND: 500,
  ITEM_IN_USE: 409,
  SELECTION_CONTENTION: 503,
  ATTEMPT_CONFLICT: 503,
  STORE_UNAVAILABLE: 503,
};

export function unauthorized() {
  return NextResponse.json({ error: "Unauthorized" }, { status: 401 });
}

export function errorResponse(error: unknown, fallbackMessage: string) {
  if (isChallengeError(error)) {
    const status = STATUS_BY_CODE[error.code];
    if (status >= 500) {
      console.error(`[api] ${error.code}:`, error);
    }
    return NextResponse.json(
      { error: error.message, code: error.code },
      { status }
    );
  }
  console.error(`[api] ${fallbackMessage}`, error);
  return NextResponse.json({ error: fallbackMessage }, { status: 500 });
}

export type RateLimitDecision = { allowed: boolean; retryAfterMs: number };

// Only today's question takes answers, so the state holds one question at a time.
type AnswerWindows = {
  questionId: string | null;
  lastAnswerAt: Map<string, number>;
};

// Survives module reloads in dev so limits are not reset on every edit.
const GLOBAL_KEY = "__dailyAnswerWindows__";

function shouldBypassRateLimitInTests(): boolean {
  return (
    process.env.NODE_ENV === "test" &&
    process.env.ENABLE_RATE_LIMIT_IN_TESTS !== "true"
  );
}

function getWindows(): AnswerWindows {
  const globalObj = globalThis as typeof globalThis & {
    [GLOBAL_KEY]?: AnswerWindows;
  };
  const existing = globalObj[GLOBAL_KEY];
  if (existing) {
    return existing;
  }
  const created: AnswerWindows = { questionId: null, lastAnswerAt: new Map() };
  globalObj[GLOBAL_KEY] = created;
  return created;
}

export function resetRateLimits() {
  const windows = getWindows();
  windows.questionId = null;
  windows.lastAnswerAt.clear();
}

/**
 * Allows one answer per user per window on the given question. Moving to a
 * new question drops every window kept for the previous one.
 */
export function consumeAnswerSlot(
  uid: string,
  questionId: string,
  options?: { windowMs?: number; now?: number }
): RateLimitDecision {
  if (shouldBypassRateLimitInTests()) {
    return { allowed: true, retryAfterMs: 0 };
  }
  const windowMs = options?.windowMs ?? 1000;
  const now = options?.now ?? Date.now();
  const windows = getWindows();
  if (windows.questionId !== questionId) {
    windows.questionId = questionId;
    windows.lastAnswerAt.clear();
  }

  const lastAnswerAt = windows.lastAnswerAt.get(uid);
  if (lastAnswerAt !== undefined && now - lastAnswerAt < windowMs) {
    return { allowed: false, retryAfterMs: windowMs - (now - lastAnswerAt) };
  }

  windows.lastAnswerAt.set(uid, now);
  return { allowed: true, retryAfterMs: 0 };
}

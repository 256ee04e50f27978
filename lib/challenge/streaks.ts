import { shiftDateKey } from "@/lib/challenge/date";
import type { ChallengeStore } from "@/lib/challenge/store";
import type { UserStreakState } from "@/lib/challenge/types";
import { withSingleRetry } from "@/lib/server/retry";

export type ChallengeOutcome = {
  isCorrect: boolean;
  itemCode: string;
  date: string;
};

export function emptyStreak(uid: string): UserStreakState {
  return {
    uid,
    currentStreak: 0,
    longestStreak: 0,
    totalCorrect: 0,
    lastCorrectDate: null,
    lastGuessDate: null,
    missedItemCodes: [],
    updatedAt: null,
  };
}

/**
 * Folds one finished challenge into the streak. There is one challenge per
 * date, so an outcome for a date already counted leaves the state unchanged.
 */
export function applyOutcome(
  state: UserStreakState,
  outcome: ChallengeOutcome,
  updatedAt: string
): UserStreakState {
  if (state.lastGuessDate !== null && state.lastGuessDate >= outcome.date) {
    return state;
  }
  if (outcome.isCorrect) {
    const continues = state.lastCorrectDate === shiftDateKey(outcome.date, -1);
    const currentStreak = continues ? state.currentStreak + 1 : 1;
    return {
      ...state,
      currentStreak,
      longestStreak: Math.max(state.longestStreak, currentStreak),
      totalCorrect: state.totalCorrect + 1,
      lastCorrectDate: outcome.date,
      lastGuessDate: outcome.date,
      updatedAt,
    };
  }

  const missed = state.missedItemCodes.includes(outcome.itemCode)
    ? state.missedItemCodes
    : [...state.missedItemCodes, outcome.itemCode];
  return {
    ...state,
    currentStreak: 0,
    missedItemCodes: missed,
    lastGuessDate: outcome.date,
    updatedAt,
  };
}

export async function recordOutcome(
  store: ChallengeStore,
  uid: string,
  outcome: ChallengeOutcome,
  now: Date = new Date()
): Promise<UserStreakState> {
  const updatedAt = now.toISOString();
  return withSingleRetry("updateStreak", () =>
    store.updateStreak(uid, (current) =>
      applyOutcome(current ?? emptyStreak(uid), outcome, updatedAt)
    )
  );
}

export async function getStreak(
  store: ChallengeStore,
  uid: string
): Promise<UserStreakState> {
  const state = await withSingleRetry("getStreak", () => store.getStreak(uid));
  return state ?? emptyStreak(uid);
}

import type {
  Attempt,
  Challenge,
  Question,
  RotationTier,
  RotationTrack,
  UserStreakState,
} from "@/lib/challenge/types";

export type MarkShownResult = "recorded" | "taken" | "stale";

export type CreateChallengeResult = "created" | "exists";

export type AppendAttemptResult = "recorded" | "conflict";

/**
 * Persistence boundary for the engine. Implementations enforce the uniqueness
 * rules themselves (one track per key, one shown row per item and track, one
 * challenge per date, one attempt per number) and throw `TransientStoreError`
 * for failures that may succeed on a second try.
 */
export interface ChallengeStore {
  getOrCreateTrack(
    id: string,
    init: { tier: RotationTier; owner: string | null; today: string }
  ): Promise<RotationTrack>;
  listShown(trackId: string): Promise<string[]>;
  /**
   * Clears the shown rows and starts the next cycle, unless another caller
   * already moved the track past `observedCycle`. Returns the track as it is
   * after the call.
   */
  resetCycle(
    trackId: string,
    observedCycle: number,
    today: string
  ): Promise<RotationTrack>;
  /**
   * Records `itemCode` as shown in `cycleNumber` and stamps the track's
   * `lastSelectionDate`. `taken` means the row exists already; `stale` means
   * the track has moved to another cycle.
   */
  markShown(
    trackId: string,
    itemCode: string,
    cycleNumber: number,
    today: string
  ): Promise<MarkShownResult>;

  getChallenge(date: string): Promise<{ challenge: Challenge; question: Question } | null>;
  createChallenge(challenge: Challenge, question: Question): Promise<CreateChallengeResult>;
  listChallengesBefore(date: string, limit: number): Promise<Challenge[]>;

  /** Attempts ordered by attempt number. */
  listAttempts(uid: string, questionId: string): Promise<Attempt[]>;
  appendAttempt(attempt: Attempt): Promise<AppendAttemptResult>;

  getStreak(uid: string): Promise<UserStreakState | null>;
  updateStreak(
    uid: string,
    update: (current: UserStreakState | null) => UserStreakState
  ): Promise<UserStreakState>;
}

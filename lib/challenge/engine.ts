import type { AlternateOverrides } from "@/lib/catalog/alternates";
import type { Catalog, CatalogItem } from "@/lib/catalog/types";
import { getAttemptStatus, submitAttempt } from "@/lib/challenge/attempts";
import { getOrCreateChallenge } from "@/lib/challenge/calendar";
import { getDateKeyForTimezone } from "@/lib/challenge/date";
import { ChallengeError } from "@/lib/challenge/errors";
import type { ChallengeStore } from "@/lib/challenge/store";
import { getStreak } from "@/lib/challenge/streaks";
import type {
  AnswerData,
  AttemptResult,
  ChallengePublicView,
  PastChallengeSummary,
  UserStreakState,
} from "@/lib/challenge/types";
import { buildHistoryEntry, buildPublicView } from "@/lib/challenge/views";
import { withSingleRetry } from "@/lib/server/retry";

export const DEFAULT_HISTORY_LIMIT = 20;
export const MAX_HISTORY_LIMIT = 100;

export type ChallengeEngineOptions = {
  store: ChallengeStore;
  catalog: Catalog;
  timezone: string;
  alternateOverrides?: AlternateOverrides;
  now?: () => Date;
  random?: () => number;
};

export type HistoryQuery = {
  before?: string;
  limit?: number;
};

export type ChallengeEngine = {
  today(): string;
  getTodayChallenge(uid: string | null): Promise<ChallengePublicView>;
  submitAttempt(
    uid: string,
    answerData: AnswerData,
    timeTakenSeconds?: number | null
  ): Promise<AttemptResult>;
  getHistory(uid: string | null, query?: HistoryQuery): Promise<PastChallengeSummary[]>;
  getStats(uid: string): Promise<UserStreakState>;
};

export function createChallengeEngine(
  options: ChallengeEngineOptions
): ChallengeEngine {
  const { store, catalog, timezone } = options;
  const now = options.now ?? (() => new Date());
  const deps = {
    store,
    catalog,
    random: options.random,
    alternateOverrides: options.alternateOverrides,
    now,
  };

  const today = () => getDateKeyForTimezone(timezone, now());

  const requireItem = async (code: string): Promise<CatalogItem> => {
    const item = await withSingleRetry("catalog.get", () => catalog.get(code));
    if (!item) {
      throw new ChallengeError(
        "ITEM_NOT_FOUND",
        `Catalog item ${code} referenced by a challenge is missing.`
      );
    }
    return item;
  };

  return {
    today,

    async getTodayChallenge(uid) {
      const { challenge, question } = await getOrCreateChallenge(deps, today());
      const item = await requireItem(challenge.itemCode);
      const userStatus = uid
        ? await getAttemptStatus(store, uid, question.id)
        : null;
      return buildPublicView(challenge, question, item, userStatus);
    },

    async submitAttempt(uid, answerData, timeTakenSeconds) {
      const { challenge, question } = await getOrCreateChallenge(deps, today());
      return submitAttempt(deps, {
        uid,
        challenge,
        question,
        answerData,
        timeTakenSeconds,
      });
    },

    async getHistory(uid, query = {}) {
      // Today's answer is still secret, so history always ends yesterday.
      const todayKey = today();
      const before =
        query.before && query.before < todayKey ? query.before : todayKey;
      const limit = Math.min(
        MAX_HISTORY_LIMIT,
        Math.max(1, query.limit ?? DEFAULT_HISTORY_LIMIT)
      );
      const challenges = await withSingleRetry("listChallengesBefore", () =>
        store.listChallengesBefore(before, limit)
      );

      return Promise.all(
        challenges.map(async (challenge) => {
          const [item, attempts] = await Promise.all([
            requireItem(challenge.itemCode),
            uid
              ? withSingleRetry("listAttempts", () =>
                  store.listAttempts(uid, challenge.date)
                )
              : Promise.resolve(null),
          ]);
          return buildHistoryEntry(challenge, item, attempts);
        })
      );
    },

    async getStats(uid) {
      return getStreak(store, uid);
    },
  };
}

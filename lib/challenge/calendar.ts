import { buildAcceptedAnswers } from "@/lib/catalog/alternates";
import type { AlternateOverrides } from "@/lib/catalog/alternates";
import type { CatalogItem } from "@/lib/catalog/types";
import { ChallengeError } from "@/lib/challenge/errors";
import { DEFAULT_TRACK, selectNext, tierLabel } from "@/lib/challenge/rotation";
import type { RotationDeps } from "@/lib/challenge/rotation";
import { SELECTION_ALGORITHM_VERSION } from "@/lib/challenge/types";
import type { Challenge, Question } from "@/lib/challenge/types";
import { withSingleRetry } from "@/lib/server/retry";

export const FLAG_QUESTION_PROMPT = "Which country does this flag belong to?";

export type CalendarDeps = RotationDeps & {
  alternateOverrides?: AlternateOverrides;
  now?: () => Date;
};

export type CalendarEntry = {
  challenge: Challenge;
  question: Question;
  wasCreated: boolean;
};

export function buildFlagQuestion(
  date: string,
  item: CatalogItem,
  createdAt: string,
  overrides?: AlternateOverrides
): Question {
  return {
    id: date,
    challengeDate: date,
    itemCode: item.code,
    category: "flag",
    prompt: FLAG_QUESTION_PROMPT,
    key: {
      format: "text_input",
      answer: item.displayName,
      acceptedAnswers: buildAcceptedAnswers(
        item.code,
        item.displayName,
        item.alternateNames,
        overrides
      ),
    },
    createdAt,
  };
}

export async function getChallengeForDate(
  deps: CalendarDeps,
  date: string
): Promise<Omit<CalendarEntry, "wasCreated"> | null> {
  return withSingleRetry("getChallenge", () => deps.store.getChallenge(date));
}

/**
 * Returns the challenge for `date`, creating it (and its question) on first
 * use. Concurrent first callers all end up with the same row; the losers'
 * selections stay consumed in the rotation track.
 */
export async function getOrCreateChallenge(
  deps: CalendarDeps,
  date: string
): Promise<CalendarEntry> {
  const existing = await getChallengeForDate(deps, date);
  if (existing) {
    return { ...existing, wasCreated: false };
  }

  const item = await selectNext(deps, DEFAULT_TRACK, date);
  const createdAt = (deps.now ?? (() => new Date()))().toISOString();
  const challenge: Challenge = {
    date,
    itemCode: item.code,
    tier: tierLabel(DEFAULT_TRACK.tier),
    selectionAlgorithmVersion: SELECTION_ALGORITHM_VERSION,
    createdAt,
  };
  const question = buildFlagQuestion(date, item, createdAt, deps.alternateOverrides);

  const result = await withSingleRetry("createChallenge", () =>
    deps.store.createChallenge(challenge, question)
  );
  if (result === "created") {
    console.info(`[calendar] created challenge ${date} (${item.code})`);
    return { challenge, question, wasCreated: true };
  }

  const winner = await getChallengeForDate(deps, date);
  if (!winner) {
    throw new ChallengeError(
      "STORE_UNAVAILABLE",
      `Challenge ${date} reported as existing but could not be read.`
    );
  }
  console.warn(
    `[calendar] challenge ${date} was created concurrently; ${item.code} stays consumed`
  );
  return { ...winner, wasCreated: false };
}

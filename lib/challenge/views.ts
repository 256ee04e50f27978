import type { CatalogItem } from "@/lib/catalog/types";
import { summarizeAttempts } from "@/lib/challenge/attempts";
import type {
  Attempt,
  Challenge,
  ChallengePublicView,
  PastChallengeSummary,
  PublicAssets,
  Question,
  UserChallengeStatus,
} from "@/lib/challenge/types";

// Alt text usually names the country, so only the images go out.
function publicAssets(item: CatalogItem): PublicAssets {
  return {
    flagEmoji: item.assets.flagEmoji,
    flagSvgUrl: item.assets.flagSvgUrl,
    flagPngUrl: item.assets.flagPngUrl,
  };
}

export function buildPublicView(
  challenge: Challenge,
  question: Question,
  item: CatalogItem,
  userStatus: UserChallengeStatus | null
): ChallengePublicView {
  return {
    date: challenge.date,
    tier: challenge.tier,
    question: {
      id: question.id,
      category: question.category,
      format: question.key.format,
      prompt: question.prompt,
      ...(question.key.format === "multiple_choice"
        ? { options: [...question.key.options] }
        : {}),
    },
    item: publicAssets(item),
    userStatus,
  };
}

export function buildHistoryEntry(
  challenge: Challenge,
  item: CatalogItem,
  attempts: Attempt[] | null
): PastChallengeSummary {
  let userAnswer: PastChallengeSummary["userAnswer"] = null;
  if (attempts && attempts.length > 0) {
    const status = summarizeAttempts(attempts);
    userAnswer = {
      isCorrect: status.isCorrect === true,
      attemptsUsed: status.attemptsUsed,
      answeredAt: status.lastAttemptAt ?? attempts[attempts.length - 1].answeredAt,
    };
  }

  return {
    date: challenge.date,
    item: {
      code: item.code,
      displayName: item.displayName,
      ...publicAssets(item),
    },
    userAnswer,
  };
}

import { ChallengeError } from "@/lib/challenge/errors";
import { judgeAnswer } from "@/lib/challenge/judge";
import type { ChallengeStore } from "@/lib/challenge/store";
import { recordOutcome } from "@/lib/challenge/streaks";
import { MAX_ATTEMPTS } from "@/lib/challenge/types";
import type {
  AnswerData,
  Attempt,
  AttemptResult,
  Challenge,
  Question,
  UserChallengeStatus,
} from "@/lib/challenge/types";
import { withSingleRetry } from "@/lib/server/retry";

const MAX_SUBMIT_ROUNDS = 3;

export type AttemptDeps = {
  store: ChallengeStore;
  now?: () => Date;
};

export type AttemptSubmission = {
  uid: string;
  challenge: Challenge;
  question: Question;
  answerData: AnswerData;
  timeTakenSeconds?: number | null;
};

export function summarizeAttempts(attempts: Attempt[]): UserChallengeStatus {
  const attemptsUsed = attempts.length;
  const solved = attempts.some((attempt) => attempt.isCorrect);
  const locked = !solved && attemptsUsed >= MAX_ATTEMPTS;
  const lastAttempt = attempts.reduce<Attempt | null>(
    (latest, attempt) =>
      !latest || attempt.attemptNumber > latest.attemptNumber ? attempt : latest,
    null
  );
  return {
    hasCompleted: solved || locked,
    attemptsUsed,
    attemptsRemaining: Math.max(0, MAX_ATTEMPTS - attemptsUsed),
    isCorrect: solved ? true : locked ? false : null,
    lastAttemptAt: lastAttempt?.answeredAt ?? null,
  };
}

export async function getAttemptStatus(
  store: ChallengeStore,
  uid: string,
  questionId: string
): Promise<UserChallengeStatus> {
  const attempts = await withSingleRetry("listAttempts", () =>
    store.listAttempts(uid, questionId)
  );
  return summarizeAttempts(attempts);
}

function sameAnswerData(a: AnswerData, b: AnswerData): boolean {
  if ("text" in a) {
    return "text" in b && a.text === b.text;
  }
  if ("selectedOption" in a) {
    return "selectedOption" in b && a.selectedOption === b.selectedOption;
  }
  return "answer" in b && a.answer === b.answer;
}

// A create that committed but reported a transient error comes back as a
// conflict on retry; the row it left behind is this submission's own.
function isOwnAttempt(stored: Attempt[], attempt: Attempt): boolean {
  return stored.some(
    (row) =>
      row.attemptNumber === attempt.attemptNumber &&
      row.answeredAt === attempt.answeredAt &&
      row.isCorrect === attempt.isCorrect &&
      sameAnswerData(row.answerData, attempt.answerData)
  );
}

// Completing the attempt and updating the streak are separate writes, so a
// finished challenge may still owe its streak update. Re-applying is a no-op.
async function settleOutcome(
  store: ChallengeStore,
  challenge: Challenge,
  uid: string,
  attempts: Attempt[]
) {
  const last = attempts[attempts.length - 1];
  await recordOutcome(
    store,
    uid,
    {
      isCorrect: attempts.some((attempt) => attempt.isCorrect),
      itemCode: challenge.itemCode,
      date: challenge.date,
    },
    new Date(last.answeredAt)
  );
}

/**
 * Records one guess. The state per (user, question) only moves forward:
 * not started, in progress, then solved or locked. Solved and locked reject
 * further submissions, and the streak takes each challenge's outcome once.
 */
export async function submitAttempt(
  deps: AttemptDeps,
  submission: AttemptSubmission
): Promise<AttemptResult> {
  const { uid, challenge, question, answerData } = submission;
  const now = deps.now ?? (() => new Date());

  for (let round = 0; round < MAX_SUBMIT_ROUNDS; round += 1) {
    const prior = await withSingleRetry("listAttempts", () =>
      deps.store.listAttempts(uid, question.id)
    );
    if (prior.some((attempt) => attempt.isCorrect)) {
      await settleOutcome(deps.store, challenge, uid, prior);
      throw new ChallengeError(
        "ALREADY_ANSWERED_CORRECTLY",
        "You have already answered this challenge correctly."
      );
    }
    if (prior.length >= MAX_ATTEMPTS) {
      await settleOutcome(deps.store, challenge, uid, prior);
      throw new ChallengeError(
        "ATTEMPTS_EXHAUSTED",
        "No attempts remaining for today's challenge."
      );
    }

    const verdict = judgeAnswer(question.key, answerData);
    const attemptNumber = prior.length + 1;
    const answeredAt = now();
    const attempt: Attempt = {
      uid,
      questionId: question.id,
      attemptNumber,
      answerData,
      isCorrect: verdict.isCorrect,
      timeTakenSeconds: submission.timeTakenSeconds ?? null,
      answeredAt: answeredAt.toISOString(),
    };

    const appended = await withSingleRetry("appendAttempt", () =>
      deps.store.appendAttempt(attempt)
    );
    if (appended === "conflict") {
      const stored = await withSingleRetry("listAttempts", () =>
        deps.store.listAttempts(uid, question.id)
      );
      if (!isOwnAttempt(stored, attempt)) {
        continue;
      }
    }

    const attemptsRemaining = MAX_ATTEMPTS - attemptNumber;
    const isCompleted = verdict.isCorrect || attemptsRemaining === 0;
    if (isCompleted) {
      await recordOutcome(
        deps.store,
        uid,
        {
          isCorrect: verdict.isCorrect,
          itemCode: challenge.itemCode,
          date: challenge.date,
        },
        answeredAt
      );
    }

    if (!isCompleted) {
      return {
        isCorrect: false,
        attemptNumber,
        attemptsRemaining,
        isCompleted,
        explanation: `Incorrect. ${attemptsRemaining} ${
          attemptsRemaining === 1 ? "attempt" : "attempts"
        } remaining.`,
      };
    }
    return {
      isCorrect: verdict.isCorrect,
      attemptNumber,
      attemptsRemaining,
      isCompleted,
      explanation: verdict.explanation,
      correctAnswer: question.key,
    };
  }

  throw new ChallengeError(
    "ATTEMPT_CONFLICT",
    "Another submission for this challenge is in progress. Try again."
  );
}

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getAttemptStatus, submitAttempt } from "@/lib/challenge/attempts";
import { buildFlagQuestion } from "@/lib/challenge/calendar";
import { TransientStoreError } from "@/lib/challenge/errors";
import type { AppendAttemptResult } from "@/lib/challenge/store";
import type { Attempt, Challenge, Question } from "@/lib/challenge/types";
import { MemoryChallengeStore, makeItem } from "@/tests/support/memory-store";

const DATE = "20260315";
const NOW = new Date("2026-03-15T12:00:00Z");

const france = makeItem("FRA", "France", { alternateNames: ["fra"] });
const challenge: Challenge = {
  date: DATE,
  itemCode: "FRA",
  tier: "default",
  selectionAlgorithmVersion: "v2_no_repeat_cycle",
  createdAt: NOW.toISOString(),
};
const question: Question = buildFlagQuestion(DATE, france, NOW.toISOString(), {});

// Commits the first attempt but reports a transient failure, as a create
// whose acknowledgement timed out would.
class LostAckStore extends MemoryChallengeStore {
  private acknowledged = false;

  async appendAttempt(attempt: Attempt): Promise<AppendAttemptResult> {
    const result = await super.appendAttempt(attempt);
    if (!this.acknowledged) {
      this.acknowledged = true;
      throw new TransientStoreError("deadline exceeded after commit");
    }
    return result;
  }
}

describe("submitAttempt", () => {
  let store: MemoryChallengeStore;
  const deps = () => ({ store, now: () => NOW });
  const submit = (uid: string, text: string) =>
    submitAttempt(deps(), { uid, challenge, question, answerData: { text } });

  beforeEach(() => {
    store = new MemoryChallengeStore();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it.each([
    ["user-1", "france"],
    ["user-2", "FRANCE"],
    ["user-3", " France "],
  ])("accepts %s guessing %j", async (uid, text) => {
    const result = await submit(uid, text);
    expect(result).toEqual({
      isCorrect: true,
      attemptNumber: 1,
      attemptsRemaining: 2,
      isCompleted: true,
      explanation: "Correct answer: France",
      correctAnswer: { format: "text_input", answer: "France", acceptedAnswers: ["fra", "france"] },
    });
  });

  it("withholds the answer while attempts remain", async () => {
    const result = await submit("user-a", "Germany");
    expect(result).toEqual({
      isCorrect: false,
      attemptNumber: 1,
      attemptsRemaining: 2,
      isCompleted: false,
      explanation: "Incorrect. 2 attempts remaining.",
    });
    expect("correctAnswer" in result).toBe(false);

    const second = await submit("user-a", "Spain");
    expect(second.explanation).toBe("Incorrect. 1 attempt remaining.");
    expect(second.correctAnswer).toBeUndefined();
  });

  it("locks after three misses and records no fourth attempt", async () => {
    await submit("user-a", "Germany");
    await submit("user-a", "Spain");
    const third = await submit("user-a", "Italy");

    expect(third).toMatchObject({
      isCorrect: false,
      attemptNumber: 3,
      attemptsRemaining: 0,
      isCompleted: true,
      explanation: "Correct answer: France",
    });
    expect(third.correctAnswer).toEqual(question.key);

    await expect(submit("user-a", "France")).rejects.toMatchObject({
      code: "ATTEMPTS_EXHAUSTED",
    });
    const attempts = await store.listAttempts("user-a", question.id);
    expect(attempts.map((attempt) => attempt.attemptNumber)).toEqual([1, 2, 3]);

    expect(store.streaks.get("user-a")).toMatchObject({
      currentStreak: 0,
      missedItemCodes: ["FRA"],
      lastGuessDate: DATE,
      lastCorrectDate: null,
    });
  });

  it("rejects submissions after a correct answer", async () => {
    await submit("user-a", "Germany");
    const solved = await submit("user-a", "fra");
    expect(solved).toMatchObject({ isCorrect: true, attemptNumber: 2, attemptsRemaining: 1 });

    await expect(submit("user-a", "France")).rejects.toMatchObject({
      code: "ALREADY_ANSWERED_CORRECTLY",
    });
    expect(await store.listAttempts("user-a", question.id)).toHaveLength(2);
    expect(store.streaks.get("user-a")).toMatchObject({
      currentStreak: 1,
      totalCorrect: 1,
      lastCorrectDate: DATE,
    });
  });

  it("applies a streak update that failed once the challenge is finished", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    store.failNext("updateStreak", 2);

    await expect(submit("user-a", "France")).rejects.toMatchObject({
      code: "STORE_UNAVAILABLE",
    });
    expect(store.streaks.get("user-a")).toBeUndefined();

    await expect(submit("user-a", "France")).rejects.toMatchObject({
      code: "ALREADY_ANSWERED_CORRECTLY",
    });
    await expect(submit("user-a", "France")).rejects.toMatchObject({
      code: "ALREADY_ANSWERED_CORRECTLY",
    });

    expect(await store.listAttempts("user-a", question.id)).toHaveLength(1);
    expect(store.streaks.get("user-a")).toEqual({
      uid: "user-a",
      currentStreak: 1,
      longestStreak: 1,
      totalCorrect: 1,
      lastCorrectDate: DATE,
      lastGuessDate: DATE,
      missedItemCodes: [],
      updatedAt: NOW.toISOString(),
    });
  });

  it("counts a guess once when its write is retried after committing", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const lostAck = new LostAckStore();

    const result = await submitAttempt(
      { store: lostAck, now: () => NOW },
      { uid: "user-a", challenge, question, answerData: { text: "Germany" } }
    );

    expect(result).toMatchObject({ attemptNumber: 1, attemptsRemaining: 2 });
    const attempts = await lostAck.listAttempts("user-a", question.id);
    expect(attempts.map((attempt) => attempt.attemptNumber)).toEqual([1]);
  });

  it("rejects a malformed payload before recording anything", async () => {
    await expect(
      submitAttempt(deps(), {
        uid: "user-a",
        challenge,
        question,
        answerData: { answer: true },
      })
    ).rejects.toMatchObject({ code: "MALFORMED_ANSWER_PAYLOAD" });
    expect(await store.listAttempts("user-a", question.id)).toEqual([]);
  });

  it("keeps attempt numbers gapless under concurrent submissions", async () => {
    const results = await Promise.all([
      submit("user-a", "Germany"),
      submit("user-a", "Spain"),
      submit("user-a", "Italy"),
    ]);

    expect(results.map((result) => result.attemptNumber).sort()).toEqual([1, 2, 3]);
    const attempts = await store.listAttempts("user-a", question.id);
    expect(attempts.map((attempt) => attempt.attemptNumber)).toEqual([1, 2, 3]);
    expect(store.streaks.get("user-a")?.missedItemCodes).toEqual(["FRA"]);
  });

  it("stores the time taken with the attempt", async () => {
    await submitAttempt(deps(), {
      uid: "user-a",
      challenge,
      question,
      answerData: { text: "Germany" },
      timeTakenSeconds: 12,
    });
    const [attempt] = await store.listAttempts("user-a", question.id);
    expect(attempt).toEqual({
      uid: "user-a",
      questionId: DATE,
      attemptNumber: 1,
      answerData: { text: "Germany" },
      isCorrect: false,
      timeTakenSeconds: 12,
      answeredAt: "2026-03-15T12:00:00.000Z",
    });
  });
});

describe("getAttemptStatus", () => {
  it("reports progress, solved and locked states", async () => {
    const store = new MemoryChallengeStore();
    const deps = { store, now: () => NOW };
    const submit = (uid: string, text: string) =>
      submitAttempt(deps, { uid, challenge, question, answerData: { text } });

    expect(await getAttemptStatus(store, "user-a", question.id)).toEqual({
      hasCompleted: false,
      attemptsUsed: 0,
      attemptsRemaining: 3,
      isCorrect: null,
      lastAttemptAt: null,
    });

    await submit("user-a", "Germany");
    expect(await getAttemptStatus(store, "user-a", question.id)).toEqual({
      hasCompleted: false,
      attemptsUsed: 1,
      attemptsRemaining: 2,
      isCorrect: null,
      lastAttemptAt: "2026-03-15T12:00:00.000Z",
    });

    await submit("user-a", "France");
    expect(await getAttemptStatus(store, "user-a", question.id)).toMatchObject({
      hasCompleted: true,
      isCorrect: true,
      attemptsUsed: 2,
    });

    await submit("user-b", "Chile");
    await submit("user-b", "Peru");
    await submit("user-b", "Bolivia");
    expect(await getAttemptStatus(store, "user-b", question.id)).toMatchObject({
      hasCompleted: true,
      isCorrect: false,
      attemptsRemaining: 0,
    });
  });
});

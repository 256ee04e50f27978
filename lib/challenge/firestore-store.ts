import type { DocumentReference, Firestore } from "firebase-admin/firestore";
import { z } from "zod";
import { TransientStoreError } from "@/lib/challenge/errors";
import {
  answerDataSchema,
  parseAnswerKey,
  rotationTierSchema,
} from "@/lib/challenge/schemas";
import type {
  AppendAttemptResult,
  ChallengeStore,
  CreateChallengeResult,
  MarkShownResult,
} from "@/lib/challenge/store";
import type {
  Attempt,
  Challenge,
  Question,
  RotationTrack,
  UserStreakState,
} from "@/lib/challenge/types";

// gRPC status codes surfaced by the Firestore client.
const ALREADY_EXISTS = 6;
const DEADLINE_EXCEEDED = 4;
const UNAVAILABLE = 14;

const COLLECTIONS = {
  tracks: "rotationTracks",
  challenges: "dailyChallenges",
  questions: "challengeQuestions",
  attempts: "challengeAttempts",
  streaks: "userStreaks",
} as const;

const trackDocSchema = z.object({
  tier: rotationTierSchema,
  owner: z.string().nullable(),
  cycleNumber: z.number().int().min(1),
  cycleStartDate: z.string(),
  lastSelectionDate: z.string().nullable(),
});

const shownDocSchema = z.object({
  itemCode: z.string(),
  cycleNumber: z.number().int(),
});

const challengeDocSchema = z.object({
  date: z.string(),
  itemCode: z.string(),
  tier: z.string(),
  selectionAlgorithmVersion: z.string(),
  createdAt: z.string(),
});

const questionDocSchema = z.object({
  id: z.string(),
  challengeDate: z.string(),
  itemCode: z.string(),
  category: z.literal("flag"),
  prompt: z.string(),
  key: z.unknown(),
  createdAt: z.string(),
});

const attemptDocSchema = z.object({
  uid: z.string(),
  questionId: z.string(),
  attemptNumber: z.number().int().min(1),
  answerData: answerDataSchema,
  isCorrect: z.boolean(),
  timeTakenSeconds: z.number().nullable(),
  answeredAt: z.string(),
});

const streakDocSchema = z.object({
  uid: z.string(),
  currentStreak: z.number().int(),
  longestStreak: z.number().int(),
  totalCorrect: z.number().int(),
  lastCorrectDate: z.string().nullable(),
  lastGuessDate: z.string().nullable(),
  missedItemCodes: z.array(z.string()),
  updatedAt: z.string().nullable(),
});

function statusCode(error: unknown): number | null {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "number"
  ) {
    return error.code;
  }
  return null;
}

function isAlreadyExists(error: unknown) {
  return statusCode(error) === ALREADY_EXISTS;
}

async function guard<T>(label: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    const code = statusCode(error);
    if (code === UNAVAILABLE || code === DEADLINE_EXCEEDED) {
      throw new TransientStoreError(`Firestore ${label} failed (code ${code}).`, {
        cause: error,
      });
    }
    throw error;
  }
}

function toTrack(id: string, data: unknown): RotationTrack {
  return { id, ...trackDocSchema.parse(data) };
}

function toQuestion(data: unknown): Question {
  const { key, ...rest } = questionDocSchema.parse(data);
  return { ...rest, key: parseAnswerKey(key) };
}

export class FirestoreChallengeStore implements ChallengeStore {
  constructor(private readonly db: Firestore) {}

  private trackRef(trackId: string): DocumentReference {
    return this.db.collection(COLLECTIONS.tracks).doc(trackId);
  }

  async getOrCreateTrack(
    id: string,
    init: { tier: RotationTrack["tier"]; owner: string | null; today: string }
  ): Promise<RotationTrack> {
    const ref = this.trackRef(id);
    return guard("getOrCreateTrack", () =>
      this.db.runTransaction(async (tx) => {
        const snap = await tx.get(ref);
        if (snap.exists) {
          return toTrack(id, snap.data());
        }
        const track = {
          tier: init.tier,
          owner: init.owner,
          cycleNumber: 1,
          cycleStartDate: init.today,
          lastSelectionDate: null,
        };
        tx.create(ref, track);
        return { id, ...track };
      })
    );
  }

  async listShown(trackId: string): Promise<string[]> {
    const snap = await guard("listShown", () =>
      this.trackRef(trackId).collection("shown").get()
    );
    return snap.docs.map((doc) => shownDocSchema.parse(doc.data()).itemCode);
  }

  async resetCycle(
    trackId: string,
    observedCycle: number,
    today: string
  ): Promise<RotationTrack> {
    const ref = this.trackRef(trackId);
    return guard("resetCycle", () =>
      this.db.runTransaction(async (tx) => {
        const snap = await tx.get(ref);
        const current = toTrack(trackId, snap.data());
        if (current.cycleNumber !== observedCycle) {
          return current;
        }
        const shownSnap = await tx.get(ref.collection("shown"));
        shownSnap.docs.forEach((doc) => tx.delete(doc.ref));
        const next = {
          ...current,
          cycleNumber: observedCycle + 1,
          cycleStartDate: today,
        };
        tx.update(ref, {
          cycleNumber: next.cycleNumber,
          cycleStartDate: next.cycleStartDate,
        });
        return next;
      })
    );
  }

  async markShown(
    trackId: string,
    itemCode: string,
    cycleNumber: number,
    today: string
  ): Promise<MarkShownResult> {
    const ref = this.trackRef(trackId);
    const shownRef = ref.collection("shown").doc(itemCode);
    return guard("markShown", () =>
      this.db.runTransaction(async (tx): Promise<MarkShownResult> => {
        const [trackSnap, shownSnap] = await Promise.all([
          tx.get(ref),
          tx.get(shownRef),
        ]);
        const track = toTrack(trackId, trackSnap.data());
        if (track.cycleNumber !== cycleNumber) {
          return "stale";
        }
        if (shownSnap.exists) {
          return "taken";
        }
        tx.create(shownRef, {
          itemCode,
          cycleNumber,
          shownAt: new Date().toISOString(),
        });
        tx.update(ref, { lastSelectionDate: today });
        return "recorded";
      })
    );
  }

  async getChallenge(
    date: string
  ): Promise<{ challenge: Challenge; question: Question } | null> {
    const [challengeSnap, questionSnap] = await guard("getChallenge", () =>
      Promise.all([
        this.db.collection(COLLECTIONS.challenges).doc(date).get(),
        this.db.collection(COLLECTIONS.questions).doc(date).get(),
      ])
    );
    if (!challengeSnap.exists) {
      return null;
    }
    if (!questionSnap.exists) {
      throw new Error(`Challenge ${date} has no question document.`);
    }
    return {
      challenge: challengeDocSchema.parse(challengeSnap.data()),
      question: toQuestion(questionSnap.data()),
    };
  }

  async createChallenge(
    challenge: Challenge,
    question: Question
  ): Promise<CreateChallengeResult> {
    const batch = this.db.batch();
    batch.create(
      this.db.collection(COLLECTIONS.challenges).doc(challenge.date),
      challenge
    );
    batch.create(
      this.db.collection(COLLECTIONS.questions).doc(question.id),
      question
    );
    try {
      await guard("createChallenge", () => batch.commit());
      return "created";
    } catch (error) {
      if (isAlreadyExists(error)) {
        return "exists";
      }
      throw error;
    }
  }

  async listChallengesBefore(date: string, limit: number): Promise<Challenge[]> {
    const snap = await guard("listChallengesBefore", () =>
      this.db
        .collection(COLLECTIONS.challenges)
        .where("date", "<", date)
        .orderBy("date", "desc")
        .limit(limit)
        .get()
    );
    return snap.docs.map((doc) => challengeDocSchema.parse(doc.data()));
  }

  async listAttempts(uid: string, questionId: string): Promise<Attempt[]> {
    const snap = await guard("listAttempts", () =>
      this.db
        .collection(COLLECTIONS.attempts)
        .where("questionId", "==", questionId)
        .where("uid", "==", uid)
        .get()
    );
    return snap.docs
      .map((doc) => attemptDocSchema.parse(doc.data()))
      .sort((a, b) => a.attemptNumber - b.attemptNumber);
  }

  async appendAttempt(attempt: Attempt): Promise<AppendAttemptResult> {
    const ref = this.db
      .collection(COLLECTIONS.attempts)
      .doc(`${attempt.questionId}_${attempt.uid}_${attempt.attemptNumber}`);
    try {
      await guard("appendAttempt", () => ref.create(attempt));
      return "recorded";
    } catch (error) {
      if (isAlreadyExists(error)) {
        return "conflict";
      }
      throw error;
    }
  }

  async getStreak(uid: string): Promise<UserStreakState | null> {
    const snap = await guard("getStreak", () =>
      this.db.collection(COLLECTIONS.streaks).doc(uid).get()
    );
    return snap.exists ? streakDocSchema.parse(snap.data()) : null;
  }

  async updateStreak(
    uid: string,
    update: (current: UserStreakState | null) => UserStreakState
  ): Promise<UserStreakState> {
    const ref = this.db.collection(COLLECTIONS.streaks).doc(uid);
    return guard("updateStreak", () =>
      this.db.runTransaction(async (tx) => {
        const snap = await tx.get(ref);
        const current = snap.exists ? streakDocSchema.parse(snap.data()) : null;
        const next = update(current);
        tx.set(ref, next);
        return next;
      })
    );
  }
}

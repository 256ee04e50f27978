import type { ItemAssets } from "@/lib/catalog/types";

export const MAX_ATTEMPTS = 3;
export const SELECTION_ALGORITHM_VERSION = "v2_no_repeat_cycle";

export type RotationTier =
  | { kind: "default" }
  | { kind: "named"; label: string }
  | { kind: "user"; uid: string };

export type TrackKey = {
  tier: RotationTier;
  owner: string | null;
};

export type RotationTrack = {
  id: string;
  tier: RotationTier;
  owner: string | null;
  cycleNumber: number;
  cycleStartDate: string;
  lastSelectionDate: string | null;
};

export type AnswerFormat = "text_input" | "multiple_choice" | "true_false";

export type TextInputKey = {
  format: "text_input";
  answer: string;
  acceptedAnswers: string[];
};

export type MultipleChoiceKey = {
  format: "multiple_choice";
  correct: string;
  options: string[];
};

export type TrueFalseKey = {
  format: "true_false";
  answer: boolean;
  statement: string;
};

// A stored question whose format this build cannot judge.
export type UnsupportedKey = {
  format: "unsupported";
  declaredFormat: string;
};

export type AnswerKey =
  | TextInputKey
  | MultipleChoiceKey
  | TrueFalseKey
  | UnsupportedKey;

export type AnswerData =
  | { text: string }
  | { selectedOption: string }
  | { answer: boolean };

export type QuestionCategory = "flag";

export type Challenge = {
  date: string;
  itemCode: string;
  tier: string;
  selectionAlgorithmVersion: string;
  createdAt: string;
};

export type Question = {
  id: string;
  challengeDate: string;
  itemCode: string;
  category: QuestionCategory;
  prompt: string;
  key: AnswerKey;
  createdAt: string;
};

export type Attempt = {
  uid: string;
  questionId: string;
  attemptNumber: number;
  answerData: AnswerData;
  isCorrect: boolean;
  timeTakenSeconds: number | null;
  answeredAt: string;
};

export type UserStreakState = {
  uid: string;
  currentStreak: number;
  longestStreak: number;
  totalCorrect: number;
  lastCorrectDate: string | null;
  lastGuessDate: string | null;
  missedItemCodes: string[];
  updatedAt: string | null;
};

export type Verdict = {
  isCorrect: boolean;
  explanation: string;
};

export type UserChallengeStatus = {
  hasCompleted: boolean;
  attemptsUsed: number;
  attemptsRemaining: number;
  isCorrect: boolean | null;
  lastAttemptAt: string | null;
};

export type AttemptResult = {
  isCorrect: boolean;
  attemptNumber: number;
  attemptsRemaining: number;
  isCompleted: boolean;
  explanation: string;
  correctAnswer?: AnswerKey;
};

export type PublicAssets = Omit<ItemAssets, "flagAltText">;

export type ChallengePublicView = {
  date: string;
  tier: string;
  question: {
    id: string;
    category: QuestionCategory;
    format: AnswerKey["format"];
    prompt: string;
    options?: string[];
  };
  item: PublicAssets;
  userStatus: UserChallengeStatus | null;
};

export type PastChallengeSummary = {
  date: string;
  item: PublicAssets & {
    code: string;
    displayName: string;
  };
  userAnswer: {
    isCorrect: boolean;
    attemptsUsed: number;
    answeredAt: string;
  } | null;
};

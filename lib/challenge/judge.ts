import { ChallengeError } from "@/lib/challenge/errors";
import type { AnswerData, AnswerKey, Verdict } from "@/lib/challenge/types";

function malformed(expected: string): ChallengeError {
  return new ChallengeError(
    "MALFORMED_ANSWER_PAYLOAD",
    `answerData must contain ${expected} for this question.`
  );
}

export function normalizeTextAnswer(value: string) {
  return value.trim().toLowerCase();
}

/**
 * Judges a submission against a question's answer key. Throws a
 * `MALFORMED_ANSWER_PAYLOAD` error when the submission does not match the
 * key's format, so callers can reject it before recording anything.
 */
export function judgeAnswer(key: AnswerKey, data: AnswerData): Verdict {
  switch (key.format) {
    case "text_input": {
      if (!("text" in data)) {
        throw malformed("a text answer");
      }
      const submitted = normalizeTextAnswer(data.text);
      const isCorrect =
        submitted === key.answer.toLowerCase() ||
        key.acceptedAnswers.includes(submitted);
      return { isCorrect, explanation: `Correct answer: ${key.answer}` };
    }
    case "multiple_choice": {
      if (!("selectedOption" in data)) {
        throw malformed("a selected option");
      }
      return {
        isCorrect: data.selectedOption === key.correct,
        explanation: `Correct answer: ${key.correct}`,
      };
    }
    case "true_false": {
      if (!("answer" in data)) {
        throw malformed("a true/false answer");
      }
      return {
        isCorrect: data.answer === key.answer,
        explanation: `The statement is ${key.answer ? "true" : "false"}`,
      };
    }
    case "unsupported":
      return { isCorrect: false, explanation: "Unknown question format" };
  }
}

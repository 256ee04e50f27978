import { describe, expect, it } from "vitest";
import { judgeAnswer } from "@/lib/challenge/judge";
import { isChallengeError } from "@/lib/challenge/errors";
import type { AnswerKey } from "@/lib/challenge/types";

const franceKey: AnswerKey = {
  format: "text_input",
  answer: "France",
  acceptedAnswers: ["fra", "france"],
};

describe("judgeAnswer", () => {
  it.each(["france", "FRANCE", " France ", "fra", "FRA "])(
    "accepts %j for a text question",
    (text) => {
      expect(judgeAnswer(franceKey, { text })).toEqual({
        isCorrect: true,
        explanation: "Correct answer: France",
      });
    }
  );

  it("rejects a different country", () => {
    expect(judgeAnswer(franceKey, { text: "Germany" }).isCorrect).toBe(false);
  });

  it("matches the primary name even when the accepted set omits it", () => {
    const key: AnswerKey = { format: "text_input", answer: "Peru", acceptedAnswers: [] };
    expect(judgeAnswer(key, { text: "peru" }).isCorrect).toBe(true);
  });

  it("compares multiple choice options exactly", () => {
    const key: AnswerKey = {
      format: "multiple_choice",
      correct: "Paris",
      options: ["Paris", "Lyon", "Nice"],
    };
    expect(judgeAnswer(key, { selectedOption: "Paris" })).toEqual({
      isCorrect: true,
      explanation: "Correct answer: Paris",
    });
    expect(judgeAnswer(key, { selectedOption: "paris" }).isCorrect).toBe(false);
  });

  it("compares true/false answers", () => {
    const key: AnswerKey = {
      format: "true_false",
      answer: false,
      statement: "Canberra is the largest city in Australia.",
    };
    expect(judgeAnswer(key, { answer: false })).toEqual({
      isCorrect: true,
      explanation: "The statement is false",
    });
    expect(judgeAnswer(key, { answer: true }).isCorrect).toBe(false);
  });

  it("judges an unknown stored format as incorrect", () => {
    const key: AnswerKey = { format: "unsupported", declaredFormat: "map_location" };
    expect(judgeAnswer(key, { text: "france" })).toEqual({
      isCorrect: false,
      explanation: "Unknown question format",
    });
  });

  it("rejects a payload that does not fit the question format", () => {
    let caught: unknown;
    try {
      judgeAnswer(franceKey, { selectedOption: "France" });
    } catch (error) {
      caught = error;
    }
    expect(isChallengeError(caught, "MALFORMED_ANSWER_PAYLOAD")).toBe(true);
  });
});

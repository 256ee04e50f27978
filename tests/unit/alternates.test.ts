import { describe, expect, it } from "vitest";
import { MANUAL_ALTERNATES, buildAcceptedAnswers } from "@/lib/catalog/alternates";
import { parseAnswerKey } from "@/lib/challenge/schemas";

describe("buildAcceptedAnswers", () => {
  it("merges, lower-cases, deduplicates and sorts", () => {
    const accepted = buildAcceptedAnswers(
      "FRA",
      "France",
      ["FR", "République française", "  ", "france"],
      { FRA: ["La France", "FR"] }
    );
    expect(accepted).toEqual(["fr", "france", "la france", "république française"]);
  });

  it("uses the bundled manual overrides by default", () => {
    expect(MANUAL_ALTERNATES.GBR).toContain("Great Britain");
    expect(buildAcceptedAnswers("GBR", "United Kingdom", ["GB"])).toEqual([
      "britain",
      "england",
      "gb",
      "great britain",
      "uk",
      "united kingdom",
    ]);
  });

  it("returns only the display name when nothing else is known", () => {
    expect(buildAcceptedAnswers("ZZZ", "Testland", [], {})).toEqual(["testland"]);
  });
});

describe("parseAnswerKey", () => {
  it("keeps known formats as they are", () => {
    expect(
      parseAnswerKey({ format: "text_input", answer: "Chad", acceptedAnswers: ["chad"] })
    ).toEqual({ format: "text_input", answer: "Chad", acceptedAnswers: ["chad"] });
  });

  it("maps unknown formats to unsupported", () => {
    expect(parseAnswerKey({ format: "map_location", lat: 1 })).toEqual({
      format: "unsupported",
      declaredFormat: "map_location",
    });
    expect(parseAnswerKey(null)).toEqual({
      format: "unsupported",
      declaredFormat: "missing",
    });
  });
});

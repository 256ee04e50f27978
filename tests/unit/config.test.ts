import { describe, expect, it } from "vitest";
import { loadConfig } from "@/lib/config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      timezone: "America/New_York",
      answerRateLimitMs: 1000,
    });
  });

  it("reads overrides from the environment", () => {
    expect(
      loadConfig({ CHALLENGE_TIMEZONE: "Asia/Tokyo", ANSWER_RATE_LIMIT_MS: "250" })
    ).toEqual({ timezone: "Asia/Tokyo", answerRateLimitMs: 250 });
  });

  it("rejects an unknown timezone", () => {
    expect(() => loadConfig({ CHALLENGE_TIMEZONE: "Mars/Olympus_Mons" })).toThrow(
      "Invalid configuration. CHALLENGE_TIMEZONE: CHALLENGE_TIMEZONE must be an IANA timezone name."
    );
  });

  it("rejects a negative rate limit window", () => {
    expect(() => loadConfig({ ANSWER_RATE_LIMIT_MS: "-5" })).toThrow(
      /^Invalid configuration\. ANSWER_RATE_LIMIT_MS:/
    );
  });
});

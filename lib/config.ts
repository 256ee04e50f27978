import { z } from "zod";

function isKnownTimezone(timezone: string) {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

const configSchema = z.object({
  CHALLENGE_TIMEZONE: z
    .string()
    .min(1)
    .default("America/New_York")
    .refine(isKnownTimezone, {
      message: "CHALLENGE_TIMEZONE must be an IANA timezone name.",
    }),
  ANSWER_RATE_LIMIT_MS: z.coerce.number().int().min(0).default(1000),
});

export type AppConfig = {
  timezone: string;
  answerRateLimitMs: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration. ${details}`);
  }
  return {
    timezone: parsed.data.CHALLENGE_TIMEZONE,
    answerRateLimitMs: parsed.data.ANSWER_RATE_LIMIT_MS,
  };
}

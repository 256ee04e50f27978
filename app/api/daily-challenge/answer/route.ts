import { NextResponse } from "next/server";
import { z } from "zod";
import { getSessionUser } from "@/lib/auth/server";
import { answerDataSchema } from "@/lib/challenge/schemas";
import { appConfig, challengeEngine } from "@/lib/challenge/runtime";
import { errorResponse, unauthorized } from "@/lib/server/http";
import { consumeAnswerSlot } from "@/lib/server/rate-limit";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const submitSchema = z.object({
  answerData: answerDataSchema,
  timeTakenSeconds: z.number().int().min(0).max(86_400).optional(),
});

export async function POST(request: Request) {
  const user = await getSessionUser();
  if (!user) {
    return unauthorized();
  }

  // Question ids are the challenge date, so today's key names today's question.
  const limit = consumeAnswerSlot(user.uid, challengeEngine.today(), {
    windowMs: appConfig.answerRateLimitMs,
  });
  if (!limit.allowed) {
    return NextResponse.json(
      { error: "Too many submissions. Slow down." },
      {
        status: 429,
        headers: { "Retry-After": String(Math.ceil(limit.retryAfterMs / 1000)) },
      }
    );
  }

  const body: unknown = await request.json().catch(() => null);
  const payload = submitSchema.safeParse(body);
  if (!payload.success) {
    return NextResponse.json(
      { error: "Invalid answer payload.", code: "MALFORMED_ANSWER_PAYLOAD" },
      { status: 400 }
    );
  }

  try {
    const result = await challengeEngine.submitAttempt(
      user.uid,
      payload.data.answerData,
      payload.data.timeTakenSeconds
    );
    return NextResponse.json(result);
  } catch (error) {
    return errorResponse(error, "Unable to submit answer.");
  }
}

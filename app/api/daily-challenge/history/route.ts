import { NextResponse } from "next/server";
import { z } from "zod";
import { getSessionUser } from "@/lib/auth/server";
import { isDateKey } from "@/lib/challenge/date";
import { MAX_HISTORY_LIMIT } from "@/lib/challenge/engine";
import { challengeEngine } from "@/lib/challenge/runtime";
import { dateKeySchema } from "@/lib/challenge/schemas";
import { errorResponse } from "@/lib/server/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const querySchema = z.object({
  before: dateKeySchema.refine(isDateKey).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_HISTORY_LIMIT).optional(),
});

// Past answers are public; the signed-in user also gets their own results.
export async function GET(request: Request) {
  const user = await getSessionUser();
  const { searchParams } = new URL(request.url);
  const query = querySchema.safeParse({
    before: searchParams.get("before") ?? undefined,
    limit: searchParams.get("limit") ?? undefined,
  });
  if (!query.success) {
    return NextResponse.json({ error: "Invalid history query." }, { status: 400 });
  }

  try {
    const results = await challengeEngine.getHistory(
      user?.uid ?? null,
      query.data
    );
    return NextResponse.json({ results });
  } catch (error) {
    return errorResponse(error, "Could not load challenge history.");
  }
}

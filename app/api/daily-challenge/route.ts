import { NextResponse } from "next/server";
import { getSessionUser } from "@/lib/auth/server";
import { challengeEngine } from "@/lib/challenge/runtime";
import { errorResponse, unauthorized } from "@/lib/server/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  const user = await getSessionUser();
  if (!user) {
    return unauthorized();
  }

  try {
    const view = await challengeEngine.getTodayChallenge(user.uid);
    return NextResponse.json(view);
  } catch (error) {
    return errorResponse(error, "Could not load today's challenge.");
  }
}

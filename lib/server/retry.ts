import { ChallengeError, TransientStoreError } from "@/lib/challenge/errors";

// Attempt numbering and cycle resets are not idempotent on blind retry, so one retry is the cap.
export async function withSingleRetry<T>(
  label: string,
  operation: () => Promise<T>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (!(error instanceof TransientStoreError)) {
      throw error;
    }
    console.warn(`[store] ${label} failed, retrying once:`, error.message);
  }

  try {
    return await operation();
  } catch (error) {
    if (error instanceof TransientStoreError) {
      console.error(`[store] ${label} failed after retry:`, error);
      throw new ChallengeError(
        "STORE_UNAVAILABLE",
        "Storage is temporarily unavailable.",
        { cause: error }
      );
    }
    throw error;
  }
}

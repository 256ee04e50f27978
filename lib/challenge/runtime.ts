import { FirestoreCatalog } from "@/lib/catalog/firestore";
import { createChallengeEngine } from "@/lib/challenge/engine";
import type { ChallengeEngine } from "@/lib/challenge/engine";
import { FirestoreChallengeStore } from "@/lib/challenge/firestore-store";
import { loadConfig } from "@/lib/config";
import type { AppConfig } from "@/lib/config";
import { adminDb } from "@/lib/firebase/admin";

export const appConfig: AppConfig = loadConfig();

export const challengeEngine: ChallengeEngine = createChallengeEngine({
  store: new FirestoreChallengeStore(adminDb),
  catalog: new FirestoreCatalog(adminDb),
  timezone: appConfig.timezone,
});

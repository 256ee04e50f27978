import type { Catalog, CatalogItem } from "@/lib/catalog/types";
import { ChallengeError } from "@/lib/challenge/errors";
import type { ChallengeStore } from "@/lib/challenge/store";
import type { RotationTier, TrackKey } from "@/lib/challenge/types";
import { withSingleRetry } from "@/lib/server/retry";

const MAX_SELECTION_ROUNDS = 8;

export type RotationDeps = {
  store: ChallengeStore;
  catalog: Catalog;
  random?: () => number;
};

export const DEFAULT_TRACK: TrackKey = {
  tier: { kind: "default" },
  owner: null,
};

export function tierLabel(tier: RotationTier): string {
  switch (tier.kind) {
    case "default":
      return "default";
    case "named":
      return tier.label;
    case "user":
      return `user:${tier.uid}`;
  }
}

export function trackIdFor(key: TrackKey): string {
  const tierPart =
    key.tier.kind === "default"
      ? "default"
      : `${key.tier.kind}-${encodeURIComponent(
          key.tier.kind === "named" ? key.tier.label : key.tier.uid
        )}`;
  const ownerPart = key.owner === null ? "global" : encodeURIComponent(key.owner);
  return `${tierPart}__${ownerPart}`;
}

async function listEligible(
  deps: RotationDeps,
  tier: RotationTier
): Promise<CatalogItem[]> {
  switch (tier.kind) {
    case "default":
      return deps.catalog.listAll();
    case "named":
      return deps.catalog.listByTier(tier.label);
    case "user": {
      // A user's custom tier replays the items they failed to name.
      const streak = await deps.store.getStreak(tier.uid);
      const missed = new Set(streak?.missedItemCodes ?? []);
      if (missed.size === 0) {
        return [];
      }
      const items = await deps.catalog.listAll();
      return items.filter((item) => missed.has(item.code));
    }
  }
}

function pickUniform<T>(values: T[], random: () => number): T {
  const index = Math.min(values.length - 1, Math.floor(random() * values.length));
  return values[index];
}

/**
 * Picks the next item for a track without repeating any item inside a cycle.
 * When every eligible item has been shown the track starts a new cycle. A
 * losing writer in a race re-reads the shown set and picks again.
 */
export async function selectNext(
  deps: RotationDeps,
  key: TrackKey,
  today: string
): Promise<CatalogItem> {
  const trackId = trackIdFor(key);
  const random = deps.random ?? Math.random;
  const loadTrack = () =>
    withSingleRetry("getOrCreateTrack", () =>
      deps.store.getOrCreateTrack(trackId, {
        tier: key.tier,
        owner: key.owner,
        today,
      })
    );

  let track = await loadTrack();
  const eligible = await withSingleRetry("listEligible", () =>
    listEligible(deps, key.tier)
  );
  if (eligible.length === 0) {
    throw new ChallengeError(
      "NO_ELIGIBLE_ITEMS",
      `No eligible items for track ${trackId}.`
    );
  }

  for (let round = 0; round < MAX_SELECTION_ROUNDS; round += 1) {
    const shown = new Set(
      await withSingleRetry("listShown", () => deps.store.listShown(trackId))
    );
    let available = eligible.filter((item) => !shown.has(item.code));

    if (available.length === 0) {
      const observedCycle = track.cycleNumber;
      track = await withSingleRetry("resetCycle", () =>
        deps.store.resetCycle(trackId, observedCycle, today)
      );
      if (track.cycleNumber === observedCycle + 1) {
        console.info(`[rotation] ${trackId} started cycle ${track.cycleNumber}`);
      }
      available = eligible;
    }

    const candidate = pickUniform(available, random);
    const cycleNumber = track.cycleNumber;
    const result = await withSingleRetry("markShown", () =>
      deps.store.markShown(trackId, candidate.code, cycleNumber, today)
    );
    if (result === "recorded") {
      return candidate;
    }
    if (result === "stale") {
      track = await loadTrack();
    }
  }

  throw new ChallengeError(
    "SELECTION_CONTENTION",
    `Could not select an item for track ${trackId}; too many concurrent selections.`
  );
}

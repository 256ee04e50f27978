import { ChallengeError } from "@/lib/challenge/errors";

export type ItemDeletion = {
  isReferenced(): Promise<boolean>;
  remove(): void | Promise<void>;
};

/**
 * Challenges keep pointing at their country, so deletion is refused while any
 * challenge references it. Catalogs call this inside their own write scope.
 */
export async function deleteUnlessReferenced(
  code: string,
  deletion: ItemDeletion
): Promise<void> {
  if (await deletion.isReferenced()) {
    throw new ChallengeError(
      "ITEM_IN_USE",
      `Country ${code} is referenced by a daily challenge and cannot be deleted.`
    );
  }
  await deletion.remove();
}

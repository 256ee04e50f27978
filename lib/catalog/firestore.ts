import type { Firestore } from "firebase-admin/firestore";
import { z } from "zod";
import type { Catalog, CatalogItem } from "@/lib/catalog/types";
import { deleteUnlessReferenced } from "@/lib/catalog/protect";

const COUNTRIES = "countries";
const DAILY_CHALLENGES = "dailyChallenges";

const countryDocSchema = z.object({
  code: z.string().min(1),
  name: z.string().min(1),
  altSpellings: z.array(z.string()).default([]),
  difficultyTier: z.string().nullable().default(null),
  flagEmoji: z.string().default(""),
  flagSvgUrl: z.string().default(""),
  flagPngUrl: z.string().default(""),
  flagAltText: z.string().default(""),
});

function toItem(data: unknown): CatalogItem {
  const doc = countryDocSchema.parse(data);
  return {
    code: doc.code,
    displayName: doc.name,
    alternateNames: doc.altSpellings,
    tierLabel: doc.difficultyTier,
    assets: {
      flagEmoji: doc.flagEmoji,
      flagSvgUrl: doc.flagSvgUrl,
      flagPngUrl: doc.flagPngUrl,
      flagAltText: doc.flagAltText,
    },
  };
}

/** Country catalog kept in the `countries` collection, keyed by ISO alpha-3 code. */
export class FirestoreCatalog implements Catalog {
  constructor(private readonly db: Firestore) {}

  async listAll(): Promise<CatalogItem[]> {
    const snap = await this.db.collection(COUNTRIES).get();
    return snap.docs.map((doc) => toItem(doc.data()));
  }

  async listByTier(tier: string): Promise<CatalogItem[]> {
    const snap = await this.db
      .collection(COUNTRIES)
      .where("difficultyTier", "==", tier)
      .get();
    return snap.docs.map((doc) => toItem(doc.data()));
  }

  async get(code: string): Promise<CatalogItem | null> {
    const snap = await this.db.collection(COUNTRIES).doc(code).get();
    return snap.exists ? toItem(snap.data()) : null;
  }

  async deleteItem(code: string): Promise<void> {
    const ref = this.db.collection(COUNTRIES).doc(code);
    const references = this.db
      .collection(DAILY_CHALLENGES)
      .where("itemCode", "==", code)
      .limit(1);
    await this.db.runTransaction((tx) =>
      deleteUnlessReferenced(code, {
        isReferenced: async () => !(await tx.get(references)).empty,
        remove: () => {
          tx.delete(ref);
        },
      })
    );
  }
}

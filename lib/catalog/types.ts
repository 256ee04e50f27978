export type ItemAssets = {
  flagEmoji: string;
  flagSvgUrl: string;
  flagPngUrl: string;
  flagAltText: string;
};

export type CatalogItem = {
  code: string;
  displayName: string;
  alternateNames: string[];
  tierLabel: string | null;
  assets: ItemAssets;
};

export interface Catalog {
  listAll(): Promise<CatalogItem[]>;
  listByTier(tier: string): Promise<CatalogItem[]>;
  get(code: string): Promise<CatalogItem | null>;
  /** Refuses with `ITEM_IN_USE` while a daily challenge references the item. */
  deleteItem(code: string): Promise<void>;
}

import manualAlternates from "@/lib/catalog/manual-alternates.json";

export type AlternateOverrides = Record<string, readonly string[]>;

export const MANUAL_ALTERNATES: AlternateOverrides = manualAlternates;

/**
 * Builds the accepted-answer set for an item: the lower-cased display name,
 * the catalog's alternate spellings and any manual overrides for the code.
 * The result is deduplicated, sorted and never contains an empty string.
 */
export function buildAcceptedAnswers(
  code: string,
  displayName: string,
  catalogAlternates: readonly string[],
  overrides: AlternateOverrides = MANUAL_ALTERNATES
): string[] {
  const accepted = new Set<string>();
  const add = (value: string) => {
    const normalized = value.trim().toLowerCase();
    if (normalized) {
      accepted.add(normalized);
    }
  };

  add(displayName);
  catalogAlternates.forEach(add);
  (overrides[code] ?? []).forEach(add);

  return Array.from(accepted).sort();
}

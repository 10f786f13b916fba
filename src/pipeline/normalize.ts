/**
 * DrugCombDB marks approved drugs in the name itself, e.g. "5-FU(approved)".
 * Strips the marker (any case or inner spacing) and surrounding whitespace.
 */
export function normalizeDrugName(name: string): string {
  return name.replace(/\(\s*approved\s*\)/gi, '').trim();
}

/**
 * Normalized names in first-seen order, without duplicates or empties.
 */
export function uniqueDrugNames(names: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const name of names) {
    const normalized = normalizeDrugName(name);
    if (normalized) {
      seen.add(normalized);
    }
  }
  return [...seen];
}

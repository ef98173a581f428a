/**
 * Map free-text category input to a canonical category name.
 *
 * Accepts a 1-based position in the list or a case-insensitive name.
 * Returns null when nothing matches.
 */
export function resolveCategory(input: string, categories: readonly string[]): string | null {
  const trimmed = input.trim();
  if (!trimmed) return null;

  if (/^\d+$/.test(trimmed)) {
    const index = Number.parseInt(trimmed, 10) - 1;
    const byPosition = categories[index];
    if (byPosition !== undefined) {
      return byPosition;
    }
  }

  const lowered = trimmed.toLowerCase();
  return categories.find((category) => category.toLowerCase() === lowered) ?? null;
}

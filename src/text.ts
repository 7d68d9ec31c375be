export function normalizeSpacing(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Drops parenthetical qualifiers: "Aspirin (acetylsalicylic acid)" becomes "Aspirin". */
export function stripQualifiers(value: string): string {
  return normalizeSpacing(value.replace(/\([^)]*\)/g, " "));
}

export function splitWords(value: string): string[] {
  return normalizeSpacing(value.replace(/[()"]/g, " "))
    .split(" ")
    .filter(Boolean);
}

/** Joins the words of every part, skipping words already present (case-insensitive). */
export function mergeTerms(...parts: string[]): string {
  const seen = new Set<string>();
  const words: string[] = [];
  for (const word of parts.flatMap(splitWords)) {
    const key = word.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    words.push(word);
  }
  return words.join(" ");
}

/** Every subset of `size` items, in lexicographic index order. */
export function combinations<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0 || size > items.length) return [];
  const result: T[][] = [];
  const pick = (start: number, current: T[]): void => {
    if (current.length === size) {
      result.push([...current]);
      return;
    }
    for (let i = start; i <= items.length - (size - current.length); i++) {
      current.push(items[i]);
      pick(i + 1, current);
      current.pop();
    }
  };
  pick(0, []);
  return result;
}

export function stripMarkup(value: string): string {
  return normalizeSpacing(value.replace(/<[^>]*>/g, ""));
}

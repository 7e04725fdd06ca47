/**
 * Normalize a string for fuzzy matching (lowercase, remove punctuation, etc.)
 */
export function normalizeText(text: string): string {
  return text
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/[^\w\s]/g, "") // Remove punctuation
    .replace(/_/g, " ")
    .replace(/\s+/g, " ") // Normalize whitespace
    .trim();
}

/**
 * Clean a title before comparison: drop parenthetical and bracketed asides
 * ("(live)", "[SBD]") and a leading article.
 */
export function cleanTitle(title: string): string {
  const stripped = title
    .replace(/\s*\([^)]*\)\s*/g, " ")
    .replace(/\s*\[[^\]]*\]\s*/g, " ");
  return normalizeText(stripped).replace(/^(the|a|an)\s+/, "");
}

function bigrams(text: string): string[] {
  const compact = text.replace(/\s+/g, "");
  const grams: string[] = [];
  for (let i = 0; i < compact.length - 1; i++) {
    grams.push(compact.slice(i, i + 2));
  }
  return grams;
}

/** Sørensen–Dice coefficient over character bigrams (multiset) */
function diceCoefficient(a: string, b: string): number {
  const gramsA = bigrams(a);
  const gramsB = bigrams(b);
  if (gramsA.length === 0 || gramsB.length === 0) return 0;

  const counts = new Map<string, number>();
  for (const g of gramsA) counts.set(g, (counts.get(g) ?? 0) + 1);

  let overlap = 0;
  for (const g of gramsB) {
    const n = counts.get(g) ?? 0;
    if (n > 0) {
      overlap++;
      counts.set(g, n - 1);
    }
  }
  return (2 * overlap) / (gramsA.length + gramsB.length);
}

/** Jaccard index over whitespace-separated words */
function tokenOverlap(a: string, b: string): number {
  const tokensA = new Set(a.split(" "));
  const tokensB = new Set(b.split(" "));
  const intersection = [...tokensA].filter((t) => tokensB.has(t)).length;
  const union = new Set([...tokensA, ...tokensB]).size;
  return union === 0 ? 0 : intersection / union;
}

/**
 * Similarity between two strings (0-1, where 1 is identical after
 * normalization). Containment scores 0.8 like a shortened title would;
 * otherwise the better of word overlap and bigram similarity.
 */
export function similarity(a: string, b: string): number {
  const normA = normalizeText(a);
  const normB = normalizeText(b);

  if (normA === normB) return normA.length > 0 ? 1.0 : 0.0;
  if (normA.length === 0 || normB.length === 0) return 0.0;

  if (normA.includes(normB) || normB.includes(normA)) {
    return 0.8;
  }

  return Math.max(tokenOverlap(normA, normB), diceCoefficient(normA, normB));
}

/** Title similarity, ignoring asides and leading articles */
export function titleSimilarity(a: string, b: string): number {
  const cleanA = cleanTitle(a);
  const cleanB = cleanTitle(b);
  if (cleanA.length > 0 && cleanA === cleanB) return 1.0;
  return similarity(cleanA, cleanB);
}

/**
 * Whether two dates refer to the same day, or the same year when either
 * side only carries a year.
 */
export function datesAgree(a: string, b: string): boolean {
  const yearA = a.slice(0, 4);
  const yearB = b.slice(0, 4);
  if (a.length === 4 || b.length === 4) return yearA === yearB;
  return a === b;
}

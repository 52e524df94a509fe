/**
 * Text normalisation and similarity for description matching.
 *
 * All functions are pure and return values in [0, 1].
 */

/**
 * Lowercase, turn every run of non-letters and non-digits into one
 * space, trim. Letters and digits of any script survive.
 *
 * "ACME Corp. / INV#1001" → "acme corp inv 1001"
 * "Café Zürich" → "café zürich"
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

export function tokenize(text: string): string[] {
  const normalized = normalizeText(text);
  return normalized === "" ? [] : normalized.split(" ");
}

/** Alphanumerics only: "INV-1001" → "inv1001". */
export function compact(text: string): string {
  return normalizeText(text).replace(/ /g, "");
}

function bigrams(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i < text.length - 1; i++) {
    const gram = text.slice(i, i + 2);
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/**
 * Sørensen–Dice coefficient over character bigrams of the compacted
 * strings, counting repeated bigrams.
 */
export function diceCoefficient(a: string, b: string): number {
  const x = compact(a);
  const y = compact(b);
  if (x === "" || y === "") return 0;
  if (x === y) return 1;
  if (x.length < 2 || y.length < 2) return 0;

  const gramsA = bigrams(x);
  const gramsB = bigrams(y);
  let overlap = 0;
  for (const [gram, count] of gramsA) {
    overlap += Math.min(count, gramsB.get(gram) ?? 0);
  }
  return (2 * overlap) / (x.length - 1 + (y.length - 1));
}

/** Jaccard index of the two token sets. */
export function tokenJaccard(a: string, b: string): number {
  const setA = new Set(tokenize(a));
  const setB = new Set(tokenize(b));
  if (setA.size === 0 || setB.size === 0) return 0;

  let shared = 0;
  for (const token of setA) {
    if (setB.has(token)) shared++;
  }
  return shared / (setA.size + setB.size - shared);
}

/**
 * Blend of bigram Dice (60%) and token Jaccard (40%).
 */
export function textSimilarity(a: string, b: string): number {
  return 0.6 * diceCoefficient(a, b) + 0.4 * tokenJaccard(a, b);
}

/**
 * True when the compacted reference equals one of the memo's
 * whitespace-separated words or one of the tags.
 */
export function referenceMatches(
  reference: string,
  memo: string,
  tags: readonly string[],
): boolean {
  const ref = compact(reference);
  if (ref === "") return false;
  const words = memo.split(/\s+/).map(compact);
  return words.includes(ref) || tags.some((t) => compact(t) === ref);
}

/** True when `phrase` appears in `text` as whole normalised words. */
export function containsPhrase(text: string, phrase: string): boolean {
  const needle = normalizeText(phrase);
  return needle !== "" && ` ${normalizeText(text)} `.includes(` ${needle} `);
}

/** First normalised token, used to group a payee's history. */
export function payeeKey(description: string): string {
  return tokenize(description)[0] ?? "";
}

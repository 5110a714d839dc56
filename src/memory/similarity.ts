const ARTICLES = new Set(['a', 'an', 'the'])

function foldWord(word: string): string {
  return word.length > 3 && word.endsWith('s') ? word.slice(0, -1) : word
}

/**
 * Lowercased, trimmed, without `.` `,` and apostrophes, articles dropped and a
 * trailing plural/possessive `s` folded, so "The user's name" and "users name"
 * produce the same words.
 */
export function normalizeFact(text: string): string[] {
  return text
    .trim()
    .toLowerCase()
    .replace(/[.,'’]/g, '')
    .split(/\s+/)
    .filter(word => word.length > 0 && !ARTICLES.has(word))
    .map(foldWord)
}

/** |A ∩ B| / max(|A|, |B|) over the normalized word sets. */
export function factSimilarity(a: string, b: string): number {
  const setA = new Set(normalizeFact(a))
  const setB = new Set(normalizeFact(b))
  const larger = Math.max(setA.size, setB.size)
  if (larger === 0) return 0

  let shared = 0
  for (const word of setA) {
    if (setB.has(word)) shared++
  }
  return shared / larger
}

export function isDuplicateFact(a: string, b: string, threshold: number = 0.9): boolean {
  return factSimilarity(a, b) >= threshold
}

/** The most similar candidate at or above the threshold, or null. */
export function findDuplicate<T extends { factText: string }>(
  text: string,
  candidates: T[],
  threshold: number = 0.9
): T | null {
  let best: T | null = null
  let bestScore = 0
  for (const candidate of candidates) {
    const score = factSimilarity(text, candidate.factText)
    if (best === null ? score >= threshold : score > bestScore) {
      best = candidate
      bestScore = score
    }
  }
  return best
}

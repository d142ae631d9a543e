// Comparators shared by trie completion, fuzzy matching and merging. Scores
// may be -Infinity (unranked), so they are compared, never subtracted.

export function byScoreDesc(a: number, b: number): number {
  if (a === b) return 0;
  return a > b ? -1 : 1;
}

export function byWord(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function byScoreThenWord(a: { word: string; score: number }, b: { word: string; score: number }): number {
  return byScoreDesc(a.score, b.score) || byWord(a.word, b.word);
}

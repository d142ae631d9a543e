/**
 * Levenshtein distance over code points, two rolling rows.
 */
export function levenshtein(a: string, b: string): number {
  let s = Array.from(a);
  let t = Array.from(b);
  if (s.length > t.length) [s, t] = [t, s];

  const m = s.length;
  const n = t.length;
  if (m === 0) return n;

  let prev: number[] = [];
  let cur: number[] = new Array<number>(m + 1).fill(0);
  for (let j = 0; j <= m; j++) prev.push(j);

  for (let i = 1; i <= n; i++) {
    cur[0] = i;
    const ch = t[i - 1];
    for (let j = 1; j <= m; j++) {
      const cost = s[j - 1] === ch ? 0 : 1;
      cur[j] = Math.min(
        prev[j]! + 1, // deletion
        cur[j - 1]! + 1, // insertion
        prev[j - 1]! + cost, // substitution
      );
    }
    [prev, cur] = [cur, prev];
  }

  return prev[m]!;
}

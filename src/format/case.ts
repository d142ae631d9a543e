/**
 * Completion text follows the case the user started typing with: a
 * capitalized prefix capitalizes the suggestion's first letter.
 */
export function matchCase(word: string, typed: string): string {
  const first = typed.charAt(0);
  if (!first || first === first.toLowerCase() || first !== first.toUpperCase()) return word;

  const [head, ...rest] = Array.from(word);
  return head === undefined ? word : head.toUpperCase() + rest.join("");
}

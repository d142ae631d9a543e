import { setImmediate as yieldToEventLoop } from "node:timers/promises";

import { NEVER_CANCELLED, throwIfCancelled, type CancellationToken } from "../cancellation.js";
import type { FuzzyMatcher } from "../fuzzy.js";
import type { PrefixTrie, TrieNodeView } from "../trie.js";
import { normalizeWord, type FuzzyCandidate } from "../types.js";
import { byScoreDesc, byWord } from "./order.js";

/** trie nodes visited between event-loop yields in fuzzyMatchAsync */
export const DEFAULT_YIELD_EVERY = 256;

type Walk = Generator<void, FuzzyCandidate[], undefined>;

/**
 * Branch-and-bound Levenshtein search over the completion trie.
 *
 * Walks the trie depth-first keeping one DP row per depth: row[j] is the
 * distance between the path so far and the first j query characters. Every
 * continuation of a path costs at least min(row), so a subtree is skipped as
 * soon as that minimum exceeds the bound. Rows are reused across siblings.
 *
 * The cancellation token is read on entry to every node, i.e. once per
 * trie level along each path.
 */
export class TrieFuzzyMatcher implements FuzzyMatcher {
  constructor(private readonly trie: PrefixTrie) {}

  fuzzyMatch(query: string, maxDistance: number, token: CancellationToken = NEVER_CANCELLED): FuzzyCandidate[] {
    const walk = this.walk(query, maxDistance, token);
    let step = walk.next();
    while (!step.done) step = walk.next();
    return step.value;
  }

  /**
   * Same result as fuzzyMatch, but hands the event loop back every
   * `yieldEvery` nodes so a cancellation can arrive mid-walk.
   */
  async fuzzyMatchAsync(
    query: string,
    maxDistance: number,
    token: CancellationToken = NEVER_CANCELLED,
    yieldEvery = DEFAULT_YIELD_EVERY,
  ): Promise<FuzzyCandidate[]> {
    const walk = this.walk(query, maxDistance, token);
    let visited = 0;
    let step = walk.next();
    while (!step.done) {
      if (++visited % yieldEvery === 0) {
        await yieldToEventLoop();
        throwIfCancelled(token);
      }
      step = walk.next();
    }
    return step.value;
  }

  /** Yields once per visited node; returns the sorted matches. */
  private *walk(query: string, maxDistance: number, token: CancellationToken): Walk {
    if (Number.isNaN(maxDistance) || maxDistance < 0) return [];
    throwIfCancelled(token);

    const q = Array.from(normalizeWord(query));
    const m = q.length;
    const rows: number[][] = [];
    const rowAt = (depth: number): number[] => (rows[depth] ??= new Array<number>(m + 1).fill(0));

    const first = rowAt(0);
    for (let j = 0; j <= m; j++) first[j] = j;

    const out: FuzzyCandidate[] = [];

    function* visit(node: TrieNodeView, depth: number): Generator<void, void, undefined> {
      throwIfCancelled(token);
      yield;
      const prev = rows[depth]!;

      for (const [ch, child] of node.children) {
        const row = rowAt(depth + 1);
        row[0] = prev[0]! + 1;
        let min = row[0];

        for (let j = 1; j <= m; j++) {
          const cost = q[j - 1] === ch ? 0 : 1;
          const v = Math.min(prev[j]! + 1, row[j - 1]! + 1, prev[j - 1]! + cost);
          row[j] = v;
          if (v < min) min = v;
        }

        if (min > maxDistance) continue;

        const distance = row[m]!;
        if (child.terminal && distance <= maxDistance) {
          out.push({ word: child.terminal.word, distance, score: child.terminal.score });
        }
        yield* visit(child, depth + 1);
      }
    }

    yield* visit(this.trie.root, 0);

    out.sort((a, b) => a.distance - b.distance || byScoreDesc(a.score, b.score) || byWord(a.word, b.word));
    return out;
  }
}

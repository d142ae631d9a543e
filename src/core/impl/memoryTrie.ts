import { normalizeWord, type Word } from "../types.js";
import type { TopKSelector } from "../heap.js";
import type { PrefixTrie, TrieNodeView, TriePrefixResult } from "../trie.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";
import { byScoreThenWord } from "./order.js";

type Node = {
  children: Map<string, Node>;
  terminal: TriePrefixResult | undefined;
};

function makeNode(): Node {
  return { children: new Map(), terminal: undefined };
}

function freezeTree(node: Node): void {
  if (node.terminal) Object.freeze(node.terminal);
  for (const child of node.children.values()) freezeTree(child);
  Object.freeze(node);
}

/**
 * Character trie keyed by code point. Filled by `insert`, then `freeze()`;
 * from then on it is shared by every request without locking. Words and
 * prefixes are case-folded on the way in.
 */
export class MemoryTrie implements PrefixTrie {
  private readonly rootNode: Node = makeNode();
  private frozen = false;
  private count = 0;

  constructor(private readonly selector: TopKSelector<TriePrefixResult> = new MinHeapTopKSelector()) {}

  static build(pairs: Iterable<TriePrefixResult>): MemoryTrie {
    const trie = new MemoryTrie();
    for (const { word, score } of pairs) trie.insert(word, score);
    return trie.freeze();
  }

  get root(): TrieNodeView {
    return this.rootNode;
  }

  get size(): number {
    return this.count;
  }

  insert(raw: Word, score: number): void {
    if (this.frozen) throw new Error("trie is frozen");
    const word = normalizeWord(raw);
    if (!word.length) return;

    let cur = this.rootNode;
    for (const ch of word) {
      let next = cur.children.get(ch);
      if (!next) {
        next = makeNode();
        cur.children.set(ch, next);
      }
      cur = next;
    }

    if (!cur.terminal) {
      cur.terminal = { word, score };
      this.count++;
    } else if (score > cur.terminal.score) {
      cur.terminal = { word, score };
    }
  }

  freeze(): this {
    if (!this.frozen) {
      freezeTree(this.rootNode);
      this.frozen = true;
    }
    return this;
  }

  has(word: Word): boolean {
    return this.find(word)?.terminal !== undefined;
  }

  completeByPrefix(prefix: string, limit: number): Iterable<TriePrefixResult> {
    const selector = this.selector;
    const start = this.find(prefix);

    return {
      *[Symbol.iterator]() {
        if (!start || limit <= 0) return;
        yield* selector.topK(terminalsBelow(start), limit, byScoreThenWord);
      },
    };
  }

  private find(prefix: string): Node | undefined {
    let cur: Node | undefined = this.rootNode;
    for (const ch of normalizeWord(prefix)) {
      cur = cur.children.get(ch);
      if (!cur) return undefined;
    }
    return cur;
  }
}

function* terminalsBelow(start: Node): Generator<TriePrefixResult> {
  const stack: Node[] = [start];
  let node: Node | undefined;
  while ((node = stack.pop())) {
    if (node.terminal) yield node.terminal;
    for (const child of node.children.values()) stack.push(child);
  }
}

export * from "./types.js";
export * from "./errors.js";
export * from "./cancellation.js";
export * from "./heap.js";
export * from "./trie.js";
export * from "./fuzzy.js";
export * from "./ranker.js";
export * from "./frequency.js";
export * from "./dictionary.js";
export * from "./tokenizer.js";
export * from "./documents.js";
export * from "./session.js";

export * from "./impl/minHeapTopK.js";
export * from "./impl/order.js";
export * from "./impl/memoryTrie.js";
export * from "./impl/levenshtein.js";
export * from "./impl/trieFuzzyMatcher.js";
export * from "./impl/frequencyRanker.js";
export * from "./impl/memoryFrequencyTable.js";
export * from "./impl/memoryDictionary.js";
export * from "./impl/sqliteDictionary.js";
export * from "./impl/wordScanner.js";
export * from "./impl/memoryDocumentStore.js";
export * from "./impl/lookupEngine.js";

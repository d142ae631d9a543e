import type { ChangeOutcome, DocumentSnapshot, DocumentStore } from "../documents.js";
import type { WordAtResult, WordScanner } from "../tokenizer.js";
import type { DocumentUri, Position } from "../types.js";
import { SimpleWordScanner } from "./wordScanner.js";

function snapshot(uri: DocumentUri, text: string, version: number): DocumentSnapshot {
  return Object.freeze({ uri, version, text });
}

export class MemoryDocumentStore implements DocumentStore {
  private readonly docs = new Map<DocumentUri, DocumentSnapshot>();

  constructor(private readonly scanner: WordScanner = new SimpleWordScanner()) {}

  get size(): number {
    return this.docs.size;
  }

  open(uri: DocumentUri, text: string, version: number): DocumentSnapshot {
    const doc = snapshot(uri, text, version);
    this.docs.set(uri, doc);
    return doc;
  }

  change(uri: DocumentUri, text: string, version: number): ChangeOutcome {
    const current = this.docs.get(uri);
    if (!current) {
      this.open(uri, text, version);
      return "opened";
    }
    // versions only grow; an older one arriving late must not roll back
    if (version < current.version) return "stale";
    this.docs.set(uri, snapshot(uri, text, version));
    return "applied";
  }

  close(uri: DocumentUri): boolean {
    return this.docs.delete(uri);
  }

  get(uri: DocumentUri): DocumentSnapshot | undefined {
    return this.docs.get(uri);
  }

  wordAt(uri: DocumentUri, position: Position): WordAtResult | undefined {
    const doc = this.docs.get(uri);
    return doc ? this.scanner.wordAt(doc.text, position) : undefined;
  }

  wordBefore(uri: DocumentUri, position: Position): WordAtResult | undefined {
    const doc = this.docs.get(uri);
    return doc ? this.scanner.wordBefore(doc.text, position) : undefined;
  }
}

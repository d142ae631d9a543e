import type { WordAtResult } from "./tokenizer.js";
import type { DocumentUri, Position } from "./types.js";

/** One version of one open document. Frozen; replaced whole on change. */
export interface DocumentSnapshot {
  readonly uri: DocumentUri;
  readonly version: number;
  readonly text: string;
}

export type ChangeOutcome = "applied" | "opened" | "stale";

/**
 * Tracks the text of open documents.
 *
 * Contract notes:
 * - a change swaps in a new snapshot in a single step; a reader holding the
 *   previous snapshot keeps a consistent view of it
 * - any read issued after `change` returns sees the new version
 */
export interface DocumentStore {
  open(uri: DocumentUri, text: string, version: number): DocumentSnapshot;
  change(uri: DocumentUri, text: string, version: number): ChangeOutcome;
  close(uri: DocumentUri): boolean;
  get(uri: DocumentUri): DocumentSnapshot | undefined;

  /** Token under the cursor (the character right of it). */
  wordAt(uri: DocumentUri, position: Position): WordAtResult | undefined;
  /** Token ending at or spanning the cursor (the character left of it). */
  wordBefore(uri: DocumentUri, position: Position): WordAtResult | undefined;
}

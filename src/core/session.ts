import { setImmediate as yieldToEventLoop } from "node:timers/promises";

import type { Logger } from "pino";

import { NEVER_CANCELLED, throwIfCancelled, type CancellationToken } from "./cancellation.js";
import type { DocumentStore } from "./documents.js";
import { InvalidArgumentError, InvalidStateError } from "./errors.js";
import type { LookupEngine } from "./impl/lookupEngine.js";
import type { CompletionSource, DictionaryEntry, DocumentUri, Position, Span } from "./types.js";
import { matchCase } from "../format/case.js";
import {
  DEFAULT_FORMATTING,
  formatEntryMarkdown,
  formatEntryShort,
  notFoundLabel,
  notFoundMarkdown,
  type FormattingConfig,
} from "../format/markdown.js";

export const ENABLE_COMPLETION_COMMAND = "dictionary.enable_cmp";

export type SessionState = "uninitialized" | "ready" | "shuttingDown" | "terminated";
export type SessionEvent = "initialize" | "shutdown" | "exit";
/** Requests grouped by what they may touch. */
export type RequestKind = "initialize" | "query" | "mutate" | "shutdown" | "exit";

const TRANSITIONS: Readonly<Record<SessionState, Partial<Record<SessionEvent, SessionState>>>> = {
  uninitialized: { initialize: "ready", exit: "terminated" },
  ready: { shutdown: "shuttingDown", exit: "terminated" },
  shuttingDown: { exit: "terminated" },
  terminated: {},
};

const PERMITTED: Readonly<Record<SessionState, ReadonlySet<RequestKind>>> = {
  uninitialized: new Set(["initialize", "exit"]),
  ready: new Set(["query", "mutate", "shutdown", "exit"]),
  // in-flight and late queries drain; nothing may change state any more
  shuttingDown: new Set(["query", "exit"]),
  terminated: new Set(),
};

/** Renders entries for responses. Injected so the engine never sees templates. */
export interface EntryFormatter {
  markdown(entry: DictionaryEntry): string;
  short(entry: DictionaryEntry): string;
}

export function templateFormatter(formatting: FormattingConfig = DEFAULT_FORMATTING): EntryFormatter {
  return {
    markdown: (entry) => formatEntryMarkdown(entry, formatting),
    short: (entry) => formatEntryShort(entry, formatting),
  };
}

export interface HoverResult {
  word: string;
  span: Span;
  markdown: string;
  found: boolean;
}

export interface SignatureResult {
  word: string;
  label: string;
  found: boolean;
}

export interface CompletionEntry {
  label: string;
  insertText: string;
  /** what the client filters on; the typed text for fuzzy matches so they stay listed */
  filterText: string;
  /** word start up to the cursor; replaced on accept */
  replace: Span;
  detail: string;
  documentation?: string;
  source: CompletionSource;
  score: number;
  distance: number;
}

export interface CompletionResult {
  isIncomplete: boolean;
  items: CompletionEntry[];
}

export interface SessionDeps {
  engine: LookupEngine;
  documents: DocumentStore;
  formatter?: EntryFormatter;
  /** completion responses on at start; toggled by ENABLE_COMPLETION_COMMAND */
  completionEnabled?: boolean;
  logger?: Logger;
}

/**
 * Protocol-facing state machine. Every entry point first checks the request
 * kind against the current state; queries are tracked so shutdown can wait
 * for them.
 */
export class Session {
  private current: SessionState = "uninitialized";
  private shutdownRequested = false;
  private completionOn: boolean;
  private readonly inflight = new Set<Promise<unknown>>();
  private readonly formatter: EntryFormatter;

  constructor(private readonly deps: SessionDeps) {
    this.completionOn = deps.completionEnabled ?? true;
    this.formatter = deps.formatter ?? templateFormatter();
  }

  get state(): SessionState {
    return this.current;
  }

  get completionEnabled(): boolean {
    return this.completionOn;
  }

  get pending(): number {
    return this.inflight.size;
  }

  initialize(): { commands: string[] } {
    this.transition("initialize", "initialize");
    return { commands: [ENABLE_COMPLETION_COMMAND] };
  }

  didOpen(uri: DocumentUri, text: string, version: number): void {
    this.permit("didOpen", "mutate");
    this.deps.documents.open(uri, text, version);
    this.deps.logger?.debug({ uri, version }, "document opened");
  }

  didChange(uri: DocumentUri, text: string, version: number): void {
    this.permit("didChange", "mutate");
    const outcome = this.deps.documents.change(uri, text, version);
    if (outcome === "stale") {
      this.deps.logger?.warn({ uri, version, current: this.deps.documents.get(uri)?.version }, "stale document change ignored");
    }
  }

  didClose(uri: DocumentUri): void {
    this.permit("didClose", "mutate");
    this.deps.documents.close(uri);
  }

  executeCommand(command: string, args: readonly unknown[] = []): boolean {
    this.permit("executeCommand", "mutate");
    if (command !== ENABLE_COMPLETION_COMMAND) {
      throw new InvalidArgumentError(`unknown command: ${command}`);
    }

    const arg = args[0];
    if (arg === undefined || arg === null) {
      this.completionOn = !this.completionOn;
    } else if (typeof arg === "boolean") {
      this.completionOn = arg;
    } else {
      throw new InvalidArgumentError(`${ENABLE_COMPLETION_COMMAND} takes a boolean or no argument`);
    }

    this.deps.logger?.info({ enabled: this.completionOn }, "completion toggled");
    return this.completionOn;
  }

  async hover(uri: DocumentUri, position: Position, token: CancellationToken = NEVER_CANCELLED): Promise<HoverResult | null> {
    return this.query("hover", token, async () => {
      const at = this.deps.documents.wordAt(uri, position);
      if (!at) return null;

      const defined = await this.deps.engine.define(at.word, token);
      return {
        word: at.word,
        span: at.span,
        markdown: defined ? this.formatter.markdown(defined.entry) : notFoundMarkdown(at.word),
        found: defined !== undefined,
      };
    });
  }

  async signatureHelp(uri: DocumentUri, position: Position, token: CancellationToken = NEVER_CANCELLED): Promise<SignatureResult | null> {
    return this.query("signatureHelp", token, async () => {
      const at = this.deps.documents.wordAt(uri, position) ?? this.deps.documents.wordBefore(uri, position);
      if (!at) return null;

      const defined = await this.deps.engine.define(at.word, token);
      return {
        word: at.word,
        label: defined ? this.formatter.short(defined.entry) : notFoundLabel(at.word),
        found: defined !== undefined,
      };
    });
  }

  async completion(uri: DocumentUri, position: Position, token: CancellationToken = NEVER_CANCELLED): Promise<CompletionResult> {
    if (!this.completionOn) {
      this.permit("completion", "query");
      return { isIncomplete: false, items: [] };
    }

    return this.query("completion", token, async () => {
      const at = this.deps.documents.wordBefore(uri, position);
      if (!at || !at.prefix.length) return { isIncomplete: true, items: [] };

      const replace: Span = { start: at.span.start, end: position };
      const ranked = await this.deps.engine.complete(at.prefix, token);
      const items = ranked.map((c): CompletionEntry => {
        const entry = this.deps.engine.lookup(c.word)[0];
        const text = matchCase(c.word, at.prefix);
        return {
          label: text,
          insertText: text,
          filterText: c.source === "fuzzy" ? at.prefix : text,
          replace,
          detail: entry ? this.formatter.short(entry) : c.source === "fuzzy" ? `fuzzy match (distance ${c.distance})` : "dictionary",
          documentation: entry ? this.formatter.markdown(entry) : undefined,
          source: c.source,
          score: c.score,
          distance: c.distance,
        };
      });

      return { isIncomplete: true, items };
    });
  }

  /** Stops accepting changes, then waits for every query still running. */
  async shutdown(): Promise<void> {
    this.transition("shutdown", "shutdown");
    this.shutdownRequested = true;
    await Promise.allSettled(Array.from(this.inflight));
    this.deps.logger?.info("session drained");
  }

  /** Process exit code: 0 only after an orderly shutdown. */
  exit(): number {
    this.transition("exit", "exit");
    return this.shutdownRequested ? 0 : 1;
  }

  private permit(request: string, kind: RequestKind): void {
    if (!PERMITTED[this.current].has(kind)) throw new InvalidStateError(this.current, request);
  }

  private transition(request: SessionEvent, kind: RequestKind): void {
    this.permit(request, kind);
    const next = TRANSITIONS[this.current][request];
    if (!next) throw new InvalidStateError(this.current, request);
    this.deps.logger?.debug({ from: this.current, to: next }, "session state");
    this.current = next;
  }

  private query<T>(request: string, token: CancellationToken, run: () => Promise<T>): Promise<T> {
    this.permit(request, "query");

    const task = (async () => {
      // let a cancel notification that is already queued land first
      await yieldToEventLoop();
      throwIfCancelled(token);
      return run();
    })();

    this.inflight.add(task);
    const untrack = (): void => {
      this.inflight.delete(task);
    };
    void task.then(untrack, untrack);
    return task;
  }
}

import { RequestCancelledError } from "./errors.js";

/**
 * Read-only cancellation flag. Structurally compatible with the protocol
 * library's token, so handlers pass theirs straight through.
 */
export interface CancellationToken {
  readonly isCancellationRequested: boolean;
}

export const NEVER_CANCELLED: CancellationToken = Object.freeze({ isCancellationRequested: false });

export function throwIfCancelled(token: CancellationToken | undefined): void {
  if (token?.isCancellationRequested) throw new RequestCancelledError();
}

/** Mutable flag for callers that cancel on their own (tests, shutdown). */
export class CancellationSource implements CancellationToken {
  private cancelled = false;

  get isCancellationRequested(): boolean {
    return this.cancelled;
  }

  get token(): CancellationToken {
    return this;
  }

  cancel(): void {
    this.cancelled = true;
  }
}

/**
 * Cooperative cancellation
 *
 * The resolution loop polls `isCancelled()` at round boundaries; nothing is
 * interrupted mid-lookup. Sources: a manual switch (CLI Ctrl-C) or an
 * AbortSignal (HTTP client disconnect).
 */

export interface CancellationToken {
  isCancelled(): boolean
}

export const NEVER_CANCELLED: CancellationToken = {
  isCancelled: () => false,
}

export class CancellationSource {
  readonly token: CancellationToken
  private cancelled = false

  constructor() {
    this.token = {isCancelled: () => this.cancelled}
  }

  cancel(): void {
    this.cancelled = true
  }
}

export function cancellationFromSignal(signal: AbortSignal): CancellationToken {
  return {isCancelled: () => signal.aborted}
}

import { CancellationError, JobTimeoutError } from './errors.js';

export type CancelReason = 'cancelled' | 'timeout' | 'shutdown';

/**
 * Handed to every task executor. Executors poll it between steps (or hand
 * `signal` to anything that accepts an AbortSignal); the worker never
 * interrupts executor code on its own.
 */
export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  readonly reason: CancelReason | null;
  readonly signal: AbortSignal;
  throwIfCancellationRequested(): void;
  /** Runs immediately when already cancelled. Returns an unsubscribe function. */
  onCancellationRequested(listener: (reason: CancelReason) => void): () => void;
}

export class CancellationSource {
  private readonly controller = new AbortController();
  private cancelReason: CancelReason | null = null;
  private readonly listeners = new Set<(reason: CancelReason) => void>();
  readonly token: CancellationToken;

  constructor(private readonly timeoutSeconds = 0) {
    const source = this;
    this.token = {
      get isCancellationRequested() {
        return source.cancelReason !== null;
      },
      get reason() {
        return source.cancelReason;
      },
      signal: this.controller.signal,
      throwIfCancellationRequested: () => this.throwIfCancelled(),
      onCancellationRequested: (listener) => this.subscribe(listener),
    };
  }

  get reason(): CancelReason | null {
    return this.cancelReason;
  }

  /** First reason wins; later calls are ignored. */
  cancel(reason: CancelReason): boolean {
    if (this.cancelReason !== null) return false;
    this.cancelReason = reason;
    this.controller.abort(this.toError(reason));
    for (const listener of [...this.listeners]) listener(reason);
    this.listeners.clear();
    return true;
  }

  /** Resolves with the reason once cancelled. */
  whenCancelled(): Promise<CancelReason> {
    return new Promise((resolve) => {
      this.subscribe(resolve);
    });
  }

  private subscribe(listener: (reason: CancelReason) => void): () => void {
    if (this.cancelReason !== null) {
      listener(this.cancelReason);
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private throwIfCancelled(): void {
    if (this.cancelReason !== null) throw this.toError(this.cancelReason);
  }

  private toError(reason: CancelReason): Error {
    if (reason === 'timeout') return new JobTimeoutError(this.timeoutSeconds);
    if (reason === 'shutdown') return new CancellationError('Worker shutting down');
    return new CancellationError();
  }
}

/** Longest delay a Node timer holds; anything above fires immediately. */
export const MAX_DELAY_MS = 2 ** 31 - 1;

/**
 * Cancellable sleep. Resolves true when the full delay elapsed and false when
 * the token fired first. Delays above MAX_DELAY_MS are capped to it.
 */
export function delay(ms: number, token?: CancellationToken): Promise<boolean> {
  return new Promise((resolve) => {
    if (token?.isCancellationRequested) {
      resolve(false);
      return;
    }
    let unsubscribe: () => void = () => undefined;
    const timer = setTimeout(() => {
      unsubscribe();
      resolve(true);
    }, Math.min(ms, MAX_DELAY_MS));
    if (token) {
      unsubscribe = token.onCancellationRequested(() => {
        clearTimeout(timer);
        resolve(false);
      });
    }
  });
}

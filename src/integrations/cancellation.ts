/**
 * Cancellation Token Integration
 *
 * One token source per chat request. The HTTP layer cancels it when the
 * client disconnects; the pipeline checks it between stages and races
 * in-flight collaborator calls against it.
 *
 * Usage:
 *   const cts = createCancellationTokenSource();
 *   relay.run(state, { cancellationToken: cts.token });
 *   // Later: cts.cancel('Client disconnected');
 */

import { CancellationError, isCancellationError } from '../errors/index.js';

export { CancellationError, isCancellationError };

// =============================================================================
// TYPES
// =============================================================================

/**
 * Token that can be checked for cancellation.
 */
export interface CancellationToken {
  /** Whether cancellation has been requested */
  readonly isCancellationRequested: boolean;
  /** The reason for cancellation (if cancelled) */
  readonly cancellationReason?: string;
  /** Promise that resolves when cancelled */
  readonly onCancellationRequested: Promise<string | undefined>;
  /** Register a callback for cancellation */
  register(callback: (reason?: string) => void): { dispose: () => void };
  /** Throw if cancelled */
  throwIfCancellationRequested(): void;
}

/**
 * Source that controls a cancellation token.
 */
export interface CancellationTokenSource {
  readonly token: CancellationToken;
  readonly isCancellationRequested: boolean;
  cancel(reason?: string): void;
  dispose(): void;
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

function reportCallbackError(err: unknown): void {
  process.stderr.write(
    `[cancellation] callback failed: ${err instanceof Error ? err.message : String(err)}\n`
  );
}

class CancellationTokenImpl implements CancellationToken {
  private _cancelled = false;
  private _reason?: string;
  private _callbacks = new Set<(reason?: string) => void>();
  private _promise: Promise<string | undefined>;
  private _resolve: (reason?: string) => void = () => undefined;

  constructor() {
    this._promise = new Promise((resolve) => {
      this._resolve = resolve;
    });
  }

  get isCancellationRequested(): boolean {
    return this._cancelled;
  }

  get cancellationReason(): string | undefined {
    return this._reason;
  }

  get onCancellationRequested(): Promise<string | undefined> {
    return this._promise;
  }

  register(callback: (reason?: string) => void): { dispose: () => void } {
    if (this._cancelled) {
      try {
        callback(this._reason);
      } catch (err) {
        reportCallbackError(err);
      }
      return { dispose: () => undefined };
    }
    this._callbacks.add(callback);
    return { dispose: () => this._callbacks.delete(callback) };
  }

  throwIfCancellationRequested(): void {
    if (this._cancelled) {
      throw new CancellationError(this._reason);
    }
  }

  /** @internal */
  _cancel(reason?: string): void {
    if (this._cancelled) return;
    this._cancelled = true;
    this._reason = reason;
    this._resolve(reason);
    for (const cb of this._callbacks) {
      try {
        cb(reason);
      } catch (err) {
        // Keep going so every callback runs
        reportCallbackError(err);
      }
    }
    this._callbacks.clear();
  }
}

class CancellationTokenSourceImpl implements CancellationTokenSource {
  private _token = new CancellationTokenImpl();
  private _disposed = false;

  get token(): CancellationToken {
    return this._token;
  }

  get isCancellationRequested(): boolean {
    return this._token.isCancellationRequested;
  }

  cancel(reason?: string): void {
    if (this._disposed) return;
    this._token._cancel(reason);
  }

  dispose(): void {
    this._disposed = true;
  }
}

class NeverCancelledToken implements CancellationToken {
  readonly isCancellationRequested = false;
  readonly cancellationReason = undefined;
  readonly onCancellationRequested = new Promise<string | undefined>(() => undefined);

  register(): { dispose: () => void } {
    return { dispose: () => undefined };
  }

  throwIfCancellationRequested(): void {
    // never cancelled
  }
}

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

export function createCancellationTokenSource(): CancellationTokenSource {
  return new CancellationTokenSourceImpl();
}

/**
 * A token that is never cancelled. Default when the caller passes none.
 */
const NONE: CancellationToken = new NeverCancelledToken();

export const CancellationToken = {
  None: NONE,
};

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Sleep with cancellation support.
 */
export function sleep(ms: number, token?: CancellationToken): Promise<void> {
  return new Promise((resolve, reject) => {
    if (token?.isCancellationRequested) {
      reject(new CancellationError(token.cancellationReason));
      return;
    }

    let registration: { dispose: () => void } | undefined;
    const id = setTimeout(() => {
      registration?.dispose();
      resolve();
    }, ms);
    registration = token?.register((reason) => {
      clearTimeout(id);
      reject(new CancellationError(reason));
    });
  });
}

/**
 * Race a promise against cancellation. The losing promise is abandoned,
 * not aborted.
 */
export function race<T>(promise: Promise<T>, token: CancellationToken): Promise<T> {
  if (token.isCancellationRequested) {
    return Promise.reject(new CancellationError(token.cancellationReason));
  }

  return Promise.race([
    promise,
    token.onCancellationRequested.then((reason): never => {
      throw new CancellationError(reason);
    }),
  ]);
}

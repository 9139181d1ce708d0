import { CANCEL_REASON, type CancelReason } from '../constants.js';
import { CancelledError, TimeoutError } from '../errors.js';
import type { PluginToken } from '../domain/plugin/types.js';

/** Values of the shared cancellation cell; 0 means not cancelled. */
export const CANCEL_CODE: Record<CancelReason, number> = {
  [CANCEL_REASON.USER]: 1,
  [CANCEL_REASON.TIMEOUT]: 2,
};

export function reasonForCode(code: number): CancelReason | undefined {
  if (code === CANCEL_CODE[CANCEL_REASON.USER]) return CANCEL_REASON.USER;
  if (code === CANCEL_CODE[CANCEL_REASON.TIMEOUT]) return CANCEL_REASON.TIMEOUT;
  return undefined;
}

/**
 * Cooperative cancellation flag for one run. The flag lives in a
 * SharedArrayBuffer so the plugin's thread reads the same cell the engine
 * writes; the plugin is expected to poll `isCancelled` (or call
 * `throwIfCancelled()`) and return. Nothing forces it to.
 */
export class CancellationToken implements PluginToken {
  private shared = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
  private cell = new Int32Array(this.shared);
  private controller = new AbortController();

  get isCancelled(): boolean {
    return Atomics.load(this.cell, 0) !== 0;
  }

  get reason(): CancelReason | undefined {
    return reasonForCode(Atomics.load(this.cell, 0));
  }

  /** Aborts when the token is cancelled, for APIs that take an AbortSignal. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** The cell handed to the plugin's thread. */
  get sharedState(): SharedArrayBuffer {
    return this.shared;
  }

  /** Returns false when the token was already cancelled; the first reason sticks. */
  cancel(reason: CancelReason = CANCEL_REASON.USER): boolean {
    if (Atomics.compareExchange(this.cell, 0, 0, CANCEL_CODE[reason]) !== 0) return false;
    this.controller.abort(this.toError());
    return true;
  }

  throwIfCancelled(): void {
    if (this.isCancelled) throw this.toError();
  }

  private toError(): CancelledError | TimeoutError {
    return this.reason === CANCEL_REASON.TIMEOUT ? new TimeoutError() : new CancelledError();
  }
}

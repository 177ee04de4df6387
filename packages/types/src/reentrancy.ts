/**
 * @ballast/types — Scoped reentrancy guard.
 *
 * Owns the execution order of one component's mutating entry points.
 * Independent callers are queued and run one at a time in arrival order.
 * A call made from inside a running operation (a collaborator calling
 * back in) fails with the owner's error instead of waiting, since it
 * would otherwise wait on itself.
 */

import { AsyncLocalStorage } from "node:async_hooks";

export class ReentrancyGuard {
  private readonly _onReentry: () => Error;
  private readonly _scope = new AsyncLocalStorage<true>();
  private _tail: Promise<void> = Promise.resolve();
  private _entered = false;
  private _waiting = 0;

  /**
   * @param onReentry builds the owning package's REENTRANCY error
   */
  constructor(onReentry: () => Error) {
    this._onReentry = onReentry;
  }

  /** True while an operation holds the guard. */
  get entered(): boolean {
    return this._entered;
  }

  /** Operations queued behind the current one. */
  get waiting(): number {
    return this._waiting;
  }

  async runAsync<T>(fn: () => Promise<T>): Promise<T> {
    if (this._scope.getStore() === true) {
      throw this._onReentry();
    }

    const previous = this._tail;
    let release: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    this._tail = previous.then(() => turn);

    this._waiting += 1;
    await previous;
    this._waiting -= 1;

    this._entered = true;
    try {
      return await this._scope.run(true, fn);
    } finally {
      this._entered = false;
      release();
    }
  }
}

/**
 * A flag that goes from pending to fired exactly once.
 *
 * `tryFire()` is the whole check-and-set: it reads and writes in one
 * synchronous step, and only the caller that sees `true` may act on the
 * transition. Callers fire before doing the guarded work, so the guarded work
 * re-entering `tryFire()` sees the flag already set.
 */
export class OnceFlag {
  #fired = false;

  tryFire(): boolean {
    if (this.#fired) return false;
    this.#fired = true;
    return true;
  }

  get fired(): boolean {
    return this.#fired;
  }
}

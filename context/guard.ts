import { type Cell, swap, trackGuard } from "./cell.ts";

/**
 * Owns a value removed from a slot and puts it back, once.
 *
 * Obtained from {@linkcode Slot.enter} or {@linkcode Slot.take}. Release it
 * in a `finally` block so that thrown errors restore the slot as well.
 */
export class SlotGuard<T> {
  readonly #cell: Cell<T>;
  #value: T | undefined;
  #released = false;

  /** @internal */
  constructor(cell: Cell<T>, value: T | undefined) {
    this.#cell = cell;
    this.#value = value;
    trackGuard(1);
  }

  /** Whether the owned value was written back */
  get released(): boolean {
    return this.#released;
  }

  /**
   * Write the owned value back into the cell it came from.
   * Later calls do nothing.
   */
  release(): void {
    if (this.#released) return;
    this.#released = true;
    swap(this.#cell, this.#value);
    this.#value = undefined;
    trackGuard(-1);
  }
}

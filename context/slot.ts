import { AsyncLocalStorage } from "node:async_hooks";
import { type Cell, sharedCell, swap } from "./cell.ts";
import { ContextProtocolError } from "./errors.ts";
import { SlotGuard } from "./guard.ts";
import { slotMode } from "./mode.ts";

/**
 * Holds at most one value per execution unit, handed out with strict
 * nesting.
 *
 * Values are meant to be borrowed: whoever installs one restores the
 * previous occupant before giving control back.
 */
export class Slot<T extends {}> {
  readonly #units = new AsyncLocalStorage<Cell<T>>();
  readonly #root: Cell<T> = {};

  /**
   * @param key Identifies the slot in errors, and its shared cell in `"unsafe-single-unit"` mode
   */
  constructor(public readonly key: string) {}

  #cell(): Cell<T> {
    return slotMode() === "unsafe-single-unit"
      ? sharedCell<T>(this.key)
      : this.#units.getStore() ?? this.#root;
  }

  /**
   * Overwrite current unit's occupant
   *
   * @param value New occupant
   * @returns The previous occupant, if any
   */
  install(value: T): T | undefined {
    return swap(this.#cell(), value);
  }

  /**
   * Install a value, returning a guard that restores the previous occupant
   *
   * @param value New occupant
   */
  enter(value: T): SlotGuard<T> {
    const cell = this.#cell();
    return new SlotGuard(cell, swap(cell, value));
  }

  /**
   * Remove the occupant, leaving the slot empty until the returned guard is released
   *
   * @throws {ContextProtocolError} if the slot is empty
   */
  take(): [T, SlotGuard<T>] {
    const cell = this.#cell();
    const value = swap(cell, undefined);
    if (value === undefined) throw new ContextProtocolError(this.key);
    return [value, new SlotGuard(cell, value)];
  }

  /**
   * Run a function while the slot holds given value
   *
   * @param value Value to provide
   * @param cb Function to provide value to
   * @params args Arguments to forward to `cb`
   */
  provide<Args extends unknown[], R>(
    value: T,
    cb: (...args: Args) => R,
    ...args: Args
  ): R {
    const guard = this.enter(value);
    try {
      return cb(...args);
    } finally {
      guard.release();
    }
  }

  /**
   * Run a function with exclusive access to the occupant
   *
   * The slot reads as empty until `cb` returns or throws.
   *
   * @param cb Function receiving the occupant
   * @params args Arguments to forward to `cb`
   *
   * @throws {ContextProtocolError} if the slot is empty
   */
  use<Args extends unknown[], R>(
    cb: (value: T, ...args: Args) => R,
    ...args: Args
  ): R {
    const [value, guard] = this.take();
    try {
      return cb(value, ...args);
    } finally {
      guard.release();
    }
  }

  /**
   * Run a function with the slot emptied, in the current execution unit
   *
   * The occupant, if any, is restored when `cb` returns or throws.
   *
   * @param cb Function to deprive the value from
   * @params args Arguments to forward to `cb`
   */
  deprive<Args extends unknown[], R>(
    cb: (...args: Args) => R,
    ...args: Args
  ): R {
    const cell = this.#cell();
    const guard = new SlotGuard(cell, swap(cell, undefined));
    try {
      return cb(...args);
    } finally {
      guard.release();
    }
  }

  /**
   * Run a function in a new execution unit, starting with an empty slot
   *
   * Has no effect in `"unsafe-single-unit"` mode.
   *
   * @param cb Function to run
   * @params args Arguments to forward to `cb`
   */
  isolate<Args extends unknown[], R>(
    cb: (...args: Args) => R,
    ...args: Args
  ): R {
    return slotMode() === "unsafe-single-unit"
      ? cb(...args)
      : this.#units.run({}, cb, ...args);
  }
}

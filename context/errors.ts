/**
 * Thrown when a {@linkcode Slot} is read while empty: either nothing provided
 * it in the current execution unit, or a surrounding `use` already took it.
 *
 * Signals a broken calling discipline. Callers are not expected to recover.
 */
export class ContextProtocolError extends Error {
  override readonly name = "ContextProtocolError";

  /**
   * @param key Key of the slot that was read while empty
   */
  constructor(public readonly key: string) {
    super(
      `Slot ${
        JSON.stringify(key)
      } is empty: its value is only available while provided, and to one use at a time`,
    );
  }
}

/** Invalid slot mode, or a mode switch while a slot holds a value */
export class SlotConfigError extends Error {
  override readonly name = "SlotConfigError";
}

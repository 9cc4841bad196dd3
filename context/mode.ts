import { liveGuards, occupiedCells } from "./cell.ts";
import { SlotConfigError } from "./errors.ts";

/**
 * Where slots keep their occupant
 *
 * - `"per-unit"`: one cell per execution unit (worker thread or
 *   {@linkcode Slot.isolate} scope). The default.
 * - `"unsafe-single-unit"`: every unit shares one process-wide cell per slot
 *   key. Only valid when the program runs a single logical execution unit
 *   for its whole lifetime. Nothing checks this.
 */
export type SlotMode = "per-unit" | "unsafe-single-unit";

/** Slot configuration */
export interface SlotConfig {
  /** Storage mode applying to every slot */
  mode: SlotMode;
}

const parseMode = (value: unknown, source: string): SlotMode => {
  if (value === "per-unit" || value === "unsafe-single-unit") return value;
  throw new SlotConfigError(
    `Unknown slot mode ${JSON.stringify(value)} from ${source}`,
  );
};

let warned = false;

const setMode = (next: SlotMode): SlotMode => {
  if (next === "unsafe-single-unit" && !warned) {
    warned = true;
    console.warn(
      "Slots run in unsafe-single-unit mode: all execution units share one cell per slot. " +
        "Concurrent use from more than one unit is undefined behavior.",
    );
  }
  return mode = next;
};

let mode: SlotMode = "per-unit";
{
  const fromEnv = process.env.HANDOFF_SLOT_MODE;
  if (fromEnv) setMode(parseMode(fromEnv, "HANDOFF_SLOT_MODE"));
}

/** Active slot mode */
export const slotMode = (): SlotMode => mode;

/**
 * Switch slot storage mode
 *
 * @param config Slot configuration
 *
 * @throws {SlotConfigError} if the mode is unknown, any slot currently holds a value,
 * or a value taken out of a slot wasn't restored yet
 */
export const configureSlots = (config: SlotConfig): void => {
  const next = parseMode(config.mode, "configureSlots");
  if (next === mode) return;
  const occupied = occupiedCells();
  const guards = liveGuards();
  if (occupied > 0 || guards > 0) {
    throw new SlotConfigError(
      `Can't switch slot mode to ${
        JSON.stringify(next)
      } while ${occupied} slot cell(s) hold a value and ${guards} guard(s) are live`,
    );
  }
  setMode(next);
};

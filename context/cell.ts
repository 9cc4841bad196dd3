/** Single-occupant storage backing a slot in one execution unit */
export interface Cell<T> {
  value?: T;
}

interface Registry {
  /** Cells of `"unsafe-single-unit"` mode, by slot key */
  readonly cells: Map<string, Cell<unknown>>;
  /** Cells holding a value, across all units and slots */
  occupants: number;
  /** Guards not released yet */
  guards: number;
}

const registryKey: unique symbol = Symbol.for("handoff.slots");

const scope: typeof globalThis & { [registryKey]?: Registry } = globalThis;

// Shared by every copy of this module loaded in the same realm
const registry: Registry = scope[registryKey] ??= {
  cells: new Map(),
  occupants: 0,
  guards: 0,
};

/**
 * Replace a cell's content
 *
 * @param cell Cell to write to
 * @param value New occupant, `undefined` to clear it
 * @returns The previous occupant
 */
export const swap = <T>(cell: Cell<T>, value: T | undefined): T | undefined => {
  const previous = cell.value;
  cell.value = value;
  registry.occupants += Number(value !== undefined) -
    Number(previous !== undefined);
  return previous;
};

/** Number of cells currently holding a value, across all units and slots */
export const occupiedCells = (): number => registry.occupants;

/** Number of guards waiting to restore a cell */
export const liveGuards = (): number => registry.guards;

/**
 * Track a guard being created (`1`) or released (`-1`)
 *
 * @param delta Change in live guards
 */
export const trackGuard = (delta: 1 | -1): void => {
  registry.guards += delta;
};

/**
 * Process-wide cell for given slot key
 *
 * @param key Slot key
 */
export const sharedCell = <T>(key: string): Cell<T> => {
  let cell = registry.cells.get(key);
  if (!cell) registry.cells.set(key, cell = {});
  return cell as Cell<T>;
};

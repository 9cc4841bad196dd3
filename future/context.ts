import { Slot } from "@handoff/context";

/** Notifies the executor that a pending future can make progress */
export interface Waker {
  wake(): void;
}

/**
 * Make a {@linkcode Waker} from a callback
 *
 * @param wake Called on each wake
 */
export const wakerFn = (wake: () => void): Waker => ({ wake });

/** Waker ignoring wake-ups */
export const noopWaker: Waker = Object.freeze({ wake() {} });

/**
 * Handed to {@linkcode Future.poll} by the executor.
 *
 * Only valid during the poll call it was passed to.
 */
export class PollContext {
  /**
   * @param waker Wakes the task being polled
   */
  constructor(public readonly waker: Waker) {}

  /** A context whose waker does nothing */
  static noop(): PollContext {
    return new PollContext(noopWaker);
  }
}

const $task = new Slot<PollContext>("handoff.task-context");

/**
 * Make `cx` the ambient task context while running `cb`
 *
 * The previous context, if any, is restored when `cb` returns or throws.
 *
 * @param cx Context of the current poll
 * @param cb Function to provide the context to
 * @params args Arguments to forward to `cb`
 */
export const setTaskContext: Slot<PollContext>["provide"] = (
  cx,
  cb,
  ...args
) => $task.provide(cx, cb, ...args);

/**
 * Get exclusive access to the ambient task context
 *
 * The context is unavailable to anything `op` calls, and restored as soon as
 * `op` returns or throws.
 *
 * @param op Function receiving the context
 *
 * @throws {ContextProtocolError} outside of any poll, or nested in another `withCurrentContext`
 */
export const withCurrentContext = <R>(op: (cx: PollContext) => R): R =>
  $task.use(op);

/**
 * Run a function without the ambient task context, restoring it afterwards
 *
 * @param cb Function to run
 * @params args Arguments to forward to `cb`
 */
export const withoutTaskContext: Slot<PollContext>["deprive"] = (
  cb,
  ...args
) => $task.deprive(cb, ...args);

/**
 * Run a function in a new execution unit, with no ambient task context
 *
 * @param cb Function to run
 * @params args Arguments to forward to `cb`
 */
export const isolateTaskContext: Slot<PollContext>["isolate"] = (
  cb,
  ...args
) => $task.isolate(cb, ...args);

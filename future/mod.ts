/**
 * Drive resumable state machines through polls, with the poll's context
 * available ambiently inside them.
 *
 * A {@linkcode FutureAdapter} resumes its coroutine once per
 * {@linkcode FutureAdapter.poll}. During that resume, the poll's
 * {@linkcode PollContext} is reachable with {@linkcode withCurrentContext},
 * so leaf code can register its waker without the context being threaded
 * through every call.
 *
 * @example Suspend until woken
 * ```ts
 * import { fromGenerator, PollContext, wakerFn, withCurrentContext } from "@handoff/future";
 * import assert from "node:assert";
 *
 * let wake = () => {};
 * const task = fromGenerator(function* () {
 *   withCurrentContext((cx) => {
 *     wake = () => cx.waker.wake();
 *   });
 *   yield;
 *   return 42;
 * }());
 *
 * const cx = new PollContext(wakerFn(() => console.log("woken")));
 * assert(!task.poll(cx).ready);
 * wake();
 * assert.deepEqual(task.poll(cx), { ready: true, value: 42 });
 * ```
 *
 * @example Await nested futures
 * ```ts
 * import { awaitFuture, fromGenerator, PollContext, readyFuture } from "@handoff/future";
 * import assert from "node:assert";
 *
 * const task = fromGenerator(function* () {
 *   const a = yield* awaitFuture(readyFuture(1));
 *   const b = yield* awaitFuture(readyFuture(2));
 *   return a + b;
 * }());
 *
 * assert.deepEqual(task.poll(PollContext.noop()), { ready: true, value: 3 });
 * ```
 *
 * @module
 */

export { awaitFuture, pollWithAmbientContext } from "./ambient.ts";
export {
  isolateTaskContext,
  noopWaker,
  PollContext,
  setTaskContext,
  type Waker,
  wakerFn,
  withCurrentContext,
  withoutTaskContext,
} from "./context.ts";
export { InvalidPollError } from "./errors.ts";
export {
  type AdapterState,
  type Completed,
  completed,
  type Coroutine,
  type CoroutineState,
  fromCoroutine,
  fromGenerator,
  type Future,
  FutureAdapter,
  SUSPENDED,
  type Suspended,
} from "./future.ts";
export { pendingFuture, pollFn, readyFuture } from "./leaf.ts";
export {
  isReady,
  mapPoll,
  type Pending,
  PENDING,
  type Poll,
  type Ready,
  ready,
} from "./poll.ts";

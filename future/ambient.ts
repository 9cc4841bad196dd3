import { withCurrentContext } from "./context.ts";
import type { Future } from "./future.ts";
import type { Poll } from "./poll.ts";

/**
 * Poll a future with the ambient task context
 *
 * Lets a coroutine drive a nested future without receiving the context
 * explicitly.
 *
 * @param future Future to poll
 *
 * @throws {ContextProtocolError} outside of any poll
 */
export const pollWithAmbientContext = <T>(future: Future<T>): Poll<T> =>
  withCurrentContext((cx) => future.poll(cx));

/**
 * Wait for a future from inside a generator-based coroutine
 *
 * @example
 * ```ts
 * const task = fromGenerator(function* () {
 *   const user = yield* awaitFuture(fetchUser);
 *   return user.name;
 * }());
 * ```
 *
 * @param future Future to wait for
 * @returns The future's value, once ready
 */
export function* awaitFuture<T>(future: Future<T>): Generator<void, T, unknown> {
  while (true) {
    const poll = pollWithAmbientContext(future);
    if (poll.ready) return poll.value;
    yield;
  }
}

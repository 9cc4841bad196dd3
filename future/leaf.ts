import type { PollContext } from "./context.ts";
import { InvalidPollError } from "./errors.ts";
import type { Future } from "./future.ts";
import { PENDING, type Poll, ready } from "./poll.ts";

/**
 * Make a future from its poll function
 *
 * @param poll Called on each poll
 */
export const pollFn = <T>(poll: (cx: PollContext) => Poll<T>): Future<T> => ({
  poll,
});

/**
 * Future immediately ready with given value
 *
 * Refuses being polled again after it resolved.
 *
 * @param value Value to resolve to
 */
export const readyFuture = <T>(value: T): Future<T> => {
  let done = false;
  return pollFn(() => {
    if (done) throw new InvalidPollError("Future polled after completion");
    done = true;
    return ready(value);
  });
};

/** Future that never resolves */
export const pendingFuture = <T = never>(): Future<T> => pollFn(() => PENDING);

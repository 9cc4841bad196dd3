/** Not ready yet: the future registered its waker and will be polled again */
export interface Pending {
  readonly ready: false;
}

/** Final value of a future */
export interface Ready<T> {
  readonly ready: true;
  readonly value: T;
}

/** Outcome of one {@linkcode Future.poll} */
export type Poll<T> = Pending | Ready<T>;

/** The only {@linkcode Pending} value */
export const PENDING: Pending = Object.freeze({ ready: false } as const);

/**
 * Wrap a final value
 *
 * @param value Value the future resolved to
 */
export const ready = <T>(value: T): Ready<T> => ({ ready: true, value });

/**
 * Narrow a poll to its ready case
 *
 * @param poll Poll outcome
 */
export const isReady = <T>(poll: Poll<T>): poll is Ready<T> => poll.ready;

/**
 * Transform the value of a ready poll, passing pending through
 *
 * @param poll Poll outcome
 * @param map Value transformer
 */
export const mapPoll = <T, R>(
  poll: Poll<T>,
  map: (value: T) => R,
): Poll<R> => poll.ready ? ready(map(poll.value)) : PENDING;

import {
  type PollContext,
  setTaskContext,
  withoutTaskContext,
} from "./context.ts";
import { InvalidPollError } from "./errors.ts";
import { PENDING, type Poll, ready } from "./poll.ts";

/** An asynchronous value driven by repeated polls */
export interface Future<T> {
  /**
   * Try to make progress without blocking
   *
   * @param cx Context of this poll. Its waker must be woken once polling again is useful.
   */
  poll(cx: PollContext): Poll<T>;
}

/** The coroutine stopped at a suspension point */
export interface Suspended {
  readonly kind: "suspended";
}

/** The coroutine returned */
export interface Completed<T> {
  readonly kind: "completed";
  readonly value: T;
}

/** Outcome of one {@linkcode Coroutine.resume} */
export type CoroutineState<T> = Suspended | Completed<T>;

/** The only {@linkcode Suspended} value */
export const SUSPENDED: Suspended = Object.freeze({ kind: "suspended" } as const);

/**
 * Terminal coroutine state
 *
 * @param value Return value of the coroutine
 */
export const completed = <T>(value: T): Completed<T> => ({
  kind: "completed",
  value,
});

/**
 * Resumable state machine
 *
 * Code running in `resume` reaches the current {@linkcode PollContext}
 * through `withCurrentContext`.
 */
export interface Coroutine<T> {
  /** Run until the next suspension point or completion */
  resume(): CoroutineState<T>;

  /** Release resources of a coroutine dropped before completing */
  abandon?(): void;
}

/** Lifecycle of a {@linkcode FutureAdapter} */
export type AdapterState =
  | "unresumed"
  | "suspended"
  | "resuming"
  | "completed"
  | "failed"
  | "abandoned";

// Coroutines (and generators) already wrapped by an adapter
const owned = new WeakSet<object>();

const claim = (coroutine: object, what: string): void => {
  if (owned.has(coroutine)) {
    throw new InvalidPollError(`${what} is already owned by another future`);
  }
  owned.add(coroutine);
};

/**
 * {@linkcode Future} resuming a {@linkcode Coroutine} once per poll, with the
 * poll's context as ambient task context.
 *
 * Once resumed, the coroutine may hold state tied to this adapter: it is
 * pinned, and no API moves the coroutine elsewhere.
 */
export class FutureAdapter<T> implements Future<T> {
  readonly #coroutine: Coroutine<T>;
  #state: AdapterState = "unresumed";
  #resumed = false;

  /** @internal */
  constructor(coroutine: Coroutine<T>) {
    this.#coroutine = coroutine;
  }

  /** Current lifecycle state */
  get state(): AdapterState {
    return this.#state;
  }

  /** Whether the coroutine was resumed at least once */
  get pinned(): boolean {
    return this.#resumed;
  }

  poll(cx: PollContext): Poll<T> {
    switch (this.#state) {
      case "resuming":
        throw new InvalidPollError(
          "Future polled re-entrantly from its own resume",
        );
      case "completed":
        throw new InvalidPollError("Future polled after completion");
      case "failed":
        throw new InvalidPollError("Future polled after its resume threw");
      case "abandoned":
        throw new InvalidPollError("Future polled after being abandoned");
    }

    this.#state = "resuming";
    this.#resumed = true;

    let result: CoroutineState<T>;
    try {
      result = setTaskContext(cx, () => this.#coroutine.resume());
    } catch (e) {
      this.#state = "failed";
      throw e;
    }

    if (result.kind === "completed") {
      this.#state = "completed";
      return ready(result.value);
    }
    this.#state = "suspended";
    return PENDING;
  }

  /**
   * Drop the coroutine before it completes
   *
   * The coroutine's `abandon` hook runs without ambient task context, even
   * when called from inside another future's poll. Does nothing once the
   * coroutine completed, failed or was abandoned.
   *
   * @throws {InvalidPollError} from inside the coroutine's own resume
   */
  abandon(): void {
    switch (this.#state) {
      case "resuming":
        throw new InvalidPollError(
          "Future can't be abandoned from its own resume",
        );
      case "unresumed":
      case "suspended":
        this.#state = "abandoned";
        withoutTaskContext(() => this.#coroutine.abandon?.());
    }
  }
}

/**
 * Wrap a coroutine in a future, taking ownership of it
 *
 * @param coroutine State machine to drive
 *
 * @throws {InvalidPollError} if another future already owns `coroutine`
 */
export const fromCoroutine = <T>(coroutine: Coroutine<T>): FutureAdapter<T> => {
  claim(coroutine, "Coroutine");
  return new FutureAdapter(coroutine);
};

const generatorCoroutine = <T>(
  generator: Generator<unknown, T, undefined>,
): Coroutine<T> => {
  const droppable: Generator<unknown, T | undefined, undefined> = generator;
  return {
    resume() {
      const next = generator.next();
      return next.done ? completed(next.value) : SUSPENDED;
    },
    abandon() {
      droppable.return(undefined);
    },
  };
};

/**
 * Wrap a generator in a future, taking ownership of it
 *
 * Each `yield` suspends; the returned value completes the future. Use
 * `yield* awaitFuture(other)` to wait on another future.
 *
 * @param generator Started generator to drive
 *
 * @throws {InvalidPollError} if another future already owns `generator`
 */
export const fromGenerator = <T>(
  generator: Generator<unknown, T, undefined>,
): FutureAdapter<T> => {
  claim(generator, "Generator");
  return new FutureAdapter(generatorCoroutine(generator));
};

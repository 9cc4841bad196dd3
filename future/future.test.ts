import { ContextProtocolError } from "@handoff/context";
import { describe, expect, test } from "vitest";
import { PollContext, setTaskContext, wakerFn, withCurrentContext } from "./context.ts";
import { InvalidPollError } from "./errors.ts";
import {
  completed,
  type Coroutine,
  type CoroutineState,
  fromCoroutine,
  fromGenerator,
  type FutureAdapter,
  SUSPENDED,
} from "./future.ts";
import { PENDING, ready } from "./poll.ts";

const currentContext = () => withCurrentContext((cx) => cx);

class Countdown implements Coroutine<string> {
  constructor(private remaining: number) {}

  resume(): CoroutineState<string> {
    return this.remaining-- > 0 ? SUSPENDED : completed("liftoff");
  }
}

describe("fromGenerator", () => {
  test("suspends once then completes with 42, restoring an empty slot", () => {
    const c1 = PollContext.noop();
    const task = fromGenerator(function* () {
      yield;
      return 42;
    }());

    expect(task.poll(c1)).toBe(PENDING);
    expect(currentContext).toThrow(ContextProtocolError);

    expect(task.poll(c1)).toEqual(ready(42));
    expect(currentContext).toThrow(ContextProtocolError);
  });

  test("restores the context that was installed before each poll", () => {
    const c0 = PollContext.noop();
    const c1 = PollContext.noop();
    const task = fromGenerator(function* () {
      yield;
      return 42;
    }());

    setTaskContext(c0, () => {
      expect(task.poll(c1)).toBe(PENDING);
      expect(currentContext()).toBe(c0);
      expect(task.poll(c1)).toEqual(ready(42));
      expect(currentContext()).toBe(c0);
    });
  });

  test("exposes each poll's context to the coroutine", () => {
    const seen: PollContext[] = [];
    const c1 = PollContext.noop();
    const c2 = PollContext.noop();
    const task = fromGenerator(function* () {
      seen.push(currentContext());
      yield;
      seen.push(currentContext());
    }());

    task.poll(c1);
    task.poll(c2);

    expect(seen).toEqual([c1, c2]);
    expect(seen[0]).toBe(c1);
    expect(seen[1]).toBe(c2);
  });

  test("lets the coroutine register the poll's waker", () => {
    let wakes = 0;
    let fired = false;
    let wake = () => {};
    const cx = new PollContext(wakerFn(() => wakes++));
    const task = fromGenerator(function* () {
      while (!fired) {
        withCurrentContext((cx) => {
          wake = () => cx.waker.wake();
        });
        yield;
      }
      return "fired";
    }());

    expect(task.poll(cx)).toBe(PENDING);
    expect(wakes).toBe(0);

    fired = true;
    wake();
    expect(wakes).toBe(1);
    expect(task.poll(cx)).toEqual(ready("fired"));
  });

  test("restores the slot before a thrown error propagates", () => {
    const c0 = PollContext.noop();
    const task = fromGenerator(function* (): Generator<void, number> {
      yield;
      throw new Error("boom");
    }());

    setTaskContext(c0, () => {
      expect(task.poll(PollContext.noop())).toBe(PENDING);
      expect(() => task.poll(PollContext.noop())).toThrow("boom");
      expect(currentContext()).toBe(c0);
    });

    expect(task.state).toBe("failed");
    expect(() => task.poll(PollContext.noop())).toThrow(
      new InvalidPollError("Future polled after its resume threw"),
    );
  });

  test("passes failure values through", () => {
    const failure = new Error("not found");
    const task = fromGenerator(function* () {
      return failure;
    }());

    const poll = task.poll(PollContext.noop());

    expect(poll.ready && poll.value).toBe(failure);
  });

  test("refuses polls after completion", () => {
    const task = fromGenerator(function* () {
      return 1;
    }());
    task.poll(PollContext.noop());

    expect(task.state).toBe("completed");
    expect(() => task.poll(PollContext.noop())).toThrow(
      new InvalidPollError("Future polled after completion"),
    );
  });

  test("refuses re-entrant polls", () => {
    let self: FutureAdapter<void> | undefined;
    const task = fromGenerator(function* () {
      self?.poll(PollContext.noop());
    }());
    self = task;

    expect(() => task.poll(PollContext.noop())).toThrow(
      new InvalidPollError("Future polled re-entrantly from its own resume"),
    );
    expect(task.state).toBe("failed");
  });

  test("refuses generators already owned by another future", () => {
    const generator = function* () {
      return 1;
    }();
    fromGenerator(generator);

    expect(() => fromGenerator(generator)).toThrow(
      new InvalidPollError("Generator is already owned by another future"),
    );
  });
});

describe("fromCoroutine", () => {
  test("drives hand-written state machines", () => {
    const task = fromCoroutine(new Countdown(3));
    const cx = PollContext.noop();

    expect([task.poll(cx), task.poll(cx), task.poll(cx)]).toEqual([
      PENDING,
      PENDING,
      PENDING,
    ]);
    expect(task.poll(cx)).toEqual(ready("liftoff"));
  });

  test("refuses coroutines already owned by another future", () => {
    const countdown = new Countdown(1);
    fromCoroutine(countdown);

    expect(() => fromCoroutine(countdown)).toThrow(
      new InvalidPollError("Coroutine is already owned by another future"),
    );
  });

  test("is pinned from its first resume", () => {
    const task = fromCoroutine(new Countdown(1));
    expect(task.state).toBe("unresumed");
    expect(task.pinned).toBe(false);

    task.poll(PollContext.noop());

    expect(task.state).toBe("suspended");
    expect(task.pinned).toBe(true);
  });
});

describe("FutureAdapter.abandon", () => {
  test("runs the generator's cleanup outside of any poll", () => {
    const log: string[] = [];
    const task = fromGenerator(function* () {
      try {
        yield;
        log.push("resumed");
      } finally {
        try {
          currentContext();
          log.push("context");
        } catch (e) {
          log.push(e instanceof ContextProtocolError ? "no context" : "other");
        }
      }
    }());

    task.poll(PollContext.noop());
    task.abandon();

    expect(log).toEqual(["no context"]);
    expect(task.state).toBe("abandoned");
    expect(() => task.poll(PollContext.noop())).toThrow(
      new InvalidPollError("Future polled after being abandoned"),
    );
  });

  test("hides the outer poll's context from a nested future's cleanup", () => {
    const log: string[] = [];
    const inner = fromGenerator(function* () {
      try {
        yield;
      } finally {
        try {
          currentContext();
          log.push("context");
        } catch (e) {
          log.push(e instanceof ContextProtocolError ? "no context" : "other");
        }
      }
    }());
    const cx = PollContext.noop();
    inner.poll(cx);

    const outer = fromGenerator(function* () {
      inner.abandon();
      return currentContext();
    }());

    expect(outer.poll(cx)).toEqual(ready(cx));
    expect(log).toEqual(["no context"]);
    expect(inner.state).toBe("abandoned");
  });

  test("calls the coroutine's abandon hook", () => {
    let abandoned = 0;
    const task = fromCoroutine<never>({
      resume: () => SUSPENDED,
      abandon: () => abandoned++,
    });

    task.abandon();
    task.abandon();

    expect(abandoned).toBe(1);
    expect(task.pinned).toBe(false);
  });

  test("does nothing once completed", () => {
    const task = fromCoroutine(new Countdown(0));
    task.poll(PollContext.noop());
    task.abandon();
    expect(task.state).toBe("completed");
  });

  test("is refused from the coroutine's own resume", () => {
    let self: FutureAdapter<void> | undefined;
    const task = fromGenerator(function* () {
      self?.abandon();
    }());
    self = task;

    expect(() => task.poll(PollContext.noop())).toThrow(
      new InvalidPollError("Future can't be abandoned from its own resume"),
    );
  });

  test("leaves the slot untouched", () => {
    const c0 = PollContext.noop();
    const task = fromGenerator(function* () {
      yield;
    }());

    setTaskContext(c0, () => {
      task.poll(PollContext.noop());
      task.abandon();
      expect(currentContext()).toBe(c0);
    });
  });
});

import { EqualityTestError, ObserverNotFoundError } from "./errors";
import { Observable } from "./observable";
import { createRecorder } from "./setupTests";

test("get and set", () => {
  const o = new Observable(1);
  expect(o.get()).toBe(1);
  o.set(2);
  expect(o.get()).toBe(2);
});

test("observers are only called when the value changes", () => {
  const { record, read } = createRecorder();
  const o = new Observable(1);
  o.observe(record("o"));
  o.set(3);
  expect(read()).toEqual(["o: 3"]);
  o.set(3);
  expect(read()).toEqual([]);
  o.set(4);
  expect(read()).toEqual(["o: 4"]);
});

test("values are compared structurally", () => {
  const callback = jest.fn();
  const o = new Observable<number[]>([1, 2]);
  o.observe(callback);
  o.set([1, 2]);
  expect(callback).not.toHaveBeenCalled();
  o.set([1, 3]);
  expect(callback.mock.calls).toEqual([[[1, 3]]]);
});

test("zero and negative zero are equal", () => {
  const callback = jest.fn();
  const o = new Observable(0);
  o.observe(callback);
  o.set(-0);
  expect(callback).not.toHaveBeenCalled();
  expect(Object.is(o.get(), 0)).toBe(true);
});

test("observers are called in subscription order", () => {
  const { record, read } = createRecorder();
  const o = new Observable("a");
  o.observe(record("first"));
  o.observe(record("second"));
  o.observeFirst(record("zeroth"));
  o.set("b");
  expect(read()).toEqual(['zeroth: "b"', 'first: "b"', 'second: "b"']);
});

test("the same callback can be subscribed twice", () => {
  const callback = jest.fn();
  const o = new Observable(0);
  o.observe(callback);
  o.observe(callback);
  o.set(1);
  expect(callback).toHaveBeenCalledTimes(2);
  o.unobserve(callback);
  o.set(2);
  expect(callback).toHaveBeenCalledTimes(3);
});

test("notify", () => {
  const callback = jest.fn();
  const o = new Observable(4);
  o.observe(callback);
  o.notify();
  expect(callback.mock.calls).toEqual([[4]]);
});

test("unobserve", () => {
  const callback = jest.fn();
  const o = new Observable(4);
  o.observe(callback);
  o.unobserve(callback);
  o.set(5);
  expect(callback).not.toHaveBeenCalled();
  expect(o.get()).toBe(5);
  expect(() => o.unobserve(callback)).toThrow(ObserverNotFoundError);
});

test("observers subscribed during notification are called from the next one", () => {
  const { record, read } = createRecorder();
  const o = new Observable(0);
  const late = record("late");
  o.observe((value) => {
    record("early")(value);
    if (value === 1) {
      o.observe(late);
    }
  });
  o.set(1);
  expect(read()).toEqual(["early: 1"]);
  o.set(2);
  expect(read()).toEqual(["early: 2", "late: 2"]);
});

test("observers can write to the observable they are notified by", () => {
  const { record, read } = createRecorder();
  const o = new Observable(0);
  o.observe((value) => {
    if (value > 10) {
      o.set(10);
    }
  });
  o.observe(record("o"));
  o.set(15);
  expect(o.get()).toBe(10);
  // The nested write notifies first, then the outer notification carries on
  // with the current value.
  expect(read()).toEqual(["o: 10", "o: 10"]);
});

test("an error in the equality test leaves the value unchanged", () => {
  class Picky extends Observable<number> {
    protected override equals(a: number, b: number): boolean {
      if (b < 0) {
        throw new RangeError("negative");
      }
      return a === b;
    }
  }
  const callback = jest.fn();
  const o = new Picky(1);
  o.observe(callback);
  let error: unknown;
  try {
    o.set(-1);
  } catch (caught) {
    error = caught;
  }
  expect(error).toBeInstanceOf(EqualityTestError);
  if (!(error instanceof EqualityTestError)) {
    return;
  }
  expect(error.message).toBe("Equality test error in class Picky: (1), (-1)");
  expect(error.current).toBe(1);
  expect(error.next).toBe(-1);
  expect(error.cause).toBeInstanceOf(RangeError);
  expect(o.get()).toBe(1);
  expect(callback).not.toHaveBeenCalled();
});

test("an error in an observer propagates to the writer", () => {
  const o = new Observable(0);
  const after = jest.fn();
  o.observe(() => {
    throw new Error("observer failed");
  });
  o.observe(after);
  expect(() => o.set(1)).toThrow("observer failed");
  expect(o.get()).toBe(1);
  expect(after).not.toHaveBeenCalled();
});

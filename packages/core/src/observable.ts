import { isDeepStrictEqual } from "node:util";
import { EqualityTestError, ObserverNotFoundError } from "./errors";

export type Observer<Value> = (value: Value) => void;

/**
 * A value that notifies its observers when it changes. Whether a write is a
 * change is decided by `equals`, which subclasses override to pick a
 * comparison strategy.
 */
export class Observable<Value> {
  private readonly observers: Observer<Value>[] = [];
  private value: Value;

  constructor(initialValue: Value) {
    this.value = initialValue;
  }

  /**
   * Structural equality, except that `0` and `-0` are equal.
   */
  protected equals(a: Value, b: Value): boolean {
    return a === b || isDeepStrictEqual(a, b);
  }

  observe(callback: Observer<Value>): void {
    this.observers.push(callback);
  }

  /**
   * Like `observe`, but the callback will be called before every other
   * observer.
   */
  observeFirst(callback: Observer<Value>): void {
    this.observers.unshift(callback);
  }

  unobserve(callback: Observer<Value>): void {
    const index = this.observers.indexOf(callback);
    if (index === -1) {
      throw new ObserverNotFoundError(callback);
    }
    this.observers.splice(index, 1);
  }

  get(): Value {
    return this.value;
  }

  set(value: Value): void {
    let changed: boolean;
    try {
      changed = !this.equals(this.value, value);
    } catch (error) {
      throw new EqualityTestError(
        this.constructor.name,
        this.value,
        value,
        error
      );
    }
    if (changed) {
      this.value = value;
      this.notify();
    }
  }

  /**
   * Calls every observer with the current value, whether or not it has
   * changed. Observers subscribed or unsubscribed by a callback take effect
   * from the next notification.
   */
  notify(): void {
    const observers = this.observers.slice();
    for (const observer of observers) {
      observer(this.value);
    }
  }
}

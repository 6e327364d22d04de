import { Observable, Observer } from "./observable";

/**
 * The read side of a `Variable`: what `track` needs from its source.
 */
export interface Source<Value> {
  readonly blocked: Observable<boolean>;
  get(): Value;
  observe(callback: Observer<Value>): void;
  unobserve(callback: Observer<Value>): void;
}

/**
 * An `Observable` whose updates can be suppressed by blocking it. While
 * blocked, writes go to a pending value that is read back by `get`, and
 * observers are not notified until the variable is unblocked.
 *
 * Blocking is what makes diamond-shaped flows (v1 -> (v2, v3) -> v4) settle
 * without observers seeing intermediate values.
 */
export class Variable<Value> extends Observable<Value> {
  readonly blocked = new Observable(false);
  private pendingValue: Value;

  /**
   * Subscribed to a source in `track`. Kept as fields so that `untrack` can
   * pass the same references to `unobserve`.
   */
  private readonly followValue = (value: Value) => {
    this.set(value);
  };
  private readonly followBlocked = (blocked: boolean) => {
    this.setBlocked(blocked);
  };

  constructor(initialValue: Value) {
    super(initialValue);
    this.pendingValue = initialValue;
  }

  block(): void {
    if (!this.blocked.get()) {
      this.pendingValue = this.get();
      this.blocked.set(true);
    }
  }

  /**
   * Flushes the pending value, which notifies value observers, and only then
   * notifies observers of the blocked flag.
   */
  unblock(): void {
    if (this.blocked.get()) {
      super.set(this.pendingValue);
      this.blocked.set(false);
    }
  }

  setBlocked(blocked: boolean): void {
    if (blocked) {
      this.block();
    } else {
      this.unblock();
    }
  }

  /**
   * Runs `callback` with the variable blocked, so that observers see at most
   * the last value written, once. The variable is unblocked even if
   * `callback` throws.
   */
  coalesce<T>(callback: () => T): T {
    this.block();
    try {
      return callback();
    } finally {
      this.unblock();
    }
  }

  override set(value: Value): void {
    if (this.blocked.get()) {
      this.pendingValue = value;
    } else {
      super.set(value);
    }
  }

  override get(): Value {
    return this.blocked.get() ? this.pendingValue : super.get();
  }

  /**
   * Makes this variable follow the value and the blocked flag of `source`,
   * and pulls the current value right away. The current blocked state of
   * `source` is not pulled: only its later transitions are followed.
   */
  track(source: Source<Value>): void {
    source.blocked.observe(this.followBlocked);
    source.observe(this.followValue);
    this.set(source.get());
  }

  /**
   * Stops following `source` and clears the blocked flag without flushing
   * the pending value.
   */
  untrack(source: Source<Value>): void {
    source.blocked.unobserve(this.followBlocked);
    source.unobserve(this.followValue);
    this.blocked.set(false);
  }
}

/**
 * Notifies only when a different object (or a different primitive per
 * `Object.is`) is written.
 */
export class IdentityVariable<Value> extends Variable<Value> {
  protected override equals(a: Value, b: Value): boolean {
    return Object.is(a, b);
  }
}

/**
 * Notifies on every write, even of an equal value. Linking two of these
 * never settles.
 */
export class AlwaysUpdateVariable<Value> extends Variable<Value> {
  protected override equals(): boolean {
    return false;
  }
}

import { label, noopLog } from "@1log/core";
import { Observable, Observer } from "./observable";
import { Variable } from "./variable";

type Log = typeof noopLog;

/**
 * Pretty-prints changes as they propagate through a flow graph. Each message
 * is prefixed with one "-" per level of nesting: a change logged while
 * another watched change is still being propagated is one level deeper.
 *
 * The depth belongs to the tracer, so separate tracers do not interfere.
 */
export interface Tracer {
  readonly depth: number;
  /**
   * Returns an observer that logs the value it receives under `name`.
   */
  pp: <Value>(name: string) => Observer<Value>;
  /**
   * Logs every notification of the value and of the blocked flag of
   * `variable`. Changes made by its observers while it notifies are logged
   * one level deeper. The blocked flag is logged together with the current
   * value.
   */
  watch: <Value>(variable: Variable<Value>, name: string) => void;
}

export const createTracer = (log: Log = noopLog): Tracer => {
  let depth = 0;

  const pp =
    <Value>(name: string): Observer<Value> =>
    (value) => {
      log.add(label("-".repeat(depth) + name))(value);
    };

  const bracket = <Value>(
    observable: Observable<Value>,
    logNotification: () => void
  ) => {
    const notify = observable.notify.bind(observable);
    observable.notify = () => {
      logNotification();
      depth++;
      try {
        notify();
      } finally {
        depth--;
      }
    };
  };

  return {
    get depth() {
      return depth;
    },
    pp,
    watch: (variable, name) => {
      bracket(variable, () => {
        pp(`${name} value`)(variable.get());
      });
      bracket(variable.blocked, () => {
        pp(`${name} blocked`)({
          blocked: variable.blocked.get(),
          value: variable.get(),
        });
      });
    },
  };
};

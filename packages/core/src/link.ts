import { Variable } from "./variable";

/**
 * Creates a bidirectional link: each variable tracks the other, so they hold
 * the same value and are blocked as a group. At link time `v2` takes the value
 * of `v1`. When both diverge while blocked, the value of the one that is
 * unblocked first wins.
 *
 * The link is a reference cycle, and stays in place until
 * `unlinkVariables` is called.
 */
export const linkVariables = <Value>(
  v1: Variable<Value>,
  v2: Variable<Value>
) => {
  v2.track(v1);
  v1.track(v2);
};

export const unlinkVariables = <Value>(
  v1: Variable<Value>,
  v2: Variable<Value>
) => {
  v1.untrack(v2);
  v2.untrack(v1);
};

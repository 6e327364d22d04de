import { inspect } from "node:util";

/**
 * Thrown by `Observable.set` when the equality test itself throws. The write
 * is not applied.
 */
export class EqualityTestError extends Error {
  override readonly name = "EqualityTestError";

  constructor(
    className: string,
    readonly current: unknown,
    readonly next: unknown,
    cause: unknown
  ) {
    super(
      `Equality test error in class ${className}: (${inspect(
        current
      )}), (${inspect(next)})`,
      { cause }
    );
  }
}

export class ObserverNotFoundError extends Error {
  override readonly name = "ObserverNotFoundError";

  constructor(readonly callback: Function) {
    super(
      `Callback ${
        callback.name ? `\`${callback.name}\` ` : ""
      }is not observing this value.`
    );
  }
}

/**
 * Thrown while constructing an `Algorithm` whose ports are declared
 * inconsistently.
 */
export class AlgorithmDefinitionError extends Error {
  override readonly name = "AlgorithmDefinitionError";
}

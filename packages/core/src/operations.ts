import { Algorithm, AlgorithmOptions, port } from "./algorithm";
import { Source, Variable } from "./variable";

/**
 * A number, or `null` when the value is absent.
 */
export type Operand = number | null;

export interface BinaryInputs {
  a: Operand;
  b: Operand;
}

export interface BinaryOutputs {
  c: Operand;
}

const binaryPorts = {
  inputs: { a: port<Operand>(null), b: port<Operand>(null) },
  outputs: { c: port<Operand>(null) },
};

/**
 * Sets `c` to the result of applying the operator to `a` and `b`, or to
 * `null` if either of them is absent.
 */
export abstract class BinaryOperation extends Algorithm<
  BinaryInputs,
  BinaryOutputs
> {
  constructor(options?: AlgorithmOptions<BinaryInputs, BinaryOutputs>) {
    super(binaryPorts, options);
  }

  protected abstract apply(a: number, b: number): number;

  update() {
    const a = this.inputs.a.get();
    const b = this.inputs.b.get();
    this.outputs.c.set(a === null || b === null ? null : this.apply(a, b));
  }
}

export class Add extends BinaryOperation {
  protected apply(a: number, b: number) {
    return a + b;
  }
}

export class Subtract extends BinaryOperation {
  protected apply(a: number, b: number) {
    return a - b;
  }
}

export class Multiply extends BinaryOperation {
  protected apply(a: number, b: number) {
    return a * b;
  }
}

/**
 * Division by zero gives `Infinity`, `-Infinity` or `NaN`.
 */
export class Divide extends BinaryOperation {
  protected apply(a: number, b: number) {
    return a / b;
  }
}

export type OperandSource = Operand | Source<Operand>;

const connect = (input: Variable<Operand>, operand: OperandSource) => {
  if (typeof operand === "number" || operand === null) {
    input.set(operand);
  } else {
    input.track(operand);
  }
};

/**
 * Creates an instance of `Operation` whose inputs are set to the literal
 * operands and track the variable ones, and returns its output.
 *
 * ```ts
 * const v1 = new Variable(3);
 * const v2 = variableOperation(Subtract, v1, 1);
 * v2.get(); // 2
 * v1.set(0);
 * v2.get(); // -1
 * ```
 */
export const variableOperation = (
  Operation: new () => BinaryOperation,
  a: OperandSource,
  b: OperandSource
): Variable<Operand> => {
  const operation = new Operation();
  connect(operation.inputs.a, a);
  connect(operation.inputs.b, b);
  return operation.outputs.c;
};

export const add = (a: OperandSource, b: OperandSource) =>
  variableOperation(Add, a, b);

export const subtract = (a: OperandSource, b: OperandSource) =>
  variableOperation(Subtract, a, b);

export const multiply = (a: OperandSource, b: OperandSource) =>
  variableOperation(Multiply, a, b);

export const divide = (a: OperandSource, b: OperandSource) =>
  variableOperation(Divide, a, b);

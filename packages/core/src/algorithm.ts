import { AlgorithmDefinitionError } from "./errors";
import { Observable } from "./observable";
import { Variable } from "./variable";

export interface VariableClass {
  new <Value>(initialValue: Value): Variable<Value>;
}

/**
 * Declares one input or output of an algorithm: the value it starts with
 * when the caller does not seed it, and the class of variable to create.
 */
export interface Port<Value> {
  readonly initialValue: Value;
  readonly kind: VariableClass;
}

export const port = <Value>(
  initialValue: Value,
  kind: VariableClass = Variable
): Port<Value> => ({ initialValue, kind });

export type Ports<Values> = {
  readonly [Name in keyof Values]: Port<Values[Name]>;
};

export type Variables<Values> = {
  readonly [Name in keyof Values]: Variable<Values[Name]>;
};

/**
 * A seed is either a value, which becomes the initial value of a fresh
 * variable, or a variable to use as is. An `undefined` seed is ignored.
 */
export type Seeds<Values> = {
  readonly [Name in keyof Values]?: Values[Name] | Variable<Values[Name]>;
};

export interface AlgorithmPorts<Inputs, Outputs> {
  readonly inputs: Ports<Inputs>;
  readonly outputs: Ports<Outputs>;
}

export interface AlgorithmOptions<Inputs, Outputs> {
  readonly enabled?: boolean;
  readonly inputs?: Seeds<Inputs>;
  readonly outputs?: Seeds<Outputs>;
}

/**
 * What the algorithm wiring needs from a variable, whatever its value type.
 */
export interface Gate {
  readonly blocked: Observable<boolean>;
  get(): unknown;
  observe(callback: () => void): void;
  setBlocked(blocked: boolean): void;
}

const isPlainObject = (value: unknown): value is object =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const assertPorts = (
  direction: "input" | "output",
  ports: unknown,
  seeds: unknown
) => {
  if (!isPlainObject(ports)) {
    throw new AlgorithmDefinitionError(
      `The ${direction}s of an algorithm must be declared as an object of ports.`
    );
  }
  for (const [name, declared] of Object.entries(ports)) {
    if (
      !isPlainObject(declared) ||
      !("initialValue" in declared) ||
      !("kind" in declared) ||
      typeof declared.kind !== "function"
    ) {
      throw new AlgorithmDefinitionError(
        `The ${direction} \`${name}\` must be declared with \`port(initialValue)\`.`
      );
    }
  }
  if (seeds !== undefined) {
    if (!isPlainObject(seeds)) {
      throw new AlgorithmDefinitionError(
        `The ${direction} seeds of an algorithm must be an object.`
      );
    }
    for (const name of Object.keys(seeds)) {
      if (!Object.hasOwn(ports, name)) {
        throw new AlgorithmDefinitionError(
          `Cannot seed undeclared ${direction} \`${name}\`.`
        );
      }
    }
  }
};

const createVariable = <Value>(
  port: Port<Value>,
  seed: Value | Variable<Value> | undefined
): Variable<Value> => {
  if (seed instanceof Variable) {
    return seed;
  }
  return new port.kind<Value>(seed === undefined ? port.initialValue : seed);
};

const createVariables = <Values extends object>(
  ports: Ports<Values>,
  seeds: Seeds<Values> = {}
) => {
  const variables = {} as {
    -readonly [Name in keyof Values]: Variable<Values[Name]>;
  };
  const list: Gate[] = [];
  for (const name in ports) {
    const variable = createVariable<Values[typeof name]>(
      ports[name],
      seeds[name]
    );
    variables[name] = variable;
    list.push(variable);
  }
  return { variables, list };
};

/**
 * A container for input and output variables that runs `update` whenever an
 * input changes, as long as the algorithm is enabled and no input is
 * blocked. The outputs are blocked for as long as that is not the case.
 *
 * ```ts
 * class Inverter extends Algorithm<{ input: boolean }, { output: boolean }> {
 *   constructor() {
 *     super({
 *       inputs: { input: port(false) },
 *       outputs: { output: port(false) },
 *     });
 *   }
 *
 *   update() {
 *     this.outputs.output.set(!this.inputs.input.get());
 *   }
 * }
 * ```
 *
 * `update` can run during `super(...)`, before fields declared in the
 * subclass are initialized.
 */
export abstract class Algorithm<
  Inputs extends object,
  Outputs extends object
> {
  readonly enabled: Observable<boolean>;
  readonly outputsBlocked = new Observable(false);
  readonly inputs: Variables<Inputs>;
  readonly outputs: Variables<Outputs>;
  /**
   * Inputs in the order they were declared in.
   */
  readonly inputList: readonly Gate[];
  /**
   * Outputs in the order they were declared in.
   */
  readonly outputList: readonly Gate[];

  readonly checkBlocksAndUpdate = (): void => {
    const blocked =
      !this.enabled.get() ||
      this.inputList.some((input) => input.blocked.get());
    if (!blocked) {
      this.update();
    }
    this.outputsBlocked.set(blocked);
  };

  constructor(
    ports: AlgorithmPorts<Inputs, Outputs>,
    { enabled = true, inputs, outputs }: AlgorithmOptions<Inputs, Outputs> = {}
  ) {
    if (!isPlainObject(ports)) {
      throw new AlgorithmDefinitionError(
        "An algorithm must be given an object with its `inputs` and `outputs`."
      );
    }
    assertPorts("input", ports.inputs, inputs);
    assertPorts("output", ports.outputs, outputs);
    for (const name of Object.keys(ports.inputs)) {
      if (Object.hasOwn(ports.outputs, name)) {
        throw new AlgorithmDefinitionError(
          `\`${name}\` is declared both as an input and as an output.`
        );
      }
    }

    this.enabled = new Observable(enabled);
    this.enabled.observe(this.checkBlocksAndUpdate);

    const createdInputs = createVariables(ports.inputs, inputs);
    this.inputs = createdInputs.variables;
    this.inputList = createdInputs.list;
    for (const input of this.inputList) {
      input.blocked.observe(this.checkBlocksAndUpdate);
      input.observe(this.checkBlocksAndUpdate);
    }

    const createdOutputs = createVariables(ports.outputs, outputs);
    this.outputs = createdOutputs.variables;
    this.outputList = createdOutputs.list;
    for (const output of this.outputList) {
      this.outputsBlocked.observe((blocked) => {
        output.setBlocked(blocked);
      });
    }

    this.checkBlocksAndUpdate();
  }

  /**
   * Computes the outputs from the inputs. Calling it directly runs it even
   * when the algorithm is disabled or blocked.
   */
  abstract update(): void;
}

/**
 * Whether any of the variables holds `null`, the absent value.
 */
export const anyIsAbsent = (variables: readonly Gate[]) =>
  variables.some((variable) => variable.get() === null);

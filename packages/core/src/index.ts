export { Algorithm, anyIsAbsent, port } from "./algorithm";
export type {
  AlgorithmOptions,
  AlgorithmPorts,
  Gate,
  Port,
  Ports,
  Seeds,
  VariableClass,
  Variables,
} from "./algorithm";
export {
  AlgorithmDefinitionError,
  EqualityTestError,
  ObserverNotFoundError,
} from "./errors";
export { createCascadedAdders } from "./examples/cascadedAdders";
export { linkVariables, unlinkVariables } from "./link";
export { Observable } from "./observable";
export type { Observer } from "./observable";
export {
  Add,
  BinaryOperation,
  Divide,
  Multiply,
  Subtract,
  add,
  divide,
  multiply,
  subtract,
  variableOperation,
} from "./operations";
export type {
  BinaryInputs,
  BinaryOutputs,
  Operand,
  OperandSource,
} from "./operations";
export { createTracer } from "./trace";
export type { Tracer } from "./trace";
export { AlwaysUpdateVariable, IdentityVariable, Variable } from "./variable";
export type { Source } from "./variable";

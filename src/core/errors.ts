/**
 * Error taxonomy for graph edits, bindings and snapshots.
 *
 * Every error thrown synchronously by a mutating operation is a
 * GraphError with a discriminating `code`. Action failures are never
 * thrown; see ActionFailure in ../actions/types.ts.
 */

export type GraphErrorCode =
  | "InvalidConfig"
  | "TypeMismatch"
  | "PortOccupied"
  | "CycleDetected"
  | "UnknownNode"
  | "UnknownPort"
  | "UnknownEdge"
  | "LearnInProgress"
  | "NotLearning"
  | "InvalidSnapshot";

export class GraphError extends Error {
  readonly code: GraphErrorCode;

  constructor(code: GraphErrorCode, message: string) {
    super(message);
    this.name = code;
    this.code = code;
  }
}

export function isGraphError(error: unknown, code?: GraphErrorCode): error is GraphError {
  return error instanceof GraphError && (code === undefined || error.code === code);
}

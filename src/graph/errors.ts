/**
 * Graph errors - every failed mutation or lookup reports one of these kinds
 */

export type GraphErrorKind =
  | 'CapacityExceeded'
  | 'DuplicateName'
  | 'InvalidName'
  | 'VertexNotFound'
  | 'InvalidIndex'
  | 'SelfLoop'
  | 'EdgeExists'
  | 'EdgeNotFound';

export class GraphError extends Error {
  readonly kind: GraphErrorKind;

  constructor(kind: GraphErrorKind, message: string) {
    super(message);
    this.name = 'GraphError';
    this.kind = kind;
  }
}

export function isGraphError(error: unknown, kind?: GraphErrorKind): error is GraphError {
  return error instanceof GraphError && (kind === undefined || error.kind === kind);
}

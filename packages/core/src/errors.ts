/**
 * Error Types
 *
 * Every failure raised by fuzzgraph is a FuzzGraphError carrying a `kind`
 * and the offending value. Errors are thrown where the violation happens
 * and never caught inside the library.
 */

/** Reason codes for fuzzgraph failures. */
export type FuzzGraphErrorKind =
  | "type"
  | "not-found"
  | "duplicate"
  | "invalid-edge"
  | "unsupported"
  | "invalid-membership";

/**
 * Base class for all fuzzgraph errors.
 */
export class FuzzGraphError extends Error {
  constructor(
    readonly kind: FuzzGraphErrorKind,
    message: string,
    readonly value?: unknown
  ) {
    super(message);
    this.name = "FuzzGraphError";
  }
}

/**
 * Thrown when a value has the wrong type: a non-edge passed as an edge, an
 * unhashable vertex, a non-graph operand.
 */
export class GraphTypeError extends FuzzGraphError {
  constructor(message: string, value?: unknown) {
    super("type", message, value);
    this.name = "GraphTypeError";
  }
}

/**
 * Thrown when a vertex, edge or index key is absent.
 */
export class NotFoundError extends FuzzGraphError {
  constructor(message: string, value?: unknown) {
    super("not-found", message, value);
    this.name = "NotFoundError";
  }
}

/**
 * Thrown when inserting an edge that already exists.
 */
export class DuplicateError extends FuzzGraphError {
  constructor(message: string, value?: unknown) {
    super("duplicate", message, value);
    this.name = "DuplicateError";
  }
}

/**
 * Thrown when constructing an edge whose tail and head coincide.
 */
export class InvalidEdgeError extends FuzzGraphError {
  constructor(message: string, value?: unknown) {
    super("invalid-edge", message, value);
    this.name = "InvalidEdgeError";
  }
}

/**
 * Thrown when an operation does not apply to the graph's shape.
 */
export class UnsupportedError extends FuzzGraphError {
  constructor(message: string, value?: unknown) {
    super("unsupported", message, value);
    this.name = "UnsupportedError";
  }
}

/**
 * Thrown when a membership degree falls outside [0, 1].
 */
export class InvalidMembershipError extends FuzzGraphError {
  constructor(message: string, value?: unknown) {
    super("invalid-membership", message, value);
    this.name = "InvalidMembershipError";
  }
}

/**
 * Type guard for fuzzgraph errors, optionally of one kind.
 */
export function isFuzzGraphError(
  error: unknown,
  kind?: FuzzGraphErrorKind
): error is FuzzGraphError {
  if (!(error instanceof FuzzGraphError)) return false;
  return kind === undefined || error.kind === kind;
}

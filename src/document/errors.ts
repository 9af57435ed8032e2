/**
 * Errors raised while building or validating the object graph.
 */

/**
 * Base class for object graph violations. These are fatal and not retried.
 */
export class StructuralError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructuralError";
  }
}

/**
 * An object number was used that this document never allocated.
 */
export class UnknownObjectError extends StructuralError {
  constructor(readonly objectNumber: number) {
    super(`Object ${objectNumber} was never allocated`);
    this.name = "UnknownObjectError";
  }
}

/**
 * A reference in the graph points at an object that does not exist
 * (never allocated, or reserved and never filled).
 */
export class IncompleteObjectGraphError extends StructuralError {
  constructor(
    readonly objectNumber: number,
    readonly referencedBy: number | "trailer" | null,
  ) {
    super(
      referencedBy === null
        ? `Object ${objectNumber} was reserved but never given a value`
        : `Object ${objectNumber} referenced by ${referencedBy === "trailer" ? "the trailer" : `object ${referencedBy}`} has no value`,
    );
    this.name = "IncompleteObjectGraphError";
  }
}

/**
 * The document (or one of its pages) is no longer accepting changes.
 */
export class DocumentStateError extends StructuralError {
  constructor(message: string) {
    super(message);
    this.name = "DocumentStateError";
  }
}

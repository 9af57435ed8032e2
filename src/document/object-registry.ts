/**
 * Object table for a document being generated.
 *
 * Owns every indirect object and hands out object numbers. Numbers start at
 * 1 (0 is the head of the free list), increase monotonically and are never
 * reused.
 */

import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { IncompleteObjectGraphError, UnknownObjectError } from "./errors";

/**
 * A reference found while walking the graph, with the object that holds it.
 */
export interface DanglingReference {
  objectNumber: number;
  /** Holder of the reference; null for a reserved slot nothing points at. */
  referencedBy: number | "trailer" | null;
}

export class ObjectRegistry {
  /** Slots by object number; `undefined` marks a reserved, unfilled slot. */
  private objects = new Map<number, PdfObject | undefined>();

  private _nextObjNum = 1;

  /**
   * The number the next allocation will receive.
   */
  get nextObjectNumber(): number {
    return this._nextObjNum;
  }

  /**
   * Highest object number allocated so far (0 when empty).
   */
  get maxObjectNumber(): number {
    return this._nextObjNum - 1;
  }

  get size(): number {
    return this.objects.size;
  }

  /**
   * Add an object, assigning it the next object number.
   */
  allocate(obj: PdfObject): PdfRef {
    const ref = PdfRef.of(this._nextObjNum++, 0);

    this.objects.set(ref.objectNumber, obj);

    return ref;
  }

  /**
   * Allocate a number whose value is supplied later with `update()`.
   *
   * Used for objects that others must point at before they can be built,
   * such as pages (linked from the page tree) or fonts (finalized last).
   */
  reserve(): PdfRef {
    const ref = PdfRef.of(this._nextObjNum++, 0);

    this.objects.set(ref.objectNumber, undefined);

    return ref;
  }

  /**
   * Replace the value of an allocated or reserved object.
   *
   * @throws {UnknownObjectError} if the number was never allocated
   */
  update(ref: PdfRef, obj: PdfObject): void {
    if (!this.objects.has(ref.objectNumber)) {
      throw new UnknownObjectError(ref.objectNumber);
    }

    this.objects.set(ref.objectNumber, obj);
  }

  /**
   * Whether the reference was allocated and has a value.
   */
  has(ref: PdfRef): boolean {
    return this.objects.get(ref.objectNumber) !== undefined;
  }

  /**
   * Get an object by reference, or null if unknown or still reserved.
   */
  getObject(ref: PdfRef): PdfObject | null {
    return this.objects.get(ref.objectNumber) ?? null;
  }

  /**
   * Iterate over filled objects in allocation order.
   */
  *entries(): IterableIterator<[PdfRef, PdfObject]> {
    for (const [objectNumber, obj] of this.objects) {
      if (obj !== undefined) {
        yield [PdfRef.of(objectNumber, 0), obj];
      }
    }
  }

  /**
   * Find every reference that does not resolve to a filled object,
   * including reserved slots nothing points at.
   *
   * @param roots - Extra references held outside the graph (trailer entries)
   */
  findDanglingReferences(roots: PdfRef[] = []): DanglingReference[] {
    const dangling: DanglingReference[] = [];
    const referenced = new Set<number>();

    const check = (ref: PdfRef, referencedBy: number | "trailer") => {
      referenced.add(ref.objectNumber);

      if (!this.has(ref)) {
        dangling.push({ objectNumber: ref.objectNumber, referencedBy });
      }
    };

    for (const root of roots) {
      check(root, "trailer");
    }

    for (const [objectNumber, obj] of this.objects) {
      if (obj !== undefined) {
        visitReferences(obj, ref => check(ref, objectNumber));
      }
    }

    for (const [objectNumber, obj] of this.objects) {
      if (obj === undefined && !referenced.has(objectNumber)) {
        dangling.push({ objectNumber, referencedBy: null });
      }
    }

    return dangling;
  }

  /**
   * Throw for the first dangling reference, if any.
   *
   * @throws {IncompleteObjectGraphError}
   */
  assertComplete(roots: PdfRef[] = []): void {
    const [first] = this.findDanglingReferences(roots);

    if (first) {
      throw new IncompleteObjectGraphError(first.objectNumber, first.referencedBy);
    }
  }
}

/**
 * Call `visit` for every reference nested inside a value.
 * Does not follow references.
 */
export function visitReferences(obj: PdfObject, visit: (ref: PdfRef) => void): void {
  switch (obj.type) {
    case "ref":
      visit(obj);
      break;

    case "array":
      for (const item of obj) {
        visitReferences(item, visit);
      }
      break;

    case "dict":
    case "stream":
      for (const [, value] of obj) {
        visitReferences(value, visit);
      }
      break;

    default:
      break;
  }
}

import { PlyError } from '../ply/errors';
import type { PlyErrorContext } from '../ply/errors';
import type { ElementDef, PropertyDef } from '../ply/types';

/** List counts come from the index type, which may be signed or floating. */
export function checkListLength(
  length: number,
  property: PropertyDef,
  elementDef: ElementDef,
  context: PlyErrorContext
): void {
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new PlyError(
      'MalformedRecord',
      `Invalid list length ${length} for property '${property.name}' of element '${elementDef.name}'`,
      context
    );
  }
}

import type { ElementFactory, PropertyAccess } from '../ply/element';
import { PlyError } from '../ply/errors';
import { byteWidthOf } from '../ply/scalarTypes';
import type { ScalarType } from '../ply/scalarTypes';
import type { ElementDef, PropertyDef } from '../ply/types';
import type { ByteStream } from './byteStream';
import { checkListLength } from './listLength';

export type ByteOrder = 'big' | 'little';

function ensureAvailable(
  stream: ByteStream,
  bytes: number,
  what: string,
  property: PropertyDef,
  elementDef: ElementDef
): void {
  if (stream.remaining < bytes) {
    throw new PlyError(
      'UnexpectedEof',
      `Unexpected end of stream reading ${what} of property '${property.name}' of element '${elementDef.name}': needed ${bytes} bytes at offset ${stream.offset}, ${stream.remaining} left`,
      { element: elementDef.name, property: property.name }
    );
  }
}

function readValue(
  stream: ByteStream,
  type: ScalarType,
  littleEndian: boolean,
  what: string,
  property: PropertyDef,
  elementDef: ElementDef
): number {
  ensureAvailable(stream, byteWidthOf(type), what, property, elementDef);
  return stream.readScalar(type, littleEndian);
}

/**
 * Decodes one packed record. The same loop serves both byte orders; only the
 * DataView flag differs.
 */
export function readBinaryElement<E extends PropertyAccess>(
  stream: ByteStream,
  elementDef: ElementDef,
  createElement: ElementFactory<E>,
  order: ByteOrder
): E {
  const littleEndian = order === 'little';
  const element = createElement(elementDef);

  for (const property of elementDef.properties) {
    const type = property.type;
    switch (type.kind) {
      case 'scalar': {
        const value = readValue(stream, type.type, littleEndian, 'value', property, elementDef);
        element.setScalar(property.name, value, type.type);
        break;
      }
      case 'list': {
        // count in the index type, then the entries back to back
        const length = readValue(
          stream,
          type.indexType,
          littleEndian,
          'list length',
          property,
          elementDef
        );
        checkListLength(length, property, elementDef, {
          element: elementDef.name,
          property: property.name,
        });
        ensureAvailable(
          stream,
          length * byteWidthOf(type.valueType),
          `${length} list entries`,
          property,
          elementDef
        );
        const values = new Array<number>(length);
        for (let i = 0; i < length; i++) {
          values[i] = stream.readScalar(type.valueType, littleEndian);
        }
        element.setList(property.name, values, type.valueType);
        break;
      }
    }
  }

  return element;
}

/**
 * Bytes a record takes at the least: every scalar plus every list's count,
 * with all lists empty.
 */
export function minimumRecordWidth(elementDef: ElementDef): number {
  let width = 0;
  for (const property of elementDef.properties) {
    const type = property.type;
    width += byteWidthOf(type.kind === 'scalar' ? type.type : type.indexType);
  }
  return width;
}

export function readBinaryPayloadForElement<E extends PropertyAccess>(
  stream: ByteStream,
  elementDef: ElementDef,
  createElement: ElementFactory<E>,
  order: ByteOrder
): E[] {
  // a declared count the remaining bytes cannot hold fails before any record is built
  const width = minimumRecordWidth(elementDef);
  if (width * elementDef.count > stream.remaining) {
    throw new PlyError(
      'UnexpectedEof',
      `Element '${elementDef.name}' declares ${elementDef.count} records of at least ${width} bytes, but only ${stream.remaining} bytes are left`,
      { element: elementDef.name }
    );
  }
  const records: E[] = [];
  for (let i = 0; i < elementDef.count; i++) {
    records.push(readBinaryElement(stream, elementDef, createElement, order));
  }
  return records;
}

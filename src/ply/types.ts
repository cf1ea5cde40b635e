import { KeyMap } from './keyMap';
import type { ReadonlyKeyMap } from './keyMap';
import { PlyError } from './errors';
import type { ScalarType } from './scalarTypes';

export type Encoding = 'ascii' | 'binary_big_endian' | 'binary_little_endian';

export const ENCODINGS: readonly Encoding[] = [
  'ascii',
  'binary_big_endian',
  'binary_little_endian',
];

export interface Version {
  major: number;
  minor: number;
}

export type PropertyType =
  | { kind: 'scalar'; type: ScalarType }
  | { kind: 'list'; indexType: ScalarType; valueType: ScalarType };

export interface PropertyDef {
  readonly name: string;
  readonly type: PropertyType;
}

export interface ElementDef {
  readonly name: string;
  readonly count: number;
  readonly properties: ReadonlyKeyMap<PropertyDef>;
}

export interface Header {
  readonly encoding: Encoding;
  readonly version: Version;
  readonly objInfos: readonly string[];
  readonly comments: readonly string[];
  readonly elements: ReadonlyKeyMap<ElementDef>;
}

/** Element name to its records, in header order. */
export type Payload<E> = Map<string, E[]>;

export interface Ply<E> {
  header: Header;
  payload: Payload<E>;
}

export type Line =
  | { kind: 'magicNumber' }
  | { kind: 'format'; encoding: Encoding; version: Version }
  | { kind: 'comment'; text: string }
  | { kind: 'objInfo'; text: string }
  | { kind: 'element'; name: string; count: number }
  | { kind: 'property'; property: PropertyDef }
  | { kind: 'endHeader' };

export function scalar(type: ScalarType): PropertyType {
  return { kind: 'scalar', type };
}

export function list(indexType: ScalarType, valueType: ScalarType): PropertyType {
  return { kind: 'list', indexType, valueType };
}

export function sameFormat(
  a: { encoding: Encoding; version: Version },
  b: { encoding: Encoding; version: Version }
): boolean {
  return (
    a.encoding === b.encoding &&
    a.version.major === b.version.major &&
    a.version.minor === b.version.minor
  );
}

export function describePropertyType(type: PropertyType): string {
  switch (type.kind) {
    case 'scalar':
      return type.type;
    case 'list':
      return `list ${type.indexType} ${type.valueType}`;
  }
}

export function describeLine(line: Line): string {
  switch (line.kind) {
    case 'magicNumber':
      return 'magic number';
    case 'format':
      return `format ${line.encoding} ${line.version.major}.${line.version.minor}`;
    case 'comment':
      return `comment '${line.text}'`;
    case 'objInfo':
      return `obj_info '${line.text}'`;
    case 'element':
      return `element ${line.name} ${line.count}`;
    case 'property':
      return `property ${describePropertyType(line.property.type)} ${line.property.name}`;
    case 'endHeader':
      return 'end_header';
  }
}

/**
 * Builds an element definition outside of header parsing, e.g. for decoding
 * records of a schema that was read separately.
 */
export function createElementDef(
  name: string,
  count: number,
  properties: readonly PropertyDef[] = []
): ElementDef {
  const map = new KeyMap<PropertyDef>();
  for (const property of properties) {
    if (!map.add(property)) {
      throw new PlyError('DuplicateProperty', `Property '${property.name}' defined twice`, {
        element: name,
        property: property.name,
      });
    }
  }
  return { name, count, properties: map };
}

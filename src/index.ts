export { PlyParser, createDefaultParser } from './parsers/plyParser';
export { ByteStream, lineTerminatorOf } from './parsers/byteStream';
export type { LineTerminator } from './parsers/byteStream';
export { LocationTracker } from './parsers/locationTracker';
export { GrammarError, parseLine, parseDataLine } from './parsers/grammar';
export { readHeader } from './parsers/headerReader';
export { readPayload, readPayloadForElement } from './parsers/payloadReader';
export { parseAsciiScalar, readAsciiElement } from './parsers/asciiDecoder';
export { minimumRecordWidth, readBinaryElement } from './parsers/binaryDecoder';
export type { ByteOrder } from './parsers/binaryDecoder';
export { resolveParserOptions } from './parsers/options';
export type { ParserOptions, ResolvedParserOptions } from './parsers/options';

export { DefaultElement, createDefaultElement } from './ply/element';
export type { ElementFactory, PropertyAccess, PropertyValue } from './ply/element';
export { PlyError, isPlyError } from './ply/errors';
export type { PlyErrorContext, PlyErrorKind } from './ply/errors';
export { KeyMap } from './ply/keyMap';
export type { Named, ReadonlyKeyMap } from './ply/keyMap';
export { SCALAR_TYPES, byteWidthOf, scalarTypeFromToken } from './ply/scalarTypes';
export type { ScalarType, ScalarTypeInfo } from './ply/scalarTypes';
export {
  ENCODINGS,
  createElementDef,
  describeLine,
  describePropertyType,
  list,
  sameFormat,
  scalar,
} from './ply/types';
export type {
  ElementDef,
  Encoding,
  Header,
  Line,
  Payload,
  Ply,
  PropertyDef,
  PropertyType,
  Version,
} from './ply/types';

export { createGeometryFromPly } from './geometry/geometryBuilder';
export type { GeometryOptions } from './geometry/geometryBuilder';
export { ColorUtils } from './geometry/colorUtils';

export type ScalarType =
  | 'char'
  | 'uchar'
  | 'short'
  | 'ushort'
  | 'int'
  | 'uint'
  | 'float'
  | 'double';

export interface ScalarTypeInfo {
  token: ScalarType;
  alias: string;
  byteWidth: number;
  integer: boolean;
  min: number;
  max: number;
  read: (view: DataView, offset: number, littleEndian: boolean) => number;
}

/**
 * Per-kind layout shared by the ASCII and binary decoders.
 * Float ranges are left open; out-of-range text parses to +-Infinity.
 */
export const SCALAR_TYPES: Readonly<Record<ScalarType, ScalarTypeInfo>> = {
  char: {
    token: 'char',
    alias: 'int8',
    byteWidth: 1,
    integer: true,
    min: -128,
    max: 127,
    read: (view, offset) => view.getInt8(offset),
  },
  uchar: {
    token: 'uchar',
    alias: 'uint8',
    byteWidth: 1,
    integer: true,
    min: 0,
    max: 255,
    read: (view, offset) => view.getUint8(offset),
  },
  short: {
    token: 'short',
    alias: 'int16',
    byteWidth: 2,
    integer: true,
    min: -32768,
    max: 32767,
    read: (view, offset, le) => view.getInt16(offset, le),
  },
  ushort: {
    token: 'ushort',
    alias: 'uint16',
    byteWidth: 2,
    integer: true,
    min: 0,
    max: 65535,
    read: (view, offset, le) => view.getUint16(offset, le),
  },
  int: {
    token: 'int',
    alias: 'int32',
    byteWidth: 4,
    integer: true,
    min: -2147483648,
    max: 2147483647,
    read: (view, offset, le) => view.getInt32(offset, le),
  },
  uint: {
    token: 'uint',
    alias: 'uint32',
    byteWidth: 4,
    integer: true,
    min: 0,
    max: 4294967295,
    read: (view, offset, le) => view.getUint32(offset, le),
  },
  float: {
    token: 'float',
    alias: 'float32',
    byteWidth: 4,
    integer: false,
    min: -Infinity,
    max: Infinity,
    read: (view, offset, le) => view.getFloat32(offset, le),
  },
  double: {
    token: 'double',
    alias: 'float64',
    byteWidth: 8,
    integer: false,
    min: -Infinity,
    max: Infinity,
    read: (view, offset, le) => view.getFloat64(offset, le),
  },
};

const TOKEN_LOOKUP = new Map<string, ScalarType>();
for (const info of Object.values(SCALAR_TYPES)) {
  TOKEN_LOOKUP.set(info.token, info.token);
  TOKEN_LOOKUP.set(info.alias, info.token);
}

/** Resolves `uchar` as well as `uint8`; undefined for anything else. */
export function scalarTypeFromToken(token: string): ScalarType | undefined {
  return TOKEN_LOOKUP.get(token);
}

export function byteWidthOf(type: ScalarType): number {
  return SCALAR_TYPES[type].byteWidth;
}

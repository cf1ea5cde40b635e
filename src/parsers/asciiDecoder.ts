import type { ElementFactory, PropertyAccess } from '../ply/element';
import { PlyError } from '../ply/errors';
import { SCALAR_TYPES } from '../ply/scalarTypes';
import type { ScalarType } from '../ply/scalarTypes';
import type { ElementDef, PropertyDef } from '../ply/types';
import type { ByteStream } from './byteStream';
import { parseDataLine } from './grammar';
import { checkListLength } from './listLength';

const INTEGER_TOKEN = /^[+-]?[0-9]+$/;
const FLOAT_TOKEN = /^[+-]?([0-9]+(\.[0-9]*)?|\.[0-9]+)([eE][+-]?[0-9]+)?$/;
const SPECIAL_FLOAT_TOKEN = /^([+-]?)(nan|inf|infinity)$/i;

/**
 * Parses one ASCII token as the given scalar kind. Returns undefined for text
 * that is not a number of that kind or lies outside its range.
 */
export function parseAsciiScalar(token: string, type: ScalarType): number | undefined {
  const info = SCALAR_TYPES[type];
  if (info.integer) {
    if (!INTEGER_TOKEN.test(token)) {
      return undefined;
    }
    const value = Number(token);
    if (value < info.min || value > info.max) {
      return undefined;
    }
    return value === 0 ? 0 : value;
  }

  let value: number;
  const special = SPECIAL_FLOAT_TOKEN.exec(token);
  if (special) {
    value = special[2].toLowerCase() === 'nan' ? NaN : Infinity;
    if (special[1] === '-') {
      value = -value;
    }
  } else if (FLOAT_TOKEN.test(token)) {
    value = Number(token);
  } else {
    return undefined;
  }
  return type === 'float' ? Math.fround(value) : value;
}

class TokenCursor {
  private index = 0;

  get left(): number {
    return this.tokens.length - this.index;
  }

  get previous(): string | undefined {
    return this.tokens[this.index - 1];
  }

  constructor(
    private readonly tokens: readonly string[],
    private readonly elementDef: ElementDef,
    private readonly text: string,
    private readonly line: number | undefined
  ) {}

  take(property: PropertyDef, type: ScalarType, what: string): number {
    const token = this.tokens[this.index];
    if (token === undefined) {
      throw new PlyError(
        'MalformedRecord',
        `Missing ${what} for property '${property.name}' of element '${this.elementDef.name}'`,
        this.context(property)
      );
    }
    const value = parseAsciiScalar(token, type);
    if (value === undefined) {
      throw new PlyError(
        'MalformedRecord',
        `Couldn't parse '${token}' as ${type} for property '${property.name}' of element '${this.elementDef.name}'`,
        { ...this.context(property), token }
      );
    }
    this.index++;
    return value;
  }

  context(property: PropertyDef) {
    return {
      line: this.line,
      text: this.text,
      element: this.elementDef.name,
      property: property.name,
    };
  }
}

/**
 * Decodes one record line. Tokens beyond the last declared property are
 * ignored.
 */
export function readAsciiElement<E extends PropertyAccess>(
  text: string,
  elementDef: ElementDef,
  createElement: ElementFactory<E>,
  line?: number
): E {
  const element = createElement(elementDef);
  const cursor = new TokenCursor(parseDataLine(text), elementDef, text, line);

  for (const property of elementDef.properties) {
    const type = property.type;
    switch (type.kind) {
      case 'scalar':
        // one token per scalar
        element.setScalar(property.name, cursor.take(property, type.type, 'value'), type.type);
        break;
      case 'list': {
        // count first, then exactly that many entries
        const length = cursor.take(property, type.indexType, 'list length');
        checkListLength(length, property, elementDef, cursor.context(property));
        if (length > cursor.left) {
          throw new PlyError(
            'MalformedRecord',
            `List length ${length} for property '${property.name}' of element '${elementDef.name}' exceeds the ${cursor.left} values left on the line`,
            { ...cursor.context(property), token: cursor.previous }
          );
        }
        const values = new Array<number>(length);
        for (let i = 0; i < length; i++) {
          values[i] = cursor.take(property, type.valueType, `list entry ${i}`);
        }
        element.setList(property.name, values, type.valueType);
        break;
      }
    }
  }

  return element;
}

export function readAsciiPayloadForElement<E extends PropertyAccess>(
  stream: ByteStream,
  elementDef: ElementDef,
  createElement: ElementFactory<E>
): E[] {
  const records: E[] = [];
  for (let i = 0; i < elementDef.count; i++) {
    // a record is exactly one line
    const line = stream.location.lineIndex;
    const text = stream.readLine();
    if (text === null) {
      throw new PlyError(
        'UnexpectedEof',
        `Stream ended after ${i} of ${elementDef.count} '${elementDef.name}' records`,
        { line, element: elementDef.name }
      );
    }
    records.push(readAsciiElement(text, elementDef, createElement, line));
    stream.location.nextLine();
  }
  return records;
}

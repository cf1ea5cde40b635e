import { ENCODINGS } from '../ply/types';
import type { Encoding, Line, PropertyType, Version } from '../ply/types';
import { scalarTypeFromToken } from '../ply/scalarTypes';
import type { ScalarType } from '../ply/scalarTypes';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const UNSIGNED = /^[0-9]+$/;

export class GrammarError extends Error {
  constructor(message: string, public readonly column: number) {
    super(`${message} (column ${column})`);
    this.name = 'GrammarError';
  }
}

function isBlank(char: string | undefined): boolean {
  return char === ' ' || char === '\t';
}

/** Removes exactly one trailing LF, CR or CRLF. */
export function stripLineBreak(text: string): string {
  if (text.endsWith('\r\n')) {
    return text.slice(0, -2);
  }
  if (text.endsWith('\n') || text.endsWith('\r')) {
    return text.slice(0, -1);
  }
  return text;
}

class LineScanner {
  private index = 0;

  constructor(private readonly source: string) {}

  column(): number {
    return this.index + 1;
  }

  isAtEnd(): boolean {
    return this.index >= this.source.length;
  }

  skipBlanks(): number {
    const start = this.index;
    while (isBlank(this.source[this.index])) {
      this.index++;
    }
    return this.index - start;
  }

  /** At least one space or tab. */
  separator(expected: string): void {
    if (this.skipBlanks() === 0 || this.isAtEnd()) {
      throw new GrammarError(`Expected ${expected}`, this.column());
    }
  }

  word(): string {
    const start = this.index;
    while (!this.isAtEnd() && !isBlank(this.source[this.index])) {
      this.index++;
    }
    return this.source.slice(start, this.index);
  }

  rest(): string {
    const text = this.source.slice(this.index);
    this.index = this.source.length;
    return text;
  }

  finish(): void {
    this.skipBlanks();
    if (!this.isAtEnd()) {
      throw new GrammarError(`Unexpected trailing text '${this.rest()}'`, this.column());
    }
  }
}

function readUnsigned(scanner: LineScanner, what: string): number {
  const column = scanner.column();
  const token = scanner.word();
  const value = Number(token);
  if (!UNSIGNED.test(token) || !Number.isSafeInteger(value)) {
    throw new GrammarError(`Expected non-negative integer ${what}, found '${token}'`, column);
  }
  return value;
}

function readIdentifier(scanner: LineScanner, what: string): string {
  const column = scanner.column();
  const token = scanner.word();
  if (!IDENTIFIER.test(token)) {
    throw new GrammarError(`Expected ${what}, found '${token}'`, column);
  }
  return token;
}

function readScalarType(scanner: LineScanner): ScalarType {
  const column = scanner.column();
  const token = scanner.word();
  const type = scalarTypeFromToken(token);
  if (!type) {
    throw new GrammarError(`Unknown scalar type '${token}'`, column);
  }
  return type;
}

function readEncoding(scanner: LineScanner): Encoding {
  const column = scanner.column();
  const token = scanner.word();
  const encoding = ENCODINGS.find(candidate => candidate === token);
  if (!encoding) {
    throw new GrammarError(`Unknown encoding '${token}'`, column);
  }
  return encoding;
}

function readVersion(scanner: LineScanner): Version {
  const column = scanner.column();
  const token = scanner.word();
  const parts = token.split('.');
  if (parts.length !== 2 || !parts.every(part => UNSIGNED.test(part))) {
    throw new GrammarError(`Expected version <major>.<minor>, found '${token}'`, column);
  }
  return { major: Number(parts[0]), minor: Number(parts[1]) };
}

/** Free text after a keyword; the separating blanks are dropped. */
function readFreeText(scanner: LineScanner, keyword: string): string {
  if (scanner.isAtEnd()) {
    return '';
  }
  if (scanner.skipBlanks() === 0) {
    throw new GrammarError(`Expected blank after '${keyword}'`, scanner.column());
  }
  return scanner.rest();
}

function readProperty(scanner: LineScanner): Line {
  scanner.separator('property type');
  const column = scanner.column();
  const first = scanner.word();
  let type: PropertyType;
  if (first === 'list') {
    scanner.separator('list index type');
    const indexType = readScalarType(scanner);
    scanner.separator('list value type');
    const valueType = readScalarType(scanner);
    type = { kind: 'list', indexType, valueType };
  } else {
    const scalarType = scalarTypeFromToken(first);
    if (!scalarType) {
      throw new GrammarError(`Unknown scalar type '${first}'`, column);
    }
    type = { kind: 'scalar', type: scalarType };
  }
  scanner.separator('property name');
  const name = readIdentifier(scanner, 'property name');
  scanner.finish();
  return { kind: 'property', property: { name, type } };
}

/**
 * Classifies one header line. Trailing blanks and one trailing line break
 * are accepted; any other deviation throws a GrammarError.
 */
export function parseLine(text: string): Line {
  const body = stripLineBreak(text);
  const lineBreak = body.search(/[\r\n]/);
  if (lineBreak !== -1) {
    throw new GrammarError('Unexpected line break', lineBreak + 1);
  }

  const scanner = new LineScanner(body);
  const keyword = scanner.word();

  switch (keyword) {
    case 'ply':
      scanner.finish();
      return { kind: 'magicNumber' };
    case 'format': {
      scanner.separator('encoding');
      const encoding = readEncoding(scanner);
      scanner.separator('version');
      const version = readVersion(scanner);
      scanner.finish();
      return { kind: 'format', encoding, version };
    }
    case 'comment':
      return { kind: 'comment', text: readFreeText(scanner, keyword) };
    case 'obj_info':
      return { kind: 'objInfo', text: readFreeText(scanner, keyword) };
    case 'element': {
      scanner.separator('element name');
      const name = readIdentifier(scanner, 'element name');
      scanner.separator('element count');
      const count = readUnsigned(scanner, 'element count');
      scanner.finish();
      return { kind: 'element', name, count };
    }
    case 'property':
      return readProperty(scanner);
    case 'end_header':
      scanner.finish();
      return { kind: 'endHeader' };
    default:
      throw new GrammarError(`Unknown keyword '${keyword}'`, 1);
  }
}

/** Splits an ASCII record line into its value tokens. */
export function parseDataLine(text: string): string[] {
  return stripLineBreak(text)
    .split(/[ \t]+/)
    .filter(token => token.length > 0);
}

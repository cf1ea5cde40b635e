import { PlyError } from '../ply/errors';
import { KeyMap } from '../ply/keyMap';
import { describeLine, sameFormat } from '../ply/types';
import type { ElementDef, Encoding, Header, Line, PropertyDef, Version } from '../ply/types';
import { lineTerminatorOf } from './byteStream';
import type { ByteStream } from './byteStream';
import { GrammarError, parseLine } from './grammar';

interface ElementDraft {
  name: string;
  count: number;
  properties: KeyMap<PropertyDef>;
}

type ClassifiedLine = { ok: true; line: Line } | { ok: false; error: GrammarError };

function classify(text: string): ClassifiedLine {
  try {
    return { ok: true, line: parseLine(text) };
  } catch (error) {
    if (error instanceof GrammarError) {
      return { ok: false, error };
    }
    throw error;
  }
}

function nextHeaderLine(stream: ByteStream): string {
  const text = stream.readLine();
  if (text === null) {
    throw new PlyError('UnexpectedEof', 'Stream ended before end_header', {
      line: stream.location.lineIndex,
    });
  }
  return text;
}

function describeFormat(format: { encoding: Encoding; version: Version }): string {
  return `Encoding: ${format.encoding}, Version: ${format.version.major}.${format.version.minor}`;
}

/**
 * Reads header lines off the stream until end_header. On return the stream is
 * positioned on the first payload byte and the location on the first payload
 * line.
 */
export function readHeader(stream: ByteStream): Header {
  const location = stream.location;

  // the magic number must come first; an empty stream has none
  location.nextLine();
  const first = stream.readLine();
  if (first === null) {
    throw new PlyError('InvalidHeader', "Expected magic number 'ply', but the stream is empty", {
      line: location.lineIndex,
    });
  }
  const terminator = lineTerminatorOf(first);
  const magic = classify(first);
  if (!magic.ok) {
    throw new PlyError('InvalidHeader', `Expected magic number 'ply': ${magic.error.message}`, {
      line: location.lineIndex,
      text: first,
      cause: magic.error,
    });
  }
  if (magic.line.kind !== 'magicNumber') {
    throw new PlyError(
      'InvalidHeader',
      `Expected magic number 'ply', but saw ${describeLine(magic.line)}`,
      { line: location.lineIndex, text: first }
    );
  }

  let format: { encoding: Encoding; version: Version } | undefined;
  const objInfos: string[] = [];
  const comments: string[] = [];
  const elements = new KeyMap<ElementDraft>();
  let current: ElementDraft | undefined;

  for (;;) {
    location.nextLine();
    const text = nextHeaderLine(stream);
    const classified = classify(text);
    const context = { line: location.lineIndex, text };

    if (!classified.ok) {
      throw new PlyError('InvalidInput', `Couldn't parse line: ${classified.error.message}`, {
        ...context,
        cause: classified.error,
      });
    }

    const line = classified.line;
    if (line.kind === 'endHeader') {
      // with lone-CR lines a following LF is payload, not part of the terminator
      if (terminator === 'cr' && lineTerminatorOf(text) === 'crlf') {
        stream.unreadLineFeed();
      }
      location.nextLine();
      break;
    }

    switch (line.kind) {
      case 'magicNumber':
        throw new PlyError('InvalidHeader', 'Unexpected repeated magic number', context);
      case 'format':
        // repeats are fine as long as they agree
        if (!format) {
          format = { encoding: line.encoding, version: line.version };
        } else if (!sameFormat(format, line)) {
          throw new PlyError(
            'InvalidHeader',
            `Found contradicting format definition:\n\t${describeFormat(line)}\nprevious definition:\n\t${describeFormat(format)}`,
            context
          );
        }
        break;
      case 'objInfo':
        objInfos.push(line.text);
        break;
      case 'comment':
        comments.push(line.text);
        break;
      case 'element': {
        const element: ElementDraft = {
          name: line.name,
          count: line.count,
          properties: new KeyMap<PropertyDef>(),
        };
        if (!elements.add(element)) {
          throw new PlyError('DuplicateElement', `Element '${line.name}' defined twice`, {
            ...context,
            element: line.name,
          });
        }
        current = element;
        break;
      }
      case 'property': {
        const property = line.property;
        // properties belong to the most recent element
        if (!current) {
          throw new PlyError(
            'PropertyBeforeElement',
            `Property '${property.name}' found without preceding element`,
            { ...context, property: property.name }
          );
        }
        if (!current.properties.add(property)) {
          throw new PlyError(
            'DuplicateProperty',
            `Property '${property.name}' defined twice on element '${current.name}'`,
            { ...context, element: current.name, property: property.name }
          );
        }
        break;
      }
    }
  }

  if (!format) {
    throw new PlyError('MissingFormat', 'No format line found', { line: location.lineIndex });
  }

  const frozen = new KeyMap<ElementDef>();
  for (const element of elements) {
    frozen.add(Object.freeze({ ...element }));
  }

  return Object.freeze({
    encoding: format.encoding,
    version: Object.freeze({ ...format.version }),
    objInfos: Object.freeze(objInfos),
    comments: Object.freeze(comments),
    elements: frozen,
  });
}

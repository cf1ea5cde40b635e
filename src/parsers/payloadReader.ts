import type { ElementFactory, PropertyAccess } from '../ply/element';
import type { ElementDef, Encoding, Header, Payload } from '../ply/types';
import { readAsciiPayloadForElement } from './asciiDecoder';
import { readBinaryPayloadForElement } from './binaryDecoder';
import type { ByteStream } from './byteStream';

export function readPayloadForElement<E extends PropertyAccess>(
  stream: ByteStream,
  elementDef: ElementDef,
  encoding: Encoding,
  createElement: ElementFactory<E>
): E[] {
  switch (encoding) {
    case 'ascii':
      return readAsciiPayloadForElement(stream, elementDef, createElement);
    case 'binary_big_endian':
      return readBinaryPayloadForElement(stream, elementDef, createElement, 'big');
    case 'binary_little_endian':
      return readBinaryPayloadForElement(stream, elementDef, createElement, 'little');
  }
}

/** Reads every element of the header in declaration order. */
export function readPayload<E extends PropertyAccess>(
  stream: ByteStream,
  header: Header,
  createElement: ElementFactory<E>,
  log: (message: string) => void
): Payload<E> {
  const payload: Payload<E> = new Map();
  for (const elementDef of header.elements) {
    const startTime = performance.now();
    const records = readPayloadForElement(stream, elementDef, header.encoding, createElement);
    payload.set(elementDef.name, records);
    log(
      `📦 Parser: Read ${records.length} '${elementDef.name}' records in ${(performance.now() - startTime).toFixed(1)}ms`
    );
  }
  return payload;
}

import * as pako from 'pako';
import { createDefaultElement } from '../ply/element';
import type { DefaultElement, ElementFactory, PropertyAccess } from '../ply/element';
import { PlyError } from '../ply/errors';
import type { ElementDef, Encoding, Header, Line, Payload, Ply } from '../ply/types';
import { readAsciiElement } from './asciiDecoder';
import { readBinaryElement } from './binaryDecoder';
import { ByteStream } from './byteStream';
import { GrammarError, parseLine } from './grammar';
import { readHeader } from './headerReader';
import { resolveParserOptions } from './options';
import type { ParserOptions, ResolvedParserOptions } from './options';
import { readPayload, readPayloadForElement } from './payloadReader';

function isGzip(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;
}

/**
 * Reads PLY files into caller-defined records. Holds only configuration, so
 * one instance can serve any number of independent inputs.
 */
export class PlyParser<E extends PropertyAccess> {
  private readonly options: ResolvedParserOptions;

  constructor(
    private readonly createElement: ElementFactory<E>,
    options: ParserOptions = {}
  ) {
    this.options = resolveParserOptions(options);
  }

  parse(data: Uint8Array): Ply<E> {
    const parseStartTime = performance.now();
    const log = this.options.log;
    log(`📋 Parser: Starting PLY parsing (${data.length} bytes)...`);

    const stream = this.openStream(data);
    const header = this.readHeader(stream);
    log(
      `🔤 Parser: Header has ${header.elements.size} elements, ${header.encoding} ${header.version.major}.${header.version.minor}`
    );
    const payload = this.readPayload(stream, header);

    log(`🎯 Parser: Total parse time ${(performance.now() - parseStartTime).toFixed(1)}ms`);
    return { header, payload };
  }

  /** Collects a byte stream (e.g. a Node Readable) and parses it as a whole. */
  async parseStream(source: AsyncIterable<Uint8Array | string>): Promise<Ply<E>> {
    const encoder = new TextEncoder();
    const chunks: Uint8Array[] = [];
    let total = 0;
    try {
      for await (const chunk of source) {
        const bytes = typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
        chunks.push(bytes);
        total += bytes.length;
      }
    } catch (error) {
      throw new PlyError('Io', `Failed to read input: ${errorMessage(error)}`, { cause: error });
    }

    const data = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      data.set(chunk, offset);
      offset += chunk.length;
    }
    return this.parse(data);
  }

  parseHeader(data: Uint8Array): Header {
    return this.readHeader(this.openStream(data));
  }

  /**
   * Wraps raw input in a cursor for the incremental readers, inflating gzip
   * input first when enabled.
   */
  openStream(data: Uint8Array): ByteStream {
    if (!this.options.decompress || !isGzip(data)) {
      return new ByteStream(data);
    }
    const startTime = performance.now();
    let inflated: Uint8Array | undefined;
    try {
      inflated = pako.inflate(data);
    } catch (error) {
      throw new PlyError('Io', `Couldn't inflate gzip input: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    // pako yields no result, rather than an error, for a truncated stream
    if (!inflated) {
      throw new PlyError('Io', "Couldn't inflate gzip input: unexpected end of data");
    }
    this.options.log(
      `🗜️ Parser: Inflated ${data.length} -> ${inflated.length} bytes in ${(performance.now() - startTime).toFixed(1)}ms`
    );
    return new ByteStream(inflated);
  }

  readHeader(stream: ByteStream): Header {
    return readHeader(stream);
  }

  readPayload(stream: ByteStream, header: Header): Payload<E> {
    return readPayload(stream, header, this.createElement, this.options.log);
  }

  readPayloadForElement(stream: ByteStream, elementDef: ElementDef, encoding: Encoding): E[] {
    return readPayloadForElement(stream, elementDef, encoding, this.createElement);
  }

  classifyLine(text: string): Line {
    try {
      return parseLine(text);
    } catch (error) {
      if (error instanceof GrammarError) {
        throw new PlyError('InvalidInput', `Couldn't parse line: ${error.message}`, {
          text,
          cause: error,
        });
      }
      throw error;
    }
  }

  readAsciiElement(line: string, elementDef: ElementDef): E {
    return readAsciiElement(line, elementDef, this.createElement);
  }

  readBigEndianElement(stream: ByteStream, elementDef: ElementDef): E {
    return readBinaryElement(stream, elementDef, this.createElement, 'big');
  }

  readLittleEndianElement(stream: ByteStream, elementDef: ElementDef): E {
    return readBinaryElement(stream, elementDef, this.createElement, 'little');
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createDefaultParser(options: ParserOptions = {}): PlyParser<DefaultElement> {
  return new PlyParser(createDefaultElement, options);
}

import { PlyError } from '../ply/errors';
import { SCALAR_TYPES } from '../ply/scalarTypes';
import type { ScalarType } from '../ply/scalarTypes';
import { LocationTracker } from './locationTracker';

const LF = 10;
const CR = 13;

export type LineTerminator = 'lf' | 'cr' | 'crlf' | 'none';

export function lineTerminatorOf(text: string): LineTerminator {
  if (text.endsWith('\r\n')) {
    return 'crlf';
  }
  if (text.endsWith('\n')) {
    return 'lf';
  }
  return text.endsWith('\r') ? 'cr' : 'none';
}

/**
 * Sequential cursor over a PLY buffer. Header and payload reads share the
 * same position and the same line counter.
 */
export class ByteStream {
  readonly location = new LocationTracker();
  private readonly view: DataView;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });
  private position = 0;

  constructor(private readonly data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.data.length - this.position;
  }

  atEnd(): boolean {
    return this.position >= this.data.length;
  }

  /**
   * Reads up to and including the next LF, CR or CRLF. Returns null only when
   * nothing is left; a last line without terminator is returned as is.
   */
  readLine(): string | null {
    if (this.atEnd()) {
      return null;
    }
    const start = this.position;
    let end = start;
    while (end < this.data.length && this.data[end] !== LF && this.data[end] !== CR) {
      end++;
    }
    if (end < this.data.length) {
      if (this.data[end] === CR && this.data[end + 1] === LF) {
        end++;
      }
      end++;
    }
    let text: string;
    try {
      text = this.decoder.decode(this.data.subarray(start, end));
    } catch (error) {
      throw new PlyError('InvalidInput', `Line is not valid UTF-8 at offset ${start}`, {
        line: this.location.lineIndex,
        cause: error,
      });
    }
    this.position = end;
    return text;
  }

  /**
   * Gives back the LF of a CRLF just read, so that it is read again as data.
   */
  unreadLineFeed(): void {
    const end = this.position;
    if (end >= 2 && this.data[end - 1] === LF && this.data[end - 2] === CR) {
      this.position = end - 1;
    }
  }

  readScalar(type: ScalarType, littleEndian: boolean): number {
    const info = SCALAR_TYPES[type];
    if (this.remaining < info.byteWidth) {
      throw new PlyError(
        'UnexpectedEof',
        `Unexpected end of stream: needed ${info.byteWidth} bytes for ${type} at offset ${this.position}, ${this.remaining} left`
      );
    }
    const value = info.read(this.view, this.position, littleEndian);
    this.position += info.byteWidth;
    return value;
  }
}

import { describe, it, expect } from 'vitest';
import {
  minimumRecordWidth,
  readBinaryElement,
  readBinaryPayloadForElement,
} from '../src/parsers/binaryDecoder';
import { ByteStream } from '../src/parsers/byteStream';
import { createDefaultElement } from '../src/ply/element';
import { createElementDef, list, scalar } from '../src/ply/types';
import { expectPlyError } from './helpers';

describe('Binary record decoding', () => {
  const single = createElementDef('value', 1, [{ name: 'v', type: scalar('int') }]);

  it('should honour the byte order', () => {
    const bytes = new Uint8Array([0x00, 0x00, 0x01, 0x02]);
    const big = readBinaryElement(new ByteStream(bytes), single, createDefaultElement, 'big');
    const little = readBinaryElement(new ByteStream(bytes), single, createDefaultElement, 'little');
    expect(big.getScalar('v')).toBe(258);
    expect(little.getScalar('v')).toBe(33619968);
  });

  it('should decode every scalar kind with its width', () => {
    const all = createElementDef('all', 1, [
      { name: 'c', type: scalar('char') },
      { name: 'uc', type: scalar('uchar') },
      { name: 's', type: scalar('short') },
      { name: 'us', type: scalar('ushort') },
      { name: 'i', type: scalar('int') },
      { name: 'ui', type: scalar('uint') },
      { name: 'f', type: scalar('float') },
      { name: 'd', type: scalar('double') },
    ]);
    const buffer = new ArrayBuffer(1 + 1 + 2 + 2 + 4 + 4 + 4 + 8);
    const view = new DataView(buffer);
    view.setInt8(0, -3);
    view.setUint8(1, 200);
    view.setInt16(2, -1000, true);
    view.setUint16(4, 60000, true);
    view.setInt32(6, -70000, true);
    view.setUint32(10, 3000000000, true);
    view.setFloat32(14, 1.5, true);
    view.setFloat64(18, -2.25, true);

    const stream = new ByteStream(new Uint8Array(buffer));
    const element = readBinaryElement(stream, all, createDefaultElement, 'little');
    expect(element.toObject()).toEqual({
      c: -3,
      uc: 200,
      s: -1000,
      us: 60000,
      i: -70000,
      ui: 3000000000,
      f: 1.5,
      d: -2.25,
    });
    expect(stream.atEnd()).toBe(true);
  });

  it('should read a count-prefixed list in big-endian order', () => {
    const face = createElementDef('face', 1, [{ name: 'vertex_indices', type: list('uchar', 'int') }]);
    const buffer = new ArrayBuffer(1 + 3 * 4);
    const view = new DataView(buffer);
    view.setUint8(0, 3);
    view.setInt32(1, 7, false);
    view.setInt32(5, 8, false);
    view.setInt32(9, 9, false);

    const element = readBinaryElement(
      new ByteStream(new Uint8Array(buffer)),
      face,
      createDefaultElement,
      'big'
    );
    expect(element.getList('vertex_indices')).toEqual([7, 8, 9]);
  });

  it('should use the declared index type width', () => {
    const face = createElementDef('face', 1, [{ name: 'idx', type: list('ushort', 'uchar') }]);
    const bytes = new Uint8Array([0x02, 0x00, 0x05, 0x06]);
    const element = readBinaryElement(new ByteStream(bytes), face, createDefaultElement, 'little');
    expect(element.getList('idx')).toEqual([5, 6]);
  });

  it('should fail on a record cut short', () => {
    const error = expectPlyError(
      () => readBinaryElement(new ByteStream(new Uint8Array([1, 2])), single, createDefaultElement, 'little'),
      'UnexpectedEof'
    );
    expect(error.element).toBe('value');
    expect(error.property).toBe('v');
  });

  it('should fail when list entries run past the end', () => {
    const face = createElementDef('face', 1, [{ name: 'idx', type: list('uchar', 'int') }]);
    const bytes = new Uint8Array([3, 0, 0, 0, 1]);
    expectPlyError(
      () => readBinaryElement(new ByteStream(bytes), face, createDefaultElement, 'little'),
      'UnexpectedEof'
    );
  });

  it('should reject a negative list count', () => {
    const face = createElementDef('face', 1, [{ name: 'idx', type: list('char', 'uchar') }]);
    expectPlyError(
      () =>
        readBinaryElement(new ByteStream(new Uint8Array([0xff, 1])), face, createDefaultElement, 'big'),
      'MalformedRecord'
    );
  });
});

describe('Binary element payload', () => {
  const pair = createElementDef('pair', 2, [
    { name: 'a', type: scalar('ushort') },
    { name: 'b', type: scalar('uchar') },
  ]);

  it('should read exactly the declared number of records', () => {
    const bytes = new Uint8Array([0x01, 0x00, 0x02, 0x03, 0x00, 0x04, 0xaa]);
    const stream = new ByteStream(bytes);
    const records = readBinaryPayloadForElement(stream, pair, createDefaultElement, 'little');
    expect(records.map(record => record.toObject())).toEqual([
      { a: 1, b: 2 },
      { a: 3, b: 4 },
    ]);
    expect(stream.remaining).toBe(1);
  });

  it('should measure the smallest possible record', () => {
    const face = createElementDef('face', 1, [
      { name: 'flag', type: scalar('uchar') },
      { name: 'idx', type: list('ushort', 'int') },
    ]);
    expect(minimumRecordWidth(face)).toBe(3);
  });

  it('should refuse a count the remaining bytes cannot hold before decoding', () => {
    const huge = createElementDef('pair', Number.MAX_SAFE_INTEGER, [
      { name: 'a', type: scalar('ushort') },
      { name: 'b', type: scalar('uchar') },
    ]);
    let created = 0;
    const error = expectPlyError(
      () =>
        readBinaryPayloadForElement(
          new ByteStream(new Uint8Array([0x01, 0x00, 0x02])),
          huge,
          definition => {
            created++;
            return createDefaultElement(definition);
          },
          'little'
        ),
      'UnexpectedEof'
    );
    expect(error.element).toBe('pair');
    expect(created).toBe(0);
  });

  it('should never return a short sequence', () => {
    const bytes = new Uint8Array([0x01, 0x00, 0x02, 0x03]);
    expectPlyError(
      () => readBinaryPayloadForElement(new ByteStream(bytes), pair, createDefaultElement, 'little'),
      'UnexpectedEof'
    );
  });
});

import { describe, it, expect } from 'vitest';
import { GrammarError, parseDataLine, parseLine } from '../src/parsers/grammar';
import { captureError } from './helpers';

describe('Header line grammar', () => {
  it('should accept the magic number with any line ending', () => {
    for (const text of ['ply', 'ply ', 'ply \n', 'ply \r', 'ply \r\n', 'ply\t\n']) {
      expect(parseLine(text)).toEqual({ kind: 'magicNumber' });
    }
  });

  it('should reject near-miss magic numbers', () => {
    for (const text of ['py', 'plyhi', 'hiply', 'PLY', ' ply']) {
      expect(() => parseLine(text)).toThrow(GrammarError);
    }
  });

  it('should parse all three encodings', () => {
    expect(parseLine('format ascii 1.0')).toEqual({
      kind: 'format',
      encoding: 'ascii',
      version: { major: 1, minor: 0 },
    });
    expect(parseLine('format binary_big_endian 2.1')).toEqual({
      kind: 'format',
      encoding: 'binary_big_endian',
      version: { major: 2, minor: 1 },
    });
    expect(parseLine('format binary_little_endian 1.0 \r\n')).toEqual({
      kind: 'format',
      encoding: 'binary_little_endian',
      version: { major: 1, minor: 0 },
    });
  });

  it('should reject bad format lines', () => {
    expect(() => parseLine('format asciii 1.0')).toThrow(GrammarError);
    expect(() => parseLine('format ascii -1.0')).toThrow(GrammarError);
    expect(() => parseLine('format ascii 1')).toThrow(GrammarError);
    expect(() => parseLine('format ascii')).toThrow(GrammarError);
    expect(() => parseLine('format ascii 1.0 extra')).toThrow(GrammarError);
  });

  it('should keep comment text after the separator', () => {
    expect(parseLine('comment hi')).toEqual({ kind: 'comment', text: 'hi' });
    expect(parseLine("comment   hi, I'm a comment!")).toEqual({
      kind: 'comment',
      text: "hi, I'm a comment!",
    });
    expect(parseLine('comment \n')).toEqual({ kind: 'comment', text: '' });
    expect(parseLine('comment')).toEqual({ kind: 'comment', text: '' });
  });

  it('should reject malformed comments', () => {
    expect(() => parseLine('commentt')).toThrow(GrammarError);
    expect(() => parseLine('comment hi\na comment')).toThrow(GrammarError);
    expect(() => parseLine('comment hi\r\na comment')).toThrow(GrammarError);
  });

  it('should parse obj_info lines', () => {
    expect(parseLine('obj_info Hi, I can help.')).toEqual({
      kind: 'objInfo',
      text: 'Hi, I can help.',
    });
  });

  it('should parse element declarations', () => {
    expect(parseLine('element vertex 8 ')).toEqual({ kind: 'element', name: 'vertex', count: 8 });
    expect(() => parseLine('element 8 vertex')).toThrow(GrammarError);
    expect(() => parseLine('element vertex -1')).toThrow(GrammarError);
    expect(() => parseLine('element vertex')).toThrow(GrammarError);
  });

  it('should parse scalar and list properties with both type spellings', () => {
    expect(parseLine('property char c')).toEqual({
      kind: 'property',
      property: { name: 'c', type: { kind: 'scalar', type: 'char' } },
    });
    expect(parseLine('property float32 x')).toEqual({
      kind: 'property',
      property: { name: 'x', type: { kind: 'scalar', type: 'float' } },
    });
    expect(parseLine('property list uchar int vertex_index ')).toEqual({
      kind: 'property',
      property: {
        name: 'vertex_index',
        type: { kind: 'list', indexType: 'uchar', valueType: 'int' },
      },
    });
    expect(parseLine('property list uint8 int32 vertex_indices')).toEqual({
      kind: 'property',
      property: {
        name: 'vertex_indices',
        type: { kind: 'list', indexType: 'uchar', valueType: 'int' },
      },
    });
  });

  it('should reject unknown property types', () => {
    expect(() => parseLine('property real x')).toThrow(GrammarError);
    expect(() => parseLine('property list uchar x')).toThrow(GrammarError);
    expect(() => parseLine('property Float x')).toThrow(GrammarError);
  });

  it('should parse end_header', () => {
    expect(parseLine('end_header\r\n')).toEqual({ kind: 'endHeader' });
  });

  it('should report the column of the offending token', () => {
    const error = captureError(() => parseLine('format ascii x.y'));
    expect(error).toBeInstanceOf(GrammarError);
    expect(error instanceof GrammarError && error.column).toBe(14);
  });

  it('should split data lines on blanks', () => {
    expect(parseDataLine('-7 +5.21 \r\n')).toEqual(['-7', '+5.21']);
    expect(parseDataLine('\t1\t2  3\n')).toEqual(['1', '2', '3']);
    expect(parseDataLine('\n')).toEqual([]);
  });
});

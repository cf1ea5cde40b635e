import { expect } from 'vitest';
import { PlyError, isPlyError } from '../src/ply/errors';
import type { PlyErrorKind } from '../src/ply/errors';

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

export function expectPlyError(fn: () => unknown, kind: PlyErrorKind): PlyError {
  const error = captureError(fn);
  expect(error).toBeInstanceOf(PlyError);
  if (!isPlyError(error)) {
    throw error;
  }
  expect(error.kind).toBe(kind);
  expect(isPlyError(error, kind)).toBe(true);
  return error;
}

export function encode(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/** Header text followed by raw payload bytes. */
export function withPayload(header: string, payload: Uint8Array): Uint8Array {
  const headerBytes = encode(header);
  const data = new Uint8Array(headerBytes.length + payload.length);
  data.set(headerBytes, 0);
  data.set(payload, headerBytes.length);
  return data;
}

import * as THREE from 'three';
import type { DefaultElement } from '../ply/element';
import { SCALAR_TYPES } from '../ply/scalarTypes';
import type { ElementDef, Ply } from '../ply/types';
import { ColorUtils } from './colorUtils';

export interface GeometryOptions {
  /** Byte colors go through the sRGB to linear table; otherwise divided by 255. */
  convertSrgbToLinear?: boolean;
  vertexElement?: string;
  faceElement?: string;
}

const FACE_INDEX_PROPERTIES = ['vertex_indices', 'vertex_index'];

function hasAll(elementDef: ElementDef, names: string[]): boolean {
  return names.every(name => elementDef.properties.has(name));
}

function isByteColor(elementDef: ElementDef): boolean {
  const red = elementDef.properties.get('red');
  return red !== undefined && red.type.kind === 'scalar' && SCALAR_TYPES[red.type.type].integer;
}

function fanTriangulate(faces: readonly DefaultElement[], propertyName: string): Uint32Array {
  let indexCount = 0;
  for (const face of faces) {
    const indices = face.getList(propertyName);
    if (indices && indices.length >= 3) {
      indexCount += (indices.length - 2) * 3;
    }
  }

  const result = new Uint32Array(indexCount);
  let offset = 0;
  for (const face of faces) {
    const indices = face.getList(propertyName);
    if (!indices || indices.length < 3) {
      continue;
    }
    const first = indices[0];
    for (let i = 1; i < indices.length - 1; i++) {
      result[offset++] = first;
      result[offset++] = indices[i];
      result[offset++] = indices[i + 1];
    }
  }
  return result;
}

/**
 * Converts decoded vertex and face records into a three.js geometry with
 * position, optional color and normal attributes, and a triangle index.
 */
export function createGeometryFromPly(
  ply: Ply<DefaultElement>,
  options: GeometryOptions = {}
): THREE.BufferGeometry {
  const convertSrgbToLinear = options.convertSrgbToLinear ?? true;
  const vertexName = options.vertexElement ?? 'vertex';
  const faceName = options.faceElement ?? 'face';
  const geometry = new THREE.BufferGeometry();

  const vertexDef = ply.header.elements.get(vertexName);
  const vertices = ply.payload.get(vertexName);
  if (!vertexDef || !vertices) {
    return geometry;
  }

  const vertexCount = vertices.length;
  const positions = new Float32Array(vertexCount * 3);
  const colors = hasAll(vertexDef, ['red', 'green', 'blue'])
    ? new Float32Array(vertexCount * 3)
    : null;
  const normals = hasAll(vertexDef, ['nx', 'ny', 'nz']) ? new Float32Array(vertexCount * 3) : null;
  const byteColors = isByteColor(vertexDef);
  const toColor = byteColors
    ? convertSrgbToLinear
      ? ColorUtils.byteToLinear
      : ColorUtils.byteToSrgb
    : (value: number) => value;

  for (let i = 0, i3 = 0; i < vertexCount; i++, i3 += 3) {
    const vertex = vertices[i];
    positions[i3] = vertex.getScalar('x') ?? 0;
    positions[i3 + 1] = vertex.getScalar('y') ?? 0;
    positions[i3 + 2] = vertex.getScalar('z') ?? 0;

    if (colors) {
      colors[i3] = toColor(vertex.getScalar('red') ?? 0);
      colors[i3 + 1] = toColor(vertex.getScalar('green') ?? 0);
      colors[i3 + 2] = toColor(vertex.getScalar('blue') ?? 0);
    }

    if (normals) {
      normals[i3] = vertex.getScalar('nx') ?? 0;
      normals[i3 + 1] = vertex.getScalar('ny') ?? 0;
      normals[i3 + 2] = vertex.getScalar('nz') ?? 0;
    }
  }

  geometry.setAttribute('position', new THREE.BufferAttribute(positions, 3));
  if (colors) {
    geometry.setAttribute('color', new THREE.BufferAttribute(colors, 3));
  }
  if (normals) {
    geometry.setAttribute('normal', new THREE.BufferAttribute(normals, 3));
  }

  const faceDef = ply.header.elements.get(faceName);
  const faces = ply.payload.get(faceName);
  const indexProperty = faceDef
    ? FACE_INDEX_PROPERTIES.find(name => faceDef.properties.get(name)?.type.kind === 'list')
    : undefined;
  if (faces && indexProperty) {
    const indices = fanTriangulate(faces, indexProperty);
    if (indices.length > 0) {
      geometry.setIndex(new THREE.BufferAttribute(indices, 1));
      if (!normals) {
        geometry.computeVertexNormals();
      }
    }
  }

  geometry.computeBoundingBox();
  return geometry;
}

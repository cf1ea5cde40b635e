import type { ScalarType } from './scalarTypes';
import type { ElementDef } from './types';

export type PropertyValue = number | number[];

/**
 * Write side of an element representation. The decoders only ever talk to
 * records through this, by property name.
 */
export interface PropertyAccess {
  setScalar(name: string, value: number, type: ScalarType): void;
  setList(name: string, values: number[], type: ScalarType): void;
}

/** Creates one fresh record for the given element. */
export type ElementFactory<E extends PropertyAccess> = (elementDef: ElementDef) => E;

/**
 * Schema-agnostic record: property name to decoded value, in decode order.
 */
export class DefaultElement implements PropertyAccess {
  private readonly values = new Map<string, PropertyValue>();

  setScalar(name: string, value: number): void {
    this.values.set(name, value);
  }

  setList(name: string, values: number[]): void {
    this.values.set(name, values);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): PropertyValue | undefined {
    return this.values.get(name);
  }

  getScalar(name: string): number | undefined {
    const value = this.values.get(name);
    return typeof value === 'number' ? value : undefined;
  }

  getList(name: string): number[] | undefined {
    const value = this.values.get(name);
    return Array.isArray(value) ? value : undefined;
  }

  keys(): IterableIterator<string> {
    return this.values.keys();
  }

  toObject(): Record<string, PropertyValue> {
    return Object.fromEntries(this.values);
  }
}

export const createDefaultElement: ElementFactory<DefaultElement> = () => new DefaultElement();

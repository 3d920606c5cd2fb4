/**
 * Literal-or-computed values.
 *
 * Configuration accepts either a plain value or a function of the component.
 * Construction turns that into a tagged Value so the rest of the engine
 * never inspects runtime types again.
 */

import type { Component, Value, ValueInput } from '../shared/types.js';

export function literal<T>(value: T): Value<T> {
  return { kind: 'literal', value };
}

export function computed<T>(compute: (component: Component) => T): Value<T> {
  return { kind: 'computed', compute };
}

function isCompute<T>(input: ValueInput<T>): input is (component: Component) => T {
  return typeof input === 'function';
}

/** Normalise a configuration value. Absent stays absent. */
export function toValue<T>(input: ValueInput<T> | undefined): Value<T> | undefined {
  if (input === undefined) return undefined;
  return isCompute(input) ? computed(input) : literal(input);
}

/** Resolve a value for a component. Absent values resolve to undefined. */
export function evaluate<T>(value: Value<T> | undefined, component: Component): T | undefined {
  if (!value) return undefined;
  return value.kind === 'computed' ? value.compute(component) : value.value;
}

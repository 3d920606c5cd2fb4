/**
 * Layout Validation
 *
 * Checks a layout tree before anything is registered. The layout usually
 * comes from hand-written host configuration, so every field is checked at
 * runtime even though the types already describe it.
 *
 * Failures throw LazylineConfigError naming the entry, e.g.
 *   "[lazyline] center[0].components[2]: provider must be a string or a function"
 */

import { LazylineConfigError } from '../shared/errors.js';
import {
  SECTIONS,
  type ComponentConfig,
  type GroupConfig,
  type LayoutConfig,
  type LayoutEntry,
} from '../shared/types.js';

const COLOR_FIELDS = ['fg', 'bg', 'sp'] as const;
const FLAG_FIELDS = ['bold', 'italic', 'underline', 'undercurl'] as const;
const CALLBACK_FIELDS = ['onClick', 'onMouseEnter', 'onMouseLeave'] as const;

export function isGroupConfig(entry: LayoutEntry): entry is GroupConfig {
  return 'components' in entry && Array.isArray(entry.components);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return `a ${typeof value}`;
}

function validateInheritable(entry: LayoutEntry, path: string): void {
  function fail(reason: string): never {
    throw new LazylineConfigError(path, reason);
  }

  if (entry.lazy !== undefined && typeof entry.lazy !== 'boolean') {
    fail(`lazy must be a boolean, got ${describe(entry.lazy)}`);
  }
  if (entry.default !== undefined && typeof entry.default !== 'string') {
    fail(`default must be a string, got ${describe(entry.default)}`);
  }
  if (entry.update !== undefined) {
    if (!Array.isArray(entry.update)) {
      fail(`update must be an array of event names, got ${describe(entry.update)}`);
    }
    entry.update.forEach((event, i) => {
      if (typeof event !== 'string' || event.length === 0) {
        fail(`update[${i}] must be a non-empty event name`);
      }
    });
  }

  for (const field of CALLBACK_FIELDS) {
    const value = entry[field];
    if (value !== undefined && typeof value !== 'function') {
      fail(`${field} must be a function, got ${describe(value)}`);
    }
  }
  for (const field of COLOR_FIELDS) {
    const value = entry[field];
    if (value !== undefined && typeof value !== 'string' && typeof value !== 'function') {
      fail(`${field} must be a string or a function, got ${describe(value)}`);
    }
  }
  for (const field of FLAG_FIELDS) {
    const value = entry[field];
    if (value !== undefined && typeof value !== 'boolean' && typeof value !== 'function') {
      fail(`${field} must be a boolean or a function, got ${describe(value)}`);
    }
  }

  const hl = entry.hl;
  if (
    hl !== undefined &&
    typeof hl !== 'string' &&
    typeof hl !== 'function' &&
    (typeof hl !== 'object' || hl === null || Array.isArray(hl))
  ) {
    fail(`hl must be a style name, an attribute table or a function, got ${describe(hl)}`);
  }
}

/**
 * Validate a single component entry. Throws on the first problem.
 */
export function validateComponentConfig(entry: ComponentConfig, path: string): void {
  if (typeof entry !== 'object' || entry === null) {
    throw new LazylineConfigError(path, `expected a component table, got ${describe(entry)}`);
  }
  const provider: unknown = entry.provider;
  if (typeof provider !== 'string' && typeof provider !== 'function') {
    throw new LazylineConfigError(
      path,
      `provider must be a string or a function, got ${describe(provider)}`
    );
  }
  validateInheritable(entry, path);
}

/**
 * Validate an entry and, for groups, every descendant.
 */
export function validateEntry(entry: LayoutEntry, path: string): void {
  if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
    throw new LazylineConfigError(path, `expected a component or group, got ${describe(entry)}`);
  }
  if (!isGroupConfig(entry)) {
    validateComponentConfig(entry, path);
    return;
  }
  validateInheritable(entry, path);
  entry.components.forEach((child, i) => {
    validateEntry(child, `${path}.components[${i}]`);
  });
}

/**
 * Validate the whole layout. Sections may be omitted but not be non-arrays.
 */
export function validateLayout(layout: LayoutConfig): void {
  if (typeof layout !== 'object' || layout === null) {
    throw new LazylineConfigError('layout', `expected a table, got ${describe(layout)}`);
  }
  for (const section of SECTIONS) {
    const entries = layout[section];
    if (entries === undefined) continue;
    if (!Array.isArray(entries)) {
      throw new LazylineConfigError(section, `expected a list, got ${describe(entries)}`);
    }
    entries.forEach((entry, i) => validateEntry(entry, `${section}[${i}]`));
  }
}

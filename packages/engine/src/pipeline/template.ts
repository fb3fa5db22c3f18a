/**
 * Parameter Templates
 *
 * Step params in pipeline definitions may reference context values with
 * `${key}` or `${key.path.to.field}`. Placeholders are rendered at run time
 * against the step's view of the context.
 *
 * @module @pipewright/engine/pipeline/template
 */

import { MissingPreconditionError } from '@pipewright/core';
import type { ContextKey, ContextReader, ContextValue } from '../context/execution-context.js';

const PLACEHOLDER = /\$\{([A-Za-z0-9_.-]+)\}/g;
const SINGLE_PLACEHOLDER = /^\$\{([A-Za-z0-9_.-]+)\}$/;

/**
 * Root context keys referenced by placeholders anywhere in a value
 */
export function placeholderKeys(value: ContextValue): ContextKey[] {
  const keys = new Set<ContextKey>();
  collect(value, keys);
  return [...keys];
}

function collect(value: ContextValue, keys: Set<ContextKey>): void {
  if (typeof value === 'string') {
    for (const match of value.matchAll(PLACEHOLDER)) {
      keys.add(match[1].split('.')[0]);
    }
  } else if (Array.isArray(value)) {
    value.forEach((item) => collect(item, keys));
  } else if (value !== null && typeof value === 'object') {
    Object.values(value).forEach((item) => collect(item, keys));
  }
}

export function hasPlaceholders(value: ContextValue): boolean {
  return placeholderKeys(value).length > 0;
}

/**
 * Resolve `key.path` against the context
 *
 * @throws {MissingPreconditionError} If the root key or any segment is absent
 */
export function resolvePath(path: string, reader: ContextReader): ContextValue {
  const [root, ...segments] = path.split('.');
  let current = reader.get(root);

  for (const segment of segments) {
    let next: ContextValue | undefined;
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      next = current[Number(segment)];
    } else if (current !== null && typeof current === 'object' && !Array.isArray(current)) {
      next = current[segment];
    }
    if (next === undefined) {
      throw new MissingPreconditionError(path);
    }
    current = next;
  }
  return current;
}

/**
 * Render placeholders in a string; non-string values are JSON-encoded
 */
export function renderTemplate(template: string, reader: ContextReader): string {
  return template.replace(PLACEHOLDER, (_match, path: string) => {
    const value = resolvePath(path, reader);
    return typeof value === 'string' ? value : JSON.stringify(value);
  });
}

/**
 * Render placeholders throughout a value. A string that is exactly one
 * placeholder is replaced by the referenced value itself, keeping its type.
 */
export function renderValue(value: ContextValue, reader: ContextReader): ContextValue {
  if (typeof value === 'string') {
    const single = value.match(SINGLE_PLACEHOLDER);
    if (single) {
      return resolvePath(single[1], reader);
    }
    return renderTemplate(value, reader);
  }
  if (Array.isArray(value)) {
    return value.map((item) => renderValue(item, reader));
  }
  if (value !== null && typeof value === 'object') {
    const rendered: Record<string, ContextValue> = {};
    for (const [key, item] of Object.entries(value)) {
      rendered[key] = renderValue(item, reader);
    }
    return rendered;
  }
  return value;
}

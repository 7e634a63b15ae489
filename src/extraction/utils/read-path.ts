/**
 * Key (object) or index (array) step in a path through parsed JSON.
 */
export type PathSegment = string | number;

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Follow `path` through a parsed JSON value.
 *
 * Returns `undefined` as soon as a step does not exist or the value at
 * that point has the wrong shape for the step.
 */
export function readPath(source: unknown, path: readonly PathSegment[]): unknown {
  let current: unknown = source;

  for (const segment of path) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current)) {
        return undefined;
      }
      current = current[segment];
    } else {
      if (!isJsonObject(current)) {
        return undefined;
      }
      current = current[segment];
    }
  }

  return current;
}

/**
 * Render a scalar as CSV cell text. Objects, arrays, `null` and
 * `undefined` render as the empty string. Numbers use their shortest
 * decimal form, so `1.0` in the source renders as `1`.
 */
export function toText(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
      return Number.isFinite(value) ? String(value) : '';
    case 'boolean':
      return value ? 'True' : 'False';
    default:
      return '';
  }
}

export function readText(source: unknown, path: readonly PathSegment[]): string {
  return toText(readPath(source, path));
}

/**
 * First element of a list, or the value itself when it is not a list.
 */
export function firstOf(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

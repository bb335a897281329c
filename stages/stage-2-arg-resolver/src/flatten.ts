/**
 * Context flattening for deep lookup: `{ a: { b: 1 } }` yields `a`, `a.b` and
 * `a_b`. Shallower keys win on collision; arrays and class instances are leaves.
 */

const MAX_DEPTH = 8;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/** Own-property read that ignores inherited keys such as `constructor`. */
export function ownValue(
  source: Readonly<Record<string, unknown>>,
  key: string
): unknown {
  return Object.hasOwn(source, key) ? source[key] : undefined;
}

interface Pending {
  dotted: string;
  underscored: string;
  value: Record<string, unknown>;
  depth: number;
}

export function flattenContext(
  context: Readonly<Record<string, unknown>>
): Record<string, unknown> {
  const flat: Record<string, unknown> = {};
  const seen = new WeakSet<object>();
  const queue: Pending[] = [];

  const put = (key: string, value: unknown) => {
    if (!Object.hasOwn(flat, key)) {
      flat[key] = value;
    }
  };

  for (const [key, value] of Object.entries(context)) {
    put(key, value);
    if (isPlainObject(value)) {
      queue.push({ dotted: key, underscored: key, value, depth: 1 });
    }
  }
  seen.add(context);

  // breadth-first so that shallower paths claim colliding keys first
  while (queue.length > 0) {
    const next = queue.shift();
    if (!next || seen.has(next.value) || next.depth > MAX_DEPTH) {
      continue;
    }
    seen.add(next.value);
    for (const [key, value] of Object.entries(next.value)) {
      const dotted = `${next.dotted}.${key}`;
      const underscored = `${next.underscored}_${key}`;
      put(dotted, value);
      put(underscored, value);
      if (isPlainObject(value)) {
        queue.push({ dotted, underscored, value, depth: next.depth + 1 });
      }
    }
  }

  return flat;
}

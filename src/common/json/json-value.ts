export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Parses text that looks like a JSON object (`{` after trimming). Anything
 * else, including valid JSON of another shape, yields undefined.
 */
export function parseJsonObject(text: unknown): JsonObject | undefined {
  if (typeof text !== 'string' || !text.trim().startsWith('{')) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export function parseJson(text: string): JsonValue | undefined {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Returns the value of the first candidate key present on the object.
 * Candidates are consulted strictly in the given order; a present key wins
 * even when its value is empty.
 */
export function pickFirst(
  obj: JsonObject | undefined,
  candidates: readonly string[],
): JsonValue | undefined {
  if (!obj) return undefined;
  for (const key of candidates) {
    if (Object.prototype.hasOwnProperty.call(obj, key)) {
      return obj[key];
    }
  }
  return undefined;
}

export function pickString(
  obj: JsonObject | undefined,
  candidates: readonly string[],
): string {
  const value = pickFirst(obj, candidates);
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value : String(value);
}

/** First candidate whose value is a non-empty string (or number). */
export function pickNonEmptyString(
  obj: JsonObject | undefined,
  candidates: readonly string[],
): string {
  for (const key of candidates) {
    const value = pickString(obj, [key]);
    if (value) return value;
  }
  return '';
}

/** JSON text, or undefined for values nested too deep to serialize. */
export function tryStringify(value: JsonValue, space?: number): string | undefined {
  try {
    return JSON.stringify(value, null, space);
  } catch {
    return undefined;
  }
}

/** Plain text for regex scanning: strings as-is, everything else as JSON. */
export function toSearchText(value: JsonValue | undefined): string {
  if (value === undefined || value === null || value === '') return '';
  if (typeof value === 'string') return value;
  return tryStringify(value) ?? '';
}

type CopyFrame =
  | { kind: 'array'; source: JsonValue[]; target: JsonValue[] }
  | { kind: 'object'; source: JsonObject; target: JsonObject };

export type CopyJsonOptions = {
  /** Key removed from every mapping, at any depth. */
  dropKey?: string;
  /** Freeze every copied mapping and sequence. */
  freeze?: boolean;
};

/**
 * Deep copy without recursion, so payloads nested beyond the call stack
 * depth are copied like any other.
 */
export function copyJson(value: JsonValue, options: CopyJsonOptions = {}): JsonValue {
  const stack: CopyFrame[] = [];
  const enqueue = (child: JsonValue): JsonValue => {
    if (Array.isArray(child)) {
      const target: JsonValue[] = [];
      stack.push({ kind: 'array', source: child, target });
      return target;
    }
    if (isJsonObject(child)) {
      const target: JsonObject = {};
      stack.push({ kind: 'object', source: child, target });
      return target;
    }
    return child;
  };

  const root = enqueue(value);
  for (let frame = stack.pop(); frame; frame = stack.pop()) {
    if (frame.kind === 'array') {
      for (const item of frame.source) {
        frame.target.push(enqueue(item));
      }
    } else {
      for (const [key, child] of Object.entries(frame.source)) {
        if (key === options.dropKey) continue;
        // defineProperty keeps a parsed "__proto__" key as plain data
        Object.defineProperty(frame.target, key, {
          value: enqueue(child),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
    }
    if (options.freeze) {
      Object.freeze(frame.target);
    }
  }
  return root;
}

export function withoutKey(value: JsonValue, key: string): JsonValue {
  return copyJson(value, { dropKey: key });
}

/** Frozen deep copy; the caller's value stays untouched and mutable. */
export function freezeJson(value: JsonValue): JsonValue {
  return copyJson(value, { freeze: true });
}

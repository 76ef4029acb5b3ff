import {
  isJsonObject,
  JsonObject,
  JsonValue,
  parseJsonObject,
  toSearchText,
  tryStringify,
  withoutKey,
} from '../common/json/json-value';

/** Subtree holding carried-forward session state; never searched for signals. */
export const SESSION_DATA_KEY = 'SessionData';

export const DEFAULT_MAX_DEPTH = 10;

export type FindKeyOptions = {
  maxDepth?: number;
  excludeKeys?: readonly string[];
};

/**
 * Level-first key search. At each mapping every key is compared first
 * (case-insensitive substring); only when none matches does the search
 * descend into the values. Excluded keys are neither compared nor descended
 * into. Sequences descend into each element. The first hit wins.
 */
export function findKey(
  value: JsonValue | undefined,
  keySubstring: string,
  options: FindKeyOptions = {},
): JsonValue | undefined {
  const needle = keySubstring.toLowerCase();
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const excluded = new Set(options.excludeKeys ?? []);

  const visit = (node: JsonValue | undefined, depth: number): JsonValue | undefined => {
    if (node === undefined || depth >= maxDepth) {
      return undefined;
    }

    if (Array.isArray(node)) {
      for (const item of node) {
        const found = visit(item, depth + 1);
        if (found !== undefined) return found;
      }
      return undefined;
    }

    if (!isJsonObject(node)) {
      return undefined;
    }

    const entries = Object.entries(node).filter(([key]) => !excluded.has(key));
    for (const [key, child] of entries) {
      if (key.toLowerCase().includes(needle)) {
        // a null hit ends the search of this mapping
        return child === null ? undefined : child;
      }
    }
    for (const [, child] of entries) {
      const found = visit(child, depth + 1);
      if (found !== undefined) return found;
    }
    return undefined;
  };

  return visit(value, 0);
}

/**
 * Structured payloads are often carried as JSON text; search the parsed
 * object when the text is object-shaped.
 */
export function toSignalView(value: JsonValue | undefined): JsonValue | undefined {
  if (typeof value === 'string') {
    return parseJsonObject(value) ?? value;
  }
  return value;
}

/**
 * Text form of a hit, or undefined when the hit is falsy (including `0`) or
 * an empty collection.
 */
export function toSignalText(value: JsonValue | undefined): string | undefined {
  if (value === undefined || value === null || value === false || value === 0) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value || undefined;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value) ? value.length === 0 : Object.keys(value).length === 0) {
    return undefined;
  }
  return tryStringify(value);
}

export type SignalInput = {
  content: JsonValue | undefined;
  metadata: JsonObject;
};

export type Strategy<T> = (input: PreparedSignalInput) => T | undefined;

export type PreparedSignalInput = {
  content: JsonValue | undefined;
  metadata: JsonObject;
  /** Content and metadata as text, with every SessionData subtree removed. */
  text: string;
};

function prepare(input: SignalInput): PreparedSignalInput {
  const content = toSignalView(input.content);
  const strippedContent =
    content === undefined ? undefined : withoutKey(content, SESSION_DATA_KEY);
  const strippedMetadata = withoutKey(input.metadata, SESSION_DATA_KEY);
  return {
    content,
    metadata: input.metadata,
    text: `${toSearchText(strippedContent)} ${toSearchText(
      Object.keys(input.metadata).length ? strippedMetadata : undefined,
    )}`,
  };
}

function runChain<T>(strategies: readonly Strategy<T>[], input: SignalInput): T | undefined {
  const prepared = prepare(input);
  for (const strategy of strategies) {
    const result = strategy(prepared);
    if (result !== undefined) return result;
  }
  return undefined;
}

const structuralWaitOn =
  (pick: (input: PreparedSignalInput) => JsonValue | undefined): Strategy<string> =>
  (input) =>
    toSignalText(
      findKey(pick(input), 'wait_on', { excludeKeys: [SESSION_DATA_KEY] }),
    );

const regexWaitOn =
  (pattern: RegExp): Strategy<string> =>
  ({ text }) => {
    const match = pattern.exec(text);
    if (!match) return undefined;
    const value = match[1].replace(/^["']+|["']+$/g, '');
    return value || undefined;
  };

export const WAIT_ON_STRATEGIES: readonly Strategy<string>[] = [
  structuralWaitOn((input) => input.content),
  structuralWaitOn((input) => input.metadata),
  regexWaitOn(/"?wait_on"?\s*:\s*"([^"]+)"/i),
  regexWaitOn(/\$[^"]+\.wait_on"\s*:\s*"([^"]+)"/i),
  regexWaitOn(/wait_on[=:]\s*([^\s,}\]]+)/i),
];

/** Awaited event name, or undefined when no non-empty wait_on value exists. */
export function detectWaitOn(input: SignalInput): string | undefined {
  return runChain(WAIT_ON_STRATEGIES, input);
}

/**
 * Outcome of a status-code strategy: the code it found, or `null` when the
 * strategy matched but the code was not an integer.
 */
export type StatusHit = { code: number | null };

function parseStatusCode(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

const structuralStatus: Strategy<StatusHit> = ({ content }) => {
  if (!Array.isArray(content) && !isJsonObject(content)) {
    return undefined;
  }
  const options = { excludeKeys: [SESSION_DATA_KEY] };
  const hit = findKey(content, 'statuscode', options) || findKey(content, 'status_code', options);
  if (typeof hit !== 'number' && typeof hit !== 'string') {
    return undefined;
  }
  const code = parseStatusCode(hit);
  // a structural success code does not stop the textual fallbacks
  return code !== null && code >= 400 ? { code } : undefined;
};

const regexStatus =
  (pattern: RegExp): Strategy<StatusHit> =>
  ({ text }) => {
    const match = pattern.exec(text);
    return match ? { code: parseStatusCode(match[1]) } : undefined;
  };

export const ERROR_STRATEGIES: readonly Strategy<StatusHit>[] = [
  structuralStatus,
  regexStatus(/"?statuscode"?\s*:\s*(\d+)/i),
  regexStatus(/status[_\s]code\s*[:=]\s*(\d+)/i),
  regexStatus(/status[:\s]+([4-5]\d{2})/i),
];

/** HTTP-like error code (>= 400), or undefined when the entry is not an error. */
export function detectError(input: SignalInput): number | undefined {
  const hit = runChain(ERROR_STRATEGIES, input);
  if (!hit || hit.code === null || hit.code < 400) {
    return undefined;
  }
  return hit.code;
}

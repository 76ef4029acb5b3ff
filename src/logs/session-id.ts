import {
  isJsonObject,
  JsonObject,
  parseJsonObject,
  pickString,
} from '../common/json/json-value';
import { UNKNOWN_SESSION } from './log-entry';

/**
 * Session ids embedded in flow-engine payloads, e.g.
 * `1760571668-000000000001105328-SR-000-000000000000DEN130-44144A80`.
 */
export const STRUCTURED_SESSION_ID_PATTERN =
  /\d{10}-\d+-SR-\d+-\d+[A-Z0-9]+-[A-Z0-9]+/;

/**
 * Session ids as they appear in exported text logs. Looser than
 * {@link STRUCTURED_SESSION_ID_PATTERN}: the trailing segments are optional.
 */
export const TEXT_SESSION_ID_PATTERN = /\d{10}-\d+-SR-\d+-[A-Z0-9]+/;

/** Record-level fields that may carry the session id directly. */
export const RECORD_SESSION_ID_KEYS = ['session_id', 'sid', 'SESSION_ID'] as const;

export function extractFlowSessionId(record: JsonObject): string {
  const message = record.message;

  const outer = parseJsonObject(message);
  if (outer && typeof outer.message === 'string' && outer.message) {
    const nested = STRUCTURED_SESSION_ID_PATTERN.exec(outer.message);
    if (nested) return nested[0];
  }

  if (typeof message === 'string') {
    const direct = STRUCTURED_SESSION_ID_PATTERN.exec(message);
    if (direct) return direct[0];
  }

  if (isJsonObject(message)) {
    const fromMessage = pickString(message, ['SESSION_ID']);
    if (fromMessage) return fromMessage;
  }

  return pickString(record, RECORD_SESSION_ID_KEYS) || UNKNOWN_SESSION;
}

/**
 * Finds the session a whole text export belongs to: the id under a
 * `SESSION ID` header (two lines down) or a `FLOW ID:` line (one line down),
 * then quoted `session_id`/`sid`/`SESSION_ID` values, then the bare pattern.
 */
export function detectTextSessionId(text: string): string | undefined {
  const lines = text.trim().split('\n');
  const headerId = (line: string | undefined): string | undefined => {
    const candidate = line?.trim();
    if (!candidate) return undefined;
    const match = TEXT_SESSION_ID_PATTERN.exec(candidate);
    return match && match.index === 0 ? candidate : undefined;
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line.toUpperCase().includes('SESSION ID') && i + 2 < lines.length) {
      const id = headerId(lines[i + 2]);
      if (id) return id;
    }
    if (line.includes('FLOW ID:')) {
      const id = headerId(lines[i + 1]);
      if (id) return id;
    }
  }

  for (const key of RECORD_SESSION_ID_KEYS) {
    const quoted = new RegExp(`"${key}":\\s*"([^"]+)"`).exec(text);
    if (quoted) return quoted[1];
  }

  return TEXT_SESSION_ID_PATTERN.exec(text)?.[0];
}

import {
  isJsonObject,
  JsonObject,
  JsonValue,
  parseJson,
  parseJsonObject,
  pickFirst,
  pickString,
  tryStringify,
} from '../common/json/json-value';
import { SESSION_DATA_KEY } from './signal-detector';

/** Plugin id spellings, highest priority first. */
export const PLUGIN_ID_KEYS = ['PluginId', 'pluginId', 'plugin_id'] as const;
/** Log type spellings inside decoded payloads, highest priority first. */
export const LOG_TYPE_KEYS = ['LogType', 'logType'] as const;
/** Outer payloads fall back to their generic level only without a log type. */
export const OUTER_LOG_TYPE_KEYS = [...LOG_TYPE_KEYS, 'level'] as const;
/** Log type spellings on the raw record itself. */
export const RECORD_LOG_TYPE_KEYS = [...LOG_TYPE_KEYS, 'log_type'] as const;

export const EXTERNAL_CALL_PREFIX = 'EXTCALL_';
export const USER_TURN_LOG_TYPES: readonly string[] = ['IpdOut'];
export const ASSISTANT_TURN_LOG_TYPES: readonly string[] = ['IpdIn', 'PluginTran'];

export type DecodedFlowPayload = {
  content: JsonValue;
  timestamp: string;
  pluginId: string;
  logType: string;
  /** First-level object parsed from the record's message, if any. */
  outer?: JsonObject;
  /** Second-level object parsed from the outer message, if any. */
  inner?: JsonObject;
};

/**
 * Unwraps a flow-engine record whose `message` carries JSON text, possibly
 * with a second JSON document inside its own `message`. Identifiers found in
 * the inner document win over the outer one, which wins over the record.
 * Parse failures leave the raw message as content. A nested `timestamp`
 * replaces the record's whatever its type.
 */
export function decodeFlowPayload(record: JsonObject): DecodedFlowPayload {
  const message: JsonValue = record.message ?? '';
  let timestamp = record.timestamp === undefined ? '' : timestampText(record.timestamp);
  let content: JsonValue = message;
  let pluginId = '';
  let logType = '';

  const outer = parseJsonObject(message);
  let inner: JsonObject | undefined;

  if (outer) {
    const nestedTimestamp = pickFirst(outer, ['timestamp']);
    if (nestedTimestamp !== undefined) {
      // present but not text still overrides; such entries sort as unparseable
      timestamp = timestampText(nestedTimestamp);
    }

    inner = parseJsonObject(outer.message);
    if (inner) {
      pluginId = pickString(inner, PLUGIN_ID_KEYS);
      logType = pickString(inner, LOG_TYPE_KEYS);
    }
    pluginId ||= pickString(outer, PLUGIN_ID_KEYS);
    logType ||= pickString(outer, OUTER_LOG_TYPE_KEYS);

    content =
      outer.message !== undefined ? outer.message : tryStringify(outer, 2) ?? message;
  }

  pluginId ||= pickString(record, PLUGIN_ID_KEYS);
  logType ||= pickString(record, RECORD_LOG_TYPE_KEYS);

  return {
    content,
    timestamp,
    pluginId,
    logType,
    ...(outer ? { outer } : {}),
    ...(inner ? { inner } : {}),
  };
}

function timestampText(value: JsonValue): string {
  if (value === null) return '';
  return typeof value === 'string' ? value : tryStringify(value) ?? '';
}

export type ConversationalExchange = {
  role: 'user' | 'assistant';
  content: string;
};

/**
 * Recognizes a dialogue turn relayed through an external-call plugin: the
 * user's utterance on the outbound event, the model's reply on the inbound
 * or transaction events.
 */
export function detectConversationalExchange(
  payload: Pick<DecodedFlowPayload, 'pluginId' | 'logType' | 'inner'>,
): ConversationalExchange | undefined {
  const { pluginId, logType, inner } = payload;
  if (!pluginId.startsWith(EXTERNAL_CALL_PREFIX) || !inner) {
    return undefined;
  }

  if (USER_TURN_LOG_TYPES.includes(logType)) {
    const ipdMsg = inner.IpdMsg;
    const body = isJsonObject(ipdMsg) ? ipdMsg.body : undefined;
    if (isJsonObject(body) && 'user_message' in body) {
      return { role: 'user', content: exchangeText(body.user_message) };
    }
  }

  if (ASSISTANT_TURN_LOG_TYPES.includes(logType)) {
    let response = exchangeText(inner.ai_response);
    if (!response) {
      const suffix = pluginId.slice(EXTERNAL_CALL_PREFIX.length);
      const sessionData = inner[SESSION_DATA_KEY];
      if (isJsonObject(sessionData)) {
        const key = Object.keys(sessionData).find(
          (k) => k.includes('.ai_response') && k.includes(suffix),
        );
        response = key ? exchangeText(sessionData[key]) : '';
      }
    }
    if (response) {
      return { role: 'assistant', content: response };
    }
  }

  return undefined;
}

function exchangeText(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value : tryStringify(value) ?? '';
}

const LABELED_BASE64_PATTERN = /(?:request|response):\s*([A-Za-z0-9+/=]+)/;
const STRICT_BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export type LabeledBase64Result = {
  /** Decoded JSON text, or the original message when decoding failed. */
  text: string;
  payload?: JsonValue;
};

/**
 * Decodes a base64 body that follows a `request:` or `response:` label.
 * Succeeds only when the token is well-formed base64 of UTF-8 JSON; any
 * other outcome returns the message untouched.
 */
export function decodeLabeledBase64(message: string): LabeledBase64Result {
  if (!message.includes('request:') && !message.includes('response:')) {
    return { text: message };
  }
  const match = LABELED_BASE64_PATTERN.exec(message);
  if (!match || !STRICT_BASE64.test(match[1])) {
    return { text: message };
  }

  let decoded: string;
  try {
    decoded = new TextDecoder('utf-8', { fatal: true }).decode(
      Buffer.from(match[1], 'base64'),
    );
  } catch {
    return { text: message };
  }

  const payload = parseJson(decoded);
  return payload === undefined ? { text: message } : { text: decoded, payload };
}

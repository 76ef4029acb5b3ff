import {
  isJsonObject,
  JsonObject,
  JsonValue,
  pickString,
} from '../../common/json/json-value';
import { createLogEntry, LogEntry } from '../log-entry';
import {
  decodeFlowPayload,
  decodeLabeledBase64,
  detectConversationalExchange,
} from '../payload-decoder';
import { extractFlowSessionId } from '../session-id';
import { SESSION_DATA_KEY } from '../signal-detector';

/**
 * Turns one raw flow-engine record into a timeline entry. Pure and total:
 * anything that cannot be decoded is kept as opaque text.
 */
export function normalizeFlowEngineRecord(record: JsonObject): LogEntry {
  const sessionId = extractFlowSessionId(record);
  const decoded = decodeFlowPayload(record);
  const exchange = detectConversationalExchange(decoded);

  let content: JsonValue = decoded.content;
  let decodedPayload: JsonValue | undefined;
  if (typeof content === 'string') {
    const base64 = decodeLabeledBase64(content);
    content = base64.text;
    decodedPayload = base64.payload;
  }
  if (exchange?.content) {
    content = exchange.content;
  }

  const hasSessionData = Boolean(
    (decoded.inner && SESSION_DATA_KEY in decoded.inner) ||
      (decoded.outer && SESSION_DATA_KEY in decoded.outer),
  );

  const metadata: JsonObject = {
    host: pickString(record, ['host']),
    role: pickString(record, ['role']),
    logFilePath: pickString(record, ['log_file_path']),
    id: pickString(record, ['id']),
    ani: pickString(record, ['ANI']),
    dnis: pickString(record, ['DNIS']),
    pluginId: decoded.pluginId,
    logType: decoded.logType,
    hasSessionData,
    agentType: exchange ? 'gpt' : null,
  };
  if (decodedPayload !== undefined) {
    metadata.decodedPayload = decodedPayload;
  }

  return createLogEntry({
    timestamp: decoded.timestamp,
    source: 'flow-engine',
    sessionId,
    logType: decoded.logType,
    content,
    role: exchange?.role,
    messageType: pickString(record, ['message_type']) || 'unknown',
    metadata,
  });
}

export function normalizeFlowEngineLog(records: readonly JsonValue[]): LogEntry[] {
  return records.map((record) =>
    normalizeFlowEngineRecord(isJsonObject(record) ? record : { message: record }),
  );
}

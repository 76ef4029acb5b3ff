import { freezeJson, JsonObject, JsonValue } from '../common/json/json-value';
import { detectError, detectWaitOn } from './signal-detector';

export type LogSource = 'flow-engine' | 'conversational-agent';

export const UNKNOWN_SESSION = 'unknown';
export const DEFAULT_LOG_TYPE = 'system_log';

export type LogEntryInit = {
  timestamp: string;
  source: LogSource;
  sessionId?: string;
  logType?: string;
  content: JsonValue;
  blockId?: string;
  turnId?: string;
  transactionId?: string;
  role?: string;
  messageType?: string;
  metadata?: JsonObject;
};

/**
 * Canonical unit of the unified timeline. Instances are deeply frozen copies
 * of their inputs: the derived signal fields are computed once by
 * {@link createLogEntry} and always agree with `content` and `metadata`.
 */
export interface LogEntry {
  readonly timestamp: string;
  readonly source: LogSource;
  readonly sessionId: string;
  readonly logType: string;
  readonly content: JsonValue;
  readonly blockId?: string;
  readonly turnId?: string;
  readonly transactionId?: string;
  readonly role?: string;
  readonly messageType?: string;
  readonly metadata: Readonly<JsonObject>;
  readonly hasWaitOn: boolean;
  readonly waitOnValue?: string;
  readonly hasError: boolean;
  readonly errorCode?: number;
}

export function createLogEntry(init: LogEntryInit): LogEntry {
  const content = freezeJson(init.content);
  const metadata: JsonObject = {};
  for (const [key, value] of Object.entries(init.metadata ?? {})) {
    metadata[key] = freezeJson(value);
  }
  Object.freeze(metadata);
  const waitOnValue = detectWaitOn({ content, metadata });
  const errorCode = detectError({ content, metadata });

  const entry: LogEntry = {
    timestamp: init.timestamp,
    source: init.source,
    sessionId: init.sessionId || UNKNOWN_SESSION,
    logType: init.logType || DEFAULT_LOG_TYPE,
    content,
    metadata,
    hasWaitOn: waitOnValue !== undefined,
    hasError: errorCode !== undefined,
    ...(init.blockId !== undefined ? { blockId: init.blockId } : {}),
    ...(init.turnId !== undefined ? { turnId: init.turnId } : {}),
    ...(init.transactionId !== undefined
      ? { transactionId: init.transactionId }
      : {}),
    ...(init.role !== undefined ? { role: init.role } : {}),
    ...(init.messageType !== undefined ? { messageType: init.messageType } : {}),
    ...(waitOnValue !== undefined ? { waitOnValue } : {}),
    ...(errorCode !== undefined ? { errorCode } : {}),
  };
  return Object.freeze(entry);
}

/**
 * JSON-ready view of an entry. Every field is present, with null for the
 * optional ones, so exports keep a stable shape.
 */
export type LogEntryRecord = {
  timestamp: string;
  source: LogSource;
  sessionId: string;
  logType: string;
  content: JsonValue;
  blockId: string | null;
  turnId: string | null;
  transactionId: string | null;
  role: string | null;
  messageType: string | null;
  metadata: JsonObject;
  hasWaitOn: boolean;
  waitOnValue: string | null;
  hasError: boolean;
  errorCode: number | null;
};

export function toLogEntryRecord(entry: LogEntry): LogEntryRecord {
  return {
    timestamp: entry.timestamp,
    source: entry.source,
    sessionId: entry.sessionId,
    logType: entry.logType,
    content: entry.content,
    blockId: entry.blockId ?? null,
    turnId: entry.turnId ?? null,
    transactionId: entry.transactionId ?? null,
    role: entry.role ?? null,
    messageType: entry.messageType ?? null,
    metadata: { ...entry.metadata },
    hasWaitOn: entry.hasWaitOn,
    waitOnValue: entry.waitOnValue ?? null,
    hasError: entry.hasError,
    errorCode: entry.errorCode ?? null,
  };
}

import {
  isJsonObject,
  JsonObject,
  parseJson,
  pickNonEmptyString,
  pickString,
} from '../common/json/json-value';
import { decodeLabeledBase64 } from './payload-decoder';
import { TEXT_SESSION_ID_PATTERN } from './session-id';

export type FlowEngineTextOptions = {
  /** Recognizes the host line that opens every entry. */
  hostPattern?: RegExp;
  /** Upper bound of lines collected for one plain-text entry. */
  maxTextLines?: number;
};

const DEFAULT_HOST_PATTERN = /^[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*\.[A-Za-z]{2,}$/;
const DEFAULT_MAX_TEXT_LINES = 20;

const ANI_PATTERN = /\|Ani:\s*([^|]+)\|/i;
const DNIS_PATTERN = /\|Dnis:\s*([^|]+)\|/i;

function countChar(line: string, ch: string): number {
  return line.split(ch).length - 1;
}

/**
 * Parses the text export of the flow engine's debug log into raw records of
 * the same shape as the JSON export. Each entry is introduced by a host line,
 * a logger path line and an ISO timestamp line, followed either by a
 * brace-balanced JSON block (whose `log` object is the record) or by plain
 * text lines up to the next host line.
 */
export function parseFlowEngineText(
  text: string,
  options: FlowEngineTextOptions = {},
): JsonObject[] {
  const hostPattern = options.hostPattern ?? DEFAULT_HOST_PATTERN;
  const maxTextLines = options.maxTextLines ?? DEFAULT_MAX_TEXT_LINES;
  const records: JsonObject[] = [];
  const lines = text.trim().split('\n');

  // A host-like line only opens an entry when a logger path and an ISO
  // timestamp follow it; otherwise it is ordinary message text.
  const isEntryStart = (at: number): boolean => {
    if (at + 2 >= lines.length || !hostPattern.test(lines[at].trim())) {
      return false;
    }
    const timestamp = lines[at + 2].trim();
    return (
      lines[at + 1].trim() !== '' && timestamp.includes('T') && timestamp.includes('Z')
    );
  };

  let i = 0;
  while (i < lines.length) {
    if (!isEntryStart(i)) {
      i++;
      continue;
    }

    const host = lines[i].trim();
    const loggerPath = lines[i + 1].trim();
    const timestamp = lines[i + 2].trim();

    const start = i + 3;
    if (start >= lines.length) {
      i++;
      continue;
    }
    const id = `${timestamp}_${host}_${i}`;

    if (lines[start].trim().startsWith('{')) {
      let depth = 0;
      let end = start;
      for (; end < lines.length; end++) {
        depth += countChar(lines[end], '{') - countChar(lines[end], '}');
        if (depth <= 0) break;
      }
      const block = parseJson(lines.slice(start, end + 1).join('\n'));
      if (isJsonObject(block) && isJsonObject(block.log)) {
        records.push(jsonRecord(block.log, { id, timestamp, host, loggerPath }));
      }
      i = end + 1;
      continue;
    }

    const textLines: string[] = [];
    let end = start;
    while (end < lines.length) {
      const line = lines[end];
      if (isEntryStart(end)) break;
      if (line.trim()) textLines.push(line.trim());
      end++;
      if (textLines.length > maxTextLines) break;
    }
    if (textLines.length) {
      records.push(plainRecord(textLines.join('\n'), { id, timestamp, host, loggerPath }));
    }
    i = end;
  }

  return records;
}

type EntryHeader = {
  id: string;
  timestamp: string;
  host: string;
  loggerPath: string;
};

function jsonRecord(log: JsonObject, header: EntryHeader): JsonObject {
  const rawMessage = log.message;
  let message = typeof rawMessage === 'string' ? rawMessage : '';
  let decodedData: JsonObject | undefined;
  if (message) {
    const decoded = decodeLabeledBase64(message);
    message = decoded.text;
    if (isJsonObject(decoded.payload)) {
      decodedData = decoded.payload;
    }
  }

  return {
    id: header.id,
    timestamp: header.timestamp,
    host: header.host,
    log_file_path: header.loggerPath,
    message,
    message_type: 'flow_json',
    levelname: pickString(log, ['levelname']),
    logger_name: pickString(log, ['name']),
    session_id: pickNonEmptyString(log, ['session_id', 'sid', 'SESSION_ID']),
    customer_id: pickNonEmptyString(log, ['customer_id', 'cid']),
    command: pickString(log, ['command']),
    decoded_data: decodedData ?? {},
  };
}

function plainRecord(message: string, header: EntryHeader): JsonObject {
  const loggerName = header.loggerPath.includes('/')
    ? header.loggerPath.split('/').pop() ?? header.loggerPath
    : header.loggerPath;

  return {
    id: header.id,
    timestamp: header.timestamp,
    host: header.host,
    log_file_path: header.loggerPath,
    message,
    message_type: 'flow_text',
    levelname: 'INFO',
    logger_name: loggerName,
    session_id: TEXT_SESSION_ID_PATTERN.exec(message)?.[0] ?? '',
    customer_id: '',
    command: '',
    ANI: ANI_PATTERN.exec(message)?.[1].trim() ?? '',
    DNIS: DNIS_PATTERN.exec(message)?.[1].trim() ?? '',
  };
}

import {
  isJsonObject,
  JsonObject,
  JsonValue,
  pickString,
} from '../../common/json/json-value';
import { createLogEntry, LogEntry, UNKNOWN_SESSION } from '../log-entry';

export const CONVERSATION_LOG_TYPE = 'conversation';

type AgentInfo = { agentName: string; agentVersion: string };

function firstAgent(agents: JsonValue | undefined): AgentInfo {
  if (!isJsonObject(agents)) {
    return { agentName: '', agentVersion: '' };
  }
  // Object key order: integer-like agent ids come first, ascending, then the
  // rest in document order. A parsed document has already lost any other order.
  const first = Object.values(agents)[0];
  const agent = isJsonObject(first) ? first : undefined;
  return {
    agentName: pickString(agent, ['agent_name']),
    agentVersion: pickString(agent, ['version']),
  };
}

const optionalString = (value: JsonValue | undefined): string | undefined =>
  typeof value === 'string' ? value : undefined;

/**
 * Converts a conversational-agent session document
 * (`{ session_id, agents, transactions }`) into one entry per transaction.
 */
export function normalizeAgentLog(document: JsonObject): LogEntry[] {
  const sessionId = pickString(document, ['session_id']) || UNKNOWN_SESSION;
  const { agentName, agentVersion } = firstAgent(document.agents);
  const transactions = Array.isArray(document.transactions)
    ? document.transactions
    : [];

  const entries: LogEntry[] = [];
  for (const txn of transactions) {
    if (!isJsonObject(txn)) continue;
    entries.push(
      createLogEntry({
        timestamp: pickString(txn, ['created_date']),
        source: 'conversational-agent',
        sessionId,
        logType: CONVERSATION_LOG_TYPE,
        content: txn.content ?? '',
        blockId: optionalString(txn.block_id),
        turnId: optionalString(txn.turn_id),
        transactionId: optionalString(txn.transaction_id),
        role: optionalString(txn.role),
        metadata: {
          agentId: txn.agent_id ?? '',
          modelName: txn.model_name ?? '',
          completionTokens: txn.completion_tokens ?? null,
          promptTokens: txn.prompt_tokens ?? null,
          responseTime: txn.response_time ?? null,
          toolCalls: txn.tool_calls ?? [],
          citations: txn.citations ?? [],
          agentName,
          agentVersion,
        },
      }),
    );
  }
  return entries;
}

import { JsonObject, JsonValue } from '../common/json/json-value';
import { LogEntry, LogSource, UNKNOWN_SESSION } from './log-entry';
import { compareOrdinals, normalizeTimestamp } from './timestamp';

export const CONVERSATION_ROLES: readonly string[] = ['user', 'assistant'];

export type ConversationTurn = {
  role: string;
  content: JsonValue;
  timestamp: string;
  source: LogSource;
  blockId: string | null;
  turnId: string | null;
  transactionId: string | null;
  metadata: JsonObject;
};

export type ConversationSummary = {
  sessionId: string;
  conversation: ConversationTurn[];
  totalEntries: number;
  flowEngineEntries: number;
  agentEntries: number;
};

/**
 * Both log streams merged into one timeline and partitioned by session.
 * Read-only once built.
 */
export class CorrelatedSessions {
  constructor(
    readonly timeline: readonly LogEntry[],
    private readonly index: ReadonlyMap<string, readonly LogEntry[]>,
  ) {}

  sessionIds(): string[] {
    return [...this.index.keys()];
  }

  has(sessionId: string): boolean {
    return this.index.has(sessionId);
  }

  sessionTimeline(sessionId: string): readonly LogEntry[] {
    return this.index.get(sessionId) ?? [];
  }

  /**
   * Dialogue as recorded by the agent. Flow-engine entries relay the same
   * utterances and are only counted, never listed as turns.
   */
  conversationSummary(sessionId: string): ConversationSummary {
    const entries = this.sessionTimeline(sessionId);
    const conversation: ConversationTurn[] = entries
      .filter(
        (entry) =>
          entry.source === 'conversational-agent' &&
          entry.role !== undefined &&
          CONVERSATION_ROLES.includes(entry.role),
      )
      .map((entry) => ({
        role: entry.role ?? '',
        content: entry.content,
        timestamp: entry.timestamp,
        source: entry.source,
        blockId: entry.blockId ?? null,
        turnId: entry.turnId ?? null,
        transactionId: entry.transactionId ?? null,
        metadata: { ...entry.metadata },
      }));

    return {
      sessionId,
      conversation,
      totalEntries: entries.length,
      flowEngineEntries: entries.filter((e) => e.source === 'flow-engine').length,
      agentEntries: entries.filter((e) => e.source === 'conversational-agent').length,
    };
  }
}

/**
 * Orders all entries by normalized timestamp. The sort is stable, so ties and
 * unparseable timestamps keep arrival order (flow-engine entries first).
 */
export function buildTimeline(
  flowEntries: readonly LogEntry[],
  agentEntries: readonly LogEntry[],
): LogEntry[] {
  return [...flowEntries, ...agentEntries]
    .map((entry) => ({ entry, ordinal: normalizeTimestamp(entry.timestamp) }))
    .sort((a, b) => compareOrdinals(a.ordinal, b.ordinal))
    .map(({ entry }) => entry);
}

export function correlate(
  flowEntries: readonly LogEntry[],
  agentEntries: readonly LogEntry[],
): CorrelatedSessions {
  const timeline = buildTimeline(flowEntries, agentEntries);
  const index = new Map<string, LogEntry[]>();
  for (const entry of timeline) {
    if (entry.sessionId === UNKNOWN_SESSION) continue;
    const bucket = index.get(entry.sessionId);
    if (bucket) {
      bucket.push(entry);
    } else {
      index.set(entry.sessionId, [entry]);
    }
  }
  return new CorrelatedSessions(timeline, index);
}

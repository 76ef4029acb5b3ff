import {
  isJsonObject,
  JsonObject,
  JsonValue,
  pickString,
} from '../common/json/json-value';
import { FlowGraph } from '../flow/flow-diagram.extractor';
import { LogEntry, LogEntryRecord, toLogEntryRecord } from '../logs/log-entry';
import {
  ConversationSummary,
  CorrelatedSessions,
} from '../logs/session-correlator';

export const RAW_XML_PREVIEW_LENGTH = 1000;

export type FlowEngineStructure =
  | { type: 'flow-engine-xml'; rawXml: string }
  | { type: 'empty' };

export type DatasetInfrastructure = {
  /** Conversational-agent block definitions as loaded (an empty list when absent). */
  agent: JsonValue;
  flowEngine: FlowEngineStructure;
};

export type DatasetExport = {
  sessions: Record<string, { entries: LogEntryRecord[]; summary: ConversationSummary }>;
  timeline: LogEntryRecord[];
  infrastructure: DatasetInfrastructure;
};

/**
 * Everything one load produced. Immutable: a reload builds a new instance.
 */
export class LoadedDataset {
  constructor(
    private readonly correlated: CorrelatedSessions,
    private readonly graph: FlowGraph,
    private readonly infrastructure: DatasetInfrastructure,
  ) {}

  getAllSessions(): string[] {
    return this.correlated.sessionIds();
  }

  hasSession(sessionId: string): boolean {
    return this.correlated.has(sessionId);
  }

  getSessionTimeline(sessionId: string): readonly LogEntry[] {
    return this.correlated.sessionTimeline(sessionId);
  }

  /** Every entry, including those without a resolved session. */
  getTimeline(): readonly LogEntry[] {
    return this.correlated.timeline;
  }

  getConversationSummary(sessionId: string): ConversationSummary {
    return this.correlated.conversationSummary(sessionId);
  }

  getFlowGraph(): FlowGraph {
    return this.graph;
  }

  getInfrastructure(): DatasetInfrastructure {
    return this.infrastructure;
  }

  /** Infrastructure with the raw flow XML cut to a preview. */
  getInfrastructurePreview(): DatasetInfrastructure {
    return {
      agent: this.infrastructure.agent,
      flowEngine: previewStructure(this.infrastructure.flowEngine),
    };
  }

  getBlockInfo(blockId: string): JsonObject | undefined {
    const blocks = this.infrastructure.agent;
    if (!Array.isArray(blocks)) return undefined;
    for (const block of blocks) {
      if (isJsonObject(block) && pickString(block, ['block_id']) === blockId) {
        return block;
      }
    }
    return undefined;
  }

  toExport(): DatasetExport {
    const sessions: DatasetExport['sessions'] = {};
    for (const sessionId of this.getAllSessions()) {
      sessions[sessionId] = {
        entries: this.getSessionTimeline(sessionId).map(toLogEntryRecord),
        summary: this.getConversationSummary(sessionId),
      };
    }
    return {
      sessions,
      timeline: this.getTimeline().map(toLogEntryRecord),
      infrastructure: this.getInfrastructurePreview(),
    };
  }
}

function previewStructure(structure: FlowEngineStructure): FlowEngineStructure {
  if (structure.type === 'empty' || structure.rawXml.length <= RAW_XML_PREVIEW_LENGTH) {
    return structure;
  }
  return {
    type: structure.type,
    rawXml: `${structure.rawXml.slice(0, RAW_XML_PREVIEW_LENGTH)}...`,
  };
}

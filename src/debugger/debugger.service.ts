import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JsonObject } from '../common/json/json-value';
import { DatasetLoadError } from '../dataset/dataset-load.error';
import { DatasetDocuments, DatasetLoader } from '../dataset/dataset.loader';
import { DatasetExport, DatasetInfrastructure, LoadedDataset } from '../dataset/loaded-dataset';
import { FlowGraph } from '../flow/flow-diagram.extractor';
import { LogEntryRecord, toLogEntryRecord } from '../logs/log-entry';
import { ConversationSummary } from '../logs/session-correlator';
import { DatasetStore } from './dataset.store';

export type SessionListItem = {
  sessionId: string;
  totalEntries: number;
  conversationTurns: number;
  flowEngineEntries: number;
  agentEntries: number;
};

@Injectable()
export class DebuggerService implements OnModuleInit {
  private readonly logger = new Logger(DebuggerService.name);
  private defaultDataset?: LoadedDataset;

  constructor(
    private readonly store: DatasetStore,
    private readonly loader: DatasetLoader,
    private readonly config: ConfigService,
  ) {}

  /**
   * Loads the dataset named by the *_PATH settings, when both log paths are
   * configured. A failure leaves the service running without sessions.
   */
  onModuleInit() {
    const flowEngineLogPath = this.config.get<string>('FLOW_ENGINE_LOG_PATH')?.trim();
    const agentLogPath = this.config.get<string>('AGENT_LOG_PATH')?.trim();
    if (!flowEngineLogPath || !agentLogPath) {
      this.logger.log('No default dataset configured; waiting for uploads');
      return;
    }

    try {
      this.defaultDataset = this.loader.load({
        flowEngineLogPath,
        agentLogPath,
        flowXmlPath: this.config.get<string>('FLOW_XML_PATH')?.trim() || undefined,
        agentInfraPath: this.config.get<string>('AGENT_INFRA_PATH')?.trim() || undefined,
      });
      const sessions = this.store.insert(this.defaultDataset);
      this.logger.log(`Loaded ${sessions.length} default session(s)`);
    } catch (err) {
      if (!(err instanceof DatasetLoadError)) throw err;
      this.logger.warn(`Could not load default dataset: ${err.message}`);
    }
  }

  listSessions(): SessionListItem[] {
    return this.store.list().map(([sessionId, dataset]) => {
      const summary = dataset.getConversationSummary(sessionId);
      return {
        sessionId,
        totalEntries: summary.totalEntries,
        conversationTurns: summary.conversation.length,
        flowEngineEntries: summary.flowEngineEntries,
        agentEntries: summary.agentEntries,
      };
    });
  }

  getTimeline(sessionId: string): { sessionId: string; timeline: LogEntryRecord[] } {
    const dataset = this.requireDataset(sessionId);
    return {
      sessionId,
      timeline: dataset.getSessionTimeline(sessionId).map(toLogEntryRecord),
    };
  }

  getConversation(sessionId: string): ConversationSummary {
    return this.requireDataset(sessionId).getConversationSummary(sessionId);
  }

  getFlow(sessionId: string): FlowGraph {
    return this.requireDataset(sessionId).getFlowGraph();
  }

  getBlock(blockId: string): JsonObject {
    for (const dataset of this.store.datasets()) {
      const block = dataset.getBlockInfo(blockId);
      if (block) return block;
    }
    throw new NotFoundException('Block not found');
  }

  getInfrastructure(): DatasetInfrastructure {
    return this.requireAny().getInfrastructurePreview();
  }

  export(): DatasetExport {
    return this.requireAny().toExport();
  }

  /**
   * Correlates already-fetched documents and registers their sessions. A
   * malformed required document is reported as a single 400 error and
   * nothing is registered.
   */
  load(documents: DatasetDocuments): { success: true; sessions: string[]; message: string } {
    let dataset: LoadedDataset;
    try {
      dataset = this.loader.loadDocuments(documents);
    } catch (err) {
      if (err instanceof DatasetLoadError) {
        throw new BadRequestException(err.message);
      }
      throw err;
    }
    const sessions = this.store.insert(dataset);
    return {
      success: true,
      sessions,
      message: `Loaded ${sessions.length} session(s)`,
    };
  }

  /** Drops uploaded datasets; the startup dataset, if any, stays. */
  clear(): { success: true; message: string; remainingSessions: number } {
    this.store.clear();
    if (this.defaultDataset) {
      this.store.insert(this.defaultDataset);
    }
    return {
      success: true,
      message: 'Cleared all uploaded sessions',
      remainingSessions: this.store.size,
    };
  }

  private requireDataset(sessionId: string): LoadedDataset {
    const dataset = this.store.get(sessionId);
    if (!dataset) {
      throw new NotFoundException('Session not found');
    }
    return dataset;
  }

  private requireAny(): LoadedDataset {
    const dataset = this.store.first();
    if (!dataset) {
      throw new NotFoundException('No data loaded');
    }
    return dataset;
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { readFileSync } from 'fs';
import { extname } from 'path';
import { isJsonObject, JsonValue } from '../common/json/json-value';
import {
  extractFlowDiagram,
  extractFlowXmlFragment,
} from '../flow/flow-diagram.extractor';
import { normalizeAgentLog } from '../logs/adapters/agent.adapter';
import { normalizeFlowEngineLog } from '../logs/adapters/flow-engine.adapter';
import { parseFlowEngineText } from '../logs/flow-engine-text.parser';
import { detectTextSessionId } from '../logs/session-id';
import { correlate } from '../logs/session-correlator';
import { DatasetLoadError } from './dataset-load.error';
import { FlowEngineStructure, LoadedDataset } from './loaded-dataset';

/** File locations of one load. The two logs are required. */
export type DatasetSources = {
  flowEngineLogPath: string;
  agentLogPath: string;
  flowXmlPath?: string;
  agentInfraPath?: string;
};

/** Already-fetched inputs of one load. */
export type DatasetDocuments = {
  /** JSON export (array of records) or the text export of the flow engine log. */
  flowEngineLog: JsonValue;
  agentLog: JsonValue;
  /** Any text blob containing the `<?xml … </chain>` flow definition. */
  flowXml?: string;
  agentInfra?: JsonValue;
};

@Injectable()
export class DatasetLoader {
  private readonly logger = new Logger(DatasetLoader.name);

  /**
   * Reads and correlates the inputs named by `sources`. Throws
   * {@link DatasetLoadError} when a required log is missing or malformed;
   * optional inputs degrade to empty structures.
   */
  load(sources: DatasetSources): LoadedDataset {
    const flowRaw = this.readRequired(sources.flowEngineLogPath, 'flow-engine log');
    const flowEngineLog =
      extname(sources.flowEngineLogPath).toLowerCase() === '.json'
        ? this.parseRequired(flowRaw, 'flow-engine log')
        : flowRaw;
    const agentLog = this.parseRequired(
      this.readRequired(sources.agentLogPath, 'agent log'),
      'agent log',
    );

    return this.loadDocuments({
      flowEngineLog,
      agentLog,
      flowXml: this.readOptional(sources.flowXmlPath, 'flow XML'),
      agentInfra: this.parseOptional(
        this.readOptional(sources.agentInfraPath, 'agent infrastructure'),
        'agent infrastructure',
      ),
    });
  }

  loadDocuments(documents: DatasetDocuments): LoadedDataset {
    const flowRecords = this.flowEngineRecords(documents.flowEngineLog);
    if (!isJsonObject(documents.agentLog)) {
      throw new DatasetLoadError('agent log must be a JSON object', 'agent log');
    }

    const flowEntries = normalizeFlowEngineLog(flowRecords);
    this.logger.log(`Loaded ${flowEntries.length} flow-engine log entries`);
    const agentEntries = normalizeAgentLog(documents.agentLog);
    this.logger.log(`Loaded ${agentEntries.length} agent transactions`);

    const fragment = documents.flowXml
      ? extractFlowXmlFragment(documents.flowXml)
      : undefined;
    if (documents.flowXml && !fragment) {
      this.logger.warn('No <?xml … </chain> fragment found in flow XML input');
    }
    const flowEngine: FlowEngineStructure = fragment
      ? { type: 'flow-engine-xml', rawXml: fragment }
      : { type: 'empty' };
    const agentInfra = documents.agentInfra ?? [];
    if (!Array.isArray(agentInfra)) {
      this.logger.warn('Agent infrastructure is not a list of blocks; flow graph has no agent nodes');
    }

    const correlated = correlate(flowEntries, agentEntries);
    this.logger.log(
      `Created timeline with ${correlated.timeline.length} entries across ${
        correlated.sessionIds().length
      } session(s)`,
    );

    return new LoadedDataset(correlated, extractFlowDiagram(agentInfra, fragment), {
      agent: agentInfra,
      flowEngine,
    });
  }

  private flowEngineRecords(log: JsonValue): JsonValue[] {
    if (Array.isArray(log)) {
      return log;
    }
    if (typeof log === 'string') {
      const records = parseFlowEngineText(log);
      const documentSession = detectTextSessionId(log);
      if (!documentSession) {
        return records;
      }
      return records.map((record) =>
        record.session_id ? record : { ...record, session_id: documentSession },
      );
    }
    throw new DatasetLoadError(
      'flow-engine log must be a JSON array of records or the text export',
      'flow-engine log',
    );
  }

  private readRequired(path: string, input: string): string {
    try {
      return readFileSync(path, 'utf8');
    } catch (err) {
      throw new DatasetLoadError(`Cannot read ${input} at ${path}`, input, {
        cause: err,
      });
    }
  }

  private parseRequired(text: string, input: string): JsonValue {
    try {
      const parsed: JsonValue = JSON.parse(text);
      return parsed;
    } catch (err) {
      throw new DatasetLoadError(`${input} is not valid JSON`, input, {
        cause: err,
      });
    }
  }

  private readOptional(path: string | undefined, input: string): string | undefined {
    if (!path) return undefined;
    try {
      return readFileSync(path, 'utf8');
    } catch (err) {
      this.logger.warn(`Error loading ${input} from ${path}: ${describe(err)}`);
      return undefined;
    }
  }

  private parseOptional(text: string | undefined, input: string): JsonValue | undefined {
    if (text === undefined) return undefined;
    try {
      const parsed: JsonValue = JSON.parse(text);
      return parsed;
    } catch (err) {
      this.logger.warn(`Error parsing ${input}: ${describe(err)}`);
      return undefined;
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

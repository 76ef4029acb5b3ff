import { Logger } from '@nestjs/common';
import { join } from 'path';
import { DatasetLoadError } from './dataset-load.error';
import { DatasetLoader } from './dataset.loader';

const FIXTURES = join(__dirname, '../../test/fixtures');
const SID = '1760571668-000000000001105328-SR-000-000000000000DEN130-44144A80';

const fixtureSources = {
  flowEngineLogPath: join(FIXTURES, 'flow-engine-log.json'),
  agentLogPath: join(FIXTURES, 'agent-log.json'),
  flowXmlPath: join(FIXTURES, 'flow.xml'),
  agentInfraPath: join(FIXTURES, 'agent-infra.json'),
};

describe('DatasetLoader', () => {
  let loader: DatasetLoader;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    loader = new DatasetLoader();
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('load', () => {
    it('correlates both logs into one session ordered by time', () => {
      const dataset = loader.load(fixtureSources);

      expect(dataset.getAllSessions()).toEqual([SID]);
      const order = dataset
        .getSessionTimeline(SID)
        .map((e) => (e.source === 'flow-engine' ? e.metadata.id : e.transactionId));
      expect(order).toEqual(['f1', 'tx-1', 'f2', 'f3', 'tx-2', 'f5']);
    });

    it('keeps unattributed entries on the global timeline only', () => {
      const dataset = loader.load(fixtureSources);
      const timeline = dataset.getTimeline();

      expect(timeline).toHaveLength(7);
      expect(timeline[0].sessionId).toBe('unknown');
      expect(timeline[0].content).toBe('heartbeat ok');
    });

    it('derives signals and conversation turns from the fixtures', () => {
      const dataset = loader.load(fixtureSources);
      const byId = new Map(
        dataset.getSessionTimeline(SID).map((e) => [e.metadata.id || e.transactionId, e]),
      );

      expect(byId.get('f2')?.waitOnValue).toBe('CALLBACK_READY');
      expect(byId.get('f3')?.errorCode).toBe(503);
      expect(byId.get('f5')?.content).toBe('Sure, what day works?');

      const summary = dataset.getConversationSummary(SID);
      expect(summary.totalEntries).toBe(6);
      expect(summary.flowEngineEntries).toBe(4);
      expect(summary.agentEntries).toBe(2);
      expect(summary.conversation.map((t) => `${t.source}:${t.role}`)).toEqual([
        'conversational-agent:user',
        'conversational-agent:assistant',
      ]);
    });

    it('extracts the flow graph from both definitions', () => {
      const graph = loader.load(fixtureSources).getFlowGraph();

      expect(graph.nodes).toHaveLength(5);
      expect(graph.edges).toEqual([
        { from: 't1', to: 't2', label: 'ok', type: 'conversational-agent' },
        { from: 'START', to: 'EXTCALL_3', type: 'flow-engine' },
        { from: 'EXTCALL_3', to: 'WAIT_1', type: 'flow-engine' },
      ]);
    });

    it('produces identical exports from identical inputs', () => {
      expect(loader.load(fixtureSources).toExport()).toEqual(
        loader.load(fixtureSources).toExport(),
      );
    });

    it('fails on a malformed required log', () => {
      const sources = { ...fixtureSources, agentLogPath: join(FIXTURES, 'broken.json') };
      expect(() => loader.load(sources)).toThrow(DatasetLoadError);
      expect(() => loader.load(sources)).toThrow('agent log is not valid JSON');
    });

    it('fails on a missing required log', () => {
      const sources = { ...fixtureSources, flowEngineLogPath: join(FIXTURES, 'missing.json') };
      expect(() => loader.load(sources)).toThrow(DatasetLoadError);
    });

    it('degrades missing optional inputs to empty structures', () => {
      const dataset = loader.load({
        ...fixtureSources,
        flowXmlPath: join(FIXTURES, 'missing.xml'),
        agentInfraPath: join(FIXTURES, 'broken.json'),
      });

      expect(dataset.getAllSessions()).toEqual([SID]);
      expect(dataset.getInfrastructure()).toEqual({ agent: [], flowEngine: { type: 'empty' } });
      expect(dataset.getFlowGraph().nodes).toEqual([]);
      expect(warn).toHaveBeenCalledTimes(2);
    });
  });

  describe('loadDocuments', () => {
    it('reads the text export and fills in the document session', () => {
      const text = [
        'SESSION ID',
        '----------',
        '1760571668-42-SR-1-ABC',
        'sf-node-1.example.net',
        'engine',
        '2025-10-16T02:21:09.000Z',
        'call started',
      ].join('\n');
      const dataset = loader.loadDocuments({ flowEngineLog: text, agentLog: {} });

      expect(dataset.getAllSessions()).toEqual(['1760571668-42-SR-1-ABC']);
      expect(dataset.getTimeline()[0].content).toBe('call started');
    });

    it('rejects an agent log that is not an object', () => {
      expect(() => loader.loadDocuments({ flowEngineLog: [], agentLog: [] })).toThrow(
        'agent log must be a JSON object',
      );
    });

    it('rejects a flow-engine log of the wrong shape', () => {
      expect(() => loader.loadDocuments({ flowEngineLog: 42, agentLog: {} })).toThrow(
        DatasetLoadError,
      );
    });

    it('cuts long flow XML only in the preview', () => {
      const plugins = Array.from(
        { length: 60 },
        (_, i) => `<plugin name="P${i}" label="Plugin ${i}" type="STEP" />`,
      ).join('\n');
      const xml = `<?xml version="1.0"?>\n<flow>\n${plugins}\n<chain></chain>`;
      const dataset = loader.loadDocuments({ flowEngineLog: [], agentLog: {}, flowXml: xml });

      expect(dataset.getInfrastructure().flowEngine).toEqual({
        type: 'flow-engine-xml',
        rawXml: xml,
      });
      expect(dataset.getInfrastructurePreview().flowEngine).toEqual({
        type: 'flow-engine-xml',
        rawXml: `${xml.slice(0, 1000)}...`,
      });
      expect(dataset.getFlowGraph().flowEngineNodes).toHaveLength(60);
    });
  });
});

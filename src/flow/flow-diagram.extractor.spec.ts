import { JsonValue } from '../common/json/json-value';
import { extractFlowDiagram, extractFlowXmlFragment } from './flow-diagram.extractor';

const exportBlob = [
  'exported_flow_definition:',
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<flow id="scheduling">',
  '  <plugin name="START" label="Start" type="ENTRY" />',
  '  <plugin name="EXTCALL_3" label="" type="EXTCALL" />',
  '  <chain name="main">',
  '    <chain left="START" right="EXTCALL_3" />',
  '    <chain left="EXTCALL_3" right="END_CALL" />',
  '  </chain>',
  '</flow>',
  'trailing text',
].join('\n');

const infra: JsonValue = [
  {
    block_id: 'b1',
    name: 'Scheduling',
    turns: [
      {
        turn_id: 't1',
        name: 'Ask',
        edges: [{ name: 'ok', connect_to: { turn_id: 't2' } }, { name: 'dangling' }],
      },
      { turn_id: 't2', name: 'Confirm', edges: [] },
    ],
  },
  { name: 'Fallback' },
];

describe('extractFlowXmlFragment', () => {
  it('captures from the prolog to the first closing chain tag', () => {
    const fragment = extractFlowXmlFragment(exportBlob);
    expect(fragment?.startsWith('<?xml')).toBe(true);
    expect(fragment?.endsWith('</chain>')).toBe(true);
  });

  it('returns undefined without a flow definition', () => {
    expect(extractFlowXmlFragment('no xml here')).toBeUndefined();
  });
});

describe('extractFlowDiagram', () => {
  const graph = extractFlowDiagram(infra, extractFlowXmlFragment(exportBlob));

  it('builds agent blocks with their turns', () => {
    expect(graph.agentNodes).toEqual([
      {
        id: 'b1',
        label: 'Scheduling',
        type: 'conversational-agent',
        turns: [
          { id: 't1', name: 'Ask' },
          { id: 't2', name: 'Confirm' },
        ],
      },
      { id: 'block_1', label: 'Fallback', type: 'conversational-agent', turns: [] },
    ]);
  });

  it('builds flow-engine plugins, labelling unnamed ones by id', () => {
    expect(graph.flowEngineNodes).toEqual([
      { id: 'START', label: 'Start', type: 'flow-engine', pluginType: 'ENTRY' },
      { id: 'EXTCALL_3', label: 'EXTCALL_3', type: 'flow-engine', pluginType: 'EXTCALL' },
    ]);
  });

  it('links turns and plugins, skipping dangling edges and hang-ups', () => {
    expect(graph.edges).toEqual([
      { from: 't1', to: 't2', label: 'ok', type: 'conversational-agent' },
      { from: 'START', to: 'EXTCALL_3', type: 'flow-engine' },
    ]);
  });

  it('lists agent nodes before flow-engine nodes', () => {
    expect(graph.nodes.map((n) => n.id)).toEqual(['b1', 'block_1', 'START', 'EXTCALL_3']);
  });

  it('produces an empty graph without inputs', () => {
    expect(extractFlowDiagram(undefined, undefined)).toEqual({
      nodes: [],
      edges: [],
      flowEngineNodes: [],
      agentNodes: [],
    });
  });

  it('names blocks without a name', () => {
    const { agentNodes } = extractFlowDiagram([{ block_id: 'x' }], undefined);
    expect(agentNodes[0].label).toBe('Unknown Block');
  });
});

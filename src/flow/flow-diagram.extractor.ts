import {
  isJsonObject,
  JsonValue,
  pickString,
} from '../common/json/json-value';
import { LogSource } from '../logs/log-entry';

export type TurnRef = { id: string; name: string };

export type FlowNode = {
  id: string;
  label: string;
  type: LogSource;
  turns?: TurnRef[];
  pluginType?: string;
};

export type FlowEdge = {
  from: string;
  to: string;
  label?: string;
  type: LogSource;
};

export type FlowGraph = {
  nodes: FlowNode[];
  edges: FlowEdge[];
  flowEngineNodes: FlowNode[];
  agentNodes: FlowNode[];
};

/** Chain target that hangs up the call; never drawn as an edge. */
export const END_CALL = 'END_CALL';
export const UNKNOWN_BLOCK_LABEL = 'Unknown Block';

const XML_FRAGMENT_PATTERN = /<\?xml[\s\S]*?<\/chain>/;
const PLUGIN_PATTERN = /<plugin\s+name="([^"]+)"[^>]*label="([^"]*)"[^>]*type="([^"]*)"/g;
const CHAIN_PATTERN = /<chain[^>]*left="([^"]*)"[^>]*right="([^"]*)"/g;

/**
 * Captures the flow definition from an export blob: everything from the XML
 * prolog up to the first closing `chain` tag.
 */
export function extractFlowXmlFragment(text: string): string | undefined {
  return XML_FRAGMENT_PATTERN.exec(text)?.[0];
}

function agentGraph(infraBlocks: JsonValue | undefined): {
  nodes: FlowNode[];
  edges: FlowEdge[];
} {
  const nodes: FlowNode[] = [];
  const edges: FlowEdge[] = [];
  if (!Array.isArray(infraBlocks)) {
    return { nodes, edges };
  }

  infraBlocks.forEach((block, idx) => {
    if (!isJsonObject(block)) return;
    const node: FlowNode = {
      id: pickString(block, ['block_id']) || `block_${idx}`,
      label: pickString(block, ['name']) || UNKNOWN_BLOCK_LABEL,
      type: 'conversational-agent',
      turns: [],
    };

    const turns = Array.isArray(block.turns) ? block.turns : [];
    for (const turn of turns) {
      if (!isJsonObject(turn)) continue;
      const turnId = pickString(turn, ['turn_id']);
      node.turns?.push({ id: turnId, name: pickString(turn, ['name']) });

      const turnEdges = Array.isArray(turn.edges) ? turn.edges : [];
      for (const edge of turnEdges) {
        if (!isJsonObject(edge) || !isJsonObject(edge.connect_to)) continue;
        const target = pickString(edge.connect_to, ['turn_id']);
        if (!target) continue;
        edges.push({
          from: turnId,
          to: target,
          label: pickString(edge, ['name']),
          type: 'conversational-agent',
        });
      }
    }
    nodes.push(node);
  });

  return { nodes, edges };
}

function flowEngineGraph(xmlFragment: string | undefined): {
  nodes: FlowNode[];
  edges: FlowEdge[];
} {
  const nodes: FlowNode[] = [];
  const edges: FlowEdge[] = [];
  if (!xmlFragment) {
    return { nodes, edges };
  }

  for (const [, name, label, pluginType] of xmlFragment.matchAll(PLUGIN_PATTERN)) {
    nodes.push({ id: name, label: label || name, type: 'flow-engine', pluginType });
  }
  for (const [, left, right] of xmlFragment.matchAll(CHAIN_PATTERN)) {
    if (left && right && right !== END_CALL) {
      edges.push({ from: left, to: right, type: 'flow-engine' });
    }
  }
  return { nodes, edges };
}

/**
 * Builds the static flow diagram: agent blocks with their turn-to-turn edges,
 * then flow-engine plugins with their chain links.
 */
export function extractFlowDiagram(
  infraBlocks: JsonValue | undefined,
  xmlFragment: string | undefined,
): FlowGraph {
  const agent = agentGraph(infraBlocks);
  const flowEngine = flowEngineGraph(xmlFragment);
  return {
    nodes: [...agent.nodes, ...flowEngine.nodes],
    edges: [...agent.edges, ...flowEngine.edges],
    flowEngineNodes: flowEngine.nodes,
    agentNodes: agent.nodes,
  };
}

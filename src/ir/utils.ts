import { GraphNode, GroupOutputNode, Link, MaterialGraph, SocketValue } from './types';
import { NodeDefs } from './node-defs';

export const findNode = (graph: MaterialGraph, nodeId: string): GraphNode | undefined =>
  graph.nodes.find(n => n.id === nodeId);

/**
 * The link terminating at an input socket, if any. Graphs hold at most one
 * per input; the loader enforces it, and the first one wins here.
 */
export const findLinkTo = (graph: MaterialGraph, nodeId: string, socketId: string): Link | undefined =>
  graph.links.find(l => l.to.node === nodeId && l.to.socket === socketId);

/**
 * The group output node the sub-graph exposes: the first one not explicitly
 * marked inactive.
 */
export const findActiveGroupOutput = (graph: MaterialGraph): GroupOutputNode | undefined => {
  for (const node of graph.nodes) {
    if (node.kind === 'group_output' && node.isActiveOutput !== false) {
      return node;
    }
  }
  return undefined;
};

/**
 * Constant used for an unconnected input: the node's own override first,
 * then the kind's fallback. `undefined` when the socket is unknown.
 */
export const socketDefault = (node: GraphNode, socketId: string): SocketValue | undefined => {
  const override = node.inputs?.[socketId];
  if (override !== undefined) return override;
  return NodeDefs[node.kind].inputs[socketId]?.default;
};

/** Graph-qualified node key, so node IDs may repeat across sub-graphs. */
export const nodeKey = (graph: MaterialGraph, nodeId: string): string => `${graph.id}/${nodeId}`;

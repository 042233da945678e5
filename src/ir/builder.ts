import { GraphNode, Link, MaterialGraph } from './types';

/**
 * Fluent construction of a `MaterialGraph` in code.
 *
 * ```ts
 * const graph = new GraphBuilder('wet-rock')
 *   .add({ id: 'tint', kind: 'rgb', color: [0.2, 0.3, 0.4] })
 *   .add({ id: 'out', kind: 'bake_output' })
 *   .link('tint', 'Color', 'out', 'Color')
 *   .build();
 * ```
 */
export class GraphBuilder {
  private readonly nodes: GraphNode[] = [];
  private readonly links: Link[] = [];
  private readonly ids = new Set<string>();

  constructor(private readonly id: string, private readonly name: string = id) {}

  add(node: GraphNode): this {
    if (this.ids.has(node.id)) {
      throw new Error(`Duplicate Node ID '${node.id}' in graph '${this.id}'`);
    }
    this.ids.add(node.id);
    this.nodes.push(node);
    return this;
  }

  link(fromNode: string, fromSocket: string, toNode: string, toSocket: string): this {
    this.links.push({ from: { node: fromNode, socket: fromSocket }, to: { node: toNode, socket: toSocket } });
    return this;
  }

  build(): MaterialGraph {
    return { id: this.id, name: this.name, nodes: [...this.nodes], links: [...this.links] };
  }
}

import {
  ChannelSpace,
  GraphNode,
  GroupNode,
  MaterialGraph,
  SocketRef,
  VECTOR_SCALAR_OPERATIONS,
  VectorOperation,
  VectorScalarOperation,
} from '../ir/types';
import { Expression, mapChildren } from '../ir/expression';
import { NodeDefs } from '../ir/node-defs';
import { findActiveGroupOutput, findLinkTo, findNode, nodeKey, socketDefault } from '../ir/utils';
import { CycleError, UnsupportedNodeError, UnsupportedSocketError } from '../errors';

export interface ReifyOptions {
  /**
   * Cache lowered output sockets within one top-level call. Shared sub-trees
   * are then reused instead of lowered again.
   */
  memoize?: boolean;
  /** Trace group instancing through `console.debug`. */
  debug?: boolean;
}

/** Graph-qualified keys of the nodes on the current lowering path. */
type SeenSet = ReadonlySet<string>;

interface Scope {
  readonly seen: SeenSet;
  /** True while lowering a group's template, where `group_input` becomes a placeholder. */
  readonly inGroup: boolean;
}

const ROOT_SCOPE: Scope = { seen: new Set(), inGroup: false };

const SCALAR_VECTOR_OPS: ReadonlySet<string> = new Set<string>(VECTOR_SCALAR_OPERATIONS);

const isVectorScalarOperation = (op: VectorOperation | VectorScalarOperation): op is VectorScalarOperation =>
  SCALAR_VECTOR_OPS.has(op);

// Output socket -> channel, per separate node flavour
const SEPARATE_CHANNELS: Record<ChannelSpace, Partial<Record<string, 0 | 1 | 2>>> = {
  rgb: { R: 0, G: 1, B: 2 },
  xyz: { X: 0, Y: 1, Z: 2 },
  hsv: { H: 0, S: 1, V: 2 },
};

// Input socket names, per combine/separate node flavour
const CHANNEL_INPUTS: Record<ChannelSpace, { separate: string; combine: [string, string, string] }> = {
  rgb: { separate: 'Image', combine: ['R', 'G', 'B'] },
  xyz: { separate: 'Vector', combine: ['X', 'Y', 'Z'] },
  hsv: { separate: 'Color', combine: ['H', 'S', 'V'] },
};

/**
 * Replaces every `groupInput` placeholder in `template` with `bind(socket)`.
 * Replacements are inserted as-is; their own placeholders (if any) belong to
 * an enclosing group and are left for that group's substitution.
 */
export const substitute = (template: Expression, bind: (socket: string) => Expression): Expression =>
  template.type === 'groupInput'
    ? bind(template.socket)
    : mapChildren(template, child => substitute(child, bind));

// ------------------------------------------------------------------
// Reifier
// ------------------------------------------------------------------

/**
 * Lowers sockets of a material graph to Expression trees.
 *
 * Cycle detection is per path: each recursive call carries the set of nodes
 * above it, so a node reached twice through different branches (a diamond) is
 * lowered twice, while a node reached from itself raises `CycleError`.
 */
export class Reifier {
  private readonly cache?: Map<string, Expression>;

  constructor(private readonly options: ReifyOptions = {}) {
    if (options.memoize) this.cache = new Map();
  }

  /** Lowers the input socket `socketId` of `node`: its link source, or its constant. */
  reifyInput(graph: MaterialGraph, node: GraphNode, socketId: string): Expression {
    this.cache?.clear();
    return this.lowerInput(graph, node, socketId, ROOT_SCOPE);
  }

  /** Lowers the output socket `ref` of a node in `graph`. */
  reifyOutput(graph: MaterialGraph, ref: SocketRef): Expression {
    this.cache?.clear();
    return this.lowerOutput(graph, ref, ROOT_SCOPE);
  }

  private lowerInput(graph: MaterialGraph, node: GraphNode, socketId: string, scope: Scope): Expression {
    const link = findLinkTo(graph, node.id, socketId);
    if (link) return this.lowerOutput(graph, link.from, scope);

    const value = socketDefault(node, socketId);
    if (value === undefined) {
      throw new UnsupportedSocketError(node.kind, node.id, socketId);
    }
    if (typeof value === 'number') return { type: 'constScalar', value };
    return { type: 'constColor', rgb: [value[0], value[1], value[2]] };
  }

  private lowerOutput(graph: MaterialGraph, ref: SocketRef, scope: Scope): Expression {
    const node = findNode(graph, ref.node);
    if (!node) {
      throw new UnsupportedNodeError('missing', ref.node, `no such node in graph '${graph.name}'`);
    }

    const key = nodeKey(graph, node.id);
    if (scope.seen.has(key)) throw new CycleError(graph.name, node.id);

    const cacheKey = `${key}/${ref.socket}`;
    const cached = this.cache?.get(cacheKey);
    if (cached) return cached;

    const expr = this.lowerNode(graph, node, ref.socket, { ...scope, seen: new Set([...scope.seen, key]) });
    this.cache?.set(cacheKey, expr);
    return expr;
  }

  private lowerNode(graph: MaterialGraph, node: GraphNode, socket: string, scope: Scope): Expression {
    const input = (socketId: string) => this.lowerInput(graph, node, socketId, scope);

    const def = NodeDefs[node.kind];
    if (!def.dynamicSockets && !def.outputs.includes(socket)) {
      throw new UnsupportedSocketError(node.kind, node.id, socket);
    }

    switch (node.kind) {
      case 'rgb':
        return { type: 'constColor', rgb: [node.color[0], node.color[1], node.color[2]] };
      case 'value':
        return { type: 'constScalar', value: node.value };

      case 'attribute': {
        const attributeType = node.attributeType ?? 'GEOMETRY';
        if (attributeType !== 'GEOMETRY') {
          throw new UnsupportedNodeError(node.kind, node.id, `attribute type ${attributeType}`);
        }
        switch (socket) {
          case 'Color':
          case 'Vector':
            return { type: 'attributeColor', name: node.attributeName };
          case 'Fac':
            return { type: 'attributeScalar', name: node.attributeName, channel: 'fac' };
          case 'Alpha':
            return { type: 'attributeScalar', name: node.attributeName, channel: 'alpha' };
          default:
            throw new UnsupportedSocketError(node.kind, node.id, socket);
        }
      }

      case 'vertex_color':
        if (socket === 'Color') return { type: 'attributeColor', name: node.layerName };
        if (socket === 'Alpha') return { type: 'attributeScalar', name: node.layerName, channel: 'alpha' };
        throw new UnsupportedSocketError(node.kind, node.id, socket);

      case 'geometry':
        if (socket === 'Position') return { type: 'geometry', attribute: 'position' };
        if (socket === 'Normal') return { type: 'geometry', attribute: 'normal' };
        throw new UnsupportedSocketError(node.kind, node.id, socket);

      case 'math':
        return {
          type: 'math',
          operation: node.operation,
          clamp: node.useClamp,
          a: input('A'),
          b: input('B'),
          c: input('C'),
        };

      case 'vector_math': {
        const { operation } = node;
        if (isVectorScalarOperation(operation)) {
          if (socket !== 'Value') throw new UnsupportedSocketError(node.kind, node.id, socket);
          return { type: 'vectorMathScalar', operation, a: input('A'), b: input('B') };
        }
        if (socket !== 'Vector') throw new UnsupportedSocketError(node.kind, node.id, socket);
        return {
          type: 'vectorMath',
          operation,
          a: input('A'),
          b: input('B'),
          c: input('C'),
          scale: input('Scale'),
        };
      }

      case 'mix_rgb':
        return {
          type: 'mix',
          blendType: node.blendType,
          clamp: node.useClamp,
          fac: input('Fac'),
          color1: input('Color1'),
          color2: input('Color2'),
        };

      case 'mix':
        switch (node.dataType) {
          case 'RGBA':
            return {
              type: 'mix',
              blendType: node.blendType,
              clamp: node.clampResult,
              fac: input('Factor'),
              color1: input('A_Color'),
              color2: input('B_Color'),
            };
          case 'FLOAT':
            return {
              type: 'mix',
              blendType: 'MIX',
              clamp: false,
              fac: input('Factor'),
              color1: input('A_Float'),
              color2: input('B_Float'),
            };
          default:
            throw new UnsupportedNodeError(node.kind, node.id, `data type ${node.dataType}`);
        }

      case 'rgb_to_bw':
        return { type: 'grayscale', color: input('Color') };
      case 'invert':
        return { type: 'invert', fac: input('Fac'), color: input('Color') };
      case 'clamp':
        if (node.clampType !== 'MINMAX') {
          throw new UnsupportedNodeError(node.kind, node.id, `clamp type ${node.clampType}`);
        }
        return {
          type: 'clamp',
          clampType: node.clampType,
          value: input('Value'),
          min: input('Min'),
          max: input('Max'),
        };
      case 'gamma':
        return { type: 'gamma', color: input('Color'), gamma: input('Gamma') };
      case 'bright_contrast':
        return {
          type: 'brightContrast',
          color: input('Color'),
          bright: input('Bright'),
          contrast: input('Contrast'),
        };

      case 'separate_rgb':
      case 'separate_xyz':
      case 'separate_hsv': {
        const space = channelSpace(node.kind);
        const channel = SEPARATE_CHANNELS[space][socket];
        if (channel === undefined) throw new UnsupportedSocketError(node.kind, node.id, socket);
        return { type: 'separate', space, channel, input: input(CHANNEL_INPUTS[space].separate) };
      }

      case 'combine_rgb':
      case 'combine_xyz':
      case 'combine_hsv': {
        const space = channelSpace(node.kind);
        const [x, y, z] = CHANNEL_INPUTS[space].combine;
        return { type: 'combine', space, x: input(x), y: input(y), z: input(z) };
      }

      case 'color_ramp': {
        // HSV blending between stops is linear in RGB when interpolation is too
        const colorMode = node.colorMode === 'HSV' && node.interpolation === 'LINEAR' ? 'RGB' : node.colorMode;
        if (colorMode !== 'RGB') {
          throw new UnsupportedNodeError(node.kind, node.id, `color mode ${node.colorMode}`);
        }
        if (node.interpolation !== 'LINEAR' && node.interpolation !== 'CONSTANT') {
          throw new UnsupportedNodeError(node.kind, node.id, `interpolation ${node.interpolation}`);
        }
        if (node.stops.length === 0) {
          throw new UnsupportedNodeError(node.kind, node.id, 'no color stops');
        }
        return {
          type: 'colorRamp',
          output: socket === 'Alpha' ? 'alpha' : 'color',
          interpolation: node.interpolation,
          stops: [...node.stops].sort((a, b) => a.position - b.position),
          fac: input('Fac'),
        };
      }

      case 'map_range':
        return {
          type: 'mapRange',
          interpolation: node.interpolationType,
          clamp: node.clamp,
          value: input('Value'),
          fromMin: input('FromMin'),
          fromMax: input('FromMax'),
          toMin: input('ToMin'),
          toMax: input('ToMax'),
          steps: input('Steps'),
        };

      case 'hue_saturation':
        return {
          type: 'hueSaturation',
          hue: input('Hue'),
          saturation: input('Saturation'),
          value: input('Value'),
          fac: input('Fac'),
          color: input('Color'),
        };

      case 'group':
        return this.lowerGroup(graph, node, socket, scope);
      case 'group_input':
        if (!scope.inGroup) {
          throw new UnsupportedNodeError(node.kind, node.id, 'group input outside of a group');
        }
        return { type: 'groupInput', socket };
      case 'reroute':
        return input('Input');

      case 'group_output':
      case 'bake_output':
        throw new UnsupportedNodeError(node.kind, node.id);
      case 'foreign':
        throw new UnsupportedNodeError(node.hostType, node.id);

      default: {
        const exhaustive: never = node;
        return exhaustive;
      }
    }
  }

  /**
   * Lowers the sub-graph behind a group instance, then binds its boundary
   * inputs to this instance's inputs in the enclosing graph.
   */
  private lowerGroup(graph: MaterialGraph, node: GroupNode, socket: string, scope: Scope): Expression {
    const { tree } = node;
    const output = findActiveGroupOutput(tree);
    if (!output) {
      throw new UnsupportedNodeError(node.kind, node.id, `group '${tree.name}' has no active output`);
    }

    if (this.options.debug) {
      console.debug(`[Reifier] Entering group '${tree.name}' through '${node.id}.${socket}'`);
    }

    const template = this.lowerInput(tree, output, socket, { seen: scope.seen, inGroup: true });
    const inner = substitute(template, inputSocket => this.lowerInput(graph, node, inputSocket, scope));
    return { type: 'group', name: tree.name, inner };
  }
}

const channelSpace = (kind: `separate_${ChannelSpace}` | `combine_${ChannelSpace}`): ChannelSpace => {
  switch (kind) {
    case 'separate_rgb':
    case 'combine_rgb':
      return 'rgb';
    case 'separate_xyz':
    case 'combine_xyz':
      return 'xyz';
    case 'separate_hsv':
    case 'combine_hsv':
      return 'hsv';
  }
};

// ------------------------------------------------------------------
// Entry points
// ------------------------------------------------------------------

/**
 * Lowers an input socket of a root node (typically a bake output input) to an
 * Expression tree.
 */
export const reify = (graph: MaterialGraph, socket: SocketRef, options?: ReifyOptions): Expression => {
  const root = findNode(graph, socket.node);
  if (!root) {
    throw new UnsupportedNodeError('missing', socket.node, `no such node in graph '${graph.name}'`);
  }
  return new Reifier(options).reifyInput(graph, root, socket.socket);
};

/** Lowers an output socket of any node in `graph`. */
export const reifyOutput = (graph: MaterialGraph, socket: SocketRef, options?: ReifyOptions): Expression =>
  new Reifier(options).reifyOutput(graph, socket);

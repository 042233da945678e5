import { z } from 'zod';
import {
  BLEND_MODES,
  CLAMP_TYPES,
  GraphNode,
  MAP_RANGE_INTERPOLATIONS,
  MATH_OPERATIONS,
  Material,
  MaterialGraph,
  RAMP_COLOR_MODES,
  RAMP_INTERPOLATIONS,
  VECTOR_MATH_OPERATIONS,
} from './types';
import { NodeDefs } from './node-defs';

// ------------------------------------------------------------------
// Validation Types
// ------------------------------------------------------------------

export interface ValidationError {
  path: string[];
  message: string;
  code: string;
}

export interface MaterialDocument {
  version: number;
  materials: Material[];
  groups: MaterialGraph[];
}

export type LoadResult =
  | { success: true; data: MaterialDocument }
  | { success: false; errors: ValidationError[] };

// ------------------------------------------------------------------
// Zod Schemas
// ------------------------------------------------------------------

const Color3Schema = z.tuple([z.number(), z.number(), z.number()]);
const Color4Schema = z.tuple([z.number(), z.number(), z.number(), z.number()]);
const SocketValueSchema = z.union([z.number(), Color3Schema, Color4Schema]);

const SocketRefSchema = z.object({
  node: z.string(),
  socket: z.string(),
});

const LinkSchema = z.object({
  from: SocketRefSchema,
  to: SocketRefSchema,
});

const nodeBase = {
  id: z.string().min(1),
  label: z.string().optional(),
  inputs: z.record(SocketValueSchema).optional(),
};

const RampStopSchema = z.object({
  position: z.number(),
  color: z.union([Color4Schema, Color3Schema.transform(([r, g, b]): [number, number, number, number] => [r, g, b, 1])]),
});

const KnownNodeSchema = z.discriminatedUnion('kind', [
  z.object({ ...nodeBase, kind: z.literal('rgb'), color: z.union([Color3Schema, Color4Schema]) }),
  z.object({ ...nodeBase, kind: z.literal('value'), value: z.number() }),

  z.object({
    ...nodeBase,
    kind: z.literal('attribute'),
    attributeName: z.string(),
    attributeType: z.enum(['GEOMETRY', 'OBJECT', 'INSTANCER', 'VIEW_LAYER']).optional(),
  }),
  z.object({ ...nodeBase, kind: z.literal('vertex_color'), layerName: z.string() }),
  z.object({ ...nodeBase, kind: z.literal('geometry') }),

  z.object({
    ...nodeBase,
    kind: z.literal('math'),
    operation: z.enum(MATH_OPERATIONS),
    useClamp: z.boolean().default(false),
  }),
  z.object({
    ...nodeBase,
    kind: z.literal('vector_math'),
    operation: z.enum(VECTOR_MATH_OPERATIONS),
  }),

  z.object({
    ...nodeBase,
    kind: z.literal('mix_rgb'),
    blendType: z.enum(BLEND_MODES).default('MIX'),
    useClamp: z.boolean().default(false),
  }),
  z.object({
    ...nodeBase,
    kind: z.literal('mix'),
    dataType: z.enum(['RGBA', 'FLOAT', 'VECTOR']),
    blendType: z.enum(BLEND_MODES).default('MIX'),
    clampResult: z.boolean().default(false),
  }),

  z.object({ ...nodeBase, kind: z.literal('rgb_to_bw') }),
  z.object({ ...nodeBase, kind: z.literal('invert') }),
  z.object({ ...nodeBase, kind: z.literal('clamp'), clampType: z.enum(CLAMP_TYPES).default('MINMAX') }),
  z.object({ ...nodeBase, kind: z.literal('gamma') }),
  z.object({ ...nodeBase, kind: z.literal('bright_contrast') }),

  z.object({ ...nodeBase, kind: z.literal('separate_rgb') }),
  z.object({ ...nodeBase, kind: z.literal('separate_xyz') }),
  z.object({ ...nodeBase, kind: z.literal('separate_hsv') }),
  z.object({ ...nodeBase, kind: z.literal('combine_rgb') }),
  z.object({ ...nodeBase, kind: z.literal('combine_xyz') }),
  z.object({ ...nodeBase, kind: z.literal('combine_hsv') }),

  z.object({
    ...nodeBase,
    kind: z.literal('color_ramp'),
    colorMode: z.enum(RAMP_COLOR_MODES).default('RGB'),
    interpolation: z.enum(RAMP_INTERPOLATIONS).default('LINEAR'),
    stops: z.array(RampStopSchema).min(1),
  }),
  z.object({
    ...nodeBase,
    kind: z.literal('map_range'),
    interpolationType: z.enum(MAP_RANGE_INTERPOLATIONS).default('LINEAR'),
    clamp: z.boolean().default(true),
  }),
  z.object({ ...nodeBase, kind: z.literal('hue_saturation') }),

  // Group instances name their sub-graph; the loader swaps in the graph object.
  z.object({ ...nodeBase, kind: z.literal('group'), group: z.string() }),
  z.object({ ...nodeBase, kind: z.literal('group_input') }),
  z.object({ ...nodeBase, kind: z.literal('group_output'), isActiveOutput: z.boolean().optional() }),
  z.object({ ...nodeBase, kind: z.literal('reroute') }),
  z.object({ ...nodeBase, kind: z.literal('bake_output') }),
  z.object({ ...nodeBase, kind: z.literal('foreign'), hostType: z.string() }),
]);

const KNOWN_KINDS: ReadonlySet<string> = new Set(Object.keys(NodeDefs));

// Any other kind is kept as an opaque `foreign` node, so documents exported
// from a richer editor still load; lowering fails only if a baked socket
// depends on it.
const NodeSchema = z.preprocess(raw => {
  if (typeof raw === 'object' && raw !== null && 'kind' in raw && typeof raw.kind === 'string' && !KNOWN_KINDS.has(raw.kind)) {
    return { ...raw, kind: 'foreign', hostType: raw.kind };
  }
  return raw;
}, KnownNodeSchema);

const GraphSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  nodes: z.array(NodeSchema),
  links: z.array(LinkSchema).default([]),
});

export const MaterialDocumentSchema = z.object({
  version: z.literal(1),
  materials: z.array(z.object({ name: z.string(), graph: GraphSchema })),
  groups: z.array(GraphSchema).default([]),
});

type GraphDoc = z.infer<typeof GraphSchema>;
type NodeDoc = z.infer<typeof NodeSchema>;

// ------------------------------------------------------------------
// Validation
// ------------------------------------------------------------------

const semanticError = (path: (string | number)[], message: string): ValidationError => ({
  path: path.map(String),
  message,
  code: 'semantic_error',
});

const outputsOf = (node: NodeDoc): readonly string[] | undefined => {
  const def = NodeDefs[node.kind];
  return def.dynamicSockets ? undefined : def.outputs;
};

const inputsOf = (node: NodeDoc): readonly string[] | undefined => {
  const def = NodeDefs[node.kind];
  return def.dynamicSockets ? undefined : Object.keys(def.inputs);
};

const validateGraph = (graph: GraphDoc, path: (string | number)[], groupIds: ReadonlySet<string>): ValidationError[] => {
  const errors: ValidationError[] = [];
  const nodes = new Map<string, NodeDoc>();

  graph.nodes.forEach((node, idx) => {
    if (nodes.has(node.id)) {
      errors.push(semanticError([...path, 'nodes', idx, 'id'], `Duplicate Node ID '${node.id}' in graph '${graph.id}'.`));
    }
    nodes.set(node.id, node);

    if (node.kind === 'group' && !groupIds.has(node.group)) {
      errors.push(semanticError([...path, 'nodes', idx, 'group'], `Node '${node.id}' references unknown group '${node.group}'.`));
    }
  });

  const linkedInputs = new Set<string>();
  graph.links.forEach((link, idx) => {
    const linkPath = [...path, 'links', idx];
    const source = nodes.get(link.from.node);
    const target = nodes.get(link.to.node);

    if (!source) {
      errors.push(semanticError([...linkPath, 'from', 'node'], `Link source '${link.from.node}' does not exist.`));
    } else {
      const outputs = outputsOf(source);
      if (outputs && !outputs.includes(link.from.socket)) {
        errors.push(semanticError([...linkPath, 'from', 'socket'],
          `Node '${source.id}' (${source.kind}) has no output '${link.from.socket}'.`));
      }
    }

    if (!target) {
      errors.push(semanticError([...linkPath, 'to', 'node'], `Link target '${link.to.node}' does not exist.`));
    } else {
      const inputs = inputsOf(target);
      if (inputs && !inputs.includes(link.to.socket)) {
        errors.push(semanticError([...linkPath, 'to', 'socket'],
          `Node '${target.id}' (${target.kind}) has no input '${link.to.socket}'.`));
      }
    }

    const inputKey = `${link.to.node}\u0000${link.to.socket}`;
    if (linkedInputs.has(inputKey)) {
      errors.push(semanticError([...linkPath, 'to'],
        `Input '${link.to.socket}' of node '${link.to.node}' has more than one incoming link.`));
    }
    linkedInputs.add(inputKey);
  });

  return errors;
};

// ------------------------------------------------------------------
// Linking
// ------------------------------------------------------------------

/**
 * Builds in-memory graphs. Graph objects are created before their nodes so a
 * group node can point at any group, including one defined later.
 */
const linkDocument = (materials: { name: string; graph: GraphDoc }[], groups: GraphDoc[]): MaterialDocument => {
  const shells = new Map<string, MaterialGraph>();
  const shellFor = (doc: GraphDoc): MaterialGraph => {
    const shell: MaterialGraph = { id: doc.id, name: doc.name, nodes: [], links: doc.links };
    shells.set(doc.id, shell);
    return shell;
  };

  const groupGraphs = groups.map(shellFor);
  const materialList = materials.map(m => ({ name: m.name, graph: shellFor(m.graph) }));

  const toGraphNode = (node: NodeDoc): GraphNode => {
    if (node.kind !== 'group') return node;
    const tree = shells.get(node.group);
    if (!tree) throw new Error(`Internal Error: group '${node.group}' was validated but not linked`);
    const { group: _group, ...rest } = node;
    return { ...rest, tree };
  };

  for (const doc of [...groups, ...materials.map(m => m.graph)]) {
    const shell = shells.get(doc.id);
    if (shell) shell.nodes = doc.nodes.map(toGraphNode);
  }

  return { version: 1, materials: materialList, groups: groupGraphs };
};

/**
 * Validates a JSON material document and links it into graphs ready for
 * `reify`. Structural problems come from zod; graph invariants (unique IDs,
 * one link per input, resolvable groups) are reported as `semantic_error`.
 */
export function loadMaterialDocument(json: unknown): LoadResult {
  const result = MaterialDocumentSchema.safeParse(json);

  // 1. Structural Validation (Zod)
  if (!result.success) {
    const errors: ValidationError[] = result.error.issues.map(err => ({
      path: err.path.map(String),
      message: err.message,
      code: err.code,
    }));
    return { success: false, errors };
  }

  const doc = result.data;
  const errors: ValidationError[] = [];

  // 2. Semantic Validation
  const graphIds = new Set<string>();
  const checkGraphId = (graph: GraphDoc, path: (string | number)[]) => {
    if (graphIds.has(graph.id)) {
      errors.push(semanticError([...path, 'id'], `Duplicate Graph ID '${graph.id}'.`));
    }
    graphIds.add(graph.id);
  };
  doc.groups.forEach((g, idx) => checkGraphId(g, ['groups', idx]));
  doc.materials.forEach((m, idx) => checkGraphId(m.graph, ['materials', idx, 'graph']));

  const groupIds = new Set(doc.groups.map(g => g.id));
  doc.groups.forEach((g, idx) => errors.push(...validateGraph(g, ['groups', idx], groupIds)));
  doc.materials.forEach((m, idx) => errors.push(...validateGraph(m.graph, ['materials', idx, 'graph'], groupIds)));

  if (errors.length > 0) {
    return { success: false, errors };
  }

  return { success: true, data: linkDocument(doc.materials, doc.groups) };
}

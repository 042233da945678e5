// ------------------------------------------------------------------
// Sockets & Links
// ------------------------------------------------------------------

export type Color3Value = readonly [number, number, number];
export type Color4Value = readonly [number, number, number, number];

/** A socket constant: a number is a scalar, a tuple a color or vector (alpha ignored). */
export type SocketValue = number | Color3Value | Color4Value;

export type SocketKind = 'color' | 'vector' | 'scalar';

export interface SocketRef {
  node: string;   // Node ID within the owning graph
  socket: string; // Socket identifier on that node
}

// Directed wire: output socket -> input socket.
export interface Link {
  from: SocketRef;
  to: SocketRef;
}

// ------------------------------------------------------------------
// Operations
// ------------------------------------------------------------------

export const MATH_OPERATIONS = [
  'ADD', 'SUBTRACT', 'MULTIPLY', 'DIVIDE', 'MULTIPLY_ADD',
  'POWER', 'LOGARITHM', 'SQRT', 'INVERSE_SQRT', 'ABSOLUTE', 'EXPONENT',
  'MINIMUM', 'MAXIMUM', 'LESS_THAN', 'GREATER_THAN', 'SIGN', 'COMPARE',
  'SMOOTH_MIN', 'SMOOTH_MAX',
  'ROUND', 'FLOOR', 'CEIL', 'TRUNC', 'FRACT', 'MODULO', 'WRAP', 'SNAP', 'PINGPONG',
  'SINE', 'COSINE', 'TANGENT', 'ARCSINE', 'ARCCOSINE', 'ARCTANGENT', 'ARCTAN2',
  'SINH', 'COSH', 'TANH',
  'RADIANS', 'DEGREES',
] as const;
export type MathOperation = typeof MATH_OPERATIONS[number];

export const VECTOR_OPERATIONS = [
  'ADD', 'SUBTRACT', 'MULTIPLY', 'DIVIDE', 'MULTIPLY_ADD', 'SCALE',
  'CROSS_PRODUCT', 'NORMALIZE', 'FACEFORWARD',
  'MINIMUM', 'MAXIMUM', 'ABSOLUTE', 'FLOOR', 'CEIL', 'FRACTION', 'SNAP', 'MODULO',
  'SINE', 'COSINE', 'TANGENT',
] as const;
export type VectorOperation = typeof VECTOR_OPERATIONS[number];

// Vector math operations whose result lives on the scalar `Value` output.
export const VECTOR_SCALAR_OPERATIONS = ['DOT_PRODUCT', 'LENGTH', 'DISTANCE'] as const;
export type VectorScalarOperation = typeof VECTOR_SCALAR_OPERATIONS[number];
export const VECTOR_MATH_OPERATIONS = [...VECTOR_OPERATIONS, ...VECTOR_SCALAR_OPERATIONS] as const;

export const RGB_BLEND_MODES = [
  'MIX', 'DARKEN', 'MULTIPLY', 'BURN', 'LIGHTEN', 'SCREEN', 'DODGE', 'ADD',
  'OVERLAY', 'SOFT_LIGHT', 'LINEAR_LIGHT', 'DIFFERENCE', 'SUBTRACT', 'DIVIDE',
] as const;
export const HSV_BLEND_MODES = ['HUE', 'SATURATION', 'VALUE', 'COLOR'] as const;
export const BLEND_MODES = [...RGB_BLEND_MODES, ...HSV_BLEND_MODES] as const;
export type RgbBlendMode = typeof RGB_BLEND_MODES[number];
export type HsvBlendMode = typeof HSV_BLEND_MODES[number];
export type BlendMode = RgbBlendMode | HsvBlendMode;

export const RAMP_INTERPOLATIONS = ['LINEAR', 'CONSTANT', 'EASE', 'CARDINAL', 'B_SPLINE'] as const;
export type RampInterpolation = typeof RAMP_INTERPOLATIONS[number];

export const RAMP_COLOR_MODES = ['RGB', 'HSV', 'HSL'] as const;
export type RampColorMode = typeof RAMP_COLOR_MODES[number];

export const MAP_RANGE_INTERPOLATIONS = ['LINEAR', 'STEPPED', 'SMOOTHSTEP', 'SMOOTHERSTEP'] as const;
export type MapRangeInterpolation = typeof MAP_RANGE_INTERPOLATIONS[number];

export const CLAMP_TYPES = ['MINMAX', 'RANGE'] as const;
export type ClampType = typeof CLAMP_TYPES[number];

export type ChannelSpace = 'rgb' | 'xyz' | 'hsv';

export interface RampStop {
  position: number;
  color: Color4Value;
}

// ------------------------------------------------------------------
// Nodes
// ------------------------------------------------------------------

interface NodeBase {
  id: string;
  label?: string;
  // Constants for unconnected input sockets, keyed by socket ID.
  // Overrides the per-kind fallback in node-defs.ts.
  inputs?: Readonly<Record<string, SocketValue>>;
}

export interface RgbNode extends NodeBase { kind: 'rgb'; color: Color3Value | Color4Value }
export interface ValueNode extends NodeBase { kind: 'value'; value: number }

export interface AttributeNode extends NodeBase {
  kind: 'attribute';
  attributeName: string;
  attributeType?: 'GEOMETRY' | 'OBJECT' | 'INSTANCER' | 'VIEW_LAYER';
}

export interface VertexColorNode extends NodeBase { kind: 'vertex_color'; layerName: string }
export interface GeometryNode extends NodeBase { kind: 'geometry' }

export interface MathNode extends NodeBase { kind: 'math'; operation: MathOperation; useClamp: boolean }

export interface VectorMathNode extends NodeBase {
  kind: 'vector_math';
  operation: typeof VECTOR_MATH_OPERATIONS[number];
}

export interface MixRgbNode extends NodeBase { kind: 'mix_rgb'; blendType: BlendMode; useClamp: boolean }

export interface MixNode extends NodeBase {
  kind: 'mix';
  dataType: 'RGBA' | 'FLOAT' | 'VECTOR';
  blendType: BlendMode;
  clampResult: boolean;
}

export interface RgbToBwNode extends NodeBase { kind: 'rgb_to_bw' }
export interface InvertNode extends NodeBase { kind: 'invert' }
export interface ClampNode extends NodeBase { kind: 'clamp'; clampType: ClampType }
export interface GammaNode extends NodeBase { kind: 'gamma' }
export interface BrightContrastNode extends NodeBase { kind: 'bright_contrast' }

export interface SeparateNode extends NodeBase { kind: 'separate_rgb' | 'separate_xyz' | 'separate_hsv' }
export interface CombineNode extends NodeBase { kind: 'combine_rgb' | 'combine_xyz' | 'combine_hsv' }

export interface ColorRampNode extends NodeBase {
  kind: 'color_ramp';
  colorMode: RampColorMode;
  interpolation: RampInterpolation;
  stops: readonly RampStop[];
}

export interface MapRangeNode extends NodeBase {
  kind: 'map_range';
  interpolationType: MapRangeInterpolation;
  clamp: boolean;
}

export interface HueSaturationNode extends NodeBase { kind: 'hue_saturation' }

// Instance of a reusable sub-graph. Its `inputs` and incoming links bind the
// sub-graph's group input sockets.
export interface GroupNode extends NodeBase { kind: 'group'; tree: MaterialGraph }
export interface GroupInputNode extends NodeBase { kind: 'group_input' }
export interface GroupOutputNode extends NodeBase { kind: 'group_output'; isActiveOutput?: boolean }
export interface RerouteNode extends NodeBase { kind: 'reroute' }

// Root node of a track material: the sockets the bake layer reads.
export interface BakeOutputNode extends NodeBase { kind: 'bake_output' }

// A node the authoring host knows about but the engine does not model.
export interface ForeignNode extends NodeBase { kind: 'foreign'; hostType: string }

export type GraphNode =
  | RgbNode | ValueNode
  | AttributeNode | VertexColorNode | GeometryNode
  | MathNode | VectorMathNode
  | MixRgbNode | MixNode
  | RgbToBwNode | InvertNode | ClampNode | GammaNode | BrightContrastNode
  | SeparateNode | CombineNode
  | ColorRampNode | MapRangeNode | HueSaturationNode
  | GroupNode | GroupInputNode | GroupOutputNode | RerouteNode
  | BakeOutputNode | ForeignNode;

export type NodeKind = GraphNode['kind'];

// ------------------------------------------------------------------
// Graphs
// ------------------------------------------------------------------

export interface MaterialGraph {
  id: string;
  name: string;
  nodes: readonly GraphNode[];
  links: readonly Link[];
}

export interface Material {
  name: string;
  graph: MaterialGraph;
}

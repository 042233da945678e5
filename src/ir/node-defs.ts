import { NodeKind, SocketKind, SocketValue } from './types';

// ------------------------------------------------------------------
// Socket Definitions
// ------------------------------------------------------------------

export interface InputSocketDef {
  kind: SocketKind;
  default: SocketValue;
}

export interface NodeDef {
  doc: string;
  inputs: Record<string, InputSocketDef>;
  /** Output socket IDs. Empty for kinds whose outputs are declared per instance. */
  outputs: readonly string[];
  /** If true, sockets beyond `inputs` come from the node's own `inputs` map. */
  dynamicSockets?: boolean;
}

/**
 * Helper to define a node kind with docstrings.
 */
export function defineNode(def: NodeDef): NodeDef {
  return def;
}

const scalar = (value: number): InputSocketDef => ({ kind: 'scalar', default: value });
const color = (r: number, g: number, b: number): InputSocketDef => ({ kind: 'color', default: [r, g, b] });
const vector = (x: number, y: number, z: number): InputSocketDef => ({ kind: 'vector', default: [x, y, z] });

export const NodeDefs: { [K in NodeKind]: NodeDef } = {
  rgb: defineNode({ doc: 'Constant color', inputs: {}, outputs: ['Color'] }),
  value: defineNode({ doc: 'Constant scalar', inputs: {}, outputs: ['Value'] }),

  attribute: defineNode({
    doc: 'Reads a named per-element attribute',
    inputs: {},
    outputs: ['Color', 'Vector', 'Fac', 'Alpha'],
  }),
  vertex_color: defineNode({
    doc: 'Reads a named color layer',
    inputs: {},
    outputs: ['Color', 'Alpha'],
  }),
  geometry: defineNode({
    doc: 'Per-element geometry data. Only Position and Normal are baked.',
    inputs: {},
    outputs: ['Position', 'Normal', 'Tangent', 'TrueNormal', 'Incoming', 'Parametric', 'Backfacing', 'Pointiness', 'RandomPerIsland'],
  }),

  math: defineNode({
    doc: 'Scalar arithmetic on A, B and C',
    inputs: { A: scalar(0.5), B: scalar(0.5), C: scalar(0.5) },
    outputs: ['Value'],
  }),
  vector_math: defineNode({
    doc: 'Vector arithmetic; DOT_PRODUCT, LENGTH and DISTANCE produce Value, the rest Vector',
    inputs: { A: vector(0, 0, 0), B: vector(0, 0, 0), C: vector(0, 0, 0), Scale: scalar(1) },
    outputs: ['Vector', 'Value'],
  }),

  mix_rgb: defineNode({
    doc: 'Blends Color2 over Color1 by Fac',
    inputs: { Fac: scalar(0.5), Color1: color(0.5, 0.5, 0.5), Color2: color(0.5, 0.5, 0.5) },
    outputs: ['Color'],
  }),
  mix: defineNode({
    doc: 'Typed mix; RGBA blends colors, FLOAT interpolates scalars',
    inputs: {
      Factor: scalar(0.5),
      A_Float: scalar(0),
      B_Float: scalar(0),
      A_Color: color(0.5, 0.5, 0.5),
      B_Color: color(0.5, 0.5, 0.5),
    },
    outputs: ['Result'],
  }),

  rgb_to_bw: defineNode({ doc: 'Luminance of Color', inputs: { Color: color(0.5, 0.5, 0.5) }, outputs: ['Val'] }),
  invert: defineNode({
    doc: 'Inverts Color, blended by Fac',
    inputs: { Fac: scalar(1), Color: color(0, 0, 0) },
    outputs: ['Color'],
  }),
  clamp: defineNode({
    doc: 'Clamps Value between Min and Max',
    inputs: { Value: scalar(1), Min: scalar(0), Max: scalar(1) },
    outputs: ['Result'],
  }),
  gamma: defineNode({
    doc: 'Raises positive channels to Gamma',
    inputs: { Color: color(1, 1, 1), Gamma: scalar(1) },
    outputs: ['Color'],
  }),
  bright_contrast: defineNode({
    doc: 'Brightness/contrast adjustment',
    inputs: { Color: color(1, 1, 1), Bright: scalar(0), Contrast: scalar(0) },
    outputs: ['Color'],
  }),

  separate_rgb: defineNode({ doc: 'Splits a color', inputs: { Image: color(0.8, 0.8, 0.8) }, outputs: ['R', 'G', 'B'] }),
  separate_xyz: defineNode({ doc: 'Splits a vector', inputs: { Vector: vector(0, 0, 0) }, outputs: ['X', 'Y', 'Z'] }),
  separate_hsv: defineNode({ doc: 'Splits a color into HSV', inputs: { Color: color(0.8, 0.8, 0.8) }, outputs: ['H', 'S', 'V'] }),
  combine_rgb: defineNode({
    doc: 'Builds a color from channels',
    inputs: { R: scalar(0), G: scalar(0), B: scalar(0) },
    outputs: ['Image'],
  }),
  combine_xyz: defineNode({
    doc: 'Builds a vector from components',
    inputs: { X: scalar(0), Y: scalar(0), Z: scalar(0) },
    outputs: ['Vector'],
  }),
  combine_hsv: defineNode({
    doc: 'Builds a color from HSV channels',
    inputs: { H: scalar(0), S: scalar(0), V: scalar(0) },
    outputs: ['Color'],
  }),

  color_ramp: defineNode({
    doc: 'Piecewise color gradient over Fac',
    inputs: { Fac: scalar(0.5) },
    outputs: ['Color', 'Alpha'],
  }),
  map_range: defineNode({
    doc: 'Remaps Value from one interval to another',
    inputs: {
      Value: scalar(1),
      FromMin: scalar(0),
      FromMax: scalar(1),
      ToMin: scalar(0),
      ToMax: scalar(1),
      Steps: scalar(4),
    },
    outputs: ['Result'],
  }),
  hue_saturation: defineNode({
    doc: 'Hue rotation, saturation and value scaling',
    inputs: { Hue: scalar(0.5), Saturation: scalar(1), Value: scalar(1), Fac: scalar(1), Color: color(0.8, 0.8, 0.8) },
    outputs: ['Color'],
  }),

  group: defineNode({ doc: 'Instance of a sub-graph', inputs: {}, outputs: [], dynamicSockets: true }),
  group_input: defineNode({ doc: 'Boundary inputs of a sub-graph', inputs: {}, outputs: [], dynamicSockets: true }),
  group_output: defineNode({ doc: 'Boundary outputs of a sub-graph', inputs: {}, outputs: [], dynamicSockets: true }),
  reroute: defineNode({ doc: 'Passthrough', inputs: { Input: color(0, 0, 0) }, outputs: ['Output'] }),

  bake_output: defineNode({
    doc: 'Track material root; each input is baked per element',
    inputs: {
      Color: color(1, 1, 1),
      Alpha: scalar(1),
      SwayFrequency: scalar(0),
      SwayAmplitude: scalar(0),
      SwayPhase: scalar(0),
      SpecularStrength: scalar(0),
    },
    outputs: [],
    dynamicSockets: true,
  }),

  foreign: defineNode({ doc: 'Node kind the engine does not model', inputs: {}, outputs: [], dynamicSockets: true }),
};

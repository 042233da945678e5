/**
 * @file vertex-bake.ts
 * @description Per-corner bakes of a track material's output sockets.
 *
 * @external-interactions
 * - Reads the material's `bake_output` node; socket names come from
 *   `BAKE_OUTPUT_SOCKETS` in constants.ts.
 * - Each bake reifies and evaluates independently, so a failing socket does
 *   not affect the others.
 *
 * @pitfalls
 * - Vertex colors are packed BGRA, not RGBA.
 * - Only `ShadingError`s are wrapped in `MaterialBakeError`; anything else is
 *   a defect and propagates untouched.
 */
import { BAKE_OUTPUT_SOCKETS, BYTE_SCALE, BakeOutputSocket } from '../constants';
import { BakeOutputNode, Material, MaterialGraph } from '../ir/types';
import { Expression } from '../ir/expression';
import { printExpression } from '../ir/analyzer';
import { ElementContext } from '../interpreter/context';
import { evaluateColor, evaluateScalar } from '../interpreter/evaluator';
import { ReifyOptions, Reifier } from '../reify/reifier';
import { roundHalfEven, saturate } from '../color/color-utils';
import {
  MaterialBakeError,
  NoBakeOutputError,
  ShadingError,
  UnsupportedNodeError,
  UnsupportedSocketError,
} from '../errors';

export type BakeOptions = ReifyOptions;

export interface SwayBake {
  angularFrequency: Float64Array;
  amplitude: Float64Array;
  phaseOffset: Float64Array;
}

export const findBakeOutput = (graph: MaterialGraph): BakeOutputNode => {
  for (const node of graph.nodes) {
    if (node.kind === 'bake_output') return node;
  }
  throw new NoBakeOutputError(graph.name);
};

/**
 * Runs `fn` on behalf of `material`, attaching provenance to any shading
 * error: the socket being baked, and the material name as a wrapper.
 */
const withProvenance = <T>(material: Material, socket: BakeOutputSocket | undefined, fn: () => T): T => {
  try {
    return fn();
  } catch (err) {
    if (socket && (err instanceof UnsupportedNodeError || err instanceof UnsupportedSocketError)) {
      err.bakingSocket = socket;
    }
    if (err instanceof ShadingError && !(err instanceof MaterialBakeError)) {
      throw new MaterialBakeError(material.name, err);
    }
    throw err;
  }
};

const reifySocket = (
  material: Material,
  output: BakeOutputNode,
  socket: BakeOutputSocket,
  options: BakeOptions,
): Expression =>
  withProvenance(material, socket, () => {
    const expr = new Reifier(options).reifyInput(material.graph, output, socket);
    if (options.debug) {
      console.debug(`[Bake] ${material.name}.${socket}:\n${printExpression(expr)}`);
    }
    return expr;
  });

const bakeScalarSocket = (
  material: Material,
  ctx: ElementContext,
  socket: BakeOutputSocket,
  options: BakeOptions,
): Float64Array => {
  const output = withProvenance(material, undefined, () => findBakeOutput(material.graph));
  const expr = reifySocket(material, output, socket, options);
  return withProvenance(material, socket, () => evaluateScalar(expr, ctx));
};

const toByte = (x: number): number => roundHalfEven(saturate(x) * BYTE_SCALE);

/**
 * Bakes Color and Alpha into 4 bytes per element, in B, G, R, A order. Each
 * channel is clamped to [0, 1] before quantizing.
 */
export const bakeVertexColors = (material: Material, ctx: ElementContext, options: BakeOptions = {}): Uint8Array => {
  const output = withProvenance(material, undefined, () => findBakeOutput(material.graph));

  const colorExpr = reifySocket(material, output, BAKE_OUTPUT_SOCKETS.color, options);
  const alphaExpr = reifySocket(material, output, BAKE_OUTPUT_SOCKETS.alpha, options);
  const color = withProvenance(material, BAKE_OUTPUT_SOCKETS.color, () => evaluateColor(colorExpr, ctx));
  const alpha = withProvenance(material, BAKE_OUTPUT_SOCKETS.alpha, () => evaluateScalar(alphaExpr, ctx));

  const bgra = new Uint8Array(ctx.elementCount * 4);
  for (let i = 0; i < ctx.elementCount; i++) {
    bgra[i * 4] = toByte(color[i * 3 + 2]);
    bgra[i * 4 + 1] = toByte(color[i * 3 + 1]);
    bgra[i * 4 + 2] = toByte(color[i * 3]);
    bgra[i * 4 + 3] = toByte(alpha[i]);
  }
  return bgra;
};

export const bakeAlpha = (material: Material, ctx: ElementContext, options: BakeOptions = {}): Float64Array =>
  bakeScalarSocket(material, ctx, BAKE_OUTPUT_SOCKETS.alpha, options);

export const bakeSpecularStrength = (material: Material, ctx: ElementContext, options: BakeOptions = {}): Float64Array =>
  bakeScalarSocket(material, ctx, BAKE_OUTPUT_SOCKETS.specularStrength, options);

export const bakeSway = (material: Material, ctx: ElementContext, options: BakeOptions = {}): SwayBake => ({
  angularFrequency: bakeScalarSocket(material, ctx, BAKE_OUTPUT_SOCKETS.swayFrequency, options),
  amplitude: bakeScalarSocket(material, ctx, BAKE_OUTPUT_SOCKETS.swayAmplitude, options),
  phaseOffset: bakeScalarSocket(material, ctx, BAKE_OUTPUT_SOCKETS.swayPhase, options),
});

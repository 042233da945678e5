import { rgbAverage, srgbToLinear } from '../color/color-utils';
import { InvalidElementDataError, MissingAttributeError } from '../errors';

// ------------------------------------------------------------------
// Inputs
// ------------------------------------------------------------------

/** Attribute domain: one value per face corner, or per mesh vertex. */
export type AttributeDomain = 'corner' | 'point';

export interface AttributeLayer {
  name: string;
  domain: AttributeDomain;
  type: 'color' | 'scalar';
  data: ArrayLike<number>;
  components?: 3 | 4;              // Color layers only. Default 4 (RGBA)
  colorSpace?: 'linear' | 'srgb';  // Color layers only. Default linear
}

export interface GeometryBuffer {
  domain: AttributeDomain;
  data: ArrayLike<number>; // xyz interleaved
}

export interface ElementContextInit {
  elementCount: number;
  layers?: readonly AttributeLayer[];
  // Vertex index of every corner; required to expand point-domain data.
  cornerVertexIndices?: ArrayLike<number>;
  position?: GeometryBuffer;
  normal?: GeometryBuffer;
}

export type ResolvedLayer =
  | { type: 'color'; rgb: Float64Array; alpha: Float64Array }
  | { type: 'scalar'; values: Float64Array };

// ------------------------------------------------------------------
// Context
// ------------------------------------------------------------------

/**
 * Per-corner attribute buffers for one mesh. Built once by
 * `createElementContext`, read-only afterwards. Every accessor returns a
 * fresh copy.
 */
export class ElementContext {
  readonly elementCount: number;

  private readonly layers: Map<string, ResolvedLayer>;
  private readonly position?: Float64Array;
  private readonly normal?: Float64Array;

  constructor(
    elementCount: number,
    layers: Map<string, ResolvedLayer>,
    position?: Float64Array,
    normal?: Float64Array,
  ) {
    this.elementCount = elementCount;
    this.layers = layers;
    this.position = position;
    this.normal = normal;
  }

  layerNames(): string[] {
    return [...this.layers.keys()];
  }

  hasLayer(name: string): boolean {
    return this.layers.has(name);
  }

  /** RGB, interleaved 3N. A scalar layer is broadcast to grey. */
  getColor(name: string): Float64Array {
    const layer = this.layer(name);
    if (layer.type === 'color') return layer.rgb.slice();

    const out = new Float64Array(this.elementCount * 3);
    for (let i = 0; i < this.elementCount; i++) {
      const v = layer.values[i];
      out[i * 3] = v;
      out[i * 3 + 1] = v;
      out[i * 3 + 2] = v;
    }
    return out;
  }

  /** Mean of RGB. A scalar layer is returned as-is. */
  getFac(name: string): Float64Array {
    const layer = this.layer(name);
    if (layer.type === 'scalar') return layer.values.slice();

    const out = new Float64Array(this.elementCount);
    for (let i = 0; i < this.elementCount; i++) {
      out[i] = rgbAverage(layer.rgb.subarray(i * 3, i * 3 + 3));
    }
    return out;
  }

  /** Alpha channel (1 for RGB layers). A scalar layer is returned as-is. */
  getAlpha(name: string): Float64Array {
    const layer = this.layer(name);
    return layer.type === 'color' ? layer.alpha.slice() : layer.values.slice();
  }

  getPosition(): Float64Array {
    if (!this.position) throw new MissingAttributeError('position');
    return this.position.slice();
  }

  getNormal(): Float64Array {
    if (!this.normal) throw new MissingAttributeError('normal');
    return this.normal.slice();
  }

  private layer(name: string): ResolvedLayer {
    const layer = this.layers.get(name);
    if (!layer) throw new MissingAttributeError(name);
    return layer;
  }
}

// ------------------------------------------------------------------
// Construction
// ------------------------------------------------------------------

/**
 * Expands `data` (`width` values per item) to one item per corner.
 * Corner-domain data must already hold exactly `elementCount` items.
 */
const toCorners = (
  label: string,
  domain: AttributeDomain,
  data: ArrayLike<number>,
  width: number,
  elementCount: number,
  cornerVertexIndices: ArrayLike<number> | undefined,
): Float64Array => {
  if (data.length % width !== 0) {
    throw new InvalidElementDataError(`'${label}' has ${data.length} values, not a multiple of ${width}`);
  }

  if (domain === 'corner') {
    if (data.length !== elementCount * width) {
      throw new InvalidElementDataError(
        `'${label}' has ${data.length / width} corner values, expected ${elementCount}`);
    }
    return Float64Array.from(data);
  }

  if (!cornerVertexIndices) {
    throw new InvalidElementDataError(`'${label}' is point-domain but no corner vertex indices were given`);
  }

  const pointCount = data.length / width;
  const out = new Float64Array(elementCount * width);
  for (let corner = 0; corner < elementCount; corner++) {
    const vertex = cornerVertexIndices[corner];
    if (!Number.isInteger(vertex) || vertex < 0 || vertex >= pointCount) {
      throw new InvalidElementDataError(
        `corner ${corner} references vertex ${vertex}, but '${label}' has ${pointCount} points`);
    }
    for (let k = 0; k < width; k++) {
      out[corner * width + k] = data[vertex * width + k];
    }
  }
  return out;
};

const resolveLayer = (
  layer: AttributeLayer,
  elementCount: number,
  cornerVertexIndices: ArrayLike<number> | undefined,
): ResolvedLayer => {
  if (layer.type === 'scalar') {
    if (layer.colorSpace === 'srgb') {
      console.warn(`[ElementContext] Ignoring sRGB color space on scalar layer '${layer.name}'`);
    }
    return {
      type: 'scalar',
      values: toCorners(layer.name, layer.domain, layer.data, 1, elementCount, cornerVertexIndices),
    };
  }

  const components = layer.components ?? 4;
  const raw = toCorners(layer.name, layer.domain, layer.data, components, elementCount, cornerVertexIndices);
  const decode = layer.colorSpace === 'srgb' ? srgbToLinear : (x: number) => x;

  const rgb = new Float64Array(elementCount * 3);
  const alpha = new Float64Array(elementCount).fill(1);
  for (let i = 0; i < elementCount; i++) {
    rgb[i * 3] = decode(raw[i * components]);
    rgb[i * 3 + 1] = decode(raw[i * components + 1]);
    rgb[i * 3 + 2] = decode(raw[i * components + 2]);
    if (components === 4) alpha[i] = raw[i * 4 + 3];
  }
  return { type: 'color', rgb, alpha };
};

export const createElementContext = (init: ElementContextInit): ElementContext => {
  const { elementCount, cornerVertexIndices } = init;
  if (!Number.isInteger(elementCount) || elementCount < 0) {
    throw new InvalidElementDataError(`element count must be a non-negative integer, got ${elementCount}`);
  }
  if (cornerVertexIndices && cornerVertexIndices.length !== elementCount) {
    throw new InvalidElementDataError(
      `corner vertex index table has ${cornerVertexIndices.length} entries, expected ${elementCount}`);
  }

  const layers = new Map<string, ResolvedLayer>();
  for (const layer of init.layers ?? []) {
    if (layers.has(layer.name)) {
      throw new InvalidElementDataError(`duplicate attribute layer '${layer.name}'`);
    }
    layers.set(layer.name, resolveLayer(layer, elementCount, cornerVertexIndices));
  }

  const geometry = (label: string, buffer: GeometryBuffer | undefined): Float64Array | undefined =>
    buffer && toCorners(label, buffer.domain, buffer.data, 3, elementCount, cornerVertexIndices);

  return new ElementContext(
    elementCount,
    layers,
    geometry('position', init.position),
    geometry('normal', init.normal),
  );
};

import {
  ColorRampExpr,
  Expression,
  MapRangeExpr,
} from '../ir/expression';
import { Color4Value, RampStop } from '../ir/types';
import {
  Color3,
  clamp,
  hsvToRgb,
  luminance,
  rgbToHsv,
  safeDivide,
  saturate,
  smootherstep,
  smoothstep,
} from '../color/color-utils';
import { UnhandledOperationError } from '../errors';
import { ElementContext } from './context';
import { blendClamps, getBlendOp, getMathOp, getVectorOp, getVectorScalarOp } from './ops';

// ------------------------------------------------------------------
// Buffers
// ------------------------------------------------------------------
// Colors are interleaved RGB (length 3N), scalars one value per element (N).

const fillColor = (rgb: readonly number[], n: number): Float64Array => {
  const out = new Float64Array(n * 3);
  for (let i = 0; i < n; i++) {
    out[i * 3] = rgb[0];
    out[i * 3 + 1] = rgb[1];
    out[i * 3 + 2] = rgb[2];
  }
  return out;
};

const broadcast = (scalars: Float64Array): Float64Array => {
  const out = new Float64Array(scalars.length * 3);
  for (let i = 0; i < scalars.length; i++) {
    out[i * 3] = scalars[i];
    out[i * 3 + 1] = scalars[i];
    out[i * 3 + 2] = scalars[i];
  }
  return out;
};

const toLuminance = (colors: Float64Array): Float64Array => {
  const n = colors.length / 3;
  const out = new Float64Array(n);
  for (let i = 0; i < n; i++) {
    out[i] = luminance(colors.subarray(i * 3, i * 3 + 3));
  }
  return out;
};

const at = (colors: Float64Array, i: number): Color3 => [colors[i * 3], colors[i * 3 + 1], colors[i * 3 + 2]];

const put = (colors: Float64Array, i: number, rgb: readonly number[]) => {
  colors[i * 3] = rgb[0];
  colors[i * 3 + 1] = rgb[1];
  colors[i * 3 + 2] = rgb[2];
};

const clampUnit = (colors: Float64Array): Float64Array => colors.map(saturate);

// ------------------------------------------------------------------
// Color Ramp
// ------------------------------------------------------------------

const lerp4 = (t: number, a: Color4Value, b: Color4Value): Color4Value => [
  (1 - t) * a[0] + t * b[0],
  (1 - t) * a[1] + t * b[1],
  (1 - t) * a[2] + t * b[2],
  (1 - t) * a[3] + t * b[3],
];

/**
 * Right-biased pairwise fold over the sorted stops: each pair overrides the
 * running result once `fac` passes its left stop. Factors outside the stop
 * range take the color of the nearest endpoint.
 */
const sampleRamp = (expr: ColorRampExpr, stops: readonly RampStop[], fac: number): Color4Value => {
  let result = stops[0].color;
  for (let i = 0; i + 1 < stops.length; i++) {
    const left = stops[i];
    const right = stops[i + 1];
    let t: number;
    switch (expr.interpolation) {
      case 'LINEAR':
        t = left.position !== right.position ? (fac - left.position) / (right.position - left.position) : 0;
        break;
      case 'CONSTANT':
        t = 0;
        break;
      default:
        throw new UnhandledOperationError('color ramp interpolation', expr.interpolation);
    }
    if (fac > left.position) result = lerp4(t, left.color, right.color);
  }
  const last = stops[stops.length - 1];
  return fac >= last.position ? last.color : result;
};

const evaluateRamp = (expr: ColorRampExpr, ctx: ElementContext): { rgb: Float64Array; alpha: Float64Array } => {
  if (expr.stops.length === 0) {
    throw new UnhandledOperationError('color ramp', 'empty stop list');
  }
  const fac = evaluateScalar(expr.fac, ctx);
  const n = ctx.elementCount;
  const rgb = new Float64Array(n * 3);
  const alpha = new Float64Array(n);
  for (let i = 0; i < n; i++) {
    const rgba = sampleRamp(expr, expr.stops, fac[i]);
    put(rgb, i, rgba);
    alpha[i] = rgba[3];
  }
  return { rgb, alpha };
};

// ------------------------------------------------------------------
// Map Range
// ------------------------------------------------------------------

const mapRangeAt = (
  interpolation: string,
  useClamp: boolean,
  value: number,
  fromMin: number,
  fromMax: number,
  toMin: number,
  toMax: number,
  steps: number,
): number => {
  let factor: number;
  let clampResult = false;
  switch (interpolation) {
    case 'LINEAR':
      factor = safeDivide(value - fromMin, fromMax - fromMin);
      clampResult = useClamp;
      break;
    case 'STEPPED': {
      const linear = safeDivide(value - fromMin, fromMax - fromMin);
      factor = steps > 0 ? Math.floor(linear * (steps + 1)) / steps : 0;
      clampResult = useClamp;
      break;
    }
    case 'SMOOTHSTEP':
      factor = fromMin > fromMax ? 1 - smoothstep(fromMax, fromMin, value) : smoothstep(fromMin, fromMax, value);
      break;
    case 'SMOOTHERSTEP':
      factor = fromMin > fromMax ? 1 - smootherstep(fromMax, fromMin, value) : smootherstep(fromMin, fromMax, value);
      break;
    default:
      throw new UnhandledOperationError('map range interpolation', interpolation);
  }
  const result = toMin + factor * (toMax - toMin);
  if (fromMax === fromMin) return 0;
  return clampResult ? saturate(result) : result;
};

const evaluateMapRange = (expr: MapRangeExpr, ctx: ElementContext): Float64Array => {
  const value = evaluateScalar(expr.value, ctx);
  const fromMin = evaluateScalar(expr.fromMin, ctx);
  const fromMax = evaluateScalar(expr.fromMax, ctx);
  const toMin = evaluateScalar(expr.toMin, ctx);
  const toMax = evaluateScalar(expr.toMax, ctx);
  const steps = evaluateScalar(expr.steps, ctx);
  const out = new Float64Array(ctx.elementCount);
  for (let i = 0; i < out.length; i++) {
    out[i] = mapRangeAt(
      expr.interpolation, expr.clamp, value[i], fromMin[i], fromMax[i], toMin[i], toMax[i], steps[i]);
  }
  return out;
};

// ------------------------------------------------------------------
// Evaluation
// ------------------------------------------------------------------

/**
 * Evaluates `expr` for every element of `ctx` as an interleaved RGB buffer
 * (length 3N). Scalar-valued expressions are broadcast to grey.
 */
export const evaluateColor = (expr: Expression, ctx: ElementContext): Float64Array => {
  const n = ctx.elementCount;

  switch (expr.type) {
    case 'constColor':
      return fillColor(expr.rgb, n);
    case 'attributeColor':
      return ctx.getColor(expr.name);
    case 'geometry':
      return expr.attribute === 'position' ? ctx.getPosition() : ctx.getNormal();

    case 'constScalar':
    case 'attributeScalar':
    case 'math':
    case 'vectorMathScalar':
    case 'grayscale':
    case 'clamp':
    case 'separate':
    case 'mapRange':
      return broadcast(evaluateScalar(expr, ctx));

    case 'vectorMath': {
      const op = getVectorOp(expr.operation);
      const a = evaluateColor(expr.a, ctx);
      const b = evaluateColor(expr.b, ctx);
      const c = evaluateColor(expr.c, ctx);
      const scale = evaluateScalar(expr.scale, ctx);
      const out = new Float64Array(n * 3);
      for (let i = 0; i < n; i++) {
        put(out, i, op(at(a, i), at(b, i), at(c, i), scale[i]));
      }
      return out;
    }

    case 'mix': {
      const blend = getBlendOp(expr.blendType);
      const fac = evaluateScalar(expr.fac, ctx);
      const color1 = evaluateColor(expr.color1, ctx);
      const color2 = evaluateColor(expr.color2, ctx);
      const out = new Float64Array(n * 3);
      for (let i = 0; i < n; i++) {
        put(out, i, blend(fac[i], at(color1, i), at(color2, i)));
      }
      return blendClamps(expr.blendType, expr.clamp) ? clampUnit(out) : out;
    }

    case 'invert': {
      const fac = evaluateScalar(expr.fac, ctx);
      const color = evaluateColor(expr.color, ctx);
      return color.map((c, k) => {
        const f = fac[Math.floor(k / 3)];
        return (1 - c) * f + c * (1 - f);
      });
    }

    case 'brightContrast': {
      const color = evaluateColor(expr.color, ctx);
      const bright = evaluateScalar(expr.bright, ctx);
      const contrast = evaluateScalar(expr.contrast, ctx);
      return color.map((c, k) => {
        const i = Math.floor(k / 3);
        return Math.max((1 + contrast[i]) * c + bright[i] - contrast[i] * 0.5, 0);
      });
    }

    case 'gamma': {
      const color = evaluateColor(expr.color, ctx);
      const gamma = evaluateScalar(expr.gamma, ctx);
      return color.map((c, k) => (c > 0 ? c ** gamma[Math.floor(k / 3)] : c));
    }

    case 'combine': {
      const x = evaluateScalar(expr.x, ctx);
      const y = evaluateScalar(expr.y, ctx);
      const z = evaluateScalar(expr.z, ctx);
      const out = new Float64Array(n * 3);
      for (let i = 0; i < n; i++) {
        put(out, i, expr.space === 'hsv' ? hsvToRgb([x[i], y[i], z[i]]) : [x[i], y[i], z[i]]);
      }
      return out;
    }

    case 'colorRamp': {
      const { rgb, alpha } = evaluateRamp(expr, ctx);
      return expr.output === 'alpha' ? broadcast(alpha) : rgb;
    }

    case 'hueSaturation': {
      const hue = evaluateScalar(expr.hue, ctx);
      const sat = evaluateScalar(expr.saturation, ctx);
      const val = evaluateScalar(expr.value, ctx);
      const fac = evaluateScalar(expr.fac, ctx);
      const color = evaluateColor(expr.color, ctx);
      const out = new Float64Array(n * 3);
      for (let i = 0; i < n; i++) {
        const input = at(color, i);
        const [h, s, v] = rgbToHsv(input);
        const shifted = hsvToRgb([(h + hue[i] + 0.5) % 1, saturate(s * sat[i]), v * val[i]]);
        put(out, i, [0, 1, 2].map(k => Math.max(fac[i] * shifted[k] + (1 - fac[i]) * input[k], 0)));
      }
      return out;
    }

    case 'group':
      return evaluateColor(expr.inner, ctx);
    case 'groupInput':
      throw new UnhandledOperationError('group input', expr.socket);

    default: {
      const exhaustive: never = expr;
      return exhaustive;
    }
  }
};

/**
 * Evaluates `expr` for every element of `ctx` as one scalar per element.
 * Color-valued expressions are reduced by luminance.
 */
export const evaluateScalar = (expr: Expression, ctx: ElementContext): Float64Array => {
  const n = ctx.elementCount;

  switch (expr.type) {
    case 'constScalar':
      return new Float64Array(n).fill(expr.value);
    case 'attributeScalar':
      return expr.channel === 'fac' ? ctx.getFac(expr.name) : ctx.getAlpha(expr.name);

    case 'constColor':
    case 'attributeColor':
    case 'geometry':
    case 'vectorMath':
    case 'mix':
    case 'invert':
    case 'brightContrast':
    case 'gamma':
    case 'combine':
    case 'hueSaturation':
      return toLuminance(evaluateColor(expr, ctx));

    case 'grayscale':
      return toLuminance(evaluateColor(expr.color, ctx));

    case 'math': {
      const op = getMathOp(expr.operation);
      const a = evaluateScalar(expr.a, ctx);
      const b = evaluateScalar(expr.b, ctx);
      const c = evaluateScalar(expr.c, ctx);
      const out = new Float64Array(n);
      for (let i = 0; i < n; i++) {
        const v = op(a[i], b[i], c[i]);
        out[i] = expr.clamp ? saturate(v) : v;
      }
      return out;
    }

    case 'vectorMathScalar': {
      const op = getVectorScalarOp(expr.operation);
      const a = evaluateColor(expr.a, ctx);
      const b = evaluateColor(expr.b, ctx);
      const out = new Float64Array(n);
      for (let i = 0; i < n; i++) {
        out[i] = op(at(a, i), at(b, i));
      }
      return out;
    }

    case 'clamp': {
      if (expr.clampType !== 'MINMAX') {
        throw new UnhandledOperationError('clamp', expr.clampType);
      }
      const value = evaluateScalar(expr.value, ctx);
      const min = evaluateScalar(expr.min, ctx);
      const max = evaluateScalar(expr.max, ctx);
      return value.map((v, i) => clamp(v, min[i], max[i]));
    }

    case 'separate': {
      const input = evaluateColor(expr.input, ctx);
      const out = new Float64Array(n);
      for (let i = 0; i < n; i++) {
        const channels = expr.space === 'hsv' ? rgbToHsv(at(input, i)) : at(input, i);
        out[i] = channels[expr.channel];
      }
      return out;
    }

    case 'colorRamp': {
      const { rgb, alpha } = evaluateRamp(expr, ctx);
      return expr.output === 'alpha' ? alpha : toLuminance(rgb);
    }

    case 'mapRange':
      return evaluateMapRange(expr, ctx);

    case 'group':
      return evaluateScalar(expr.inner, ctx);
    case 'groupInput':
      throw new UnhandledOperationError('group input', expr.socket);

    default: {
      const exhaustive: never = expr;
      return exhaustive;
    }
  }
};

import {
  BlendMode,
  HSV_BLEND_MODES,
  MathOperation,
  VectorOperation,
  VectorScalarOperation,
} from '../ir/types';
import {
  Color3,
  fract,
  hsvToRgb,
  rgbToHsv,
  roundHalfEven,
  safeDivide,
  smoothMin,
} from '../color/color-utils';
import { COMPARE_MIN_EPSILON, POWER_INTEGER_TOLERANCE } from '../constants';
import { UnhandledOperationError } from '../errors';

export type MathOpHandler = (a: number, b: number, c: number) => number;
export type VectorOpHandler = (a: Color3, b: Color3, c: Color3, scale: number) => Color3;
export type VectorScalarOpHandler = (a: Color3, b: Color3) => number;
export type BlendHandler = (fac: number, color1: Color3, color2: Color3) => Color3;

// Element-wise helpers over 3-tuples
const map1 = (a: Color3, fn: (x: number) => number): Color3 => [fn(a[0]), fn(a[1]), fn(a[2])];
const map2 = (a: Color3, b: Color3, fn: (x: number, y: number) => number): Color3 =>
  [fn(a[0], b[0]), fn(a[1], b[1]), fn(a[2], b[2])];

const dot = (a: Color3, b: Color3): number => a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
const length = (a: Color3): number => Math.sqrt(dot(a, a));

const fmod = (a: number, b: number): number => (b === 0 ? 0 : a % b);

// ----------------------------------------------------------------
// Scalar Math
// ----------------------------------------------------------------

const power = (a: number, b: number): number => {
  if (a >= 0) return a ** b;
  // Negative bases only take (near-)integer exponents
  const frac = Math.abs(b % 1);
  if (frac > 1 - POWER_INTEGER_TOLERANCE || frac < POWER_INTEGER_TOLERANCE) {
    return a ** Math.floor(b + 0.5);
  }
  return 0;
};

export const MathOps: { [K in MathOperation]: MathOpHandler } = {
  ADD: (a, b) => a + b,
  SUBTRACT: (a, b) => a - b,
  MULTIPLY: (a, b) => a * b,
  DIVIDE: (a, b) => safeDivide(a, b),
  MULTIPLY_ADD: (a, b, c) => a * b + c,

  POWER: power,
  LOGARITHM: (a, b) => (a > 0 && b > 0 ? Math.log(a) / Math.log(b) : 0),
  SQRT: (a) => (a > 0 ? Math.sqrt(a) : 0),
  INVERSE_SQRT: (a) => (a > 0 ? 1 / Math.sqrt(a) : 0),
  ABSOLUTE: (a) => Math.abs(a),
  EXPONENT: (a) => Math.exp(a),

  MINIMUM: (a, b) => Math.min(a, b),
  MAXIMUM: (a, b) => Math.max(a, b),
  LESS_THAN: (a, b) => (a < b ? 1 : 0),
  GREATER_THAN: (a, b) => (a > b ? 1 : 0),
  SIGN: (a) => Math.sign(a),
  COMPARE: (a, b, c) => (Math.abs(a - b) <= Math.max(c, COMPARE_MIN_EPSILON) ? 1 : 0),
  SMOOTH_MIN: (a, b, c) => smoothMin(a, b, c),
  SMOOTH_MAX: (a, b, c) => -smoothMin(-a, -b, c),

  ROUND: roundHalfEven,
  FLOOR: (a) => Math.floor(a),
  CEIL: (a) => Math.ceil(a),
  TRUNC: (a) => Math.trunc(a),
  FRACT: fract,
  MODULO: fmod,
  WRAP: (a, b, c) => {
    const range = b - c;
    return range !== 0 ? a - range * Math.floor((a - c) / range) : c;
  },
  SNAP: (a, b) => (a === 0 || b === 0 ? 0 : Math.floor(a / b) * b),
  PINGPONG: (a, b) => (b === 0 ? 0 : Math.abs(fract((a - b) / (b * 2)) * b * 2 - b)),

  SINE: (a) => Math.sin(a),
  COSINE: (a) => Math.cos(a),
  TANGENT: (a) => Math.tan(a),
  ARCSINE: (a) => Math.asin(a),
  ARCCOSINE: (a) => Math.acos(a),
  ARCTANGENT: (a) => Math.atan(a),
  ARCTAN2: (a, b) => Math.atan2(a, b),
  SINH: (a) => Math.sinh(a),
  COSH: (a) => Math.cosh(a),
  TANH: (a) => Math.tanh(a),

  RADIANS: (a) => (a * Math.PI) / 180,
  DEGREES: (a) => (a * 180) / Math.PI,
};

// ----------------------------------------------------------------
// Vector Math
// ----------------------------------------------------------------

export const VectorOps: { [K in VectorOperation]: VectorOpHandler } = {
  ADD: (a, b) => map2(a, b, (x, y) => x + y),
  SUBTRACT: (a, b) => map2(a, b, (x, y) => x - y),
  MULTIPLY: (a, b) => map2(a, b, (x, y) => x * y),
  DIVIDE: (a, b) => map2(a, b, safeDivide),
  MULTIPLY_ADD: (a, b, c) => [a[0] * b[0] + c[0], a[1] * b[1] + c[1], a[2] * b[2] + c[2]],
  SCALE: (a, _b, _c, scale) => map1(a, x => x * scale),

  CROSS_PRODUCT: (a, b) => [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ],
  NORMALIZE: (a) => {
    const len = length(a);
    return len !== 0 ? map1(a, x => x / len) : [0, 0, 0];
  },
  FACEFORWARD: (a, b, c) => (dot(c, b) < 0 ? [a[0], a[1], a[2]] : map1(a, x => -x)),

  MINIMUM: (a, b) => map2(a, b, Math.min),
  MAXIMUM: (a, b) => map2(a, b, Math.max),
  ABSOLUTE: (a) => map1(a, Math.abs),
  FLOOR: (a) => map1(a, Math.floor),
  CEIL: (a) => map1(a, Math.ceil),
  FRACTION: (a) => map1(a, fract),
  SNAP: (a, b) => map2(a, b, (x, y) => Math.floor(safeDivide(x, y)) * y),
  MODULO: (a, b) => map2(a, b, fmod),

  SINE: (a) => map1(a, Math.sin),
  COSINE: (a) => map1(a, Math.cos),
  TANGENT: (a) => map1(a, Math.tan),
};

export const VectorScalarOps: { [K in VectorScalarOperation]: VectorScalarOpHandler } = {
  DOT_PRODUCT: dot,
  LENGTH: (a) => length(a),
  DISTANCE: (a, b) => length(map2(a, b, (x, y) => x - y)),
};

// ----------------------------------------------------------------
// Color Blending
// ----------------------------------------------------------------

// Channel-wise blend; `t` is the factor, `a`/`b` the channels of Color1/Color2.
const perChannel = (fn: (t: number, a: number, b: number) => number): BlendHandler =>
  (t, c1, c2) => [fn(t, c1[0], c2[0]), fn(t, c1[1], c2[1]), fn(t, c1[2], c2[2])];

const lerp3 = (t: number, a: Color3, b: Color3): Color3 => map2(a, b, (x, y) => (1 - t) * x + t * y);

export const BlendOps: { [K in BlendMode]: BlendHandler } = {
  MIX: perChannel((t, a, b) => (1 - t) * a + t * b),
  DARKEN: perChannel((t, a, b) => Math.min(a, b) * t + a * (1 - t)),
  MULTIPLY: perChannel((t, a, b) => a * (1 - t + t * b)),
  BURN: perChannel((t, a, b) => {
    const tmp = 1 - t + t * b;
    return tmp <= 0 ? 0 : 1 - (1 - a) / tmp;
  }),
  LIGHTEN: perChannel((t, a, b) => {
    const tmp = t * b;
    return tmp > a ? tmp : a;
  }),
  SCREEN: perChannel((t, a, b) => 1 - (1 - t + t * (1 - b)) * (1 - a)),
  DODGE: perChannel((t, a, b) => {
    if (a === 0) return 0;
    const tmp = 1 - t * b;
    return tmp <= 0 ? 1 : Math.min(a / tmp, 1);
  }),
  ADD: perChannel((t, a, b) => a + t * b),
  OVERLAY: perChannel((t, a, b) =>
    a < 0.5 ? a * (1 - t + 2 * t * b) : 1 - (1 - t + 2 * t * (1 - b)) * (1 - a)),
  SOFT_LIGHT: perChannel((t, a, b) => {
    const screen = 1 - (1 - b) * (1 - a);
    return (1 - t) * a + t * ((1 - a) * b * a + a * screen);
  }),
  LINEAR_LIGHT: perChannel((t, a, b) => (b > 0.5 ? a + t * (2 * (b - 0.5)) : a + t * (2 * b - 1))),
  DIFFERENCE: perChannel((t, a, b) => (1 - t) * a + t * Math.abs(a - b)),
  SUBTRACT: perChannel((t, a, b) => a - t * b),
  DIVIDE: perChannel((t, a, b) => (b !== 0 ? (1 - t) * a + (t * a) / b : a)),

  HUE: (t, c1, c2) => {
    const [, s1, v1] = rgbToHsv(c1);
    const [h2, s2] = rgbToHsv(c2);
    const rgb = s2 !== 0 ? hsvToRgb([h2, s1, v1]) : c1;
    return lerp3(t, c1, rgb);
  },
  SATURATION: (t, c1, c2) => {
    const [h1, s1, v1] = rgbToHsv(c1);
    const [, s2] = rgbToHsv(c2);
    return s1 !== 0 ? hsvToRgb([h1, (1 - t) * s1 + t * s2, v1]) : [c1[0], c1[1], c1[2]];
  },
  VALUE: (t, c1, c2) => {
    const [h1, s1, v1] = rgbToHsv(c1);
    const [, , v2] = rgbToHsv(c2);
    return hsvToRgb([h1, s1, (1 - t) * v1 + t * v2]);
  },
  COLOR: (t, c1, c2) => {
    const [, , v1] = rgbToHsv(c1);
    const [h2, s2] = rgbToHsv(c2);
    return s2 !== 0 ? lerp3(t, c1, hsvToRgb([h2, s2, v1])) : [c1[0], c1[1], c1[2]];
  },
};

const HSV_BLENDS: ReadonlySet<string> = new Set<string>(HSV_BLEND_MODES);

/**
 * Whether a blend result is clamped to [0, 1]. BURN always clamps, the HSV
 * modes never do.
 */
export const blendClamps = (mode: BlendMode, useClamp: boolean): boolean => {
  if (HSV_BLENDS.has(mode)) return false;
  return useClamp || mode === 'BURN';
};

// ----------------------------------------------------------------
// Lookup
// ----------------------------------------------------------------
// Operation names reach the evaluator as plain strings when trees are built
// outside the type system, so every table is also reachable by name.

const registry = <H>(family: string, table: Record<string, H>): ((name: string) => H) => {
  const handlers = new Map<string, H>(Object.entries(table));
  return (name) => {
    const handler = handlers.get(name);
    if (handler === undefined) throw new UnhandledOperationError(family, name);
    return handler;
  };
};

export const getMathOp = registry<MathOpHandler>('math', MathOps);
export const getVectorOp = registry<VectorOpHandler>('vector math', VectorOps);
export const getVectorScalarOp = registry<VectorScalarOpHandler>('vector math scalar', VectorScalarOps);
export const getBlendOp = registry<BlendHandler>('blend', BlendOps);

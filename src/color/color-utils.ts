import {
  HSV_EPSILON,
  LUMINANCE_WEIGHTS,
  SRGB_DECODE_THRESHOLD,
  SRGB_ENCODE_THRESHOLD,
} from '../constants';

export type Color3 = [number, number, number];

// ------------------------------------------------------------------
// Transfer functions
// ------------------------------------------------------------------

export const srgbToLinear = (a: number): number =>
  a <= SRGB_DECODE_THRESHOLD ? a / 12.92 : ((a + 0.055) / 1.055) ** 2.4;

export const linearToSrgb = (a: number): number =>
  a <= SRGB_ENCODE_THRESHOLD ? a * 12.92 : 1.055 * a ** (1 / 2.4) - 0.055;

// ------------------------------------------------------------------
// Scalar helpers
// ------------------------------------------------------------------

export const clamp = (x: number, lo: number, hi: number): number => Math.max(Math.min(x, hi), lo);

export const saturate = (x: number): number => clamp(x, 0, 1);

export const fract = (x: number): number => x - Math.floor(x);

export const safeDivide = (a: number, b: number): number => (b !== 0 ? a / b : 0);

/**
 * Rounds to the nearest integer, ties going to the even neighbour.
 * `Math.round` sends ties towards +Infinity instead.
 */
export const roundHalfEven = (x: number): number => {
  if (Math.abs(x % 1) === 0.5) {
    return 2 * Math.round(x / 2);
  }
  return Math.round(x);
};

export const smoothstep = (edge0: number, edge1: number, x: number): number => {
  const t = safeDivide(x - edge0, edge1 - edge0);
  if (x < edge0) return 0;
  if (x >= edge1) return 1;
  return (3 - 2 * t) * (t * t);
};

export const smootherstep = (edge0: number, edge1: number, x: number): number => {
  const t = clamp(safeDivide(x - edge0, edge1 - edge0), 0, 1);
  return t * t * t * (t * (t * 6 - 15) + 10);
};

/** Polynomial smooth minimum; `c` is the blend width, 0 gives a hard minimum. */
export const smoothMin = (a: number, b: number, c: number): number => {
  if (c === 0) return Math.min(a, b);
  const h = safeDivide(Math.max(c - Math.abs(a - b), 0), c);
  return Math.min(a, b) - h * h * h * c * (1 / 6);
};

// ------------------------------------------------------------------
// Color helpers
// ------------------------------------------------------------------

export const luminance = (c: ArrayLike<number>): number =>
  c[0] * LUMINANCE_WEIGHTS[0] + c[1] * LUMINANCE_WEIGHTS[1] + c[2] * LUMINANCE_WEIGHTS[2];

export const rgbAverage = (c: ArrayLike<number>): number => (c[0] + c[1] + c[2]) / 3;

/**
 * RGB → HSV with hue in [0, 1). Branch structure follows the host's
 * `rgb_to_hsv`, so greys come out with saturation 0 and an arbitrary hue.
 */
export const rgbToHsv = (rgb: readonly number[]): Color3 => {
  let r = rgb[0];
  let g = rgb[1];
  let b = rgb[2];
  let k = 0;

  if (g < b) {
    [g, b] = [b, g];
    k = -1;
  }
  let minGb = b;
  if (r < g) {
    [r, g] = [g, r];
    k = -2 / 6 - k;
    minGb = Math.min(g, b);
  }

  const chroma = r - minGb;
  const h = Math.abs(k + (g - b) / (6 * chroma + HSV_EPSILON));
  const s = chroma / (r + HSV_EPSILON);
  return [h, s, r];
};

export const hsvToRgb = (hsv: readonly number[]): Color3 => {
  const [h, s, v] = hsv;
  const nr = clamp(Math.abs(h * 6 - 3) - 1, 0, 1);
  const ng = clamp(2 - Math.abs(h * 6 - 2), 0, 1);
  const nb = clamp(2 - Math.abs(h * 6 - 4), 0, 1);
  return [
    ((nr - 1) * s + 1) * v,
    ((ng - 1) * s + 1) * v,
    ((nb - 1) * s + 1) * v,
  ];
};

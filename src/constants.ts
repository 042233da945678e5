/**
 * @file constants.ts
 * @description Numeric constants shared by the evaluator and the bake layer.
 *
 * @external-interactions
 * - `LUMINANCE_WEIGHTS` drives every color → scalar coercion.
 * - `BAKE_OUTPUT_SOCKETS` names the inputs `vertex-bake.ts` reifies.
 *
 * @pitfalls
 * - The luminance weights are exact values; they sum to exactly 1.0 in double
 *   precision, which keeps `luminance([v, v, v]) === v` for common values.
 */

// Rec. 709 luminance, same as the host's default color management config.
export const LUMINANCE_WEIGHTS = [0.2126, 0.7152, 0.0722] as const;

// COMPARE treats anything closer than this as equal, whatever the tolerance input.
export const COMPARE_MIN_EPSILON = 1e-5;

// Negative bases only raise to exponents this close to an integer.
export const POWER_INTEGER_TOLERANCE = 0.001;

// Keeps the HSV conversion finite for black and greys.
export const HSV_EPSILON = 1e-20;

export const SRGB_DECODE_THRESHOLD = 0.04045;
export const SRGB_ENCODE_THRESHOLD = 0.0031308;

export const BYTE_SCALE = 255;

export const BAKE_OUTPUT_SOCKETS = {
  color: 'Color',
  alpha: 'Alpha',
  swayFrequency: 'SwayFrequency',
  swayAmplitude: 'SwayAmplitude',
  swayPhase: 'SwayPhase',
  specularStrength: 'SpecularStrength',
} as const;

export type BakeOutputSocket = typeof BAKE_OUTPUT_SOCKETS[keyof typeof BAKE_OUTPUT_SOCKETS];

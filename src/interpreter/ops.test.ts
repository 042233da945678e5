import { describe, it, expect } from 'vitest';
import {
  BlendOps,
  MathOps,
  VectorOps,
  VectorScalarOps,
  blendClamps,
  getBlendOp,
  getMathOp,
  getVectorOp,
  getVectorScalarOp,
} from './ops';
import { MATH_OPERATIONS, VECTOR_OPERATIONS, BLEND_MODES } from '../ir/types';
import { UnhandledOperationError } from '../errors';

describe('MathOps', () => {
  it('should cover every math operation', () => {
    for (const op of MATH_OPERATIONS) {
      expect(typeof MathOps[op]).toBe('function');
    }
  });

  it('should do basic arithmetic', () => {
    expect(MathOps.ADD(1, 2, 0)).toBe(3);
    expect(MathOps.SUBTRACT(1, 2, 0)).toBe(-1);
    expect(MathOps.MULTIPLY(3, 2, 0)).toBe(6);
    expect(MathOps.MULTIPLY_ADD(3, 2, 1)).toBe(7);
  });

  it('should divide by zero to zero', () => {
    expect(MathOps.DIVIDE(1, 4, 0)).toBe(0.25);
    expect(MathOps.DIVIDE(1, 0, 0)).toBe(0);
  });

  it('should only raise negative bases to near-integer exponents', () => {
    expect(MathOps.POWER(2, 3, 0)).toBe(8);
    expect(MathOps.POWER(-2, 3, 0)).toBe(-8);
    expect(MathOps.POWER(-2, 2.0005, 0)).toBe(4);
    expect(MathOps.POWER(-2, -1.9995, 0)).toBe(0.25);
    expect(MathOps.POWER(-2, 0.5, 0)).toBe(0);
  });

  it('should return zero for out-of-domain logarithms and roots', () => {
    expect(MathOps.LOGARITHM(8, 2, 0)).toBeCloseTo(3, 12);
    expect(MathOps.LOGARITHM(-1, 2, 0)).toBe(0);
    expect(MathOps.LOGARITHM(8, 0, 0)).toBe(0);
    expect(MathOps.SQRT(-4, 0, 0)).toBe(0);
    expect(MathOps.SQRT(9, 0, 0)).toBe(3);
    expect(MathOps.INVERSE_SQRT(4, 0, 0)).toBe(0.5);
    expect(MathOps.INVERSE_SQRT(0, 0, 0)).toBe(0);
  });

  it('should compare with a minimum tolerance', () => {
    expect(MathOps.COMPARE(1, 1.000001, 0)).toBe(1);
    expect(MathOps.COMPARE(1, 1.1, 0.05)).toBe(0);
    expect(MathOps.COMPARE(1, 1.1, 0.2)).toBe(1);
    expect(MathOps.LESS_THAN(1, 2, 0)).toBe(1);
    expect(MathOps.GREATER_THAN(1, 2, 0)).toBe(0);
    expect(MathOps.SIGN(-3, 0, 0)).toBe(-1);
  });

  it('should smooth min and max', () => {
    expect(MathOps.SMOOTH_MIN(1, 3, 0)).toBe(1);
    expect(MathOps.SMOOTH_MAX(1, 3, 0)).toBe(3);
    expect(MathOps.SMOOTH_MAX(1, 1, 1)).toBeCloseTo(1 + 1 / 6, 12);
  });

  it('should round half to even', () => {
    expect(MathOps.ROUND(2.5, 0, 0)).toBe(2);
    expect(MathOps.ROUND(3.5, 0, 0)).toBe(4);
    expect(MathOps.FLOOR(-1.5, 0, 0)).toBe(-2);
    expect(MathOps.CEIL(-1.5, 0, 0)).toBe(-1);
    expect(MathOps.TRUNC(-1.5, 0, 0)).toBe(-1);
    expect(MathOps.FRACT(-1.25, 0, 0)).toBe(0.75);
  });

  it('should take the truncated modulo', () => {
    expect(MathOps.MODULO(7, 3, 0)).toBe(1);
    expect(MathOps.MODULO(-7, 3, 0)).toBe(-1);
    expect(MathOps.MODULO(1, 0, 0)).toBe(0);
  });

  it('should wrap into [c, b)', () => {
    expect(MathOps.WRAP(5, 3, 1)).toBe(1);
    expect(MathOps.WRAP(0.5, 1, 0)).toBe(0.5);
    expect(MathOps.WRAP(-0.25, 1, 0)).toBe(0.75);
    expect(MathOps.WRAP(7, 1, 1)).toBe(1);
  });

  it('should snap down to multiples of b', () => {
    expect(MathOps.SNAP(7, 3, 0)).toBe(6);
    expect(MathOps.SNAP(-1, 3, 0)).toBe(-3);
    expect(MathOps.SNAP(0, 3, 0)).toBe(0);
    expect(MathOps.SNAP(7, 0, 0)).toBe(0);
  });

  it('should ping-pong between 0 and b', () => {
    expect(MathOps.PINGPONG(1, 2, 0)).toBe(1);
    expect(MathOps.PINGPONG(2.5, 2, 0)).toBe(1.5);
    expect(MathOps.PINGPONG(3, 2, 0)).toBe(1);
    expect(MathOps.PINGPONG(5, 0, 0)).toBe(0);
  });

  it('should convert angles', () => {
    expect(MathOps.RADIANS(180, 0, 0)).toBe(Math.PI);
    expect(MathOps.DEGREES(Math.PI, 0, 0)).toBe(180);
    expect(MathOps.ARCTAN2(1, 1, 0)).toBeCloseTo(Math.PI / 4, 12);
  });
});

describe('VectorOps', () => {
  it('should cover every vector operation', () => {
    for (const op of VECTOR_OPERATIONS) {
      expect(typeof VectorOps[op]).toBe('function');
    }
  });

  it('should divide component-wise with zero for zero divisors', () => {
    expect(VectorOps.DIVIDE([1, 2, 3], [2, 0, 4], [0, 0, 0], 1)).toEqual([0.5, 0, 0.75]);
  });

  it('should scale by the scalar input', () => {
    expect(VectorOps.SCALE([1, 2, 3], [9, 9, 9], [9, 9, 9], 2)).toEqual([2, 4, 6]);
  });

  it('should multiply-add', () => {
    expect(VectorOps.MULTIPLY_ADD([1, 2, 3], [2, 2, 2], [1, 1, 1], 1)).toEqual([3, 5, 7]);
  });

  it('should compute the cross product', () => {
    expect(VectorOps.CROSS_PRODUCT([1, 0, 0], [0, 1, 0], [0, 0, 0], 1)).toEqual([0, 0, 1]);
  });

  it('should normalize, leaving the zero vector alone', () => {
    expect(VectorOps.NORMALIZE([3, 0, 4], [0, 0, 0], [0, 0, 0], 1)).toEqual([0.6, 0, 0.8]);
    expect(VectorOps.NORMALIZE([0, 0, 0], [0, 0, 0], [0, 0, 0], 1)).toEqual([0, 0, 0]);
  });

  it('should face A forward against the incident vector', () => {
    expect(VectorOps.FACEFORWARD([1, 2, 3], [0, 0, 1], [0, 0, -1], 1)).toEqual([1, 2, 3]);
    expect(VectorOps.FACEFORWARD([1, 2, 3], [0, 0, 1], [0, 0, 1], 1)).toEqual([-1, -2, -3]);
  });

  it('should snap and modulo per component', () => {
    expect(VectorOps.SNAP([7, 5, 1], [3, 0, 2], [0, 0, 0], 1)).toEqual([6, 0, 0]);
    expect(VectorOps.MODULO([7, -7, 1], [3, 3, 0], [0, 0, 0], 1)).toEqual([1, -1, 0]);
  });

  it('should apply unary ops per component', () => {
    expect(VectorOps.ABSOLUTE([-1, 2, -3], [0, 0, 0], [0, 0, 0], 1)).toEqual([1, 2, 3]);
    expect(VectorOps.FLOOR([1.5, -1.5, 2], [0, 0, 0], [0, 0, 0], 1)).toEqual([1, -2, 2]);
    expect(VectorOps.FRACTION([1.25, -0.25, 2], [0, 0, 0], [0, 0, 0], 1)).toEqual([0.25, 0.75, 0]);
  });
});

describe('VectorScalarOps', () => {
  it('should compute dot product, length and distance', () => {
    expect(VectorScalarOps.DOT_PRODUCT([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(VectorScalarOps.LENGTH([3, 4, 0], [0, 0, 0])).toBe(5);
    expect(VectorScalarOps.DISTANCE([1, 1, 1], [4, 5, 1])).toBe(5);
  });
});

describe('BlendOps', () => {
  const grey = (v: number): [number, number, number] => [v, v, v];

  it('should cover every blend mode', () => {
    for (const mode of BLEND_MODES) {
      expect(typeof BlendOps[mode]).toBe('function');
    }
  });

  it('should interpolate for MIX', () => {
    expect(BlendOps.MIX(0.25, grey(0), grey(1))).toEqual(grey(0.25));
  });

  it('should pick color1 at factor 0 and color2 at factor 1 for MIX', () => {
    expect(BlendOps.MIX(0, [0.2, 0.4, 0.6], [0.9, 0.1, 0.3])).toEqual([0.2, 0.4, 0.6]);
    expect(BlendOps.MIX(1, [0.2, 0.4, 0.6], [0.9, 0.1, 0.3])).toEqual([0.9, 0.1, 0.3]);
  });

  it('should apply the RGB formulas at full factor', () => {
    expect(BlendOps.MULTIPLY(1, grey(0.5), [0.5, 0.2, 1])).toEqual([0.25, 0.1, 0.5]);
    expect(BlendOps.ADD(0.5, grey(0.25), grey(1))).toEqual(grey(0.75));
    expect(BlendOps.SUBTRACT(1, grey(0.5), grey(0.25))).toEqual(grey(0.25));
    expect(BlendOps.SCREEN(1, grey(0.5), grey(0.5))).toEqual(grey(0.75));
    expect(BlendOps.DARKEN(1, grey(0.25), grey(0.5))).toEqual(grey(0.25));
    expect(BlendOps.LIGHTEN(1, grey(0.25), grey(0.5))).toEqual(grey(0.5));
    expect(BlendOps.DIVIDE(1, grey(0.5), grey(0.25))).toEqual(grey(2));
  });

  it('should keep color1 where DIVIDE hits zero', () => {
    expect(BlendOps.DIVIDE(1, grey(0.5), grey(0))).toEqual(grey(0.5));
  });

  it('should saturate BURN and DODGE at their limits', () => {
    expect(BlendOps.BURN(1, grey(0.5), grey(0))).toEqual(grey(0));
    expect(BlendOps.DODGE(1, grey(0.5), grey(1))).toEqual(grey(1));
    expect(BlendOps.DODGE(1, grey(0), grey(0.5))).toEqual(grey(0));
  });

  it('should take the hue of color2 for HUE', () => {
    const [r, g, b] = BlendOps.HUE(1, [1, 0, 0], [0, 1, 0]);
    expect(r).toBeCloseTo(0, 12);
    expect(g).toBeCloseTo(1, 12);
    expect(b).toBeCloseTo(0, 12);
  });

  it('should fall back to color1 when the relevant saturation is zero', () => {
    expect(BlendOps.HUE(1, [1, 0, 0], grey(0.5))).toEqual([1, 0, 0]);
    expect(BlendOps.COLOR(1, [1, 0, 0], grey(0.5))).toEqual([1, 0, 0]);
    expect(BlendOps.SATURATION(1, grey(0.5), [1, 0, 0])).toEqual(grey(0.5));
  });

  it('should take the value of color2 for VALUE', () => {
    expect(BlendOps.VALUE(1, [1, 0, 0], grey(0.5))).toEqual([0.5, 0, 0]);
  });
});

describe('blendClamps', () => {
  it('should follow the clamp flag for RGB modes', () => {
    expect(blendClamps('MIX', true)).toBe(true);
    expect(blendClamps('MIX', false)).toBe(false);
  });

  it('should always clamp BURN', () => {
    expect(blendClamps('BURN', false)).toBe(true);
  });

  it('should never clamp HSV modes', () => {
    expect(blendClamps('HUE', true)).toBe(false);
    expect(blendClamps('VALUE', true)).toBe(false);
  });
});

describe('op lookup', () => {
  it('should find handlers by name', () => {
    expect(getMathOp('ADD')).toBe(MathOps.ADD);
    expect(getVectorOp('CROSS_PRODUCT')).toBe(VectorOps.CROSS_PRODUCT);
    expect(getVectorScalarOp('LENGTH')).toBe(VectorScalarOps.LENGTH);
    expect(getBlendOp('OVERLAY')).toBe(BlendOps.OVERLAY);
  });

  it('should throw UnhandledOperationError for unknown names', () => {
    expect(() => getMathOp('HYPOT')).toThrow(UnhandledOperationError);
    expect(() => getBlendOp('EXCLUSION')).toThrow("Internal Error: unhandled blend operation 'EXCLUSION'");
    expect(() => getVectorOp('REFLECT')).toThrow(UnhandledOperationError);
  });
});

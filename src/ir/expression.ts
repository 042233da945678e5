import {
  BlendMode,
  ChannelSpace,
  ClampType,
  Color3Value,
  MapRangeInterpolation,
  MathOperation,
  RampInterpolation,
  RampStop,
  VectorOperation,
  VectorScalarOperation,
} from './types';

// ------------------------------------------------------------------
// Expression IR
// ------------------------------------------------------------------
// Output of reification. Every variant can be evaluated as a color (N×3) or a
// scalar (N×1); see evaluator.ts for the coercion rules.

export interface ConstColorExpr { readonly type: 'constColor'; readonly rgb: Color3Value }
export interface ConstScalarExpr { readonly type: 'constScalar'; readonly value: number }

export interface AttributeColorExpr { readonly type: 'attributeColor'; readonly name: string }
export interface AttributeScalarExpr {
  readonly type: 'attributeScalar';
  readonly name: string;
  readonly channel: 'fac' | 'alpha';
}
export interface GeometryExpr { readonly type: 'geometry'; readonly attribute: 'position' | 'normal' }

export interface MathExpr {
  readonly type: 'math';
  readonly operation: MathOperation;
  readonly clamp: boolean;
  readonly a: Expression;
  readonly b: Expression;
  readonly c: Expression;
}

export interface VectorMathExpr {
  readonly type: 'vectorMath';
  readonly operation: VectorOperation;
  readonly a: Expression;
  readonly b: Expression;
  readonly c: Expression;
  readonly scale: Expression;
}

export interface VectorMathScalarExpr {
  readonly type: 'vectorMathScalar';
  readonly operation: VectorScalarOperation;
  readonly a: Expression;
  readonly b: Expression;
}

export interface MixExpr {
  readonly type: 'mix';
  readonly blendType: BlendMode;
  readonly clamp: boolean;
  readonly fac: Expression;
  readonly color1: Expression;
  readonly color2: Expression;
}

export interface InvertExpr { readonly type: 'invert'; readonly fac: Expression; readonly color: Expression }
export interface GrayscaleExpr { readonly type: 'grayscale'; readonly color: Expression }

export interface ClampExpr {
  readonly type: 'clamp';
  readonly clampType: ClampType;
  readonly value: Expression;
  readonly min: Expression;
  readonly max: Expression;
}

export interface BrightContrastExpr {
  readonly type: 'brightContrast';
  readonly color: Expression;
  readonly bright: Expression;
  readonly contrast: Expression;
}

export interface GammaExpr { readonly type: 'gamma'; readonly color: Expression; readonly gamma: Expression }

export interface SeparateExpr {
  readonly type: 'separate';
  readonly space: ChannelSpace;
  readonly channel: 0 | 1 | 2;
  readonly input: Expression;
}

export interface CombineExpr {
  readonly type: 'combine';
  readonly space: ChannelSpace;
  readonly x: Expression;
  readonly y: Expression;
  readonly z: Expression;
}

export interface ColorRampExpr {
  readonly type: 'colorRamp';
  readonly output: 'color' | 'alpha';
  readonly interpolation: RampInterpolation;
  readonly stops: readonly RampStop[]; // Sorted by position, never empty
  readonly fac: Expression;
}

export interface MapRangeExpr {
  readonly type: 'mapRange';
  readonly interpolation: MapRangeInterpolation;
  readonly clamp: boolean;
  readonly value: Expression;
  readonly fromMin: Expression;
  readonly fromMax: Expression;
  readonly toMin: Expression;
  readonly toMax: Expression;
  readonly steps: Expression;
}

export interface HueSaturationExpr {
  readonly type: 'hueSaturation';
  readonly hue: Expression;
  readonly saturation: Expression;
  readonly value: Expression;
  readonly fac: Expression;
  readonly color: Expression;
}

/** Inlined sub-graph. Kept as a node so the group it came from stays visible. */
export interface GroupExpr { readonly type: 'group'; readonly name: string; readonly inner: Expression }

/** Reference to a sub-graph boundary input, replaced during group substitution. */
export interface GroupInputExpr { readonly type: 'groupInput'; readonly socket: string }

export type Expression =
  | ConstColorExpr | ConstScalarExpr
  | AttributeColorExpr | AttributeScalarExpr | GeometryExpr
  | MathExpr | VectorMathExpr | VectorMathScalarExpr
  | MixExpr | InvertExpr | GrayscaleExpr | ClampExpr | BrightContrastExpr | GammaExpr
  | SeparateExpr | CombineExpr
  | ColorRampExpr | MapRangeExpr | HueSaturationExpr
  | GroupExpr | GroupInputExpr;

// ------------------------------------------------------------------
// Traversal
// ------------------------------------------------------------------

/** Direct sub-expressions with their field names, in field order. */
export const namedChildren = (expr: Expression): Array<[string, Expression]> => {
  switch (expr.type) {
    case 'constColor':
    case 'constScalar':
    case 'attributeColor':
    case 'attributeScalar':
    case 'geometry':
    case 'groupInput':
      return [];
    case 'math': return [['a', expr.a], ['b', expr.b], ['c', expr.c]];
    case 'vectorMath': return [['a', expr.a], ['b', expr.b], ['c', expr.c], ['scale', expr.scale]];
    case 'vectorMathScalar': return [['a', expr.a], ['b', expr.b]];
    case 'mix': return [['fac', expr.fac], ['color1', expr.color1], ['color2', expr.color2]];
    case 'invert': return [['fac', expr.fac], ['color', expr.color]];
    case 'grayscale': return [['color', expr.color]];
    case 'clamp': return [['value', expr.value], ['min', expr.min], ['max', expr.max]];
    case 'brightContrast': return [['color', expr.color], ['bright', expr.bright], ['contrast', expr.contrast]];
    case 'gamma': return [['color', expr.color], ['gamma', expr.gamma]];
    case 'separate': return [['input', expr.input]];
    case 'combine': return [['x', expr.x], ['y', expr.y], ['z', expr.z]];
    case 'colorRamp': return [['fac', expr.fac]];
    case 'mapRange':
      return [
        ['value', expr.value],
        ['fromMin', expr.fromMin],
        ['fromMax', expr.fromMax],
        ['toMin', expr.toMin],
        ['toMax', expr.toMax],
        ['steps', expr.steps],
      ];
    case 'hueSaturation':
      return [
        ['hue', expr.hue],
        ['saturation', expr.saturation],
        ['value', expr.value],
        ['fac', expr.fac],
        ['color', expr.color],
      ];
    case 'group': return [['inner', expr.inner]];
    default: {
      const exhaustive: never = expr;
      return exhaustive;
    }
  }
};

export const childrenOf = (expr: Expression): Expression[] => namedChildren(expr).map(([, child]) => child);

/**
 * Rebuilds `expr` with every direct child replaced by `fn(child)`.
 * Leaves are returned as-is; nothing is mutated.
 */
export const mapChildren = (expr: Expression, fn: (child: Expression) => Expression): Expression => {
  switch (expr.type) {
    case 'constColor':
    case 'constScalar':
    case 'attributeColor':
    case 'attributeScalar':
    case 'geometry':
    case 'groupInput':
      return expr;
    case 'math':
      return { ...expr, a: fn(expr.a), b: fn(expr.b), c: fn(expr.c) };
    case 'vectorMath':
      return { ...expr, a: fn(expr.a), b: fn(expr.b), c: fn(expr.c), scale: fn(expr.scale) };
    case 'vectorMathScalar':
      return { ...expr, a: fn(expr.a), b: fn(expr.b) };
    case 'mix':
      return { ...expr, fac: fn(expr.fac), color1: fn(expr.color1), color2: fn(expr.color2) };
    case 'invert':
      return { ...expr, fac: fn(expr.fac), color: fn(expr.color) };
    case 'grayscale':
      return { ...expr, color: fn(expr.color) };
    case 'clamp':
      return { ...expr, value: fn(expr.value), min: fn(expr.min), max: fn(expr.max) };
    case 'brightContrast':
      return { ...expr, color: fn(expr.color), bright: fn(expr.bright), contrast: fn(expr.contrast) };
    case 'gamma':
      return { ...expr, color: fn(expr.color), gamma: fn(expr.gamma) };
    case 'separate':
      return { ...expr, input: fn(expr.input) };
    case 'combine':
      return { ...expr, x: fn(expr.x), y: fn(expr.y), z: fn(expr.z) };
    case 'colorRamp':
      return { ...expr, fac: fn(expr.fac) };
    case 'mapRange':
      return {
        ...expr,
        value: fn(expr.value),
        fromMin: fn(expr.fromMin),
        fromMax: fn(expr.fromMax),
        toMin: fn(expr.toMin),
        toMax: fn(expr.toMax),
        steps: fn(expr.steps),
      };
    case 'hueSaturation':
      return {
        ...expr,
        hue: fn(expr.hue),
        saturation: fn(expr.saturation),
        value: fn(expr.value),
        fac: fn(expr.fac),
        color: fn(expr.color),
      };
    case 'group':
      return { ...expr, inner: fn(expr.inner) };
    default: {
      const exhaustive: never = expr;
      return exhaustive;
    }
  }
};

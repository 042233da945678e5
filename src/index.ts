export * from './constants';
export * from './errors';

export * from './color/color-utils';

export * from './ir/types';
export * from './ir/node-defs';
export * from './ir/utils';
export * from './ir/builder';
export * from './ir/expression';
export * from './ir/analyzer';
export * from './ir/schema';

export * from './interpreter/context';
export * from './interpreter/ops';
export * from './interpreter/evaluator';

export * from './reify/reifier';

export * from './bake/vertex-bake';

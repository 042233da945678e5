import { Expression, childrenOf, namedChildren } from './expression';

export interface ExprLinePart {
  type: 'op' | 'ref' | 'literal' | 'keyword' | 'label';
  text: string;
}

export interface ExprLine {
  indent: number;
  parts: ExprLinePart[];
}

const num = (n: number): string => (Object.is(n, -0) ? '0' : String(n));

const keyword = (text: string): ExprLinePart => ({ type: 'keyword', text });
const literal = (text: string): ExprLinePart => ({ type: 'literal', text });
const ref = (text: string): ExprLinePart => ({ type: 'ref', text: `'${text}'` });

// Parameters shown after the node type on its own line
const headerParts = (expr: Expression): ExprLinePart[] => {
  switch (expr.type) {
    case 'constColor':
      return [literal(`(${expr.rgb.map(num).join(', ')})`)];
    case 'constScalar':
      return [literal(num(expr.value))];
    case 'attributeColor':
      return [ref(expr.name)];
    case 'attributeScalar':
      return [ref(expr.name), keyword(expr.channel)];
    case 'geometry':
      return [keyword(expr.attribute)];
    case 'math':
    case 'mix':
      return [keyword(expr.type === 'math' ? expr.operation : expr.blendType), ...(expr.clamp ? [keyword('clamp')] : [])];
    case 'vectorMath':
    case 'vectorMathScalar':
      return [keyword(expr.operation)];
    case 'clamp':
      return [keyword(expr.clampType)];
    case 'separate':
      return [keyword(expr.space), literal(String(expr.channel))];
    case 'combine':
      return [keyword(expr.space)];
    case 'colorRamp':
      return [keyword(expr.interpolation), keyword(expr.output), literal(`${expr.stops.length} stops`)];
    case 'mapRange':
      return [keyword(expr.interpolation), ...(expr.clamp ? [keyword('clamp')] : [])];
    case 'group':
      return [ref(expr.name)];
    case 'groupInput':
      return [ref(expr.socket)];
    default:
      return [];
  }
};

/**
 * Flattens an Expression tree into one line per node, children indented one
 * level below their parent and prefixed with the field they occupy.
 */
export const analyzeExpression = (expr: Expression): ExprLine[] => {
  const lines: ExprLine[] = [];

  const visit = (node: Expression, indent: number, label?: string) => {
    const parts: ExprLinePart[] = [];
    if (label) parts.push({ type: 'label', text: `${label}:` });
    parts.push({ type: 'op', text: node.type });
    parts.push(...headerParts(node));
    lines.push({ indent, parts });

    for (const [childLabel, child] of namedChildren(node)) {
      visit(child, indent + 1, childLabel);
    }
  };

  visit(expr, 0);
  return lines;
};

export const formatLines = (lines: readonly ExprLine[], indentWidth = 2): string =>
  lines
    .map(line => ' '.repeat(line.indent * indentWidth) + line.parts.map(p => p.text).join(' '))
    .join('\n');

export const printExpression = (expr: Expression): string => formatLines(analyzeExpression(expr));

/** Total number of nodes in the tree, root included. */
export const countNodes = (expr: Expression): number =>
  childrenOf(expr).reduce((total, child) => total + countNodes(child), 1);

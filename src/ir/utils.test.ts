import { describe, it, expect } from 'vitest';
import { findActiveGroupOutput, findLinkTo, findNode, nodeKey, socketDefault } from './utils';
import { GraphBuilder } from './builder';

const graph = new GraphBuilder('g1', 'Puddle')
  .add({ id: 'v', kind: 'value', value: 2 })
  .add({ id: 'm', kind: 'math', operation: 'ADD', useClamp: false, inputs: { B: 3 } })
  .add({ id: 'out', kind: 'bake_output' })
  .link('v', 'Value', 'm', 'A')
  .link('m', 'Value', 'out', 'Alpha')
  .build();

describe('findNode', () => {
  it('should find nodes by id', () => {
    expect(findNode(graph, 'm')).toMatchObject({ kind: 'math', operation: 'ADD' });
    expect(findNode(graph, 'nope')).toBeUndefined();
  });
});

describe('findLinkTo', () => {
  it('should find the link into an input socket', () => {
    expect(findLinkTo(graph, 'm', 'A')).toEqual({ from: { node: 'v', socket: 'Value' }, to: { node: 'm', socket: 'A' } });
    expect(findLinkTo(graph, 'm', 'B')).toBeUndefined();
  });
});

describe('socketDefault', () => {
  it('should prefer the node override over the kind fallback', () => {
    const math = findNode(graph, 'm');
    if (!math) throw new Error('missing node');
    expect(socketDefault(math, 'B')).toBe(3);
    expect(socketDefault(math, 'C')).toBe(0.5);
    expect(socketDefault(math, 'D')).toBeUndefined();
  });

  it('should return color fallbacks as tuples', () => {
    expect(socketDefault({ id: 'i', kind: 'invert' }, 'Color')).toEqual([0, 0, 0]);
    expect(socketDefault({ id: 'o', kind: 'bake_output' }, 'Color')).toEqual([1, 1, 1]);
  });
});

describe('findActiveGroupOutput', () => {
  it('should skip outputs marked inactive', () => {
    const group = new GraphBuilder('grp')
      .add({ id: 'old', kind: 'group_output', isActiveOutput: false })
      .add({ id: 'new', kind: 'group_output' })
      .build();
    expect(findActiveGroupOutput(group)?.id).toBe('new');
  });

  it('should return undefined without an active output', () => {
    expect(findActiveGroupOutput(graph)).toBeUndefined();
  });
});

describe('nodeKey', () => {
  it('should qualify node ids by graph id', () => {
    expect(nodeKey(graph, 'm')).toBe('g1/m');
  });
});

import { describe, it, expect } from 'vitest';
import { loadMaterialDocument } from './schema';

const tintGroup = {
  id: 'grp-tint',
  name: 'Tint',
  nodes: [
    { id: 'in', kind: 'group_input' },
    { id: 'mul', kind: 'math', operation: 'MULTIPLY', inputs: { B: 2 } },
    { id: 'out', kind: 'group_output' },
  ],
  links: [
    { from: { node: 'in', socket: 'Factor' }, to: { node: 'mul', socket: 'A' } },
    { from: { node: 'mul', socket: 'Value' }, to: { node: 'out', socket: 'Value' } },
  ],
};

const materialGraph = (nodes: unknown[], links: unknown[] = []) => ({ id: 'mat', name: 'Rock', nodes, links });

const doc = (nodes: unknown[], links: unknown[] = [], groups: unknown[] = [tintGroup]) => ({
  version: 1,
  materials: [{ name: 'Rock', graph: materialGraph(nodes, links) }],
  groups,
});

describe('loadMaterialDocument', () => {
  it('should load a valid document and link group instances', () => {
    const result = loadMaterialDocument(doc(
      [
        { id: 'grp', kind: 'group', group: 'grp-tint', inputs: { Factor: 0.5 } },
        { id: 'out', kind: 'bake_output' },
      ],
      [{ from: { node: 'grp', socket: 'Value' }, to: { node: 'out', socket: 'Alpha' } }],
    ));

    expect(result.success).toBe(true);
    if (!result.success) return;

    const { materials, groups } = result.data;
    expect(materials).toHaveLength(1);
    expect(materials[0].name).toBe('Rock');

    const instance = materials[0].graph.nodes[0];
    if (instance.kind !== 'group') throw new Error('expected group node');
    expect(instance.tree).toBe(groups[0]);
    expect(instance).not.toHaveProperty('group');
  });

  it('should apply parameter defaults', () => {
    const result = loadMaterialDocument(doc([
      { id: 'm', kind: 'math', operation: 'ADD' },
      { id: 'mx', kind: 'mix_rgb' },
      { id: 'mr', kind: 'map_range' },
    ]));
    if (!result.success) throw new Error('expected success');

    const [math, mix, mapRange] = result.data.materials[0].graph.nodes;
    expect(math).toMatchObject({ kind: 'math', useClamp: false });
    expect(mix).toMatchObject({ kind: 'mix_rgb', blendType: 'MIX', useClamp: false });
    expect(mapRange).toMatchObject({ kind: 'map_range', interpolationType: 'LINEAR', clamp: true });
  });

  it('should give RGB ramp stops an opaque alpha', () => {
    const result = loadMaterialDocument(doc([
      { id: 'ramp', kind: 'color_ramp', stops: [{ position: 0, color: [1, 0, 0] }] },
    ]));
    if (!result.success) throw new Error('expected success');
    expect(result.data.materials[0].graph.nodes[0]).toMatchObject({
      kind: 'color_ramp',
      colorMode: 'RGB',
      interpolation: 'LINEAR',
      stops: [{ position: 0, color: [1, 0, 0, 1] }],
    });
  });

  it('should keep unknown node kinds as foreign nodes', () => {
    const result = loadMaterialDocument(doc([{ id: 'tex', kind: 'ShaderNodeTexImage', image: 'rock.png' }]));
    if (!result.success) throw new Error('expected success');
    expect(result.data.materials[0].graph.nodes[0]).toEqual({ id: 'tex', kind: 'foreign', hostType: 'ShaderNodeTexImage' });
  });

  it('should default missing groups and links to empty lists', () => {
    const result = loadMaterialDocument({
      version: 1,
      materials: [{ name: 'Bare', graph: { id: 'bare', name: 'Bare', nodes: [{ id: 'out', kind: 'bake_output' }] } }],
    });
    if (!result.success) throw new Error('expected success');
    expect(result.data.groups).toEqual([]);
    expect(result.data.materials[0].graph.links).toEqual([]);
  });

  describe('structural errors', () => {
    it('should reject an unknown version', () => {
      const result = loadMaterialDocument({ ...doc([]), version: 2 });
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.errors).toEqual([expect.objectContaining({ path: ['version'], code: 'invalid_literal' })]);
    });

    it('should report bad parameters with their path', () => {
      const result = loadMaterialDocument(doc([{ id: 'm', kind: 'math', operation: 'HYPOT' }]));
      if (result.success) throw new Error('expected failure');
      expect(result.errors).toEqual([
        expect.objectContaining({
          path: ['materials', '0', 'graph', 'nodes', '0', 'operation'],
          code: 'invalid_enum_value',
        }),
      ]);
    });

    it('should reject ramps without stops', () => {
      const result = loadMaterialDocument(doc([{ id: 'ramp', kind: 'color_ramp', stops: [] }]));
      if (result.success) throw new Error('expected failure');
      expect(result.errors[0]).toMatchObject({ path: ['materials', '0', 'graph', 'nodes', '0', 'stops'], code: 'too_small' });
    });
  });

  describe('semantic errors', () => {
    const semantic = (json: unknown) => {
      const result = loadMaterialDocument(json);
      if (result.success) throw new Error('expected failure');
      return result.errors;
    };

    it('should reject duplicate node ids', () => {
      expect(semantic(doc([{ id: 'v', kind: 'value', value: 1 }, { id: 'v', kind: 'value', value: 2 }]))).toEqual([{
        path: ['materials', '0', 'graph', 'nodes', '1', 'id'],
        message: "Duplicate Node ID 'v' in graph 'mat'.",
        code: 'semantic_error',
      }]);
    });

    it('should reject duplicate graph ids', () => {
      const errors = semantic(doc([], [], [tintGroup, { ...tintGroup, name: 'Copy' }]));
      expect(errors).toEqual([expect.objectContaining({ path: ['groups', '1', 'id'], message: "Duplicate Graph ID 'grp-tint'." })]);
    });

    it('should reject unknown group references', () => {
      expect(semantic(doc([{ id: 'g', kind: 'group', group: 'nope' }]))).toEqual([
        expect.objectContaining({ message: "Node 'g' references unknown group 'nope'." }),
      ]);
    });

    it('should reject links to missing nodes', () => {
      const errors = semantic(doc(
        [{ id: 'out', kind: 'bake_output' }],
        [{ from: { node: 'ghost', socket: 'Value' }, to: { node: 'out', socket: 'Alpha' } }],
      ));
      expect(errors).toEqual([expect.objectContaining({
        path: ['materials', '0', 'graph', 'links', '0', 'from', 'node'],
        message: "Link source 'ghost' does not exist.",
      })]);
    });

    it('should reject undeclared sockets on fixed-socket kinds', () => {
      const errors = semantic(doc(
        [{ id: 'v', kind: 'value', value: 1 }, { id: 'inv', kind: 'invert' }],
        [{ from: { node: 'v', socket: 'Color' }, to: { node: 'inv', socket: 'Amount' } }],
      ));
      expect(errors.map(e => e.message)).toEqual([
        "Node 'v' (value) has no output 'Color'.",
        "Node 'inv' (invert) has no input 'Amount'.",
      ]);
    });

    it('should accept any socket on dynamic-socket kinds', () => {
      const result = loadMaterialDocument(doc(
        [{ id: 'g', kind: 'group', group: 'grp-tint' }, { id: 'out', kind: 'bake_output' }],
        [{ from: { node: 'g', socket: 'Whatever' }, to: { node: 'out', socket: 'Custom' } }],
      ));
      expect(result.success).toBe(true);
    });

    it('should reject a second link into the same input', () => {
      const errors = semantic(doc(
        [{ id: 'a', kind: 'value', value: 1 }, { id: 'b', kind: 'value', value: 2 }, { id: 'out', kind: 'bake_output' }],
        [
          { from: { node: 'a', socket: 'Value' }, to: { node: 'out', socket: 'Alpha' } },
          { from: { node: 'b', socket: 'Value' }, to: { node: 'out', socket: 'Alpha' } },
        ],
      ));
      expect(errors).toEqual([{
        path: ['materials', '0', 'graph', 'links', '1', 'to'],
        message: "Input 'Alpha' of node 'out' has more than one incoming link.",
        code: 'semantic_error',
      }]);
    });

    it('should validate group graphs too', () => {
      const broken = { ...tintGroup, links: [{ from: { node: 'nope', socket: 'Value' }, to: { node: 'out', socket: 'Value' } }] };
      const errors = semantic(doc([], [], [broken]));
      expect(errors).toEqual([expect.objectContaining({ path: ['groups', '0', 'links', '0', 'from', 'node'] })]);
    });
  });
});

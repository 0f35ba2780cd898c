import { describe, expect, it, vi } from 'vitest';
import { searchTree, Unbounded, walkTree } from '../src/treeSearch';
import { NodeModel } from '../src/nodeModel';
import { chain, node, sampleTree } from './helpers/trees';

function visitOrder(root: NodeModel, direction: 'forward' | 'backward', depthLimit = Unbounded): string[] {
  const visited: string[] = [];
  searchTree(
    root,
    (current, depth) => {
      visited.push(`${current.type}@${depth}`);
      return false;
    },
    direction,
    depthLimit
  );
  return visited;
}

describe('searchTree', () => {
  it('visits parents before children, left to right when searching forward', () => {
    expect(visitOrder(sampleTree(), 'forward')).toEqual([
      'Program@0',
      'BinaryExpr@1',
      'Num@2',
      'Op@2',
      'Num@2',
      'Call@1',
      'Ident@2',
      'Args@2',
      'Num@3',
      'Str@3'
    ]);
  });

  it('visits children right to left when searching backward', () => {
    expect(visitOrder(sampleTree(), 'backward')).toEqual([
      'Program@0',
      'Call@1',
      'Args@2',
      'Str@3',
      'Num@3',
      'Ident@2',
      'BinaryExpr@1',
      'Num@2',
      'Op@2',
      'Num@2'
    ]);
  });

  it('returns the leftmost match forward and the rightmost match backward', () => {
    const isNum = (current: NodeModel) => current.type === 'Num';

    expect(searchTree(sampleTree(), isNum, 'forward')?.span).toEqual({ start: 0, end: 1 });
    expect(searchTree(sampleTree(), isNum, 'backward')?.span).toEqual({ start: 11, end: 12 });
  });

  it('treats the root as eligible', () => {
    const root = sampleTree();
    expect(searchTree(root, () => true)).toBe(root);
  });

  it('returns undefined when nothing matches', () => {
    expect(searchTree(sampleTree(), (current) => current.type === 'Missing')).toBeUndefined();
  });

  it('only evaluates the root when the depth limit is zero', () => {
    const predicate = vi.fn(() => false);

    expect(searchTree(sampleTree(), predicate, 'forward', 0)).toBeUndefined();
    expect(predicate).toHaveBeenCalledTimes(1);
    expect(predicate).toHaveBeenCalledWith(expect.objectContaining({ type: 'Program' }), 0);
  });

  it('evaluates nodes at the depth limit without descending into them', () => {
    expect(visitOrder(sampleTree(), 'forward', 1)).toEqual(['Program@0', 'BinaryExpr@1', 'Call@1']);
    expect(visitOrder(sampleTree(), 'backward', 2)).toEqual([
      'Program@0',
      'Call@1',
      'Args@2',
      'Ident@2',
      'BinaryExpr@1',
      'Num@2',
      'Op@2',
      'Num@2'
    ]);
  });

  it('stops at a leaf', () => {
    expect(visitOrder(node('Leaf', 0, 1), 'forward')).toEqual(['Leaf@0']);
  });

  it('rethrows predicate failures unchanged', () => {
    const failure = new Error('predicate exploded');

    expect(() =>
      searchTree(sampleTree(), (current) => {
        if (current.type === 'Op') {
          throw failure;
        }
        return false;
      })
    ).toThrow(failure);
  });

  it('rejects negative and fractional depth limits before searching', () => {
    const predicate = vi.fn(() => true);

    expect(() => searchTree(sampleTree(), predicate, 'forward', -1)).toThrow(RangeError);
    expect(() => searchTree(sampleTree(), predicate, 'forward', 1.5)).toThrow(RangeError);
    expect(predicate).not.toHaveBeenCalled();
  });

  it('handles trees far deeper than the call stack allows', () => {
    const deep = chain(200_000);

    const leaf = searchTree(deep, (current) => current.type === 'Leaf');

    expect(leaf?.span).toEqual({ start: 200_000, end: 200_001 });
  });
});

describe('walkTree', () => {
  it('visits every node once', () => {
    const types: string[] = [];
    walkTree(sampleTree(), (current) => types.push(current.type));

    expect(types).toHaveLength(10);
  });
});

import { NodeModel } from './nodeModel';

export type SearchDirection = 'forward' | 'backward';

export type NodePredicate = (node: NodeModel, depth: number) => boolean;

export const Unbounded = Number.POSITIVE_INFINITY;

interface SearchFrame {
  children: readonly NodeModel[];
  depth: number;
  remaining: number;
}

/**
 * Pre-order depth-first search that stops at the first node accepted by
 * `predicate`. `forward` visits children left-to-right, `backward`
 * right-to-left. Nodes at `depthLimit` are evaluated but not descended into.
 *
 * Uses an explicit frame stack, so arbitrarily deep trees cannot exhaust the
 * call stack. Errors thrown by the predicate reach the caller untouched.
 */
export function searchTree(
  root: NodeModel,
  predicate: NodePredicate,
  direction: SearchDirection = 'forward',
  depthLimit: number = Unbounded
): NodeModel | undefined {
  assertDepthLimit(depthLimit);

  if (predicate(root, 0)) {
    return root;
  }
  if (depthLimit <= 0 || !root.children.length) {
    return undefined;
  }

  const stack: SearchFrame[] = [{ children: root.children, depth: 1, remaining: root.children.length }];
  while (stack.length) {
    const frame = stack[stack.length - 1];
    if (frame.remaining === 0) {
      stack.pop();
      continue;
    }

    const index = direction === 'forward' ? frame.children.length - frame.remaining : frame.remaining - 1;
    frame.remaining -= 1;
    const node = frame.children[index];

    if (predicate(node, frame.depth)) {
      return node;
    }
    if (frame.depth < depthLimit && node.children.length) {
      stack.push({ children: node.children, depth: frame.depth + 1, remaining: node.children.length });
    }
  }

  return undefined;
}

export function walkTree(root: NodeModel, visit: (node: NodeModel, depth: number) => void): void {
  searchTree(root, (node, depth) => {
    visit(node, depth);
    return false;
  });
}

function assertDepthLimit(depthLimit: number) {
  if (depthLimit === Unbounded) {
    return;
  }
  if (!Number.isInteger(depthLimit) || depthLimit < 0) {
    throw new RangeError(`Depth limit must be a non-negative integer or Unbounded, got ${depthLimit}.`);
  }
}

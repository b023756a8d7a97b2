/**
 * Generic Red-Black tree utilities.
 * Provides immutable balancing operations for any R-B tree node type.
 *
 * Every structural edit is expressed through `join` (concatenate two trees
 * around a middle node) and `join2` (concatenate without one). Callers split
 * a tree at a position, drop or replace the middle, and join the halves back:
 * O(log n) per edit with full red-black balance, and no delete fix-up cases.
 */

import type { NodeColor, RBNode } from '../../types/state.ts';

// Re-export RBNode for consumers that import from rb-tree
export type { RBNode };

// =============================================================================
// Types
// =============================================================================

/**
 * Function type for creating a new node with updated properties.
 * Each concrete node type provides its own implementation that handles
 * recalculating aggregate values (subtree sizes, black height, etc).
 */
export type WithNodeFn<N extends RBNode<N>> = (
  node: N,
  updates: Partial<{ color: NodeColor; left: N | null; right: N | null }>
) => N;

// =============================================================================
// Color Utilities
// =============================================================================

/**
 * Check if a node is red.
 * Returns false for null/undefined nodes (they're treated as black).
 */
export function isRed<N extends RBNode<N>>(node: N | null | undefined): boolean {
  return node != null && node.color === 'red';
}

/**
 * Check if a node is black.
 * Null nodes are considered black.
 */
export function isBlack<N extends RBNode<N>>(node: N | null | undefined): boolean {
  return node == null || node.color === 'black';
}

/**
 * Black height of a subtree; 0 for the empty tree.
 */
export function blackHeight<N extends RBNode<N>>(node: N | null): number {
  return node === null ? 0 : node.blackHeight;
}

/**
 * Black height for a node with the given color and left child.
 */
export function computeBlackHeight<N extends RBNode<N>>(color: NodeColor, left: N | null): number {
  return blackHeight(left) + (color === 'black' ? 1 : 0);
}

// =============================================================================
// Rotations
// =============================================================================

/**
 * Rotate left at the given node. Returns the new subtree root.
 * Immutable - creates new nodes using the provided withNode function.
 *
 *       x                y
 *      / \              / \
 *     a   y    =>      x   c
 *        / \          / \
 *       b   c        a   b
 */
export function rotateLeft<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  const right = node.right;
  if (right === null) return node;

  const newNode = withNode(node, {
    right: right.left,
  });

  return withNode(right, {
    left: newNode,
  });
}

/**
 * Rotate right at the given node. Returns the new subtree root.
 * Immutable - creates new nodes using the provided withNode function.
 *
 *         y            x
 *        / \          / \
 *       x   c   =>   a   y
 *      / \              / \
 *     a   b            b   c
 */
export function rotateRight<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  const left = node.left;
  if (left === null) return node;

  const newNode = withNode(node, {
    left: left.right,
  });

  return withNode(left, {
    right: newNode,
  });
}

// =============================================================================
// Balancing
// =============================================================================

/**
 * Ensure the root is black.
 */
export function ensureBlackRoot<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  if (node.color === 'red') {
    return withNode(node, { color: 'black' });
  }
  return node;
}

// =============================================================================
// Join
// =============================================================================

/**
 * Descend the right spine of `left` until black heights match, hang
 * `mid` there, and repair red-red violations on the way back up.
 */
function joinRight<N extends RBNode<N>>(
  left: N | null,
  mid: N,
  right: N | null,
  withNode: WithNodeFn<N>
): N {
  if (left === null || (left.color === 'black' && left.blackHeight === blackHeight(right))) {
    return withNode(mid, { color: 'red', left, right });
  }

  const joined = withNode(left, { right: joinRight(left.right, mid, right, withNode) });
  const child = joined.right;
  if (
    left.color === 'black' &&
    child !== null && child.color === 'red' &&
    child.right !== null && child.right.color === 'red'
  ) {
    const recolored = withNode(joined, {
      right: withNode(child, { right: withNode(child.right, { color: 'black' }) }),
    });
    return rotateLeft(recolored, withNode);
  }
  return joined;
}

/**
 * Mirror image of joinRight.
 */
function joinLeft<N extends RBNode<N>>(
  left: N | null,
  mid: N,
  right: N | null,
  withNode: WithNodeFn<N>
): N {
  if (right === null || (right.color === 'black' && right.blackHeight === blackHeight(left))) {
    return withNode(mid, { color: 'red', left, right });
  }

  const joined = withNode(right, { left: joinLeft(left, mid, right.left, withNode) });
  const child = joined.left;
  if (
    right.color === 'black' &&
    child !== null && child.color === 'red' &&
    child.left !== null && child.left.color === 'red'
  ) {
    const recolored = withNode(joined, {
      left: withNode(child, { left: withNode(child.left, { color: 'black' }) }),
    });
    return rotateRight(recolored, withNode);
  }
  return joined;
}

/**
 * Concatenate `left`, `mid` and `right` in that order.
 * Every node of `left` must precede `mid`, which must precede `right`.
 * O(|bh(left) - bh(right)|).
 */
export function join<N extends RBNode<N>>(
  leftTree: N | null,
  mid: N,
  rightTree: N | null,
  withNode: WithNodeFn<N>
): N {
  // Inputs are joined with black roots
  const left = leftTree !== null && leftTree.color === 'red' ? withNode(leftTree, { color: 'black' }) : leftTree;
  const right = rightTree !== null && rightTree.color === 'red' ? withNode(rightTree, { color: 'black' }) : rightTree;
  const leftHeight = blackHeight(left);
  const rightHeight = blackHeight(right);

  if (leftHeight > rightHeight) {
    const joined = joinRight(left, mid, right, withNode);
    if (joined.color === 'red' && isRed(joined.right)) {
      return withNode(joined, { color: 'black' });
    }
    return joined;
  }

  if (rightHeight > leftHeight) {
    const joined = joinLeft(left, mid, right, withNode);
    if (joined.color === 'red' && isRed(joined.left)) {
      return withNode(joined, { color: 'black' });
    }
    return joined;
  }

  const color: NodeColor = isBlack(left) && isBlack(right) ? 'red' : 'black';
  return withNode(mid, { color, left, right });
}

/**
 * Detach the last (rightmost) node. O(log n).
 */
export function splitLast<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): { rest: N | null; last: N } {
  if (node.right === null) {
    return { rest: node.left, last: node };
  }
  const { rest, last } = splitLast(node.right, withNode);
  return { rest: join(node.left, node, rest, withNode), last };
}

/**
 * Concatenate two trees. O(log n).
 */
export function join2<N extends RBNode<N>>(
  left: N | null,
  right: N | null,
  withNode: WithNodeFn<N>
): N | null {
  if (left === null) return right;
  if (right === null) return left;
  const { rest, last } = splitLast(left, withNode);
  return join(rest, last, right, withNode);
}

/**
 * Build a tree from detached nodes given in order.
 */
export function fromSequence<N extends RBNode<N>>(
  nodes: Iterable<N>,
  withNode: WithNodeFn<N>
): N | null {
  let root: N | null = null;
  for (const node of nodes) {
    root = join(root, node, null, withNode);
  }
  return root === null ? null : ensureBlackRoot(root, withNode);
}

// =============================================================================
// Traversal
// =============================================================================

/**
 * In-order traversal without recursion.
 */
export function* inOrder<N extends RBNode<N>>(root: N | null): Generator<N> {
  const stack: N[] = [];
  let current = root;
  while (current !== null || stack.length > 0) {
    while (current !== null) {
      stack.push(current);
      current = current.left;
    }
    const node = stack.pop();
    if (node === undefined) break;
    yield node;
    current = node.right;
  }
}

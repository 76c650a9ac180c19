/**
 * randtext — Optimizer
 *
 * One post-order pass over a freshly compiled tree. Children are optimized
 * first, then each sequence:
 *
 *   1. drops children that are empty (stable),
 *   2. folds neighbouring constants into one,
 *   3. is replaced by its only child, if it has exactly one.
 *
 * Every node sees the same draws as before, so per-node sources give the
 * same output. The one node removed that draws from the
 * random source is a `{0}` repetition, so with a shared source such as
 * counter() the draws after it shift by one. Single-child alternations
 * are kept as they are. Running the pass twice gives the same tree.
 */

import type { GeneratorNode } from './types';
import { alternation, constant, isEmpty, repetition, sequence } from './nodes';

function optimizeSequence(children: readonly GeneratorNode[]): GeneratorNode {
  const kept: GeneratorNode[] = [];

  for (const child of children) {
    if (isEmpty(child)) {
      continue;
    }
    const last = kept.at(-1);
    if (last?.type === 'constant' && child.type === 'constant') {
      kept[kept.length - 1] = constant(last.text + child.text);
    } else {
      kept.push(child);
    }
  }

  return kept.length === 1 ? kept[0] : sequence(kept);
}

function childrenOf(node: GeneratorNode): readonly GeneratorNode[] {
  switch (node.type) {
    case 'repetition':
      return [node.child];
    case 'sequence':
    case 'alternation':
      return node.children;
    default:
      return [];
  }
}

function rebuild(node: GeneratorNode, children: readonly GeneratorNode[]): GeneratorNode {
  switch (node.type) {
    case 'repetition':
      return repetition(node.min, node.max, children[0]);
    case 'sequence':
      return optimizeSequence(children);
    case 'alternation':
      return alternation(children);
    default:
      return node;
  }
}

interface Pending {
  node: GeneratorNode;
  children: readonly GeneratorNode[];
  /** Optimized copies of the children visited so far. */
  done: GeneratorNode[];
}

/**
 * Return an optimized copy of a tree. The input is not modified.
 */
export function optimize(node: GeneratorNode): GeneratorNode {
  // Post-order on an explicit stack, as compiled trees may nest far deeper
  // than the call stack allows.
  const stack: Pending[] = [{ node, children: childrenOf(node), done: [] }];

  for (;;) {
    const top = stack[stack.length - 1];
    if (top.done.length < top.children.length) {
      const child = top.children[top.done.length];
      stack.push({ node: child, children: childrenOf(child), done: [] });
      continue;
    }

    stack.pop();
    const optimized = rebuild(top.node, top.done);
    const parent = stack.at(-1);
    if (parent === undefined) {
      return optimized;
    }
    parent.done.push(optimized);
  }
}

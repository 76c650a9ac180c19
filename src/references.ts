import type { GeneratorNode, VariableNode } from './types';

/** Every variable node in a tree, left to right. Referenced trees are not followed. */
function variableNodes(tree: GeneratorNode): VariableNode[] {
  const found: VariableNode[] = [];
  const pending: GeneratorNode[] = [tree];

  for (let node = pending.pop(); node !== undefined; node = pending.pop()) {
    switch (node.type) {
      case 'variable':
        found.push(node);
        break;
      case 'repetition':
        pending.push(node.child);
        break;
      case 'sequence':
      case 'alternation':
        // Reversed so that children come off the stack left to right.
        for (let i = node.children.length - 1; i >= 0; i--) {
          pending.push(node.children[i]);
        }
        break;
    }
  }

  return found;
}

/** Names referenced by $variables in a tree, in first-seen order. */
export function collectReferences(tree: GeneratorNode): string[] {
  return [...new Set(variableNodes(tree).map(node => node.name))];
}

/**
 * Referenced names that the tree's registry does not define right now.
 * These generate nothing; this is for reporting only.
 */
export function findUnresolved(tree: GeneratorNode): string[] {
  const missing = variableNodes(tree)
    .filter(node => !node.registry.has(node.name))
    .map(node => node.name);
  return [...new Set(missing)];
}

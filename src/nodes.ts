import type {
  GeneratorNode,
  ConstantNode,
  CharClassNode,
  VariableNode,
  RepetitionNode,
  SequenceNode,
  AlternationNode,
  ReadonlyRegistry,
} from './types';

export function constant(text: string): ConstantNode {
  return { type: 'constant', text };
}

export function charClass(chars: readonly string[]): CharClassNode {
  return { type: 'charclass', chars };
}

export function variable(name: string, registry: ReadonlyRegistry): VariableNode {
  return { type: 'variable', name, registry };
}

export function repetition(min: number, max: number, child: GeneratorNode): RepetitionNode {
  return { type: 'repetition', min, max, child };
}

export function sequence(children: readonly GeneratorNode[]): SequenceNode {
  return { type: 'sequence', children };
}

export function alternation(children: readonly GeneratorNode[]): AlternationNode {
  return { type: 'alternation', children };
}

/**
 * Whether a node is structurally empty and can be dropped from a sequence.
 *
 * A variable is never reported empty: what it refers to may be defined or
 * redefined after this tree is built.
 */
export function isEmpty(node: GeneratorNode): boolean {
  switch (node.type) {
    case 'constant':
      return node.text.length === 0;

    case 'charclass':
      return node.chars.length === 0;

    case 'variable':
      return false;

    case 'repetition':
      return node.min === 0 && node.max === 0;

    case 'sequence':
    case 'alternation':
      return node.children.length === 0;
  }
}

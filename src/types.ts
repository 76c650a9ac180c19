/**
 * randtext — Generator Node Types
 *
 * A compiled pattern is a tree of generator nodes. Every node is immutable
 * once built; the optimizer returns new nodes rather than editing old ones.
 */

/** One compiled unit of a pattern. */
export type GeneratorNode =
  | ConstantNode
  | CharClassNode
  | VariableNode
  | RepetitionNode
  | SequenceNode
  | AlternationNode;

/** Nodes that draw a value from the random source when generating. */
export type RandomSite = CharClassNode | RepetitionNode | AlternationNode;

/** A fixed run of literal text. */
export interface ConstantNode {
  readonly type: 'constant';
  readonly text: string;
}

/**
 * One character picked from an explicit list, e.g. [a-cx].
 * Duplicates are kept, so [aab] picks 'a' twice as often as 'b'.
 */
export interface CharClassNode {
  readonly type: 'charclass';
  readonly chars: readonly string[];
}

/**
 * A reference to a named tree, e.g. $word. The name is resolved against
 * the registry every time the node generates, never at compile time.
 */
export interface VariableNode {
  readonly type: 'variable';
  readonly name: string;
  readonly registry: ReadonlyRegistry;
}

/** The child emitted between min and max times (inclusive), e.g. x{2,5}. */
export interface RepetitionNode {
  readonly type: 'repetition';
  readonly min: number;
  readonly max: number;
  readonly child: GeneratorNode;
}

/** Children emitted in order. */
export interface SequenceNode {
  readonly type: 'sequence';
  readonly children: readonly GeneratorNode[];
}

/** Exactly one child emitted, e.g. (a|b|c). */
export interface AlternationNode {
  readonly type: 'alternation';
  readonly children: readonly GeneratorNode[];
}

/** The lookup side of the registry, which is all a compiled tree needs. */
export interface ReadonlyRegistry {
  lookup(name: string): GeneratorNode | undefined;
  has(name: string): boolean;
}

/**
 * Supplies non-negative integers on demand. `site` is the node asking,
 * so an implementation may keep one stream per node or share one stream
 * across the whole tree.
 */
export interface RandomSource {
  next(site: RandomSite): number;
}

/**
 * randtext — Generator
 *
 * Walks a compiled tree and writes a random string. Randomness is drawn
 * only by char classes, repetitions and alternations, one value per node
 * visit, so a fixed tree and a fixed stream of values always give the
 * same output.
 */

import type { GeneratorNode, RandomSource, RandomSite } from './types';

export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GenerationError';
  }
}

/** Default ceiling on nested variable lookups (can be overridden). */
const DEFAULT_MAX_VARIABLE_DEPTH = 64;

export interface GenerateOptions {
  /**
   * How many variable references may be open at once before generation
   * gives up. This is what stops `a = $b` / `b = $a` from recursing forever.
   * Set to 0 or Infinity to disable.
   * Default: 64
   */
  maxVariableDepth?: number;
}

function draw(random: RandomSource, site: RandomSite): number {
  const value = random.next(site);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new GenerationError(`Random source produced ${value}, expected a non-negative integer`);
  }
  return value;
}

interface Visit {
  node: GeneratorNode;
  /** Variable references open above this node. */
  depth: number;
  /** How many more times to walk the node, counting this one. */
  times: number;
}

// Explicit stack: group nesting times variable depth can run to tens of
// thousands of levels. Nodes come off it in depth-first order, so the
// draws keep their order.
function walk(root: GeneratorNode, output: string[], random: RandomSource, maxDepth: number): void {
  const pending: Visit[] = [{ node: root, depth: 0, times: 1 }];

  for (let visit = pending.pop(); visit !== undefined; visit = pending.pop()) {
    const { node, depth, times } = visit;
    if (times > 1) {
      pending.push({ node, depth, times: times - 1 });
    }

    switch (node.type) {
      case 'constant':
        output.push(node.text);
        break;

      case 'charclass':
        if (node.chars.length > 0) {
          output.push(node.chars[draw(random, node) % node.chars.length]);
        }
        break;

      case 'variable': {
        // Unknown names produce nothing.
        const target = node.registry.lookup(node.name);
        if (target === undefined) {
          break;
        }
        if (depth >= maxDepth) {
          throw new GenerationError(
            `Variable $${node.name} is nested more than ${maxDepth} levels deep; ` +
            'the definitions probably refer to each other in a cycle',
          );
        }
        pending.push({ node: target, depth: depth + 1, times: 1 });
        break;
      }

      case 'repetition': {
        const count = node.min + (draw(random, node) % (node.max - node.min + 1));
        if (count > 0) {
          pending.push({ node: node.child, depth, times: count });
        }
        break;
      }

      case 'sequence':
        for (let i = node.children.length - 1; i >= 0; i--) {
          pending.push({ node: node.children[i], depth, times: 1 });
        }
        break;

      case 'alternation':
        if (node.children.length > 0) {
          pending.push({ node: node.children[draw(random, node) % node.children.length], depth, times: 1 });
        }
        break;
    }
  }
}

/**
 * Append one generated string to `output`, fragment by fragment.
 */
export function generate(
  node: GeneratorNode,
  output: string[],
  random: RandomSource,
  options?: GenerateOptions,
): void {
  const limit = options?.maxVariableDepth ?? DEFAULT_MAX_VARIABLE_DEPTH;
  walk(node, output, random, limit > 0 ? limit : Infinity);
}

/**
 * Generate one string from a compiled tree.
 *
 * @example
 * ```ts
 * const tree = optimize(compile('id-[0-9]{4}', new Registry()));
 * evaluate(tree, seeded(42));
 * // e.g. 'id-3071'
 * ```
 */
export function evaluate(tree: GeneratorNode, random: RandomSource, options?: GenerateOptions): string {
  const output: string[] = [];
  generate(tree, output, random, options);
  return output.join('');
}

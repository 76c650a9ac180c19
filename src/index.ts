/**
 * randtext
 *
 * Compiles small regex-like patterns into generator trees and draws random
 * strings from them: log lines, fixtures, sample data.
 */

import { compile } from './compiler';
import type { CompileOptions } from './compiler';
import { optimize } from './optimizer';
import { evaluate } from './generator';
import type { GenerateOptions } from './generator';
import { mathRandom } from './random';
import { Registry } from './registry';
import type { RandomSource, ReadonlyRegistry } from './types';

// Re-export types
export type {
  GeneratorNode,
  RandomSite,
  ConstantNode,
  CharClassNode,
  VariableNode,
  RepetitionNode,
  SequenceNode,
  AlternationNode,
  ReadonlyRegistry,
  RandomSource,
} from './types';

export { compile, tryCompile, CompileError } from './compiler';
export type { CompileOptions } from './compiler';
export { optimize } from './optimizer';
export { generate, evaluate, GenerationError } from './generator';
export type { GenerateOptions } from './generator';
export { Registry } from './registry';
export {
  counter,
  perSiteCounter,
  fixed,
  seeded,
  mathRandom,
  XorShift32,
  fnv1a32,
} from './random';
export {
  constant,
  charClass,
  variable,
  repetition,
  sequence,
  alternation,
  isEmpty,
} from './nodes';
export { collectReferences, findUnresolved } from './references';
export {
  parseDefinitionLine,
  loadDefinitions,
  readDefinitionsFile,
  DefinitionLineError,
  DefinitionFileError,
} from './definitions';
export type { Definition, CompileFailure, LoadOptions, LoadResult } from './definitions';

export interface RandtextOptions {
  random?: RandomSource;
  registry?: ReadonlyRegistry;
  compile?: CompileOptions;
  generate?: GenerateOptions;
}

/**
 * Compile, optimize and evaluate a pattern in one step.
 *
 * @example
 * ```ts
 * import { randtext, seeded } from 'randtext';
 *
 * randtext('user-[0-9]{3}');
 * // e.g. 'user-482'
 *
 * randtext('(GET|POST) /api/v1', { random: seeded(7) });
 * // 'GET /api/v1' or 'POST /api/v1', the same one on every run
 * ```
 */
export function randtext(pattern: string, options?: RandtextOptions): string {
  const registry = options?.registry ?? new Registry();
  const tree = optimize(compile(pattern, registry, options?.compile));
  return evaluate(tree, options?.random ?? mathRandom(), options?.generate);
}

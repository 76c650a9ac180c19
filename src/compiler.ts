/**
 * randtext — Pattern Compiler
 *
 * A character-driven state machine that turns a pattern string into a tree
 * of generator nodes. Groups are tracked with an explicit stack of scope
 * frames rather than recursion, so nesting depth never touches the call
 * stack and unbalanced parentheses surface as CompileError.
 *
 * Grammar:
 *
 *   pattern     := alternative ( '|' alternative )*
 *   alternative := atom*
 *   atom        := literal | charclass | variable | group
 *   atom        := atom '{' repetition '}'
 *   literal     := any char except ( ) [ { | $ \  or '\' any char
 *   charclass   := '[' ( char | char '-' char )* ']'
 *   variable    := '$' [A-Za-z0-9_]+
 *   group       := '(' pattern ')'
 *   repetition  := digits ',' digits | digits ',' | ',' digits | digits
 *
 * A literal run is a single atom: `ab{3}` repeats "ab", not "b".
 */

import { Result, ok, err } from 'neverthrow';
import type { GeneratorNode, ReadonlyRegistry } from './types';
import { alternation, charClass, constant, repetition, sequence, variable } from './nodes';

export class CompileError extends Error {
  constructor(
    public readonly reason: string,
    public readonly position: number,
  ) {
    super(`Compile error at position ${position}: ${reason}`);
    this.name = 'CompileError';
  }
}

/** Default ceiling on group nesting (can be overridden). */
const DEFAULT_MAX_NESTING_DEPTH = 256;

/** Default ceiling on a repetition's upper bound (can be overridden). */
const DEFAULT_MAX_REPETITIONS = 10_000;

export interface CompileOptions {
  /**
   * Deepest allowed group nesting; `((a))` has depth 2.
   * Set to 0 or Infinity to disable.
   * Default: 256
   */
  maxNestingDepth?: number;
  /**
   * Largest allowed repetition upper bound.
   * Set to 0 or Infinity to disable.
   * Default: 10,000
   */
  maxRepetitions?: number;
}

type State = 'default' | 'charclass' | 'variable' | 'repetition' | 'escape';

const END = Symbol('end of input');
type Token = string | typeof END;

/** One open group: the alternatives closed so far and the one being built. */
interface Frame {
  readonly alternatives: GeneratorNode[];
  sequence: GeneratorNode[];
  readonly openedAt: number;
}

const DIGIT = /^[0-9]$/;
const WORD_CHAR = /^[A-Za-z0-9_]$/;

function describeToken(token: Token): string {
  return token === END ? 'end of pattern' : `'${token}'`;
}

function codePoint(ch: string): number {
  return ch.codePointAt(0) ?? 0;
}

function resolveLimit(value: number | undefined, fallback: number): number {
  const limit = value ?? fallback;
  return limit > 0 ? limit : Infinity;
}

class PatternCompiler {
  private state: State = 'default';
  private readonly savedStates: State[] = [];
  private readonly frames: Frame[] = [{ alternatives: [], sequence: [], openedAt: 0 }];

  /** Literal run, variable name or repetition digits, depending on state. */
  private text = '';

  private classChars: string[] = [];
  private rangePending = false;

  private bounds: number[] = [];
  private repetitionStart = 0;

  private root: GeneratorNode | undefined;

  private readonly maxNestingDepth: number;
  private readonly maxRepetitions: number;

  constructor(
    private readonly registry: ReadonlyRegistry,
    options?: CompileOptions,
  ) {
    this.maxNestingDepth = resolveLimit(options?.maxNestingDepth, DEFAULT_MAX_NESTING_DEPTH);
    this.maxRepetitions = resolveLimit(options?.maxRepetitions, DEFAULT_MAX_REPETITIONS);
  }

  run(pattern: string): GeneratorNode {
    let position = 0;
    for (const ch of pattern) {
      this.process(ch, position);
      position += ch.length;
    }
    this.process(END, position);

    if (this.root === undefined) {
      throw new CompileError('unexpected end of pattern', position);
    }
    return this.root;
  }

  private get frame(): Frame {
    return this.frames[this.frames.length - 1];
  }

  private enter(next: State): void {
    this.savedStates.push(this.state);
    this.state = next;
  }

  private restore(position: number): void {
    const previous = this.savedStates.pop();
    if (previous === undefined) {
      throw new CompileError('unbalanced scopes', position);
    }
    this.state = previous;
  }

  private process(token: Token, position: number): void {
    let reprocess: boolean;
    do {
      reprocess = false;
      switch (this.state) {
        case 'default':
          this.onDefault(token, position);
          break;
        case 'repetition':
          this.onRepetition(token, position);
          break;
        case 'variable':
          reprocess = this.onVariableName(token, position);
          break;
        case 'charclass':
          reprocess = this.onCharClass(token, position);
          break;
        case 'escape':
          this.onEscape(token, position);
          break;
      }
    } while (reprocess);
  }

  private flushLiteral(): void {
    if (this.text.length > 0) {
      this.frame.sequence.push(constant(this.text));
      this.text = '';
    }
  }

  /** Close the alternative being built without leaving the group. */
  private closeAlternative(): void {
    this.frame.alternatives.push(sequence(this.frame.sequence));
    this.frame.sequence = [];
  }

  private onDefault(token: Token, position: number): void {
    if (token === END) {
      this.flushLiteral();
      if (this.frames.length !== 1) {
        throw new CompileError("unclosed '('", this.frame.openedAt);
      }
      this.closeAlternative();
      this.root = alternation(this.frame.alternatives);
      return;
    }

    switch (token) {
      case '\\':
        this.enter('escape');
        return;

      case '$':
        this.flushLiteral();
        this.enter('variable');
        return;

      case '(':
        this.flushLiteral();
        if (this.frames.length > this.maxNestingDepth) {
          throw new CompileError(
            `groups nested deeper than ${this.maxNestingDepth}`,
            position,
          );
        }
        this.enter('default');
        this.frames.push({ alternatives: [], sequence: [], openedAt: position });
        return;

      case ')': {
        this.flushLiteral();
        if (this.frames.length < 2) {
          throw new CompileError("unmatched ')'", position);
        }
        this.closeAlternative();
        const closed = this.frames.pop();
        if (closed === undefined) {
          throw new CompileError('unbalanced scopes', position);
        }
        this.frame.sequence.push(alternation(closed.alternatives));
        this.restore(position);
        return;
      }

      case '{':
        this.flushLiteral();
        this.bounds = [];
        this.repetitionStart = position;
        this.enter('repetition');
        return;

      case '[':
        this.flushLiteral();
        this.classChars = [];
        this.rangePending = false;
        this.enter('charclass');
        return;

      case '|':
        this.flushLiteral();
        this.closeAlternative();
        return;

      default:
        this.text += token;
    }
  }

  private onRepetition(token: Token, position: number): void {
    if (token === END) {
      throw new CompileError("unterminated repetition, expected '}'", position);
    }

    if (DIGIT.test(token)) {
      this.text += token;
      return;
    }

    if (token !== ',' && token !== '}') {
      throw new CompileError(`unexpected ${describeToken(token)} in repetition`, position);
    }

    const bound = this.text.length === 0 ? 0 : Number(this.text);
    this.text = '';
    if (!Number.isSafeInteger(bound)) {
      throw new CompileError('repetition bound is too large', position);
    }
    this.bounds.push(bound);
    if (this.bounds.length > 2) {
      throw new CompileError('repetition takes at most two bounds', position);
    }

    if (token === ',') {
      return;
    }

    const [min, max = min] = this.bounds;
    if (min > max) {
      throw new CompileError(
        `repetition lower bound ${min} exceeds upper bound ${max}`,
        this.repetitionStart,
      );
    }
    if (max > this.maxRepetitions) {
      throw new CompileError(
        `repetition upper bound ${max} exceeds the limit of ${this.maxRepetitions}`,
        this.repetitionStart,
      );
    }

    const current = this.frame.sequence;
    const target = current.pop();
    if (target === undefined) {
      throw new CompileError('repetition has nothing to repeat', this.repetitionStart);
    }
    current.push(repetition(min, max, target));
    this.restore(position);
  }

  /** Returns true when the token must be handled again by the restored state. */
  private onVariableName(token: Token, position: number): boolean {
    if (token !== END && WORD_CHAR.test(token)) {
      this.text += token;
      return false;
    }

    if (this.text.length === 0) {
      throw new CompileError(
        `expected a variable name after '$', found ${describeToken(token)}`,
        position,
      );
    }
    this.frame.sequence.push(variable(this.text, this.registry));
    this.text = '';
    this.restore(position);
    return true;
  }

  /** Returns true when the token must be handled again by the restored state. */
  private onCharClass(token: Token, position: number): boolean {
    if (token === END) {
      // A missing ']' closes the class at the end of the pattern.
      this.frame.sequence.push(charClass(this.classChars));
      this.restore(position);
      return true;
    }

    switch (token) {
      case '\\':
        this.enter('escape');
        return false;

      case '-':
        this.rangePending = true;
        return false;

      case ']':
        this.frame.sequence.push(charClass(this.classChars));
        this.restore(position);
        return false;

      default:
        if (!this.rangePending) {
          this.classChars.push(token);
          return false;
        }
        this.rangePending = false;
        this.expandRange(token);
        return false;
    }
  }

  /**
   * Append (previous, last] to the class. An inverted or empty range, or a
   * range with nothing before the dash, appends nothing.
   */
  private expandRange(last: string): void {
    const previous = this.classChars.at(-1);
    if (previous === undefined) {
      return;
    }
    const from = codePoint(previous);
    const to = codePoint(last);
    for (let cp = from + 1; cp <= to; cp++) {
      this.classChars.push(String.fromCodePoint(cp));
    }
  }

  private onEscape(token: Token, position: number): void {
    if (token === END) {
      throw new CompileError("pattern ends with an unfinished '\\' escape", position);
    }
    this.restore(position);
    if (this.state === 'charclass') {
      this.classChars.push(token);
    } else {
      this.text += token;
    }
  }
}

/**
 * Compile a pattern into an unoptimized generator tree.
 *
 * Variable references are bound to `registry` by name and resolved at
 * generation time, so names defined later are still picked up.
 *
 * Throws CompileError if the pattern is malformed.
 */
export function compile(
  pattern: string,
  registry: ReadonlyRegistry,
  options?: CompileOptions,
): GeneratorNode {
  return new PatternCompiler(registry, options).run(pattern);
}

/**
 * Like compile(), but returns the CompileError instead of throwing it.
 */
export function tryCompile(
  pattern: string,
  registry: ReadonlyRegistry,
  options?: CompileOptions,
): Result<GeneratorNode, CompileError> {
  try {
    return ok(compile(pattern, registry, options));
  } catch (error) {
    if (error instanceof CompileError) {
      return err(error);
    }
    throw error;
  }
}

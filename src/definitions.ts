/**
 * randtext — Definitions
 *
 * Reads `name = pattern` lines and compiles each pattern into the registry,
 * in file order, so a pattern can refer to any name defined above it (and,
 * since variables resolve lazily, below it too).
 *
 *   # comment
 *   digit = [0-9]
 *   year  = (19|20)$digit{2}
 */

import { readFile } from 'node:fs/promises';
import { Result, ok, err } from 'neverthrow';
import { tryCompile, type CompileError, type CompileOptions } from './compiler';
import { optimize } from './optimizer';
import { Registry } from './registry';

export class DefinitionLineError extends Error {
  constructor(
    public readonly reason: string,
    public readonly line: number,
  ) {
    super(`Line ${line}: ${reason}`);
    this.name = 'DefinitionLineError';
  }
}

export class DefinitionFileError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'DefinitionFileError';
  }
}

/** A `name = pattern` line as written. */
export interface Definition {
  name: string;
  pattern: string;
  /** 1-based line number. */
  line: number;
}

/** A definition whose pattern did not compile; it is left out of the registry. */
export interface CompileFailure {
  definition: Definition;
  error: CompileError;
}

export interface LoadOptions {
  /** Registry to add to. A new one is created when omitted. */
  registry?: Registry;
  compile?: CompileOptions;
}

export interface LoadResult {
  registry: Registry;
  definitions: Definition[];
  failures: CompileFailure[];
}

type LineState = 'leading' | 'name' | 'afterName' | 'beforeValue';

function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

/**
 * Split one line into a definition.
 *
 * Returns ok(undefined) for blank and comment lines. Whitespace around the
 * name and the '=' is ignored; the pattern runs from its first non-blank
 * character to the end of the line, trailing spaces included.
 */
export function parseDefinitionLine(
  text: string,
  line = 1,
): Result<Definition | undefined, DefinitionLineError> {
  const raw = text.endsWith('\r') ? text.slice(0, -1) : text;
  let state: LineState = 'leading';
  let name = '';

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];

    switch (state) {
      case 'leading':
        if (isBlank(ch)) break;
        if (ch === '#') return ok(undefined);
        if (ch === '=') return err(new DefinitionLineError('missing variable name before "="', line));
        name += ch;
        state = 'name';
        break;

      case 'name':
        if (isBlank(ch)) {
          state = 'afterName';
        } else if (ch === '=') {
          state = 'beforeValue';
        } else {
          name += ch;
        }
        break;

      case 'afterName':
        if (isBlank(ch)) break;
        if (ch === '=') {
          state = 'beforeValue';
          break;
        }
        return err(new DefinitionLineError('unexpected characters after variable name', line));

      case 'beforeValue':
        if (isBlank(ch)) break;
        return ok({ name, pattern: raw.slice(i), line });
    }
  }

  if (state === 'leading') {
    return ok(undefined);
  }
  return err(new DefinitionLineError('line ended before a value', line));
}

/**
 * Parse and compile a whole definitions document.
 *
 * Stops at the first malformed line and returns its DefinitionLineError.
 * A pattern that fails to compile does not stop loading: it is recorded in
 * `failures` and the name stays undefined.
 *
 * @example
 * ```ts
 * const loaded = loadDefinitions('digit = [0-9]\npin = $digit{4}');
 * if (loaded.isOk()) {
 *   const pin = loaded.value.registry.lookup('pin');
 * }
 * ```
 */
export function loadDefinitions(
  source: string | readonly string[],
  options?: LoadOptions,
): Result<LoadResult, DefinitionLineError> {
  const lines = typeof source === 'string' ? source.split('\n') : source;
  const registry = options?.registry ?? new Registry();
  const definitions: Definition[] = [];
  const failures: CompileFailure[] = [];

  for (let i = 0; i < lines.length; i++) {
    const parsed = parseDefinitionLine(lines[i], i + 1);
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    const definition = parsed.value;
    if (definition === undefined) {
      continue;
    }
    definitions.push(definition);

    const compiled = tryCompile(definition.pattern, registry, options?.compile);
    if (compiled.isErr()) {
      failures.push({ definition, error: compiled.error });
      continue;
    }
    registry.define(definition.name, optimize(compiled.value));
  }

  return ok({ registry, definitions, failures });
}

/**
 * Read a definitions file from disk and load it.
 */
export async function readDefinitionsFile(
  path: string,
  options?: LoadOptions,
): Promise<Result<LoadResult, DefinitionLineError | DefinitionFileError>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown read error';
    return err(new DefinitionFileError(`Cannot read definitions file ${path}: ${message}`, path));
  }

  return loadDefinitions(content, options);
}

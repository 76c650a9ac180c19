import { Command } from 'commander';
import { tryCompile, type CompileError, type CompileOptions } from './compiler';
import { readDefinitionsFile, type CompileFailure } from './definitions';
import { evaluate, GenerationError } from './generator';
import { optimize } from './optimizer';
import { mathRandom, seeded } from './random';
import { findUnresolved } from './references';
import { Registry } from './registry';
import { resolveSettings, type CliFlags, type Settings } from './config';
import { createLogger, type Logger } from './logger';
import type { GeneratorNode } from './types';

export interface CommandIO {
  /** Receives generated text and listings, one line per call. */
  out: (line: string) => void;
  logger: Logger;
}

function compileOptions(settings: Settings): CompileOptions {
  return {
    maxNestingDepth: settings.maxDepth,
    maxRepetitions: settings.maxRepetitions,
  };
}

/**
 * Format a compile error with the pattern and a caret under the offending
 * character, e.g.
 *
 *   unmatched ')'
 *     ab)c
 *       ^
 */
export function formatCompileError(pattern: string, error: CompileError): string {
  // position counts UTF-16 units; the caret column counts code points.
  const column = Array.from(pattern.slice(0, error.position)).length;
  return [error.reason, `  ${pattern}`, `  ${' '.repeat(column)}^`].join('\n');
}

export function formatCompileFailure(failure: CompileFailure): string {
  const { definition, error } = failure;
  return `${definition.name} (line ${definition.line}): ${formatCompileError(definition.pattern, error)}`;
}

function emit(tree: GeneratorNode, settings: Settings, io: CommandIO): number {
  const random = settings.seed === undefined ? mathRandom() : seeded(settings.seed);
  try {
    for (let i = 0; i < settings.count; i++) {
      io.out(evaluate(tree, random, { maxVariableDepth: settings.maxVariableDepth }));
    }
  } catch (error) {
    if (error instanceof GenerationError) {
      io.logger.error(error.message);
      return 1;
    }
    throw error;
  }
  return 0;
}

export async function runGenerate(
  file: string,
  name: string,
  settings: Settings,
  io: CommandIO,
): Promise<number> {
  const loaded = await readDefinitionsFile(file, { compile: compileOptions(settings) });
  if (loaded.isErr()) {
    io.logger.error(loaded.error.message);
    return 1;
  }

  const { registry, failures } = loaded.value;
  for (const failure of failures) {
    io.logger.warn(formatCompileFailure(failure));
  }

  const tree = registry.lookup(name);
  if (tree === undefined) {
    io.logger.error(`"${name}" is not defined in ${file}`);
    return 1;
  }
  io.logger.debug(`Generating ${settings.count} value(s) from "${name}"`);
  return emit(tree, settings, io);
}

export async function runList(file: string, settings: Settings, io: CommandIO): Promise<number> {
  const loaded = await readDefinitionsFile(file, { compile: compileOptions(settings) });
  if (loaded.isErr()) {
    io.logger.error(loaded.error.message);
    return 1;
  }

  for (const definition of loaded.value.definitions) {
    io.out(`${definition.name} = ${definition.pattern}`);
  }
  return 0;
}

/**
 * Report every definition that fails to compile and every reference to an
 * undefined name. Only compile failures make the exit code non-zero.
 */
export async function runCheck(file: string, settings: Settings, io: CommandIO): Promise<number> {
  const loaded = await readDefinitionsFile(file, { compile: compileOptions(settings) });
  if (loaded.isErr()) {
    io.logger.error(loaded.error.message);
    return 1;
  }

  const { registry, definitions, failures } = loaded.value;
  for (const failure of failures) {
    io.logger.error(formatCompileFailure(failure));
  }

  let warnings = 0;
  for (const name of registry.names()) {
    const tree = registry.lookup(name);
    if (tree === undefined) continue;
    for (const missing of findUnresolved(tree)) {
      io.logger.warn(`${name}: $${missing} is not defined and will generate nothing`);
      warnings++;
    }
  }

  io.out(`${definitions.length} definition(s), ${failures.length} error(s), ${warnings} warning(s)`);
  return failures.length > 0 ? 1 : 0;
}

export function runEval(pattern: string, settings: Settings, io: CommandIO): number {
  const compiled = tryCompile(pattern, new Registry(), compileOptions(settings));
  if (compiled.isErr()) {
    io.logger.error(formatCompileError(pattern, compiled.error));
    return 1;
  }
  return emit(optimize(compiled.value), settings, io);
}

// --- Registration ---

type Runner = (settings: Settings, io: CommandIO) => number | Promise<number>;

async function execute(command: Command, run: Runner): Promise<void> {
  const flags = command.optsWithGlobals<CliFlags>();
  const settings = resolveSettings(flags);
  if (settings.isErr()) {
    createLogger('error').error(settings.error.message);
    process.exitCode = 1;
    return;
  }

  const io: CommandIO = {
    out: (line) => process.stdout.write(`${line}\n`),
    logger: createLogger(settings.value.logLevel),
  };
  process.exitCode = await run(settings.value, io);
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Generate random strings from a named definition')
    .argument('<file>', 'Definitions file')
    .argument('<name>', 'Definition to generate from')
    .option('-n, --count <n>', 'Number of strings to generate')
    .option('--seed <n>', 'Seed for reproducible output')
    .action(async (file: string, name: string, _options: unknown, command: Command) => {
      await execute(command, (settings, io) => runGenerate(file, name, settings, io));
    });
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List the definitions in a file')
    .argument('<file>', 'Definitions file')
    .action(async (file: string, _options: unknown, command: Command) => {
      await execute(command, (settings, io) => runList(file, settings, io));
    });
}

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Compile every definition and report errors and undefined references')
    .argument('<file>', 'Definitions file')
    .action(async (file: string, _options: unknown, command: Command) => {
      await execute(command, (settings, io) => runCheck(file, settings, io));
    });
}

export function registerEvalCommand(program: Command): void {
  program
    .command('eval')
    .description('Generate random strings from a pattern given on the command line')
    .argument('<pattern>', 'Pattern to compile')
    .option('-n, --count <n>', 'Number of strings to generate')
    .option('--seed <n>', 'Seed for reproducible output')
    .action(async (pattern: string, _options: unknown, command: Command) => {
      await execute(command, (settings, io) => runEval(pattern, settings, io));
    });
}

export function createProgram(version: string): Command {
  const program = new Command();
  program
    .name('randtext')
    .description('Generate random text from regex-like patterns')
    .version(version)
    .option('--verbose', 'Log debug output')
    .option('--quiet', 'Only log errors')
    .option('--max-repetitions <n>', 'Largest repetition upper bound a pattern may use')
    .option('--max-depth <n>', 'Deepest group nesting a pattern may use')
    .option('--max-variable-depth <n>', 'Deepest chain of $variable lookups while generating');

  registerGenerateCommand(program);
  registerListCommand(program);
  registerCheckCommand(program);
  registerEvalCommand(program);

  return program;
}

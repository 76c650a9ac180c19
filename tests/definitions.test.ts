import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  parseDefinitionLine,
  loadDefinitions,
  readDefinitionsFile,
  DefinitionLineError,
  DefinitionFileError,
} from '../src/definitions';
import { evaluate } from '../src/generator';
import { counter, perSiteCounter } from '../src/random';
import { Registry } from '../src/registry';

function lineError(text: string, line?: number): DefinitionLineError {
  const result = parseDefinitionLine(text, line);
  if (result.isOk()) {
    throw new Error(`expected "${text}" to be rejected`);
  }
  return result.error;
}

describe('definitions', () => {
  describe('parseDefinitionLine', () => {
    it('splits name and pattern', () => {
      expect(parseDefinitionLine('name = pattern')._unsafeUnwrap()).toEqual({
        name: 'name',
        pattern: 'pattern',
        line: 1,
      });
    });

    it('allows any spacing around the name and =', () => {
      expect(parseDefinitionLine('  word=[a-z]{3}')._unsafeUnwrap()).toEqual({
        name: 'word',
        pattern: '[a-z]{3}',
        line: 1,
      });
      expect(parseDefinitionLine('\tx\t=\ty', 4)._unsafeUnwrap()).toEqual({
        name: 'x',
        pattern: 'y',
        line: 4,
      });
    });

    it('keeps the pattern as written up to the end of the line', () => {
      expect(parseDefinitionLine('a = b = c  ')._unsafeUnwrap()?.pattern).toBe('b = c  ');
    });

    it('strips a trailing carriage return', () => {
      expect(parseDefinitionLine('a = b\r')._unsafeUnwrap()?.pattern).toBe('b');
    });

    it('skips blank and comment lines', () => {
      expect(parseDefinitionLine('')._unsafeUnwrap()).toBeUndefined();
      expect(parseDefinitionLine('   ')._unsafeUnwrap()).toBeUndefined();
      expect(parseDefinitionLine('  # some comment')._unsafeUnwrap()).toBeUndefined();
    });

    it('only treats a leading # as a comment', () => {
      expect(parseDefinitionLine('a#b = c')._unsafeUnwrap()?.name).toBe('a#b');
    });

    it('rejects text between the name and =', () => {
      const error = lineError('name other = x', 3);
      expect(error.reason).toBe('unexpected characters after variable name');
      expect(error.line).toBe(3);
      expect(error.message).toBe('Line 3: unexpected characters after variable name');
    });

    it('rejects a line without a value', () => {
      expect(lineError('name').reason).toBe('line ended before a value');
      expect(lineError('name =').reason).toBe('line ended before a value');
      expect(lineError('name =   ').reason).toBe('line ended before a value');
    });

    it('rejects a line without a name', () => {
      expect(lineError('= x').reason).toBe('missing variable name before "="');
    });
  });

  describe('loadDefinitions', () => {
    it('loads nothing from a comment', () => {
      const loaded = loadDefinitions('# some comment')._unsafeUnwrap();
      expect(loaded.registry.size).toBe(0);
      expect(loaded.definitions).toEqual([]);
    });

    it('compiles each definition into the registry', () => {
      const loaded = loadDefinitions('digit = [0-9]\n\npin = $digit{4}\n')._unsafeUnwrap();
      expect(loaded.registry.names()).toEqual(['digit', 'pin']);
      expect(loaded.definitions.map(d => d.line)).toEqual([1, 3]);

      const pin = loaded.registry.lookup('pin');
      expect(pin).toBeDefined();
      if (pin) {
        expect(evaluate(pin, perSiteCounter())).toBe('0123');
      }
    });

    it('resolves forward references when generating', () => {
      const loaded = loadDefinitions(['greeting = hi $name', 'name = bob'])._unsafeUnwrap();
      const greeting = loaded.registry.lookup('greeting');
      expect(greeting && evaluate(greeting, counter())).toBe('hi bob');
    });

    it('stops at the first malformed line', () => {
      const result = loadDefinitions('a = x\nbad line here\nc = y');
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(DefinitionLineError);
        expect(result.error.line).toBe(2);
      }
    });

    it('records patterns that fail to compile and keeps going', () => {
      const loaded = loadDefinitions('a = (x\nb = y')._unsafeUnwrap();
      expect(loaded.definitions).toHaveLength(2);
      expect(loaded.failures).toHaveLength(1);
      expect(loaded.failures[0].definition.name).toBe('a');
      expect(loaded.failures[0].error.reason).toBe("unclosed '('");
      expect(loaded.registry.has('a')).toBe(false);
      expect(loaded.registry.has('b')).toBe(true);
    });

    it('adds to a given registry', () => {
      const registry = new Registry();
      loadDefinitions('a = 1', { registry });
      loadDefinitions('b = 2$a', { registry });
      const b = registry.lookup('b');
      expect(b && evaluate(b, counter())).toBe('21');
    });

    it('passes compile options through', () => {
      const loaded = loadDefinitions('a = x{9}', { compile: { maxRepetitions: 5 } })._unsafeUnwrap();
      expect(loaded.failures[0].error.reason).toBe(
        'repetition upper bound 9 exceeds the limit of 5',
      );
    });
  });

  describe('readDefinitionsFile', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'randtext-defs-'));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('reads and loads a file', async () => {
      const path = join(dir, 'names.txt');
      await writeFile(path, '# names\nfirst = (Ann|Bob)\r\n');
      const result = await readDefinitionsFile(path);
      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.definitions).toEqual([
          { name: 'first', pattern: '(Ann|Bob)', line: 2 },
        ]);
      }
    });

    it('reports a missing file', async () => {
      const result = await readDefinitionsFile(join(dir, 'missing.txt'));
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(DefinitionFileError);
      }
    });
  });
});

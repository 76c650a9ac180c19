import { describe, it, expect } from 'vitest';
import {
  randtext,
  CompileError,
  GenerationError,
  Registry,
  constant,
  counter,
  perSiteCounter,
  seeded,
  variable,
} from '../src/index';

describe('randtext', () => {
  it('generates with the defaults', () => {
    expect(randtext('hello')).toBe('hello');
    expect(randtext('[ab]{4}')).toMatch(/^[ab]{4}$/);
  });

  it('draws from the given random source', () => {
    expect(randtext('[abc]{3}', { random: counter() })).toBe('cab');
    expect(randtext('[abc]{3}', { random: perSiteCounter() })).toBe('abc');
  });

  it('is reproducible with a seeded source', () => {
    const first = randtext('[a-z]{8}', { random: seeded(5) });
    expect(randtext('[a-z]{8}', { random: seeded(5) })).toBe(first);
  });

  it('resolves variables through the given registry', () => {
    const registry = new Registry();
    registry.define('n', constant('7'));
    expect(randtext('id-$n', { registry })).toBe('id-7');
    expect(randtext('id-$n')).toBe('id-');
  });

  it('passes compile options through', () => {
    expect(() => randtext('x{20}', { compile: { maxRepetitions: 10 } })).toThrow(CompileError);
    expect(() => randtext('x{20}', { compile: { maxRepetitions: 10 } })).toThrow(
      'repetition upper bound 20 exceeds the limit of 10',
    );
    expect(randtext('x{20}', { compile: { maxRepetitions: 0 } })).toBe('x'.repeat(20));
  });

  it('passes generate options through', () => {
    const registry = new Registry();
    registry.define('a', variable('b', registry));
    registry.define('b', variable('a', registry));
    expect(() => randtext('$a', { registry, generate: { maxVariableDepth: 3 } })).toThrow(
      GenerationError,
    );
    expect(() => randtext('$a', { registry, generate: { maxVariableDepth: 3 } })).toThrow(
      'Variable $b is nested more than 3 levels deep',
    );
  });
});

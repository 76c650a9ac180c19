import { describe, it, expect } from 'vitest';
import { compile } from '../src/compiler';
import { collectReferences, findUnresolved } from '../src/references';
import { constant } from '../src/nodes';
import { Registry } from '../src/registry';

describe('references', () => {
  it('collects referenced names left to right', () => {
    const tree = compile('$a-$b-$a($c|x){2}', new Registry());
    expect(collectReferences(tree)).toEqual(['a', 'b', 'c']);
  });

  it('finds names the registry does not define', () => {
    const registry = new Registry();
    registry.define('a', constant('x'));
    const tree = compile('$a-$b-$a($c|x){2}', registry);
    expect(findUnresolved(tree)).toEqual(['b', 'c']);
  });

  it('reflects later definitions', () => {
    const registry = new Registry();
    const tree = compile('$later', registry);
    expect(findUnresolved(tree)).toEqual(['later']);
    registry.define('later', constant('x'));
    expect(findUnresolved(tree)).toEqual([]);
  });
});

import type { GeneratorNode, ReadonlyRegistry } from './types';

/**
 * Named trees that patterns refer to with $name.
 *
 * Entries are overwritten by redefinition and never removed. Variable nodes
 * look names up on every generate call, so a redefinition is seen by trees
 * compiled before it.
 */
export class Registry implements ReadonlyRegistry {
  private readonly entries = new Map<string, GeneratorNode>();

  define(name: string, tree: GeneratorNode): void {
    this.entries.set(name, tree);
  }

  lookup(name: string): GeneratorNode | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Defined names, in first-definition order. */
  names(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}

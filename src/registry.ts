import type { UtilityResolver } from "./shared.js";

/** Arena node: children are indices into the same node array. */
export interface TrieNode {
  children: Map<string, number>;
  /** Index into the resolver table when a prefix ends at this node. */
  entry: number | null;
}

export interface RegistryEntry {
  prefix: string;
  resolver: UtilityResolver;
  order: number;
}

/** Longest registered prefix of a token and the resolver behind it. */
export interface RegistryMatch {
  prefix: string;
  resolver: UtilityResolver;
  /** Registration sequence number, used to order output deterministically. */
  order: number;
}

/**
 * Read-only prefix lookup over a snapshot of registered resolvers.
 * Safe to share between any number of generators.
 */
export class ResolverRegistry {
  constructor(
    private readonly nodes: readonly TrieNode[],
    private readonly entries: readonly RegistryEntry[],
  ) {}

  /** Number of distinct registered prefixes. */
  get size(): number {
    return this.entries.length;
  }

  /** Registered prefixes in registration order. */
  prefixes(): string[] {
    return [...this.entries].sort((a, b) => a.order - b.order).map((entry) => entry.prefix);
  }

  /**
   * Find the longest registered prefix of `token`. Cost depends only on the
   * token's length.
   */
  resolve(token: string): RegistryMatch | null {
    let node = 0;
    let best: number | null = null;
    for (const char of token) {
      const next = this.nodes[node].children.get(char);
      if (next === undefined) {
        break;
      }
      node = next;
      const entry = this.nodes[node].entry;
      if (entry !== null) {
        best = entry;
      }
    }
    if (best === null) {
      return null;
    }
    const { prefix, resolver, order } = this.entries[best];
    return { prefix, resolver, order };
  }
}

/** Collects prefix registrations, then freezes them into a {@link ResolverRegistry}. */
export class RegistryBuilder {
  private readonly nodes: TrieNode[] = [{ children: new Map(), entry: null }];
  private readonly entries: RegistryEntry[] = [];
  private sequence = 0;

  /**
   * Register a resolver under a prefix. Registering the same prefix again
   * replaces the earlier resolver.
   * @param prefix Token prefix such as `"p-"` or `"flex"`.
   */
  register(prefix: string, resolver: UtilityResolver): this {
    if (prefix.length === 0) {
      throw new Error(`Cannot register resolver "${resolver.name}" under an empty prefix`);
    }

    let node = 0;
    for (const char of prefix) {
      let next = this.nodes[node].children.get(char);
      if (next === undefined) {
        next = this.nodes.length;
        this.nodes.push({ children: new Map(), entry: null });
        this.nodes[node].children.set(char, next);
      }
      node = next;
    }

    const order = this.sequence;
    this.sequence += 1;
    const existing = this.nodes[node].entry;
    if (existing === null) {
      this.nodes[node].entry = this.entries.length;
      this.entries.push({ prefix, resolver, order });
    } else {
      this.entries[existing] = { prefix, resolver, order };
    }
    return this;
  }

  /** Snapshot the current registrations. Later `register` calls do not affect it. */
  build(): ResolverRegistry {
    const nodes = this.nodes.map((node) =>
      Object.freeze({ children: new Map(node.children), entry: node.entry })
    );
    const entries = this.entries.map((entry) => Object.freeze({ ...entry }));
    return new ResolverRegistry(Object.freeze(nodes), Object.freeze(entries));
  }
}

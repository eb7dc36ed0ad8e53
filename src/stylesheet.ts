import {
  type CssFormat,
  type CssProperty,
  type Rule,
  toCssRule,
  toPrettyCssRule,
  wrapInAtRules,
  wrapInPrettyAtRule,
} from "./shared.js";
import { lengthToPixels } from "./values.js";

/** Ordering inputs for {@link Stylesheet}. */
export interface StylesheetOptions {
  /** Breakpoint widths; `@media (min-width: X)` queries built from them sort by width. */
  breakpoints: Readonly<Record<string, string>>;
  /** Configured cascade layer order. */
  layers: readonly string[];
}

interface StylesheetEntry {
  className: string;
  selector: string;
  mediaQuery?: string;
  layer?: string;
  properties: Map<string, CssProperty>;
  specificity: number;
  order: number;
}

interface QueryRank {
  bucket: number;
  width: number;
  text: string;
}

function entryKey(rule: Pick<Rule, "layer" | "mediaQuery" | "selector">): string {
  return `${rule.layer ?? ""}\u0000${rule.mediaQuery ?? ""}\u0000${rule.selector}`;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareEntries(a: StylesheetEntry, b: StylesheetEntry): number {
  return a.specificity - b.specificity || a.order - b.order || compareText(a.selector, b.selector);
}

function minWidthOf(query: string): number {
  const match = query.match(/\(min-width:\s*([^)]+)\)/);
  const pixels = match ? lengthToPixels(match[1]) : null;
  return pixels ?? Number.POSITIVE_INFINITY;
}

/**
 * Rules merged by `(layer, mediaQuery, selector)`. Serialization order does
 * not depend on insertion order.
 */
export class Stylesheet {
  private readonly entries = new Map<string, StylesheetEntry>();
  private readonly breakpointQueries = new Map<string, number>();

  constructor(private readonly options: StylesheetOptions) {
    for (const width of Object.values(options.breakpoints)) {
      this.breakpointQueries.set(
        `@media (min-width: ${width})`,
        lengthToPixels(width) ?? Number.POSITIVE_INFINITY,
      );
    }
  }

  /** Number of distinct keys. */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Merge a rule. Same-named properties are overwritten in place and new
   * ones appended. Returns `false` for invalid or empty rules.
   */
  insert(rule: Rule): boolean {
    if (!rule.valid || rule.properties.length === 0) {
      return false;
    }

    const key = entryKey(rule);
    let entry = this.entries.get(key);
    if (!entry) {
      entry = {
        className: rule.className,
        selector: rule.selector,
        mediaQuery: rule.mediaQuery,
        layer: rule.layer,
        properties: new Map(),
        specificity: rule.specificity,
        order: rule.order,
      };
      this.entries.set(key, entry);
    }
    for (const property of rule.properties) {
      entry.properties.set(property.name, { ...property });
    }
    return true;
  }

  /** Merged rules in output order. */
  rules(): Rule[] {
    const rules: Rule[] = [];
    for (const [, groups] of this.layerGroups()) {
      for (const [, entries] of groups) {
        for (const entry of entries) {
          rules.push({
            className: entry.className,
            selector: entry.selector,
            mediaQuery: entry.mediaQuery,
            layer: entry.layer,
            properties: [...entry.properties.values()],
            specificity: entry.specificity,
            order: entry.order,
            valid: true,
            errors: [],
          });
        }
      }
    }
    return rules;
  }

  /** Render the stylesheet as CSS text. */
  serialize(format: CssFormat = "compact"): string {
    const blocks: string[] = [];
    for (const [layer, groups] of this.layerGroups()) {
      if (format === "pretty") {
        const inner = this.prettyBlocks(groups, layer === undefined ? "" : "  ");
        blocks.push(...(layer === undefined ? inner : [wrapInPrettyAtRule(`@layer ${layer}`, inner)]));
        continue;
      }
      const inner = this.compactBlocks(groups);
      blocks.push(...(layer === undefined ? inner : [wrapInAtRules(inner.join(""), [`@layer ${layer}`])]));
    }
    return blocks.join(format === "pretty" ? "\n\n" : "\n");
  }

  private compactBlocks(groups: Map<string | undefined, StylesheetEntry[]>): string[] {
    const blocks: string[] = [];
    for (const [query, entries] of groups) {
      const rules = entries.map((entry) => toCssRule(entry.selector, [...entry.properties.values()]));
      if (query === undefined) {
        blocks.push(...rules);
      } else {
        blocks.push(wrapInAtRules(rules.join(""), [query]));
      }
    }
    return blocks;
  }

  private prettyBlocks(groups: Map<string | undefined, StylesheetEntry[]>, indent: string): string[] {
    const blocks: string[] = [];
    for (const [query, entries] of groups) {
      if (query === undefined) {
        for (const entry of entries) {
          blocks.push(toPrettyCssRule(entry.selector, [...entry.properties.values()], indent));
        }
        continue;
      }
      const rules = entries.map((entry) =>
        toPrettyCssRule(entry.selector, [...entry.properties.values()], `${indent}  `)
      );
      blocks.push(wrapInPrettyAtRule(query, rules, indent));
    }
    return blocks;
  }

  private queryRank(query: string | undefined): QueryRank {
    if (query === undefined) {
      return { bucket: 0, width: 0, text: "" };
    }
    const breakpoint = this.breakpointQueries.get(query);
    if (breakpoint !== undefined) {
      return { bucket: 1, width: breakpoint, text: query };
    }
    return { bucket: 2, width: minWidthOf(query), text: query };
  }

  private layerRank(layer: string): number {
    const index = this.options.layers.indexOf(layer);
    return index === -1 ? this.options.layers.length : index;
  }

  /** Entries grouped by layer, then by query, each level in output order. */
  private layerGroups(): Map<string | undefined, Map<string | undefined, StylesheetEntry[]>> {
    const byLayer = new Map<string | undefined, StylesheetEntry[]>();
    for (const entry of this.entries.values()) {
      const list = byLayer.get(entry.layer) ?? [];
      list.push(entry);
      byLayer.set(entry.layer, list);
    }

    // Sort [key, entries] pairs; a bare undefined key would skip the comparator.
    const layers = [...byLayer].sort(([a], [b]) => {
      if (a === undefined || b === undefined) {
        return a === undefined ? (b === undefined ? 0 : -1) : 1;
      }
      return this.layerRank(a) - this.layerRank(b) || compareText(a, b);
    });

    const result = new Map<string | undefined, Map<string | undefined, StylesheetEntry[]>>();
    for (const [layer, layerEntries] of layers) {
      const byQuery = new Map<string | undefined, StylesheetEntry[]>();
      for (const entry of layerEntries) {
        const list = byQuery.get(entry.mediaQuery) ?? [];
        list.push(entry);
        byQuery.set(entry.mediaQuery, list);
      }
      const queries = [...byQuery].sort(([a], [b]) => {
        const left = this.queryRank(a);
        const right = this.queryRank(b);
        return left.bucket - right.bucket || left.width - right.width || compareText(left.text, right.text);
      });
      const ordered = new Map<string | undefined, StylesheetEntry[]>();
      for (const [query, entries] of queries) {
        ordered.set(query, entries.sort(compareEntries));
      }
      result.set(layer, ordered);
    }
    return result;
  }
}

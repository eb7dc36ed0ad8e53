import { combineVariants } from "./combine.js";
import { resolveConfig, type ResolvedConfig, type UticssConfig } from "./config.js";
import type { ResolverRegistry } from "./registry.js";
import type {
  ClassOutcome,
  GenerationError,
  GenerationErrorKind,
  ParsedClass,
  ResolverContext,
  Rule,
} from "./shared.js";
import { Stylesheet } from "./stylesheet.js";
import { createDefaultRegistry } from "./utilities.js";
import { hasBracketSyntax, isBalanced } from "./values.js";
import { createVariantTable, splitVariants } from "./variants.js";

/** Output of one {@link Generator.generate} call. */
export interface GenerateResult {
  /** Serialized stylesheet. */
  css: string;
  /** Outcome per unique class, in first-seen order. */
  results: Map<string, ClassOutcome>;
  /** Merged rules in output order. */
  rules: Rule[];
}

/** A configured class-to-CSS pipeline. Reusable across any number of batches. */
export interface Generator {
  readonly config: ResolvedConfig;
  readonly registry: ResolverRegistry;
  /**
   * Generate CSS for a batch of classes. Entries may hold several
   * space-separated classes; a single string is one such entry.
   */
  generate(classes: string | Iterable<string>): GenerateResult;
  /** Split and resolve a single class without combining it. */
  parse(raw: string): ParsedClass | GenerationError;
}

/** Type guard separating {@link GenerationError} from a parsed class. */
export function isGenerationError(value: ParsedClass | GenerationError): value is GenerationError {
  return "kind" in value;
}

function failure(kind: GenerationErrorKind, className: string, message: string): GenerationError {
  return { kind, className, message };
}

/**
 * Build a generator. Configuration, variant table and registry are prepared
 * once and shared by every `generate` call.
 * @param registry Resolvers to use instead of the built-in set.
 */
export function createGenerator(
  config: UticssConfig = {},
  registry: ResolverRegistry = createDefaultRegistry(),
): Generator {
  const resolved = resolveConfig(config);
  const table = createVariantTable(resolved);
  const context: ResolverContext = Object.freeze({ theme: resolved.theme });

  const log = (mode: "failure" | "rule", message: string): void => {
    if ((mode === "failure" && !resolved.debug.logFailures) || (mode === "rule" && !resolved.debug.logRules)) {
      return;
    }
    console.log(`[uticss][${mode}] ${message}`);
  };

  function parse(raw: string): ParsedClass | GenerationError {
    const { variants, utility } = splitVariants(raw, table);
    const { token } = utility;

    if (token.length === 0 || token === "-") {
      return failure("UnknownUtility", raw, "missing utility after variants");
    }
    if (hasBracketSyntax(token) && !isBalanced(token)) {
      return failure("MalformedArbitraryValue", raw, `unbalanced brackets in "${token}"`);
    }

    const match = registry.resolve(token);
    if (!match) {
      return failure("UnknownUtility", raw, `no utility matches "${token}"`);
    }

    const properties = match.resolver.parse(utility, context);
    if (!properties || properties.length === 0) {
      return hasBracketSyntax(token)
        ? failure("MalformedArbitraryValue", raw, `cannot read the value in "${token}"`)
        : failure("UnknownUtility", raw, `"${token}" is not a known ${match.resolver.name} value`);
    }

    return { raw, variants, utility, properties, order: match.order };
  }

  function generateClass(raw: string, stylesheet: Stylesheet): ClassOutcome {
    const parsed = parse(raw);
    if (isGenerationError(parsed)) {
      log("failure", `${raw}: ${parsed.kind}: ${parsed.message}`);
      return { ok: false, error: parsed };
    }

    const rule = combineVariants(parsed);
    if (!rule.valid) {
      const error = failure("InvalidVariantCombination", raw, rule.errors.join("; "));
      log("failure", `${raw}: ${error.kind}: ${error.message}`);
      return { ok: false, error };
    }

    stylesheet.insert(rule);
    log("rule", rule.mediaQuery ? `${rule.mediaQuery} ${rule.selector}` : rule.selector);
    return { ok: true, selectors: [rule.selector] };
  }

  return {
    config: resolved,
    registry,
    parse,
    generate(classes) {
      const stylesheet = new Stylesheet(resolved);
      const results = new Map<string, ClassOutcome>();
      for (const entry of typeof classes === "string" ? [classes] : classes) {
        for (const raw of entry.split(/\s+/)) {
          if (raw.length === 0 || results.has(raw)) {
            continue;
          }
          results.set(raw, generateClass(raw, stylesheet));
        }
      }
      return {
        css: stylesheet.serialize(resolved.format),
        results,
        rules: stylesheet.rules(),
      };
    },
  };
}

/** One-shot helper: build a generator and return only the CSS. */
export function generateCss(classes: string | Iterable<string>, config: UticssConfig = {}): string {
  return createGenerator(config).generate(classes).css;
}

import { escapeClassName, type ParsedClass, type Rule, type VariantKind } from "./shared.js";

/** Specificity of a class with no variants. */
export const BASE_SPECIFICITY = 10;

/**
 * Compose the selector, at-rule context and specificity for a parsed class.
 * Always returns a rule; conflicting variants produce `valid: false` with
 * the reasons in `errors`.
 */
export function combineVariants(parsed: ParsedClass): Rule {
  const errors: string[] = [];

  const seen = new Map<VariantKind, string>();
  for (const variant of parsed.variants) {
    if (variant.multiplicity !== "unique") {
      continue;
    }
    const previous = seen.get(variant.kind);
    if (previous !== undefined) {
      errors.push(`duplicate ${variant.kind} variants (${previous}, ${variant.name})`);
    } else {
      seen.set(variant.kind, variant.name);
    }
  }

  const queries: string[] = [];
  for (const variant of parsed.variants) {
    if (variant.mediaQuery && !queries.includes(variant.mediaQuery)) {
      queries.push(variant.mediaQuery);
    }
  }
  if (queries.length > 1) {
    errors.push(`conflicting queries (${queries.join(", ")})`);
  }

  let ancestors = "";
  let suffixes = "";
  // Nothing may follow a pseudo-element in a selector.
  let pseudoElements = "";
  let specificity = BASE_SPECIFICITY;
  let layer: string | undefined;
  for (const variant of parsed.variants) {
    specificity += variant.weight;
    if (variant.placement === "ancestor") {
      ancestors += variant.fragment;
    } else if (variant.kind === "pseudo-element") {
      pseudoElements += variant.fragment;
    } else if (variant.placement === "suffix") {
      suffixes += variant.fragment;
    }
    if (variant.layer) {
      layer = variant.layer;
    }
  }

  const important = parsed.utility.important;
  return {
    className: parsed.raw,
    selector: `${ancestors}.${escapeClassName(parsed.raw)}${suffixes}${pseudoElements}`,
    mediaQuery: queries[0],
    layer,
    properties: parsed.properties.map((property) => ({
      ...property,
      important: property.important || important,
    })),
    specificity,
    order: parsed.order,
    valid: errors.length === 0,
    errors,
  };
}

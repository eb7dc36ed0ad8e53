/** A single CSS declaration produced by a utility resolver. */
export interface CssProperty {
  /** Property name in kebab-case (for example `"padding-top"`). */
  name: string;
  /** Serialized value (for example `"1rem"`). */
  value: string;
  /** Emit `!important` after the value. */
  important: boolean;
}

/** Variant families recognized by the splitter, listed in canonical priority. */
export type VariantKind =
  | "dark"
  | "group"
  | "peer"
  | "state"
  | "pseudo-element"
  | "container"
  | "layer"
  | "responsive"
  | "custom";

/** Where a variant's fragment goes relative to the base selector. */
export type VariantPlacement = "ancestor" | "suffix" | "none";

/** Whether a variant kind may appear more than once on one class. */
export type VariantMultiplicity = "unique" | "repeatable";

/** One recognized variant prefix. */
export interface VariantTag {
  kind: VariantKind;
  /** Variant name without the trailing colon (for example `"hover"`, `"@md/sidebar"`). */
  name: string;
  /** Prefix text as written, including the colon. */
  raw: string;
  /**
   * Selector text contributed by the variant. Ancestor fragments carry their
   * combinator (`".dark "`, `".peer:focus ~ "`), suffix fragments are appended
   * as-is (`":hover"`, `"::before"`). Empty for `none` placement.
   */
  fragment: string;
  placement: VariantPlacement;
  /** At-rule prelude the rule is wrapped in (for example `"@media (min-width: 640px)"`). */
  mediaQuery?: string;
  /** Cascade layer the rule is emitted into. */
  layer?: string;
  /** Specificity contribution. Always greater than zero. */
  weight: number;
  multiplicity: VariantMultiplicity;
}

/** Base utility token left after variant prefixes are stripped. */
export interface UtilityToken {
  /** Base token as written, including any `!` marker. */
  readonly raw: string;
  /** Token without the `!` marker. A leading `-` is kept. */
  readonly token: string;
  readonly important: boolean;
  readonly negative: boolean;
}

/** Intermediate record for one class between resolution and combination. */
export interface ParsedClass {
  raw: string;
  variants: readonly VariantTag[];
  utility: UtilityToken;
  properties: readonly CssProperty[];
  /** Registration order of the resolver that produced the properties. */
  order: number;
}

/** A selector, optional at-rule context and declarations for one class. */
export interface Rule {
  className: string;
  selector: string;
  mediaQuery?: string;
  layer?: string;
  properties: CssProperty[];
  specificity: number;
  order: number;
  valid: boolean;
  errors: string[];
}

/** Per-class failure categories. */
export type GenerationErrorKind =
  | "UnknownUtility"
  | "MalformedArbitraryValue"
  | "InvalidVariantCombination";

/** Why a single class produced no rule. */
export interface GenerationError {
  kind: GenerationErrorKind;
  className: string;
  message: string;
}

/** Result of generating one class. */
export type ClassOutcome =
  | { ok: true; selectors: string[] }
  | { ok: false; error: GenerationError };

/** Flat name to value scale (spacing, radii, shadows, ...). */
export type ThemeScale = Readonly<Record<string, string>>;

/** A single color or a palette of shades. */
export type ThemeColor = string | ThemeScale;

/** Design tokens consumed by the default resolvers. */
export interface Theme {
  screens: ThemeScale;
  containers: ThemeScale;
  colors: Readonly<Record<string, ThemeColor>>;
  spacing: ThemeScale;
  /** Font size plus its default line height. */
  fontSize: Readonly<Record<string, readonly [string, string]>>;
  fontWeight: ThemeScale;
  fontFamily: ThemeScale;
  lineHeight: ThemeScale;
  letterSpacing: ThemeScale;
  borderRadius: ThemeScale;
  borderWidth: ThemeScale;
  ringWidth: ThemeScale;
  outlineWidth: ThemeScale;
  outlineOffset: ThemeScale;
  boxShadow: ThemeScale;
  maxWidth: ThemeScale;
  zIndex: ThemeScale;
  opacity: ThemeScale;
  transitionDuration: ThemeScale;
  transitionTimingFunction: ThemeScale;
  rotate: ThemeScale;
  scale: ThemeScale;
  aspectRatio: ThemeScale;
}

/** Read-only data handed to every resolver. */
export interface ResolverContext {
  theme: Theme;
}

/**
 * Turns a base utility token into declarations.
 * Returns `null` when the token is not one this resolver understands.
 */
export interface UtilityResolver {
  name: string;
  parse(token: UtilityToken, context: ResolverContext): CssProperty[] | null;
}

/** Serialization style for generated CSS. */
export type CssFormat = "compact" | "pretty";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Own-property lookup that ignores keys inherited from `Object.prototype`. */
export function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

/** Create a declaration without the important flag. */
export function declaration(name: string, value: string): CssProperty {
  return { name, value, important: false };
}

/**
 * Escape a class name for use in a CSS selector.
 * @param className Raw class as written in markup.
 */
export function escapeClassName(className: string): string {
  let escaped = "";
  for (let i = 0; i < className.length; i += 1) {
    const char = className[i];
    const code = char.charCodeAt(0);
    if (i === 0 && code >= 48 && code <= 57) {
      escaped += `\\3${char} `;
      continue;
    }
    if (/[A-Za-z0-9_-]/.test(char) || code > 127) {
      escaped += char;
      continue;
    }
    escaped += `\\${char}`;
  }
  return escaped;
}

/**
 * Convert a property to a CSS declaration string.
 * @param pretty Use `name: value` spacing.
 */
export function toCssDeclaration(property: CssProperty, pretty = false): string {
  const important = property.important ? (pretty ? " !important" : "!important") : "";
  return pretty
    ? `${property.name}: ${property.value}${important}`
    : `${property.name}:${property.value}${important}`;
}

/** Build a compact CSS rule. */
export function toCssRule(selector: string, properties: readonly CssProperty[]): string {
  return `${selector}{${properties.map((property) => toCssDeclaration(property)).join(";")}}`;
}

/** Build an indented CSS rule. */
export function toPrettyCssRule(
  selector: string,
  properties: readonly CssProperty[],
  indent = "",
): string {
  const lines = properties.map((property) => `${indent}  ${toCssDeclaration(property, true)};`);
  return `${indent}${selector} {\n${lines.join("\n")}\n${indent}}`;
}

/** Wrap compact CSS text in at-rules, outermost first. */
export function wrapInAtRules(rule: string, atRules: readonly string[]): string {
  let wrapped = rule;
  for (let i = atRules.length - 1; i >= 0; i -= 1) {
    wrapped = `${atRules[i]}{${wrapped}}`;
  }
  return wrapped;
}

/** Wrap already-indented CSS blocks in an at-rule. */
export function wrapInPrettyAtRule(atRule: string, blocks: readonly string[], indent = ""): string {
  return `${indent}${atRule} {\n${blocks.join("\n\n")}\n${indent}}`;
}

import { ownValue, type ThemeColor, type ThemeScale } from "./shared.js";

const OPENERS: Record<string, string> = { "[": "]", "(": ")" };
const CLOSERS = new Set(["]", ")"]);

/** True when every `[`/`(` in the text is closed in order. */
export function isBalanced(input: string): boolean {
  const stack: string[] = [];
  for (const char of input) {
    const closer = OPENERS[char];
    if (closer) {
      stack.push(closer);
      continue;
    }
    if (CLOSERS.has(char)) {
      if (stack.pop() !== char) {
        return false;
      }
    }
  }
  return stack.length === 0;
}

/** True when the token uses arbitrary `[...]` or custom property `(...)` syntax. */
export function hasBracketSyntax(input: string): boolean {
  return input.includes("[") || input.includes("(");
}

/**
 * Decode an arbitrary value such as `[1fr_2fr]`.
 * `_` becomes a space and `\_` a literal underscore.
 * Returns `null` when the input is not a single bracketed, balanced value.
 */
export function parseArbitrary(input: string): string | null {
  if (!input.startsWith("[") || !input.endsWith("]") || input.length < 3) {
    return null;
  }
  if (!isBalanced(input)) {
    return null;
  }
  const inner = input.slice(1, -1);
  let depth = 0;
  for (const char of inner) {
    if (char === "[") depth += 1;
    if (char === "]") depth -= 1;
    if (depth < 0) return null;
  }
  return inner.replace(/\\_|_/g, (match) => (match === "_" ? " " : "_"));
}

/** Decode `(--name)` into `var(--name)`. */
export function parseCustomProperty(input: string): string | null {
  const match = input.match(/^\((--[A-Za-z0-9_-]+)\)$/);
  return match ? `var(${match[1]})` : null;
}

/** Arbitrary or custom property value, whichever the input uses. */
export function parseBracketValue(input: string): string | null {
  return parseArbitrary(input) ?? parseCustomProperty(input);
}

/**
 * Split a trailing `/modifier` off a value. Slashes inside brackets or
 * parentheses do not count.
 */
export function splitModifier(input: string): [string, string | null] {
  let depth = 0;
  for (let i = input.length - 1; i >= 0; i -= 1) {
    const char = input[i];
    if (char === "]" || char === ")") depth += 1;
    else if (char === "[" || char === "(") depth -= 1;
    else if (char === "/" && depth === 0) {
      return [input.slice(0, i), input.slice(i + 1)];
    }
  }
  return [input, null];
}

/** `1/2` → `50%`. */
export function resolveFraction(input: string): string | null {
  const match = input.match(/^(\d+)\/(\d+)$/);
  if (!match) {
    return null;
  }
  const denominator = Number(match[2]);
  if (denominator === 0) {
    return null;
  }
  const percent = (Number(match[1]) / denominator) * 100;
  return `${Number(percent.toFixed(6))}%`;
}

/** Opacity modifier: a theme step, a bare 0-100 number or an arbitrary value. */
export function resolveOpacity(modifier: string, scale: ThemeScale): string | null {
  const themed = ownValue(scale, modifier);
  if (themed !== undefined) {
    return themed;
  }
  if (/^\d+(\.\d+)?$/.test(modifier)) {
    const percent = Number(modifier);
    return percent <= 100 ? String(percent / 100) : null;
  }
  return parseBracketValue(modifier);
}

function expandHex(hex: string): string | null {
  const digits = hex.slice(1);
  if (/^[0-9a-fA-F]{3}$/.test(digits)) {
    return digits.split("").map((digit) => digit + digit).join("");
  }
  if (/^[0-9a-fA-F]{6}$/.test(digits)) {
    return digits;
  }
  return null;
}

/**
 * Apply an alpha value to a color. Hex colors become `rgb(r g b / a)`,
 * anything else goes through `color-mix`.
 */
export function withAlpha(color: string, alpha: string): string {
  const hex = color.startsWith("#") ? expandHex(color) : null;
  if (hex) {
    const channels = [0, 2, 4].map((offset) => parseInt(hex.slice(offset, offset + 2), 16));
    return `rgb(${channels.join(" ")} / ${alpha})`;
  }
  const numeric = Number(alpha);
  const percent = Number.isNaN(numeric) ? alpha : `${Number((numeric * 100).toFixed(4))}%`;
  return `color-mix(in srgb, ${color} ${percent}, transparent)`;
}

/** Look up `blue-500`, `white` or `brand` in the color table. */
export function lookupColor(colors: Readonly<Record<string, ThemeColor>>, name: string): string | null {
  const direct = ownValue(colors, name);
  if (typeof direct === "string") {
    return direct;
  }
  const dash = name.lastIndexOf("-");
  if (dash <= 0) {
    return null;
  }
  const palette = ownValue(colors, name.slice(0, dash));
  if (palette === undefined || typeof palette === "string") {
    return null;
  }
  return ownValue(palette, name.slice(dash + 1)) ?? null;
}

const COLOR_FUNCTION = /^(?:rgba?|hsla?|hwb|lab|lch|oklab|oklch|color|color-mix)\(/;

export function looksLikeColor(value: string): boolean {
  return (
    /^#(?:[0-9a-fA-F]{3,4}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/.test(value) ||
    COLOR_FUNCTION.test(value) ||
    value === "transparent" ||
    value === "currentColor"
  );
}

const LENGTH = /^-?(?:\d+|\d*\.\d+)(?:px|rem|em|%|vh|vw|vmin|vmax|dvh|svh|lvh|dvw|ch|ex|cqw|cqh|pt)$/;

export function looksLikeLength(value: string): boolean {
  return value === "0" || LENGTH.test(value) || /^(?:calc|min|max|clamp)\(/.test(value);
}

/** Negate a length: `1rem` → `-1rem`, `0px` stays, others go through `calc`. */
export function negate(value: string): string {
  if (/^0[a-z%]*$/.test(value)) {
    return value;
  }
  if (/^(?:\d+|\d*\.\d+)[a-z%]*$/.test(value)) {
    return `-${value}`;
  }
  return `calc(${value} * -1)`;
}

/** Convert `640px`, `40rem` or `40em` to pixels for ordering. */
export function lengthToPixels(value: string): number | null {
  const match = value.trim().match(/^(\d+|\d*\.\d+)(px|rem|em)$/);
  if (!match) {
    return null;
  }
  const amount = Number(match[1]);
  return match[2] === "px" ? amount : amount * 16;
}

import fs from "node:fs";
import { isRecord, type Theme, type ThemeColor, type ThemeScale } from "./shared.js";

/** Partial theme accepted from configuration, merged key by key over the defaults. */
export type ThemeOverrides = {
  [K in keyof Theme]?: Theme[K];
};

const SCALE_KEYS = [
  "screens",
  "containers",
  "spacing",
  "fontWeight",
  "fontFamily",
  "lineHeight",
  "letterSpacing",
  "borderRadius",
  "borderWidth",
  "ringWidth",
  "outlineWidth",
  "outlineOffset",
  "boxShadow",
  "maxWidth",
  "zIndex",
  "opacity",
  "transitionDuration",
  "transitionTimingFunction",
  "rotate",
  "scale",
  "aspectRatio",
] as const;

type ScaleKey = typeof SCALE_KEYS[number];

/** Theme sections that can appear in configuration. */
export const THEME_KEYS: readonly (keyof Theme)[] = [...SCALE_KEYS, "colors", "fontSize"];

/** Read a JSON file shipped in the package's `data/` directory. */
export function readDataFile(name: string): unknown {
  const url = new URL(`../data/${name}`, import.meta.url);
  return JSON.parse(fs.readFileSync(url, "utf8"));
}

function toScale(value: unknown, label: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new Error(`Theme section "${label}" must be an object of strings`);
  }
  const scale: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new Error(`Theme value "${label}.${key}" must be a string`);
    }
    scale[key] = entry;
  }
  return scale;
}

function toColors(value: unknown): Record<string, ThemeColor> {
  if (!isRecord(value)) {
    throw new Error(`Theme section "colors" must be an object`);
  }
  const colors: Record<string, ThemeColor> = {};
  for (const [name, entry] of Object.entries(value)) {
    colors[name] = typeof entry === "string" ? entry : toScale(entry, `colors.${name}`);
  }
  return colors;
}

function toFontSizes(value: unknown): Record<string, readonly [string, string]> {
  if (!isRecord(value)) {
    throw new Error(`Theme section "fontSize" must be an object`);
  }
  const sizes: Record<string, readonly [string, string]> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      sizes[name] = [entry, "1.5"];
      continue;
    }
    if (
      Array.isArray(entry) &&
      entry.length === 2 &&
      typeof entry[0] === "string" &&
      typeof entry[1] === "string"
    ) {
      sizes[name] = [entry[0], entry[1]];
      continue;
    }
    throw new Error(`Theme value "fontSize.${name}" must be a size or a [size, lineHeight] pair`);
  }
  return sizes;
}

function readScaleSection(source: Record<string, unknown>, key: ScaleKey): Record<string, string> | undefined {
  return source[key] === undefined ? undefined : toScale(source[key], key);
}

/**
 * Validate theme overrides coming from untyped input (a JSON config file).
 * Unknown sections are rejected.
 */
export function parseThemeOverrides(value: unknown): ThemeOverrides {
  if (!isRecord(value)) {
    throw new Error(`"theme" must be an object`);
  }
  for (const key of Object.keys(value)) {
    if (!THEME_KEYS.some((known) => known === key)) {
      throw new Error(`Unknown theme section "${key}"`);
    }
  }

  const overrides: ThemeOverrides = {};
  for (const key of SCALE_KEYS) {
    const scale = readScaleSection(value, key);
    if (scale) {
      overrides[key] = scale;
    }
  }
  if (value.colors !== undefined) {
    overrides.colors = toColors(value.colors);
  }
  if (value.fontSize !== undefined) {
    overrides.fontSize = toFontSizes(value.fontSize);
  }
  return overrides;
}

function toTheme(value: unknown): Theme {
  const overrides = parseThemeOverrides(value);
  const missing = THEME_KEYS.filter((key) => overrides[key] === undefined);
  if (missing.length > 0) {
    throw new Error(`Default theme is missing sections: ${missing.join(", ")}`);
  }
  return mergeTheme(EMPTY_THEME, overrides);
}

const EMPTY_THEME: Theme = {
  screens: {},
  containers: {},
  colors: {},
  spacing: {},
  fontSize: {},
  fontWeight: {},
  fontFamily: {},
  lineHeight: {},
  letterSpacing: {},
  borderRadius: {},
  borderWidth: {},
  ringWidth: {},
  outlineWidth: {},
  outlineOffset: {},
  boxShadow: {},
  maxWidth: {},
  zIndex: {},
  opacity: {},
  transitionDuration: {},
  transitionTimingFunction: {},
  rotate: {},
  scale: {},
  aspectRatio: {},
};

function mergeScale(base: ThemeScale, override: ThemeScale | undefined): ThemeScale {
  return override ? { ...base, ...override } : base;
}

/**
 * Merge overrides over a base theme. Each section is merged by key, so
 * `{ colors: { brand: "#0af" } }` adds one color and keeps the palette.
 */
export function mergeTheme(base: Theme, overrides: ThemeOverrides = {}): Theme {
  const merged: Theme = {
    ...base,
    colors: { ...base.colors, ...overrides.colors },
    fontSize: { ...base.fontSize, ...overrides.fontSize },
  };
  for (const key of SCALE_KEYS) {
    merged[key] = mergeScale(base[key], overrides[key]);
  }
  return merged;
}

/** Merge two sets of overrides, section by section. */
export function mergeThemeOverrides(base: ThemeOverrides = {}, override: ThemeOverrides = {}): ThemeOverrides {
  const merged: ThemeOverrides = { ...base, ...override };
  for (const key of SCALE_KEYS) {
    const left = base[key];
    const right = override[key];
    if (left && right) {
      merged[key] = { ...left, ...right };
    }
  }
  if (base.colors && override.colors) {
    merged.colors = { ...base.colors, ...override.colors };
  }
  if (base.fontSize && override.fontSize) {
    merged.fontSize = { ...base.fontSize, ...override.fontSize };
  }
  return merged;
}

let defaultTheme: Theme | undefined;

/** The built-in theme from `data/theme.json`. Loaded once. */
export function getDefaultTheme(): Theme {
  if (!defaultTheme) {
    defaultTheme = deepFreeze(toTheme(readDataFile("theme.json")));
  }
  return defaultTheme;
}

/** Recursively freeze plain objects and arrays. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return value;
}

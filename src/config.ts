import fs from "node:fs";
import path from "node:path";
import { type CssFormat, isRecord, type Theme } from "./shared.js";
import {
  deepFreeze,
  getDefaultTheme,
  mergeTheme,
  mergeThemeOverrides,
  parseThemeOverrides,
  type ThemeOverrides,
} from "./theme.js";
import { lengthToPixels } from "./values.js";
import { type CustomVariant, parseCustomVariant } from "./variants.js";

/** Name of the project configuration file looked up in the project root. */
export const CONFIG_FILE_NAME = "uticss.config.json";

const DEFAULT_LAYERS = ["base", "components", "utilities"];
const DEFAULT_VARIANT_WEIGHT = 5;

/** A custom variant: an at-rule (`"@media print"`) or a selector around `&`. */
export type CustomVariantInput = string | { value: string; weight?: number };

/** User-facing configuration. Every field is optional. */
export interface UticssConfig {
  /** Breakpoint names and min-widths. Replaces the theme's `screens` when set. */
  breakpoints?: Record<string, string>;
  /** Container query sizes for `@<size>:` variants. Replaces the theme's `containers` when set. */
  containers?: Record<string, string>;
  /** `class` scopes `dark:` to a `.dark` ancestor, `media` to `prefers-color-scheme`. */
  darkMode?: "class" | "media";
  /** Cascade layer order; `layer-<name>:` variants exist for each entry. */
  layers?: string[];
  /** Extra variants keyed by name. */
  variants?: Record<string, CustomVariantInput>;
  /** Theme sections merged key by key over the defaults. */
  theme?: ThemeOverrides;
  /** CSS output style. */
  format?: CssFormat;
  /** Classes the Vite plugin always generates, whether or not they appear in source. */
  safelist?: string[];
  /** Console logging switches, all off by default. */
  debug?: {
    /** Log every class that produced no rule. */
    logFailures?: boolean;
    /** Log every rule that was generated. */
    logRules?: boolean;
  };
}

/** Configuration with defaults applied. Deeply frozen. */
export interface ResolvedConfig {
  readonly breakpoints: Readonly<Record<string, string>>;
  readonly containers: Readonly<Record<string, string>>;
  readonly darkMode: "class" | "media";
  readonly layers: readonly string[];
  readonly variants: Readonly<Record<string, CustomVariant>>;
  readonly theme: Theme;
  readonly format: CssFormat;
  readonly safelist: readonly string[];
  readonly debug: Readonly<{ logFailures: boolean; logRules: boolean }>;
}

/** Identity helper that gives configuration objects their type. */
export function defineConfig(config: UticssConfig): UticssConfig {
  return config;
}

function readSizes(value: unknown, key: "breakpoints" | "containers"): Record<string, string> {
  if (!isRecord(value)) {
    throw new Error(`"${key}" must be an object of lengths`);
  }
  const sizes: Record<string, string> = {};
  for (const [name, width] of Object.entries(value)) {
    if (!/^[A-Za-z0-9-]+$/.test(name)) {
      throw new Error(`Invalid ${key} name "${name}"`);
    }
    if (typeof width !== "string" || lengthToPixels(width) === null) {
      throw new Error(`Invalid ${key} value for "${name}": expected a px, rem or em length`);
    }
    sizes[name] = width;
  }
  return sizes;
}

function readStringList(value: unknown, key: string): string[] {
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string")) {
    throw new Error(`"${key}" must be an array of strings`);
  }
  return [...value];
}

function readLayers(value: unknown): string[] {
  const layers = readStringList(value, "layers");
  const seen = new Set<string>();
  for (const layer of layers) {
    if (!/^[A-Za-z][A-Za-z0-9-]*$/.test(layer)) {
      throw new Error(`Invalid layer name "${layer}"`);
    }
    if (seen.has(layer)) {
      throw new Error(`Layer "${layer}" is listed twice`);
    }
    seen.add(layer);
  }
  return layers;
}

function toVariantInput(input: unknown): CustomVariantInput | null {
  if (typeof input === "string") {
    return input;
  }
  if (!isRecord(input)) {
    return null;
  }
  const { value, weight } = input;
  if (typeof value !== "string") {
    return null;
  }
  if (weight === undefined) {
    return { value };
  }
  return typeof weight === "number" ? { value, weight } : null;
}

function readVariants(value: unknown): Record<string, CustomVariantInput> {
  if (!isRecord(value)) {
    throw new Error(`"variants" must be an object`);
  }
  const variants: Record<string, CustomVariantInput> = {};
  for (const [name, input] of Object.entries(value)) {
    const variant = toVariantInput(input);
    if (variant === null) {
      throw new Error(`Variant "${name}" must be a string or { value, weight }`);
    }
    parseCustomVariant(name, normalizeVariant(variant));
    variants[name] = variant;
  }
  return variants;
}

function readDebug(value: unknown): NonNullable<UticssConfig["debug"]> {
  if (!isRecord(value)) {
    throw new Error(`"debug" must be an object`);
  }
  const debug: NonNullable<UticssConfig["debug"]> = {};
  for (const key of ["logFailures", "logRules"] as const) {
    const flag = value[key];
    if (flag === undefined) {
      continue;
    }
    if (typeof flag !== "boolean") {
      throw new Error(`"debug.${key}" must be a boolean`);
    }
    debug[key] = flag;
  }
  return debug;
}

const CONFIG_KEYS = new Set([
  "breakpoints",
  "containers",
  "darkMode",
  "layers",
  "variants",
  "theme",
  "format",
  "safelist",
  "debug",
]);

/**
 * Check an untyped value (a parsed config file, or input from plain
 * JavaScript) and return it as {@link UticssConfig}. Throws an `Error`
 * naming the offending key.
 */
export function validateConfig(value: unknown): UticssConfig {
  if (!isRecord(value)) {
    throw new Error("Configuration must be an object");
  }
  for (const key of Object.keys(value)) {
    if (!CONFIG_KEYS.has(key)) {
      throw new Error(`Unknown configuration key "${key}"`);
    }
  }

  const config: UticssConfig = {};
  if (value.breakpoints !== undefined) config.breakpoints = readSizes(value.breakpoints, "breakpoints");
  if (value.containers !== undefined) config.containers = readSizes(value.containers, "containers");
  const { darkMode, format } = value;
  if (darkMode !== undefined) {
    if (darkMode !== "class" && darkMode !== "media") {
      throw new Error(`"darkMode" must be "class" or "media"`);
    }
    config.darkMode = darkMode;
  }
  if (value.layers !== undefined) config.layers = readLayers(value.layers);
  if (value.variants !== undefined) config.variants = readVariants(value.variants);
  if (value.theme !== undefined) config.theme = parseThemeOverrides(value.theme);
  if (format !== undefined) {
    if (format !== "compact" && format !== "pretty") {
      throw new Error(`"format" must be "compact" or "pretty"`);
    }
    config.format = format;
  }
  if (value.safelist !== undefined) config.safelist = readStringList(value.safelist, "safelist");
  if (value.debug !== undefined) config.debug = readDebug(value.debug);
  return config;
}

function normalizeVariant(input: CustomVariantInput): CustomVariant {
  return typeof input === "string"
    ? { value: input, weight: DEFAULT_VARIANT_WEIGHT }
    : { value: input.value, weight: input.weight ?? DEFAULT_VARIANT_WEIGHT };
}

/** Validate a configuration, apply defaults and freeze the result. */
export function resolveConfig(input: UticssConfig = {}): ResolvedConfig {
  const config = validateConfig(input);
  const theme = mergeTheme(getDefaultTheme(), config.theme);

  const variants: Record<string, CustomVariant> = {};
  for (const [name, variant] of Object.entries(config.variants ?? {})) {
    variants[name] = normalizeVariant(variant);
  }

  return deepFreeze({
    breakpoints: readSizes(config.breakpoints ?? theme.screens, "breakpoints"),
    containers: readSizes(config.containers ?? theme.containers, "containers"),
    darkMode: config.darkMode ?? "class",
    layers: config.layers ?? [...DEFAULT_LAYERS],
    variants,
    theme,
    format: config.format ?? "compact",
    safelist: config.safelist ?? [],
    debug: {
      logFailures: config.debug?.logFailures ?? false,
      logRules: config.debug?.logRules ?? false,
    },
  });
}

/**
 * Merge two configurations. Object sections (`theme` per section,
 * `variants`, `debug`) merge by key, everything else is replaced.
 */
export function mergeConfig(base: UticssConfig, override: UticssConfig): UticssConfig {
  const merged: UticssConfig = { ...base, ...override };
  if (base.theme || override.theme) merged.theme = mergeThemeOverrides(base.theme, override.theme);
  if (base.variants || override.variants) merged.variants = { ...base.variants, ...override.variants };
  if (base.debug || override.debug) merged.debug = { ...base.debug, ...override.debug };
  return merged;
}

/** Index just past the string literal that opens at `start`. */
function endOfString(input: string, start: number): number {
  for (let i = start + 1; i < input.length; i += 1) {
    if (input[i] === "\\") {
      i += 1;
    } else if (input[i] === "\"") {
      return i + 1;
    }
  }
  return input.length;
}

/** Drop `//` and `/* *\/` comments. Newlines ending line comments are kept. */
function stripJsonComments(input: string): string {
  let output = "";
  let i = 0;
  while (i < input.length) {
    if (input[i] === "\"") {
      const end = endOfString(input, i);
      output += input.slice(i, end);
      i = end;
    } else if (input.startsWith("//", i)) {
      const newline = input.slice(i).search(/[\r\n]/);
      i = newline === -1 ? input.length : i + newline;
    } else if (input.startsWith("/*", i)) {
      const close = input.indexOf("*/", i + 2);
      i = close === -1 ? input.length : close + 2;
    } else {
      output += input[i];
      i += 1;
    }
  }
  return output;
}

function removeTrailingCommas(input: string): string {
  return input.replace(/("(?:[^"\\]|\\.)*")|,(\s*[}\]])/g, (match, quoted: string | undefined, closing: string | undefined) =>
    quoted ?? closing ?? match
  );
}

/** Parse JSON that may contain comments and trailing commas. Returns `null` on syntax errors. */
export function parseJsonc(input: string): unknown {
  const cleaned = removeTrailingCommas(stripJsonComments(input));
  try {
    return JSON.parse(cleaned);
  } catch {
    return null;
  }
}

/**
 * Read `uticss.config.json` from a project root.
 * Returns `null` when the file does not exist.
 */
export function loadConfigFile(root: string): UticssConfig | null {
  const filePath = path.join(root, CONFIG_FILE_NAME);
  if (!fs.existsSync(filePath)) {
    return null;
  }
  const parsed = parseJsonc(fs.readFileSync(filePath, "utf8"));
  if (parsed === null) {
    throw new Error(`${CONFIG_FILE_NAME}: invalid JSON`);
  }
  try {
    return validateConfig(parsed);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`${CONFIG_FILE_NAME}: ${message}`);
  }
}

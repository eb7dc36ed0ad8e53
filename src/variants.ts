import {
  isRecord,
  ownValue,
  type UtilityToken,
  type VariantKind,
  type VariantMultiplicity,
  type VariantTag,
} from "./shared.js";
import { deepFreeze, readDataFile } from "./theme.js";

/** Canonical nesting order, outermost first. */
export const VARIANT_PRIORITY: readonly VariantKind[] = [
  "dark",
  "group",
  "peer",
  "state",
  "pseudo-element",
  "container",
  "layer",
  "responsive",
  "custom",
];

const WEIGHTS: Record<VariantKind, number> = {
  responsive: 100,
  state: 80,
  dark: 60,
  group: 50,
  peer: 50,
  "pseudo-element": 40,
  container: 30,
  layer: 20,
  custom: 5,
};

const UNIQUE_KINDS = new Set<VariantKind>(["responsive", "dark", "container", "layer"]);

/** Custom variant definition after normalization. */
export interface CustomVariant {
  /** `@media ...` style at-rule, `"<ancestor> &"` or `"&<suffix>"`. */
  value: string;
  weight: number;
}

/** Inputs needed to build the variant prefix table. */
export interface VariantTableOptions {
  breakpoints: Readonly<Record<string, string>>;
  containers: Readonly<Record<string, string>>;
  darkMode: "class" | "media";
  layers: readonly string[];
  variants: Readonly<Record<string, CustomVariant>>;
}

type VariantMatcher = (name: string) => VariantTag | null;

/** Prefix matchers keyed by variant kind, consulted in {@link VARIANT_PRIORITY} order. */
export interface VariantTable {
  readonly matchers: readonly { kind: VariantKind; match: VariantMatcher }[];
}

/** Output of {@link splitVariants}. */
export interface SplitResult {
  variants: VariantTag[];
  utility: UtilityToken;
}

interface VariantData {
  states: Record<string, string>;
  pseudoElements: Record<string, string>;
  media: Record<string, string>;
}

function toStringRecord(value: unknown, label: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new Error(`variants.json: "${label}" must be an object`);
  }
  const record: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new Error(`variants.json: "${label}.${key}" must be a string`);
    }
    record[key] = entry;
  }
  return record;
}

let variantData: VariantData | undefined;

function getVariantData(): VariantData {
  if (!variantData) {
    const raw = readDataFile("variants.json");
    if (!isRecord(raw)) {
      throw new Error("variants.json must contain an object");
    }
    variantData = deepFreeze({
      states: toStringRecord(raw.states, "states"),
      pseudoElements: toStringRecord(raw.pseudoElements, "pseudoElements"),
      media: toStringRecord(raw.media, "media"),
    });
  }
  return variantData;
}

/** Built-in custom variants (`print`, `motion-safe`, ...). */
export function builtInCustomVariants(): Record<string, CustomVariant> {
  const variants: Record<string, CustomVariant> = {};
  for (const [name, value] of Object.entries(getVariantData().media)) {
    variants[name] = { value, weight: WEIGHTS.custom };
  }
  return variants;
}

function multiplicityOf(kind: VariantKind): VariantMultiplicity {
  return UNIQUE_KINDS.has(kind) ? "unique" : "repeatable";
}

function tag(
  kind: VariantKind,
  name: string,
  fields: Partial<Pick<VariantTag, "fragment" | "placement" | "mediaQuery" | "layer" | "weight">>,
): VariantTag {
  return {
    kind,
    name,
    raw: `${name}:`,
    fragment: fields.fragment ?? "",
    placement: fields.placement ?? "none",
    mediaQuery: fields.mediaQuery,
    layer: fields.layer,
    weight: fields.weight ?? WEIGHTS[kind],
    multiplicity: multiplicityOf(kind),
  };
}

/**
 * Validate a custom variant value and describe where its fragment goes.
 * Throws when the value is neither an at-rule nor a selector with one `&`.
 */
export function parseCustomVariant(
  name: string,
  variant: CustomVariant,
): Pick<VariantTag, "fragment" | "placement" | "mediaQuery" | "weight"> {
  if (!/^[A-Za-z][A-Za-z0-9-]*$/.test(name)) {
    throw new Error(`Invalid custom variant name "${name}"`);
  }
  if (!(variant.weight > 0)) {
    throw new Error(`Custom variant "${name}" must have a weight greater than 0`);
  }
  const value = variant.value.trim();
  if (value.startsWith("@")) {
    return { fragment: "", placement: "none", mediaQuery: value, weight: variant.weight };
  }

  const parts = value.split("&");
  if (parts.length !== 2) {
    throw new Error(`Custom variant "${name}" must be an at-rule or contain exactly one "&"`);
  }
  const [before, after] = parts;
  if (before.length > 0 && after.length > 0) {
    throw new Error(`Custom variant "${name}" cannot wrap the class on both sides`);
  }
  if (before.length > 0) {
    return { fragment: before, placement: "ancestor", weight: variant.weight };
  }
  if (after.length > 0) {
    return { fragment: after, placement: "suffix", weight: variant.weight };
  }
  throw new Error(`Custom variant "${name}" has an empty selector`);
}

/** Build the prefix table for one configuration. */
export function createVariantTable(options: VariantTableOptions): VariantTable {
  const { states, pseudoElements } = getVariantData();

  const customVariants: Record<string, CustomVariant> = {
    ...builtInCustomVariants(),
    ...options.variants,
  };
  const custom = new Map<string, VariantTag>();
  for (const [name, variant] of Object.entries(customVariants)) {
    custom.set(name, tag("custom", name, parseCustomVariant(name, variant)));
  }

  const layers = new Set(options.layers);

  const matchers: { kind: VariantKind; match: VariantMatcher }[] = [
    {
      kind: "dark",
      match: (name) => {
        if (name !== "dark") return null;
        return options.darkMode === "media"
          ? tag("dark", name, { mediaQuery: "@media (prefers-color-scheme: dark)" })
          : tag("dark", name, { fragment: ".dark ", placement: "ancestor" });
      },
    },
    {
      kind: "group",
      match: (name) => {
        const pseudo = name.startsWith("group-") ? ownValue(states, name.slice(6)) : undefined;
        return pseudo ? tag("group", name, { fragment: `.group${pseudo} `, placement: "ancestor" }) : null;
      },
    },
    {
      kind: "peer",
      match: (name) => {
        const pseudo = name.startsWith("peer-") ? ownValue(states, name.slice(5)) : undefined;
        return pseudo ? tag("peer", name, { fragment: `.peer${pseudo} ~ `, placement: "ancestor" }) : null;
      },
    },
    {
      kind: "state",
      match: (name) => {
        const pseudo = ownValue(states, name);
        return pseudo ? tag("state", name, { fragment: pseudo, placement: "suffix" }) : null;
      },
    },
    {
      kind: "pseudo-element",
      match: (name) => {
        const pseudo = ownValue(pseudoElements, name);
        return pseudo ? tag("pseudo-element", name, { fragment: pseudo, placement: "suffix" }) : null;
      },
    },
    {
      kind: "container",
      match: (name) => {
        const match = name.match(/^@([A-Za-z0-9]+)(?:\/([A-Za-z0-9_-]+))?$/);
        if (!match) return null;
        const width = ownValue(options.containers, match[1]);
        if (!width) return null;
        const containerName = match[2] ? `${match[2]} ` : "";
        return tag("container", name, { mediaQuery: `@container ${containerName}(min-width: ${width})` });
      },
    },
    {
      kind: "layer",
      match: (name) => {
        if (!name.startsWith("layer-")) return null;
        const layer = name.slice(6);
        return layers.has(layer) ? tag("layer", name, { layer }) : null;
      },
    },
    {
      kind: "responsive",
      match: (name) => {
        const width = ownValue(options.breakpoints, name);
        return width ? tag("responsive", name, { mediaQuery: `@media (min-width: ${width})` }) : null;
      },
    },
    {
      kind: "custom",
      match: (name) => custom.get(name) ?? null,
    },
  ];

  for (const name of custom.keys()) {
    for (const matcher of matchers) {
      if (matcher.kind !== "custom" && matcher.match(name)) {
        throw new Error(`Custom variant "${name}" shadows the built-in ${matcher.kind} variant`);
      }
    }
  }

  return { matchers };
}

/** Find the variant a `name:` prefix stands for, in priority order. */
export function matchVariant(table: VariantTable, name: string): VariantTag | null {
  for (const matcher of table.matchers) {
    const matched = matcher.match(name);
    if (matched) {
      return matched;
    }
  }
  return null;
}

/** Parse `!`/`-` markers off a base token. */
export function toUtilityToken(raw: string): UtilityToken {
  let token = raw;
  let important = false;
  if (token.startsWith("!")) {
    token = token.slice(1);
    important = true;
  } else if (token.endsWith("!")) {
    token = token.slice(0, -1);
    important = true;
  }
  return Object.freeze({
    raw,
    token,
    important,
    negative: token.startsWith("-"),
  });
}

/** Stable sort of tags into canonical nesting order. */
export function sortVariants(tags: readonly VariantTag[]): VariantTag[] {
  return tags
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) =>
      VARIANT_PRIORITY.indexOf(a.entry.kind) - VARIANT_PRIORITY.indexOf(b.entry.kind) ||
      a.index - b.index
    )
    .map(({ entry }) => entry);
}

/**
 * Strip recognized `variant:` prefixes off a raw class. Stops at the first
 * prefix the table does not know; that text stays in the base token.
 */
export function splitVariants(raw: string, table: VariantTable): SplitResult {
  const tags: VariantTag[] = [];
  let rest = raw;

  for (;;) {
    const colon = rest.indexOf(":");
    if (colon <= 0) {
      break;
    }
    const matched = matchVariant(table, rest.slice(0, colon));
    if (!matched) {
      break;
    }
    tags.push(matched);
    rest = rest.slice(colon + 1);
  }

  return { variants: sortVariants(tags), utility: toUtilityToken(rest) };
}

import { RegistryBuilder, type ResolverRegistry } from "./registry.js";
import {
  type CssProperty,
  declaration,
  isRecord,
  ownValue,
  type ResolverContext,
  type ThemeScale,
  type UtilityResolver,
  type UtilityToken,
} from "./shared.js";
import { readDataFile } from "./theme.js";
import {
  looksLikeColor,
  looksLikeLength,
  lookupColor,
  negate,
  parseArbitrary,
  parseBracketValue,
  parseCustomProperty,
  resolveFraction,
  resolveOpacity,
  splitModifier,
  withAlpha,
} from "./values.js";

type ValueParser = (value: string, context: ResolverContext, token: UtilityToken) => CssProperty[] | null;

type ValueLookup = (value: string, context: ResolverContext) => string | null;

interface UtilityData {
  keywords: Record<string, Record<string, string>>;
  families: Record<string, { properties: string[]; values: Record<string, string> }>;
}

function lookup(scale: ThemeScale, key: string): string | null {
  return key === "DEFAULT" ? null : ownValue(scale, key) ?? null;
}

function declarations(properties: readonly string[], value: string): CssProperty[] {
  return properties.map((name) => declaration(name, value));
}

/** Resolver for one exact token such as `flex` or `shadow`. */
export function exactResolver(token: string, properties: readonly CssProperty[]): UtilityResolver {
  return {
    name: token,
    parse: (utility) => (utility.token === token ? properties.map((property) => ({ ...property })) : null),
  };
}

/** Resolver for `<prefix><value>` tokens. */
export function familyResolver(name: string, prefix: string, parseValue: ValueParser): UtilityResolver {
  return {
    name,
    parse(token, context) {
      if (!token.token.startsWith(prefix)) {
        return null;
      }
      const value = token.token.slice(prefix.length);
      return value.length > 0 ? parseValue(value, context, token) : null;
    },
  };
}

/** Family that maps one value lookup onto a fixed list of properties. */
function scaleFamily(prefix: string, properties: readonly string[], valueOf: ValueLookup): UtilityResolver {
  return familyResolver(prefix, prefix, (value, context) => {
    const resolved = valueOf(value, context);
    return resolved === null ? null : declarations(properties, resolved);
  });
}

/** Resolver for `-<prefix><value>` tokens. Only answers tokens flagged negative. */
function negatedResolver(
  prefix: string,
  valueOf: ValueLookup,
  toProperties: (value: string) => CssProperty[],
): UtilityResolver {
  return familyResolver(`-${prefix}`, `-${prefix}`, (value, context, token) => {
    if (!token.negative) {
      return null;
    }
    const resolved = valueOf(value, context);
    return resolved === null ? null : toProperties(negate(resolved));
  });
}

/** Same as {@link scaleFamily} but registered under `-<prefix>` and negated. */
function negativeFamily(prefix: string, properties: readonly string[], valueOf: ValueLookup): UtilityResolver {
  return negatedResolver(prefix, valueOf, (value) => declarations(properties, value));
}

const SIZE_KEYWORDS: ThemeScale = {
  auto: "auto",
  full: "100%",
  min: "min-content",
  max: "max-content",
  fit: "fit-content",
};

function spacingLookup(extras: ThemeScale = {}, fractions = false): ValueLookup {
  return (value, { theme }) =>
    lookup(extras, value) ??
    lookup(theme.spacing, value) ??
    (fractions ? resolveFraction(value) : null) ??
    parseBracketValue(value);
}

function scaleLookup(pick: (context: ResolverContext) => ThemeScale): ValueLookup {
  return (value, context) => lookup(pick(context), value) ?? parseBracketValue(value);
}

/** Resolve a color with an optional `/opacity` modifier. */
export function resolveColorValue(value: string, context: ResolverContext): string | null {
  const [base, modifier] = splitModifier(value);
  let color = lookupColor(context.theme.colors, base);
  if (color === null) {
    const arbitrary = parseArbitrary(base);
    if (arbitrary !== null) {
      color = looksLikeColor(arbitrary) ? arbitrary : null;
    } else {
      color = parseCustomProperty(base);
    }
  }
  if (color === null) {
    return null;
  }
  if (modifier === null) {
    return color;
  }
  const alpha = resolveOpacity(modifier, context.theme.opacity);
  return alpha === null ? null : withAlpha(color, alpha);
}

function colorFamily(prefix: string, properties: readonly string[]): UtilityResolver {
  return scaleFamily(prefix, properties, resolveColorValue);
}

/** Width from a theme scale or an arbitrary length. Bare numbers become pixels. */
function widthValue(value: string, scale: ThemeScale): string | null {
  const themed = lookup(scale, value);
  if (themed !== null) {
    return themed;
  }
  if (/^\d+$/.test(value)) {
    return `${value}px`;
  }
  const arbitrary = parseArbitrary(value);
  return arbitrary !== null && looksLikeLength(arbitrary) ? arbitrary : null;
}

/** `border-2`, `border-red-500`, `ring-[3px]`: width when it reads as one, color otherwise. */
function widthOrColorFamily(
  prefix: string,
  widths: (context: ResolverContext) => ThemeScale,
  widthProperties: readonly string[],
  colorProperties: readonly string[],
): UtilityResolver {
  return familyResolver(prefix, prefix, (value, context) => {
    const width = widthValue(value, widths(context));
    if (width !== null) {
      return declarations(widthProperties, width);
    }
    const color = resolveColorValue(value, context);
    return color === null ? null : declarations(colorProperties, color);
  });
}

const BORDER_SIDES: Record<string, readonly string[]> = {
  x: ["left", "right"],
  y: ["top", "bottom"],
  t: ["top"],
  r: ["right"],
  b: ["bottom"],
  l: ["left"],
};

const RADIUS_CORNERS: Record<string, readonly string[]> = {
  t: ["top-left", "top-right"],
  r: ["top-right", "bottom-right"],
  b: ["bottom-right", "bottom-left"],
  l: ["top-left", "bottom-left"],
  tl: ["top-left"],
  tr: ["top-right"],
  br: ["bottom-right"],
  bl: ["bottom-left"],
};

function registerBorders(builder: RegistryBuilder): void {
  builder.register("border", {
    name: "border",
    parse: (token, { theme }) =>
      token.token === "border" ? [declaration("border-width", theme.borderWidth.DEFAULT ?? "1px")] : null,
  });

  // Bare side tokens (`border-t`) are values of the `border-` family so they
  // never shadow colors such as `border-teal-500`.
  builder.register(
    "border-",
    familyResolver("border-", "border-", (value, context) => {
      const sides = ownValue(BORDER_SIDES, value);
      if (sides) {
        const width = context.theme.borderWidth.DEFAULT ?? "1px";
        return sides.map((side) => declaration(`border-${side}-width`, width));
      }
      const width = widthValue(value, context.theme.borderWidth);
      if (width !== null) {
        return [declaration("border-width", width)];
      }
      const color = resolveColorValue(value, context);
      return color === null ? null : [declaration("border-color", color)];
    }),
  );

  for (const [side, edges] of Object.entries(BORDER_SIDES)) {
    builder.register(
      `border-${side}-`,
      widthOrColorFamily(
        `border-${side}-`,
        ({ theme }) => theme.borderWidth,
        edges.map((edge) => `border-${edge}-width`),
        edges.map((edge) => `border-${edge}-color`),
      ),
    );
  }
}

function registerRadius(builder: RegistryBuilder): void {
  builder.register("rounded", {
    name: "rounded",
    parse: (token, { theme }) =>
      token.token === "rounded" ? [declaration("border-radius", theme.borderRadius.DEFAULT ?? "0.25rem")] : null,
  });

  builder.register(
    "rounded-",
    familyResolver("rounded-", "rounded-", (value, { theme }) => {
      const corners = ownValue(RADIUS_CORNERS, value);
      if (corners) {
        const radius = theme.borderRadius.DEFAULT ?? "0.25rem";
        return corners.map((corner) => declaration(`border-${corner}-radius`, radius));
      }
      const radius = lookup(theme.borderRadius, value) ?? parseBracketValue(value);
      return radius === null ? null : [declaration("border-radius", radius)];
    }),
  );

  for (const [corner, edges] of Object.entries(RADIUS_CORNERS)) {
    builder.register(
      `rounded-${corner}-`,
      scaleFamily(
        `rounded-${corner}-`,
        edges.map((edge) => `border-${edge}-radius`),
        scaleLookup(({ theme }) => theme.borderRadius),
      ),
    );
  }
}

const SPACING_FAMILIES: readonly [string, readonly string[]][] = [
  ["p-", ["padding"]],
  ["px-", ["padding-left", "padding-right"]],
  ["py-", ["padding-top", "padding-bottom"]],
  ["ps-", ["padding-inline-start"]],
  ["pe-", ["padding-inline-end"]],
  ["pt-", ["padding-top"]],
  ["pr-", ["padding-right"]],
  ["pb-", ["padding-bottom"]],
  ["pl-", ["padding-left"]],
];

const MARGIN_FAMILIES: readonly [string, readonly string[]][] = [
  ["m-", ["margin"]],
  ["mx-", ["margin-left", "margin-right"]],
  ["my-", ["margin-top", "margin-bottom"]],
  ["ms-", ["margin-inline-start"]],
  ["me-", ["margin-inline-end"]],
  ["mt-", ["margin-top"]],
  ["mr-", ["margin-right"]],
  ["mb-", ["margin-bottom"]],
  ["ml-", ["margin-left"]],
];

const INSET_FAMILIES: readonly [string, readonly string[]][] = [
  ["inset-", ["inset"]],
  ["inset-x-", ["left", "right"]],
  ["inset-y-", ["top", "bottom"]],
  ["start-", ["inset-inline-start"]],
  ["end-", ["inset-inline-end"]],
  ["top-", ["top"]],
  ["right-", ["right"]],
  ["bottom-", ["bottom"]],
  ["left-", ["left"]],
];

function registerSpacing(builder: RegistryBuilder): void {
  for (const [prefix, properties] of SPACING_FAMILIES) {
    builder.register(prefix, scaleFamily(prefix, properties, spacingLookup()));
  }
  for (const [prefix, properties] of MARGIN_FAMILIES) {
    builder.register(prefix, scaleFamily(prefix, properties, spacingLookup({ auto: "auto" })));
    builder.register(`-${prefix}`, negativeFamily(prefix, properties, spacingLookup()));
  }
  builder.register("gap-", scaleFamily("gap-", ["gap"], spacingLookup()));
  builder.register("gap-x-", scaleFamily("gap-x-", ["column-gap"], spacingLookup()));
  builder.register("gap-y-", scaleFamily("gap-y-", ["row-gap"], spacingLookup()));
}

function registerSizing(builder: RegistryBuilder): void {
  const widths = spacingLookup({ ...SIZE_KEYWORDS, screen: "100vw", svw: "100svw", dvw: "100dvw" }, true);
  const heights = spacingLookup({ ...SIZE_KEYWORDS, screen: "100vh", svh: "100svh", dvh: "100dvh" }, true);

  builder.register("w-", scaleFamily("w-", ["width"], widths));
  builder.register("h-", scaleFamily("h-", ["height"], heights));
  builder.register("size-", scaleFamily("size-", ["width", "height"], spacingLookup(SIZE_KEYWORDS, true)));
  builder.register("min-w-", scaleFamily("min-w-", ["min-width"], widths));
  builder.register("min-h-", scaleFamily("min-h-", ["min-height"], heights));
  builder.register(
    "max-w-",
    scaleFamily("max-w-", ["max-width"], (value, context) =>
      lookup(context.theme.maxWidth, value) ?? spacingLookup(SIZE_KEYWORDS, true)(value, context)),
  );
  builder.register("max-h-", scaleFamily("max-h-", ["max-height"], heights));
  builder.register("basis-", scaleFamily("basis-", ["flex-basis"], spacingLookup(SIZE_KEYWORDS, true)));
}

function registerInset(builder: RegistryBuilder): void {
  const offsets = spacingLookup({ auto: "auto", full: "100%" }, true);
  for (const [prefix, properties] of INSET_FAMILIES) {
    builder.register(prefix, scaleFamily(prefix, properties, offsets));
    builder.register(`-${prefix}`, negativeFamily(prefix, properties, spacingLookup({ full: "100%" }, true)));
  }
}

function registerColors(builder: RegistryBuilder): void {
  builder.register(
    "bg-",
    familyResolver("bg-", "bg-", (value, context) => {
      const color = resolveColorValue(value, context);
      if (color !== null) {
        return [declaration("background-color", color)];
      }
      const arbitrary = parseArbitrary(value);
      if (arbitrary !== null && /^(?:url|(?:repeating-)?(?:linear|radial|conic)-gradient)\(/.test(arbitrary)) {
        return [declaration("background-image", arbitrary)];
      }
      return null;
    }),
  );

  for (const [prefix, property] of [
    ["fill-", "fill"],
    ["accent-", "accent-color"],
    ["caret-", "caret-color"],
    ["decoration-", "text-decoration-color"],
  ] as const) {
    builder.register(prefix, colorFamily(prefix, [property]));
  }

  builder.register(
    "stroke-",
    widthOrColorFamily("stroke-", () => ({}), ["stroke-width"], ["stroke"]),
  );

  builder.register("ring", {
    name: "ring",
    parse: (token, { theme }) =>
      token.token === "ring"
        ? [declaration("box-shadow", `0 0 0 ${theme.ringWidth.DEFAULT ?? "3px"} var(--uticss-ring-color, currentColor)`)]
        : null,
  });
  builder.register(
    "ring-",
    familyResolver("ring-", "ring-", (value, context) => {
      const width = widthValue(value, context.theme.ringWidth);
      if (width !== null) {
        return [declaration("box-shadow", `0 0 0 ${width} var(--uticss-ring-color, currentColor)`)];
      }
      const color = resolveColorValue(value, context);
      return color === null ? null : [declaration("--uticss-ring-color", color)];
    }),
  );

  builder.register("outline", exactResolver("outline", [declaration("outline-style", "solid")]));
  builder.register(
    "outline-",
    familyResolver("outline-", "outline-", (value, context) => {
      if (value === "none") {
        return [declaration("outline", "2px solid transparent"), declaration("outline-offset", "2px")];
      }
      if (["dashed", "dotted", "double"].includes(value)) {
        return [declaration("outline-style", value)];
      }
      const width = widthValue(value, context.theme.outlineWidth);
      if (width !== null) {
        return [declaration("outline-width", width)];
      }
      const color = resolveColorValue(value, context);
      return color === null ? null : [declaration("outline-color", color)];
    }),
  );
  builder.register(
    "outline-offset-",
    scaleFamily("outline-offset-", ["outline-offset"], scaleLookup(({ theme }) => theme.outlineOffset)),
  );
}

const TEXT_ALIGN = new Set(["left", "center", "right", "justify", "start", "end"]);
const TEXT_WRAP: Record<string, string> = { wrap: "wrap", nowrap: "nowrap", balance: "balance", pretty: "pretty" };

function registerTypography(builder: RegistryBuilder): void {
  builder.register(
    "text-",
    familyResolver("text-", "text-", (value, context) => {
      const { theme } = context;
      if (TEXT_ALIGN.has(value)) {
        return [declaration("text-align", value)];
      }
      if (value === "ellipsis" || value === "clip") {
        return [declaration("text-overflow", value)];
      }
      const wrap = ownValue(TEXT_WRAP, value);
      if (wrap) {
        return [declaration("text-wrap", wrap)];
      }

      const [base, modifier] = splitModifier(value);
      const size = ownValue(theme.fontSize, base);
      if (size) {
        const lineHeight = modifier === null
          ? size[1]
          : lookup(theme.lineHeight, modifier) ?? lookup(theme.spacing, modifier) ?? parseBracketValue(modifier);
        return lineHeight === null
          ? null
          : [declaration("font-size", size[0]), declaration("line-height", lineHeight)];
      }

      const color = resolveColorValue(value, context);
      if (color !== null) {
        return [declaration("color", color)];
      }
      const arbitrary = parseArbitrary(value);
      return arbitrary !== null && looksLikeLength(arbitrary) ? [declaration("font-size", arbitrary)] : null;
    }),
  );

  builder.register(
    "font-",
    familyResolver("font-", "font-", (value, { theme }) => {
      const weight = lookup(theme.fontWeight, value);
      if (weight !== null) {
        return [declaration("font-weight", weight)];
      }
      const family = lookup(theme.fontFamily, value);
      if (family !== null) {
        return [declaration("font-family", family)];
      }
      const arbitrary = parseBracketValue(value);
      if (arbitrary === null) {
        return null;
      }
      return [declaration(/^\d+$/.test(arbitrary) ? "font-weight" : "font-family", arbitrary)];
    }),
  );

  builder.register(
    "leading-",
    scaleFamily("leading-", ["line-height"], (value, context) =>
      lookup(context.theme.lineHeight, value) ?? spacingLookup()(value, context)),
  );
  builder.register(
    "tracking-",
    scaleFamily("tracking-", ["letter-spacing"], scaleLookup(({ theme }) => theme.letterSpacing)),
  );
}

const FLEX_VALUES: ThemeScale = { "1": "1 1 0%", auto: "1 1 auto", initial: "0 1 auto", none: "none" };

function gridTemplate(value: string): string | null {
  if (/^\d+$/.test(value) && Number(value) > 0) {
    return `repeat(${value}, minmax(0, 1fr))`;
  }
  if (value === "none" || value === "subgrid") {
    return value;
  }
  return parseBracketValue(value);
}

function gridSpan(value: string): string | null {
  if (/^\d+$/.test(value) && Number(value) > 0) {
    return `span ${value} / span ${value}`;
  }
  if (value === "full") {
    return "1 / -1";
  }
  return parseBracketValue(value);
}

function gridLine(value: string): string | null {
  if (/^\d+$/.test(value) || value === "auto") {
    return value;
  }
  return parseBracketValue(value);
}

function registerLayout(builder: RegistryBuilder): void {
  builder.register("flex-", scaleFamily("flex-", ["flex"], (value) => lookup(FLEX_VALUES, value) ?? parseBracketValue(value)));
  builder.register("grid-cols-", scaleFamily("grid-cols-", ["grid-template-columns"], gridTemplate));
  builder.register("grid-rows-", scaleFamily("grid-rows-", ["grid-template-rows"], gridTemplate));
  builder.register("col-span-", scaleFamily("col-span-", ["grid-column"], gridSpan));
  builder.register("col-start-", scaleFamily("col-start-", ["grid-column-start"], gridLine));
  builder.register("col-end-", scaleFamily("col-end-", ["grid-column-end"], gridLine));
  builder.register("row-span-", scaleFamily("row-span-", ["grid-row"], gridSpan));
  builder.register("row-start-", scaleFamily("row-start-", ["grid-row-start"], gridLine));
  builder.register("row-end-", scaleFamily("row-end-", ["grid-row-end"], gridLine));
  builder.register(
    "order-",
    scaleFamily("order-", ["order"], (value) => {
      if (value === "first") return "-9999";
      if (value === "last") return "9999";
      if (value === "none") return "0";
      return /^\d+$/.test(value) ? value : parseBracketValue(value);
    }),
  );
  builder.register(
    "aspect-",
    scaleFamily("aspect-", ["aspect-ratio"], (value, { theme }) => {
      const fraction = value.match(/^(\d+)\/(\d+)$/);
      if (fraction) {
        return `${fraction[1]} / ${fraction[2]}`;
      }
      return lookup(theme.aspectRatio, value) ?? parseBracketValue(value);
    }),
  );
  builder.register(
    "z-",
    scaleFamily("z-", ["z-index"], (value, { theme }) =>
      lookup(theme.zIndex, value) ?? (/^\d+$/.test(value) ? value : parseBracketValue(value))),
  );

  builder.register("@container", exactResolver("@container", [declaration("container-type", "inline-size")]));
  builder.register(
    "@container/",
    familyResolver("@container/", "@container/", (value) =>
      /^[A-Za-z0-9_-]+$/.test(value)
        ? [declaration("container-type", "inline-size"), declaration("container-name", value)]
        : null),
  );
}

const TRANSITION_EASE = "cubic-bezier(0.4, 0, 0.2, 1)";
const TRANSITION_PROPERTIES: ThemeScale = {
  all: "all",
  colors: "color, background-color, border-color, text-decoration-color, fill, stroke",
  opacity: "opacity",
  shadow: "box-shadow",
  transform: "transform, translate, scale, rotate",
};

function transition(property: string): CssProperty[] {
  return [
    declaration("transition-property", property),
    declaration("transition-timing-function", TRANSITION_EASE),
    declaration("transition-duration", "150ms"),
  ];
}

function registerEffects(builder: RegistryBuilder): void {
  builder.register("opacity-", scaleFamily("opacity-", ["opacity"], scaleLookup(({ theme }) => theme.opacity)));

  builder.register("shadow", {
    name: "shadow",
    parse: (token, { theme }) =>
      token.token === "shadow" && theme.boxShadow.DEFAULT !== undefined
        ? [declaration("box-shadow", theme.boxShadow.DEFAULT)]
        : null,
  });
  builder.register("shadow-", scaleFamily("shadow-", ["box-shadow"], scaleLookup(({ theme }) => theme.boxShadow)));

  builder.register(
    "transition",
    exactResolver(
      "transition",
      transition(
        "color, background-color, border-color, text-decoration-color, fill, stroke, opacity, box-shadow, transform, translate, scale, rotate, filter",
      ),
    ),
  );
  builder.register(
    "transition-",
    familyResolver("transition-", "transition-", (value) => {
      if (value === "none") {
        return [declaration("transition-property", "none")];
      }
      const property = lookup(TRANSITION_PROPERTIES, value) ?? parseBracketValue(value);
      return property === null ? null : transition(property);
    }),
  );
  builder.register(
    "duration-",
    scaleFamily("duration-", ["transition-duration"], scaleLookup(({ theme }) => theme.transitionDuration)),
  );
  builder.register(
    "delay-",
    scaleFamily("delay-", ["transition-delay"], scaleLookup(({ theme }) => theme.transitionDuration)),
  );
  builder.register(
    "ease-",
    scaleFamily("ease-", ["transition-timing-function"], scaleLookup(({ theme }) => theme.transitionTimingFunction)),
  );

  const rotation = scaleLookup(({ theme }) => theme.rotate);
  builder.register("rotate-", scaleFamily("rotate-", ["rotate"], rotation));
  builder.register("-rotate-", negativeFamily("rotate-", ["rotate"], rotation));
  builder.register("scale-", scaleFamily("scale-", ["scale"], scaleLookup(({ theme }) => theme.scale)));

  for (const axis of ["x", "y"] as const) {
    const prefix = `translate-${axis}-`;
    const offsets = spacingLookup({ full: "100%" }, true);
    const toTranslate = (value: string): CssProperty[] => [
      declaration(`--uticss-translate-${axis}`, value),
      declaration("translate", "var(--uticss-translate-x, 0) var(--uticss-translate-y, 0)"),
    ];
    builder.register(
      prefix,
      familyResolver(prefix, prefix, (value, context) => {
        const resolved = offsets(value, context);
        return resolved === null ? null : toTranslate(resolved);
      }),
    );
    builder.register(`-${prefix}`, negatedResolver(prefix, offsets, toTranslate));
  }
}

function toUtilityData(raw: unknown): UtilityData {
  if (!isRecord(raw) || !isRecord(raw.keywords) || !isRecord(raw.families)) {
    throw new Error("utilities.json must contain \"keywords\" and \"families\" objects");
  }
  const data: UtilityData = { keywords: {}, families: {} };
  for (const [token, properties] of Object.entries(raw.keywords)) {
    data.keywords[token] = toStringMap(properties, `keywords.${token}`);
  }
  for (const [prefix, family] of Object.entries(raw.families)) {
    if (!isRecord(family) || !Array.isArray(family.properties)) {
      throw new Error(`utilities.json: family "${prefix}" needs "properties" and "values"`);
    }
    const properties = family.properties.filter((entry): entry is string => typeof entry === "string");
    data.families[prefix] = { properties, values: toStringMap(family.values, `families.${prefix}.values`) };
  }
  return data;
}

function toStringMap(value: unknown, label: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new Error(`utilities.json: "${label}" must be an object`);
  }
  const map: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new Error(`utilities.json: "${label}.${key}" must be a string`);
    }
    map[key] = entry;
  }
  return map;
}

/**
 * Register the built-in utilities. Registration order doubles as output
 * order for rules of equal specificity, so shorthands come before the
 * longhands that refine them.
 */
export function registerDefaultUtilities(builder: RegistryBuilder): RegistryBuilder {
  const data = toUtilityData(readDataFile("utilities.json"));

  for (const [token, properties] of Object.entries(data.keywords)) {
    builder.register(
      token,
      exactResolver(token, Object.entries(properties).map(([name, value]) => declaration(name, value))),
    );
  }
  for (const [prefix, family] of Object.entries(data.families)) {
    builder.register(prefix, scaleFamily(prefix, family.properties, (value) => lookup(family.values, value)));
  }

  registerLayout(builder);
  registerSpacing(builder);
  registerSizing(builder);
  registerInset(builder);
  registerBorders(builder);
  registerRadius(builder);
  registerColors(builder);
  registerTypography(builder);
  registerEffects(builder);
  return builder;
}

/** A frozen registry with the built-in utilities. */
export function createDefaultRegistry(): ResolverRegistry {
  return registerDefaultUtilities(new RegistryBuilder()).build();
}

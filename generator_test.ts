import { afterEach, assert, test, vi } from "vitest";
import { combineVariants } from "./src/combine.js";
import { createGenerator, generateCss, isGenerationError } from "./src/generator.js";
import type { ClassOutcome, GenerationError, ParsedClass } from "./src/shared.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function errorOf(outcome: ClassOutcome | undefined): GenerationError {
  if (!outcome || outcome.ok) {
    throw new Error("expected a failed outcome");
  }
  return outcome.error;
}

function parsed(raw: string): ParsedClass {
  const result = createGenerator().parse(raw);
  if (isGenerationError(result)) {
    throw new Error(`${raw}: ${result.message}`);
  }
  return result;
}

test("generates rules for variants and utilities", () => {
  const { css, results } = createGenerator().generate([
    "p-4",
    "dark:bg-blue-500",
    "hover:text-red-500",
    "sm:flex",
  ]);

  assert.strictEqual(
    css,
    [
      ".p-4{padding:1rem}",
      ".dark .dark\\:bg-blue-500{background-color:#3b82f6}",
      ".hover\\:text-red-500:hover{color:#ef4444}",
      "@media (min-width: 640px){.sm\\:flex{display:flex}}",
    ].join("\n"),
  );
  assert.deepEqual(results.get("p-4"), { ok: true, selectors: [".p-4"] });
  assert.deepEqual(results.get("sm:flex"), { ok: true, selectors: [".sm\\:flex"] });
});

test("output does not depend on input order", () => {
  const classes = ["sm:p-2", "p-4", "hover:p-4", "lg:m-2", "bg-red-500", "md:flex", "dark:hover:p-1"];
  const generator = createGenerator();

  const forward = generator.generate(classes).css;
  const backward = generator.generate([...classes].reverse()).css;
  assert.strictEqual(forward, backward);
  assert.strictEqual(generator.generate(classes).css, forward);
});

test("breakpoints are emitted smallest first", () => {
  assert.strictEqual(
    generateCss(["lg:p-4", "sm:p-4", "md:p-4"]),
    [
      "@media (min-width: 640px){.sm\\:p-4{padding:1rem}}",
      "@media (min-width: 768px){.md\\:p-4{padding:1rem}}",
      "@media (min-width: 1024px){.lg\\:p-4{padding:1rem}}",
    ].join("\n"),
  );
});

test("entries may hold several classes and duplicates collapse", () => {
  const { results, rules } = createGenerator().generate(["p-4  m-2", "p-4", ""]);
  assert.deepEqual([...results.keys()], ["p-4", "m-2"]);
  assert.lengthOf(rules, 2);
});

test("one unknown class does not affect the others", () => {
  const { css, results } = createGenerator().generate(["p-4", "nope-3", "m-2"]);

  assert.strictEqual(css, ".p-4{padding:1rem}\n.m-2{margin:0.5rem}");
  const error = errorOf(results.get("nope-3"));
  assert.strictEqual(error.kind, "UnknownUtility");
  assert.strictEqual(error.className, "nope-3");
  assert.strictEqual(error.message, "no utility matches \"nope-3\"");
});

test("a matched prefix with an unknown value is not retried with a shorter prefix", () => {
  const error = errorOf(createGenerator().generate(["p-13"]).results.get("p-13"));
  assert.strictEqual(error.kind, "UnknownUtility");
  assert.strictEqual(error.message, "\"p-13\" is not a known p- value");
});

test("malformed arbitrary values", () => {
  const { results } = createGenerator().generate(["w-[10px", "bg-[notacolor]"]);

  const unbalanced = errorOf(results.get("w-[10px"));
  assert.strictEqual(unbalanced.kind, "MalformedArbitraryValue");
  assert.strictEqual(unbalanced.message, "unbalanced brackets in \"w-[10px\"");

  const unreadable = errorOf(results.get("bg-[notacolor]"));
  assert.strictEqual(unreadable.kind, "MalformedArbitraryValue");
  assert.strictEqual(unreadable.message, "cannot read the value in \"bg-[notacolor]\"");
});

test("a class with only variants has no utility", () => {
  const error = errorOf(createGenerator().generate(["hover:"]).results.get("hover:"));
  assert.strictEqual(error.kind, "UnknownUtility");
  assert.strictEqual(error.message, "missing utility after variants");
});

test("unique variants may appear only once", () => {
  const { css, results } = createGenerator().generate(["sm:md:p-4"]);
  const error = errorOf(results.get("sm:md:p-4"));

  assert.strictEqual(css, "");
  assert.strictEqual(error.kind, "InvalidVariantCombination");
  assert.strictEqual(
    error.message,
    "duplicate responsive variants (sm, md); conflicting queries (@media (min-width: 640px), @media (min-width: 768px))",
  );
});

test("two different at-rules conflict", () => {
  const error = errorOf(createGenerator().generate(["sm:print:p-4"]).results.get("sm:print:p-4"));
  assert.strictEqual(error.kind, "InvalidVariantCombination");
  assert.strictEqual(error.message, "conflicting queries (@media (min-width: 640px), @media print)");
});

test("repeatable variants stack", () => {
  const { css } = createGenerator().generate(["hover:focus:p-4"]);
  assert.strictEqual(css, ".hover\\:focus\\:p-4:hover:focus{padding:1rem}");
});

test("each variant raises specificity", () => {
  assert.strictEqual(combineVariants(parsed("p-4")).specificity, 10);
  assert.strictEqual(combineVariants(parsed("hover:p-4")).specificity, 90);
  assert.strictEqual(combineVariants(parsed("dark:hover:p-4")).specificity, 150);
  assert.strictEqual(combineVariants(parsed("sm:dark:hover:p-4")).specificity, 250);
});

test("variant order in the class name keeps its own selector", () => {
  const written = combineVariants(parsed("hover:dark:p-4"));
  assert.strictEqual(written.selector, ".dark .hover\\:dark\\:p-4:hover");
  assert.strictEqual(written.specificity, combineVariants(parsed("dark:hover:p-4")).specificity);
});

test("important and negative markers", () => {
  assert.strictEqual(generateCss(["!p-4"]), ".\\!p-4{padding:1rem!important}");
  assert.strictEqual(generateCss(["sm:-mt-4!"]), "@media (min-width: 640px){.sm\\:-mt-4\\!{margin-top:-1rem!important}}");
});

test("selectors escape leading digits", () => {
  assert.strictEqual(generateCss(["2xl:p-4"]), "@media (min-width: 1536px){.\\32 xl\\:p-4{padding:1rem}}");
});

test("layer variants group rules into cascade layers", () => {
  assert.strictEqual(
    generateCss(["layer-utilities:m-2", "p-2", "layer-components:p-4"]),
    [
      ".p-2{padding:0.5rem}",
      "@layer components{.layer-components\\:p-4{padding:1rem}}",
      "@layer utilities{.layer-utilities\\:m-2{margin:0.5rem}}",
    ].join("\n"),
  );
});

test("pretty output", () => {
  assert.strictEqual(
    generateCss(["p-4", "sm:flex", "!m-2"], { format: "pretty" }),
    [
      ".p-4 {\n  padding: 1rem;\n}",
      ".\\!m-2 {\n  margin: 0.5rem !important;\n}",
      "@media (min-width: 640px) {\n  .sm\\:flex {\n    display: flex;\n  }\n}",
    ].join("\n\n"),
  );
});

test("configured breakpoints replace the defaults", () => {
  const { css, results } = createGenerator({ breakpoints: { tablet: "48rem" } }).generate(["tablet:p-4", "sm:p-4"]);

  assert.strictEqual(css, "@media (min-width: 48rem){.tablet\\:p-4{padding:1rem}}");
  const error = errorOf(results.get("sm:p-4"));
  assert.strictEqual(error.message, "no utility matches \"sm:p-4\"");
});

test("dark mode through media queries", () => {
  assert.strictEqual(
    generateCss(["dark:text-white"], { darkMode: "media" }),
    "@media (prefers-color-scheme: dark){.dark\\:text-white{color:#fff}}",
  );
});

test("parse returns the resolved properties", () => {
  const result = parsed("sm:p-4");
  assert.deepEqual(result.properties, [{ name: "padding", value: "1rem", important: false }]);
  assert.deepEqual(result.variants.map((variant) => variant.name), ["sm"]);
  assert.strictEqual(result.utility.token, "p-4");
});

test("logs failures and rules when asked", () => {
  const log = vi.spyOn(console, "log").mockImplementation(() => {});

  createGenerator({ debug: { logFailures: true, logRules: true } }).generate(["nope", "sm:p-4"]);

  assert.deepEqual(log.mock.calls, [
    ["[uticss][failure] nope: UnknownUtility: no utility matches \"nope\""],
    ["[uticss][rule] @media (min-width: 640px) .sm\\:p-4"],
  ]);
});

test("stays quiet by default", () => {
  const log = vi.spyOn(console, "log").mockImplementation(() => {});
  createGenerator().generate(["nope", "p-4"]);
  assert.strictEqual(log.mock.calls.length, 0);
});

test("plain rules come before queries and unlayered rules before layers", () => {
  assert.strictEqual(
    generateCss(["sm:flex", "p-4"]),
    ".p-4{padding:1rem}\n@media (min-width: 640px){.sm\\:flex{display:flex}}",
  );
  assert.strictEqual(
    generateCss(["layer-base:m-2", "p-2"]),
    ".p-2{padding:0.5rem}\n@layer base{.layer-base\\:m-2{margin:0.5rem}}",
  );
});

test("suffixes follow canonical order with pseudo-elements last", () => {
  assert.strictEqual(generateCss(["before:hover:p-4"]), ".before\\:hover\\:p-4:hover::before{padding:1rem}");
  assert.strictEqual(
    generateCss(["busy:before:p-4"], { variants: { busy: "&[aria-busy=true]" } }),
    ".busy\\:before\\:p-4[aria-busy=true]::before{padding:1rem}",
  );
});

test("ancestor variants stack in canonical order", () => {
  assert.strictEqual(
    generateCss(["group-hover:peer-focus:p-4"]),
    ".group:hover .peer:focus ~ .group-hover\\:peer-focus\\:p-4{padding:1rem}",
  );
  assert.strictEqual(
    generateCss(["dark:group-hover:p-4"]),
    ".dark .group:hover .dark\\:group-hover\\:p-4{padding:1rem}",
  );
});

test("configured ancestor variants", () => {
  assert.strictEqual(
    generateCss(["dark:rtl:m-2", "rtl:p-4"], { variants: { rtl: "[dir=rtl] &" } }),
    "[dir=rtl] .rtl\\:p-4{padding:1rem}\n.dark [dir=rtl] .dark\\:rtl\\:m-2{margin:0.5rem}",
  );
});

test("a single string is read as one class list", () => {
  const { css, results } = createGenerator().generate("p-4 m-2");
  assert.deepEqual([...results.keys()], ["p-4", "m-2"]);
  assert.strictEqual(css, ".p-4{padding:1rem}\n.m-2{margin:0.5rem}");
});

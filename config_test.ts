import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, assert, test } from "vitest";
import {
  loadConfigFile,
  mergeConfig,
  parseJsonc,
  resolveConfig,
  validateConfig,
} from "./src/config.js";

const tempDirs: string[] = [];

function tempProject(config?: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "uticss-config-"));
  tempDirs.push(dir);
  if (config !== undefined) {
    fs.writeFileSync(path.join(dir, "uticss.config.json"), config);
  }
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("defaults", () => {
  const config = resolveConfig();

  assert.deepEqual(config.breakpoints, {
    sm: "640px",
    md: "768px",
    lg: "1024px",
    xl: "1280px",
    "2xl": "1536px",
  });
  assert.deepEqual(config.layers, ["base", "components", "utilities"]);
  assert.strictEqual(config.darkMode, "class");
  assert.strictEqual(config.format, "compact");
  assert.deepEqual(config.safelist, []);
  assert.deepEqual(config.debug, { logFailures: false, logRules: false });
  assert.isFrozen(config);
  assert.isFrozen(config.breakpoints);
  assert.isFrozen(config.theme.colors);
});

test("theme overrides merge by key", () => {
  const { theme } = resolveConfig({ theme: { colors: { brand: "#0af" }, fontSize: { huge: ["5rem", "1"] } } });

  assert.strictEqual(theme.colors.brand, "#0af");
  assert.strictEqual(theme.colors.white, "#fff");
  assert.deepEqual(theme.fontSize.huge, ["5rem", "1"]);
  assert.deepEqual(theme.fontSize.lg, ["1.125rem", "1.75rem"]);
});

test("invalid configuration names the offending key", () => {
  assert.throws(() => resolveConfig({ breakpoints: { md: "wide" } }), /Invalid breakpoints value for "md"/);
  assert.throws(() => validateConfig({ colour: {} }), /Unknown configuration key "colour"/);
  assert.throws(() => validateConfig({ darkMode: "auto" }), /"darkMode" must be "class" or "media"/);
  assert.throws(() => validateConfig({ layers: ["base", "base"] }), /Layer "base" is listed twice/);
  assert.throws(() => validateConfig({ format: "minified" }), /"format" must be "compact" or "pretty"/);
  assert.throws(() => validateConfig({ debug: { logRules: "yes" } }), /"debug.logRules" must be a boolean/);
  assert.throws(() => validateConfig({ theme: { palette: {} } }), /Unknown theme section "palette"/);
  assert.throws(() => validateConfig("uticss"), /Configuration must be an object/);
});

test("string font sizes get a default line height", () => {
  const config = validateConfig({ theme: { fontSize: { tiny: "0.5rem" } } });
  assert.deepEqual(config.theme?.fontSize?.tiny, ["0.5rem", "1.5"]);
});

test("merging keeps both sides of object sections", () => {
  const merged = mergeConfig(
    { theme: { colors: { a: "#000" } }, debug: { logRules: true }, layers: ["base"] },
    { theme: { colors: { b: "#fff" } }, debug: { logFailures: true }, format: "pretty" },
  );

  assert.deepEqual(merged, {
    theme: { colors: { a: "#000", b: "#fff" } },
    debug: { logRules: true, logFailures: true },
    layers: ["base"],
    format: "pretty",
  });
});

test("configuration files may hold comments and trailing commas", () => {
  const source = `{
    // output style
    "format": "pretty", /* inline */ "layers": ["a",],
    "theme": { "colors": { "link": "http://not-a-comment" } },
  }`;

  assert.deepEqual(parseJsonc(source), {
    format: "pretty",
    layers: ["a"],
    theme: { colors: { link: "http://not-a-comment" } },
  });
  assert.isNull(parseJsonc("{ \"format\": }"));
});

test("loads the config file from a project root", () => {
  const root = tempProject(`{ "darkMode": "media", "safelist": ["hidden"] }`);
  assert.deepEqual(loadConfigFile(root), { darkMode: "media", safelist: ["hidden"] });
});

test("a missing config file is not an error", () => {
  assert.isNull(loadConfigFile(tempProject()));
});

test("config file errors carry the file name", () => {
  assert.throws(
    () => loadConfigFile(tempProject(`{ "darkMode": "auto" }`)),
    /uticss\.config\.json: "darkMode" must be "class" or "media"/,
  );
  assert.throws(() => loadConfigFile(tempProject("{ nope")), /uticss\.config\.json: invalid JSON/);
});

test("theme screens and containers are checked like breakpoints", () => {
  assert.throws(() => resolveConfig({ theme: { screens: { tablet: "wide" } } }), /Invalid breakpoints value for "tablet"/);
  assert.throws(() => resolveConfig({ theme: { screens: { "a:b": "10px" } } }), /Invalid breakpoints name "a:b"/);
  assert.throws(() => resolveConfig({ theme: { containers: { card: "big" } } }), /Invalid containers value for "card"/);

  const { breakpoints } = resolveConfig({ theme: { screens: { tablet: "48rem" } } });
  assert.strictEqual(breakpoints.tablet, "48rem");
  assert.strictEqual(breakpoints.sm, "640px");
});

test("comment markers inside strings and unterminated comments", () => {
  assert.deepEqual(parseJsonc('{ "a": "say \\"//hi\\"" } // tail'), { a: 'say "//hi"' });
  assert.isNull(parseJsonc('{ "b": 1 /* open'));
});

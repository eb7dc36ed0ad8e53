import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, assert, test } from "vitest";
import uticss from "./src/index.js";
import { uticssPlugin } from "./src/vite.js";

const PUBLIC_ID = "virtual:uticss.css";
const VIRTUAL_ID = "\0virtual:uticss.css";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function tempProject(config: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "uticss-vite-"));
  tempDirs.push(dir);
  fs.writeFileSync(path.join(dir, "uticss.config.json"), config);
  return dir;
}

function fakeServer() {
  const virtualModule = { id: VIRTUAL_ID };
  const invalidated: unknown[] = [];
  return {
    invalidated,
    virtualModule,
    server: {
      moduleGraph: {
        getModuleById: (id: string) => (id === VIRTUAL_ID ? virtualModule : undefined),
        invalidateModule: (module: unknown) => {
          invalidated.push(module);
        },
      },
    },
  };
}

test("resolves the virtual stylesheet id", () => {
  const plugin = uticssPlugin();
  assert.strictEqual(plugin.resolveId(PUBLIC_ID), VIRTUAL_ID);
  assert.strictEqual(plugin.resolveId(`${PUBLIC_ID}?direct`), `${VIRTUAL_ID}?direct`);
  assert.isNull(plugin.resolveId("./App.vue"));
  assert.isNull(plugin.load("/app/src/App.vue"));
});

test("serves css for classes found in transformed modules", () => {
  const plugin = uticssPlugin();

  assert.isNull(plugin.transform(`<template><div class="p-4 sm:flex"></div></template>`, "/app/src/App.vue"));
  assert.isNull(plugin.transform(`export const Card = () => <div className="p-4 m-2" />;`, "/app/src/Card.tsx"));

  assert.strictEqual(
    plugin.load(VIRTUAL_ID),
    ".p-4{padding:1rem}\n.m-2{margin:0.5rem}\n@media (min-width: 640px){.sm\\:flex{display:flex}}",
  );
});

test("skips dependencies, sub-requests and unsupported files", () => {
  const plugin = uticssPlugin();
  const markup = `<div class="p-4"></div>`;

  plugin.transform(markup, "/app/node_modules/pkg/index.js");
  plugin.transform(markup, "/app/src/App.vue?vue&type=style&index=0");
  plugin.transform(markup, "/app/src/styles.css");

  assert.strictEqual(plugin.load(VIRTUAL_ID), "");
});

test("include limits which modules are scanned", () => {
  const plugin = uticssPlugin({ include: /\/src\// });

  plugin.transform(`<p class="m-2"></p>`, "/app/lib/widget.ts");
  plugin.transform(`<p class="p-2"></p>`, "/app/src/widget.ts");

  assert.strictEqual(plugin.load(VIRTUAL_ID), ".p-2{padding:0.5rem}");
});

test("invalidates the stylesheet only when a module's classes change", () => {
  const plugin = uticssPlugin();
  const { server, invalidated, virtualModule } = fakeServer();
  plugin.configureServer(server);

  plugin.transform(`<p class="p-2"></p>`, "/app/src/a.html");
  plugin.transform(`<p class="p-2"></p>`, "/app/src/a.html");
  assert.lengthOf(invalidated, 1);

  plugin.transform(`<p class="p-2 m-2"></p>`, "/app/src/a.html");
  assert.lengthOf(invalidated, 2);

  plugin.transform("export {};", "/app/src/empty.ts");
  assert.lengthOf(invalidated, 2);
  assert.strictEqual(invalidated[0], virtualModule);
});

test("hot updates drop the module's classes", () => {
  const plugin = uticssPlugin();
  const { server, invalidated } = fakeServer();
  plugin.configureServer(server);

  plugin.transform(`<p class="p-2"></p>`, "/app/src/a.html");
  plugin.handleHotUpdate({ file: "/app/src/a.html" });

  assert.lengthOf(invalidated, 2);
  assert.strictEqual(plugin.load(VIRTUAL_ID), "");

  plugin.handleHotUpdate({ file: "/app/src/unrelated.ts" });
  assert.lengthOf(invalidated, 2);
});

test("reads uticss.config.json and reloads it on change", () => {
  const root = tempProject(`{ "breakpoints": { "tablet": "48rem" }, "safelist": ["hidden"] }`);
  const plugin = uticssPlugin({ config: { safelist: ["block"] } });
  const { server, invalidated } = fakeServer();
  plugin.configureServer(server);
  plugin.configResolved({ root });

  plugin.transform(`<p class="tablet:p-4"></p>`, path.join(root, "src", "page.html"));
  assert.strictEqual(
    plugin.load(VIRTUAL_ID),
    ".block{display:block}\n@media (min-width: 48rem){.tablet\\:p-4{padding:1rem}}",
  );

  fs.writeFileSync(path.join(root, "uticss.config.json"), `{ "breakpoints": { "tablet": "40rem" } }`);
  plugin.handleHotUpdate({ file: path.join(root, "uticss.config.json") });

  assert.lengthOf(invalidated, 2);
  assert.strictEqual(
    plugin.load(VIRTUAL_ID),
    ".block{display:block}\n@media (min-width: 40rem){.tablet\\:p-4{padding:1rem}}",
  );
});

test("the package entry exposes the generator and the plugin", () => {
  assert.strictEqual(uticss.vite, uticssPlugin);
  assert.strictEqual(uticss({ format: "compact" }).generate(["p-4"]).css, ".p-4{padding:1rem}");
  assert.strictEqual(uticss.vite().name, "uticss");
});

import { assert, test } from "vitest";
import { RegistryBuilder } from "./src/registry.js";
import { declaration, type UtilityResolver } from "./src/shared.js";

function stub(name: string): UtilityResolver {
  return { name, parse: () => [declaration("content", `"${name}"`)] };
}

test("resolves the longest registered prefix", () => {
  const registry = new RegistryBuilder()
    .register("p-", stub("padding"))
    .register("px-", stub("padding-x"))
    .register("flex", stub("flex"))
    .register("flex-", stub("flex-family"))
    .build();

  assert.strictEqual(registry.resolve("px-4")?.prefix, "px-");
  assert.strictEqual(registry.resolve("p-4")?.prefix, "p-");
  assert.strictEqual(registry.resolve("flex")?.resolver.name, "flex");
  assert.strictEqual(registry.resolve("flex-col")?.resolver.name, "flex-family");
  assert.isNull(registry.resolve("q-4"));
  assert.isNull(registry.resolve("p"));
});

test("a longer match wins even when the shorter prefix was registered later", () => {
  const registry = new RegistryBuilder()
    .register("border-t-", stub("border-top"))
    .register("border-", stub("border"))
    .build();

  assert.strictEqual(registry.resolve("border-t-2")?.prefix, "border-t-");
  assert.strictEqual(registry.resolve("border-teal-500")?.prefix, "border-");
});

test("re-registering a prefix keeps the last resolver", () => {
  const builder = new RegistryBuilder()
    .register("m-", stub("first"))
    .register("gap-", stub("gap"))
    .register("m-", stub("second"));
  const registry = builder.build();

  const match = registry.resolve("m-2");
  assert.strictEqual(match?.resolver.name, "second");
  assert.strictEqual(match?.order, 2);
  assert.strictEqual(registry.size, 2);
  assert.deepEqual(registry.prefixes(), ["gap-", "m-"]);
});

test("rejects an empty prefix", () => {
  assert.throws(
    () => new RegistryBuilder().register("", stub("nothing")),
    /Cannot register resolver "nothing" under an empty prefix/,
  );
});

test("built registries do not see later registrations", () => {
  const builder = new RegistryBuilder().register("w-", stub("width"));
  const registry = builder.build();
  builder.register("h-", stub("height"));

  assert.isNull(registry.resolve("h-4"));
  assert.strictEqual(builder.build().resolve("h-4")?.prefix, "h-");
});

test("order follows registration sequence", () => {
  const registry = new RegistryBuilder()
    .register("flex", stub("flex"))
    .register("grid", stub("grid"))
    .register("block", stub("block"))
    .build();

  assert.strictEqual(registry.resolve("flex")?.order, 0);
  assert.strictEqual(registry.resolve("grid")?.order, 1);
  assert.strictEqual(registry.resolve("block")?.order, 2);
  assert.deepEqual(registry.prefixes(), ["flex", "grid", "block"]);
});

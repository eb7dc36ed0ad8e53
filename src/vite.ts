import path from "node:path";
import type { Plugin } from "vite";
import { CONFIG_FILE_NAME, loadConfigFile, mergeConfig, type UticssConfig } from "./config.js";
import { extractClasses } from "./extract.js";
import { createGenerator, type Generator } from "./generator.js";

const PUBLIC_VIRTUAL_ID = "virtual:uticss.css";
const RESOLVED_VIRTUAL_ID = "\0virtual:uticss.css";
const SCANNED_EXTENSIONS = /\.(?:html|[cm]?[jt]sx?|vue|svelte|astro|mdx?)$/;

/** The parts of Vite's module graph the plugin touches. */
interface VirtualModuleGraph {
  getModuleById(id: string): unknown;
  invalidateModule(module: unknown): void;
}

/** Options for {@link uticssPlugin}. */
export interface UticssPluginOptions {
  /** Limit scanning to ids that match this regex. By default everything outside `node_modules` is scanned. */
  include?: RegExp;
  /** Inline configuration, merged over `uticss.config.json`. */
  config?: UticssConfig;
}

/** Vite plugin with its hooks typed for direct calls. */
export interface UticssPlugin extends Plugin {
  configureServer(server: { moduleGraph: VirtualModuleGraph }): void;
  configResolved(config: { root: string }): void;
  resolveId(id: string): string | null;
  load(id: string): string | null;
  transform(code: string, id: string): null;
  handleHotUpdate(ctx: { file: string }): void;
}

function cleanId(id: string): string {
  return id.replace(/\?.*$/, "");
}

function supportsTransform(id: string): boolean {
  return SCANNED_EXTENSIONS.test(id);
}

function isVirtualSubRequest(id: string): boolean {
  return id.includes("?");
}

function sameClasses(previous: readonly string[] | undefined, next: readonly string[]): boolean {
  if (!previous) {
    return next.length === 0;
  }
  return previous.length === next.length && previous.every((value, index) => value === next[index]);
}

/**
 * Vite plugin that collects utility classes from transformed modules and
 * serves the generated stylesheet as `virtual:uticss.css`. Module code is
 * never rewritten.
 */
export function uticssPlugin(options: UticssPluginOptions = {}): UticssPlugin {
  const moduleClasses = new Map<string, readonly string[]>();
  let server: { moduleGraph: VirtualModuleGraph } | undefined;
  let projectRoot = process.cwd();
  let generator: Generator | undefined;

  function loadGenerator(): Generator {
    const fileConfig = loadConfigFile(projectRoot) ?? {};
    return createGenerator(mergeConfig(fileConfig, options.config ?? {}));
  }

  function getGenerator(): Generator {
    if (!generator) {
      generator = createGenerator(options.config ?? {});
    }
    return generator;
  }

  function isIncluded(id: string): boolean {
    return options.include ? options.include.test(id) : !id.includes("/node_modules/");
  }

  function collectClasses(): string[] {
    const classes = new Set(getGenerator().config.safelist);
    for (const id of [...moduleClasses.keys()].sort()) {
      for (const className of moduleClasses.get(id) ?? []) {
        classes.add(className);
      }
    }
    return [...classes];
  }

  function invalidateVirtualModule(): void {
    if (!server) return;
    const module = server.moduleGraph.getModuleById(RESOLVED_VIRTUAL_ID);
    if (module) {
      server.moduleGraph.invalidateModule(module);
    }
  }

  return {
    name: "uticss",
    enforce: "pre",

    configureServer(devServer) {
      server = devServer;
    },

    configResolved(config) {
      projectRoot = config.root;
      generator = loadGenerator();
    },

    resolveId(id) {
      if (cleanId(id) === PUBLIC_VIRTUAL_ID) {
        const suffix = id.slice(PUBLIC_VIRTUAL_ID.length);
        return `${RESOLVED_VIRTUAL_ID}${suffix}`;
      }
      return null;
    },

    load(id) {
      if (cleanId(id) === RESOLVED_VIRTUAL_ID) {
        return getGenerator().generate(collectClasses()).css;
      }
      return null;
    },

    transform(code, id) {
      if (isVirtualSubRequest(id)) {
        return null;
      }

      const normalizedId = cleanId(id);
      if (!supportsTransform(normalizedId) || !isIncluded(normalizedId)) {
        return null;
      }

      const classes = extractClasses(code);
      if (!sameClasses(moduleClasses.get(normalizedId), classes)) {
        if (classes.length === 0) {
          moduleClasses.delete(normalizedId);
        } else {
          moduleClasses.set(normalizedId, classes);
        }
        invalidateVirtualModule();
      }
      return null;
    },

    handleHotUpdate(ctx) {
      const normalizedId = cleanId(ctx.file);
      if (path.resolve(normalizedId) === path.resolve(projectRoot, CONFIG_FILE_NAME)) {
        generator = loadGenerator();
        invalidateVirtualModule();
        return;
      }
      if (moduleClasses.has(normalizedId)) {
        moduleClasses.delete(normalizedId);
        invalidateVirtualModule();
      }
    },
  };
}

/** Default export for {@link uticssPlugin}. */
export default uticssPlugin;

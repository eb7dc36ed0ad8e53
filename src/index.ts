/**
 * uticss public API entrypoint.
 * @module
 */
import { createGenerator } from "./generator.js";
import { uticssPlugin } from "./vite.js";

/**
 * Primary API: `uticss(config)` builds a generator.
 *
 * Includes `uticss.vite` for the Vite plugin.
 */
const uticss = Object.assign(createGenerator, {
  vite: uticssPlugin,
});

/** Default export for the generator factory. */
export default uticss;
/** Named export for the Vite plugin. */
export { uticssPlugin as vite, uticssPlugin };
export { createGenerator, generateCss, isGenerationError } from "./generator.js";
export type { GenerateResult, Generator } from "./generator.js";
export {
  CONFIG_FILE_NAME,
  defineConfig,
  loadConfigFile,
  mergeConfig,
  resolveConfig,
  validateConfig,
} from "./config.js";
export type { CustomVariantInput, ResolvedConfig, UticssConfig } from "./config.js";
export { RegistryBuilder, ResolverRegistry } from "./registry.js";
export type { RegistryMatch } from "./registry.js";
export { createDefaultRegistry, exactResolver, familyResolver, registerDefaultUtilities } from "./utilities.js";
export { createVariantTable, splitVariants } from "./variants.js";
export type { VariantTable } from "./variants.js";
export { combineVariants } from "./combine.js";
export { Stylesheet } from "./stylesheet.js";
export { extractClasses } from "./extract.js";
export { getDefaultTheme } from "./theme.js";
export type { ThemeOverrides } from "./theme.js";
export { declaration, escapeClassName } from "./shared.js";
export type {
  ClassOutcome,
  CssFormat,
  CssProperty,
  GenerationError,
  GenerationErrorKind,
  ParsedClass,
  ResolverContext,
  Rule,
  Theme,
  UtilityResolver,
  UtilityToken,
  VariantKind,
  VariantTag,
} from "./shared.js";
/** Re-exported Vite plugin options. */
export type { UticssPlugin, UticssPluginOptions } from "./vite.js";

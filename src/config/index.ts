export {
  CONFIG_FILE_NAME,
  type LoadedConfig,
  loadEditorConfig,
  mergeConfig,
  type ResolvedConfig,
  resolveColorscheme,
  resolveConfig,
} from "./loader.ts";
export { DEFAULT_CONFIG, type EditorConfig, EditorConfigSchema, StyleSchema } from "./schema.ts";

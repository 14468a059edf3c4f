import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { type ParseError, parse as parseJsonc, printParseErrorCode } from "jsonc-parser";
import { DEFAULT_COLORSCHEME } from "../renderer/theme.ts";
import type { Colorscheme } from "../renderer/types.ts";
import { DEFAULT_CONFIG, type EditorConfig, EditorConfigSchema } from "./schema.ts";

export const CONFIG_FILE_NAME = "cellpad.jsonc";

/** Config with every setting filled in. */
export interface ResolvedConfig {
  readonly tabSize: number;
  readonly widthPercent: number;
  readonly heightPercent: number;
  readonly wheelScrollLines: number;
  readonly colorscheme: Colorscheme;
}

export interface LoadedConfig {
  readonly config: ResolvedConfig;
  /** Files that contributed, lowest precedence first. */
  readonly sources: string[];
  /** Files that were found but skipped, with the reason. */
  readonly warnings: string[];
}

/** Load and merge config from all sources: defaults < global < project < env */
export async function loadEditorConfig(
  cwd: string,
  env: Record<string, string | undefined> = process.env,
  home: string = homedir(),
): Promise<LoadedConfig> {
  const sources: string[] = [];
  const warnings: string[] = [];
  let merged: EditorConfig = { ...DEFAULT_CONFIG };

  // Layer 1: Global config, Layer 2: Project config
  for (const path of [join(home, ".config", "cellpad", CONFIG_FILE_NAME), join(cwd, CONFIG_FILE_NAME)]) {
    const result = await loadConfigFile(path);
    if (result.kind === "loaded") {
      merged = mergeConfig(merged, result.config);
      sources.push(path);
    } else if (result.kind === "invalid") {
      warnings.push(`${path}: ${result.reason}`);
    }
  }

  // Layer 3: Environment variable overrides
  merged = applyEnvOverrides(merged, env, warnings);

  return { config: resolveConfig(merged), sources, warnings };
}

type FileResult =
  | { kind: "missing" }
  | { kind: "loaded"; config: EditorConfig }
  | { kind: "invalid"; reason: string };

/** Parse JSONC file, validate with Zod */
async function loadConfigFile(path: string): Promise<FileResult> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return { kind: "missing" };
    }
    return { kind: "invalid", reason: err instanceof Error ? err.message : String(err) };
  }

  const errors: ParseError[] = [];
  const parsed: unknown = parseJsonc(text, errors, { allowTrailingComma: true });
  const firstError = errors[0];
  if (firstError) {
    return { kind: "invalid", reason: `${printParseErrorCode(firstError.error)} at offset ${firstError.offset}` };
  }

  const result = EditorConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    return { kind: "invalid", reason: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") };
  }
  return { kind: "loaded", config: result.data };
}

/** Shallow merge, with colorscheme entries merged one level deep. */
export function mergeConfig(base: EditorConfig, override: EditorConfig): EditorConfig {
  return {
    ...base,
    tabSize: override.tabSize ?? base.tabSize,
    widthPercent: override.widthPercent ?? base.widthPercent,
    heightPercent: override.heightPercent ?? base.heightPercent,
    wheelScrollLines: override.wheelScrollLines ?? base.wheelScrollLines,
    colorscheme:
      base.colorscheme || override.colorscheme
        ? { ...base.colorscheme, ...override.colorscheme }
        : undefined,
  };
}

function applyEnvOverrides(
  config: EditorConfig,
  env: Record<string, string | undefined>,
  warnings: string[],
): EditorConfig {
  const raw = env.CELLPAD_TAB_SIZE;
  if (raw === undefined || raw === "") return config;
  const tabSize = EditorConfigSchema.shape.tabSize.safeParse(Number(raw));
  if (!tabSize.success || tabSize.data === undefined) {
    warnings.push(`CELLPAD_TAB_SIZE: expected an integer from 1 to 16, got "${raw}"`);
    return config;
  }
  return { ...config, tabSize: tabSize.data };
}

/** Fill a partial colorscheme from the default theme. */
export function resolveColorscheme(partial: EditorConfig["colorscheme"]): Colorscheme {
  return {
    default: partial?.default ?? DEFAULT_COLORSCHEME.default,
    lineNumber: partial?.lineNumber ?? DEFAULT_COLORSCHEME.lineNumber,
    selection: partial?.selection ?? DEFAULT_COLORSCHEME.selection,
    statusLine: partial?.statusLine ?? DEFAULT_COLORSCHEME.statusLine,
  };
}

export function resolveConfig(config: EditorConfig): ResolvedConfig {
  return {
    tabSize: config.tabSize ?? DEFAULT_CONFIG.tabSize,
    widthPercent: config.widthPercent ?? DEFAULT_CONFIG.widthPercent,
    heightPercent: config.heightPercent ?? DEFAULT_CONFIG.heightPercent,
    wheelScrollLines: config.wheelScrollLines ?? DEFAULT_CONFIG.wheelScrollLines,
    colorscheme: resolveColorscheme(config.colorscheme),
  };
}

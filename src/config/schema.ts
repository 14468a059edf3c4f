import { z } from "zod";

export const StyleSchema = z
  .object({
    fg: z.string().optional(),
    bg: z.string().optional(),
    bold: z.boolean().optional(),
    italic: z.boolean().optional(),
    underline: z.boolean().optional(),
    reverse: z.boolean().optional(),
  })
  .strict();

const Percent = z.number().gt(0).max(1);

export const EditorConfigSchema = z
  .object({
    $schema: z.string().optional(),

    // Text layout
    tabSize: z.number().int().min(1).max(16).optional(),

    // Share of the terminal this view covers
    widthPercent: Percent.optional(),
    heightPercent: Percent.optional(),

    // Lines moved per mouse wheel notch
    wheelScrollLines: z.number().int().positive().optional(),

    colorscheme: z
      .object({
        default: StyleSchema.optional(),
        lineNumber: StyleSchema.optional(),
        selection: StyleSchema.optional(),
        statusLine: StyleSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type EditorConfig = z.infer<typeof EditorConfigSchema>;

export const DEFAULT_CONFIG = {
  tabSize: 4,
  widthPercent: 1,
  heightPercent: 1,
  wheelScrollLines: 2,
} as const satisfies EditorConfig;

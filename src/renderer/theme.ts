/**
 * Default colorscheme, on the Gruvbox dark palette.
 */

import type { Colorscheme } from "./types.ts";

const GRUVBOX_GRAY = "#928374";

export const DEFAULT_COLORSCHEME: Colorscheme = {
  default: {},
  lineNumber: { fg: GRUVBOX_GRAY },
  selection: { reverse: true },
  statusLine: { reverse: true },
};

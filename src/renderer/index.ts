export { cursorScreenPosition, gutterWidth, screenToBuffer } from "./measurement.ts";
export { projectView } from "./projector.ts";
export { formatStatus, projectStatusLine, type StatusInfo } from "./status-line.ts";
export { DEFAULT_COLORSCHEME } from "./theme.ts";
export type {
  Cell,
  Colorscheme,
  Frame,
  HighlightMap,
  ProjectionInput,
  Screen,
  ScreenPosition,
  Style,
} from "./types.ts";

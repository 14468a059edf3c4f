/**
 * Run loop: feeds input events to a View one at a time and repaints the
 * screen by the level each event reports.
 */

import { type DebugLogger, disabledLogger } from "./debug-logger.ts";
import type { View } from "./editor/view.ts";
import { type InputEvent, RedrawLevel } from "./editor/types.ts";
import { describeCause } from "./errors.ts";
import type { Screen } from "./renderer/types.ts";

export interface RunEditorOptions {
  readonly view: View;
  readonly events: AsyncIterable<InputEvent>;
  readonly screen: Screen;
  readonly logger?: DebugLogger;
}

/**
 * Draw the first frame, then process events until one terminates the
 * editor or the event source ends. The screen is closed either way.
 */
export async function runEditor(options: RunEditorOptions): Promise<void> {
  const { view, events, screen } = options;
  const logger = options.logger ?? disabledLogger;

  try {
    screen.draw(view.display(), view.statusLine());

    for await (const event of events) {
      const result = view.handleEvent(event);
      if (result.kind === "terminate") return;

      if (result.level === RedrawLevel.Full) {
        screen.draw(view.display(), view.statusLine());
      } else if (result.level === RedrawLevel.CursorOnly) {
        screen.drawCursor(view.cursorPosition(), view.statusLine());
      }
    }
  } catch (err) {
    logger.logError(`Run loop stopped: ${describeCause(err)}`);
    throw err;
  } finally {
    screen.close();
  }
}

/**
 * Mouse selection state machine.
 *
 *   idle ──press──▶ selecting   (drops the selection anchor)
 *   selecting ──drag──▶ selecting   (extends the selection)
 *   any ──release──▶ idle
 *
 * A press reported while already selecting is a drag: terminals repeat the
 * primary-button event while the pointer moves with the button held.
 */

export type MouseState = "idle" | "selecting";

export type MouseAction = "press" | "release";

export interface MouseTransition {
  readonly state: MouseState;
  /** Drop a new selection anchor at the pointer. */
  readonly setAnchor: boolean;
  /** Move the cursor and the free end of the selection to the pointer. */
  readonly moveCursor: boolean;
}

export function mouseTransition(state: MouseState, action: MouseAction): MouseTransition {
  if (action === "release") {
    return { state: "idle", setAnchor: false, moveCursor: false };
  }
  if (state === "idle") {
    return { state: "selecting", setAnchor: true, moveCursor: true };
  }
  // press while selecting = drag
  return { state: "selecting", setAnchor: false, moveCursor: true };
}

/**
 * Key mapping tests.
 */

import { describe, expect, test } from "vitest";
import { keyEventToCommand } from "../../src/editor/input-handler.ts";
import { char, ctrl, key } from "../helpers.ts";

describe("keyEventToCommand - Navigation", () => {
  test("arrows move the cursor", () => {
    expect(keyEventToCommand(key("ArrowUp"))).toEqual({ type: "moveCursor", direction: "up" });
    expect(keyEventToCommand(key("ArrowDown"))).toEqual({ type: "moveCursor", direction: "down" });
    expect(keyEventToCommand(key("ArrowLeft"))).toEqual({ type: "moveCursor", direction: "left" });
    expect(keyEventToCommand(key("ArrowRight"))).toEqual({ type: "moveCursor", direction: "right" });
  });

  test("page keys scroll by a page", () => {
    expect(keyEventToCommand(key("PageUp"))).toEqual({ type: "scroll", direction: "up", amount: "page" });
    expect(keyEventToCommand(key("PageDown"))).toEqual({ type: "scroll", direction: "down", amount: "page" });
  });

  test("Ctrl+U and Ctrl+D scroll by half a page", () => {
    expect(keyEventToCommand(ctrl("u"))).toEqual({ type: "scroll", direction: "up", amount: "halfPage" });
    expect(keyEventToCommand(ctrl("d"))).toEqual({ type: "scroll", direction: "down", amount: "halfPage" });
  });
});

describe("keyEventToCommand - Editing", () => {
  test("printable characters insert themselves", () => {
    expect(keyEventToCommand(char("x"))).toEqual({ type: "insertText", text: "x" });
    expect(keyEventToCommand(char(" "))).toEqual({ type: "insertText", text: " " });
  });

  test("Enter, Tab and Backspace", () => {
    expect(keyEventToCommand(key("Enter"))).toEqual({ type: "insertNewline" });
    expect(keyEventToCommand(key("Tab"))).toEqual({ type: "insertTab" });
    expect(keyEventToCommand(key("Backspace"))).toEqual({ type: "deleteBackward" });
  });

  test("an empty character maps to nothing", () => {
    expect(keyEventToCommand(char(""))).toBeUndefined();
  });
});

describe("keyEventToCommand - Control Chords", () => {
  test.each([
    ["q", "quit"],
    ["s", "save"],
    ["o", "open"],
    ["z", "undo"],
    ["y", "redo"],
    ["c", "copy"],
    ["x", "cut"],
    ["v", "paste"],
    ["a", "selectAll"],
  ])("Ctrl+%s is %s", (letter, type) => {
    expect(keyEventToCommand(ctrl(letter))).toEqual({ type });
  });

  test("chords ignore case", () => {
    expect(keyEventToCommand(ctrl("S"))).toEqual({ type: "save" });
  });

  test("unbound chords map to nothing", () => {
    expect(keyEventToCommand(ctrl("k"))).toBeUndefined();
  });

  test("object property names are not chords", () => {
    expect(keyEventToCommand(ctrl("constructor"))).toBeUndefined();
    expect(keyEventToCommand(ctrl("toString"))).toBeUndefined();
    expect(keyEventToCommand(ctrl("__proto__"))).toBeUndefined();
  });
});

import type { Key } from "ink";

/** Maps an ink keypress to the key names `TraceExplorer.handleKey` understands. */
export function normalizeKey(input: string, key: Key): string | null {
  if (key.ctrl && input === "c") return "ctrl+c";
  if (key.upArrow) return "up";
  if (key.downArrow) return "down";
  if (key.leftArrow) return "left";
  if (key.rightArrow) return "right";
  if (key.return) return "enter";
  if (key.escape) return "esc";
  if (key.tab) return key.shift ? "shift+tab" : "tab";
  // most terminals send DEL for backspace, which ink reports as delete
  if (key.backspace || key.delete) return "backspace";
  if (key.ctrl || key.meta) return null;
  if (input === " ") return "space";
  return input.length > 0 ? input : null;
}

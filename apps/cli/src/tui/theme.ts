import type { Tone } from "@spanscope/core";

export interface ToneStyle {
  color?: string;
  bold?: boolean;
  dimColor?: boolean;
}

export const TONE_STYLES: Record<Tone, ToneStyle> = {
  default: {},
  header: { color: "cyan", bold: true },
  muted: { dimColor: true },
  error: { color: "red" },
  success: { color: "green" },
  warning: { color: "yellow" },
  duration: { color: "magenta" },
  key: { color: "blue", bold: true },
};

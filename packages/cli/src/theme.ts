// Terminal rendering of styled output events. Pure functions, no I/O.
import type { OutputEvent, StyleTag } from "@wayfarer/schemas";

// ANSI color helpers
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;
export const magenta = (s: string): string => `\x1b[35m${s}\x1b[0m`;
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;
export const onBlue = (s: string): string => `\x1b[37;44m${s}\x1b[0m`;
export const onRed = (s: string): string => `\x1b[37;41m${s}\x1b[0m`;
export const inverse = (s: string): string => `\x1b[1;30;47m${s}\x1b[0m`;

const plain = (s: string): string => s;

export type Theme = Readonly<Record<StyleTag, (s: string) => string>>;

export const DEFAULT_THEME: Theme = {
  room_name: (s) => bold(cyan(s)),
  room_desc: plain,
  item_name: yellow,
  item_desc: plain,
  command: green,
  error: red,
  success: (s) => bold(green(s)),
  hint: (s) => dim(magenta(s)),
  speech: cyan,
  system: onBlue,
  header: inverse,
};

export const SPOOKY_THEME: Theme = {
  room_name: (s) => bold(red(s)),
  room_desc: dim,
  item_name: yellow,
  item_desc: dim,
  command: green,
  error: (s) => bold(red(s)),
  success: green,
  hint: (s) => dim(magenta(s)),
  speech: cyan,
  system: onRed,
  header: (s) => bold(onRed(s)),
};

export const THEMES: Readonly<Record<string, Theme>> = {
  default: DEFAULT_THEME,
  spooky: SPOOKY_THEME,
};

export function isThemeName(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(THEMES, name.toLowerCase());
}

/** Unknown names fall back to the default theme. */
export function getTheme(name: string | undefined): Theme {
  return THEMES[(name ?? "default").toLowerCase()] ?? DEFAULT_THEME;
}

export function formatEvent(event: OutputEvent, theme: Theme): string {
  return theme[event.style](event.text);
}

export function formatEvents(events: readonly OutputEvent[], theme: Theme): string[] {
  return events.map((event) => formatEvent(event, theme));
}

/** A boxed banner: the text centred between padding, framed by `border` rows. */
export function titleBanner(text: string, padding = 4, border = "="): string[] {
  const width = text.length + padding * 2;
  const rule = border.repeat(width);
  return [rule, `${" ".repeat(padding)}${text}${" ".repeat(padding)}`, rule];
}

export function gamePrompt(theme: Theme): string {
  return `${theme.command(">")} `;
}

/**
 * Color settings read from the `color.interactive*` configuration keys.
 *
 * - `color.interactive` (falling back to `color.ui`): whether to color at all
 * - `color.interactive.<slot>`: the color of one slot
 */

import { ConfigError, MissingConfigValueError } from "../errors/config-error.js";
import { parseColorValue } from "./color-value.js";

/**
 * Slots of `color.interactive.<slot>`. The report header uses `header`,
 * usage text `help`, error messages `error`. `prompt` is shared with git's
 * interactive commands; it is validated but nothing here prompts.
 */
export const ColorSlot = {
  PROMPT: "prompt",
  HEADER: "header",
  HELP: "help",
  ERROR: "error",
} as const;

export type ColorSlotValue = (typeof ColorSlot)[keyof typeof ColorSlot];

export const ColorMode = {
  NEVER: "never",
  ALWAYS: "always",
  /** Color only when writing to a terminal */
  AUTO: "auto",
} as const;

export type ColorModeValue = (typeof ColorMode)[keyof typeof ColorMode];

/**
 * Escape sequence per slot; "" disables coloring of that slot.
 */
export type ColorPalette = Record<ColorSlotValue, string>;

export const DEFAULT_PALETTE: ColorPalette = {
  prompt: "\x1b[1;34m",
  header: "\x1b[1m",
  help: "\x1b[1;31m",
  error: "\x1b[1;31m",
};

export const NO_COLOR_PALETTE: ColorPalette = {
  prompt: "",
  header: "",
  help: "",
  error: "",
};

/**
 * A configuration entry; value is null when the key is present without "=".
 */
export interface ConfigEntry {
  key: string;
  value: string | null;
}

export interface ColorConfig {
  /** From color.interactive */
  mode?: ColorModeValue;
  /** From color.ui */
  uiMode?: ColorModeValue;
  /** Slot overrides from color.interactive.<slot> */
  colors: Partial<ColorPalette>;
}

export interface TerminalInfo {
  isTTY: boolean;
  /** Value of TERM */
  term?: string;
}

const SLOTS = new Set<string>(Object.values(ColorSlot));

function isColorSlot(name: string): name is ColorSlotValue {
  return SLOTS.has(name);
}

/**
 * Parse a color boolean: "always", "never", "auto" or a boolean, where
 * true means "auto".
 *
 * @throws ConfigError if the value is none of these
 */
export function parseColorMode(key: string, value: string | null): ColorModeValue {
  if (value === null) {
    return ColorMode.AUTO;
  }

  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case "never":
      return ColorMode.NEVER;
    case "always":
      return ColorMode.ALWAYS;
    case "auto":
    case "true":
    case "yes":
    case "on":
      return ColorMode.AUTO;
    case "":
    case "false":
    case "no":
    case "off":
      return ColorMode.NEVER;
  }

  if (/^-?\d+$/.test(normalized)) {
    return parseInt(normalized, 10) !== 0 ? ColorMode.AUTO : ColorMode.NEVER;
  }

  throw new ConfigError(key, value, `bad boolean config value '${value}' for '${key}'`);
}

/**
 * Build a ColorConfig from configuration entries. Later entries override
 * earlier ones; unrelated keys and unknown slots are ignored.
 *
 * @throws ConfigError on a malformed color or color boolean
 */
export function parseColorConfig(entries: Iterable<ConfigEntry>): ColorConfig {
  const config: ColorConfig = { colors: {} };

  for (const { key, value } of entries) {
    const name = key.toLowerCase();

    if (name === "color.ui") {
      config.uiMode = parseColorMode(key, value);
      continue;
    }

    if (name === "color.interactive") {
      config.mode = parseColorMode(key, value);
      continue;
    }

    const prefix = "color.interactive.";
    if (!name.startsWith(prefix)) {
      continue;
    }

    const slot = name.slice(prefix.length);
    if (!isColorSlot(slot)) {
      continue;
    }
    if (value === null) {
      throw new MissingConfigValueError(key);
    }

    const color = parseColorValue(value);
    if (color === undefined) {
      throw new ConfigError(key, value, `invalid color value: ${value}`);
    }
    config.colors[slot] = color;
  }

  return config;
}

/**
 * Whether output should be colored for the given configuration and terminal.
 */
export function wantColor(config: ColorConfig, terminal: TerminalInfo): boolean {
  const mode = config.mode ?? config.uiMode ?? ColorMode.AUTO;
  if (mode === ColorMode.AUTO) {
    return terminal.isTTY && terminal.term !== "dumb";
  }
  return mode === ColorMode.ALWAYS;
}

/**
 * The palette to render with: configured slots over the defaults, or no
 * colors at all when coloring is off.
 */
export function resolvePalette(config: ColorConfig, terminal: TerminalInfo): ColorPalette {
  if (!wantColor(config, terminal)) {
    return { ...NO_COLOR_PALETTE };
  }
  return { ...DEFAULT_PALETTE, ...config.colors };
}

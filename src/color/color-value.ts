/**
 * Parser for git color values such as "bold blue" or "ul #ff0000 black".
 *
 * A value is a space-separated list of words: up to two colors (foreground,
 * then background) and any number of attributes. The result is a single SGR
 * escape sequence, or "" when the value requests nothing.
 */

export const COLOR_RESET = "\x1b[m";

const COLOR_NAMES = ["black", "red", "green", "yellow", "blue", "magenta", "cyan", "white"];

const ATTRIBUTES = new Map<string, { on: number; off: number }>([
  ["bold", { on: 1, off: 22 }],
  ["dim", { on: 2, off: 22 }],
  ["italic", { on: 3, off: 23 }],
  ["ul", { on: 4, off: 24 }],
  ["underline", { on: 4, off: 24 }],
  ["blink", { on: 5, off: 25 }],
  ["reverse", { on: 7, off: 27 }],
  ["strike", { on: 9, off: 29 }],
]);

/**
 * A parsed color, or null for "normal" (no color requested in that slot).
 */
type ColorSpec =
  | { kind: "default" }
  | { kind: "basic"; index: number; bright: boolean }
  | { kind: "indexed"; index: number }
  | { kind: "rgb"; r: number; g: number; b: number }
  | null;

function parseColorWord(word: string): ColorSpec | undefined {
  if (word === "normal") return null;
  if (word === "default") return { kind: "default" };

  const named = COLOR_NAMES.indexOf(word);
  if (named >= 0) return { kind: "basic", index: named, bright: false };

  if (word.startsWith("bright")) {
    const brightIndex = COLOR_NAMES.indexOf(word.slice("bright".length));
    if (brightIndex >= 0) return { kind: "basic", index: brightIndex, bright: true };
  }

  if (/^#[0-9a-f]{6}$/i.test(word)) {
    return {
      kind: "rgb",
      r: parseInt(word.slice(1, 3), 16),
      g: parseInt(word.slice(3, 5), 16),
      b: parseInt(word.slice(5, 7), 16),
    };
  }

  if (/^-?\d+$/.test(word)) {
    const value = parseInt(word, 10);
    if (value === -1) return null;
    if (value >= 0 && value < 8) return { kind: "basic", index: value, bright: false };
    if (value >= 8 && value <= 255) return { kind: "indexed", index: value };
  }

  return undefined;
}

function parseAttributeWord(word: string): number | undefined {
  let negate = false;
  let name = word;
  if (name.startsWith("no")) {
    negate = true;
    name = name.slice(name.startsWith("no-") ? 3 : 2);
  }
  const attribute = ATTRIBUTES.get(name);
  if (!attribute) return undefined;
  return negate ? attribute.off : attribute.on;
}

function colorCodes(color: ColorSpec, background: boolean): string[] {
  if (color === null) return [];
  switch (color.kind) {
    case "default":
      return [background ? "49" : "39"];
    case "basic": {
      const base = color.bright ? (background ? 100 : 90) : background ? 40 : 30;
      return [String(base + color.index)];
    }
    case "indexed":
      return [background ? "48" : "38", "5", String(color.index)];
    case "rgb":
      return [background ? "48" : "38", "2", String(color.r), String(color.g), String(color.b)];
  }
}

/**
 * Parse a git color value into an escape sequence.
 *
 * @returns The escape sequence ("" for an empty or all-"normal" value), or
 *   undefined when the value is malformed
 */
export function parseColorValue(value: string): string | undefined {
  const attributes: number[] = [];
  const colors: ColorSpec[] = [];

  for (const word of value.trim().toLowerCase().split(/\s+/)) {
    if (!word) continue;

    const color = parseColorWord(word);
    if (color !== undefined) {
      if (colors.length === 2) return undefined;
      colors.push(color);
      continue;
    }

    const attribute = parseAttributeWord(word);
    if (attribute === undefined) return undefined;
    if (!attributes.includes(attribute)) {
      attributes.push(attribute);
    }
  }

  const codes = [
    ...attributes.map(String),
    ...colorCodes(colors[0] ?? null, false),
    ...colorCodes(colors[1] ?? null, true),
  ];
  return codes.length > 0 ? `\x1b[${codes.join(";")}m` : "";
}

/**
 * Wrap text in a color; an empty color leaves the text untouched.
 */
export function colorize(text: string, color: string): string {
  return color ? `${color}${text}${COLOR_RESET}` : text;
}

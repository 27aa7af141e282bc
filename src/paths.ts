/**
 * Lossless conversion between path bytes and strings.
 *
 * Git paths are byte strings and need not be valid UTF-8. Valid sequences
 * decode normally; every byte that is not part of one becomes the lone
 * surrogate U+DC00 + byte. Valid UTF-8 never decodes to a lone surrogate,
 * so distinct byte paths always give distinct strings, and encodePath
 * restores the original bytes.
 */

const ESCAPE_BASE = 0xdc00;
const ESCAPED_BYTE = /[\udc80-\udcff]/gu;

function inRange(bytes: Uint8Array, index: number, low: number, high: number): boolean {
  return index < bytes.length && bytes[index] >= low && bytes[index] <= high;
}

/**
 * Length of the well-formed UTF-8 sequence starting at index, or 0.
 */
function sequenceLength(bytes: Uint8Array, index: number): number {
  const lead = bytes[index];
  if (lead < 0x80) return 1;

  if (lead >= 0xc2 && lead <= 0xdf) {
    return inRange(bytes, index + 1, 0x80, 0xbf) ? 2 : 0;
  }

  if (lead >= 0xe0 && lead <= 0xef) {
    const low = lead === 0xe0 ? 0xa0 : 0x80;
    const high = lead === 0xed ? 0x9f : 0xbf;
    return inRange(bytes, index + 1, low, high) && inRange(bytes, index + 2, 0x80, 0xbf) ? 3 : 0;
  }

  if (lead >= 0xf0 && lead <= 0xf4) {
    const low = lead === 0xf0 ? 0x90 : 0x80;
    const high = lead === 0xf4 ? 0x8f : 0xbf;
    return inRange(bytes, index + 1, low, high) &&
      inRange(bytes, index + 2, 0x80, 0xbf) &&
      inRange(bytes, index + 3, 0x80, 0xbf)
      ? 4
      : 0;
  }

  return 0;
}

export function decodePath(bytes: Uint8Array): string {
  let result = "";
  let runStart = 0;
  let i = 0;

  while (i < bytes.length) {
    const length = sequenceLength(bytes, i);
    if (length > 0) {
      i += length;
      continue;
    }
    result += Buffer.from(bytes.subarray(runStart, i)).toString("utf8");
    result += String.fromCharCode(ESCAPE_BASE + bytes[i]);
    i++;
    runStart = i;
  }

  return result + Buffer.from(bytes.subarray(runStart)).toString("utf8");
}

export function encodePath(path: string): Buffer {
  const parts: Buffer[] = [];
  let segmentStart = 0;
  let i = 0;

  while (i < path.length) {
    const unit = path.charCodeAt(i);
    const next = i + 1 < path.length ? path.charCodeAt(i + 1) : 0;

    if (unit >= 0xd800 && unit <= 0xdbff && next >= 0xdc00 && next <= 0xdfff) {
      i += 2;
      continue;
    }

    if (unit >= 0xdc80 && unit <= 0xdcff) {
      parts.push(Buffer.from(path.slice(segmentStart, i), "utf8"), Buffer.of(unit - ESCAPE_BASE));
      i++;
      segmentStart = i;
      continue;
    }

    i++;
  }

  parts.push(Buffer.from(path.slice(segmentStart), "utf8"));
  return Buffer.concat(parts);
}

/**
 * Byte-wise ordering of the paths' original bytes.
 */
export function comparePaths(a: string, b: string): number {
  return Buffer.compare(encodePath(a), encodePath(b));
}

/**
 * Printable form: bytes that are not UTF-8 are shown as octal escapes,
 * e.g. "\377.txt".
 */
export function displayPath(path: string): string {
  return path.replace(ESCAPED_BYTE, (unit) => `\\${(unit.charCodeAt(0) - ESCAPE_BASE).toString(8).padStart(3, "0")}`);
}

/**
 * Parser for `git diff-* --numstat -z` output.
 *
 * Each record is `<added>\t<deleted>\t<path>\0`. Binary files report "-" for
 * both counts and are read as zero. A rename record has an empty path
 * followed by `<old>\0<new>\0`; its new path is used.
 *
 * Output is taken as bytes: paths are split on NUL before decoding, and
 * decoded with decodePath so paths that are not UTF-8 stay distinct.
 */

import { StatusError } from "../errors/status-error.js";
import { decodePath } from "../paths.js";
import type { ChangeEvent } from "../types.js";

const NUL = 0x00;
const TAB = 0x09;
const COUNT = /^(\d+|-)$/;

function splitFields(output: Uint8Array): Uint8Array[] {
  const fields: Uint8Array[] = [];
  let start = 0;
  for (let i = 0; i < output.length; i++) {
    if (output[i] === NUL) {
      fields.push(output.subarray(start, i));
      start = i + 1;
    }
  }
  // Output ends with a NUL; anything after the last one is an unterminated field
  if (start < output.length) {
    fields.push(output.subarray(start));
  }
  return fields;
}

function quote(field: Uint8Array): string {
  return JSON.stringify(decodePath(field));
}

function parseCount(field: Uint8Array, value: string): number {
  if (!COUNT.test(value)) {
    throw new StatusError(`malformed numstat record: ${quote(field)}`);
  }
  return value === "-" ? 0 : parseInt(value, 10);
}

export function* parseNumstat(output: Uint8Array): Generator<ChangeEvent> {
  const fields = splitFields(output);

  for (let i = 0; i < fields.length; i++) {
    const field = fields[i];
    const firstTab = field.indexOf(TAB);
    const secondTab = firstTab < 0 ? -1 : field.indexOf(TAB, firstTab + 1);
    if (secondTab < 0) {
      throw new StatusError(`malformed numstat record: ${quote(field)}`);
    }

    // Counts are ASCII; latin1 maps each byte to one character
    const added = parseCount(field, Buffer.from(field.subarray(0, firstTab)).toString("latin1"));
    const deleted = parseCount(field, Buffer.from(field.subarray(firstTab + 1, secondTab)).toString("latin1"));

    let pathBytes = field.subarray(secondTab + 1);
    if (pathBytes.length === 0) {
      if (i + 2 >= fields.length) {
        throw new StatusError(`truncated numstat rename record: ${quote(field)}`);
      }
      pathBytes = fields[i + 2];
      i += 2;
    }

    yield { path: decodePath(pathBytes), added, deleted };
  }
}

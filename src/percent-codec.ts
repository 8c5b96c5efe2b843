// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Context-aware percent-encoding (RFC 3986 section 2.1).
 *
 * Encoding works on the UTF-8 bytes of the input: every byte outside the
 * context's safe set becomes `%XX` with uppercase hex digits. Decoding is
 * strict: a `%` must be followed by exactly two hex digits and the decoded
 * bytes must be valid UTF-8. `+` is an ordinary character in both
 * directions; this is not `application/x-www-form-urlencoded`.
 * @module
 */

import { SHARED_DECODER, SHARED_ENCODER } from "./encoding";
import { InvalidEncodingError } from "./errors";

export type PercentContext = "path-segment" | "query" | "fragment";

const UNRESERVED =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-._~";

/*
 * Per-context additions to the unreserved set. Each context escapes the
 * delimiters that would end or split it:
 * - path-segment: '/' separates segments, '?' and '#' end the path
 * - query: '&' and '=' split pairs, '#' ends the query, '+' is escaped
 *   so form decoders on the other side cannot misread it as a space
 * - fragment: only '#' itself
 */
const EXTRA_SAFE: Readonly<Record<PercentContext, string>> = {
  "path-segment": "!$&'()*+,;=:@",
  query: "!$'()*,;:@/?",
  fragment: "!$&'()*+,;=:@/?",
};

function buildSafeTable(extra: string): Uint8Array {
  const table = new Uint8Array(128);
  for (const ch of UNRESERVED + extra) table[ch.charCodeAt(0)] = 1;
  return table;
}

const SAFE_TABLES: Readonly<Record<PercentContext, Uint8Array>> = {
  "path-segment": buildSafeTable(EXTRA_SAFE["path-segment"]),
  query: buildSafeTable(EXTRA_SAFE.query),
  fragment: buildSafeTable(EXTRA_SAFE.fragment),
};

const HEX_DIGITS = "0123456789ABCDEF";

function isSafeByte(table: Uint8Array, byte: number): boolean {
  return byte < 128 && table[byte] === 1;
}

/**
 * Returns true when `ch` (a single UTF-16 code unit) may appear unescaped in
 * `context`.
 */
export function isSafeChar(ch: string, context: PercentContext): boolean {
  return (
    ch.length === 1 && isSafeByte(SAFE_TABLES[context], ch.charCodeAt(0))
  );
}

export function percentEncode(text: string, context: PercentContext): string {
  const table = SAFE_TABLES[context];
  const bytes = SHARED_ENCODER.encode(text);
  // eslint-disable-next-line functional/no-let -- string builder
  let out = "";
  for (const byte of bytes) {
    if (isSafeByte(table, byte)) {
      out += String.fromCharCode(byte);
    } else {
      out += `%${HEX_DIGITS.charAt(byte >> 4)}${HEX_DIGITS.charAt(byte & 0x0f)}`;
    }
  }
  return out;
}

function hexValue(code: number): number {
  if (code >= 48 && code <= 57) return code - 48; // 0-9
  if (code >= 65 && code <= 70) return code - 55; // A-F
  if (code >= 97 && code <= 102) return code - 87; // a-f
  return -1;
}

/** Index of the first unpaired surrogate in `text`, or -1. */
function findLoneSurrogate(text: string): number {
  // eslint-disable-next-line functional/no-let -- scan index
  let index = 0;
  while (index < text.length) {
    const code = text.charCodeAt(index);
    if (code >= 0xd800 && code <= 0xdbff) {
      const next = text.charCodeAt(index + 1);
      if (!(next >= 0xdc00 && next <= 0xdfff)) return index;
      index += 2;
      continue;
    }
    if (code >= 0xdc00 && code <= 0xdfff) return index;
    index += 1;
  }
  return -1;
}

/**
 * Reverses percentEncode. Unescaped characters pass through unchanged.
 * @throws InvalidEncodingError on a malformed escape, an unpaired surrogate
 * or a non-UTF-8 result
 */
export function percentDecode(text: string, context: PercentContext): string {
  const surrogate = findLoneSurrogate(text);
  if (surrogate !== -1) {
    throw new InvalidEncodingError(context, surrogate, "unpaired surrogate");
  }
  if (!text.includes("%")) return text;

  const bytes: number[] = [];
  // eslint-disable-next-line functional/no-let -- cursor over the input
  let index = 0;
  while (index < text.length) {
    const code = text.charCodeAt(index);
    if (code !== 37) {
      // '%' absent: copy the code point's UTF-8 bytes
      const cp = text.codePointAt(index) ?? code;
      const width = cp > 0xffff ? 2 : 1;
      bytes.push(...SHARED_ENCODER.encode(text.slice(index, index + width)));
      index += width;
      continue;
    }
    // charCodeAt past the end is NaN, which hexValue rejects
    const hi = hexValue(text.charCodeAt(index + 1));
    const lo = hexValue(text.charCodeAt(index + 2));
    if (hi < 0 || lo < 0) throw new InvalidEncodingError(context, index);
    bytes.push((hi << 4) | lo);
    index += 3;
  }

  try {
    return SHARED_DECODER.decode(Uint8Array.from(bytes));
  } catch {
    throw new InvalidEncodingError(
      context,
      0,
      "escapes do not form valid UTF-8",
    );
  }
}

/**
 * Non-throwing variant of percentDecode.
 */
export function strictPercentDecode(
  text: string,
  context: PercentContext,
):
  | { readonly ok: true; readonly value: string }
  | { readonly ok: false; readonly error: InvalidEncodingError } {
  try {
    return { ok: true, value: percentDecode(text, context) };
  } catch (error: unknown) {
    if (error instanceof InvalidEncodingError) return { ok: false, error };
    throw error;
  }
}

// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Hostname labels: the dot-separated parts of `vm1.example.com`.
 *
 * A Label is a branded string. The only way to obtain one is through
 * parseLabel(), so any value typed as Label is known to satisfy the
 * RFC 1123 letter-digit-hyphen rules.
 * @module
 */

import { MAX_LABEL_LENGTH } from "./constants";
import { InvalidLabelError, type LabelErrorReason } from "./errors";

export type Label = string & { readonly __brand: "Label" };

function isDigit(code: number): boolean {
  return code >= 48 && code <= 57; // 0-9
}

function isAlpha(code: number): boolean {
  return (
    (code >= 65 && code <= 90) || // A-Z
    (code >= 97 && code <= 122) // a-z
  );
}

function isAlnumHyphen(code: number): boolean {
  return isDigit(code) || isAlpha(code) || code === 45; // '-'
}

function checkLabel(text: string): LabelErrorReason | undefined {
  if (text.length === 0) return "empty";
  if (text.length > MAX_LABEL_LENGTH) return "too-long";
  for (const index of text.split("").keys()) {
    if (!isAlnumHyphen(text.charCodeAt(index))) return "invalid-char";
  }
  if (text.startsWith("-")) return "leading-hyphen";
  if (text.endsWith("-")) return "trailing-hyphen";
  return undefined;
}

export function isLabel(text: string): text is Label {
  return checkLabel(text) === undefined;
}

/**
 * Validates a single label. Case is preserved.
 * @throws InvalidLabelError
 */
export function parseLabel(text: string): Label {
  if (isLabel(text)) return text;
  throw new InvalidLabelError(text, checkLabel(text) ?? "invalid-char");
}

// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Shared text encoding utilities.
 * @module
 */

/**
 * Shared TextEncoder instance for UTF-8 encoding.
 * Lone surrogates are written as U+FFFD, as the Encoding Standard requires.
 */
export const SHARED_ENCODER = new TextEncoder();

/**
 * Shared UTF-8 TextDecoder that throws on malformed byte sequences instead of
 * substituting U+FFFD. The BOM is kept so a leading %EF%BB%BF survives decoding.
 */
export const SHARED_DECODER = new TextDecoder("utf-8", {
  fatal: true,
  ignoreBOM: true,
});

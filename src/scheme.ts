// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * The closed set of URL schemes this library understands.
 * @module
 */

import { UnsupportedSchemeError } from "./errors";

export const Scheme = Object.freeze({
  Http: "http",
  Https: "https",
  Ws: "ws",
  Wss: "wss",
} as const);
export type Scheme = (typeof Scheme)[keyof typeof Scheme];

export const SCHEMES: readonly Scheme[] = Object.freeze(Object.values(Scheme));

const DEFAULT_PORTS: Readonly<Record<Scheme, number>> = Object.freeze({
  http: 80,
  https: 443,
  ws: 80,
  wss: 443,
});

export function isScheme(value: unknown): value is Scheme {
  return typeof value === "string" && SCHEMES.some((s) => s === value);
}

/**
 * Case-insensitive lookup of `text` in the supported set.
 * @throws UnsupportedSchemeError
 */
export function parseScheme(text: string): Scheme {
  const lower = text.toLowerCase();
  if (!isScheme(lower)) throw new UnsupportedSchemeError(text);
  return lower;
}

export function formatScheme(scheme: Scheme): string {
  return scheme;
}

/** Port implied by the scheme when the URL carries none. */
export function defaultPort(scheme: Scheme): number {
  return DEFAULT_PORTS[scheme];
}

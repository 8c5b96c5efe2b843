// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Query strings as a map from decoded key to decoded value.
 *
 * Any ReadonlyMap is accepted as a Query. Serialization always iterates keys
 * in sorted order, so two maps with the same pairs print identically
 * regardless of insertion order.
 * @module
 */

import { InvalidQueryError } from "./errors";
import { percentDecode, percentEncode } from "./percent-codec";

export type Query = ReadonlyMap<string, string>;

export type QueryInit =
  | Iterable<readonly [string, string]>
  | Readonly<Record<string, string>>;

function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Entries ordered by key, as the serializer emits them. */
export function sortedEntries(query: Query): Array<readonly [string, string]> {
  return [...query.entries()].sort(([a], [b]) => compareKeys(a, b));
}

function isIterable(
  init: QueryInit,
): init is Iterable<readonly [string, string]> {
  return Symbol.iterator in init;
}

/**
 * Builds a Query. On a repeated key the last value wins.
 */
export function createQuery(init: QueryInit = []): Query {
  const entries = isIterable(init) ? [...init] : Object.entries(init);
  const map = new Map<string, string>();
  for (const [key, value] of entries) map.set(key, value);
  return new Map(sortedEntries(map));
}

/**
 * Parses the text between '?' and '#'. An empty string is the empty query.
 * @throws InvalidQueryError for a pair without '='
 * @throws InvalidEncodingError for a malformed escape
 */
export function parseQuery(raw: string): Query {
  if (raw.length === 0) return createQuery();
  const pairs = raw.split("&").map((pair): readonly [string, string] => {
    const eq = pair.indexOf("=");
    if (eq === -1) throw new InvalidQueryError(pair);
    return [
      percentDecode(pair.slice(0, eq), "query"),
      percentDecode(pair.slice(eq + 1), "query"),
    ];
  });
  return createQuery(pairs);
}

/** Encoded query without the leading '?'; empty for an empty query. */
export function formatQuery(query: Query): string {
  return sortedEntries(query)
    .map(
      ([key, value]) =>
        `${percentEncode(key, "query")}=${percentEncode(value, "query")}`,
    )
    .join("&");
}

export function querySet(query: Query, key: string, value: string): Query {
  return createQuery([...query.entries(), [key, value]]);
}

export function queryDelete(query: Query, key: string): Query {
  return createQuery([...query.entries()].filter(([k]) => k !== key));
}

export function queryEquals(a: Query, b: Query): boolean {
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    if (b.get(key) !== value) return false;
  }
  return true;
}

// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * String to Url parsing.
 *
 * The input is read once, left to right, through the states
 * scheme → authority → path → query → fragment. Each state consumes up to its
 * terminating delimiter and hands the cursor on; nothing is re-read and the
 * first failure aborts the parse.
 * @module
 */

import { getUrlConfig, type UrlConfig } from "./config";
import {
  InputTooLongError,
  InvalidPathError,
  InvalidPortError,
  MissingSchemeError,
  UnsupportedSchemeError,
  UrlParseError,
} from "./errors";
import { parseHost, type Host } from "./host";
import { createLogger } from "./logger";
import { percentDecode } from "./percent-codec";
import { parsePath, rootPath, type Path } from "./path";
import { createQuery, parseQuery, type Query } from "./query";
import { parseScheme, type Scheme } from "./scheme";
import { createUrl, isValidPort, type Url } from "./url";

const log = createLogger("parser");

const SCHEME_SEPARATOR = "://";
const DIGITS_REGEX = /^\d+$/;

export type ParseResult =
  | { readonly ok: true; readonly value: Url }
  | { readonly ok: false; readonly error: UrlParseError };

class Cursor {
  private position = 0;

  constructor(private readonly input: string) {}

  peek(): string | undefined {
    return this.input[this.position];
  }

  skip(count: number): void {
    this.position = Math.min(this.input.length, this.position + count);
  }

  /** Consumes up to the first character listed in `stops`, or to the end. */
  takeUntil(stops: string): string {
    // eslint-disable-next-line functional/no-let -- scan index
    let end = this.position;
    while (end < this.input.length && !stops.includes(this.input.charAt(end))) {
      end += 1;
    }
    const taken = this.input.slice(this.position, end);
    this.position = end;
    return taken;
  }

  /** Consumes up to and including `sequence`; undefined if it never occurs. */
  takeThrough(sequence: string): string | undefined {
    const at = this.input.indexOf(sequence, this.position);
    if (at === -1) return undefined;
    const taken = this.input.slice(this.position, at);
    this.position = at + sequence.length;
    return taken;
  }

  takeRest(): string {
    const taken = this.input.slice(this.position);
    this.position = this.input.length;
    return taken;
  }
}

function readScheme(cursor: Cursor, config: UrlConfig): Scheme {
  const text = cursor.takeThrough(SCHEME_SEPARATOR);
  if (text === undefined) throw new MissingSchemeError();
  const scheme = parseScheme(text);
  if (!config.allowedSchemes.includes(scheme)) {
    throw new UnsupportedSchemeError(text);
  }
  return scheme;
}

/**
 * The authority is `host` or `host:port`. A suffix after the last ':' counts
 * as a port only when it is all digits; an empty suffix is a missing port.
 * Anything else stays in the host text and fails label validation there.
 */
function readAuthority(cursor: Cursor): {
  readonly host: Host;
  readonly port: number | undefined;
} {
  const authority = cursor.takeUntil("/?#");
  const colon = authority.lastIndexOf(":");
  if (colon !== -1) {
    const suffix = authority.slice(colon + 1);
    if (suffix.length === 0) throw new InvalidPortError(suffix);
    if (DIGITS_REGEX.test(suffix)) {
      const port = Number(suffix);
      if (!isValidPort(port)) throw new InvalidPortError(suffix);
      return { host: parseHost(authority.slice(0, colon)), port };
    }
  }
  return { host: parseHost(authority), port: undefined };
}

function readPath(cursor: Cursor): Path {
  const next = cursor.peek();
  if (next === undefined || next === "?" || next === "#") return rootPath();
  if (next !== "/") throw new InvalidPathError();
  return parsePath(cursor.takeUntil("?#"));
}

function readQuery(cursor: Cursor): Query {
  if (cursor.peek() !== "?") return createQuery();
  cursor.skip(1);
  return parseQuery(cursor.takeUntil("#"));
}

function readFragment(cursor: Cursor): string | undefined {
  if (cursor.peek() !== "#") return undefined;
  cursor.skip(1);
  return percentDecode(cursor.takeRest(), "fragment");
}

/**
 * Parses `text`, throwing the first validation failure.
 * @throws UrlParseError (one of its subclasses)
 */
export function parseUrlOrThrow(text: string): Url {
  const config = getUrlConfig();
  if (text.length > config.maxInputLength) {
    throw new InputTooLongError(text.length, config.maxInputLength);
  }
  const cursor = new Cursor(text);
  const scheme = readScheme(cursor, config);
  const { host, port } = readAuthority(cursor);
  const path = readPath(cursor);
  const query = readQuery(cursor);
  const fragment = readFragment(cursor);
  return createUrl({ scheme, host, port, path, query, fragment });
}

/**
 * Parses `text` into a Url. Never throws for malformed input; the failure is
 * returned as a typed error instead.
 */
export function parseUrl(text: string): ParseResult {
  try {
    return { ok: true, value: parseUrlOrThrow(text) };
  } catch (error: unknown) {
    if (error instanceof UrlParseError) {
      log.debug("Rejected URL input", {
        code: error.code,
        length: text.length,
      });
      return { ok: false, error };
    }
    throw error;
  }
}

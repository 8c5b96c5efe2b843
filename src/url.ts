// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * The structured URL value and its direct constructors.
 *
 * A Url never stores its string form. Every field is validated by its own
 * constructor (parseLabel, parseHost, parseScheme, ...), so createUrl only
 * checks the one field that is a bare number.
 * @module
 */

import { MAX_PORT, MIN_PORT } from "./constants";
import { InvalidPortError } from "./errors";
import { hostEquals, type Host } from "./host";
import {
  createPath,
  parentPath,
  pathEquals,
  rootPath,
  type Path,
} from "./path";
import { createQuery, queryEquals, type Query } from "./query";
import { defaultPort, type Scheme } from "./scheme";

export type Url = {
  /** Like `http` in `http://example.com/`. */
  readonly scheme: Scheme;
  /** Like `example.com` in `http://example.com/`. */
  readonly host: Host;
  /** Like `80` in `http://example.com:80/`. */
  readonly port?: number | undefined;
  /** Like `/a/b` in `http://example.com/a/b`. */
  readonly path: Path;
  /** Like `a=1&b=2` in `http://example.com/?a=1&b=2`. */
  readonly query: Query;
  /** Like `top` in `http://example.com/#top`. */
  readonly fragment?: string | undefined;
};

export type UrlInit = {
  readonly scheme: Scheme;
  readonly host: Host;
  readonly port?: number | undefined;
  readonly path?: Path | undefined;
  readonly query?: Query | undefined;
  readonly fragment?: string | undefined;
};

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
}

/**
 * Assembles a Url from validated parts. Path defaults to `/` and query to
 * empty. Both are copied, so later changes to the caller's Map or segment
 * array do not reach the Url.
 * @throws InvalidPortError when `port` is not an integer in 0-65535
 */
export function createUrl(init: UrlInit): Url {
  const { scheme, host, port, fragment } = init;
  if (port !== undefined && !isValidPort(port)) {
    throw new InvalidPortError(String(port));
  }
  return Object.freeze({
    scheme,
    host,
    port,
    path:
      init.path === undefined ? rootPath() : createPath(init.path.segments),
    query: createQuery(init.query ?? []),
    fragment,
  });
}

export function withScheme(url: Url, scheme: Scheme): Url {
  return createUrl({ ...url, scheme });
}

export function withHost(url: Url, host: Host): Url {
  return createUrl({ ...url, host });
}

export function withPort(url: Url, port: number | undefined): Url {
  return createUrl({ ...url, port });
}

export function withPath(url: Url, path: Path): Url {
  return createUrl({ ...url, path });
}

export function withQuery(url: Url, query: Query): Url {
  return createUrl({ ...url, query });
}

export function withFragment(url: Url, fragment: string | undefined): Url {
  return createUrl({ ...url, fragment });
}

/** The same URL one path segment up. */
export function parentUrl(url: Url): Url {
  return withPath(url, parentPath(url.path));
}

/** The explicit port, or the scheme's default when none is given. */
export function effectivePort(url: Url): number {
  return url.port ?? defaultPort(url.scheme);
}

export function urlEquals(a: Url, b: Url): boolean {
  return (
    a.scheme === b.scheme &&
    hostEquals(a.host, b.host) &&
    a.port === b.port &&
    pathEquals(a.path, b.path) &&
    queryEquals(a.query, b.query) &&
    a.fragment === b.fragment
  );
}

// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Absolute URL paths, held as decoded segments.
 *
 * `/a/b%2Fc/` is the segments `["a", "b/c", ""]`. The root path `/` has no
 * segments; a single empty segment is normalized to the root because both
 * print as `/`.
 * @module
 */

import { InvalidPathError } from "./errors";
import { percentDecode, percentEncode } from "./percent-codec";

export type Path = {
  readonly segments: readonly string[];
};

const ROOT: Path = Object.freeze({ segments: Object.freeze([]) });

export function rootPath(): Path {
  return ROOT;
}

export function createPath(segments: readonly string[]): Path {
  if (segments.length === 0) return ROOT;
  if (segments.length === 1 && segments[0] === "") return ROOT;
  return Object.freeze({ segments: Object.freeze([...segments]) });
}

/**
 * Builds a Path from its decoded display form, e.g. `/some/path`.
 * Segments cannot contain '/' when built this way; use createPath for that.
 * @throws InvalidPathError when `decoded` is non-empty and relative
 */
export function pathFromString(decoded: string): Path {
  if (decoded.length === 0) return ROOT;
  if (!decoded.startsWith("/")) throw new InvalidPathError();
  return createPath(decoded.slice(1).split("/"));
}

/**
 * Parses the encoded path component of a URL.
 * @throws InvalidPathError when `raw` is non-empty and relative
 * @throws InvalidEncodingError for a malformed escape in a segment
 */
export function parsePath(raw: string): Path {
  if (raw.length === 0) return ROOT;
  if (!raw.startsWith("/")) throw new InvalidPathError();
  return createPath(
    raw
      .slice(1)
      .split("/")
      .map((segment) => percentDecode(segment, "path-segment")),
  );
}

export function formatPath(path: Path): string {
  return `/${path.segments.map((s) => percentEncode(s, "path-segment")).join("/")}`;
}

/** Decoded form for display; not reversible when a segment contains '/'. */
export function pathToString(path: Path): string {
  return `/${path.segments.join("/")}`;
}

export function joinPath(path: Path, ...segments: readonly string[]): Path {
  return createPath([...path.segments, ...segments]);
}

/** Drops the last segment. The root is its own parent. */
export function parentPath(path: Path): Path {
  return createPath(path.segments.slice(0, -1));
}

export function pathEquals(a: Path, b: Path): boolean {
  return (
    a.segments.length === b.segments.length &&
    a.segments.every((s, i) => s === b.segments[i])
  );
}

// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

import { formatHost } from "./host";
import { percentEncode } from "./percent-codec";
import { formatPath } from "./path";
import { formatQuery } from "./query";
import { formatScheme } from "./scheme";
import type { Url } from "./url";

/**
 * Canonical string form of `url`:
 * `scheme://host[:port]/path[?query][#fragment]`.
 *
 * Recomputed from the structured fields on every call; never fails for a
 * Url built through createUrl or parseUrl.
 */
export function serializeUrl(url: Url): string {
  const port = url.port === undefined ? "" : `:${url.port}`;
  const query = formatQuery(url.query);
  const search = query.length > 0 ? `?${query}` : "";
  const hash =
    url.fragment === undefined
      ? ""
      : `#${percentEncode(url.fragment, "fragment")}`;
  return `${formatScheme(url.scheme)}://${formatHost(url.host)}${port}${formatPath(url.path)}${search}${hash}`;
}

// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Fully-qualified host names such as `example.com`.
 * @module
 */

import { MAX_FQDN_LENGTH } from "./constants";
import { InvalidHostError, excerpt } from "./errors";
import { parseLabel, type Label } from "./label";

export type Host = {
  /** Leftmost label, like `vm1` in `vm1.example.com`. */
  readonly name: Label;
  /** Remaining labels in written order, like `example`, `com`. */
  readonly domains: readonly [Label, ...Label[]];
};

function hostLength(name: Label, domains: readonly Label[]): number {
  return domains.reduce((sum, d) => sum + 1 + d.length, name.length);
}

/**
 * Builds a Host from already-validated labels.
 * @throws InvalidHostError when `domains` is empty or the name is too long
 */
export function createHost(name: Label, domains: readonly Label[]): Host {
  const [first, ...others] = domains;
  if (first === undefined) throw new InvalidHostError();
  if (hostLength(name, domains) > MAX_FQDN_LENGTH) {
    throw new InvalidHostError(
      `Host exceeds ${MAX_FQDN_LENGTH} characters.`,
    );
  }
  return Object.freeze({
    name,
    domains: Object.freeze<[Label, ...Label[]]>([first, ...others]),
  });
}

/**
 * Splits `text` on '.' and validates every label.
 * @throws InvalidLabelError for a malformed label
 * @throws InvalidHostError for fewer than two labels
 */
export function parseHost(text: string): Host {
  const [name, ...domains] = text.split(".").map((raw) => parseLabel(raw));
  if (name === undefined || domains.length === 0) {
    throw new InvalidHostError(
      `Host '${excerpt(text)}' must consist of at least two labels.`,
    );
  }
  return createHost(name, domains);
}

export function hostLabels(host: Host): readonly Label[] {
  return [host.name, ...host.domains];
}

export function formatHost(host: Host): string {
  return hostLabels(host).join(".");
}

export function hostEquals(a: Host, b: Host): boolean {
  const left = hostLabels(a);
  const right = hostLabels(b);
  return (
    left.length === right.length && left.every((l, i) => l === right[i])
  );
}

// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Runtime configuration for the URL parser.
 * @module
 */

import { DEFAULT_MAX_URL_INPUT_LENGTH } from "./constants";
import { InvalidConfigurationError, InvalidParameterError } from "./errors";
import { SCHEMES, isScheme, type Scheme } from "./scheme";

/**
 * Parser policy. Defaults accept every supported scheme.
 */
export type UrlConfig = {
  /** Schemes parseUrl() accepts; others fail with UnsupportedSchemeError. */
  readonly allowedSchemes: readonly Scheme[];
  /** Longest input parseUrl() will look at, in UTF-16 code units. */
  readonly maxInputLength: number;
};

const DEFAULT_URL_CONFIG: UrlConfig = Object.freeze({
  allowedSchemes: SCHEMES,
  maxInputLength: DEFAULT_MAX_URL_INPUT_LENGTH,
});

/* eslint-disable functional/no-let -- Controlled mutable configuration allowed here */
let _urlConfig: UrlConfig = DEFAULT_URL_CONFIG;
let _sealed = false;
/* eslint-enable functional/no-let */

export function getUrlConfig(): UrlConfig {
  return Object.freeze({ ..._urlConfig });
}

function assertNotSealed(action: string): void {
  if (_sealed) {
    throw new InvalidConfigurationError(
      `Configuration is sealed and cannot be ${action}.`,
    );
  }
}

function validateAllowedSchemes(value: unknown): readonly Scheme[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new InvalidParameterError(
      "UrlConfig.allowedSchemes must be a non-empty array.",
    );
  }
  const schemes: Scheme[] = [];
  for (const entry of value) {
    if (!isScheme(entry)) {
      throw new InvalidParameterError(
        `UrlConfig.allowedSchemes contains unsupported scheme '${String(entry)}'.`,
      );
    }
    if (!schemes.includes(entry)) schemes.push(entry);
  }
  return Object.freeze(schemes);
}

function validateMaxInputLength(value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new InvalidParameterError(
      "UrlConfig.maxInputLength must be a positive integer.",
    );
  }
  return value;
}

function resolveConfig(cfg: Partial<UrlConfig>): UrlConfig {
  return {
    allowedSchemes:
      cfg.allowedSchemes === undefined
        ? _urlConfig.allowedSchemes
        : validateAllowedSchemes(cfg.allowedSchemes),
    maxInputLength:
      cfg.maxInputLength === undefined
        ? _urlConfig.maxInputLength
        : validateMaxInputLength(cfg.maxInputLength),
  };
}

/**
 * Merges `cfg` into the active configuration. Unknown keys are ignored; every
 * known key is validated before anything changes.
 */
export function setUrlConfig(cfg: Partial<UrlConfig>): void {
  assertNotSealed("changed");
  _urlConfig = resolveConfig(cfg);
}

/**
 * Freezes the configuration for the rest of the process lifetime.
 */
export function sealUrlConfig(): void {
  _sealed = true;
}

export function isUrlConfigSealed(): boolean {
  return _sealed;
}

/**
 * Runs `function_` with `patch` applied, restoring the previous configuration
 * afterwards even if it throws.
 */
export function runWithUrlConfig<T>(
  patch: Partial<UrlConfig>,
  function_: () => T,
): T {
  assertNotSealed("temporarily mutated");
  const previous = _urlConfig;
  try {
    _urlConfig = resolveConfig(patch);
    return function_();
  } finally {
    _urlConfig = previous;
  }
}

export function _resetUrlConfigForTests(): void {
  _urlConfig = DEFAULT_URL_CONFIG;
  _sealed = false;
}

// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Structured, validated URLs with a canonical string form.
 * @module structured-url
 * @version 0.1.0
 */

// --- Re-export all public APIs ---

// Errors
export * from "./errors";

// Configuration
export {
  getUrlConfig,
  setUrlConfig,
  sealUrlConfig,
  isUrlConfigSealed,
  runWithUrlConfig,
} from "./config";
export type { UrlConfig } from "./config";

// Environment
export { environment, isDevelopment } from "./environment";
export type { EnvironmentName } from "./environment";

// Components
export { parseLabel, isLabel } from "./label";
export type { Label } from "./label";
export {
  createHost,
  parseHost,
  formatHost,
  hostLabels,
  hostEquals,
} from "./host";
export type { Host } from "./host";
export {
  Scheme,
  SCHEMES,
  isScheme,
  parseScheme,
  formatScheme,
  defaultPort,
} from "./scheme";
export {
  percentEncode,
  percentDecode,
  strictPercentDecode,
  isSafeChar,
} from "./percent-codec";
export type { PercentContext } from "./percent-codec";
export {
  rootPath,
  createPath,
  pathFromString,
  parsePath,
  formatPath,
  pathToString,
  joinPath,
  parentPath,
  pathEquals,
} from "./path";
export type { Path } from "./path";
export {
  createQuery,
  parseQuery,
  formatQuery,
  sortedEntries,
  querySet,
  queryDelete,
  queryEquals,
} from "./query";
export type { Query, QueryInit } from "./query";

// Url aggregate
export {
  createUrl,
  isValidPort,
  withScheme,
  withHost,
  withPort,
  withPath,
  withQuery,
  withFragment,
  parentUrl,
  effectivePort,
  urlEquals,
} from "./url";
export type { Url, UrlInit } from "./url";
export { parseUrl, parseUrlOrThrow } from "./parser";
export type { ParseResult } from "./parser";
export { serializeUrl } from "./serializer";

// Logger
export { createLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
export {
  setDevelopmentLogger,
  resetDevelopmentLogger,
} from "./dev-logger";
export type { DevelopmentLogger } from "./dev-logger";

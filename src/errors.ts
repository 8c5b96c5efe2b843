// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Custom error classes for machine-readable error handling.
 * @module
 */

import { MAX_ERROR_EXCERPT_LENGTH } from "./constants";
import type { PercentContext } from "./percent-codec";

const PREFIX = "[structured-url]";

/**
 * Shorten caller-supplied text before it is embedded in an error message.
 */
export function excerpt(input: string): string {
  return input.length > MAX_ERROR_EXCERPT_LENGTH
    ? `${input.slice(0, MAX_ERROR_EXCERPT_LENGTH)}...`
    : input;
}

export class InvalidParameterError extends RangeError {
  public readonly code = "ERR_INVALID_PARAMETER";

  constructor(message: string) {
    super(`${PREFIX} ${message}`);
    this.name = "InvalidParameterError";
  }
}

export class InvalidConfigurationError extends Error {
  public readonly code = "ERR_INVALID_CONFIGURATION";

  constructor(message: string) {
    super(`${PREFIX} ${message}`);
    this.name = "InvalidConfigurationError";
  }
}

export type UrlParseErrorCode =
  | "ERR_INVALID_LABEL"
  | "ERR_INVALID_HOST"
  | "ERR_UNSUPPORTED_SCHEME"
  | "ERR_MISSING_SCHEME"
  | "ERR_INVALID_PORT"
  | "ERR_INVALID_PATH"
  | "ERR_INVALID_QUERY"
  | "ERR_INVALID_ENCODING"
  | "ERR_INPUT_TOO_LONG";

/**
 * Base class of every failure raised while validating URL components.
 */
export abstract class UrlParseError extends Error {
  public abstract readonly code: UrlParseErrorCode;

  constructor(message: string) {
    super(`${PREFIX} ${message}`);
    this.name = "UrlParseError";
  }
}

export type LabelErrorReason =
  | "empty"
  | "too-long"
  | "invalid-char"
  | "leading-hyphen"
  | "trailing-hyphen";

export class InvalidLabelError extends UrlParseError {
  public readonly code = "ERR_INVALID_LABEL";

  constructor(
    public readonly label: string,
    public readonly reason: LabelErrorReason,
  ) {
    super(`Invalid host label '${excerpt(label)}' (${reason}).`);
    this.name = "InvalidLabelError";
  }
}

export class InvalidHostError extends UrlParseError {
  public readonly code = "ERR_INVALID_HOST";

  constructor(message = "Host must consist of at least two labels.") {
    super(message);
    this.name = "InvalidHostError";
  }
}

export class UnsupportedSchemeError extends UrlParseError {
  public readonly code = "ERR_UNSUPPORTED_SCHEME";

  constructor(public readonly scheme: string) {
    super(`Unsupported URL scheme '${excerpt(scheme)}'.`);
    this.name = "UnsupportedSchemeError";
  }
}

export class MissingSchemeError extends UrlParseError {
  public readonly code = "ERR_MISSING_SCHEME";

  constructor(message = "URL is missing the '://' scheme separator.") {
    super(message);
    this.name = "MissingSchemeError";
  }
}

export class InvalidPortError extends UrlParseError {
  public readonly code = "ERR_INVALID_PORT";

  constructor(public readonly port: string) {
    super(`Port '${excerpt(port)}' is not an integer in 0-65535.`);
    this.name = "InvalidPortError";
  }
}

export class InvalidPathError extends UrlParseError {
  public readonly code = "ERR_INVALID_PATH";

  constructor(message = "Path must be absolute (start with '/').") {
    super(message);
    this.name = "InvalidPathError";
  }
}

export class InvalidQueryError extends UrlParseError {
  public readonly code = "ERR_INVALID_QUERY";

  constructor(public readonly pair: string) {
    super(`Query pair '${excerpt(pair)}' is missing '='.`);
    this.name = "InvalidQueryError";
  }
}

export class InvalidEncodingError extends UrlParseError {
  public readonly code = "ERR_INVALID_ENCODING";

  constructor(
    public readonly context: PercentContext,
    public readonly index: number,
    detail = "malformed percent-encoding",
  ) {
    super(`${context}: ${detail} at index ${index}.`);
    this.name = "InvalidEncodingError";
  }
}

export class InputTooLongError extends UrlParseError {
  public readonly code = "ERR_INPUT_TOO_LONG";

  constructor(
    public readonly length: number,
    public readonly maxLength: number,
  ) {
    super(`Input length ${length} exceeds maximum of ${maxLength}.`);
    this.name = "InputTooLongError";
  }
}

export function isUrlParseError(error: unknown): error is UrlParseError {
  return error instanceof UrlParseError;
}

/**
 * Extracts log-safe properties from an error, truncating the message.
 */
export function sanitizeErrorForLogs(error: unknown): {
  readonly name?: string;
  readonly code?: string;
  readonly message?: string;
} {
  if (error instanceof Error) {
    const code: unknown = Reflect.get(error, "code");
    return {
      name: error.name,
      message: error.message.slice(0, 256),
      ...(typeof code === "string" ? { code } : {}),
    };
  }
  return { message: String(error).slice(0, 256) };
}

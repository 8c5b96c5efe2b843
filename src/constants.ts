// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Project-wide immutable limits.
 */

/** RFC 1035 label length limit. */
export const MAX_LABEL_LENGTH = 63 as const;

/** RFC 1035 presentation-form hostname limit, excluding a trailing dot. */
export const MAX_FQDN_LENGTH = 253 as const;

export const MIN_PORT = 0 as const;
export const MAX_PORT = 65_535 as const;

/** Default cap on parser input; typical URLs are well under 2 KB. */
export const DEFAULT_MAX_URL_INPUT_LENGTH = 10_000 as const;

/** Longest excerpt of caller input embedded in an error message. */
export const MAX_ERROR_EXCERPT_LENGTH = 64 as const;

/** Longest log message forwarded to the sink. */
export const MAX_LOG_MESSAGE_LENGTH = 1024 as const;

// SPDX-License-Identifier: MIT
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Factory-based logging API. Every call forwards to the active sink in
 * dev-logger and is dropped in production.
 * @module
 */

import { developmentLog, type LogLevel } from "./dev-logger";
import { environment } from "./environment";

export type { LogLevel } from "./dev-logger";

export type Logger = {
  readonly debug: (message: string, context?: unknown) => void;
  readonly info: (message: string, context?: unknown) => void;
  readonly warn: (message: string, context?: unknown) => void;
  readonly error: (message: string, context?: unknown) => void;
  readonly child: (sub: string) => Logger;
};

/**
 * Creates a logger instance for a specific component.
 * @param component The component name for logging.
 */
export function createLogger(component: string): Logger {
  const log = (level: LogLevel, message: string, context?: unknown) => {
    if (environment.isProduction) return;
    developmentLog(level, component, message, context);
  };
  return {
    debug: (message, context) => log("debug", message, context),

    info: (message, context) => log("info", message, context),

    warn: (message, context) => log("warn", message, context),

    error: (message, context) => log("error", message, context),

    child: (sub) => createLogger(`${component}:${sub}`),
  };
}

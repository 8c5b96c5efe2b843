// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Replaceable log sink. Defaults to the console; tests and host applications
 * install their own with setDevelopmentLogger().
 */

import { MAX_LOG_MESSAGE_LENGTH } from "./constants";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type DevelopmentLogger = (
  level: LogLevel,
  component: string,
  message: string,
  context?: unknown,
) => void;

const SAFE_COMPONENT_REGEX = /^[\w.:-]{1,64}$/;

// eslint-disable-next-line no-control-regex -- stripping control characters is the point
const CONTROL_CHARS_REGEX = /[\u0000-\u001F\u007F-\u009F]/g;

export function sanitizeComponentName(name: string): string {
  if (!SAFE_COMPONENT_REGEX.test(name)) return "unsafe-component-name";
  if (name.startsWith(".") || name.endsWith(".")) {
    return "unsafe-component-name";
  }
  return name;
}

export function sanitizeLogMessage(message: string): string {
  const stripped = message.replace(CONTROL_CHARS_REGEX, " ");
  return stripped.length > MAX_LOG_MESSAGE_LENGTH
    ? `${stripped.slice(0, MAX_LOG_MESSAGE_LENGTH)}...[TRUNC]`
    : stripped;
}

function serializeContext(context: unknown): string {
  if (context === undefined) return "";
  try {
    const json = JSON.stringify(context, (_k, v: unknown) =>
      typeof v === "string" && v.length > MAX_LOG_MESSAGE_LENGTH
        ? `${v.slice(0, MAX_LOG_MESSAGE_LENGTH)}...[TRUNC]`
        : v,
    );
    return typeof json === "string" ? json : "";
  } catch {
    return "[Unserializable]";
  }
}

export function formatLogLine(
  level: LogLevel,
  component: string,
  message: string,
  context?: unknown,
): string {
  const head = `[${level.toUpperCase()}] (${sanitizeComponentName(component)}) ${sanitizeLogMessage(message)}`;
  const contextString = serializeContext(context);
  return contextString ? `${head} | context=${contextString}` : head;
}

export const consoleLogger: DevelopmentLogger = (
  level,
  component,
  message,
  context,
) => {
  const line = formatLogLine(level, component, message, context);
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

// eslint-disable-next-line functional/no-let -- the sink is replaceable at runtime
let activeLogger: DevelopmentLogger = consoleLogger;

export function setDevelopmentLogger(logger: DevelopmentLogger): void {
  activeLogger = logger;
}

export function resetDevelopmentLogger(): void {
  activeLogger = consoleLogger;
}

export function developmentLog(
  level: LogLevel,
  component: string,
  message: string,
  context?: unknown,
): void {
  activeLogger(
    level,
    sanitizeComponentName(component),
    sanitizeLogMessage(message),
    context,
  );
}

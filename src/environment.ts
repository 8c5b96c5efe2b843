// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Provides utilities for detecting the application environment.
 * @module
 */

export type EnvironmentName = "development" | "production";

export const environment = (() => {
  const cache = new Map<string, boolean>();
  // Callers may override detection during initialization or tests.
  // eslint-disable-next-line functional/no-let -- runtime mutability required for setExplicitEnv
  let explicitEnvironment: EnvironmentName | undefined;

  return {
    setExplicitEnv(environment_: EnvironmentName): void {
      explicitEnvironment = environment_;
      // eslint-disable-next-line functional/immutable-data -- deliberate, limited cache mutation
      cache.clear();
    },
    get isDevelopment(): boolean {
      if (explicitEnvironment !== undefined)
        return explicitEnvironment === "development";
      const cached = cache.get("isDevelopment");
      if (cached !== undefined) return cached;

      // NODE_ENV is authoritative (case-insensitive); anything else is production.
      const nodeEnvironment =
        typeof process !== "undefined" ? process.env["NODE_ENV"] : undefined;
      const value =
        typeof nodeEnvironment === "string"
          ? nodeEnvironment.trim().toLowerCase()
          : "";
      const result = value === "development" || value === "test";
      // eslint-disable-next-line functional/immutable-data -- deliberate, limited cache mutation
      cache.set("isDevelopment", result);
      return result;
    },
    get isProduction(): boolean {
      if (explicitEnvironment !== undefined)
        return explicitEnvironment === "production";
      // Reference the exported object so the getter survives extraction.
      return !environment.isDevelopment;
    },
    clearCache(): void {
      explicitEnvironment = undefined;
      // eslint-disable-next-line functional/immutable-data -- intentional, limited cache mutation
      cache.clear();
    },
  };
})();

/**
 * Returns `true` if the current environment is determined to be 'development'.
 */
export function isDevelopment(): boolean {
  return environment.isDevelopment;
}

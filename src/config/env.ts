// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All exports are pure Config<A> values; they are only yielded at the
 * CLI boundary. Every variable lives under the WTCONFIG_ namespace.
 */

import { Config, ConfigProvider, type Option } from "effect";
import {
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
} from "./field-values";
import { resolve } from "./resolve";

export type { LogFormat, LogLevel } from "./field-values";

const NAMESPACE = "WTCONFIG";

/**
 * Environment configuration shape. Logging values are optional so the
 * CLI can tell "unset" apart from "set to the default".
 */
export interface EnvConfig {
  readonly logging: {
    readonly level: Option.Option<LogLevel>;
    readonly format: Option.Option<LogFormat>;
  };
  readonly template: Option.Option<string>;
  readonly debug: boolean;
}

// ============================================================================
// Primitive Configs
// ============================================================================

export const LogLevelConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.option(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL")),
  NAMESPACE
);

export const LogFormatConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.option(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT")),
  NAMESPACE
);

/** Path to an alternative config.zsh template. */
export const TemplatePathConfig: Config.Config<Option.Option<string>> = Config.nested(
  Config.option(Config.nonEmptyString("TEMPLATE")),
  NAMESPACE
);

/** When true, forces log level to debug. */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  NAMESPACE
);

// ============================================================================
// Composite Config
// ============================================================================

export const EnvConfigSpec: Config.Config<EnvConfig> = Config.all([
  LogLevelConfig,
  LogFormatConfig,
  TemplatePathConfig,
  DebugModeConfig,
]).pipe(
  Config.map(([level, format, template, debug]) => ({
    logging: { level, format },
    template,
    debug,
  }))
);

// ============================================================================
// Test Utilities
// ============================================================================

const envVarNames = {
  logLevel: `${NAMESPACE}_LOG_LEVEL`,
  logFormat: `${NAMESPACE}_LOG_FORMAT`,
  template: `${NAMESPACE}_TEMPLATE`,
  debug: `${NAMESPACE}_DEBUG`,
} as const;

export interface TestConfigOverrides {
  readonly logLevel?: string;
  readonly logFormat?: string;
  readonly template?: string;
  readonly debug?: string;
}

/**
 * Create a ConfigProvider for testing. Keys left out of `overrides` are
 * absent, exactly as an unset environment variable would be.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ logLevel: "debug" });
 * const result = await Effect.runPromise(
 *   Effect.withConfigProvider(EnvConfigSpec, provider)
 * );
 * ```
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const pairs: readonly (readonly [string, string | undefined])[] = [
    [envVarNames.logLevel, overrides.logLevel],
    [envVarNames.logFormat, overrides.logFormat],
    [envVarNames.template, overrides.template],
    [envVarNames.debug, overrides.debug],
  ];
  const map = new Map<string, string>();
  for (const [name, value] of pairs) {
    if (value !== undefined) {
      map.set(name, value);
    }
  }
  return ConfigProvider.fromMap(map, { pathDelim: "_" });
};

// ============================================================================
// Config Resolution
// ============================================================================

/**
 * Effective log level. `--verbose` or WTCONFIG_DEBUG force debug;
 * otherwise CLI > env > default.
 */
export const resolveLogLevel = (
  cliVerbose: boolean,
  cliLogLevel: Option.Option<LogLevel>,
  envConfig: EnvConfig
): LogLevel =>
  cliVerbose || envConfig.debug
    ? "debug"
    : resolve({ cli: cliLogLevel, env: envConfig.logging.level, fallback: LOG_LEVEL_DEFAULT });

/** Effective log format: CLI > env > default. */
export const resolveLogFormat = (
  cliFormat: Option.Option<LogFormat>,
  envConfig: EnvConfig
): LogFormat =>
  resolve({ cli: cliFormat, env: envConfig.logging.format, fallback: LOG_FORMAT_DEFAULT });

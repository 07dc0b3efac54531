// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { type ConfigError, Effect, Exit, Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  type EnvConfig,
  EnvConfigSpec,
  type TestConfigOverrides,
  createTestConfigProvider,
  resolveLogFormat,
  resolveLogLevel,
} from "../../src/config/env";

const load = (
  overrides: TestConfigOverrides
): Effect.Effect<EnvConfig, ConfigError.ConfigError> =>
  Effect.withConfigProvider(EnvConfigSpec, createTestConfigProvider(overrides));

const env = (partial: Partial<EnvConfig> = {}): EnvConfig => ({
  logging: { level: Option.none(), format: Option.none() },
  template: Option.none(),
  debug: false,
  ...partial,
});

describe("EnvConfigSpec", () => {
  test("unset variables resolve to none and debug off", async () => {
    expect(await Effect.runPromise(load({}))).toEqual(env());
  });

  test("reads every WTCONFIG_ variable", async () => {
    const config = await Effect.runPromise(
      load({
        logLevel: "warn",
        logFormat: "json",
        template: "/opt/wt/config.zsh.example",
        debug: "true",
      })
    );
    expect(config).toEqual(
      env({
        logging: { level: Option.some("warn"), format: Option.some("json") },
        template: Option.some("/opt/wt/config.zsh.example"),
        debug: true,
      })
    );
  });

  test("rejects an unknown log level", async () => {
    const exit = await Effect.runPromiseExit(load({ logLevel: "loud" }));
    expect(Exit.isFailure(exit)).toBe(true);
  });
});

describe("resolveLogLevel", () => {
  test("--verbose forces debug", () => {
    expect(resolveLogLevel(true, Option.some("error"), env())).toBe("debug");
  });

  test("WTCONFIG_DEBUG forces debug", () => {
    expect(resolveLogLevel(false, Option.none(), env({ debug: true }))).toBe("debug");
  });

  test("CLI beats environment beats default", () => {
    const fromEnv = env({ logging: { level: Option.some("warn"), format: Option.none() } });
    expect(resolveLogLevel(false, Option.some("error"), fromEnv)).toBe("error");
    expect(resolveLogLevel(false, Option.none(), fromEnv)).toBe("warn");
    expect(resolveLogLevel(false, Option.none(), env())).toBe("info");
  });
});

describe("resolveLogFormat", () => {
  test("CLI beats environment beats default", () => {
    const fromEnv = env({ logging: { level: Option.none(), format: Option.some("json") } });
    expect(resolveLogFormat(Option.some("pretty"), fromEnv)).toBe("pretty");
    expect(resolveLogFormat(Option.none(), fromEnv)).toBe("json");
    expect(resolveLogFormat(Option.none(), env())).toBe("pretty");
  });
});

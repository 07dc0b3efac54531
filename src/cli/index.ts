// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes context resolution,
 * logger installation and error display to avoid duplication across commands.
 */

import { type CliApp, Command } from "@effect/cli";
import type { FileSystem } from "@effect/platform";
import { Effect, Match, Option, pipe } from "effect";
import { EnvConfigSpec, resolveLogFormat, resolveLogLevel } from "../config/env";
import {
  LOG_FORMAT_DEFAULT,
  LOG_LEVEL_DEFAULT,
  type LogFormat,
  type LogLevel,
} from "../config/field-values";
import { resolveTemplatePath } from "../config/loader";
import { WtconfigLoggerLive } from "../lib/effect-logger";
import {
  ErrorCode,
  GeneralError,
  type WtconfigError,
  getErrorCodeName,
  isWtconfigError,
} from "../lib/errors";
import { logFail, withCommand } from "../lib/log";
import type { AbsolutePath } from "../lib/types";
import { VERSION } from "../lib/version";

import { executeMigrate } from "./commands/migrate";
import { executeNormalize } from "./commands/normalize";
import { executeValidate } from "./commands/validate";

import {
  type GlobalOptions,
  configArg,
  effectiveFormat,
  fixFlag,
  globalOptions,
  hoistOptions,
} from "./options";

/** Resolved runtime context for commands. CLI args > env vars > defaults. */
interface CommandContext {
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
  readonly templatePath: AbsolutePath;
}

// Context resolution

const resolveContext = (globals: GlobalOptions): Effect.Effect<CommandContext, WtconfigError> =>
  Effect.gen(function* () {
    const env = yield* pipe(
      EnvConfigSpec,
      Effect.mapError(
        (err) =>
          new GeneralError({
            code: ErrorCode.GENERAL_ERROR,
            message: `Invalid environment: ${String(err)}`,
          })
      )
    );
    const templatePath = yield* resolveTemplatePath(env);
    return {
      logLevel: resolveLogLevel(globals.verbose, globals.logLevel, env),
      logFormat: resolveLogFormat(effectiveFormat(globals), env),
      templatePath,
    };
  });

// Error display

/**
 * JSON mode prints a machine-readable payload on stdout; pretty mode logs a
 * failure line, which the logger sends to stderr.
 */
const displayError = (err: WtconfigError, format: LogFormat): Effect.Effect<void> =>
  pipe(
    Match.value(format),
    Match.when("json", () =>
      Effect.sync(() => {
        const payload = { error: err.message, code: err.code, name: getErrorCodeName(err.code) };
        process.stdout.write(`${JSON.stringify(payload)}\n`);
      })
    ),
    Match.when("pretty", () => logFail(err.message)),
    Match.exhaustive
  );

/** Displayed by runCommand; anything else reaching the exit path is unexpected. */
export const isDisplayedError: (err: unknown) => err is WtconfigError = isWtconfigError;

// Command runner

/** Centralizes context and error handling so each command stays focused on its logic. */
const runCommand = (
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, WtconfigError, FileSystem.FileSystem>
): Effect.Effect<void, WtconfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const ctx = yield* pipe(
      resolveContext(globals),
      Effect.tapError((err) => {
        // No context yet, so the logger is built from the flags alone.
        const format = pipe(
          effectiveFormat(globals),
          Option.getOrElse((): LogFormat => LOG_FORMAT_DEFAULT)
        );
        return displayError(err, format).pipe(
          Effect.provide(WtconfigLoggerLive({ level: LOG_LEVEL_DEFAULT, format }))
        );
      })
    );
    yield* pipe(
      handler(ctx),
      withCommand(commandName),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => displayError(err, ctx.logFormat)),
      Effect.provide(
        WtconfigLoggerLive({
          level: ctx.logLevel,
          format: ctx.logFormat,
        })
      )
    );
  });

// Subcommand definitions

const normalizeCmd = Command.make(
  "normalize",
  { ...globalOptions, config: configArg },
  (args) =>
    runCommand(args, "normalize", (ctx) =>
      executeNormalize({
        configPath: args.config,
        templatePath: ctx.templatePath,
        dryRun: args.dryRun,
      })
    )
).pipe(Command.withDescription("Rewrite a config into the template layout, keeping its values"));

const validateCmd = Command.make(
  "validate",
  { ...globalOptions, config: configArg, fix: fixFlag },
  (args) =>
    runCommand(args, "validate", () =>
      executeValidate({
        configPath: args.config,
        fix: args.fix,
        dryRun: args.dryRun,
      })
    )
).pipe(Command.withDescription("Check a config for structural issues"));

const migrateCmd = Command.make("migrate", { ...globalOptions, config: configArg }, (args) =>
  runCommand(args, "migrate", () =>
    executeMigrate({
      configPath: args.config,
      dryRun: args.dryRun,
    })
  )
).pipe(Command.withDescription("Convert a legacy config to shorthand keys"));

// Root command

const wtconfig = Command.make("wtconfig").pipe(
  Command.withDescription("Keep worktree-tools config.zsh files in shape"),
  Command.withSubcommands([normalizeCmd, validateCmd, migrateCmd])
);

const runWtconfig: (
  args: readonly string[]
) => Effect.Effect<void, unknown, CliApp.CliApp.Environment> = Command.run(wtconfig, {
  name: "wtconfig",
  version: VERSION,
});

/** Runs the CLI on a full argv (`node`, script, then the user's arguments). */
export const cli = (
  args: readonly string[]
): Effect.Effect<void, unknown, CliApp.CliApp.Environment> => runWtconfig(hoistOptions(args));

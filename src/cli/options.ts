// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions, shared so every subcommand spells
 * and describes them the same way.
 */

import { Args as A, Options as O } from "@effect/cli";
import { Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values";

// Shared positional arguments

export const configArg: A.Args<string> = A.text({ name: "config" }).pipe(
  A.withDescription("Path to config.zsh")
);

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: O.Options<boolean>;
  readonly dryRun: O.Options<boolean>;
  readonly logLevel: O.Options<Option.Option<LogLevel>>;
  readonly format: O.Options<Option.Option<LogFormat>>;
  readonly json: O.Options<boolean>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  dryRun: O.boolean("dry-run").pipe(
    O.withDescription("Print the resulting config instead of writing it")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Log output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
};

// Per-command options

export const fixFlag: O.Options<boolean> = O.boolean("fix").pipe(
  O.withDescription("Apply fixes (a backup is written first)")
);

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly dryRun: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
}

/** Resolves format: --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format),
    Match.exhaustive
  );

// Argument order

/** Options that consume the following token as their value. */
const VALUED_OPTIONS: ReadonlySet<string> = new Set(["--log-level", "--format"]);

/**
 * Moves a subcommand's options ahead of its positionals, so that
 * `validate <config> --fix` parses like `validate --fix <config>`.
 * Everything after a `--` token stays where it is.
 */
export const hoistOptions = (argv: readonly string[]): readonly string[] => {
  const [node, script, command, ...rest] = argv;
  if (
    node === undefined ||
    script === undefined ||
    command === undefined ||
    command.startsWith("-")
  ) {
    return argv;
  }

  const options: string[] = [];
  const positionals: string[] = [];
  let awaitingValue = false;
  let literal = false;

  for (const token of rest) {
    if (literal) {
      positionals.push(token);
    } else if (awaitingValue) {
      options.push(token);
      awaitingValue = false;
    } else if (token === "--") {
      literal = true;
      positionals.push(token);
    } else if (token.startsWith("-") && token !== "-") {
      options.push(token);
      awaitingValue = VALUED_OPTIONS.has(token);
    } else {
      positionals.push(token);
    }
  }

  return [node, script, command, ...options, ...positionals];
};

#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * wtconfig - config.zsh maintenance for worktree-tools
 *
 * The "imperative shell": the only place where the Effect runtime is executed.
 */

import { NodeContext } from "@effect/platform-node";
import { ValidationError } from "@effect/cli";
import { Cause, Effect, Exit, Option } from "effect";
import { cli, isDisplayedError } from "./cli/index";

/** Every failure, typed or not, exits 1; typed codes only appear in logs. */
export const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (): number => 1,
  });

/**
 * Our errors were already displayed by runCommand and usage errors by
 * @effect/cli itself, so only defects and foreign failures print here.
 */
const logExitError = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => console.error("Unexpected error:", Cause.pretty(cause)),
        onSome: (err): void => {
          if (!isDisplayedError(err) && !ValidationError.isValidationError(err)) {
            console.error("Unexpected error:", Cause.pretty(cause));
          }
        },
      }),
  });

export const program = (argv: readonly string[]): Effect.Effect<void, unknown> =>
  cli(argv).pipe(Effect.provide(NodeContext.layer));

async function main(): Promise<void> {
  const exit = await Effect.runPromiseExit(program(process.argv));
  logExitError(exit);
  process.exitCode = exitCodeFromExit(exit);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error("Unexpected error:", err);
    process.exitCode = 1;
  });
}

// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Everything a command prints goes through the Effect logger. A style
 * annotation tells effect-logger.ts how to render the record; `list` and
 * `document` records are the command's actual output and are rendered in
 * both formats, whatever the log level.
 */

import { Data, Effect, Match, SynchronizedRef, pipe } from "effect";

type LogStyle = Data.TaggedEnum<{
  step: { readonly current: number; readonly total: number };
  success: object;
  fail: object;
  list: { readonly items: readonly string[] };
  document: { readonly text: string };
}>;

const { step, success, fail, list, document } = Data.taggedEnum<LogStyle>();

const annotationsFor = (style: LogStyle): Record<string, unknown> =>
  pipe(
    Match.value(style),
    Match.tag("step", ({ current, total }) => ({
      logStyle: "step",
      stepNumber: String(current),
      stepTotal: String(total),
    })),
    Match.tag("success", () => ({ logStyle: "success" })),
    Match.tag("fail", () => ({ logStyle: "fail" })),
    Match.tag("list", ({ items }) => ({ logStyle: "list", items })),
    Match.tag("document", ({ text }) => ({ logStyle: "document", document: text })),
    Match.exhaustive
  );

const logStyled = (
  style: LogStyle,
  message: string,
  log: (message: string) => Effect.Effect<void> = Effect.log
): Effect.Effect<void> => log(message).pipe(Effect.annotateLogs(annotationsFor(style)));

// ============================================================================
// Public Logging Functions
// ============================================================================

export const logStep = (current: number, total: number, message: string): Effect.Effect<void> =>
  logStyled(step({ current, total }), message);

export const logSuccess = (message: string): Effect.Effect<void> => logStyled(success(), message);

/** Logged at error level, so it reaches stderr and survives `--log-level error`. */
export const logFail = (message: string): Effect.Effect<void> =>
  logStyled(fail(), message, Effect.logError);

/** Heading plus one line per item; nothing for an empty list. */
export const logList = (heading: string, items: readonly string[]): Effect.Effect<void> =>
  items.length === 0 ? Effect.void : logStyled(list({ items }), heading);

/** A whole document, printed byte for byte in pretty mode. */
export const logDocument = (message: string, text: string): Effect.Effect<void> =>
  logStyled(document({ text }), message);

/** Tags every log line of `effect` with the running subcommand. */
export const withCommand =
  (command: string) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.annotateLogs(effect, "command", command);

// ============================================================================
// StepCounter
// ============================================================================

/** Numbered progress for the back up / write sequence of a command. */
export interface StepCounter {
  readonly next: (message: string) => Effect.Effect<void>;
}

export const createStepCounter = (total: number): Effect.Effect<StepCounter> =>
  Effect.map(SynchronizedRef.make(0), (ref) => ({
    next: (message: string): Effect.Effect<void> =>
      SynchronizedRef.updateEffect(ref, (n) => Effect.as(logStep(n + 1, total, message), n + 1)),
  }));

// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The CLI's logger. Pretty mode renders the styles from log.ts (step
 * counters, check marks, bullet lists, raw documents) and plain
 * `LEVEL [command] message` lines for everything else. JSON mode writes one
 * record per line, with list items and documents as fields.
 */

import { Array as Arr, Cause, HashMap, Layer, LogLevel, Logger, Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel as WtconfigLogLevel } from "../config/field-values";

type Annotations = HashMap.HashMap<string, unknown>;

const LOG_STYLES = ["step", "success", "fail", "list", "document"] as const;
type LogStyleTag = (typeof LOG_STYLES)[number];

/** Command output rather than diagnostics; never filtered by level. */
const OUTPUT_STYLES: ReadonlySet<LogStyleTag> = new Set(["list", "document"]);

/** Read by the pretty renderer only. */
const RENDER_KEYS: ReadonlySet<string> = new Set([
  "logStyle",
  "stepNumber",
  "stepTotal",
  "command",
]);

export const toEffectLogLevel = (level: WtconfigLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

// ============================================================================
// Annotations
// ============================================================================

const stringAt = (annotations: Annotations, key: string): Option.Option<string> =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((v): v is string => typeof v === "string")
  );

const stringsAt = (annotations: Annotations, key: string): readonly string[] =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter(
      (v): v is readonly string[] => Array.isArray(v) && v.every((item) => typeof item === "string")
    ),
    Option.getOrElse((): readonly string[] => [])
  );

const styleOf = (annotations: Annotations): Option.Option<LogStyleTag> =>
  pipe(
    stringAt(annotations, "logStyle"),
    Option.flatMap((tag) => Arr.findFirst(LOG_STYLES, (style) => style === tag))
  );

// ============================================================================
// Pretty
// ============================================================================

const SGR = { bold: 1, red: 31, green: 32, yellow: 33, blue: 34, cyan: 36, gray: 90 } as const;
type SgrName = keyof typeof SGR;
type Paint = (sgr: SgrName, text: string) => string;

const painter =
  (useColor: boolean): Paint =>
  (sgr, text) =>
    useColor ? `\x1b[${SGR[sgr]}m${text}\x1b[0m` : text;

const LEVEL_SGR: Readonly<Record<string, SgrName>> = {
  DEBUG: "gray",
  INFO: "blue",
  WARN: "yellow",
  ERROR: "red",
  FATAL: "red",
};

const line = (text: string): string => `${text}\n`;

const renderStyled = (
  style: LogStyleTag,
  message: string,
  annotations: Annotations,
  paint: Paint
): string =>
  pipe(
    Match.value(style),
    Match.when("step", () => {
      const n = Option.getOrElse(stringAt(annotations, "stepNumber"), () => "?");
      const of = Option.getOrElse(stringAt(annotations, "stepTotal"), () => "?");
      return line(`${paint("bold", `[${n}/${of}]`)} ${paint("cyan", "→")} ${message}`);
    }),
    Match.when("success", () => line(`${paint("green", "✓")} ${message}`)),
    Match.when("fail", () => line(`${paint("red", "✗")} ${message}`)),
    Match.when("list", () =>
      [message, ...stringsAt(annotations, "items").map((item) => `  • ${item}`)]
        .map(line)
        .join("")
    ),
    Match.when("document", () => Option.getOrElse(stringAt(annotations, "document"), () => "")),
    Match.exhaustive
  );

const renderPlain = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: Annotations,
  cause: Cause.Cause<unknown>,
  paint: Paint
): string => {
  const label = logLevel.label.padEnd(5);
  const level = pipe(
    Option.fromNullable(LEVEL_SGR[logLevel.label]),
    Option.match({ onNone: () => label, onSome: (sgr) => paint(sgr, label) })
  );
  const command = pipe(
    stringAt(annotations, "command"),
    Option.match({ onNone: () => "", onSome: (name) => `${paint("cyan", `[${name}]`)} ` })
  );
  const trace = Cause.isEmpty(cause) ? "" : `\n${Cause.pretty(cause)}`;
  return line(`${level} ${command}${message}${trace}`);
};

// ============================================================================
// JSON
// ============================================================================

const renderJson = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: Annotations,
  date: Date
): string =>
  line(
    JSON.stringify({
      timestamp: date.toISOString(),
      level: logLevel.label.toLowerCase(),
      ...Option.match(stringAt(annotations, "command"), {
        onNone: (): Record<string, never> => ({}),
        onSome: (command): { readonly command: string } => ({ command }),
      }),
      message,
      ...Object.fromEntries(
        Array.from(HashMap.toEntries(annotations)).filter(([key]) => !RENDER_KEYS.has(key))
      ),
    })
  );

// ============================================================================
// Logger
// ============================================================================

const toStderr = (logLevel: LogLevel.LogLevel, style: Option.Option<LogStyleTag>): boolean =>
  Option.match(style, {
    onNone: () => LogLevel.greaterThanEqual(logLevel, LogLevel.Error),
    onSome: (tag) => tag === "fail",
  });

const WtconfigLogger = (
  format: LogFormat,
  minimum: LogLevel.LogLevel,
  useColor: boolean
): Logger.Logger<unknown, void> => {
  const paint = painter(useColor);
  return Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const style = styleOf(annotations);
    const isOutput = Option.exists(style, (tag) => OUTPUT_STYLES.has(tag));
    if (!isOutput && LogLevel.lessThan(logLevel, minimum)) {
      return;
    }

    const msg = String(message);
    const rendered = pipe(
      Match.value(format),
      Match.when("json", () => renderJson(logLevel, msg, annotations, date)),
      Match.when("pretty", () =>
        Option.match(style, {
          onNone: () => renderPlain(logLevel, msg, annotations, cause, paint),
          onSome: (tag) => renderStyled(tag, msg, annotations, paint),
        })
      ),
      Match.exhaustive
    );

    (toStderr(logLevel, style) ? process.stderr : process.stdout).write(rendered);
  });
};

/**
 * NO_COLOR disables colour, FORCE_COLOR enables it, otherwise stdout must
 * be a terminal.
 */
export const detectColor = (
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): boolean => {
  const noColor = env["NO_COLOR"];
  const forceColor = env["FORCE_COLOR"];
  if (noColor !== undefined && noColor !== "") {
    return false;
  }
  if (forceColor !== undefined && forceColor !== "0") {
    return true;
  }
  return isTTY;
};

/**
 * The level threshold lives in the logger itself, so that output records
 * get through at any level; the fiber-wide minimum is opened up to match.
 */
export const WtconfigLoggerLive = (options: {
  readonly level: WtconfigLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
}): Layer.Layer<never> => {
  const logger = WtconfigLogger(
    options.format,
    toEffectLogLevel(options.level),
    options.color ?? detectColor()
  );
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, logger),
    Logger.minimumLogLevel(LogLevel.All)
  );
};

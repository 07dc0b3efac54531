// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { LogFormat, LogLevel } from "../../src/config/field-values";
import { WtconfigLoggerLive, detectColor } from "../../src/lib/effect-logger";
import {
  createStepCounter,
  logDocument,
  logFail,
  logList,
  logStep,
  logSuccess,
  withCommand,
} from "../../src/lib/log";

describe("detectColor", () => {
  test("NO_COLOR wins over everything", () => {
    expect(detectColor({ NO_COLOR: "1", FORCE_COLOR: "1" }, true)).toBe(false);
  });

  test("FORCE_COLOR enables color without a terminal", () => {
    expect(detectColor({ FORCE_COLOR: "1" }, false)).toBe(true);
    expect(detectColor({ FORCE_COLOR: "0" }, false)).toBe(false);
  });

  test("falls back to the terminal check", () => {
    expect(detectColor({}, true)).toBe(true);
    expect(detectColor({ NO_COLOR: "" }, false)).toBe(false);
  });
});

describe("WtconfigLoggerLive", () => {
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: unknown) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, "write").mockImplementation((chunk: unknown) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const run = (
    effect: Effect.Effect<void>,
    level: LogLevel = "info",
    format: LogFormat = "pretty"
  ): void =>
    Effect.runSync(
      effect.pipe(Effect.provide(WtconfigLoggerLive({ level, format, color: false })))
    );

  test("pretty lines carry level and command", () => {
    run(Effect.logInfo("Validating config").pipe(withCommand("validate")));
    expect(stdout).toEqual(["INFO  [validate] Validating config\n"]);
  });

  test("styled messages", () => {
    run(
      Effect.all([logStep(1, 2, "Creating backup"), logSuccess("Config fixed"), logFail("nope")], {
        discard: true,
      })
    );
    expect(stdout).toEqual(["[1/2] → Creating backup\n", "✓ Config fixed\n"]);
    expect(stderr).toEqual(["✗ nope\n"]);
  });

  test("messages below the minimum level are dropped", () => {
    run(Effect.logDebug("hidden"), "info");
    run(Effect.logWarning("shown"), "warn");
    expect(stdout).toEqual(["WARN  shown\n"]);
  });

  test("json format keeps the command and drops style annotations", () => {
    run(logSuccess("done").pipe(withCommand("normalize")), "info", "json");
    expect(stdout).toHaveLength(1);
    const record: unknown = JSON.parse(stdout[0] ?? "");
    expect(record).toMatchObject({ level: "info", command: "normalize", message: "done" });
    expect(record).not.toHaveProperty("logStyle");
  });

  test("failures reach stderr even at the error level", () => {
    run(Effect.all([logSuccess("hidden"), logFail("nope")], { discard: true }), "error");
    expect(stdout).toEqual([]);
    expect(stderr).toEqual(["✗ nope\n"]);
  });

  test("step counter numbers each step", () => {
    run(
      Effect.gen(function* () {
        const steps = yield* createStepCounter(2);
        yield* steps.next("Creating backup");
        yield* steps.next("Writing config");
      })
    );
    expect(stdout).toEqual(["[1/2] → Creating backup\n", "[2/2] → Writing config\n"]);
  });

  test("lists render as bullets, and an empty list prints nothing", () => {
    run(logList("Issues found:", ["Missing REPO_CONFIGS declaration"]));
    run(logList("Nothing:", []));
    expect(stdout).toEqual(["Issues found:\n  • Missing REPO_CONFIGS declaration\n"]);
  });

  test("lists and documents ignore the level threshold", () => {
    run(
      Effect.all([logList("Issues found:", ["one"]), logDocument("Dry run", "A=1\n")], {
        discard: true,
      }),
      "error"
    );
    expect(stdout).toEqual(["Issues found:\n  • one\n", "A=1\n"]);
  });

  test("a document is printed exactly as given", () => {
    run(logDocument("Dry run", "A=1\nB=2\n"));
    expect(stdout).toEqual(["A=1\nB=2\n"]);
  });

  test("json format carries list items and documents as fields", () => {
    run(
      Effect.all(
        [logList("Issues found:", ["one", "two"]), logDocument("Dry run", "A=1\n")],
        { discard: true }
      ).pipe(withCommand("validate")),
      "info",
      "json"
    );
    expect(stdout).toHaveLength(2);
    expect(JSON.parse(stdout[0] ?? "")).toMatchObject({
      level: "info",
      command: "validate",
      message: "Issues found:",
      items: ["one", "two"],
    });
    expect(JSON.parse(stdout[1] ?? "")).toMatchObject({ message: "Dry run", document: "A=1\n" });
  });
});

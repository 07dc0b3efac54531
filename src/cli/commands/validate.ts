// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Structural check of a config. Without --fix the issues are listed and
 * the command fails, which makes it usable as a pre-commit check; with
 * --fix the repaired document replaces the original after a backup.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { loadDocument } from "../../config/loader";
import { validateAndFix } from "../../document/validate";
import { type BackupError, ConfigError, ErrorCode, type SystemError } from "../../lib/errors";
import { logList, logSuccess } from "../../lib/log";
import { toAbsolutePathEffect } from "../../lib/paths";
import { commitDocument } from "./utils";

export interface ValidateOptions {
  readonly configPath: string;
  readonly fix: boolean;
  readonly dryRun: boolean;
}

export const executeValidate = (
  options: ValidateOptions
): Effect.Effect<void, ConfigError | SystemError | BackupError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const target = yield* toAbsolutePathEffect(options.configPath);
    yield* Effect.logInfo(`Validating config: ${target}`);

    const original = yield* loadDocument(target);
    const result = validateAndFix(original);

    if (!result.hadIssues) {
      yield* logSuccess("No issues found! Config is valid.");
      return;
    }

    yield* logList("Issues found:", result.issues);

    if (!options.fix) {
      yield* Effect.logInfo("Run with --fix to automatically fix these issues");
      return yield* Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_FAILED,
          message: `${result.issues.length} issue(s) found in ${target}`,
          path: target,
        })
      );
    }

    const commit = yield* commitDocument({
      target,
      original,
      updated: result.document,
      kind: "validated",
      dryRun: options.dryRun,
    });

    if (commit._tag === "Written") {
      yield* logList("Fixes applied:", result.fixes);
      yield* logSuccess("Config fixed");
    }
  });

// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Rewrite a user's config into the template's layout. Both documents are
 * read before anything is written, so a missing template never leaves a
 * stray backup behind.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { describeAliasConflict, extractAliases, findAliasConflicts } from "../../document/extract";
import { merge } from "../../document/merge";
import { loadDocument, loadTemplate } from "../../config/loader";
import type { BackupError, ConfigError, SystemError } from "../../lib/errors";
import { logSuccess } from "../../lib/log";
import { toAbsolutePathEffect } from "../../lib/paths";
import type { AbsolutePath } from "../../lib/types";
import { commitDocument } from "./utils";

export interface NormalizeOptions {
  readonly configPath: string;
  readonly templatePath: AbsolutePath;
  readonly dryRun: boolean;
}

export const executeNormalize = (
  options: NormalizeOptions
): Effect.Effect<void, ConfigError | SystemError | BackupError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const target = yield* toAbsolutePathEffect(options.configPath);
    yield* Effect.logInfo(`Normalizing config: ${target}`);
    yield* Effect.logDebug(`Template: ${options.templatePath}`);

    const user = yield* loadDocument(target);
    const template = yield* loadTemplate(options.templatePath);

    yield* Effect.forEach(findAliasConflicts(extractAliases(user)), (conflict) =>
      Effect.logWarning(describeAliasConflict(conflict))
    );

    const result = yield* commitDocument({
      target,
      original: user,
      updated: merge(user, template),
      kind: "normalized",
      dryRun: options.dryRun,
    });

    if (result._tag === "Written") {
      yield* logSuccess("Config normalized");
      yield* Effect.logInfo(`Backup available at: ${result.backupPath}`);
    }
  });

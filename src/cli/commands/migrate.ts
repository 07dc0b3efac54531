// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Bring a legacy config up to the current version. Already-migrated
 * files are reported and left untouched, without a backup.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Match, pipe } from "effect";
import { loadDocument } from "../../config/loader";
import { migrateToShorthand } from "../../document/migrate";
import type { BackupError, ConfigError, SystemError } from "../../lib/errors";
import { logList, logSuccess } from "../../lib/log";
import { toAbsolutePathEffect } from "../../lib/paths";
import type { AbsolutePath } from "../../lib/types";
import { commitDocument } from "./utils";

export interface MigrateOptions {
  readonly configPath: string;
  readonly dryRun: boolean;
}

type MigrateError = ConfigError | SystemError | BackupError;

const applyMigration = (
  target: AbsolutePath,
  original: string,
  migrated: {
    readonly document: string;
    readonly renamed: readonly string[];
    readonly fixes: readonly string[];
    readonly versionAdded: boolean;
  },
  dryRun: boolean
): Effect.Effect<void, MigrateError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* Effect.forEach(migrated.renamed, (rename) => Effect.logInfo(`Renamed ${rename}`));
    yield* Effect.forEach(migrated.fixes, (fix) => Effect.logInfo(fix));
    if (migrated.versionAdded) {
      yield* Effect.logInfo("Added CONFIG_VERSION=1");
    }

    const commit = yield* commitDocument({
      target,
      original,
      updated: migrated.document,
      kind: "migrated",
      dryRun,
    });

    if (commit._tag === "Written") {
      yield* logList("Changes:", [...migrated.renamed, ...migrated.fixes]);
      yield* logSuccess("Migration complete! Config now at version 1");
    }
  });

export const executeMigrate = (
  options: MigrateOptions
): Effect.Effect<void, MigrateError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const target = yield* toAbsolutePathEffect(options.configPath);
    yield* Effect.logInfo(`Migrating config: ${target}`);

    const original = yield* loadDocument(target);

    yield* pipe(
      Match.value(migrateToShorthand(original)),
      Match.tag("Skipped", ({ version }) =>
        logSuccess(`Already at version ${version}, skipping`)
      ),
      Match.tag("Migrated", (migrated) =>
        applyMigration(target, original, migrated, options.dryRun)
      ),
      Match.exhaustive
    );
  });

// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Shared tail of every rewriting command: back up the current text, then
 * replace the file. With --dry-run the new document is printed instead
 * and the filesystem is left alone.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { type BackupKind, writeBackup } from "../../lib/backup-utils";
import type { BackupError, SystemError } from "../../lib/errors";
import { createStepCounter, logDocument, logSuccess } from "../../lib/log";
import type { AbsolutePath } from "../../lib/types";
import { writeFile } from "../../system/fs";

export interface CommitOptions {
  readonly target: AbsolutePath;
  readonly original: string;
  readonly updated: string;
  readonly kind: BackupKind;
  readonly dryRun: boolean;
}

/** Result of a commit: the backup path, or none for a dry run. */
export type CommitResult =
  | { readonly _tag: "Written"; readonly backupPath: AbsolutePath }
  | { readonly _tag: "DryRun" };

export const commitDocument = (
  options: CommitOptions
): Effect.Effect<CommitResult, BackupError | SystemError, FileSystem.FileSystem> =>
  Effect.if(options.dryRun, {
    onTrue: (): Effect.Effect<CommitResult> =>
      Effect.gen(function* () {
        yield* logDocument(`Dry run: ${options.target} left unchanged`, options.updated);
        return { _tag: "DryRun" } as const;
      }),
    onFalse: (): Effect.Effect<CommitResult, BackupError | SystemError, FileSystem.FileSystem> =>
      Effect.gen(function* () {
        const steps = yield* createStepCounter(2);

        yield* steps.next("Creating backup");
        const backupPath = yield* writeBackup(options.target, options.original, options.kind);
        yield* logSuccess(`Backup created: ${backupPath}`);

        yield* steps.next(`Writing ${options.target}`);
        yield* writeFile(options.target, options.updated);

        return { _tag: "Written", backupPath } as const;
      }),
  });

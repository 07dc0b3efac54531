// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Backup infrastructure shared by every command that rewrites a config.
 * A backup is written beside the target before the target is replaced,
 * so an interrupted run leaves either the original or the full result.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { writeFile } from "../system/fs";
import { BackupError, ErrorCode } from "./errors";
import { fileName, siblingPath } from "./paths";
import type { AbsolutePath } from "./types";

export const BACKUP_KINDS = ["normalized", "validated", "migrated"] as const;
export type BackupKind = (typeof BACKUP_KINDS)[number];

const pad2 = (n: number): string => String(n).padStart(2, "0");

/**
 * Create a backup-safe timestamp string in local time.
 * Format: YYYYMMDD_HHMMSS
 */
export const createBackupTimestamp = (date: Date = new Date()): string =>
  `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
  `_${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;

/** `<dir>/<name>.<kind>.backup.<YYYYMMDD_HHMMSS>` */
export const backupPathFor = (
  target: AbsolutePath,
  kind: BackupKind,
  date: Date = new Date()
): AbsolutePath =>
  siblingPath(target, `${fileName(target)}.${kind}.backup.${createBackupTimestamp(date)}`);

/**
 * Write `content` (the target's current text) to a fresh backup path.
 * Returns the backup path on success.
 */
export const writeBackup = (
  target: AbsolutePath,
  content: string,
  kind: BackupKind,
  date: Date = new Date()
): Effect.Effect<AbsolutePath, BackupError, FileSystem.FileSystem> => {
  const backupPath = backupPathFor(target, kind, date);
  return writeFile(backupPath, content).pipe(
    Effect.mapError(
      (err) =>
        new BackupError({
          code: ErrorCode.BACKUP_FAILED,
          message: `Failed to create backup: ${err.message}`,
          path: backupPath,
          cause: err,
        })
    ),
    Effect.as(backupPath)
  );
};

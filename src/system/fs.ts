// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filesystem operations over @effect/platform's FileSystem service.
 * Platform errors are mapped into SystemError so callers see one error
 * hierarchy; the Node implementation is provided at the CLI boundary.
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { ErrorCode, SystemError, causeProps, errorMessage } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";

/**
 * Read file contents as text.
 */
export const readFile = (
  path: AbsolutePath
): Effect.Effect<string, SystemError, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.readFileString(path).pipe(
      Effect.mapError(
        (e): SystemError =>
          new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to read file: ${path}: ${errorMessage(e)}`,
            ...causeProps(e),
          })
      )
    )
  );

/**
 * Write content to a file, replacing it in full.
 */
export const writeFile = (
  path: AbsolutePath,
  content: string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.writeFileString(path, content).pipe(
      Effect.mapError(
        (e): SystemError =>
          new SystemError({
            code: ErrorCode.FILE_WRITE_FAILED,
            message: `Failed to write file: ${path}: ${errorMessage(e)}`,
            ...causeProps(e),
          })
      )
    )
  );

/**
 * Check if a file exists.
 */
export const fileExists = (
  path: AbsolutePath
): Effect.Effect<boolean, SystemError, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.exists(path).pipe(
      Effect.mapError(
        (e): SystemError =>
          new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to check ${path}: ${errorMessage(e)}`,
            ...causeProps(e),
          })
      )
    )
  );

// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Loading of config.zsh documents and the canonical template. A missing
 * file is a ConfigError naming the path; unreadable files surface as
 * SystemError from the filesystem layer.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import { ConfigError, ErrorCode, type SystemError } from "../lib/errors";
import { DEFAULT_TEMPLATE_PATH, toAbsolutePathEffect } from "../lib/paths";
import type { AbsolutePath } from "../lib/types";
import { fileExists, readFile } from "../system/fs";
import type { EnvConfig } from "./env";

type MissingCode = typeof ErrorCode.CONFIG_NOT_FOUND | typeof ErrorCode.TEMPLATE_NOT_FOUND;

const readExisting = (
  filePath: AbsolutePath,
  code: MissingCode,
  label: string
): Effect.Effect<string, ConfigError | SystemError, FileSystem.FileSystem> =>
  pipe(
    fileExists(filePath),
    Effect.filterOrFail(
      (exists): exists is true => exists,
      () =>
        new ConfigError({
          code,
          message: `${label} not found: ${filePath}`,
          path: filePath,
        })
    ),
    Effect.zipRight(readFile(filePath))
  );

/** Read the user's config document. */
export const loadDocument = (
  filePath: AbsolutePath
): Effect.Effect<string, ConfigError | SystemError, FileSystem.FileSystem> =>
  readExisting(filePath, ErrorCode.CONFIG_NOT_FOUND, "Config");

/** Read the template that drives normalization. */
export const loadTemplate = (
  filePath: AbsolutePath
): Effect.Effect<string, ConfigError | SystemError, FileSystem.FileSystem> =>
  readExisting(filePath, ErrorCode.TEMPLATE_NOT_FOUND, "Template");

/** WTCONFIG_TEMPLATE when set, otherwise the bundled template. */
export const resolveTemplatePath = (
  envConfig: EnvConfig
): Effect.Effect<AbsolutePath, ConfigError> =>
  Option.match(envConfig.template, {
    onNone: (): Effect.Effect<AbsolutePath, ConfigError> => Effect.succeed(DEFAULT_TEMPLATE_PATH),
    onSome: toAbsolutePathEffect,
  });

// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Path resolution for user-supplied config paths and the bundled template.
 * All paths leaving this module are branded AbsolutePath values.
 */

import { basename, dirname, normalize, resolve } from "node:path";
import { Effect } from "effect";
import { ConfigError, ErrorCode } from "./errors";
import type { AbsolutePath } from "./types";

/** Rejects null bytes to prevent path injection attacks. */
const hasNullByte = (p: string): boolean => p.includes("\x00");

const resolveToAbsolute = (p: string): AbsolutePath => {
  const normalized = normalize(p);
  return (
    normalized.startsWith("/") ? normalized : resolve(process.cwd(), normalized)
  ) as AbsolutePath;
};

/** Use for all user-provided paths (CLI arguments, environment overrides). */
export const toAbsolutePathEffect = (p: string): Effect.Effect<AbsolutePath, ConfigError> =>
  hasNullByte(p)
    ? Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_FAILED,
          message: `Invalid path contains null byte: ${p}`,
        })
      )
    : Effect.succeed(resolveToAbsolute(p));

/** Use ONLY for trusted paths (install-relative defaults). */
export const toAbsolutePathUnsafe = (p: string): AbsolutePath => resolveToAbsolute(p);

/**
 * The canonical template ships beside the program: `templates/` sits two
 * levels above both `src/lib` and the compiled `dist/lib`.
 */
export const DEFAULT_TEMPLATE_PATH: AbsolutePath = toAbsolutePathUnsafe(
  resolve(__dirname, "..", "..", "templates", "config.zsh.example")
);

/** Sibling path in the same directory, e.g. for backups. */
export const siblingPath = (target: AbsolutePath, name: string): AbsolutePath =>
  toAbsolutePathUnsafe(resolve(dirname(target), name));

export const fileName = (target: AbsolutePath): string => basename(target);

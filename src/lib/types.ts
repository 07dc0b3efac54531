// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded path type so user input is resolved exactly once before it
 * reaches the filesystem layer.
 */

import type { Brand } from "effect";

export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;

type AbsolutePathLiteral = `/${string}`;

/**
 * Compile-time validated `AbsolutePath` from a string literal.
 * Only accepts literals starting with `/`; for dynamic paths use
 * `toAbsolutePathEffect` from paths.ts.
 */
export const path = <const S extends AbsolutePathLiteral>(literal: S): AbsolutePath =>
  literal as string as AbsolutePath;

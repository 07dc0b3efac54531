// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Version 0 -> 1 migration: keyed tables switch from canonical repository
 * names to alias shorthands, missing declarations are added, and the
 * document is stamped with CONFIG_VERSION=1.
 */

import { Data } from "effect";
import { buildReverseAliases, extractAliases } from "./extract";
import {
  KEYED_CATEGORIES,
  KEYED_TABLES,
  type KeyedTable,
  formatScalar,
  isIndentedAssignment,
} from "./grammar";
import { addMissingDeclarations } from "./validate";

export const CURRENT_CONFIG_VERSION = 1;

export type MigrationResult = Data.TaggedEnum<{
  Skipped: { readonly version: number };
  Migrated: {
    readonly document: string;
    /** `TABLE[canonical] -> TABLE[shorthand]`, once each, in line order. */
    readonly renamed: readonly string[];
    readonly fixes: readonly string[];
    readonly versionAdded: boolean;
  };
}>;

export const MigrationResult = Data.taggedEnum<MigrationResult>();

const MIGRATED_PATTERN = new RegExp(`^${formatScalar("CONFIG_VERSION", "1")}`, "m");
const VERSION_LINE_PATTERN = /^CONFIG_VERSION=/m;

const RENAMED_TABLES: readonly KeyedTable[] = KEYED_CATEGORIES.map(
  (category) => KEYED_TABLES[category]
);

/** Leading whitespace, table name and key of a keyed assignment. */
const KEY_PATTERN = new RegExp(`^(\\s*)(${RENAMED_TABLES.join("|")})\\[([^\\]]+)\\]`);

// ============================================================================
// Passes
// ============================================================================

interface Renamed {
  readonly lines: readonly string[];
  readonly renamed: readonly string[];
}

const renameKeys = (document: string): Renamed => {
  const reverse = buildReverseAliases(extractAliases(document));
  const renamed = new Set<string>();

  const lines = document.split("\n").map((line) => {
    const match = KEY_PATTERN.exec(line);
    if (match === null) {
      return line;
    }
    const [whole, indent = "", table, key] = match;
    const shorthand = key === undefined ? undefined : reverse.get(key);
    if (table === undefined || shorthand === undefined) {
      return line;
    }
    renamed.add(`${table}[${key}] -> ${table}[${shorthand}]`);
    return `${indent}${table}[${shorthand}]${line.slice(whole.length)}`;
  });

  return { lines, renamed: Array.from(renamed) };
};

const isPreamble = (line: string): boolean =>
  line.startsWith("#!") || /^\s*#/.test(line) || line.trim() === "";

const VERSION_BLOCK: readonly string[] = [
  "# Config version (for migrations)",
  formatScalar("CONFIG_VERSION", String(CURRENT_CONFIG_VERSION)),
  "",
];

/** Stamp the version before the first statement, or at the end of an all-comment file. */
const insertVersion = (lines: readonly string[]): readonly string[] => {
  const at = lines.findIndex((line) => !isPreamble(line));
  return at === -1
    ? [...lines, ...VERSION_BLOCK]
    : [...lines.slice(0, at), ...VERSION_BLOCK, ...lines.slice(at)];
};

// ============================================================================
// Public API
// ============================================================================

export const isMigrated = (document: string): boolean => MIGRATED_PATTERN.test(document);

export const migrateToShorthand = (document: string): MigrationResult => {
  if (isMigrated(document)) {
    return MigrationResult.Skipped({ version: CURRENT_CONFIG_VERSION });
  }

  const { lines, renamed } = renameKeys(document);
  // Legacy files may assign inside conditionals, so indented uses count too.
  const declared = addMissingDeclarations(lines.join("\n"), isIndentedAssignment);
  const versionAdded = !VERSION_LINE_PATTERN.test(declared.document);
  const finalLines = versionAdded
    ? insertVersion(declared.document.split("\n"))
    : declared.document.split("\n");

  return MigrationResult.Migrated({
    document: finalLines.join("\n"),
    renamed,
    fixes: declared.fixes,
    versionAdded,
  });
};

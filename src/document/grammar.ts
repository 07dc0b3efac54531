// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Line grammar of config.zsh. Everything the extractor, merger and
 * validator recognise is a fixed literal or an anchored pattern built
 * here; there is no parser for the shell language itself.
 */

// ============================================================================
// Names
// ============================================================================

/** Top-level scalar settings, in substitution order. No name is a prefix of another. */
export const SCALAR_SETTINGS = [
  "GIT_USERNAME",
  "BRANCH_PREFIX",
  "BASE_DEV_PATH",
  "CONFIG_VERSION",
] as const;
export type ScalarName = (typeof SCALAR_SETTINGS)[number];

export const ALIAS_TABLE = "REPO_MAPPINGS";

export const KEYED_TABLES = {
  ide: "REPO_IDE_CONFIGS",
  ci: "REPO_CONFIGS",
  modules: "REPO_MODULES",
} as const;

export type KeyedCategory = keyof typeof KEYED_TABLES;
export type KeyedTable = (typeof KEYED_TABLES)[KeyedCategory];
export type TableName = typeof ALIAS_TABLE | KeyedTable;

/** Category order used wherever all three tables are visited. */
export const KEYED_CATEGORIES: readonly KeyedCategory[] = ["ide", "ci", "modules"];

// ============================================================================
// Declarations
// ============================================================================

export const declarationGuard = (table: TableName): string =>
  `[[ -z \${(t)${table}} ]] && declare -gA ${table}`;

/** Substring that marks a table as declared, guarded or not. */
export const declarationMarker = (table: TableName): string => `declare -gA ${table}`;

/** Opening of the alias table guard; the merger splices user aliases after it. */
export const ALIAS_GUARD_MARKER = `[[ -z \${(t)${ALIAS_TABLE}}`;

// ============================================================================
// Sections
// ============================================================================

export const SECTION_DELIMITER = "===";
const SECTION_RULE = `# ${SECTION_DELIMITER}`;

export const SECTION_HEADERS: Readonly<Record<KeyedCategory, string>> = {
  ide: "# Optional: IDE configuration",
  ci: "# Optional: CI commands",
  modules: "# Optional: Modular builds",
};

/** Comment labels that introduce a commented-out example in the template. */
export const EXAMPLE_LABELS: Readonly<Record<KeyedCategory, readonly string[]>> = {
  ide: [],
  ci: ["# Android example:", "# iOS example:", "# Web example:"],
  modules: ["# Android modules:", "# iOS modules:", "# Web packages:"],
};

export const containsDelimiter = (line: string): boolean => line.includes(SECTION_DELIMITER);

/** A `# ====` rule line. */
export const isSectionRule = (line: string): boolean => line.startsWith(SECTION_RULE);

/** Any comment line carrying the delimiter, e.g. a rule or a titled banner. */
export const isSectionHeader = (line: string): boolean =>
  line.startsWith("#") && containsDelimiter(line);

export const isBlank = (line: string): boolean => line.trim() === "";

// ============================================================================
// Assignments
// ============================================================================

export const isAssignment = (table: TableName, line: string): boolean =>
  line.startsWith(`${table}[`);

/** Assignment at any indentation, e.g. inside an `if` block. */
export const isIndentedAssignment = (table: TableName, line: string): boolean =>
  isAssignment(table, line.trimStart());

/** Commented-out template example, e.g. `# REPO_CONFIGS[web]="..."`. */
export const isExampleAssignment = (table: TableName, line: string): boolean =>
  line.startsWith(`# ${table}[`);

export const isExampleLabel = (category: KeyedCategory, line: string): boolean =>
  EXAMPLE_LABELS[category].some((label) => line.startsWith(label));

export const formatAssignment = (table: TableName, key: string, value: string): string =>
  `${table}[${key}]="${value}"`;

export const formatScalar = (name: ScalarName, value: string): string => `${name}=${value}`;

/** `NAME=<rest of line>`, anchored per line. */
export const scalarPattern = (name: ScalarName): RegExp => new RegExp(`^${name}=(.*)$`, "m");

/** `TABLE[key]="value"` at line start; global so it can drive matchAll. */
export const tableEntryPattern = (table: TableName): RegExp =>
  new RegExp(`^${table}\\[([^\\]]+)\\]="([^"]*)"`, "gm");

// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Structural validation of a config document. Each pass is a pure
 * document -> document function that also reports what it changed, and
 * validateAndFix chains them. Nothing is written here.
 */

import {
  ALIAS_TABLE,
  KEYED_CATEGORIES,
  KEYED_TABLES,
  type KeyedTable,
  declarationGuard,
  declarationMarker,
  isAssignment,
  isSectionHeader,
} from "./grammar";

export interface PassResult {
  readonly document: string;
  readonly issues: readonly string[];
  readonly fixes: readonly string[];
}

export interface ValidationResult extends PassResult {
  readonly hadIssues: boolean;
}

/** Tables in the order their declarations are checked. */
const DECLARED_TABLES: readonly KeyedTable[] = KEYED_CATEGORIES.map(
  (category) => KEYED_TABLES[category]
);

// ============================================================================
// Missing declarations
// ============================================================================

/** Recognises a use of `table` on a line. */
export type AssignmentMatcher = (table: KeyedTable, line: string) => boolean;

/**
 * Insert a declaration guard and a blank line before the first assignment
 * of every keyed table that is assigned but never declared. The guard is
 * always written at column 0.
 */
export const addMissingDeclarations = (
  document: string,
  isUse: AssignmentMatcher = isAssignment
): PassResult => {
  const lines = document.split("\n");

  const undeclared = new Set(
    DECLARED_TABLES.filter(
      (table) =>
        lines.some((line) => isUse(table, line)) &&
        !lines.some((line) => line.includes(declarationMarker(table)))
    )
  );

  const issues: string[] = [];
  const fixes: string[] = [];
  const output: string[] = [];

  for (const line of lines) {
    for (const table of DECLARED_TABLES) {
      if (undeclared.has(table) && isUse(table, line)) {
        const guard = declarationGuard(table);
        issues.push(`Missing ${table} declaration`);
        fixes.push(`Added: ${guard}`);
        output.push(guard, "");
        undeclared.delete(table);
      }
    }
    output.push(line);
  }

  return { document: output.join("\n"), issues, fixes };
};

// ============================================================================
// Section spacing
// ============================================================================

/**
 * An alias block that runs straight into a section banner gets a blank
 * line between them. Documents already spaced pass through unchanged.
 */
export const fixSectionSpacing = (document: string): PassResult => {
  const lines = document.split("\n");
  const issues: string[] = [];
  const fixes: string[] = [];

  const output = lines.flatMap((line, index): readonly string[] => {
    const next = lines[index + 1];
    if (isAssignment(ALIAS_TABLE, line) && next !== undefined && isSectionHeader(next)) {
      issues.push(`Missing blank line after ${ALIAS_TABLE} block`);
      fixes.push("Added: blank line before section header");
      return [line, ""];
    }
    return [line];
  });

  return { document: output.join("\n"), issues, fixes };
};

// ============================================================================
// Combined
// ============================================================================

const PASSES: readonly ((document: string) => PassResult)[] = [
  addMissingDeclarations,
  fixSectionSpacing,
];

export const validateAndFix = (document: string): ValidationResult => {
  const combined = PASSES.reduce<PassResult>(
    (acc, pass) => {
      const result = pass(acc.document);
      return {
        document: result.document,
        issues: [...acc.issues, ...result.issues],
        fixes: [...acc.fixes, ...result.fixes],
      };
    },
    { document, issues: [], fixes: [] }
  );
  return { ...combined, hadIssues: combined.issues.length > 0 };
};

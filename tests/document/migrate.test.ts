// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { MigrationResult, isMigrated, migrateToShorthand } from "../../src/document/migrate";

const lines = (...ls: readonly string[]): string => ls.join("\n");

const LEGACY = lines(
  "#!/usr/bin/env zsh",
  "# My config",
  "",
  'GIT_USERNAME="alice"',
  'REPO_MAPPINGS[app]="Acme-App"',
  'REPO_CONFIGS[Acme-App]="b|t|l"',
  '  REPO_MODULES[Acme-App]="core"',
  'REPO_IDE_CONFIGS[other]="vscode||"'
);

describe("migrateToShorthand", () => {
  test("renames keys, declares tables and stamps the version", () => {
    expect(migrateToShorthand(LEGACY)).toEqual(
      MigrationResult.Migrated({
        document: lines(
          "#!/usr/bin/env zsh",
          "# My config",
          "",
          "# Config version (for migrations)",
          "CONFIG_VERSION=1",
          "",
          'GIT_USERNAME="alice"',
          'REPO_MAPPINGS[app]="Acme-App"',
          "[[ -z ${(t)REPO_CONFIGS} ]] && declare -gA REPO_CONFIGS",
          "",
          'REPO_CONFIGS[app]="b|t|l"',
          "[[ -z ${(t)REPO_MODULES} ]] && declare -gA REPO_MODULES",
          "",
          '  REPO_MODULES[app]="core"',
          "[[ -z ${(t)REPO_IDE_CONFIGS} ]] && declare -gA REPO_IDE_CONFIGS",
          "",
          'REPO_IDE_CONFIGS[other]="vscode||"'
        ),
        renamed: [
          "REPO_CONFIGS[Acme-App] -> REPO_CONFIGS[app]",
          "REPO_MODULES[Acme-App] -> REPO_MODULES[app]",
        ],
        fixes: [
          "Added: [[ -z ${(t)REPO_CONFIGS} ]] && declare -gA REPO_CONFIGS",
          "Added: [[ -z ${(t)REPO_MODULES} ]] && declare -gA REPO_MODULES",
          "Added: [[ -z ${(t)REPO_IDE_CONFIGS} ]] && declare -gA REPO_IDE_CONFIGS",
        ],
        versionAdded: true,
      })
    );
  });

  test("a table assigned only inside a conditional is still declared", () => {
    const result = migrateToShorthand(
      lines(
        'REPO_MAPPINGS[app]="Acme-App"',
        "if true; then",
        '  REPO_MODULES[Acme-App]="core"',
        "fi"
      )
    );
    expect(result._tag === "Migrated" && result.document).toBe(
      lines(
        "# Config version (for migrations)",
        "CONFIG_VERSION=1",
        "",
        'REPO_MAPPINGS[app]="Acme-App"',
        "if true; then",
        "[[ -z ${(t)REPO_MODULES} ]] && declare -gA REPO_MODULES",
        "",
        '  REPO_MODULES[app]="core"',
        "fi"
      )
    );
  });

  test("a second run is skipped", () => {
    const first = migrateToShorthand(LEGACY);
    expect(first._tag).toBe("Migrated");
    if (first._tag === "Migrated") {
      expect(isMigrated(first.document)).toBe(true);
      expect(migrateToShorthand(first.document)).toEqual(MigrationResult.Skipped({ version: 1 }));
    }
  });

  test("repeated keys are reported once", () => {
    const doc = lines(
      'REPO_MAPPINGS[app]="Acme-App"',
      "declare -gA REPO_CONFIGS",
      'REPO_CONFIGS[Acme-App]="b|t|l"',
      'REPO_CONFIGS[Acme-App]="b2|t2|l2"'
    );
    const result = migrateToShorthand(doc);
    expect(result._tag === "Migrated" && result.renamed).toEqual([
      "REPO_CONFIGS[Acme-App] -> REPO_CONFIGS[app]",
    ]);
  });

  test("an existing older version line is kept, not duplicated", () => {
    const result = migrateToShorthand(lines("CONFIG_VERSION=0", 'GIT_USERNAME="alice"'));
    expect(result).toEqual(
      MigrationResult.Migrated({
        document: lines("CONFIG_VERSION=0", 'GIT_USERNAME="alice"'),
        renamed: [],
        fixes: [],
        versionAdded: false,
      })
    );
  });

  test("an all-comment file gets the version appended", () => {
    const result = migrateToShorthand(lines("# empty", ""));
    expect(result._tag === "Migrated" && result.document).toBe(
      lines("# empty", "", "# Config version (for migrations)", "CONFIG_VERSION=1", "")
    );
  });
});

// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import {
  buildReverseAliases,
  describeAliasConflict,
  extract,
  extractAliases,
  findAliasConflicts,
  resolveEntries,
  resolveKey,
} from "../../src/document/extract";

const USER = [
  "#!/usr/bin/env zsh",
  'GIT_USERNAME="alice"',
  'BRANCH_PREFIX=""',
  "BASE_DEV_PATH=$HOME/work",
  'GIT_USERNAME="shadowed"',
  "",
  'REPO_MAPPINGS[app]="Acme-App"',
  'REPO_MAPPINGS[lib]="Acme-Lib"',
  "",
  'REPO_IDE_CONFIGS[Acme-App]="android-studio||"',
  'REPO_CONFIGS[app]="make|make test|make lint"',
  'REPO_CONFIGS[Acme-Lib]="b|t|l"',
  'REPO_CONFIGS[tools]="x|y|z"',
  'REPO_MODULES[Acme-Lib]="core ui"',
  '# REPO_CONFIGS[web]="npm run build|npm test|npm run lint"',
  '  REPO_MODULES[indented]="skipped"',
].join("\n");

describe("extract", () => {
  describe("scalars", () => {
    test("first assignment of each scalar wins", () => {
      const { scalars } = extract(USER);
      expect(scalars).toEqual([
        { name: "GIT_USERNAME", value: '"alice"' },
        { name: "BRANCH_PREFIX", value: '""' },
        { name: "BASE_DEV_PATH", value: "$HOME/work" },
      ]);
    });

    test("absent scalars are simply missing", () => {
      expect(extract('CONFIG_VERSION=1\n# GIT_USERNAME="x"').scalars).toEqual([
        { name: "CONFIG_VERSION", value: "1" },
      ]);
    });
  });

  describe("aliases", () => {
    test("keeps document order", () => {
      expect(extractAliases(USER)).toEqual([
        { shorthand: "app", canonical: "Acme-App" },
        { shorthand: "lib", canonical: "Acme-Lib" },
      ]);
    });

    test("ignores commented and indented assignments", () => {
      expect(extractAliases('# REPO_MAPPINGS[a]="A"\n  REPO_MAPPINGS[b]="B"')).toEqual([]);
    });
  });

  describe("keyed entries", () => {
    test("canonical keys become shorthand, others pass through", () => {
      const { keyed } = extract(USER);
      expect(keyed.ide).toEqual([{ key: "app", value: "android-studio||" }]);
      expect(keyed.ci).toEqual([
        { key: "app", value: "make|make test|make lint" },
        { key: "lib", value: "b|t|l" },
        { key: "tools", value: "x|y|z" },
      ]);
      expect(keyed.modules).toEqual([{ key: "lib", value: "core ui" }]);
    });

    test("empty document yields nothing", () => {
      expect(extract("")).toEqual({
        scalars: [],
        aliases: [],
        keyed: { ide: [], ci: [], modules: [] },
      });
    });
  });
});

describe("alias resolution", () => {
  const reverse = buildReverseAliases([
    { shorthand: "app", canonical: "Acme-App" },
    { shorthand: "lib", canonical: "Acme-Lib" },
  ]);

  test("resolveKey maps canonical names only", () => {
    expect(resolveKey(reverse, "Acme-App")).toBe("app");
    expect(resolveKey(reverse, "app")).toBe("app");
    expect(resolveKey(reverse, "Unknown")).toBe("Unknown");
  });

  test("resolving twice equals resolving once", () => {
    const entries = [
      { key: "Acme-App", value: "1" },
      { key: "lib", value: "2" },
      { key: "Other", value: "3" },
    ];
    const once = resolveEntries(reverse, entries);
    expect(resolveEntries(reverse, once)).toEqual(once);
  });

  test("later alias for the same canonical name wins", () => {
    const last = buildReverseAliases([
      { shorthand: "a1", canonical: "Acme-App" },
      { shorthand: "a2", canonical: "Acme-App" },
    ]);
    expect(resolveKey(last, "Acme-App")).toBe("a2");
  });
});

describe("findAliasConflicts", () => {
  test("no conflicts for distinct aliases", () => {
    expect(findAliasConflicts(extractAliases(USER))).toEqual([]);
  });

  test("reports a canonical name reached from several shorthands", () => {
    const conflicts = findAliasConflicts([
      { shorthand: "a1", canonical: "Acme-App" },
      { shorthand: "a2", canonical: "Acme-App" },
    ]);
    expect(conflicts).toEqual([
      { kind: "canonical-reused", canonical: "Acme-App", shorthands: ["a1", "a2"] },
    ]);
    const [first] = conflicts;
    expect(first && describeAliasConflict(first)).toBe(
      "Acme-App has several shorthands (a1, a2); keys resolve to a2"
    );
  });

  test("reports a shorthand defined more than once", () => {
    const conflicts = findAliasConflicts([
      { shorthand: "app", canonical: "Acme-App" },
      { shorthand: "app", canonical: "Acme-Web" },
    ]);
    expect(conflicts).toEqual([
      { kind: "shorthand-redefined", shorthand: "app", canonicals: ["Acme-App", "Acme-Web"] },
    ]);
    const [first] = conflicts;
    expect(first && describeAliasConflict(first)).toBe(
      "Shorthand app is defined more than once (Acme-App, Acme-Web)"
    );
  });

  test("conflicts do not change extraction", () => {
    const doc = 'REPO_MAPPINGS[a1]="Acme-App"\nREPO_MAPPINGS[a2]="Acme-App"\nREPO_CONFIGS[Acme-App]="b|t|l"';
    expect(extract(doc).keyed.ci).toEqual([{ key: "a2", value: "b|t|l" }]);
  });
});

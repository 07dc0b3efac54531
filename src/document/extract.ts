// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Value extraction from a config document.
 * Pure functions with no IO: scalar settings, the alias table, and the
 * three keyed tables, with keyed-table keys normalised to shorthand.
 */

import { Array as Arr, Option, pipe } from "effect";
import {
  ALIAS_TABLE,
  KEYED_TABLES,
  type KeyedCategory,
  SCALAR_SETTINGS,
  type ScalarName,
  type TableName,
  scalarPattern,
  tableEntryPattern,
} from "./grammar";

export interface ScalarSetting {
  readonly name: ScalarName;
  readonly value: string;
}

export interface AliasEntry {
  readonly shorthand: string;
  readonly canonical: string;
}

export interface KeyedEntry {
  readonly key: string;
  readonly value: string;
}

export type KeyedEntries = Readonly<Record<KeyedCategory, readonly KeyedEntry[]>>;

export interface ExtractedValues {
  readonly scalars: readonly ScalarSetting[];
  readonly aliases: readonly AliasEntry[];
  readonly keyed: KeyedEntries;
}

/** canonical name -> shorthand */
export type ReverseAliases = ReadonlyMap<string, string>;

// ============================================================================
// Raw matching
// ============================================================================

/** First match wins. */
const matchScalar = (document: string, name: ScalarName): Option.Option<ScalarSetting> =>
  pipe(
    Option.fromNullable(scalarPattern(name).exec(document)),
    Option.flatMap((match) => Arr.get(match, 1)),
    Option.map((value) => ({ name, value }))
  );

/** All `TABLE[key]="value"` pairs in document order. */
export const matchTableEntries = (
  document: string,
  table: TableName
): readonly (readonly [string, string])[] =>
  pipe(
    Array.from(document.matchAll(tableEntryPattern(table))),
    Arr.filterMap((match) => Option.all([Arr.get(match, 1), Arr.get(match, 2)] as const))
  );

// ============================================================================
// Alias resolution
// ============================================================================

/** Later entries overwrite earlier ones for the same canonical name. */
export const buildReverseAliases = (aliases: readonly AliasEntry[]): ReverseAliases =>
  new Map(aliases.map(({ shorthand, canonical }) => [canonical, shorthand] as const));

/**
 * Canonical names become their shorthand; anything else passes through.
 * Idempotent because shorthands are not in the map's domain.
 */
export const resolveKey = (reverse: ReverseAliases, key: string): string =>
  reverse.get(key) ?? key;

export const resolveEntries = (
  reverse: ReverseAliases,
  entries: readonly KeyedEntry[]
): readonly KeyedEntry[] =>
  entries.map(({ key, value }) => ({ key: resolveKey(reverse, key), value }));

// ============================================================================
// Extraction
// ============================================================================

export const extractAliases = (document: string): readonly AliasEntry[] =>
  matchTableEntries(document, ALIAS_TABLE).map(([shorthand, canonical]) => ({
    shorthand,
    canonical,
  }));

export const extract = (document: string): ExtractedValues => {
  const aliases = extractAliases(document);
  const reverse = buildReverseAliases(aliases);

  const keyedFor = (category: KeyedCategory): readonly KeyedEntry[] =>
    resolveEntries(
      reverse,
      matchTableEntries(document, KEYED_TABLES[category]).map(([key, value]) => ({ key, value }))
    );

  return {
    scalars: Arr.filterMap(SCALAR_SETTINGS, (name) => matchScalar(document, name)),
    aliases,
    keyed: {
      ide: keyedFor("ide"),
      ci: keyedFor("ci"),
      modules: keyedFor("modules"),
    },
  };
};

// ============================================================================
// Conflicts
// ============================================================================

export type AliasConflict =
  | {
      readonly kind: "canonical-reused";
      readonly canonical: string;
      readonly shorthands: readonly string[];
    }
  | {
      readonly kind: "shorthand-redefined";
      readonly shorthand: string;
      readonly canonicals: readonly string[];
    };

const groupBy = <K>(
  aliases: readonly AliasEntry[],
  keyOf: (entry: AliasEntry) => K,
  valueOf: (entry: AliasEntry) => string
): ReadonlyMap<K, readonly string[]> =>
  aliases.reduce((groups, entry) => {
    const key = keyOf(entry);
    return groups.set(key, [...(groups.get(key) ?? []), valueOf(entry)]);
  }, new Map<K, string[]>());

/**
 * Ambiguities that resolution settles silently by last-write-wins.
 * Reported for diagnostics only; `extract` is unaffected.
 */
export const findAliasConflicts = (aliases: readonly AliasEntry[]): readonly AliasConflict[] => {
  const byCanonical = groupBy(
    aliases,
    (a) => a.canonical,
    (a) => a.shorthand
  );
  const byShorthand = groupBy(
    aliases,
    (a) => a.shorthand,
    (a) => a.canonical
  );

  const reused = Array.from(byCanonical)
    .filter(([, shorthands]) => shorthands.length > 1)
    .map(
      ([canonical, shorthands]): AliasConflict => ({
        kind: "canonical-reused",
        canonical,
        shorthands,
      })
    );

  const redefined = Array.from(byShorthand)
    .filter(([, canonicals]) => canonicals.length > 1)
    .map(
      ([shorthand, canonicals]): AliasConflict => ({
        kind: "shorthand-redefined",
        shorthand,
        canonicals,
      })
    );

  return [...reused, ...redefined];
};

export const describeAliasConflict = (conflict: AliasConflict): string => {
  if (conflict.kind === "shorthand-redefined") {
    return `Shorthand ${conflict.shorthand} is defined more than once (${conflict.canonicals.join(", ")})`;
  }
  const winner = pipe(
    Arr.last(conflict.shorthands),
    Option.getOrElse(() => conflict.canonical)
  );
  return `${conflict.canonical} has several shorthands (${conflict.shorthands.join(", ")}); keys resolve to ${winner}`;
};

// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Template merge: the template drives a forward-only walk and the user's
 * values are spliced in where the template shows examples.
 *
 * The walk is a finite-state machine over WalkerState. Every state owns
 * its copy/skip predicates and returns the next state. Lookahead is at
 * most one line; nothing already emitted is revisited.
 */

import { Data, Match, pipe } from "effect";
import { type ExtractedValues, type KeyedEntry, type ScalarSetting, extract } from "./extract";
import {
  ALIAS_GUARD_MARKER,
  ALIAS_TABLE,
  KEYED_CATEGORIES,
  KEYED_TABLES,
  type KeyedCategory,
  SECTION_HEADERS,
  type TableName,
  containsDelimiter,
  formatAssignment,
  formatScalar,
  isBlank,
  isExampleAssignment,
  isExampleLabel,
  isSectionRule,
} from "./grammar";

// ============================================================================
// Walker
// ============================================================================

/** Cursor over the template plus the output buffer it feeds. */
class TemplateWalker {
  private index = 0;
  private readonly output: string[] = [];

  constructor(private readonly lines: readonly string[]) {}

  get done(): boolean {
    return this.index >= this.lines.length;
  }

  /** Line at the cursor (offset 0) or after it; undefined past the end. */
  peek(offset = 0): string | undefined {
    return this.lines[this.index + offset];
  }

  advance(): void {
    this.index += 1;
  }

  emit(...lines: readonly string[]): void {
    this.output.push(...lines);
  }

  /** Copy lines verbatim until one satisfies `stop` (left unconsumed). */
  copyUntil(stop: (line: string) => boolean): void {
    for (let line = this.peek(); line !== undefined && !stop(line); line = this.peek()) {
      this.emit(line);
      this.advance();
    }
  }

  /** Drop lines while `drop` holds. */
  skipWhile(drop: (line: string) => boolean): void {
    for (let line = this.peek(); line !== undefined && drop(line); line = this.peek()) {
      this.advance();
    }
  }

  result(): string {
    return this.output.join("\n");
  }
}

// ============================================================================
// States
// ============================================================================

type WalkerState = Data.TaggedEnum<{
  Default: object;
  AliasSkip: object;
  IdeSection: object;
  CiSection: object;
  ModulesSection: object;
}>;

const { Default, AliasSkip, IdeSection, CiSection, ModulesSection } =
  Data.taggedEnum<WalkerState>();

const SECTION_STATES: Readonly<Record<KeyedCategory, () => WalkerState>> = {
  ide: () => IdeSection(),
  ci: () => CiSection(),
  modules: () => ModulesSection(),
};

// ============================================================================
// Emission helpers
// ============================================================================

/** First scalar whose `NAME=` prefixes the line replaces it; otherwise unchanged. */
const substituteScalar = (line: string, scalars: readonly ScalarSetting[]): string => {
  const setting = scalars.find(({ name }) => line.startsWith(`${name}=`));
  return setting === undefined ? line : formatScalar(setting.name, setting.value);
};

const entryLines = (table: TableName, entries: readonly KeyedEntry[]): readonly string[] =>
  entries.map(({ key, value }) => formatAssignment(table, key, value));

/** Blank-line bracketed block; nothing at all when there are no entries. */
const emitKeyedBlock = (
  walker: TemplateWalker,
  category: KeyedCategory,
  entries: readonly KeyedEntry[]
): void => {
  if (entries.length > 0) {
    walker.emit("", ...entryLines(KEYED_TABLES[category], entries), "");
  }
};

const headerCategory = (line: string): KeyedCategory | undefined =>
  KEYED_CATEGORIES.find((category) => line.startsWith(SECTION_HEADERS[category]));

// ============================================================================
// State handlers
// ============================================================================

const stepDefault = (walker: TemplateWalker, values: ExtractedValues): WalkerState => {
  const raw = walker.peek();
  if (raw === undefined) {
    return Default();
  }
  const line = substituteScalar(raw, values.scalars);
  walker.emit(line);
  walker.advance();

  if (line.includes(ALIAS_GUARD_MARKER)) {
    if (values.aliases.length > 0) {
      walker.emit(
        "",
        ...values.aliases.map(({ shorthand, canonical }) =>
          formatAssignment(ALIAS_TABLE, shorthand, canonical)
        )
      );
    }
    return AliasSkip();
  }

  const category = headerCategory(line);
  return category === undefined ? Default() : SECTION_STATES[category]();
};

/** Drops the template's example aliases up to the next delimiter line. */
const stepAliasSkip = (walker: TemplateWalker): WalkerState => {
  walker.skipWhile((line) => !containsDelimiter(line));
  return Default();
};

const stepIdeSection = (walker: TemplateWalker, values: ExtractedValues): WalkerState => {
  const isExample = (line: string): boolean => isExampleAssignment(KEYED_TABLES.ide, line);
  walker.copyUntil(isExample);
  emitKeyedBlock(walker, "ide", values.keyed.ide);
  walker.skipWhile(isExample);
  return Default();
};

/**
 * CI and module sections: examples are label comments plus commented
 * assignments. Skipping stops at a rule line, or consumes one blank line
 * that directly precedes a rule; any other line ends the example block.
 */
const stepLabelledSection = (
  walker: TemplateWalker,
  values: ExtractedValues,
  category: "ci" | "modules"
): WalkerState => {
  const isExample = (line: string): boolean =>
    isExampleLabel(category, line) || isExampleAssignment(KEYED_TABLES[category], line);

  walker.copyUntil(isExample);
  emitKeyedBlock(walker, category, values.keyed[category]);
  walker.skipWhile(isExample);

  const next = walker.peek();
  const after = walker.peek(1);
  if (next !== undefined && isBlank(next) && after !== undefined && isSectionRule(after)) {
    walker.advance();
  }
  return Default();
};

const step = (state: WalkerState, walker: TemplateWalker, values: ExtractedValues): WalkerState =>
  pipe(
    Match.value(state),
    Match.tag("Default", () => stepDefault(walker, values)),
    Match.tag("AliasSkip", () => stepAliasSkip(walker)),
    Match.tag("IdeSection", () => stepIdeSection(walker, values)),
    Match.tag("CiSection", () => stepLabelledSection(walker, values, "ci")),
    Match.tag("ModulesSection", () => stepLabelledSection(walker, values, "modules")),
    Match.exhaustive
  );

// ============================================================================
// Public API
// ============================================================================

/** Walk `template` and emit it with `values` in place of its examples. */
export const mergeValues = (values: ExtractedValues, template: string): string => {
  const walker = new TemplateWalker(template.split("\n"));
  let state: WalkerState = Default();
  while (!walker.done) {
    state = step(state, walker, values);
  }
  return walker.result();
};

/**
 * Rewrite `userDocument` into the template's layout, keeping the user's
 * scalar values, aliases and keyed entries (keys normalised to shorthand).
 */
export const merge = (userDocument: string, templateDocument: string): string =>
  mergeValues(extract(userDocument), templateDocument);

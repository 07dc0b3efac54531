// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for wtconfig.
 * Each failure is a tagged error carrying a typed code, so the CLI can
 * report it consistently and pattern match on `_tag`.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (1-9)
  readonly GENERAL_ERROR: 1;

  // Config documents (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly TEMPLATE_NOT_FOUND: 11;
  readonly CONFIG_VALIDATION_FAILED: 12;

  // System (20-29)
  readonly FILE_READ_FAILED: 20;
  readonly FILE_WRITE_FAILED: 21;

  // Backup (30-39)
  readonly BACKUP_FAILED: 30;
}

/**
 * Error codes for all wtconfig operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  GENERAL_ERROR: 1,

  CONFIG_NOT_FOUND: 10,
  TEMPLATE_NOT_FOUND: 11,
  CONFIG_VALIDATION_FAILED: 12,

  FILE_READ_FAILED: 20,
  FILE_WRITE_FAILED: 21,

  BACKUP_FAILED: 30,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

type GeneralErrorCode = typeof ErrorCode.GENERAL_ERROR;
type ConfigErrorCode =
  | typeof ErrorCode.CONFIG_NOT_FOUND
  | typeof ErrorCode.TEMPLATE_NOT_FOUND
  | typeof ErrorCode.CONFIG_VALIDATION_FAILED;
type SystemErrorCode = typeof ErrorCode.FILE_READ_FAILED | typeof ErrorCode.FILE_WRITE_FAILED;
type BackupErrorCode = typeof ErrorCode.BACKUP_FAILED;

/** Failures outside any document, such as an invalid WTCONFIG_ variable. */
export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralErrorCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

/** Missing or invalid configuration documents. `path` names the offending file. */
export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemErrorCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class BackupError extends Data.TaggedError("BackupError")<{
  readonly code: BackupErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export type WtconfigError = GeneralError | ConfigError | SystemError | BackupError;

const ERROR_TAGS: ReadonlySet<string> = new Set([
  "GeneralError",
  "ConfigError",
  "SystemError",
  "BackupError",
]);

/** Type guard for error display routing. Our errors carry codes; anything else is unexpected. */
export const isWtconfigError = (err: unknown): err is WtconfigError =>
  typeof err === "object" &&
  err !== null &&
  "_tag" in err &&
  typeof err._tag === "string" &&
  ERROR_TAGS.has(err._tag);

/**
 * Get human-readable error code name.
 */
export const getErrorCodeName = (code: ErrorCodeValue): string => {
  const entry = Object.entries(ErrorCode).find(([, v]) => v === code);
  return entry?.[0] ?? "UNKNOWN";
};

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};

/** Spreads an Error cause into error props, omitting non-Error values. */
export const causeProps = (e: unknown): { readonly cause?: Error } =>
  e instanceof Error ? { cause: e } : {};

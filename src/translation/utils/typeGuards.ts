/**
 * Type Guards - SSOT for Runtime Type Checking
 *
 * Request bodies arrive as `unknown` from express; converters narrow them
 * through these guards instead of casting.
 */

import type { OllamaRole } from '../../types/index.js';

export type UnknownRecord = Record<string, unknown>;

/**
 * Plain object (not array, not null)
 */
export const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isString = (value: unknown): value is string =>
  typeof value === "string";

export const isNonEmptyString = (value: unknown): value is string =>
  typeof value === "string" && value.trim().length > 0;

export const isNumber = (value: unknown): value is number =>
  typeof value === "number" && !Number.isNaN(value);

export const isBoolean = (value: unknown): value is boolean =>
  typeof value === "boolean";

export const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(isString);

const OLLAMA_ROLES: ReadonlySet<string> = new Set<OllamaRole>([
  'system',
  'user',
  'assistant',
  'tool',
]);

export const isOllamaRole = (value: unknown): value is OllamaRole =>
  typeof value === 'string' && OLLAMA_ROLES.has(value);

/**
 * Read a string `code` from an error-like value (Node system errors, undici errors)
 */
export const readErrorCode = (value: unknown): string | undefined =>
  isRecord(value) && isString(value['code']) ? value['code'] : undefined;

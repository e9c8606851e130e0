/**
 * Read helpers for shaping loosely-typed upstream JSON.
 * Absent or mistyped fields fall back to an empty value instead of throwing.
 */

import { isRecord } from '../dispatch/application/tabular';

export { isRecord };

export type JsonRecord = Record<string, unknown>;

export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * String value of obj[key]; numbers are stringified. Absent and null
 * values read as null.
 */
export function readString(obj: JsonRecord, key: string): string | null {
  const value = obj[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * readString with "" for absent values, for matching and grouping.
 */
export function readText(obj: JsonRecord, key: string): string {
  return readString(obj, key) ?? '';
}

/**
 * Finite number at obj[key], otherwise null (NaN, null and absent alike).
 */
export function readNumber(obj: JsonRecord, key: string): number | null {
  const value = obj[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * "W-L" record, or null unless both counts are known.
 */
export function winLoss(wins: number | null, losses: number | null): string | null {
  return wins === null || losses === null ? null : `${wins}-${losses}`;
}

/**
 * Value as-is when present, otherwise the fallback.
 */
export function readOr(obj: JsonRecord, key: string, fallback: unknown): unknown {
  const value = obj[key];
  return value === undefined || value === null ? fallback : value;
}

export function fullName(obj: JsonRecord): string | null {
  const parts = [readString(obj, 'first_name'), readString(obj, 'last_name')].filter(
    (part): part is string => part !== null && part.length > 0,
  );
  return parts.length > 0 ? parts.join(' ') : null;
}

/**
 * Entries of obj whose key contains needle (case-insensitive).
 */
export function pickKeysContaining(obj: JsonRecord, needle: string): JsonRecord {
  const lowered = needle.toLowerCase();
  const picked: JsonRecord = {};
  for (const [key, value] of Object.entries(obj)) {
    if (key.toLowerCase().includes(lowered)) {
      picked[key] = value;
    }
  }
  return picked;
}

export function isEmpty(obj: JsonRecord): boolean {
  return Object.keys(obj).length === 0;
}

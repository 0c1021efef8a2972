/**
 * Formatting helpers shared by the tool groups.
 */

import { PAGINATION } from '../constants.js';
import { Errors } from '../errors/index.js';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB', 'EB'];
const SIZE_PATTERN = /^(\d+(?:\.\d+)?)\s*([KMGTPE]?)(?:I?B)?$/;

export interface Pagination {
  total: number;
  limit: number;
  offset: number;
  returned: number;
  has_more: boolean;
}

/**
 * Human-readable byte count using binary multiples.
 */
export function formatSize(bytes: number): string {
  let value = bytes;
  for (const unit of SIZE_UNITS) {
    if (Math.abs(value) < 1024) {
      return `${value.toFixed(2)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(2)} ZB`;
}

/**
 * Parse a size such as `10G`, `512MiB` or `1.5T` into bytes.
 */
export function parseSize(size: string | number): number {
  if (typeof size === 'number') {
    return Math.floor(size);
  }

  const match = SIZE_PATTERN.exec(size.trim().toUpperCase());
  if (!match) {
    throw Errors.invalidInput('size', `cannot parse "${size}"`);
  }

  const exponent = match[2] ? SIZE_UNITS.indexOf(`${match[2]}B`) : 0;
  return Math.floor(Number(match[1]) * 1024 ** exponent);
}

/**
 * Slice a list and describe the page.
 */
export function applyPagination<T>(
  items: T[],
  limit: number = PAGINATION.DEFAULT_LIMIT,
  offset: number = 0
): { items: T[]; pagination: Pagination } {
  const boundedLimit = Math.min(Math.max(1, limit), PAGINATION.MAX_LIMIT);
  const boundedOffset = Math.max(0, offset);
  const page = items.slice(boundedOffset, boundedOffset + boundedLimit);

  return {
    items: page,
    pagination: {
      total: items.length,
      limit: boundedLimit,
      offset: boundedOffset,
      returned: page.length,
      has_more: boundedOffset + page.length < items.length
    }
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Appliance properties arrive either bare or as `{value, parsed, rawvalue}`.
 * Returns the display value.
 */
export function propValue(property: unknown): unknown {
  if (isRecord(property)) {
    return property.value ?? null;
  }
  return property ?? null;
}

/**
 * Numeric form of an appliance property, if one can be read.
 */
export function propNumber(property: unknown): number | undefined {
  if (typeof property === 'number') {
    return property;
  }
  if (isRecord(property)) {
    if (typeof property.parsed === 'number') {
      return property.parsed;
    }
    if (typeof property.rawvalue === 'string' && property.rawvalue.trim() !== '') {
      const raw = Number(property.rawvalue);
      return Number.isFinite(raw) ? raw : undefined;
    }
  }
  return undefined;
}

function dateMillis(value: unknown): number | undefined {
  return isRecord(value) && typeof value.$date === 'number' ? value.$date : undefined;
}

/**
 * Time in epoch seconds. Accepts `{$date: ms}` bare or under `parsed`,
 * and seconds bare, under `parsed` or as `rawvalue`.
 */
export function propTimestamp(property: unknown): number | undefined {
  const millis = dateMillis(property) ?? (isRecord(property) ? dateMillis(property.parsed) : undefined);
  if (millis !== undefined) {
    return Math.floor(millis / 1000);
  }
  const seconds = propNumber(property);
  return seconds === undefined ? undefined : Math.floor(seconds);
}

export function roundPercent(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 10000) / 100 : 0;
}

// src/core/common/utils.ts

import { v4 as uuidv4 } from 'uuid';

/**
 * Generates the 8 hex character nonce used in canonical filenames.
 * First 8 characters of a Version 4 UUID, so practically unique within a directory.
 */
export function generateNonce(): string {
    return uuidv4().replace(/-/g, '').slice(0, 8);
}

/**
 * Builds a calendar date (UTC midnight). Uses setUTCFullYear so that years
 * below 100 are not shifted into the 1900s.
 * Returns null if the components do not form a real date (e.g. 2024-02-30).
 */
export function makeCalendarDate(year: number, month: number, day: number): Date | null {
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(0, 0, 0, 0);
    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

/** Sentinel used when the extraction service returns no parseable date. */
export function sentinelDate(): Date {
    // 0001-01-01 is always valid
    return makeCalendarDate(1, 1, 1) ?? new Date(0);
}

/** Parses a strict `YYYY-MM-DD` string. Returns null on any other input. */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) return null;
    return makeCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/** Formats a calendar date as `YYYY-MM-DD`. */
export function formatIsoDate(date: Date): string {
    const year = String(date.getUTCFullYear()).padStart(4, '0');
    const month = String(date.getUTCMonth() + 1).padStart(2, '0'); // +1 because months are 0-indexed
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/** Formats a calendar date as `MMDDYYYY`. */
export function formatDateToMMDDYYYY(date: Date): string {
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    const year = String(date.getUTCFullYear()).padStart(4, '0');
    return `${month}${day}${year}`;
}

/** Splits an array into consecutive batches of at most `size` items. */
export function chunk<T>(items: readonly T[], size: number): T[][] {
    if (size < 1) throw new RangeError(`Batch size must be at least 1, got ${size}`);
    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        batches.push(items.slice(i, i + size));
    }
    return batches;
}

/** Narrows an unknown thrown value to an Error. */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

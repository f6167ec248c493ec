// src/infrastructure/extraction/taggun-response.mapper.ts
import { ExtractionResult } from '../../core/common/interfaces/models';
import { makeCalendarDate, sentinelDate } from '../../core/common/utils';

export const UNKNOWN_MERCHANT = 'Unknown';

type JsonObject = { [key: string]: unknown };

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Taggun wraps each extracted field as `{ data, confidenceLevel, text }`. */
function fieldData(payload: JsonObject, key: string): unknown {
    const field = payload[key];
    return isJsonObject(field) ? field.data : undefined;
}

function toAmount(value: unknown): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        if (!isNaN(parsed)) return parsed;
    }
    return NaN;
}

/** Commas and line breaks would corrupt the ledger row. */
function toMerchantName(value: unknown): string {
    if (typeof value !== 'string') return UNKNOWN_MERCHANT;
    const cleaned = value.replace(/[,\r\n]+/g, ' ').trim();
    return cleaned === '' ? UNKNOWN_MERCHANT : cleaned;
}

/**
 * Parses the date Taggun reports. An ISO prefix is taken literally so that
 * a UTC timestamp never shifts the calendar day; anything else goes through Date.
 */
export function parseExtractedDate(value: unknown): Date | null {
    if (typeof value !== 'string') return null;

    const iso = value.match(/^(\d{4})-(\d{2})-(\d{2})/);
    if (iso) {
        return makeCalendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    }

    const parsed = new Date(value);
    if (isNaN(parsed.getTime())) return null;
    return makeCalendarDate(parsed.getFullYear(), parsed.getMonth() + 1, parsed.getDate());
}

/** Maps a verbose Taggun response body to an ExtractionResult, with sentinels for missing fields. */
export function toExtractionResult(payload: unknown): ExtractionResult {
    const body = isJsonObject(payload) ? payload : {};
    const confidence = body.confidenceLevel;

    return {
        date: parseExtractedDate(fieldData(body, 'date')) ?? sentinelDate(),
        name: toMerchantName(fieldData(body, 'merchantName')),
        total: toAmount(fieldData(body, 'totalAmount')),
        tax: toAmount(fieldData(body, 'taxAmount')),
        confidence: typeof confidence === 'number' && !isNaN(confidence) ? confidence : 0,
    };
}

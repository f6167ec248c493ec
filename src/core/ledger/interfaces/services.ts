// src/core/ledger/interfaces/services.ts
import { ReceiptRecord } from '../../common/entities';

/** Ordered ledger columns; the header line is these joined with commas. */
export const LEDGER_FIELDS = ['date', 'name', 'total', 'tax', 'confidence', 'filename'] as const;

export const LEDGER_HEADER = LEDGER_FIELDS.join(',');

/** Defines the contract for the Ledger Codec */
export interface ILedgerCodecService {
    /**
     * Parses ledger text into a mapping keyed by filename, in file order.
     * @throws {LedgerFormatError} on a header mismatch or a malformed row.
     */
    parse(text: string): Map<string, ReceiptRecord>;

    /**
     * Serializes records in the given order, header first, one line per record.
     * @throws {LedgerFormatError} if a field contains a delimiter character.
     */
    serialize(records: Iterable<ReceiptRecord>): string;
}

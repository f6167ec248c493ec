// src/core/scanning/interfaces/services.ts
import { ReceiptRecord } from '../../common/entities';
import { FileType } from '../../common/file-type';
import { Completion } from '../../common/interfaces/models';

/** Determines the type of a file from its path and, if needed, its first bytes. */
export interface IFileTypeSniffer {
    sniff(filePath: string): FileType;
}

export const FILE_TYPE_SNIFFER_TOKEN = Symbol.for('IFileTypeSniffer');

/** Defines the contract for the Scanner */
export interface IScannerService {
    /** Scanned directory, as configured (not resolved) */
    readonly sourceDir: string;

    /**
     * Loads the ledger once. Later calls reuse the loaded ledger.
     * @throws {LedgerFormatError} if the ledger file is malformed.
     */
    init(): Promise<void>;

    /** The loaded ledger, keyed by filename. Throws if `init()` has not completed. */
    readonly knownRecords: ReadonlyMap<string, ReceiptRecord>;

    /**
     * Lazily yields the records that need to be submitted for extraction:
     * fresh records for unknown files and the existing record for
     * low-confidence ledger entries. Single pass; call again for a new listing.
     */
    scan(): Generator<ReceiptRecord, void, undefined>;

    /** Entries the most recent scan passed over, the ledger file excluded. */
    readonly skippedCount: number;

    /**
     * Overlays completed records on the ledger baseline and returns the
     * records to persist, in order.
     */
    merge(completions: readonly Completion[]): ReceiptRecord[];
}

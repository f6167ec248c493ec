// src/core/common/interfaces/models.ts
import { ReceiptRecord } from '../entities';

/**
 * Fields returned by the extraction service for one receipt.
 * A fresh value: never the record that was submitted.
 */
export interface ExtractionResult {
    /** Receipt date, or the 0001-01-01 sentinel when the service gave none */
    readonly date: Date;
    /** Merchant name, or "Unknown" */
    readonly name: string;
    /** NaN when absent */
    readonly total: number;
    /** NaN when absent */
    readonly tax: number;
    /** Service-reported confidence in [0, 1]; 0 when absent */
    readonly confidence: number;
}

/** A record queued for extraction together with the bytes of its file. */
export interface WorkItem {
    readonly record: ReceiptRecord;
    readonly content: Buffer;
}

/**
 * A completed extraction. `sourceFilename` is the ledger key the record was
 * requested under; `record.filename` may differ after a rename.
 */
export interface Completion {
    readonly sourceFilename: string;
    readonly record: ReceiptRecord;
}

/** Options for a single processing run */
export interface RunOptions {
    /** Rename confidently-extracted files to their canonical filename */
    readonly rename: boolean;
    /** Rewrite the ledger file; otherwise print it */
    readonly write: boolean;
}

/** Counts reported at the end of a run. */
export interface RunSummary {
    /** Work items yielded by the scanner */
    scanned: number;
    /** Directory entries the scanner passed over (confident, unsupported or untrackable) */
    skipped: number;
    /** Items actually sent to the extraction service */
    submitted: number;
    processed: number;
    failed: number;
    duplicates: number;
    renamed: number;
    ledgerWritten: boolean;
    /** Records in the merged ledger */
    records: number;
}

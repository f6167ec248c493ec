// src/core/processing/interfaces/services.ts
import { FileType } from '../../common/file-type';
import { ExtractionResult, RunOptions, RunSummary } from '../../common/interfaces/models';

/** The remote service that turns receipt bytes into fields. */
export interface IExtractionClient {
    /**
     * Submits one file for extraction.
     * @throws {ExtractionError} on a transport failure or a non-success response.
     */
    extract(content: Buffer, filename: string, filetype: FileType): Promise<ExtractionResult>;
}

export const EXTRACTION_CLIENT_TOKEN = Symbol.for('IExtractionClient');

/** Defines the contract for a complete processing run */
export interface IReceiptProcessingService {
    /**
     * Scans the source directory, extracts what needs extracting, renames
     * and persists (or prints) the merged ledger.
     * @throws {LedgerFormatError} before any remote call if the ledger is malformed.
     */
    run(options: RunOptions): Promise<RunSummary>;
}

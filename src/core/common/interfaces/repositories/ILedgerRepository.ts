// src/core/common/interfaces/repositories/ILedgerRepository.ts

import { ReceiptRecord } from '../../entities';

/**
 * Defines the contract for reading and writing the persisted ledger.
 */
export interface ILedgerRepository {
    /** Full path of the ledger file */
    readonly location: string;

    /**
     * Loads the ledger. A missing ledger file is an empty ledger.
     *
     * @returns The records keyed by filename, in file order.
     * @throws {LedgerFormatError} if the file exists but cannot be parsed.
     */
    load(): Promise<Map<string, ReceiptRecord>>;

    /**
     * Rewrites the whole ledger file with the given records, in order.
     */
    save(records: readonly ReceiptRecord[]): Promise<void>;
}

// Define a unique symbol token for DI registration
export const LEDGER_REPOSITORY_TOKEN = Symbol.for("ILedgerRepository");

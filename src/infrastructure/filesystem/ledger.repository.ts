// src/infrastructure/filesystem/ledger.repository.ts
import 'reflect-metadata';
import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { inject, injectable } from 'tsyringe';
import winston from 'winston';

// --- Infrastructure Imports ---
import { AppConfig, CONFIG_TOKEN } from '../../config';
import { LOGGER_TOKEN } from '../logger';

// --- Core Imports ---
import { ReceiptRecord } from '../../core/common/entities';
import { ILedgerRepository } from '../../core/common/interfaces/repositories';
import { LedgerCodecService } from '../../core/ledger';

// fs errors may come from another realm, so match on shape rather than instanceof
function isMissingFileError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores the ledger as a single CSV file inside the source directory.
 */
@injectable()
export class LedgerRepository implements ILedgerRepository {

    readonly location: string;

    constructor(
        @inject(CONFIG_TOKEN) config: AppConfig,
        @inject(LOGGER_TOKEN) private readonly logger: winston.Logger,
        @inject(LedgerCodecService) private readonly codec: LedgerCodecService
    ) {
        this.location = path.join(config.sourceDir, config.ledgerFilename);
    }

    async load(): Promise<Map<string, ReceiptRecord>> {
        let text: string;
        try {
            text = await readFile(this.location, 'utf8');
        } catch (error) {
            if (isMissingFileError(error)) {
                this.logger.info(`No ledger at ${this.location}, starting with an empty ledger.`);
                return new Map();
            }
            throw error;
        }

        const records = this.codec.parse(text);
        this.logger.info(`Loaded ${records.size} records from ${this.location}`);
        return records;
    }

    async save(records: readonly ReceiptRecord[]): Promise<void> {
        // A serialize failure must leave the existing file untouched
        const text = this.codec.serialize(records);
        await writeFile(this.location, text, 'utf8');
        this.logger.info(`Wrote ${records.length} records to ${this.location}`);
    }
}

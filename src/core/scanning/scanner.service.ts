// src/core/scanning/scanner.service.ts
import 'reflect-metadata'; // DI requirement
import { readdirSync, statSync } from 'fs';
import path from 'path';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';

import { AppConfig, CONFIG_TOKEN } from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { ReceiptRecord } from '../common/entities';
import { AppError } from '../common/errors';
import { FileType, isReceiptFileType } from '../common/file-type';
import { Completion } from '../common/interfaces/models';
import { ILedgerRepository, LEDGER_REPOSITORY_TOKEN } from '../common/interfaces/repositories';
import { FILE_TYPE_SNIFFER_TOKEN, IFileTypeSniffer, IScannerService } from './interfaces/services';

// Filenames with these characters cannot be stored in the ledger
const UNSAFE_FILENAME_PATTERN = /[,\r\n]/;

@injectable()
export class ScannerService implements IScannerService {

    readonly sourceDir: string;
    private readonly threshold: number;
    private readonly ledgerFilename: string;

    private ledger: Map<string, ReceiptRecord> | null = null;
    private initPromise: Promise<Map<string, ReceiptRecord>> | null = null;

    // State of the most recent scan, used by merge()
    private presentFilenames = new Set<string>();
    private listingComplete = false;
    private skipped = 0;

    constructor(
        @inject(CONFIG_TOKEN) config: AppConfig,
        @inject(LEDGER_REPOSITORY_TOKEN) private readonly repository: ILedgerRepository,
        @inject(FILE_TYPE_SNIFFER_TOKEN) private readonly sniffer: IFileTypeSniffer,
        @inject(LOGGER_TOKEN) private readonly logger: Logger
    ) {
        this.sourceDir = config.sourceDir;
        this.threshold = config.confidenceThreshold;
        this.ledgerFilename = config.ledgerFilename;
    }

    async init(): Promise<void> {
        if (this.ledger) return;

        // Concurrent callers share one load
        this.initPromise = this.initPromise ?? this.repository.load();
        try {
            this.ledger = await this.initPromise;
        } catch (error) {
            this.initPromise = null;
            throw error;
        }
    }

    get knownRecords(): ReadonlyMap<string, ReceiptRecord> {
        if (!this.ledger) {
            throw new AppError('ScannerStateError', 'Scanner used before init() loaded the ledger', 1, false);
        }
        return this.ledger;
    }

    get skippedCount(): number {
        return this.skipped;
    }

    *scan(): Generator<ReceiptRecord, void, undefined> {
        const known = this.knownRecords;

        this.presentFilenames = new Set();
        this.listingComplete = false;
        this.skipped = 0;

        this.logger.info(`Scanning ${this.sourceDir}`);

        const entries = readdirSync(this.sourceDir).sort();
        for (const filename of entries) {
            const filePath = path.join(this.sourceDir, filename);
            const logline = `${filePath}... `;

            if (filename === this.ledgerFilename) {
                continue;
            }

            if (!statSync(filePath, { throwIfNoEntry: false })?.isFile()) {
                this.skipped++;
                this.logger.debug(logline + 'not a file, skipping');
                continue;
            }

            // Present on disk whatever its type, so merge() keeps any ledger entry for it
            this.presentFilenames.add(filename);

            const sniffed = this.sniffer.sniff(filePath);
            if (!isReceiptFileType(sniffed)) {
                this.skipped++;
                this.logger.info(logline + `${sniffed} file type, skipping`);
                continue;
            }

            if (UNSAFE_FILENAME_PATTERN.test(filename)) {
                this.skipped++;
                this.logger.warn(logline + 'filename contains a comma or line break and cannot be tracked, skipping');
                continue;
            }

            const record = known.get(filename);
            if (!record) {
                this.logger.info(logline + 'new file, processing');
                yield ReceiptRecord.fresh(filename, sniffed);
                continue;
            }

            if (record.isConfident(this.threshold)) {
                this.skipped++;
                this.logger.info(logline + `known record with high confidence (${record.confidence}), skipping`);
                continue;
            }

            this.logger.info(logline + `known record with low confidence (${record.confidence ?? 'unset'}), processing`);
            // Ledger rows only know the extension; keep the sniffed type when that says nothing
            yield record.filetype === FileType.Unknown
                ? new ReceiptRecord({ ...record.toProps(), filetype: sniffed })
                : record;
        }

        this.listingComplete = true;
    }

    merge(completions: readonly Completion[]): ReceiptRecord[] {
        const merged = new Map(this.knownRecords);

        if (this.listingComplete) {
            for (const filename of merged.keys()) {
                if (!this.presentFilenames.has(filename)) {
                    this.logger.info(`${filename} is no longer in ${this.sourceDir}, dropping it from the ledger`);
                    merged.delete(filename);
                }
            }
        }

        for (const { sourceFilename, record } of completions) {
            if (sourceFilename !== record.filename) {
                merged.delete(sourceFilename);
            }
            merged.set(record.filename, record);
        }

        return [...merged.values()];
    }
}

// src/core/processing/receipt-processing.service.ts
import 'reflect-metadata'; // DI requirement
import { createHash } from 'crypto';
import { readFile, rename, stat } from 'fs/promises';
import path from 'path';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';

import { AppConfig, CONFIG_TOKEN } from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { ReceiptRecord } from '../common/entities';
import { Completion, RunOptions, RunSummary, WorkItem } from '../common/interfaces/models';
import { ILedgerRepository, LEDGER_REPOSITORY_TOKEN } from '../common/interfaces/repositories';
import { chunk, toError } from '../common/utils';
import { LedgerCodecService } from '../ledger';
import { IScannerService, ScannerService } from '../scanning';
import { EXTRACTION_CLIENT_TOKEN, IExtractionClient, IReceiptProcessingService } from './interfaces/services';

export const OUTPUT_STREAM_TOKEN = Symbol.for('OutputStream');

async function pathExists(filePath: string): Promise<boolean> {
    try {
        await stat(filePath);
        return true;
    } catch {
        return false;
    }
}

@injectable()
export class ReceiptProcessingService implements IReceiptProcessingService {

    private readonly sourceDir: string;
    private readonly threshold: number;
    private readonly concurrency: number;

    constructor(
        @inject(CONFIG_TOKEN) config: AppConfig,
        @inject(ScannerService) private readonly scanner: IScannerService,
        @inject(EXTRACTION_CLIENT_TOKEN) private readonly client: IExtractionClient,
        @inject(LEDGER_REPOSITORY_TOKEN) private readonly repository: ILedgerRepository,
        @inject(LedgerCodecService) private readonly codec: LedgerCodecService,
        @inject(OUTPUT_STREAM_TOKEN) private readonly output: NodeJS.WritableStream,
        @inject(LOGGER_TOKEN) private readonly logger: Logger
    ) {
        this.sourceDir = config.sourceDir;
        this.threshold = config.confidenceThreshold;
        this.concurrency = config.extraction.concurrency;
    }

    async run(options: RunOptions): Promise<RunSummary> {
        const summary: RunSummary = {
            scanned: 0,
            skipped: 0,
            submitted: 0,
            processed: 0,
            failed: 0,
            duplicates: 0,
            renamed: 0,
            ledgerWritten: false,
            records: 0,
        };

        this.logger.info(`Using source directory ${this.sourceDir}`);

        // --- 1. Load the ledger; a malformed ledger aborts before any remote call ---
        await this.scanner.init();

        // --- 2. Collect work items ---
        const workItems = await this.collectWorkItems(summary);
        summary.skipped = this.scanner.skippedCount;

        // --- 3. Extract ---
        let completions = await this.extractAll(workItems, summary);

        // --- 4. Rename ---
        if (options.rename && completions.length > 0) {
            if (!options.write) {
                this.logger.warn('Renaming without --write: the new filenames will not be recorded in the ledger');
            }
            completions = await this.renameAll(completions, summary);
        }

        // --- 5. Merge and persist ---
        const records = this.scanner.merge(completions);
        summary.records = records.length;

        if (options.write) {
            await this.repository.save(records);
            summary.ledgerWritten = true;
        } else {
            this.logger.info('Records:');
            this.output.write(this.codec.serialize(records));
        }

        this.logger.info(
            `Run complete. Scanned: ${summary.scanned}, Skipped: ${summary.skipped}, Submitted: ${summary.submitted}, Processed: ${summary.processed}, ` +
            `Failed: ${summary.failed}, Duplicates: ${summary.duplicates}, Renamed: ${summary.renamed}`
        );
        return summary;
    }

    /** Reads every scanned file, dropping files whose content was already seen in this run. */
    private async collectWorkItems(summary: RunSummary): Promise<WorkItem[]> {
        const workItems: WorkItem[] = [];
        const seenDigests = new Map<string, string>();

        for (const record of this.scanner.scan()) {
            summary.scanned++;

            let content: Buffer;
            try {
                content = await readFile(path.join(this.sourceDir, record.filename));
            } catch (error) {
                summary.failed++;
                this.logger.error(`Failed to read ${record.filename}: ${toError(error).message}`);
                continue;
            }

            const digest = createHash('sha256').update(content).digest('hex');
            const original = seenDigests.get(digest);
            if (original !== undefined) {
                summary.duplicates++;
                this.logger.warn(`Skipping ${record.filename} as it is a duplicate of ${original}`);
                continue;
            }
            seenDigests.set(digest, record.filename);

            workItems.push({ record, content });
        }

        return workItems;
    }

    /** Submits work items in batches; a failed item is logged and left out. */
    private async extractAll(workItems: readonly WorkItem[], summary: RunSummary): Promise<Completion[]> {
        const completions: Completion[] = [];
        summary.submitted = workItems.length;

        if (workItems.length > 0) {
            this.logger.info(`Submitting ${workItems.length} files for extraction (${this.concurrency} at a time)`);
        }

        for (const batch of chunk(workItems, this.concurrency)) {
            const settled = await Promise.allSettled(
                batch.map(item => this.client.extract(item.content, item.record.filename, item.record.filetype))
            );

            settled.forEach((result, index) => {
                const { record } = batch[index];
                if (result.status === 'fulfilled') {
                    summary.processed++;
                    completions.push({
                        sourceFilename: record.filename,
                        record: record.applyExtraction(result.value),
                    });
                } else {
                    summary.failed++;
                    const error = toError(result.reason);
                    this.logger.error(`Failed to process ${record.filename}: ${error.message}`, { stack: error.stack });
                }
            });
        }

        return completions;
    }

    /** Renames confidently-extracted files to their canonical name on disk. */
    private async renameAll(completions: readonly Completion[], summary: RunSummary): Promise<Completion[]> {
        this.logger.info('Renaming files');
        const result: Completion[] = [];

        for (const completion of completions) {
            const current: ReceiptRecord = completion.record;
            const renamed = current.generateNewFilename(this.threshold);

            if (renamed.filename === current.filename) {
                this.logger.info(`Skipped renaming ${current.filename}`);
                result.push(completion);
                continue;
            }

            // The merchant name may carry path separators; the new name must stay in sourceDir
            if (path.basename(renamed.filename) !== renamed.filename || renamed.filename.includes('\\')) {
                this.logger.warn(`Not renaming ${current.filename}: ${JSON.stringify(renamed.filename)} is not a plain filename`);
                result.push(completion);
                continue;
            }

            const from = path.join(this.sourceDir, current.filename);
            const to = path.join(this.sourceDir, renamed.filename);

            if (await pathExists(to)) {
                this.logger.warn(`Not renaming ${current.filename}: ${renamed.filename} already exists`);
                result.push(completion);
                continue;
            }

            try {
                await rename(from, to);
                summary.renamed++;
                this.logger.info(`Renamed ${from} to ${to}`);
                result.push({ sourceFilename: completion.sourceFilename, record: renamed });
            } catch (error) {
                this.logger.error(`Failed to rename ${current.filename}: ${toError(error).message}`);
                result.push(completion);
            }
        }

        return result;
    }
}

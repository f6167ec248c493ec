// src/infrastructure/cli/program.ts
import { Command, InvalidArgumentError } from 'commander';

/** Options as parsed by commander, before they reach the configuration. */
export interface CliOptions {
    sourceDir: string;
    apiKey?: string;
    rename: boolean;
    write: boolean;
    confidence?: number;
    concurrency?: number;
    logLevel?: string;
}

export function parseThreshold(value: string): number {
    const threshold = Number(value);
    if (value.trim() === '' || isNaN(threshold) || threshold < 0 || threshold > 1) {
        throw new InvalidArgumentError('Expected a number between 0 and 1.');
    }
    return threshold;
}

export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

/**
 * Builds the `receipt-ledger` command. The action receives the parsed options.
 */
export function buildProgram(action: (options: CliOptions) => Promise<void>): Command {
    const program = new Command();

    program
        .name('receipt-ledger')
        .description('Extract receipt data from a directory of images into a CSV ledger')
        .version('1.0.0')
        .requiredOption('--source-dir <dir>', 'Directory to scan for receipts')
        .option('--api-key <key>', 'Taggun API key (default: TAGGUN_API_KEY or KEY from the environment)')
        .option('--rename', 'Rename files to {date}_{vendor}_{nonce}.{type}', false)
        .option('--write', 'Write records to records.csv in the source directory instead of printing them', false)
        .option('--confidence <threshold>', 'Minimum confidence to skip and rename a receipt (default: 0.8)', parseThreshold)
        .option('--concurrency <n>', 'Extraction requests in flight at once (default: 10)', parsePositiveInt)
        .option('--log-level <level>', 'Log level (error, warn, info, debug)')
        .action(async (options: CliOptions) => {
            await action(options);
        });

    return program;
}

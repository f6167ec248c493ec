#!/usr/bin/env node
// src/main.ts

import 'reflect-metadata';
import dotenv from 'dotenv';
import { stat } from 'fs/promises';
import { container } from 'tsyringe';
import { Logger } from 'winston';

import { describeConfig, loadConfig } from './config';
import { AppError, ConfigurationError } from './core/common/errors';
import { ReceiptProcessingService } from './core/processing';
import { buildProgram, CliOptions } from './infrastructure/cli/program';
import { createAppLogger, LOGGER_TOKEN } from './infrastructure/logger';
import { registerDependencies } from './register';

async function assertDirectory(dir: string): Promise<void> {
    const stats = await stat(dir).catch(() => null);
    if (!stats) {
        throw new ConfigurationError(`Source directory ${dir} does not exist`);
    }
    if (!stats.isDirectory()) {
        throw new ConfigurationError(`Source directory ${dir} is not a directory`);
    }
}

async function runCommand(options: CliOptions): Promise<void> {
    try {
        const config = loadConfig(process.env, {
            sourceDir: options.sourceDir,
            apiKey: options.apiKey,
            confidenceThreshold: options.confidence,
            concurrency: options.concurrency,
            logLevel: options.logLevel,
        });
        await assertDirectory(config.sourceDir);

        const logger = createAppLogger(config);
        describeConfig(config).forEach(line => logger.debug(line));

        registerDependencies(config, logger);

        const service = container.resolve(ReceiptProcessingService);
        const summary = await service.run({ rename: options.rename, write: options.write });
        if (summary.failed > 0) {
            logger.warn(`${summary.failed} file(s) could not be processed and will be retried on the next run`);
        }
    } catch (error) {
        const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
        // Use logger if available, otherwise console
        if (container.isRegistered(LOGGER_TOKEN)) {
            container.resolve<Logger>(LOGGER_TOKEN).error(`Run failed: ${message}`, {
                stack: error instanceof Error ? error.stack : undefined,
            });
        } else {
            console.error(`Run failed: ${message}`);
        }
        process.exitCode = error instanceof AppError ? error.exitCode : 1;
    }
}

dotenv.config();

buildProgram(runCommand)
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        console.error('Error:', error);
        process.exitCode = 1;
    });

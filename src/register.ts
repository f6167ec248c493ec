// src/register.ts
import 'reflect-metadata';
import { container, DependencyContainer } from "tsyringe";
import { Logger } from 'winston';
import { AppConfig, CONFIG_TOKEN } from "./config";
import { LEDGER_REPOSITORY_TOKEN } from "./core/common/interfaces/repositories";
import { LedgerCodecService } from "./core/ledger";
import { EXTRACTION_CLIENT_TOKEN, OUTPUT_STREAM_TOKEN, ReceiptProcessingService } from "./core/processing";
import { FILE_TYPE_SNIFFER_TOKEN, ScannerService } from "./core/scanning";
import { createHttpClient, HTTP_CLIENT_TOKEN, TaggunExtractionClient } from "./infrastructure/extraction/taggun-extraction.client";
import { FileTypeSniffer } from "./infrastructure/filesystem/file-type.sniffer";
import { LedgerRepository } from "./infrastructure/filesystem/ledger.repository";
import { createAppLogger, LOGGER_TOKEN } from "./infrastructure/logger";

/**
 * Wires configuration, logger and services into the container.
 * Config and logger are passed in explicitly; nothing reads the environment here.
 */
export function registerDependencies(
    config: AppConfig,
    logger: Logger = createAppLogger(config),
    target: DependencyContainer = container
): DependencyContainer {
    // IMPORTANT: Register config and logger FIRST
    target.register(CONFIG_TOKEN, { useValue: config });
    target.register(LOGGER_TOKEN, { useValue: logger });
    logger.debug("Registered: CONFIG_TOKEN, LOGGER_TOKEN");

    // Infrastructure
    target.register(HTTP_CLIENT_TOKEN, { useValue: createHttpClient(config) });
    target.register(OUTPUT_STREAM_TOKEN, { useValue: process.stdout });
    target.registerSingleton(LEDGER_REPOSITORY_TOKEN, LedgerRepository);
    target.registerSingleton(FILE_TYPE_SNIFFER_TOKEN, FileTypeSniffer);
    target.registerSingleton(EXTRACTION_CLIENT_TOKEN, TaggunExtractionClient);
    logger.debug("Registered: HTTP client, output stream, ledger repository, file type sniffer, extraction client");

    // Core services
    target.registerSingleton(LedgerCodecService);
    target.registerSingleton(ScannerService);
    target.registerSingleton(ReceiptProcessingService);
    logger.debug("Registered: LedgerCodecService, ScannerService, ReceiptProcessingService (Singletons)");

    return target;
}

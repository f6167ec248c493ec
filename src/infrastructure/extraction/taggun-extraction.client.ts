// src/infrastructure/extraction/taggun-extraction.client.ts
import 'reflect-metadata';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';

import { AppConfig, CONFIG_TOKEN } from '../../config';
import { ExtractionError } from '../../core/common/errors';
import { FileType, fileTypeMimeType } from '../../core/common/file-type';
import { ExtractionResult } from '../../core/common/interfaces/models';
import { toError } from '../../core/common/utils';
import { IExtractionClient } from '../../core/processing/interfaces/services';
import { LOGGER_TOKEN } from '../logger';
import { toExtractionResult } from './taggun-response.mapper';

export const HTTP_CLIENT_TOKEN = Symbol.for('HttpClient');

export const RECEIPT_ENDPOINT = '/api/receipt/v1/verbose/file';

/** Creates the axios instance used to reach the extraction service. */
export function createHttpClient(config: AppConfig): AxiosInstance {
    return axios.create({
        baseURL: config.extraction.baseUrl,
        timeout: config.extraction.timeoutMs,
        headers: {
            accept: 'application/json',
        },
        // Status codes are checked by the client itself
        validateStatus: () => true,
    });
}

function describeBody(data: unknown): string {
    if (typeof data === 'string') return data.slice(0, 200);
    try {
        return JSON.stringify(data).slice(0, 200);
    } catch {
        return String(data);
    }
}

/**
 * Submits receipt files to Taggun's verbose file endpoint.
 */
@injectable()
export class TaggunExtractionClient implements IExtractionClient {

    private readonly apiKey: string;
    private readonly formFields: { [field: string]: string };

    constructor(
        @inject(CONFIG_TOKEN) config: AppConfig,
        @inject(HTTP_CLIENT_TOKEN) private readonly http: AxiosInstance,
        @inject(LOGGER_TOKEN) private readonly logger: Logger
    ) {
        this.apiKey = config.extraction.apiKey;
        this.formFields = {
            refresh: 'true',
            incognito: 'true',
            extractTime: 'false',
            extractLineItems: 'false',
            language: config.extraction.language,
        };
    }

    async extract(content: Buffer, filename: string, filetype: FileType): Promise<ExtractionResult> {
        const form = new FormData();
        form.append('file', new Blob([new Uint8Array(content)], { type: fileTypeMimeType(filetype) }), filename);
        for (const [field, value] of Object.entries(this.formFields)) {
            form.append(field, value);
        }

        this.logger.debug(`Submitting ${filename} (${content.length} bytes) for extraction`);

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.post<unknown>(RECEIPT_ENDPOINT, form, {
                headers: {
                    accept: 'application/json',
                    apikey: this.apiKey,
                },
            });
        } catch (error) {
            throw new ExtractionError(filename, 'Request to extraction service failed', undefined, toError(error));
        }

        if (response.status !== 200) {
            throw new ExtractionError(
                filename,
                `Extraction service responded with ${response.status}: ${describeBody(response.data)}`,
                response.status
            );
        }

        const result = toExtractionResult(response.data);
        this.logger.debug(`Extracted ${filename}: ${result.name} (confidence ${result.confidence})`);
        return result;
    }
}

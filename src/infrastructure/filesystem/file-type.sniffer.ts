// src/infrastructure/filesystem/file-type.sniffer.ts
import 'reflect-metadata';
import { closeSync, openSync, readSync } from 'fs';
import path from 'path';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import { FileType, fileTypeFromExtension } from '../../core/common/file-type';
import { IFileTypeSniffer } from '../../core/scanning/interfaces/services';
import { LOGGER_TOKEN } from '../logger';

const HEADER_LENGTH = 16;

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const JPG_SIGNATURE = Buffer.from([0xff, 0xd8, 0xff]);
const GIF87_SIGNATURE = Buffer.from('GIF87a', 'ascii');
const GIF89_SIGNATURE = Buffer.from('GIF89a', 'ascii');
const PDF_SIGNATURE = Buffer.from('%PDF-', 'ascii');
const HEIC_BRAND = Buffer.from('ftypheic', 'ascii');

function startsWith(header: Buffer, signature: Buffer): boolean {
    return header.length >= signature.length && header.subarray(0, signature.length).equals(signature);
}

/** Identifies a file type from its first bytes. */
export function fileTypeFromSignature(header: Buffer): FileType {
    if (startsWith(header, PNG_SIGNATURE)) return FileType.Png;
    if (startsWith(header, JPG_SIGNATURE)) return FileType.Jpg;
    if (startsWith(header, GIF87_SIGNATURE) || startsWith(header, GIF89_SIGNATURE)) return FileType.Gif;
    if (startsWith(header, PDF_SIGNATURE)) return FileType.Pdf;
    if (header.subarray(4, 12).equals(HEIC_BRAND)) return FileType.Heic;
    return FileType.Unknown;
}

/**
 * Extension first; magic bytes only when the extension is missing or unrecognised.
 */
@singleton()
@injectable()
export class FileTypeSniffer implements IFileTypeSniffer {

    constructor(@inject(LOGGER_TOKEN) private logger: Logger) {}

    sniff(filePath: string): FileType {
        const byExtension = fileTypeFromExtension(path.extname(filePath));
        if (byExtension !== FileType.Unknown) {
            return byExtension;
        }

        try {
            return fileTypeFromSignature(this.readHeader(filePath));
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.warn(`Could not read ${filePath} to determine its type: ${message}`);
            return FileType.Unknown;
        }
    }

    private readHeader(filePath: string): Buffer {
        const fd = openSync(filePath, 'r');
        try {
            const header = Buffer.alloc(HEADER_LENGTH);
            const bytesRead = readSync(fd, header, 0, HEADER_LENGTH, 0);
            return header.subarray(0, bytesRead);
        } finally {
            closeSync(fd);
        }
    }
}

// src/core/ledger/ledger-codec.service.ts
import 'reflect-metadata'; // DI requirement
import { injectable, singleton } from 'tsyringe';

import { ReceiptRecord } from '../common/entities';
import { LedgerFormatError } from '../common/errors';
import { fileTypeFromFilename } from '../common/file-type';
import { formatIsoDate, parseIsoDate } from '../common/utils';
import { ILedgerCodecService, LEDGER_FIELDS, LEDGER_HEADER } from './interfaces/services';

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DELIMITER_PATTERN = /[,\r\n]/;

function parseDateField(value: string, lineNumber: number): Date | null {
    if (value === '') return null;
    const date = parseIsoDate(value);
    if (!date) {
        throw new LedgerFormatError(`Invalid date "${value}"`, lineNumber);
    }
    return date;
}

function parseFloatField(field: string, value: string, lineNumber: number): number | null {
    if (value === '') return null;
    if (value === 'NaN') return NaN;
    if (value === 'Infinity') return Infinity;
    if (value === '-Infinity') return -Infinity;
    if (!FLOAT_PATTERN.test(value)) {
        throw new LedgerFormatError(`Invalid number "${value}" for ${field}`, lineNumber);
    }
    return parseFloat(value);
}

function formatFloatField(value: number | null): string {
    return value === null ? '' : String(value);
}

/**
 * Reads and writes the flat `date,name,total,tax,confidence,filename` format.
 * No quoting: values containing delimiters are refused on write.
 */
@singleton()
@injectable()
export class LedgerCodecService implements ILedgerCodecService {

    parse(text: string): Map<string, ReceiptRecord> {
        const lines = text.split('\n').map(line => line.replace(/\r$/, ''));

        if (lines[0] !== LEDGER_HEADER) {
            throw new LedgerFormatError(`Unexpected ledger header "${lines[0]}", expected "${LEDGER_HEADER}"`);
        }

        const records = new Map<string, ReceiptRecord>();

        for (let index = 1; index < lines.length; index++) {
            const line = lines[index];
            const lineNumber = index + 1;
            if (line.trim() === '') continue;

            const values = line.split(',');
            if (values.length !== LEDGER_FIELDS.length) {
                throw new LedgerFormatError(`Expected ${LEDGER_FIELDS.length} fields, found ${values.length}`, lineNumber);
            }

            const [date, name, total, tax, confidence, filename] = values;
            if (filename === '') {
                throw new LedgerFormatError('Missing filename', lineNumber);
            }

            records.set(filename, new ReceiptRecord({
                filename,
                filetype: fileTypeFromFilename(filename),
                date: parseDateField(date, lineNumber),
                name: name === '' ? null : name,
                total: parseFloatField('total', total, lineNumber),
                tax: parseFloatField('tax', tax, lineNumber),
                confidence: parseFloatField('confidence', confidence, lineNumber),
            }));
        }

        return records;
    }

    serialize(records: Iterable<ReceiptRecord>): string {
        const lines = [LEDGER_HEADER];

        for (const record of records) {
            const values = [
                record.date ? formatIsoDate(record.date) : '',
                record.name ?? '',
                formatFloatField(record.total),
                formatFloatField(record.tax),
                formatFloatField(record.confidence),
                record.filename,
            ];

            const unsafe = values.findIndex(value => DELIMITER_PATTERN.test(value));
            if (unsafe !== -1) {
                throw new LedgerFormatError(
                    `Field "${LEDGER_FIELDS[unsafe]}" of ${JSON.stringify(record.filename)} contains a delimiter and cannot be written`
                );
            }

            lines.push(values.join(','));
        }

        return lines.join('\n') + '\n';
    }
}

// src/core/common/entities/receipt-record.entity.ts
import { ValidationError } from '../errors';
import { FileType, fileTypeSuffix } from '../file-type';
import { ExtractionResult } from '../interfaces/models';
import { formatDateToMMDDYYYY, generateNonce } from '../utils';

export interface ReceiptRecordProps {
    filename: string;
    filetype: FileType;
    date: Date | null;
    name: string | null;
    total: number | null;
    tax: number | null;
    confidence: number | null;
}

/** The three underscore-separated parts of a canonical filename stem. */
export interface CanonicalFilenameParts {
    date: string;
    name: string;
    nonce: string;
}

/**
 * Splits a filename (extension ignored) into its canonical parts.
 * Returns null unless the stem has exactly three `_`-separated parts.
 */
export function parseCanonicalFilename(filename: string): CanonicalFilenameParts | null {
    const dot = filename.lastIndexOf('.');
    const stem = dot > 0 ? filename.slice(0, dot) : filename;
    const parts = stem.split('_');
    if (parts.length !== 3) return null;
    const [date, name, nonce] = parts;
    return { date, name, nonce };
}

/**
 * One receipt: its current filename plus the fields extracted from it.
 * Instances are immutable; operations that change a record return a new one.
 */
export class ReceiptRecord {
    /** Current on-disk name, unique key within the ledger */
    readonly filename: string;
    readonly filetype: FileType;
    /** Calendar date at UTC midnight */
    readonly date: Date | null;
    /** Merchant name as reported by the service */
    readonly name: string | null;
    readonly total: number | null;
    readonly tax: number | null;
    readonly confidence: number | null;

    constructor(props: ReceiptRecordProps) {
        this.filename = props.filename;
        this.filetype = props.filetype;
        this.date = props.date;
        this.name = props.name;
        this.total = props.total;
        this.tax = props.tax;
        this.confidence = props.confidence;
    }

    /** A record for a file the ledger has never seen. */
    static fresh(filename: string, filetype: FileType): ReceiptRecord {
        return new ReceiptRecord({
            filename,
            filetype,
            date: null,
            name: null,
            total: null,
            tax: null,
            confidence: null,
        });
    }

    toProps(): ReceiptRecordProps {
        return {
            filename: this.filename,
            filetype: this.filetype,
            date: this.date,
            name: this.name,
            total: this.total,
            tax: this.tax,
            confidence: this.confidence,
        };
    }

    shortDate(): string {
        if (!this.date) {
            throw new ValidationError(`Record ${this.filename} has no date`);
        }
        return formatDateToMMDDYYYY(this.date);
    }

    shortName(): string {
        if (this.name === null) {
            throw new ValidationError(`Record ${this.filename} has no merchant name`);
        }
        return this.name.trim().replace(/ /g, '').toLowerCase();
    }

    /** Unset confidence counts as below any threshold. */
    isConfident(threshold: number): boolean {
        return this.confidence !== null && this.confidence >= threshold;
    }

    /**
     * True when the record is confident enough to be renamed and its current
     * filename does not already carry its date and merchant prefix.
     */
    needsNewFilename(threshold: number): boolean {
        if (!this.isConfident(threshold)) return false;

        const parts = parseCanonicalFilename(this.filename);
        if (!parts) return true;

        return parts.date !== this.shortDate() || parts.name !== this.shortName();
    }

    /**
     * Returns this record renamed to `{MMDDYYYY}_{merchant}_{nonce}{.ext}`
     * when `needsNewFilename` holds, otherwise the record itself.
     */
    generateNewFilename(threshold: number, nonce: string = generateNonce()): ReceiptRecord {
        if (!this.needsNewFilename(threshold)) return this;

        return this.withFilename(`${this.shortDate()}_${this.shortName()}_${nonce}${fileTypeSuffix(this.filetype)}`);
    }

    withFilename(filename: string): ReceiptRecord {
        return new ReceiptRecord({ ...this.toProps(), filename });
    }

    /** A new record carrying the extracted fields; filename and filetype are kept. */
    applyExtraction(result: ExtractionResult): ReceiptRecord {
        return new ReceiptRecord({
            filename: this.filename,
            filetype: this.filetype,
            date: result.date,
            name: result.name,
            total: result.total,
            tax: result.tax,
            confidence: result.confidence,
        });
    }
}

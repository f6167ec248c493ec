// src/core/common/file-type.ts

/** File types the tool recognises. `Csv` is the ledger itself, never a receipt. */
export enum FileType {
    Unknown = 'unknown',
    Pdf = 'pdf',
    Jpg = 'jpg',
    Png = 'png',
    Gif = 'gif',
    Heic = 'heic',
    Csv = 'csv',
}

const EXTENSION_MAP: { [extension: string]: FileType } = {
    'pdf': FileType.Pdf,
    'jpg': FileType.Jpg,
    'jpeg': FileType.Jpg,
    'png': FileType.Png,
    'gif': FileType.Gif,
    'heic': FileType.Heic,
    'csv': FileType.Csv,
};

const MIME_TYPES: { [type in FileType]: string } = {
    [FileType.Unknown]: 'application/octet-stream',
    [FileType.Pdf]: 'application/pdf',
    [FileType.Jpg]: 'image/jpeg',
    [FileType.Png]: 'image/png',
    [FileType.Gif]: 'image/gif',
    [FileType.Heic]: 'image/heic',
    [FileType.Csv]: 'text/csv',
};

/** Maps an extension (with or without the leading dot, any case) to a FileType. */
export function fileTypeFromExtension(extension: string): FileType {
    const normalized = extension.replace(/^\./, '').toLowerCase();
    return EXTENSION_MAP[normalized] ?? FileType.Unknown;
}

/** Maps a filename to a FileType by its last extension. */
export function fileTypeFromFilename(filename: string): FileType {
    const dot = filename.lastIndexOf('.');
    if (dot <= 0) return FileType.Unknown;
    return fileTypeFromExtension(filename.slice(dot + 1));
}

/** `.pdf`, `.jpg`, ... or an empty string for `Unknown`. */
export function fileTypeSuffix(type: FileType): string {
    return type === FileType.Unknown ? '' : `.${type}`;
}

export function fileTypeMimeType(type: FileType): string {
    return MIME_TYPES[type];
}

/** True for the types that are submitted for extraction. */
export function isReceiptFileType(type: FileType): boolean {
    return type !== FileType.Unknown && type !== FileType.Csv;
}

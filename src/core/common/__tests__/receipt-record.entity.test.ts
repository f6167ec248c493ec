import { calendarDate, makeRecord } from '../../../__tests__/test-utils';
import { parseCanonicalFilename, ReceiptRecord } from '../entities';
import { ValidationError } from '../errors';
import { FileType } from '../file-type';

describe('ReceiptRecord', () => {
  describe('shortDate / shortName', () => {
    test('formats the date as MMDDYYYY', () => {
      expect(makeRecord({ date: calendarDate(2024, 1, 15) }).shortDate()).toBe('01152024');
      expect(makeRecord({ date: calendarDate(2023, 12, 3) }).shortDate()).toBe('12032023');
    });

    test('pads the sentinel year to four digits', () => {
      expect(makeRecord({ date: calendarDate(1, 1, 1) }).shortDate()).toBe('01010001');
    });

    test('throws a ValidationError when the date is unset', () => {
      const record = ReceiptRecord.fresh('receipt.pdf', FileType.Pdf);
      expect(() => record.shortDate()).toThrow(ValidationError);
    });

    test('strips, removes spaces and lower-cases the merchant name', () => {
      expect(makeRecord({ name: '  Best Buy  ' }).shortName()).toBe('bestbuy');
      expect(makeRecord({ name: 'Trader Joe\'s Market' }).shortName()).toBe('traderjoe\'smarket');
    });

    test('throws a ValidationError when the name is unset', () => {
      expect(() => makeRecord({ name: null }).shortName()).toThrow(ValidationError);
    });
  });

  describe('parseCanonicalFilename', () => {
    test('splits a three-part stem and ignores the extension', () => {
      expect(parseCanonicalFilename('01152024_bestbuy_a1b2c3d4.jpg')).toEqual({
        date: '01152024',
        name: 'bestbuy',
        nonce: 'a1b2c3d4',
      });
    });

    test('returns null for any other shape', () => {
      expect(parseCanonicalFilename('receipt.pdf')).toBeNull();
      expect(parseCanonicalFilename('IMG_0001.jpg')).toBeNull();
      expect(parseCanonicalFilename('a_b_c_d.png')).toBeNull();
    });
  });

  describe('needsNewFilename', () => {
    test('is false below the threshold whatever the filename looks like', () => {
      for (const filename of ['receipt.pdf', 'IMG_0001.jpg', '01152024_target_a1b2c3d4.jpg', 'a_b_c_d.png']) {
        expect(makeRecord({ filename, confidence: 0.5 }).needsNewFilename(0.8)).toBe(false);
      }
    });

    test('is false when confidence is unset', () => {
      expect(makeRecord({ filename: 'receipt.pdf', confidence: null }).needsNewFilename(0)).toBe(false);
    });

    test('is false for a filename already canonical for the record', () => {
      const record = makeRecord({ filename: '01152024_bestbuy_a1b2c3d4.jpg', confidence: 0.93 });
      expect(record.needsNewFilename(0.8)).toBe(false);
    });

    test('treats a confidence equal to the threshold as confident', () => {
      expect(makeRecord({ filename: 'receipt.jpg', confidence: 0.8 }).needsNewFilename(0.8)).toBe(true);
    });

    test('is true when the shape is wrong or the prefix does not match', () => {
      expect(makeRecord({ filename: 'receipt.jpg' }).needsNewFilename(0.8)).toBe(true);
      expect(makeRecord({ filename: 'IMG_0001.jpg' }).needsNewFilename(0.8)).toBe(true);
      expect(makeRecord({ filename: '01152024_target_a1b2c3d4.jpg' }).needsNewFilename(0.8)).toBe(true);
      expect(makeRecord({ filename: '01162024_bestbuy_a1b2c3d4.jpg' }).needsNewFilename(0.8)).toBe(true);
    });
  });

  describe('generateNewFilename', () => {
    const extracted = ReceiptRecord.fresh('receipt.pdf', FileType.Pdf).applyExtraction({
      date: calendarDate(2024, 1, 15),
      name: 'Best Buy',
      total: 123.45,
      tax: 10.12,
      confidence: 0.93,
    });

    test('builds date, normalized merchant, nonce and the filetype suffix', () => {
      expect(extracted.generateNewFilename(0.8, 'deadbeef').filename).toBe('01152024_bestbuy_deadbeef.pdf');
    });

    test('uses an 8 hex character nonce by default', () => {
      expect(extracted.generateNewFilename(0.8).filename).toMatch(/^01152024_bestbuy_[0-9a-f]{8}\.pdf$/);
    });

    test('does not touch the original record', () => {
      extracted.generateNewFilename(0.8, 'deadbeef');
      expect(extracted.filename).toBe('receipt.pdf');
    });

    test('is idempotent once the filename is canonical', () => {
      const renamed = extracted.generateNewFilename(0.8, 'deadbeef');
      expect(renamed.generateNewFilename(0.8)).toBe(renamed);
    });

    test('returns the same record below the threshold', () => {
      expect(extracted.generateNewFilename(0.95)).toBe(extracted);
    });

    test('writes jpeg files with the .jpg suffix', () => {
      const record = makeRecord({ filename: 'scan.jpeg', filetype: FileType.Jpg });
      expect(record.generateNewFilename(0.8, '00000000').filename).toBe('01152024_bestbuy_00000000.jpg');
    });
  });

  describe('applyExtraction', () => {
    test('returns a new record with the extracted fields and the same filename', () => {
      const fresh = ReceiptRecord.fresh('receipt.pdf', FileType.Pdf);
      const completed = fresh.applyExtraction({
        date: calendarDate(2024, 1, 15),
        name: 'Best Buy',
        total: 20,
        tax: NaN,
        confidence: 0.4,
      });

      expect(completed).not.toBe(fresh);
      expect(completed.filename).toBe('receipt.pdf');
      expect(completed.filetype).toBe(FileType.Pdf);
      expect(completed.name).toBe('Best Buy');
      expect(completed.total).toBe(20);
      expect(completed.tax).toBeNaN();
      expect(completed.confidence).toBe(0.4);
      expect(fresh.confidence).toBeNull();
      expect(fresh.name).toBeNull();
    });
  });
});

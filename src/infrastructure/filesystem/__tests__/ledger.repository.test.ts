import { mkdirSync, readFileSync } from 'fs';
import path from 'path';
import { createTempDir, makeRecord, removeTempDir, testConfig, writeFiles } from '../../../__tests__/test-utils';
import { LedgerFormatError } from '../../../core/common/errors';
import { LEDGER_HEADER, LedgerCodecService } from '../../../core/ledger';
import { createSilentLogger } from '../../logger';
import { LedgerRepository } from '../ledger.repository';

describe('LedgerRepository', () => {
  let dir: string;
  let repository: LedgerRepository;

  beforeEach(() => {
    dir = createTempDir();
    repository = new LedgerRepository(testConfig(dir), createSilentLogger(), new LedgerCodecService());
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  test('lives at records.csv inside the source directory', () => {
    expect(repository.location).toBe(path.join(dir, 'records.csv'));
  });

  test('loads an empty ledger when the file does not exist', async () => {
    expect((await repository.load()).size).toBe(0);
  });

  test('rethrows read failures other than a missing file', async () => {
    mkdirSync(repository.location);
    await expect(repository.load()).rejects.toMatchObject({ code: 'EISDIR' });
  });

  test('saves and loads records', async () => {
    const record = makeRecord();

    await repository.save([record]);
    const loaded = await repository.load();

    expect(readFileSync(repository.location, 'utf8')).toBe(
      `${LEDGER_HEADER}\n2024-01-15,BestBuy,123.45,10.12,0.93,01152024_bestbuy_a1b2c3d4.jpg\n`
    );
    expect(loaded.get(record.filename)?.toProps()).toEqual(record.toProps());
  });

  test('leaves the existing file untouched when a record cannot be written', async () => {
    writeFiles(dir, { 'records.csv': `${LEDGER_HEADER}\n` });

    await expect(repository.save([makeRecord({ name: 'Smith, Jones' })])).rejects.toBeInstanceOf(LedgerFormatError);

    expect(readFileSync(repository.location, 'utf8')).toBe(`${LEDGER_HEADER}\n`);
  });
});

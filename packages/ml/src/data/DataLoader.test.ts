import * as path from 'path';
import { MLError, MLErrorCode } from '@creditops/types';
import { loadDataset, parseDataset, toLabeledRecords } from './DataLoader';

const DATASET = path.resolve(__dirname, '../../../../data/credit_default.csv');

const HEADER =
  'account_id,amount_6,pur_6,avg_pur_amt_6,avg_interval_pur_6,credit_limit,marital_status,sex,education,income,age,bad_ind';

describe('parseDataset', () => {
  it('should parse a header and keep cells as text', () => {
    const table = parseDataset('id,amount,city\n007,12.5,Lyon\nx2,7,Oslo\n');

    expect(table.columns).toEqual(['id', 'amount', 'city']);
    expect(table.rows).toEqual([
      { id: '007', amount: '12.5', city: 'Lyon' },
      { id: 'x2', amount: '7', city: 'Oslo' },
    ]);
  });

  it('should honour a custom delimiter', () => {
    const table = parseDataset('a;b\n1;2\n', { delimiter: ';' });

    expect(table.rows).toEqual([{ a: '1', b: '2' }]);
  });

  it('should keep empty cells as empty strings', () => {
    const table = parseDataset('a,b\n1,\n');

    expect(table.rows).toEqual([{ a: '1', b: '' }]);
  });

  it('should reject rows whose width differs from the header', () => {
    expect(() => parseDataset('a,b\n1,2,3\n')).toThrow('Row 2 has 3 fields, expected 2');
  });

  it('should reject an empty file', () => {
    expect(() => parseDataset('')).toThrow(MLError);
  });

  it('should reject duplicate header columns', () => {
    expect(() => parseDataset('a,a\n1,2\n')).toThrow('Dataset header has duplicate columns');
  });
});

describe('loadDataset', () => {
  it('should read the bundled credit dataset in full', async () => {
    const table = await loadDataset(DATASET);

    expect(table.columns).toEqual(HEADER.split(','));
    expect(table.rows).toHaveLength(120);
    expect(table.rows[0]).toEqual({
      account_id: 'a_1',
      amount_6: '7983.99',
      pur_6: '21',
      avg_pur_amt_6: '380.19',
      avg_interval_pur_6: '26',
      credit_limit: '19.88',
      marital_status: 'married',
      sex: 'female',
      education: 'undergraduate',
      income: '33.21',
      age: '25',
      bad_ind: '1',
    });
  });

  it('should fail with DATA_LOAD_FAILED for a missing file', async () => {
    await expect(loadDataset(path.join(__dirname, 'no-such-file.csv'))).rejects.toMatchObject({
      code: MLErrorCode.DATA_LOAD_FAILED,
    });
  });
});

describe('toLabeledRecords', () => {
  it('should map rows onto labeled credit records', () => {
    const table = parseDataset(
      `${HEADER}\na_9,173.22,1,173.22,0,5.26,married,male,undergraduate,12.36,38,0\n`
    );

    expect(toLabeledRecords(table)).toEqual([
      {
        account_id: 'a_9',
        amount_6: 173.22,
        pur_6: 1,
        avg_pur_amt_6: 173.22,
        avg_interval_pur_6: 0,
        credit_limit: 5.26,
        marital_status: 'married',
        sex: 'male',
        education: 'undergraduate',
        income: 12.36,
        age: 38,
        bad_ind: 0,
      },
    ]);
  });

  it('should read identifier and target from configured columns', () => {
    const header = HEADER.replace('account_id', 'acct').replace('bad_ind', 'defaulted');
    const table = parseDataset(`${header}\n77,1,1,1,0,1,single,female,graduate,1,30,1\n`);

    const [record] = toLabeledRecords(table, { idColumn: 'acct', targetColumn: 'defaulted' });

    expect(record.account_id).toBe('77');
    expect(record.bad_ind).toBe(1);
  });

  it('should list missing columns', () => {
    const table = parseDataset('account_id,bad_ind\na_1,0\n');

    expect(() => toLabeledRecords(table)).toThrow(/missing columns: amount_6, pur_6/);
  });

  it('should reject non-numeric feature values', () => {
    const table = parseDataset(`${HEADER}\na_1,lots,1,1,0,1,single,male,graduate,1,30,0\n`);

    expect(() => toLabeledRecords(table)).toThrow('Row 2: column amount_6 must be numeric, got "lots"');
  });

  it('should keep identifiers and categories exactly as written', () => {
    const table = parseDataset(
      [
        HEADER,
        '007,1,1,1,0,1,single,male,10,1,30,0',
        '0x1A,1,1,1,0,1,single,male,graduate,1,30,1',
        '1e3,1,1,1,0,1,single,male,graduate,1,30,0',
      ].join('\n')
    );

    const records = toLabeledRecords(table);

    expect(records.map((record) => record.account_id)).toEqual(['007', '0x1A', '1e3']);
    expect(records[0].education).toBe('10');
  });

  it.each(['0x1A', '1e3', 'Infinity', ''])('should reject %p in a numeric column', (value) => {
    const table = parseDataset(`${HEADER}\na_1,${value},1,1,0,1,single,male,graduate,1,30,0\n`);

    expect(() => toLabeledRecords(table)).toThrow(`Row 2: column amount_6 must be numeric, got "${value}"`);
  });

  it('should accept signed and fractional decimals', () => {
    const table = parseDataset(`${HEADER}\na_1,-12.50,+3,.5,0,1,single,male,graduate,1.,30,0\n`);

    const [record] = toLabeledRecords(table);

    expect([record.amount_6, record.pur_6, record.avg_pur_amt_6, record.income]).toEqual([-12.5, 3, 0.5, 1]);
  });

  it('should reject targets other than 0 and 1', () => {
    const table = parseDataset(`${HEADER}\na_1,1,1,1,0,1,single,male,graduate,1,30,2\n`);

    expect(() => toLabeledRecords(table)).toThrow('Row 2: target bad_ind must be 0 or 1, got "2"');
  });
});

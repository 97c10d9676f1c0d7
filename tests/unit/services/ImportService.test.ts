import { describe, it, expect } from 'vitest';
import { ImportService, parseRate } from '../../../src/services/ImportService.js';
import { CommissionCalculator } from '../../../src/services/CommissionCalculator.js';

describe('ImportService', () => {
  const importer = new ImportService(new CommissionCalculator(), 0.45);
  const options = { technicianId: 'tech-1' };

  it('should map a spreadsheet row to a job', () => {
    const result = importer.importRows(
      [
        {
          Date: '1/5/26',
          Address: '1 Main St, Rye, NY',
          Total: 1000,
          Parts: 50,
          Cash: '',
          CC: 1000,
          Check: '',
          '%': '50%',
          FEE: 30,
        },
      ],
      options
    );

    expect(result.errors).toEqual([]);
    expect(result.rowCount).toBe(1);
    expect(result.jobs).toEqual([
      {
        technicianId: 'tech-1',
        address: '1 Main St, Rye, NY',
        phone: '',
        description: '',
        date: '2026-01-05',
        total: 100000,
        parts: 5000,
        fee: 3000,
        paymentMethod: 'cc',
        commissionRate: 0.5,
        techAmount: null,
        notes: '',
      },
    ]);
  });

  it('should pick the payment method from the amount columns', () => {
    const result = importer.importRows(
      [
        { Total: 200, Cash: 200 },
        { Total: 200, Check: '200' },
        { Total: 300, Transfer: 300 },
        { Total: 400, 'Credit Card': 400 },
        { Total: 500 },
      ],
      options
    );

    expect(result.jobs.map((job) => job.paymentMethod)).toEqual([
      'cash',
      'check',
      'transfer',
      'cc',
      'cash',
    ]);
  });

  it('should prefer a company-bound column over cash', () => {
    const result = importer.importRows([{ Total: 200, Cash: 200, Check: 200 }], options);
    expect(result.jobs[0].paymentMethod).toBe('check');
  });

  it('should honor an explicit payment method column', () => {
    const result = importer.importRows([{ Total: 200, 'Payment Method': 'Credit Card', Cash: 200 }], options);
    expect(result.jobs[0].paymentMethod).toBe('cc');
  });

  it('should read rates as percentages or fractions and fall back to the default', () => {
    const result = importer.importRows(
      [
        { Total: 100, '%': 50 },
        { Total: 100, Commission: 0.4 },
        { Total: 100, Rate: '35%' },
        { Total: 100 },
      ],
      options
    );

    expect(result.jobs.map((job) => job.commissionRate)).toEqual([0.5, 0.4, 0.35, 0.45]);
  });

  it('should apply a rate override to every row', () => {
    const result = importer.importRows(
      [{ Total: 100, '%': '50%' }, { Total: 100 }],
      { technicianId: 'tech-1', commissionRate: 0.6 }
    );

    expect(result.jobs.map((job) => job.commissionRate)).toEqual([0.6, 0.6]);
  });

  it('should normalize header case and whitespace', () => {
    const result = importer.importRows([{ ' TOTAL ': '$1,250.50', ' parts': '10' }], options);

    expect(result.jobs[0].total).toBe(125050);
    expect(result.jobs[0].parts).toBe(1000);
  });

  it('should report failing rows by row number and keep the rest', () => {
    const result = importer.importRows(
      [
        { Address: '1 Main St', Total: '' },
        { Total: 'lots' },
        {},
        { Total: 100, Parts: 150 },
        { Total: 100, Date: 'someday' },
        { Total: 100 },
      ],
      options
    );

    expect(result.rowCount).toBe(5);
    expect(result.jobs).toHaveLength(1);
    expect(result.errors).toEqual([
      { row: 2, code: 'MISSING_REQUIRED_FIELD', message: 'Missing required field: total' },
      { row: 3, code: 'VALIDATION_ERROR', message: 'Column "total" is not an amount' },
      { row: 5, code: 'INVALID_AMOUNT', message: 'Parts cost exceeds the job total' },
      { row: 6, code: 'VALIDATION_ERROR', message: 'Column "date" is not a date' },
    ]);
  });

  it('should import CSV bytes', () => {
    const csv = [
      'Date,Address,Total,Parts,Cash,CC,Check,%,FEE',
      '2026-01-05,"1 Main St, Rye, NY",500,50,500,,,50%,',
    ].join('\n');

    const result = importer.importFile(Buffer.from(csv), options);

    expect(result.errors).toEqual([]);
    expect(result.jobs).toHaveLength(1);
    expect(result.jobs[0]).toMatchObject({
      date: '2026-01-05',
      address: '1 Main St, Rye, NY',
      total: 50000,
      parts: 5000,
      fee: 0,
      paymentMethod: 'cash',
      commissionRate: 0.5,
    });
  });

  it('should report sheet row numbers that count skipped blank rows', () => {
    const csv = ['Date,Address,Total', '2026-01-05,1 Main St,100', ',,', ',,', '2026-01-06,2 Elm St,lots'].join(
      '\n'
    );

    const result = importer.importFile(Buffer.from(csv), options);

    expect(result.rowCount).toBe(2);
    expect(result.jobs).toHaveLength(1);
    expect(result.errors).toEqual([
      { row: 5, code: 'VALIDATION_ERROR', message: 'Column "total" is not an amount' },
    ]);
  });
});

describe('parseRate', () => {
  it('should accept percent strings, whole percentages and fractions', () => {
    expect(parseRate('50%')).toBe(0.5);
    expect(parseRate('37.5%')).toBe(0.375);
    expect(parseRate(50)).toBe(0.5);
    expect(parseRate('50')).toBe(0.5);
    expect(parseRate(0.5)).toBe(0.5);
  });

  it('should reject anything else', () => {
    expect(parseRate('half')).toBeNull();
    expect(parseRate('')).toBeNull();
    expect(parseRate(Number.NaN)).toBeNull();
  });
});

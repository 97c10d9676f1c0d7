import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { readSheetRows, writeWorkbook } from '../../../src/infra/spreadsheet.js';

describe('spreadsheet', () => {
  it('should read CSV rows keyed by header with empty cells as empty strings', () => {
    const rows = readSheetRows(Buffer.from('Address,Total,Parts\n"1 Main St, Rye, NY",500,\n'));

    expect(rows).toHaveLength(1);
    expect(rows[0].Address).toBe('1 Main St, Rye, NY');
    expect(rows[0].Parts).toBe('');
  });

  it('should write a workbook that reads back', () => {
    const buffer = writeWorkbook([
      {
        name: 'Report',
        preamble: [['Title']],
        columns: [{ header: 'Name' }, { header: 'Amount', numberFormat: '$#,##0.00' }],
        rows: [['Sam', 12.5]],
      },
    ]);

    const workbook = XLSX.read(buffer, { type: 'buffer', cellNF: true });
    const sheet = workbook.Sheets.Report;
    expect(sheet.A1.v).toBe('Title');
    expect(sheet.A2.v).toBe('Name');
    expect(sheet.B3.v).toBe(12.5);
    expect(sheet.B3.z).toBe('$#,##0.00');
  });

  it('should write a workbook that reads back through readSheetRows', () => {
    const buffer = writeWorkbook([
      { name: 'Jobs', columns: [{ header: 'Total' }, { header: 'CC' }], rows: [[500, 500]] },
    ]);

    expect(readSheetRows(buffer)).toEqual([{ Total: 500, CC: 500 }]);
  });
});

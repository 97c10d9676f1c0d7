import * as XLSX from 'xlsx';
import { ValidationError } from '../domain/errors.js';

export type SheetRow = Record<string, unknown>;
export type CellValue = string | number | boolean | Date | null;

export interface SheetColumn {
  header: string;
  /** Column width in characters */
  width?: number;
  /** Excel number format applied to numeric cells, e.g. '$#,##0.00' */
  numberFormat?: string;
}

export interface SheetSpec {
  name: string;
  /** Rows written above the header row (title, technician, period) */
  preamble?: CellValue[][];
  columns: SheetColumn[];
  rows: CellValue[][];
}

/**
 * Reads the first worksheet of an .xlsx, .xls or .csv file as objects keyed
 * by the header row. Empty cells come back as ''. CSV text is not
 * type-converted. Blank rows are dropped; each row keeps its sheet position
 * in the non-enumerable __rowNum__.
 */
export function readSheetRows(data: Buffer): SheetRow[] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'buffer', cellDates: true, raw: true });
  } catch (error) {
    throw new ValidationError('File is not a readable spreadsheet', { cause: String(error) });
  }

  const firstSheet = workbook.SheetNames[0];
  const sheet = firstSheet ? workbook.Sheets[firstSheet] : undefined;
  if (!sheet) {
    throw new ValidationError('Spreadsheet has no worksheets');
  }

  return XLSX.utils.sheet_to_json<SheetRow>(sheet, { defval: '' });
}

export function writeWorkbook(sheets: SheetSpec[]): Buffer {
  const workbook = XLSX.utils.book_new();

  for (const spec of sheets) {
    const preamble = spec.preamble ?? [];
    const headerRow = spec.columns.map((column) => column.header);
    const sheet = XLSX.utils.aoa_to_sheet([...preamble, headerRow, ...spec.rows], {
      cellDates: true,
    });

    sheet['!cols'] = spec.columns.map((column) => ({ wch: column.width ?? 12 }));

    const firstDataRow = preamble.length + 1;
    spec.columns.forEach((column, columnIndex) => {
      if (!column.numberFormat) return;
      for (let rowIndex = 0; rowIndex < spec.rows.length; rowIndex++) {
        const address = XLSX.utils.encode_cell({ r: firstDataRow + rowIndex, c: columnIndex });
        const cell = sheet[address];
        if (cell && cell.t === 'n') {
          cell.z = column.numberFormat;
        }
      }
    });

    XLSX.utils.book_append_sheet(workbook, sheet, spec.name);
  }

  const output: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(output)) {
    throw new Error('Workbook writer did not return a buffer');
  }
  return output;
}

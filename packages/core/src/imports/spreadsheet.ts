/**
 * Spreadsheet codec
 *
 * Reads the first worksheet of an .xlsx upload into a RawTable and writes
 * export tables as a single "Data" worksheet with a styled header row.
 */

import ExcelJS from 'exceljs';
import type { CellValue as ExcelCellValue, Worksheet } from 'exceljs';
import { ImportValidationError } from './import-errors.js';
import type { CellValue, RawRow, RawTable } from './import-types.js';
import { coerceText } from './row-parser.js';

const HEADER_FILL = 'FF366092';
const HEADER_FONT = 'FFFFFFFF';

/**
 * Reduce rich text, formula, hyperlink, and error cells to plain values
 */
export function normalizeCell(value: ExcelCellValue): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if ('richText' in value) {
    return value.richText.map((run) => run.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return normalizeCell(value.result ?? null);
  }
  // #N/A, #REF! and friends
  return null;
}

function readHeaders(sheet: Worksheet): Map<number, string> {
  const headers = new Map<number, string>();
  sheet.getRow(1).eachCell({ includeEmpty: false }, (cell, column) => {
    const header = coerceText(normalizeCell(cell.value));
    if (header) {
      headers.set(column, header);
    }
  });
  return headers;
}

/**
 * Decode an .xlsx workbook: first worksheet, first row = headers.
 * Fully blank rows are dropped.
 *
 * @throws ImportValidationError if the data is not a readable workbook or has no headers
 */
export async function readSpreadsheet(data: ArrayBuffer): Promise<RawTable> {
  const workbook = new ExcelJS.Workbook();

  try {
    await workbook.xlsx.load(Buffer.from(data));
  } catch (error) {
    throw new ImportValidationError('The file is not a readable .xlsx workbook', undefined, {
      cause: error,
    });
  }

  const sheet = workbook.worksheets[0];
  if (!sheet) {
    throw new ImportValidationError('The workbook has no worksheets');
  }

  const headers = readHeaders(sheet);
  if (headers.size === 0) {
    throw new ImportValidationError('The first row must contain column headers');
  }

  const rows: RawRow[] = [];
  sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) {
      return;
    }

    const cells: Record<string, CellValue> = {};
    let blank = true;

    for (const [column, header] of headers) {
      const value = normalizeCell(row.getCell(column).value);
      cells[header] = value;
      if (coerceText(value) !== '') {
        blank = false;
      }
    }

    if (!blank) {
      rows.push({ rowNumber, cells });
    }
  });

  return { headers: [...headers.values()], rows };
}

export interface SheetColumn {
  key: string;
  header: string;
  width?: number;
}

export interface SheetTable {
  columns: SheetColumn[];
  rows: Array<Record<string, CellValue>>;
}

/**
 * Encode a table as an .xlsx workbook with a bold, white-on-blue, centered header
 */
export async function writeSpreadsheet(table: SheetTable, sheetName = 'Data'): Promise<ArrayBuffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(sheetName);

  sheet.columns = table.columns.map((column) => ({
    key: column.key,
    header: column.header,
    width: column.width ?? Math.max(12, column.header.length + 4),
  }));

  for (const row of table.rows) {
    sheet.addRow(row);
  }

  sheet.getRow(1).eachCell((cell) => {
    cell.font = { bold: true, color: { argb: HEADER_FONT } };
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL } };
    cell.alignment = { horizontal: 'center' };
  });

  const bytes = new Uint8Array(await workbook.xlsx.writeBuffer());
  const data = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(data).set(bytes);
  return data;
}

/**
 * Convenience for callers holding rows keyed by header
 */
export function rawTableFromRecords(
  headers: string[],
  records: ReadonlyArray<Record<string, CellValue>>
): RawTable {
  return {
    headers,
    rows: records.map((cells, index) => ({ rowNumber: index + 2, cells: { ...cells } })),
  };
}

import type { Context } from 'hono';
import { writeSpreadsheet } from '@stockroom/core';
import type { SheetTable } from '@stockroom/core';

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

/**
 * Answer with an .xlsx attachment
 */
export async function sendSpreadsheet(c: Context, table: SheetTable, filename: string) {
  const data = await writeSpreadsheet(table);

  return c.body(data, 200, {
    'Content-Type': XLSX_CONTENT_TYPE,
    'Content-Disposition': `attachment; filename="${filename}"`,
  });
}
